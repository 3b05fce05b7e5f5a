// Shared types and helpers for the target-language emitters

import {
	defaultIgnored,
	type DefaultIgnoredDiagnostic,
} from "../errors.js";
import { SymbolTable, toPascalCase, toSnakeCase, type TargetLanguage } from "../identifiers/sanitize.js";
import type { DispatchEntry, ResolvedGraph } from "../topology/resolver.js";
import { formatStaticType, type StaticType } from "../type-mapper.js";
import {
	findNode,
	stateTypeName,
	type FieldSpec,
	type GraphInfo,
	type JsonValue,
	type NodeSpec,
} from "../types.js";

//==============================================================================
// Artifact
//==============================================================================

export interface SourceSections {
	/** Header comment, imports, generated error and result types */
	prelude: string;
	stateType: string;
	/** node id -> stub, reachable nodes first in dispatch order */
	nodes: ReadonlyMap<string, string>;
	/** router name -> stub */
	routers: ReadonlyMap<string, string>;
	dispatch: string;
	/** Empty when tests are disabled */
	tests: string;
}

export interface SourceArtifact {
	target: TargetLanguage;
	/** Base name of the generated module, without extension */
	moduleName: string;
	sections: SourceSections;
	diagnostics: readonly DefaultIgnoredDiagnostic[];
}

export interface EmitOptions {
	/** Base name of the generated module (default: snake-cased graph name, or `graph`) */
	moduleName?: string | undefined;
	/** Overrides the schema's state type name */
	stateTypeName?: string | undefined;
	/** Emit the test scaffold (default: true) */
	includeTests?: boolean | undefined;
	/** Content digest of the source graph, recorded in the header */
	digest?: string | undefined;
}

//==============================================================================
// Symbol Planning
//==============================================================================

export interface SymbolPlan {
	stateType: string;
	/** field name -> struct field symbol */
	fields: ReadonlyMap<string, string>;
	/** node id -> stub function symbol */
	nodeFns: ReadonlyMap<string, string>;
	/** reachable node id -> dispatch enum member */
	variants: ReadonlyMap<string, string>;
	/** router name -> stub function symbol */
	routers: ReadonlyMap<string, string>;
	/** routed node id -> branch function symbol */
	branchFns: ReadonlyMap<string, string>;
}

/**
 * Assign every symbol of one artifact. Allocation order is fixed (types,
 * fields, node stubs in emission order, routers, branch functions), so equal
 * inputs always produce equal names.
 */
export function planSymbols(
	graph: GraphInfo,
	resolved: ResolvedGraph,
	seed: readonly string[],
	options: EmitOptions,
): SymbolPlan {
	const types = new SymbolTable(seed);
	const stateType = types.symbolFor(options.stateTypeName ?? stateTypeName(graph));

	const values = new SymbolTable([...seed, stateType]);
	const members = new SymbolTable();
	const fieldTable = new SymbolTable();

	const fields = new Map<string, string>();
	for (const field of graph.stateSchema.fields) {
		fields.set(field.name, fieldTable.symbolFor(field.name));
	}

	const nodeFns = new Map<string, string>();
	for (const node of emittedNodes(graph, resolved)) {
		nodeFns.set(node.id, values.symbolFor(node.id, "node"));
	}

	const variants = new Map<string, string>();
	for (const id of resolved.order) {
		variants.set(id, members.symbolAs(id, toPascalCase(id) || id));
	}

	const routers = new Map<string, string>();
	const branchFns = new Map<string, string>();
	for (const entry of routedEntries(resolved)) {
		const router = entry.conditional.routerName;
		routers.set(router, values.symbolFor(router, "router"));
	}
	for (const entry of routedEntries(resolved)) {
		branchFns.set(entry.nodeId, values.symbolFor("branch_" + (nodeFns.get(entry.nodeId) ?? entry.nodeId), "branch"));
	}

	return { stateType, fields, nodeFns, variants, routers, branchFns };
}

/** Look up a planned symbol; planning covers every id the emitters ask for. */
export function symbol(map: ReadonlyMap<string, string>, key: string): string {
	const found = map.get(key);
	if (found === undefined) {
		throw new Error("No symbol planned for " + JSON.stringify(key));
	}
	return found;
}

//==============================================================================
// Emission Order
//==============================================================================

/** Reachable nodes in dispatch order, then unreachable ones in declaration order. */
export function emittedNodes(graph: GraphInfo, resolved: ResolvedGraph): NodeSpec[] {
	const nodes: NodeSpec[] = [];
	for (const id of [...resolved.order, ...resolved.unreachable]) {
		const node = findNode(graph, id);
		if (node !== undefined) nodes.push(node);
	}
	return nodes;
}

export type RoutedEntry = DispatchEntry & { conditional: NonNullable<DispatchEntry["conditional"]> };

export function isRouted(entry: DispatchEntry): entry is RoutedEntry {
	return entry.conditional !== undefined;
}

/** Dispatch rows that invoke a router, in dispatch order. */
export function routedEntries(resolved: ResolvedGraph): RoutedEntry[] {
	return [...resolved.dispatch.values()].filter(isRouted);
}

/** Every label a router must be able to return, across the nodes that use it. */
export function routerLabels(resolved: ResolvedGraph, router: string): string[] {
	const labels = new Set<string>();
	for (const entry of routedEntries(resolved)) {
		if (entry.conditional.routerName !== router) continue;
		for (const branch of entry.conditional.branches) labels.add(branch.label);
	}
	return [...labels];
}

/** A label no branch declares, for negative dispatch tests. */
export function undeclaredLabel(entry: RoutedEntry): string {
	const declared = new Set(entry.conditional.branches.map((b) => b.label));
	let label = "__undeclared__";
	while (declared.has(label)) label += "_";
	return label;
}

//==============================================================================
// Comments
//==============================================================================

/** Single-line comment text: whitespace collapsed, block-comment terminators broken. */
export function commentText(text: string): string {
	return text.replace(/\s+/g, " ").replace(/\*\//g, "*\\/").trim();
}

/** `displayName: first line of doc`, or just the display name. */
export function nodeSummary(node: NodeSpec): string {
	const firstLine = node.doc?.split("\n").map((l) => l.trim()).find((l) => l !== "");
	const head = node.displayName === node.id ? node.id : node.displayName + " (" + node.id + ")";
	return commentText(firstLine === undefined ? head : head + ": " + firstLine);
}

export function headerLines(graph: GraphInfo, options: EmitOptions): string[] {
	const lines = [
		"Generated by stategraph-codegen" + (graph.name === undefined ? "" : " from graph " + JSON.stringify(graph.name)) + ".",
		"Do not edit the dispatch code by hand; fill in the node and router stubs.",
	];
	if (options.digest !== undefined) lines.push("Source digest: " + options.digest);
	return lines.map(commentText);
}

export function unreachableNote(entryPoint: string): string {
	return commentText("Unreachable from entry point " + JSON.stringify(entryPoint) + "; kept for completion, not dispatched.");
}

//==============================================================================
// Default Values
//==============================================================================

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function keyFits(key: string, type: StaticType): boolean {
	switch (type.kind) {
	case "text": return true;
	case "int64": return /^-?\d+$/.test(key) && Number.isSafeInteger(Number(key));
	case "bool": return key === "true" || key === "false";
	default: return false;
	}
}

/** Whether a JSON default can be rendered as a literal of `type`. */
export function defaultFits(value: JsonValue, type: StaticType): boolean {
	switch (type.kind) {
	case "text": return typeof value === "string";
	case "int64": return typeof value === "number" && Number.isSafeInteger(value);
	case "float64": return typeof value === "number";
	case "bool": return typeof value === "boolean";
	case "dynamic": return true;
	case "custom": return false;
	case "nullable": return value === null || defaultFits(value, type.inner);
	case "sequence": return Array.isArray(value) && value.every((v) => defaultFits(v, type.element));
	case "dictionary":
		return isJsonObject(value)
			&& Object.entries(value).every(([k, v]) => keyFits(k, type.key) && defaultFits(v, type.value));
	}
}

export interface FieldDefault {
	/** Usable schema default; absent means the empty value */
	value?: JsonValue | undefined;
	diagnostic?: DefaultIgnoredDiagnostic | undefined;
}

export function fieldDefault(field: FieldSpec, type: StaticType): FieldDefault {
	if (field.defaultValue === undefined) return {};
	if (defaultFits(field.defaultValue, type)) return { value: field.defaultValue };
	return { diagnostic: defaultIgnored(field.name, formatStaticType(type)) };
}

export function jsonEntries(value: JsonValue): [string, JsonValue][] {
	return isJsonObject(value) ? Object.entries(value) : [];
}

export function jsonItems(value: JsonValue): JsonValue[] {
	return Array.isArray(value) ? value : [];
}

//==============================================================================
// Module Naming
//==============================================================================

export function defaultModuleName(graph: GraphInfo): string {
	const name = toSnakeCase(graph.name ?? "");
	return name === "" || /^[0-9]/.test(name) ? "graph" + (name === "" ? "" : "_" + name) : name;
}
