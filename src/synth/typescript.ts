// TypeScript Emitter
// Renders a resolved graph as an ES module plus a node:test scaffold module.
// State fields keep their original names as property keys, so no renaming
// is needed on the wire.

import type { DefaultIgnoredDiagnostic } from "../errors.js";
import type { DispatchEntry, ResolvedGraph } from "../topology/resolver.js";
import { dynamicType, usesKind, type StaticType } from "../type-mapper.js";
import { isTerminal, type GraphInfo, type JsonValue, type NodeTarget } from "../types.js";
import {
	commentText,
	defaultModuleName,
	emittedNodes,
	fieldDefault,
	headerLines,
	jsonEntries,
	jsonItems,
	nodeSummary,
	planSymbols,
	routedEntries,
	routerLabels,
	symbol,
	undeclaredLabel,
	unreachableNote,
	type EmitOptions,
	type RoutedEntry,
	type SourceArtifact,
	type SymbolPlan,
} from "./shared.js";

//==============================================================================
// Names the generated modules declare themselves
//==============================================================================

const TS_SEED: readonly string[] = [
	"JsonValue", "GraphError", "NodeError", "DispatchError", "NodeResult",
	"Node", "Step", "END", "runGraph", "dispatchNode", "invoke", "notImplemented",
	"createInitialState", "Map", "Error", "Array", "Object", "String", "Number",
	"Boolean", "BigInt", "Symbol", "Promise", "JSON", "test", "assert",
	// locals of dispatchNode, runGraph and the test module
	"state", "current", "next", "step", "initial", "entry",
];

const INDENT = "\t";

//==============================================================================
// Types and Literals
//==============================================================================

export function renderTypeScriptType(t: StaticType): string {
	switch (t.kind) {
	case "text": return "string";
	case "int64": return "bigint";
	case "float64": return "number";
	case "bool": return "boolean";
	case "sequence": {
		const element = renderTypeScriptType(t.element);
		return (t.element.kind === "nullable" ? "(" + element + ")" : element) + "[]";
	}
	case "dictionary": return "Map<" + renderTypeScriptType(t.key) + ", " + renderTypeScriptType(t.value) + ">";
	case "nullable": return renderTypeScriptType(t.inner) + " | null";
	case "dynamic": return "JsonValue";
	case "custom": return t.name;
	}
}

const IDENTIFIER_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function propertyKey(name: string): string {
	return IDENTIFIER_NAME.test(name) ? name : JSON.stringify(name);
}

/** Key in an object literal; `__proto__` would set the prototype unless computed. */
export function literalKey(name: string): string {
	return name === "__proto__" ? "[" + JSON.stringify(name) + "]" : propertyKey(name);
}

export function propertyAccess(target: string, name: string): string {
	return IDENTIFIER_NAME.test(name) ? target + "." + name : target + "[" + JSON.stringify(name) + "]";
}

/** Empty value of `t`; undefined for a custom type, which has none. */
export function tsEmptyValue(t: StaticType): string | undefined {
	switch (t.kind) {
	case "text": return "\"\"";
	case "int64": return "0n";
	case "float64": return "0";
	case "bool": return "false";
	case "sequence": return "[]";
	case "dictionary": return "new " + renderTypeScriptType(t) + "()";
	case "nullable": return "null";
	case "dynamic": return "null";
	case "custom": return undefined;
	}
}

function tsKey(key: string, t: StaticType): string {
	switch (t.kind) {
	case "int64": return String(Number(key)) + "n";
	case "bool": return key;
	default: return JSON.stringify(key);
	}
}

/** Literal of `t` for a JSON value that fits it (see `defaultFits`). */
export function tsValue(value: JsonValue, t: StaticType): string {
	switch (t.kind) {
	case "text":
	case "float64":
	case "bool":
	case "dynamic":
		return JSON.stringify(value);
	case "int64": return String(value) + "n";
	case "custom": return "null";
	case "nullable": return value === null ? "null" : tsValue(value, t.inner);
	case "sequence": return "[" + jsonItems(value).map((v) => tsValue(v, t.element)).join(", ") + "]";
	case "dictionary": {
		const pairs = jsonEntries(value).map(([k, v]) => "[" + tsKey(k, t.key) + ", " + tsValue(v, t.value) + "]");
		return "new " + renderTypeScriptType(t) + "(" + (pairs.length === 0 ? "" : "[" + pairs.join(", ") + "]") + ")";
	}
	}
}

//==============================================================================
// Emission State
//==============================================================================

interface TsField {
	name: string;
	type: StaticType;
	/** Initializer expression; undefined when the caller must supply the value */
	init: string | undefined;
}

interface EmitState {
	graph: GraphInfo;
	resolved: ResolvedGraph;
	plan: SymbolPlan;
	fields: TsField[];
	moduleName: string;
}

function planFields(
	graph: GraphInfo,
	types: ReadonlyMap<string, StaticType>,
	diagnostics: DefaultIgnoredDiagnostic[],
): TsField[] {
	return graph.stateSchema.fields.map((field) => {
		const type = types.get(field.name) ?? dynamicType();
		const def = fieldDefault(field, type);
		if (def.diagnostic !== undefined) diagnostics.push(def.diagnostic);
		return {
			name: field.name,
			type,
			init: def.value === undefined ? tsEmptyValue(type) : tsValue(def.value, type),
		};
	});
}

function requiredFields(s: EmitState): TsField[] {
	return s.fields.filter((f) => f.init === undefined);
}

function jsDoc(lines: string[], indent = ""): string[] {
	if (lines.length === 1) return [indent + "/** " + (lines[0] ?? "") + " */"];
	return [indent + "/**", ...lines.map((l) => indent + " * " + l), indent + " */"];
}

//==============================================================================
// Sections
//==============================================================================

function emitPrelude(s: EmitState, options: EmitOptions): string {
	const lines = headerLines(s.graph, options).map((l) => "// " + l);
	const customs = [...new Set(s.fields.flatMap((f) => customNames(f.type)))];
	if (customs.length > 0) {
		lines.push("// Custom types expected in scope: " + commentText(customs.join(", ")));
	}
	const state = s.plan.stateType;
	lines.push(
		"",
		"export type JsonValue =",
		INDENT + "| null",
		INDENT + "| boolean",
		INDENT + "| number",
		INDENT + "| string",
		INDENT + "| JsonValue[]",
		INDENT + "| { [key: string]: JsonValue };",
		"",
		"/** Failure of a graph run. */",
		"export class GraphError extends Error {",
		INDENT + "constructor(message: string, options?: ErrorOptions) {",
		INDENT.repeat(2) + "super(message, options);",
		INDENT.repeat(2) + "this.name = new.target.name;",
		INDENT + "}",
		"}",
		"",
		"/** A node stub returned an error. */",
		"export class NodeError extends GraphError {",
		INDENT + "readonly node: string;",
		"",
		INDENT + "constructor(node: string, cause: Error) {",
		INDENT.repeat(2) + "super(\"node \" + node + \" failed: \" + cause.message, { cause });",
		INDENT.repeat(2) + "this.node = node;",
		INDENT + "}",
		"}",
		"",
		"/** A router returned a label its branch table does not declare. */",
		"export class DispatchError extends GraphError {",
		INDENT + "readonly node: string;",
		INDENT + "readonly router: string;",
		INDENT + "readonly label: string;",
		"",
		INDENT + "constructor(node: string, router: string, label: string) {",
		INDENT.repeat(2) + "super(\"router \" + router + \" returned undeclared label \" + JSON.stringify(label) + \" after node \" + node);",
		INDENT.repeat(2) + "this.node = node;",
		INDENT.repeat(2) + "this.router = router;",
		INDENT.repeat(2) + "this.label = label;",
		INDENT + "}",
		"}",
		"",
		"/** Outcome of a node: the next state, or the error that stopped it. */",
		"export type NodeResult =",
		INDENT + "| { ok: true; state: " + state + " }",
		INDENT + "| { ok: false; error: Error };",
		"",
		"function notImplemented(node: string): Error {",
		INDENT + "return new Error(\"node \" + node + \" is not implemented\");",
		"}",
	);
	return lines.join("\n");
}

function customNames(t: StaticType): string[] {
	switch (t.kind) {
	case "custom": return [t.name];
	case "sequence": return customNames(t.element);
	case "dictionary": return [...customNames(t.key), ...customNames(t.value)];
	case "nullable": return customNames(t.inner);
	default: return [];
	}
}

function emitStateType(s: EmitState): string {
	const state = s.plan.stateType;
	const lines = ["/** State threaded through every node. */", "export interface " + state + " {"];
	for (const field of s.fields) {
		lines.push(INDENT + propertyKey(field.name) + ": " + renderTypeScriptType(field.type) + ";");
	}
	lines.push("}", "");

	const required = requiredFields(s);
	const param = required.length === 0
		? ""
		: "init: Pick<" + state + ", " + required.map((f) => JSON.stringify(f.name)).join(" | ") + ">";
	lines.push("export function createInitialState(" + param + "): " + state + " {");
	lines.push(INDENT + "return {");
	for (const field of s.fields) {
		const init = field.init ?? propertyAccess("init", field.name);
		lines.push(INDENT.repeat(2) + literalKey(field.name) + ": " + init + ",");
	}
	lines.push(INDENT + "};");
	lines.push("}");
	return lines.join("\n");
}

function emitNodes(s: EmitState): Map<string, string> {
	const state = s.plan.stateType;
	const stubs = new Map<string, string>();
	for (const node of emittedNodes(s.graph, s.resolved)) {
		const doc = [nodeSummary(node)];
		if (node.sourceLocation !== undefined) doc.push("Source: " + commentText(node.sourceLocation));
		const lines = jsDoc(doc);
		if (!s.resolved.dispatch.has(node.id)) {
			lines.push("// " + unreachableNote(s.resolved.entryPoint));
		}
		lines.push("export function " + symbol(s.plan.nodeFns, node.id) + "(_state: " + state + "): NodeResult {");
		lines.push(INDENT + "return { ok: false, error: notImplemented(" + JSON.stringify(node.id) + ") };");
		lines.push("}");
		stubs.set(node.id, lines.join("\n"));
	}
	return stubs;
}

function emitRouters(s: EmitState): Map<string, string> {
	const stubs = new Map<string, string>();
	for (const [router, fn] of s.plan.routers) {
		const labels = routerLabels(s.resolved, router).map((l) => JSON.stringify(l)).join(", ");
		stubs.set(router, [
			...jsDoc(["Router " + commentText(router) + ": must return one of " + commentText(labels) + "."]),
			"export function " + fn + "(_state: " + s.plan.stateType + "): string {",
			INDENT + "throw new Error(" + JSON.stringify("router " + router + " is not implemented") + ");",
			"}",
		].join("\n"));
	}
	return stubs;
}

function stepFor(s: EmitState, target: NodeTarget): string {
	return isTerminal(target) ? "END" : "{ kind: \"next\", node: Node." + symbol(s.plan.variants, target) + " }";
}

function emitBranchFn(s: EmitState, entry: RoutedEntry): string[] {
	const { routerName, branches } = entry.conditional;
	const lines = [
		...jsDoc(["Branch table of node " + commentText(JSON.stringify(entry.nodeId)) + " (router " + commentText(routerName) + ")."]),
		"export function " + symbol(s.plan.branchFns, entry.nodeId) + "(label: string): Step {",
		INDENT + "switch (label) {",
	];
	for (const branch of branches) {
		const arm = INDENT + "case " + JSON.stringify(branch.label) + ": return " + stepFor(s, branch.target) + ";";
		lines.push(branch.loopBack ? arm + " // loops back" : arm);
	}
	lines.push(INDENT + "default: throw new DispatchError("
		+ JSON.stringify(entry.nodeId) + ", " + JSON.stringify(routerName) + ", label);");
	lines.push(INDENT + "}");
	lines.push("}");
	return lines;
}

function dispatchCase(s: EmitState, entry: DispatchEntry): string[] {
	const fn = symbol(s.plan.nodeFns, entry.nodeId);
	const head = INDENT + "case Node." + symbol(s.plan.variants, entry.nodeId) + ":";
	if (entry.conditional !== undefined) {
		const router = symbol(s.plan.routers, entry.conditional.routerName);
		return [
			head + " {",
			INDENT.repeat(2) + "const next = invoke(current, " + fn + ", state);",
			INDENT.repeat(2) + "return [next, " + symbol(s.plan.branchFns, entry.nodeId) + "(" + router + "(next))];",
			INDENT + "}",
		];
	}
	let step = "END";
	let note = " // no outgoing edge";
	if (entry.unconditionalNext !== undefined) {
		step = stepFor(s, entry.unconditionalNext);
		note = entry.loopBack ? " // loops back" : "";
	}
	return [head, INDENT.repeat(2) + "return [invoke(current, " + fn + ", state), " + step + "];" + note];
}

function emitDispatch(s: EmitState): string {
	const state = s.plan.stateType;
	const lines = [
		"/** Nodes reachable from the entry point. */",
		"export const Node = {",
		...s.resolved.order.map((id) => INDENT + propertyKey(symbol(s.plan.variants, id)) + ": " + JSON.stringify(id) + ","),
		"} as const;",
		"",
		"export type Node = (typeof Node)[keyof typeof Node];",
		"",
		"/** What happens after a node: run another one, or finish. */",
		"export type Step = { kind: \"next\"; node: Node } | { kind: \"end\" };",
		"",
		"const END: Step = { kind: \"end\" };",
	];

	for (const entry of routedEntries(s.resolved)) {
		lines.push("", ...emitBranchFn(s, entry));
	}

	lines.push(
		"",
		"function invoke(node: Node, fn: (state: " + state + ") => NodeResult, state: " + state + "): " + state + " {",
		INDENT + "const result = fn(state);",
		INDENT + "if (!result.ok) throw new NodeError(node, result.error);",
		INDENT + "return result.state;",
		"}",
		"",
		"function dispatchNode(current: Node, state: " + state + "): [" + state + ", Step] {",
		INDENT + "switch (current) {",
	);
	for (const entry of s.resolved.dispatch.values()) {
		lines.push(...dispatchCase(s, entry));
	}
	lines.push(
		INDENT + "}",
		"}",
		"",
		...jsDoc([
			"Runs the graph from " + commentText(JSON.stringify(s.resolved.entryPoint)) + " until a node or branch ends the run.",
			"Loops repeat for as long as their routers keep choosing them.",
		]),
		"export function runGraph(initial: " + state + "): " + state + " {",
		INDENT + "let state = initial;",
		INDENT + "let current: Node = Node." + symbol(s.plan.variants, s.resolved.entryPoint) + ";",
		INDENT + "for (;;) {",
		INDENT.repeat(2) + "const [next, step] = dispatchNode(current, state);",
		INDENT.repeat(2) + "if (step.kind === \"end\") return next;",
		INDENT.repeat(2) + "state = next;",
		INDENT.repeat(2) + "current = step.node;",
		INDENT + "}",
		"}",
	);
	return lines.join("\n");
}

function expectedStep(s: EmitState, target: NodeTarget): string {
	return isTerminal(target) ? "{ kind: \"end\" }" : stepFor(s, target);
}

function emitTests(s: EmitState): string {
	const state = s.plan.stateType;
	const routed = routedEntries(s.resolved);
	const entryFn = symbol(s.plan.nodeFns, s.resolved.entryPoint);
	const canBuildState = requiredFields(s).length === 0;

	const imports = new Set<string>();
	if (routed.length > 0) imports.add("DispatchError");
	if (routed.some((e) => e.conditional.branches.some((b) => !isTerminal(b.target)))) imports.add("Node");
	for (const e of routed) imports.add(symbol(s.plan.branchFns, e.nodeId));
	if (canBuildState) imports.add("createInitialState");
	imports.add(entryFn);
	imports.add("type NodeResult");
	imports.add("type " + state);
	if (canBuildState && s.fields.some((f) => f.init !== undefined && /\bJsonValue\b/.test(f.init))) {
		imports.add("type JsonValue");
	}

	const lines = [
		"import assert from \"node:assert/strict\";",
		"import { test } from \"node:test\";",
		"import {",
		...[...imports].map((name) => INDENT + name + ","),
		"} from " + JSON.stringify("./" + s.moduleName + ".js") + ";",
	];

	if (canBuildState) {
		lines.push("", "test(\"initial state uses schema defaults\", () => {");
		lines.push(INDENT + "const state = createInitialState();");
		for (const field of s.fields) {
			if (field.init === undefined || usesKind(field.type, "custom")) continue;
			lines.push(INDENT + "assert.deepEqual(" + propertyAccess("state", field.name) + ", " + field.init + ");");
		}
		lines.push("});");
	} else {
		lines.push("", "// createInitialState needs values for custom-typed fields; no default-state test.");
	}

	lines.push(
		"",
		"test(\"entry node takes and returns the state\", () => {",
		INDENT + "const entry: (state: " + state + ") => NodeResult = " + entryFn + ";",
		INDENT + "assert.equal(typeof entry, \"function\");",
		"});",
	);

	for (const entry of routed) {
		const fn = symbol(s.plan.branchFns, entry.nodeId);
		lines.push("", "test(" + JSON.stringify(fn + " routes every declared label") + ", () => {");
		for (const b of entry.conditional.branches) {
			lines.push(INDENT + "assert.deepEqual(" + fn + "(" + JSON.stringify(b.label) + "), " + expectedStep(s, b.target) + ");");
		}
		lines.push(INDENT + "assert.throws(() => " + fn + "(" + JSON.stringify(undeclaredLabel(entry)) + "), DispatchError);");
		lines.push("});");
	}
	return lines.join("\n");
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Emit a TypeScript module for a resolved graph. The `tests` section is a
 * separate node:test module importing `./<moduleName>.js`.
 */
export function emitTypeScript(
	graph: GraphInfo,
	resolved: ResolvedGraph,
	types: ReadonlyMap<string, StaticType>,
	options: EmitOptions = {},
): SourceArtifact {
	const plan = planSymbols(graph, resolved, TS_SEED, options);
	const diagnostics: DefaultIgnoredDiagnostic[] = [];
	const moduleName = options.moduleName ?? defaultModuleName(graph);
	const s: EmitState = {
		graph,
		resolved,
		plan,
		fields: planFields(graph, types, diagnostics),
		moduleName,
	};

	return {
		target: "typescript",
		moduleName,
		sections: {
			prelude: emitPrelude(s, options),
			stateType: emitStateType(s),
			nodes: emitNodes(s),
			routers: emitRouters(s),
			dispatch: emitDispatch(s),
			tests: options.includeTests === false ? "" : emitTests(s),
		},
		diagnostics,
	};
}
