// Rust Emitter
// Renders a resolved graph as one self-contained Rust module: serde state
// struct, node and router stubs, a Node/Step dispatch loop and a #[cfg(test)]
// scaffold. Depends on serde (derive) and serde_json.

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
// Names the generated module declares itself
//==============================================================================

const RUST_SEED: readonly string[] = [
	"GraphError", "NodeError", "Node", "Step", "run_graph", "not_implemented",
	"Result", "Option", "Some", "None", "Ok", "Err", "String", "Vec", "Box",
	"BTreeMap", "Default", "Error", "fmt", "Serialize", "Deserialize",
	"serde", "serde_json", "std", "core", "alloc", "tests", "main",
	"initial_state_uses_schema_defaults", "entry_node_takes_and_returns_state",
	// locals of run_graph
	"state", "current", "step",
];

const INDENT = "    ";

//==============================================================================
// Types and Literals
//==============================================================================

export function renderRustType(t: StaticType): string {
	switch (t.kind) {
	case "text": return "String";
	case "int64": return "i64";
	case "float64": return "f64";
	case "bool": return "bool";
	case "sequence": return "Vec<" + renderRustType(t.element) + ">";
	case "dictionary": return "BTreeMap<" + renderRustType(t.key) + ", " + renderRustType(t.value) + ">";
	case "nullable": return "Option<" + renderRustType(t.inner) + ">";
	case "dynamic": return "serde_json::Value";
	case "custom": return t.name;
	}
}

/** Rust string literal; control characters use `\u{..}` escapes. */
export function rustString(text: string): string {
	let out = "\"";
	for (const ch of text) {
		const cp = ch.codePointAt(0) ?? 0;
		if (ch === "\"") out += "\\\"";
		else if (ch === "\\") out += "\\\\";
		else if (ch === "\n") out += "\\n";
		else if (ch === "\r") out += "\\r";
		else if (ch === "\t") out += "\\t";
		else if (cp < 0x20 || cp === 0x7f) out += "\\u{" + cp.toString(16) + "}";
		else if (cp >= 0xd800 && cp <= 0xdfff) out += "\\u{fffd}";
		else out += ch;
	}
	return out + "\"";
}

function floatLiteral(value: number): string {
	const text = String(value);
	return /[.eE]/.test(text) ? text : text + ".0";
}

/** Number inside `json!`: untyped integer literals default to i32 there. */
function jsonNumber(value: number): string {
	if (!Number.isSafeInteger(value)) return floatLiteral(value);
	return Math.abs(value) <= 0x7fffffff ? String(value) : String(value) + "i64";
}

function jsonMacroBody(value: JsonValue): string {
	if (value === null) return "null";
	if (typeof value === "boolean") return value ? "true" : "false";
	if (typeof value === "number") return jsonNumber(value);
	if (typeof value === "string") return rustString(value);
	if (Array.isArray(value)) return "[" + value.map(jsonMacroBody).join(", ") + "]";
	return "{" + Object.entries(value).map(([k, v]) => rustString(k) + ": " + jsonMacroBody(v)).join(", ") + "}";
}

export function rustEmptyValue(t: StaticType): string {
	switch (t.kind) {
	case "text": return "String::new()";
	case "int64": return "0";
	case "float64": return "0.0";
	case "bool": return "false";
	case "sequence": return "Vec::new()";
	case "dictionary": return "BTreeMap::new()";
	case "nullable": return "None";
	case "dynamic": return "serde_json::Value::Null";
	case "custom": return "Default::default()";
	}
}

function rustKey(key: string, t: StaticType): string {
	switch (t.kind) {
	case "int64": return String(Number(key));
	case "bool": return key;
	default: return "String::from(" + rustString(key) + ")";
	}
}

/** Literal of `t` for a JSON value that fits it (see `defaultFits`). */
export function rustValue(value: JsonValue, t: StaticType): string {
	switch (t.kind) {
	case "text": return typeof value === "string" ? "String::from(" + rustString(value) + ")" : rustEmptyValue(t);
	case "int64": return typeof value === "number" ? String(value) : rustEmptyValue(t);
	case "float64": return typeof value === "number" ? floatLiteral(value) : rustEmptyValue(t);
	case "bool": return typeof value === "boolean" ? String(value) : rustEmptyValue(t);
	case "dynamic": return "serde_json::json!(" + jsonMacroBody(value) + ")";
	case "custom": return rustEmptyValue(t);
	case "nullable": return value === null ? "None" : "Some(" + rustValue(value, t.inner) + ")";
	case "sequence": {
		const items = jsonItems(value);
		if (items.length === 0) return rustEmptyValue(t);
		return "vec![" + items.map((v) => rustValue(v, t.element)).join(", ") + "]";
	}
	case "dictionary": {
		const entries = jsonEntries(value);
		if (entries.length === 0) return rustEmptyValue(t);
		const pairs = entries.map(([k, v]) => "(" + rustKey(k, t.key) + ", " + rustValue(v, t.value) + ")");
		return "BTreeMap::from([" + pairs.join(", ") + "])";
	}
	}
}

//==============================================================================
// Emission State
//==============================================================================

interface RustField {
	name: string;
	symbol: string;
	type: StaticType;
	init: string;
}

interface EmitState {
	graph: GraphInfo;
	resolved: ResolvedGraph;
	plan: SymbolPlan;
	fields: RustField[];
	diagnostics: DefaultIgnoredDiagnostic[];
}

function planFields(
	graph: GraphInfo,
	types: ReadonlyMap<string, StaticType>,
	plan: SymbolPlan,
	diagnostics: DefaultIgnoredDiagnostic[],
): RustField[] {
	return graph.stateSchema.fields.map((field) => {
		const type = types.get(field.name) ?? dynamicType();
		const def = fieldDefault(field, type);
		if (def.diagnostic !== undefined) diagnostics.push(def.diagnostic);
		return {
			name: field.name,
			symbol: symbol(plan.fields, field.name),
			type,
			init: def.value === undefined ? rustEmptyValue(type) : rustValue(def.value, type),
		};
	});
}

function nodeLabel(id: string): string {
	return rustString(id);
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
	lines.push("");
	lines.push("#![allow(non_camel_case_types, non_snake_case)]");
	lines.push("");
	lines.push("use serde::{Deserialize, Serialize};");
	if (s.fields.some((f) => usesKind(f.type, "dictionary"))) {
		lines.push("use std::collections::BTreeMap;");
	}
	lines.push("use std::error::Error;");
	lines.push("use std::fmt;");
	lines.push("");
	lines.push("/// Error returned by a node stub.");
	lines.push("pub type NodeError = Box<dyn Error + Send + Sync>;");
	lines.push("");
	lines.push("/// Failure of a graph run: a node failed, or a router chose an undeclared label.");
	lines.push("#[derive(Debug)]");
	lines.push("pub enum GraphError {");
	lines.push(INDENT + "Node { node: &'static str, source: NodeError },");
	lines.push(INDENT + "Dispatch { node: &'static str, router: &'static str, label: String },");
	lines.push("}");
	lines.push("");
	lines.push("impl fmt::Display for GraphError {");
	lines.push(INDENT + "fn fmt(&self, f: &mut fmt::Formatter<'_>) -> fmt::Result {");
	lines.push(INDENT.repeat(2) + "match self {");
	lines.push(INDENT.repeat(3) + "GraphError::Node { node, source } => write!(f, \"node {} failed: {}\", node, source),");
	lines.push(INDENT.repeat(3) + "GraphError::Dispatch { node, router, label } => {");
	lines.push(INDENT.repeat(4) + "write!(f, \"router {} returned undeclared label {:?} after node {}\", router, label, node)");
	lines.push(INDENT.repeat(3) + "}");
	lines.push(INDENT.repeat(2) + "}");
	lines.push(INDENT + "}");
	lines.push("}");
	lines.push("");
	lines.push("impl Error for GraphError {");
	lines.push(INDENT + "fn source(&self) -> Option<&(dyn Error + 'static)> {");
	lines.push(INDENT.repeat(2) + "match self {");
	lines.push(INDENT.repeat(3) + "GraphError::Node { source, .. } => Some(source.as_ref()),");
	lines.push(INDENT.repeat(3) + "GraphError::Dispatch { .. } => None,");
	lines.push(INDENT.repeat(2) + "}");
	lines.push(INDENT + "}");
	lines.push("}");
	lines.push("");
	lines.push("fn not_implemented(node: &str) -> NodeError {");
	lines.push(INDENT + "format!(\"node {} is not implemented\", node).into()");
	lines.push("}");
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
	const name = s.plan.stateType;
	const lines = [
		"/// State threaded through every node.",
		"#[derive(Debug, Clone, Serialize, Deserialize)]",
		"#[serde(default)]",
		"pub struct " + name + " {",
	];
	for (const field of s.fields) {
		if (field.symbol !== field.name) {
			lines.push(INDENT + "#[serde(rename = " + rustString(field.name) + ")]");
		}
		lines.push(INDENT + "pub " + field.symbol + ": " + renderRustType(field.type) + ",");
	}
	lines.push("}");
	lines.push("");
	lines.push("impl Default for " + name + " {");
	lines.push(INDENT + "fn default() -> Self {");
	lines.push(INDENT.repeat(2) + "Self {");
	for (const field of s.fields) {
		lines.push(INDENT.repeat(3) + field.symbol + ": " + field.init + ",");
	}
	lines.push(INDENT.repeat(2) + "}");
	lines.push(INDENT + "}");
	lines.push("}");
	return lines.join("\n");
}

function emitNodes(s: EmitState): Map<string, string> {
	const state = s.plan.stateType;
	const stubs = new Map<string, string>();
	for (const node of emittedNodes(s.graph, s.resolved)) {
		const reachable = s.resolved.dispatch.has(node.id);
		const lines = ["/// " + nodeSummary(node)];
		if (node.sourceLocation !== undefined) {
			lines.push("/// Source: " + commentText(node.sourceLocation));
		}
		if (reachable) {
			lines.push("#[allow(unused_variables)]");
		} else {
			lines.push("// " + unreachableNote(s.resolved.entryPoint));
			lines.push("#[allow(dead_code, unused_variables)]");
		}
		lines.push("pub fn " + symbol(s.plan.nodeFns, node.id) + "(state: " + state + ") -> Result<" + state + ", NodeError> {");
		lines.push(INDENT + "Err(not_implemented(" + nodeLabel(node.id) + "))");
		lines.push("}");
		stubs.set(node.id, lines.join("\n"));
	}
	return stubs;
}

function emitRouters(s: EmitState): Map<string, string> {
	const stubs = new Map<string, string>();
	for (const [router, fn] of s.plan.routers) {
		const labels = routerLabels(s.resolved, router).map(rustString).join(", ");
		stubs.set(router, [
			"/// Router " + commentText(router) + ": must return one of " + commentText(labels) + ".",
			"#[allow(unused_variables)]",
			"pub fn " + fn + "(state: &" + s.plan.stateType + ") -> String {",
			INDENT + "unimplemented!(\"router {} is not implemented\", " + rustString(router) + ")",
			"}",
		].join("\n"));
	}
	return stubs;
}

function stepFor(s: EmitState, target: NodeTarget): string {
	return isTerminal(target) ? "Step::End" : "Step::Next(Node::" + symbol(s.plan.variants, target) + ")";
}

function emitBranchFn(s: EmitState, entry: RoutedEntry): string[] {
	const { routerName, branches } = entry.conditional;
	const lines = [
		"/// Branch table of node " + commentText(nodeLabel(entry.nodeId)) + " (router " + commentText(routerName) + ").",
		"fn " + symbol(s.plan.branchFns, entry.nodeId) + "(label: &str) -> Result<Step, GraphError> {",
		INDENT + "match label {",
	];
	for (const branch of branches) {
		const arm = INDENT.repeat(2) + rustString(branch.label) + " => Ok(" + stepFor(s, branch.target) + "),";
		lines.push(branch.loopBack ? arm + " // loops back" : arm);
	}
	lines.push(INDENT.repeat(2) + "other => Err(GraphError::Dispatch {");
	lines.push(INDENT.repeat(3) + "node: " + nodeLabel(entry.nodeId) + ",");
	lines.push(INDENT.repeat(3) + "router: " + rustString(routerName) + ",");
	lines.push(INDENT.repeat(3) + "label: other.to_string(),");
	lines.push(INDENT.repeat(2) + "}),");
	lines.push(INDENT + "}");
	lines.push("}");
	return lines;
}

function nextStep(s: EmitState, entry: DispatchEntry): string {
	if (entry.conditional !== undefined) {
		return symbol(s.plan.branchFns, entry.nodeId)
			+ "(&" + symbol(s.plan.routers, entry.conditional.routerName) + "(&state))?";
	}
	if (entry.unconditionalNext === undefined) return "Step::End // no outgoing edge";
	const step = stepFor(s, entry.unconditionalNext);
	return entry.loopBack ? step + " // loops back" : step;
}

function emitDispatch(s: EmitState): string {
	const lines = [
		"/// Nodes reachable from the entry point.",
		"#[derive(Debug, Clone, Copy, PartialEq, Eq)]",
		"pub enum Node {",
		...s.resolved.order.map((id) => INDENT + symbol(s.plan.variants, id) + ","),
		"}",
		"",
		"/// What happens after a node: run another one, or finish.",
		"#[derive(Debug, Clone, Copy, PartialEq, Eq)]",
		"pub enum Step {",
		INDENT + "Next(Node),",
		INDENT + "End,",
		"}",
	];

	for (const entry of routedEntries(s.resolved)) {
		lines.push("", ...emitBranchFn(s, entry));
	}

	const state = s.plan.stateType;
	const entryVariant = symbol(s.plan.variants, s.resolved.entryPoint);
	lines.push("");
	lines.push("/// Runs the graph from " + commentText(nodeLabel(s.resolved.entryPoint)) + " until a node or branch ends the run.");
	lines.push("/// Loops repeat for as long as their routers keep choosing them.");
	lines.push("pub fn run_graph(mut state: " + state + ") -> Result<" + state + ", GraphError> {");
	lines.push(INDENT + "let mut current = Node::" + entryVariant + ";");
	lines.push(INDENT + "loop {");
	lines.push(INDENT.repeat(2) + "let step = match current {");
	for (const entry of s.resolved.dispatch.values()) {
		const label = nodeLabel(entry.nodeId);
		lines.push(INDENT.repeat(3) + "Node::" + symbol(s.plan.variants, entry.nodeId) + " => {");
		lines.push(INDENT.repeat(4) + "state = " + symbol(s.plan.nodeFns, entry.nodeId)
			+ "(state).map_err(|source| GraphError::Node { node: " + label + ", source })?;");
		lines.push(INDENT.repeat(4) + nextStep(s, entry));
		lines.push(INDENT.repeat(3) + "}");
	}
	lines.push(INDENT.repeat(2) + "};");
	lines.push(INDENT.repeat(2) + "match step {");
	lines.push(INDENT.repeat(3) + "Step::Next(next) => current = next,");
	lines.push(INDENT.repeat(3) + "Step::End => return Ok(state),");
	lines.push(INDENT.repeat(2) + "}");
	lines.push(INDENT + "}");
	lines.push("}");
	return lines.join("\n");
}

function emitTests(s: EmitState): string {
	const state = s.plan.stateType;
	const body = (lines: string[]): string[] => lines.map((l) => INDENT.repeat(2) + l);
	const lines = ["#[cfg(test)]", "mod tests {", INDENT + "use super::*;"];

	const defaults = ["let state = " + state + "::default();"];
	for (const field of s.fields) {
		if (usesKind(field.type, "custom")) {
			defaults.push("// " + field.symbol + ": custom type, not compared");
			continue;
		}
		const expected = "expected_" + field.symbol;
		defaults.push("let " + expected + ": " + renderRustType(field.type) + " = " + field.init + ";");
		defaults.push("assert_eq!(state." + field.symbol + ", " + expected + ");");
	}
	if (s.fields.length === 0) defaults.push("let _ = state;");
	lines.push("", INDENT + "#[test]", INDENT + "fn initial_state_uses_schema_defaults() {", ...body(defaults), INDENT + "}");

	lines.push("", INDENT + "#[test]", INDENT + "fn entry_node_takes_and_returns_state() {", ...body([
		"let entry: fn(" + state + ") -> Result<" + state + ", NodeError> = " + symbol(s.plan.nodeFns, s.resolved.entryPoint) + ";",
		"let _ = entry;",
	]), INDENT + "}");

	for (const entry of routedEntries(s.resolved)) {
		const fn = symbol(s.plan.branchFns, entry.nodeId);
		const asserts = entry.conditional.branches.map((b) =>
			"assert!(matches!(" + fn + "(" + rustString(b.label) + "), Ok(" + stepFor(s, b.target) + ")));");
		asserts.push("assert!(matches!(" + fn + "(" + rustString(undeclaredLabel(entry)) + "), Err(GraphError::Dispatch { .. })));");
		lines.push("", INDENT + "#[test]", INDENT + "fn " + fn + "_routes_declared_labels() {", ...body(asserts), INDENT + "}");
	}

	lines.push("}");
	return lines.join("\n");
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Emit a Rust module for a resolved graph. Never fails on a graph that
 * `resolve` accepted.
 *
 * @param types - field name -> mapped static type, from `mapStateSchema`
 */
export function emitRust(
	graph: GraphInfo,
	resolved: ResolvedGraph,
	types: ReadonlyMap<string, StaticType>,
	options: EmitOptions = {},
): SourceArtifact {
	const plan = planSymbols(graph, resolved, RUST_SEED, options);
	const diagnostics: DefaultIgnoredDiagnostic[] = [];
	const s: EmitState = {
		graph,
		resolved,
		plan,
		fields: planFields(graph, types, plan, diagnostics),
		diagnostics,
	};

	return {
		target: "rust",
		moduleName: options.moduleName ?? defaultModuleName(graph),
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
