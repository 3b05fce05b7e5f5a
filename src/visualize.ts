// Graph Visualization
// Mermaid flowchart and Graphviz DOT renderings of a GraphInfo as declared:
// every edge is drawn, including ones the resolver reports as dead.

import { SymbolTable } from "./identifiers/sanitize.js";
import { TERMINAL, isTerminal, type GraphInfo, type NodeTarget } from "./types.js";

//==============================================================================
// Mermaid
//==============================================================================

const MERMAID_START = "START";
const MERMAID_END = "END";

function mermaidText(text: string): string {
	return text.replace(/"/g, "#quot;").replace(/\s+/g, " ");
}

/**
 * Render a `graph TD` flowchart. Node ids are sanitized and prefixed, so
 * names such as `end` cannot clash with Mermaid keywords.
 */
export function toMermaid(graph: GraphInfo): string {
	const ids = new SymbolTable([MERMAID_START, MERMAID_END]);
	const idOf = (target: NodeTarget): string =>
		isTerminal(target) ? MERMAID_END : ids.symbolFor("n_" + target);

	const lines = ["graph TD"];
	lines.push("    " + MERMAID_START + "([\"start\"])");
	for (const node of graph.nodes) {
		lines.push("    " + idOf(node.id) + "[\"" + mermaidText(node.id) + "\"]");
	}
	const usesEnd = graph.edges.some((e) => isTerminal(e.to))
		|| graph.conditionalEdges.some((c) => [...c.mapping.values()].some(isTerminal));
	if (usesEnd) lines.push("    " + MERMAID_END + "([\"end\"])");

	lines.push("    " + MERMAID_START + " --> " + idOf(graph.entryPoint));
	for (const edge of graph.edges) {
		lines.push("    " + idOf(edge.from) + " --> " + idOf(edge.to));
	}
	for (const cond of graph.conditionalEdges) {
		for (const [label, target] of cond.mapping) {
			lines.push("    " + idOf(cond.from) + " -.->|\"" + mermaidText(label) + "\"| " + idOf(target));
		}
	}
	return lines.join("\n") + "\n";
}

//==============================================================================
// DOT
//==============================================================================

function dotString(text: string): string {
	return "\"" + text.replace(/\\/g, "\\\\").replace(/"/g, "\\\"").replace(/\n/g, "\\n") + "\"";
}

export function toDot(graph: GraphInfo): string {
	const lines = ["digraph " + dotString(graph.name ?? "graph") + " {"];
	lines.push("    rankdir=TB;");
	for (const node of graph.nodes) {
		const shape = node.id === graph.entryPoint ? " [shape=box, peripheries=2]" : " [shape=box]";
		lines.push("    " + dotString(node.id) + shape + ";");
	}
	const targets = [...graph.edges.map((e) => e.to), ...graph.conditionalEdges.flatMap((c) => [...c.mapping.values()])];
	if (targets.some(isTerminal)) {
		lines.push("    " + dotString(TERMINAL) + " [shape=doublecircle, label=\"end\"];");
	}
	for (const edge of graph.edges) {
		lines.push("    " + dotString(edge.from) + " -> " + dotString(edge.to) + ";");
	}
	for (const cond of graph.conditionalEdges) {
		for (const [label, target] of cond.mapping) {
			lines.push("    " + dotString(cond.from) + " -> " + dotString(target)
				+ " [label=" + dotString(label) + ", style=dashed];");
		}
	}
	lines.push("}");
	return lines.join("\n") + "\n";
}
