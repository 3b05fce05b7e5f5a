// SPDX-License-Identifier: MIT
// Topology Resolver
// Turns the edge set of a GraphInfo into a dispatch plan: effective
// transitions per node, reachable order, loop-back edges and warnings.

import {
	GraphError,
	deadEdge,
	implicitTerminal,
	unreachableNode,
	type DeadEdgeDiagnostic,
	type ImplicitTerminalDiagnostic,
	type UnreachableNodeDiagnostic,
} from "../errors.js";
import {
	TERMINAL,
	freezeValue,
	isTerminal,
	nodeIds,
	type ConditionalEdgeSpec,
	type GraphInfo,
	type NodeTarget,
} from "../types.js";

//==============================================================================
// Resolved Graph
//==============================================================================

export interface BranchTarget {
	label: string;
	target: NodeTarget;
	/** Target is already on the active path: the dispatch loop re-enters it. */
	loopBack: boolean;
}

export interface ConditionalDispatch {
	routerName: string;
	branches: readonly BranchTarget[];
}

/**
 * One row of the dispatch table. A row with neither `unconditionalNext` nor
 * `conditional` ends the run after its node.
 */
export interface DispatchEntry {
	nodeId: string;
	unconditionalNext?: NodeTarget | undefined;
	conditional?: ConditionalDispatch | undefined;
	/** `unconditionalNext` is a loop-back edge */
	loopBack: boolean;
}

export interface LoopBackEdge {
	from: string;
	to: string;
	/** Branch label when the edge belongs to a router */
	label?: string | undefined;
}

export type TopologyDiagnostic =
	| UnreachableNodeDiagnostic
	| DeadEdgeDiagnostic
	| ImplicitTerminalDiagnostic;

export interface ResolvedGraph {
	entryPoint: string;
	/** Reachable node ids in breadth-first order from the entry point */
	order: readonly string[];
	dispatch: ReadonlyMap<string, DispatchEntry>;
	loopBackEdges: readonly LoopBackEdge[];
	/** Declared but unreachable node ids, in declaration order */
	unreachable: readonly string[];
	diagnostics: readonly TopologyDiagnostic[];
}

export const DEFAULT_MAX_NODES = 10_000;
export const DEFAULT_MAX_EDGES = 50_000;

export interface ResolveOptions {
	maxNodes?: number | undefined;
	/** Counts unconditional edges plus every conditional branch */
	maxEdges?: number | undefined;
}

//==============================================================================
// Transitions
//==============================================================================

interface Transition {
	label?: string | undefined;
	target: NodeTarget;
}

interface NodeTransitions {
	conditional?: ConditionalEdgeSpec | undefined;
	transitions: Transition[];
}

function checkLimits(graph: GraphInfo, options: ResolveOptions): void {
	const maxNodes = options.maxNodes ?? DEFAULT_MAX_NODES;
	const maxEdges = options.maxEdges ?? DEFAULT_MAX_EDGES;
	if (graph.nodes.length > maxNodes) {
		throw GraphError.graphTooLarge("nodes", graph.nodes.length, maxNodes);
	}
	let edgeCount = graph.edges.length;
	for (const cond of graph.conditionalEdges) edgeCount += cond.mapping.size;
	if (edgeCount > maxEdges) {
		throw GraphError.graphTooLarge("edges", edgeCount, maxEdges);
	}
}

function checkReferences(graph: GraphInfo, declared: ReadonlySet<string>): void {
	const check = (from: string, to: NodeTarget): void => {
		if (!declared.has(from)) throw GraphError.danglingEdge(from, to, from);
		if (!isTerminal(to) && !declared.has(to)) throw GraphError.danglingEdge(from, to, to);
	};
	for (const edge of graph.edges) check(edge.from, edge.to);
	for (const cond of graph.conditionalEdges) {
		for (const target of cond.mapping.values()) check(cond.from, target);
	}
	if (!declared.has(graph.entryPoint)) {
		throw GraphError.unknownEntryPoint(graph.entryPoint);
	}
}

/**
 * Effective transitions per node. The first conditional edge of a node wins
 * over everything else; otherwise its first unconditional edge does.
 */
function effectiveTransitions(
	graph: GraphInfo,
	dead: DeadEdgeDiagnostic[],
): Map<string, NodeTransitions> {
	const table = new Map<string, NodeTransitions>();

	for (const cond of graph.conditionalEdges) {
		if (table.has(cond.from)) {
			dead.push(deadEdge(cond.from, cond.routerName, "duplicate-conditional"));
			continue;
		}
		const transitions = [...cond.mapping].map(([label, target]) => ({ label, target }));
		table.set(cond.from, { conditional: cond, transitions });
	}

	for (const edge of graph.edges) {
		const existing = table.get(edge.from);
		if (existing?.conditional !== undefined) {
			dead.push(deadEdge(edge.from, edge.to, "shadowed-by-conditional"));
		} else if (existing !== undefined) {
			dead.push(deadEdge(edge.from, edge.to, "duplicate-unconditional"));
		} else {
			table.set(edge.from, { transitions: [{ target: edge.to }] });
		}
	}

	return table;
}

function transitionsOf(table: ReadonlyMap<string, NodeTransitions>, id: string): Transition[] {
	return table.get(id)?.transitions ?? [];
}

//==============================================================================
// Traversal
//==============================================================================

function breadthFirst(table: ReadonlyMap<string, NodeTransitions>, entry: string): string[] {
	const order = [entry];
	const seen = new Set(order);
	for (let i = 0; i < order.length; i++) {
		const current = order[i];
		if (current === undefined) break;
		for (const { target } of transitionsOf(table, current)) {
			if (isTerminal(target) || seen.has(target)) continue;
			seen.add(target);
			order.push(target);
		}
	}
	return order;
}

/**
 * Iterative depth-first search with in-progress marking. A transition into a
 * node that is still in progress closes a cycle and is a loop-back edge.
 */
function findLoopBacks(table: ReadonlyMap<string, NodeTransitions>, entry: string): Set<Transition> {
	const loopBacks = new Set<Transition>();
	const done = new Set<string>();
	const inProgress = new Set<string>([entry]);
	const stack: { node: string; next: number }[] = [{ node: entry, next: 0 }];

	while (stack.length > 0) {
		const frame = stack[stack.length - 1];
		if (frame === undefined) break;
		const transition = transitionsOf(table, frame.node)[frame.next];
		if (transition === undefined) {
			stack.pop();
			inProgress.delete(frame.node);
			done.add(frame.node);
			continue;
		}
		frame.next++;
		const { target } = transition;
		if (isTerminal(target) || done.has(target)) continue;
		if (inProgress.has(target)) {
			loopBacks.add(transition);
			continue;
		}
		inProgress.add(target);
		stack.push({ node: target, next: 0 });
	}

	return loopBacks;
}

function reachesExit(table: ReadonlyMap<string, NodeTransitions>, order: readonly string[]): boolean {
	return order.some((id) => {
		const transitions = transitionsOf(table, id);
		return transitions.length === 0 || transitions.some((t) => t.target === TERMINAL);
	});
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Resolve a graph into its dispatch plan.
 *
 * @throws GraphError `GraphTooLarge`, `DanglingEdge`, `UnknownEntryPoint` or
 * `UnreachableEntry`
 */
export function resolve(graph: GraphInfo, options: ResolveOptions = {}): ResolvedGraph {
	checkLimits(graph, options);
	const declared = nodeIds(graph);
	checkReferences(graph, declared);

	const entry = graph.entryPoint;
	const dead: DeadEdgeDiagnostic[] = [];
	const table = effectiveTransitions(graph, dead);

	if (transitionsOf(table, entry).length === 0) {
		throw GraphError.unreachableEntry(entry, "has no outgoing transition");
	}

	const order = breadthFirst(table, entry);
	if (!reachesExit(table, order)) {
		throw GraphError.unreachableEntry(entry, "never reaches a terminal node");
	}

	const reached = new Set(order);
	const unreachable = graph.nodes.map((n) => n.id).filter((id) => !reached.has(id));
	const loopBackSet = findLoopBacks(table, entry);

	const loopBackEdges: LoopBackEdge[] = [];
	const dispatch = new Map<string, DispatchEntry>();
	const implicit: ImplicitTerminalDiagnostic[] = [];

	for (const id of order) {
		const row = table.get(id);
		for (const t of row?.transitions ?? []) {
			if (!loopBackSet.has(t)) continue;
			loopBackEdges.push(t.label === undefined ? { from: id, to: t.target } : { from: id, to: t.target, label: t.label });
		}

		if (row?.conditional !== undefined) {
			dispatch.set(id, freezeValue({
				nodeId: id,
				conditional: {
					routerName: row.conditional.routerName,
					branches: row.transitions.map((t) => ({
						label: t.label ?? "",
						target: t.target,
						loopBack: loopBackSet.has(t),
					})),
				},
				loopBack: false,
			}));
			continue;
		}

		const next = row?.transitions[0];
		if (next === undefined) {
			implicit.push(implicitTerminal(id));
			dispatch.set(id, freezeValue({ nodeId: id, loopBack: false }));
		} else {
			dispatch.set(id, freezeValue({ nodeId: id, unconditionalNext: next.target, loopBack: loopBackSet.has(next) }));
		}
	}

	const diagnostics: TopologyDiagnostic[] = [
		...dead,
		...unreachable.map((id) => unreachableNode(id, entry)),
		...implicit,
	];

	return freezeValue({
		entryPoint: entry,
		order,
		dispatch,
		loopBackEdges,
		unreachable,
		diagnostics,
	});
}
