// Graph IR Validator
// Semantic checks on a GraphInfo that the type system cannot express.
// Reference integrity (dangling edges, unknown entry) belongs to the
// topology resolver, which reports it with dedicated error codes.

import {
	GraphError,
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import { START, TERMINAL_ALIASES, type GraphInfo } from "./types.js";

//==============================================================================
// Validation State
//==============================================================================

interface ValidationState {
	errors: ValidationError[];
	path: string[];
}

function pushPath(state: ValidationState, segment: string): void {
	state.path.push(segment);
}

function popPath(state: ValidationState): void {
	state.path.pop();
}

function currentPath(state: ValidationState): string {
	return state.path.length > 0 ? state.path.join(".") : "$";
}

function addError(
	state: ValidationState,
	message: string,
	value?: unknown,
): void {
	const error: ValidationError = { path: currentPath(state), message };
	if (value !== undefined) error.value = value;
	state.errors.push(error);
}

//==============================================================================
// Checks
//==============================================================================

function isReservedId(id: string): boolean {
	return id === START || TERMINAL_ALIASES.has(id);
}

function checkNodeIds(state: ValidationState, graph: GraphInfo): void {
	const seen = new Set<string>();
	graph.nodes.forEach((node, i) => {
		pushPath(state, "nodes[" + String(i) + "].id");
		if (node.id === "") {
			addError(state, "Node id must not be empty");
		} else if (isReservedId(node.id)) {
			addError(state, "Node id is a reserved marker: " + node.id, node.id);
		} else if (seen.has(node.id)) {
			addError(state, "Duplicate node id: " + node.id, node.id);
		}
		seen.add(node.id);
		popPath(state);
	});
}

function checkEntryPoint(state: ValidationState, graph: GraphInfo): void {
	if (graph.entryPoint === "" || graph.entryPoint === START) {
		pushPath(state, "entryPoint");
		addError(state, "Graph has no entry point", graph.entryPoint);
		popPath(state);
	}
}

function checkConditionalEdges(state: ValidationState, graph: GraphInfo): void {
	graph.conditionalEdges.forEach((edge, i) => {
		pushPath(state, "conditionalEdges[" + String(i) + "]");
		if (edge.mapping.size === 0) {
			addError(state, "Conditional edge from " + edge.from + " has no branches");
		}
		if (edge.routerName === "") {
			addError(state, "Conditional edge from " + edge.from + " has no router name");
		}
		popPath(state);
	});
}

function checkStateFields(state: ValidationState, graph: GraphInfo): void {
	const seen = new Set<string>();
	graph.stateSchema.fields.forEach((field, i) => {
		pushPath(state, "stateSchema.fields[" + String(i) + "].name");
		if (field.name === "") {
			addError(state, "Field name must not be empty");
		} else if (seen.has(field.name)) {
			addError(state, "Duplicate field name: " + field.name, field.name);
		}
		seen.add(field.name);
		popPath(state);
	});
}

//==============================================================================
// Public Validators
//==============================================================================

export function validateGraph(graph: GraphInfo): ValidationResult<GraphInfo> {
	const state: ValidationState = { errors: [], path: [] };

	checkNodeIds(state, graph);
	checkEntryPoint(state, graph);
	checkConditionalEdges(state, graph);
	checkStateFields(state, graph);

	if (state.errors.length > 0) {
		return invalidResult<GraphInfo>(state.errors);
	}
	return validResult(graph);
}

/**
 * @throws GraphError with code `InvalidGraph`
 */
export function assertValidGraph(graph: GraphInfo): void {
	const result = validateGraph(graph);
	if (!result.valid) {
		throw GraphError.invalidGraph(result.errors);
	}
}
