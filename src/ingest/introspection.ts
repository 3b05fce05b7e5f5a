// Introspection Document Ingest
// Converts the JSON document written by a graph introspector into GraphInfo.
// Two phases, like every validator here: zod for structure, then the
// semantic IR checks of validateGraph.

import {
	GraphError,
	invalidResult,
	type ValidationResult,
} from "../errors.js";
import {
	START,
	TERMINAL,
	TERMINAL_ALIASES,
	graphInfo,
	type ConditionalEdgeSpec,
	type EdgeSpec,
	type FieldSpec,
	type GraphInfo,
	type NodeSpec,
	type NodeTarget,
} from "../types.js";
import { validateGraph } from "../validator.js";
import {
	IntrospectedGraphSchema,
	zodToValidationErrors,
	type IntrospectedEdge,
	type IntrospectedField,
	type IntrospectedGraph,
	type IntrospectedNode,
} from "../zod-schemas.js";
import { parseTypeAnnotation } from "./type-annotation.js";

//==============================================================================
// Normalization
//==============================================================================

function normalizeTarget(target: string): NodeTarget {
	return TERMINAL_ALIASES.has(target) ? TERMINAL : target;
}

function isPseudoNode(name: string): boolean {
	return name === START || TERMINAL_ALIASES.has(name);
}

function toNodeSpec(node: IntrospectedNode): NodeSpec {
	const spec: NodeSpec = { id: node.name, displayName: node.func_name ?? node.name };
	if (node.docstring !== undefined && node.docstring !== null) spec.doc = node.docstring;
	if (node.source_hint !== undefined && node.source_hint !== null) spec.sourceLocation = node.source_hint;
	return spec;
}

function toFieldSpec(field: IntrospectedField): FieldSpec {
	const spec: FieldSpec = {
		name: field.name,
		dynamicType: parseTypeAnnotation(field.type_name),
		optional: field.is_optional,
	};
	// null is how the introspector spells "no default"
	if (field.default_value !== undefined && field.default_value !== null) {
		spec.defaultValue = field.default_value;
	}
	return spec;
}

/**
 * The explicit entry point wins; otherwise the first edge leaving the start
 * pseudo-node names it. Falls back to START, which validation then rejects.
 */
function resolveEntryPoint(doc: IntrospectedGraph): string {
	if (doc.entry_point !== undefined && doc.entry_point !== "" && doc.entry_point !== START) {
		return doc.entry_point;
	}
	const startEdge = doc.edges.find((e) => e.from === START);
	return startEdge?.to ?? START;
}

function keepEdge(edge: IntrospectedEdge, routed: ReadonlySet<string>): boolean {
	if (edge.from === START) return false;
	// conditioned edges out of a routed node are the router's branches again
	const conditioned = edge.condition !== undefined && edge.condition !== null && edge.condition !== "";
	return !(conditioned && routed.has(edge.from));
}

function toGraphInfo(doc: IntrospectedGraph): GraphInfo {
	const routed = new Set(Object.keys(doc.conditional_edges));

	const nodes = doc.nodes.filter((n) => !isPseudoNode(n.name)).map(toNodeSpec);

	const edges: EdgeSpec[] = doc.edges
		.filter((e) => keepEdge(e, routed))
		.map((e) => ({ from: e.from, to: normalizeTarget(e.to) }));

	const conditionalEdges: ConditionalEdgeSpec[] = Object.entries(doc.conditional_edges).map(
		([from, cond]) => ({
			from,
			routerName: cond.condition_func,
			mapping: new Map(
				Object.entries(cond.branches).map(([label, target]) => [label, normalizeTarget(target)] as const),
			),
		}),
	);

	return graphInfo({
		name: doc.name,
		nodes,
		edges,
		conditionalEdges,
		stateSchema: {
			name: doc.state_schema.name,
			fields: doc.state_schema.fields.map(toFieldSpec),
		},
		entryPoint: resolveEntryPoint(doc),
	});
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Validate an already-parsed introspection document and convert it.
 */
export function validateIntrospectedGraph(doc: unknown): ValidationResult<GraphInfo> {
	const parsed = IntrospectedGraphSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<GraphInfo>(zodToValidationErrors(parsed.error));
	}
	return validateGraph(toGraphInfo(parsed.data));
}

/**
 * Parse an introspection document (JSON text or a parsed value) into an
 * immutable GraphInfo.
 *
 * @throws GraphError with code `InvalidGraph` when the document is malformed
 */
export function parseIntrospectedGraph(input: unknown): GraphInfo {
	let doc: unknown = input;
	if (typeof input === "string") {
		try {
			doc = JSON.parse(input);
		} catch (e) {
			const message = e instanceof Error ? e.message : String(e);
			throw GraphError.invalidGraph([{ path: "$", message: "Malformed JSON: " + message }]);
		}
	}
	const result = validateIntrospectedGraph(doc);
	if (!result.valid || result.value === undefined) {
		throw GraphError.invalidGraph(result.errors);
	}
	return result.value;
}
