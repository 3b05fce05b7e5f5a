// Graph IR Type Definitions
// Language-neutral description of an introspected workflow graph:
// nodes, edges, conditional routers and the loosely typed state schema.

//==============================================================================
// Reserved Markers
//==============================================================================

/** Edge target that ends a run. */
export const TERMINAL = "__end__";

/** Pseudo-node some introspectors use as the source of the entry edge. */
export const START = "__start__";

/** Spellings of the terminal marker accepted from introspected documents. */
export const TERMINAL_ALIASES: ReadonlySet<string> = new Set([TERMINAL, "END"]);

/** Node id or the terminal marker */
export type NodeTarget = string;

export function isTerminal(target: NodeTarget): boolean {
	return target === TERMINAL;
}

//==============================================================================
// JSON Values (schema defaults)
//==============================================================================

export type JsonValue =
	| null
	| boolean
	| number
	| string
	| JsonValue[]
	| { [key: string]: JsonValue };

//==============================================================================
// Dynamic Type Domain (observed, loosely typed)
//==============================================================================

export type PrimitiveKind = "string" | "integer" | "float" | "bool";

export interface PrimitiveDescriptor {
	kind: "primitive";
	primitive: PrimitiveKind;
}

export interface CollectionDescriptor {
	kind: "collection";
	element: DynamicTypeDescriptor;
}

export interface MappingDescriptor {
	kind: "mapping";
	key: DynamicTypeDescriptor;
	value: DynamicTypeDescriptor;
}

export interface OptionalDescriptor {
	kind: "optional";
	inner: DynamicTypeDescriptor;
}

/** Shape that could not be characterized; `hint` keeps the original annotation text. */
export interface OpaqueDescriptor {
	kind: "opaque";
	hint?: string | undefined;
}

export type DynamicTypeDescriptor =
	| PrimitiveDescriptor
	| CollectionDescriptor
	| MappingDescriptor
	| OptionalDescriptor
	| OpaqueDescriptor;

//==============================================================================
// Graph Domain
//==============================================================================

export interface NodeSpec {
	id: string;
	displayName: string;
	doc?: string | undefined;
	sourceLocation?: string | undefined;
}

export interface EdgeSpec {
	from: string;
	to: NodeTarget;
}

export interface ConditionalEdgeSpec {
	from: string;
	routerName: string;
	/** label -> target, in declaration order */
	mapping: ReadonlyMap<string, NodeTarget>;
}

export interface FieldSpec {
	name: string;
	dynamicType: DynamicTypeDescriptor;
	optional: boolean;
	defaultValue?: JsonValue | undefined;
}

export interface StateSchema {
	/** Name of the generated state type; `GraphState` when absent */
	name?: string | undefined;
	fields: readonly FieldSpec[];
}

export interface GraphInfo {
	name?: string | undefined;
	nodes: readonly NodeSpec[];
	edges: readonly EdgeSpec[];
	conditionalEdges: readonly ConditionalEdgeSpec[];
	stateSchema: StateSchema;
	entryPoint: string;
}

//==============================================================================
// Descriptor Constructors
//==============================================================================

export const stringDesc = (): PrimitiveDescriptor => ({ kind: "primitive", primitive: "string" });
export const integerDesc = (): PrimitiveDescriptor => ({ kind: "primitive", primitive: "integer" });
export const floatDesc = (): PrimitiveDescriptor => ({ kind: "primitive", primitive: "float" });
export const boolDesc = (): PrimitiveDescriptor => ({ kind: "primitive", primitive: "bool" });

export const collectionDesc = (element: DynamicTypeDescriptor): CollectionDescriptor => ({
	kind: "collection",
	element,
});

export const mappingDesc = (
	key: DynamicTypeDescriptor,
	value: DynamicTypeDescriptor,
): MappingDescriptor => ({ kind: "mapping", key, value });

export const optionalDesc = (inner: DynamicTypeDescriptor): OptionalDescriptor => ({
	kind: "optional",
	inner,
});

export function opaqueDesc(hint?: string): OpaqueDescriptor {
	return hint === undefined ? { kind: "opaque" } : { kind: "opaque", hint };
}

//==============================================================================
// Graph Constructors
//==============================================================================

export function conditionalEdge(
	from: string,
	routerName: string,
	branches: Iterable<readonly [string, NodeTarget]>,
): ConditionalEdgeSpec {
	return { from, routerName, mapping: new Map(branches) };
}

/**
 * Recursively freeze plain objects and arrays. Maps are left as-is; the
 * graph types only expose them as ReadonlyMap.
 */
function deepFreeze<T>(value: T): T {
	if (value === null || typeof value !== "object" || value instanceof Map) {
		return value;
	}
	for (const child of Object.values(value)) {
		deepFreeze(child);
	}
	Object.freeze(value);
	return value;
}

/**
 * Build an immutable GraphInfo. Callers hand over ownership of the arrays;
 * they are frozen in place.
 */
export function graphInfo(init: GraphInfo): Readonly<GraphInfo> {
	return deepFreeze({
		...init,
		nodes: [...init.nodes],
		edges: [...init.edges],
		conditionalEdges: [...init.conditionalEdges],
		stateSchema: { ...init.stateSchema, fields: [...init.stateSchema.fields] },
	});
}

export function freezeValue<T>(value: T): T {
	return deepFreeze(value);
}

//==============================================================================
// Lookups
//==============================================================================

export function nodeIds(graph: GraphInfo): Set<string> {
	return new Set(graph.nodes.map((n) => n.id));
}

export function findNode(graph: GraphInfo, id: string): NodeSpec | undefined {
	return graph.nodes.find((n) => n.id === id);
}

export function stateTypeName(graph: GraphInfo): string {
	return graph.stateSchema.name ?? "GraphState";
}

/** Render a descriptor the way an annotation would be written, for messages. */
export function formatDescriptor(d: DynamicTypeDescriptor): string {
	switch (d.kind) {
	case "primitive":
		return d.primitive;
	case "collection":
		return "collection<" + formatDescriptor(d.element) + ">";
	case "mapping":
		return "mapping<" + formatDescriptor(d.key) + ", " + formatDescriptor(d.value) + ">";
	case "optional":
		return "optional<" + formatDescriptor(d.inner) + ">";
	case "opaque":
		return d.hint === undefined ? "opaque" : "opaque(" + d.hint + ")";
	}
}
