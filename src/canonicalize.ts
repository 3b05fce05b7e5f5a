// Graph Canonicalization (JCS)
// RFC 8785 canonical JSON of a GraphInfo and the content digest derived from
// it. Two graphs with the same digest convert to byte-identical artifacts.

import { createHash, type Hash } from "node:crypto";
import type {
	DynamicTypeDescriptor,
	FieldSpec,
	GraphInfo,
	JsonValue,
	NodeSpec,
} from "./types.js";

//==============================================================================
// JCS Serialization (RFC 8785)
//==============================================================================

/** Serialize a number per RFC 8785 / ECMAScript Number.toString(). */
function jcsNumber(value: number): string {
	if (!Number.isFinite(value)) {
		throw new Error(`JCS: non-finite number ${value} cannot be serialized`);
	}
	if (Object.is(value, -0)) return "0";
	return JSON.stringify(value);
}

/** Serialize an object with keys sorted by UTF-16 code unit comparison. */
function jcsObject(obj: { [key: string]: JsonValue }): string {
	const keys = Object.keys(obj).sort();
	const entries: string[] = [];
	for (const key of keys) {
		const val = obj[key];
		if (val === undefined) continue;
		entries.push(JSON.stringify(key) + ":" + canonicalize(val));
	}
	return "{" + entries.join(",") + "}";
}

/**
 * Serialize a JSON value to its RFC 8785 canonical form.
 *
 * - Objects: keys sorted by UTF-16 code unit lexicographic order
 * - Arrays: element order preserved
 * - Numbers: ECMAScript Number.toString()
 * - No whitespace between tokens
 */
export function canonicalize(value: JsonValue): string {
	if (value === null) return "null";
	if (typeof value === "boolean") return value ? "true" : "false";
	if (typeof value === "number") return jcsNumber(value);
	if (typeof value === "string") return JSON.stringify(value);
	if (Array.isArray(value)) return "[" + value.map(canonicalize).join(",") + "]";
	return jcsObject(value);
}

//==============================================================================
// GraphInfo -> JSON
//==============================================================================

function withOptional(
	base: { [key: string]: JsonValue },
	extra: { [key: string]: JsonValue | undefined },
): { [key: string]: JsonValue } {
	for (const [key, val] of Object.entries(extra)) {
		if (val !== undefined) base[key] = val;
	}
	return base;
}

function descriptorToJson(d: DynamicTypeDescriptor): JsonValue {
	switch (d.kind) {
	case "primitive": return { kind: d.kind, primitive: d.primitive };
	case "collection": return { kind: d.kind, element: descriptorToJson(d.element) };
	case "mapping": return { kind: d.kind, key: descriptorToJson(d.key), value: descriptorToJson(d.value) };
	case "optional": return { kind: d.kind, inner: descriptorToJson(d.inner) };
	case "opaque": return withOptional({ kind: d.kind }, { hint: d.hint });
	}
}

function nodeToJson(n: NodeSpec): JsonValue {
	return withOptional(
		{ id: n.id, displayName: n.displayName },
		{ doc: n.doc, sourceLocation: n.sourceLocation },
	);
}

function fieldToJson(f: FieldSpec): JsonValue {
	return withOptional(
		{ name: f.name, dynamicType: descriptorToJson(f.dynamicType), optional: f.optional },
		{ defaultValue: f.defaultValue },
	);
}

/**
 * Plain JSON form of a graph. Branch tables become label/target arrays so
 * their declaration order survives key sorting.
 */
export function graphToJson(graph: GraphInfo): JsonValue {
	return withOptional(
		{
			nodes: graph.nodes.map(nodeToJson),
			edges: graph.edges.map((e) => ({ from: e.from, to: e.to })),
			conditionalEdges: graph.conditionalEdges.map((c) => ({
				from: c.from,
				routerName: c.routerName,
				branches: [...c.mapping].map(([label, target]) => ({ label, target })),
			})),
			stateSchema: withOptional(
				{ fields: graph.stateSchema.fields.map(fieldToJson) },
				{ name: graph.stateSchema.name },
			),
			entryPoint: graph.entryPoint,
		},
		{ name: graph.name },
	);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Compute the content digest of a graph.
 *
 * @param algorithm - Hash algorithm (default: "sha256")
 * @returns Digest string in the format `{algorithm}:{hex}`
 */
export function graphDigest(graph: GraphInfo, algorithm = "sha256"): string {
	const hash: Hash = createHash(algorithm);
	hash.update(canonicalize(graphToJson(graph)), "utf8");
	return `${algorithm}:${hash.digest("hex")}`;
}
