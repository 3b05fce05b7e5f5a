// Type Mapper
// Converts observed dynamic type descriptors into canonical static types.
// Total by construction: shapes with no precise static form degrade to the
// dynamic-value type and leave a diagnostic behind instead of failing.

import {
	opaqueFallback,
	exhaustive,
	type OpaqueFallbackDiagnostic,
} from "./errors.js";
import {
	formatDescriptor,
	type DynamicTypeDescriptor,
	type FieldSpec,
	type StateSchema,
} from "./types.js";

//==============================================================================
// Static Type Domain
//==============================================================================

export interface TextType { kind: "text" }
export interface Int64Type { kind: "int64" }
export interface Float64Type { kind: "float64" }
export interface BoolType { kind: "bool" }
export interface SequenceType { kind: "sequence"; element: StaticType }
export interface DictionaryType { kind: "dictionary"; key: StaticType; value: StaticType }
export interface NullableType { kind: "nullable"; inner: StaticType }
/** Self-describing JSON-like value */
export interface DynamicType { kind: "dynamic" }
/** Target type named by a configured override, emitted verbatim */
export interface CustomType { kind: "custom"; name: string }

export type StaticType =
	| TextType | Int64Type | Float64Type | BoolType
	| SequenceType | DictionaryType | NullableType
	| DynamicType | CustomType;

export const textType = (): TextType => ({ kind: "text" });
export const int64Type = (): Int64Type => ({ kind: "int64" });
export const float64Type = (): Float64Type => ({ kind: "float64" });
export const boolType = (): BoolType => ({ kind: "bool" });
export const dynamicType = (): DynamicType => ({ kind: "dynamic" });

export const sequenceType = (element: StaticType): SequenceType => ({ kind: "sequence", element });

export const dictionaryType = (key: StaticType, value: StaticType): DictionaryType => ({
	kind: "dictionary",
	key,
	value,
});

export function nullableType(inner: StaticType): NullableType {
	return inner.kind === "nullable" ? inner : { kind: "nullable", inner };
}

export const customType = (name: string): CustomType => ({ kind: "custom", name });

//==============================================================================
// Options
//==============================================================================

export interface TypeMapOptions {
	/** Opaque hint -> target type name, e.g. `{ UserId: "UserId" }` */
	customTypes?: Readonly<Record<string, string>> | undefined;
}

interface MapContext {
	field: string;
	customTypes: Readonly<Record<string, string>>;
	notes: OpaqueFallbackDiagnostic[];
}

//==============================================================================
// Mapping
//==============================================================================

const HASHABLE_KEY_KINDS: ReadonlySet<StaticType["kind"]> = new Set([
	"text", "int64", "bool", "custom",
]);

/** Keys must hash and totally order in every target (f64 does neither in Rust). */
export function isHashableKey(t: StaticType): boolean {
	return HASHABLE_KEY_KINDS.has(t.kind);
}

function mapPrimitive(d: DynamicTypeDescriptor & { kind: "primitive" }): StaticType {
	switch (d.primitive) {
	case "string": return textType();
	case "integer": return int64Type();
	case "float": return float64Type();
	case "bool": return boolType();
	default: return exhaustive(d.primitive);
	}
}

function mapOpaque(
	ctx: MapContext,
	d: DynamicTypeDescriptor & { kind: "opaque" },
	path: string,
): StaticType {
	if (d.hint !== undefined) {
		const custom = ctx.customTypes[d.hint];
		if (custom !== undefined) return customType(custom);
	}
	ctx.notes.push(opaqueFallback(ctx.field, path, "opaque", formatDescriptor(d)));
	return dynamicType();
}

function mapMapping(
	ctx: MapContext,
	d: DynamicTypeDescriptor & { kind: "mapping" },
	path: string,
): StaticType {
	// key notes are dropped: an unusable key degrades the whole mapping once
	const keyCtx: MapContext = { ...ctx, notes: [] };
	const key = mapDescriptor(keyCtx, d.key, path + ".key");
	if (!isHashableKey(key)) {
		ctx.notes.push(opaqueFallback(ctx.field, path, "unhashable-key", formatDescriptor(d.key)));
		return dynamicType();
	}
	ctx.notes.push(...keyCtx.notes);
	return dictionaryType(key, mapDescriptor(ctx, d.value, path + ".value"));
}

function mapDescriptor(ctx: MapContext, d: DynamicTypeDescriptor, path: string): StaticType {
	switch (d.kind) {
	case "primitive":
		return mapPrimitive(d);
	case "collection":
		return sequenceType(mapDescriptor(ctx, d.element, path + "[]"));
	case "mapping":
		return mapMapping(ctx, d, path);
	case "optional":
		return nullableType(mapDescriptor(ctx, d.inner, path));
	case "opaque":
		return mapOpaque(ctx, d, path);
	default:
		return exhaustive(d);
	}
}

/**
 * Map one descriptor to its static type. Pure: fallback diagnostics are only
 * collected by `mapField` / `mapStateSchema`.
 */
export function mapType(d: DynamicTypeDescriptor, options: TypeMapOptions = {}): StaticType {
	const ctx: MapContext = { field: "", customTypes: options.customTypes ?? {}, notes: [] };
	return mapDescriptor(ctx, d, "$");
}

export interface FieldTypeMapping {
	type: StaticType;
	diagnostics: OpaqueFallbackDiagnostic[];
}

/**
 * Map a state field. Optional fields become nullable unless the descriptor
 * already is.
 */
export function mapField(field: FieldSpec, options: TypeMapOptions = {}): FieldTypeMapping {
	const ctx: MapContext = { field: field.name, customTypes: options.customTypes ?? {}, notes: [] };
	const mapped = mapDescriptor(ctx, field.dynamicType, field.name);
	return {
		type: field.optional ? nullableType(mapped) : mapped,
		diagnostics: ctx.notes,
	};
}

export interface SchemaTypeMapping {
	/** field name -> static type, in schema order */
	fields: ReadonlyMap<string, StaticType>;
	diagnostics: OpaqueFallbackDiagnostic[];
}

export function mapStateSchema(schema: StateSchema, options: TypeMapOptions = {}): SchemaTypeMapping {
	const fields = new Map<string, StaticType>();
	const diagnostics: OpaqueFallbackDiagnostic[] = [];
	for (const field of schema.fields) {
		const mapped = mapField(field, options);
		fields.set(field.name, mapped.type);
		diagnostics.push(...mapped.diagnostics);
	}
	return { fields, diagnostics };
}

//==============================================================================
// Inspection
//==============================================================================

function children(t: StaticType): StaticType[] {
	switch (t.kind) {
	case "sequence": return [t.element];
	case "dictionary": return [t.key, t.value];
	case "nullable": return [t.inner];
	default: return [];
	}
}

/** Whether `kind` occurs anywhere inside `t`. */
export function usesKind(t: StaticType, kind: StaticType["kind"]): boolean {
	return t.kind === kind || children(t).some((c) => usesKind(c, kind));
}

/** Language-neutral rendering, for messages and comments. */
export function formatStaticType(t: StaticType): string {
	switch (t.kind) {
	case "text": return "text";
	case "int64": return "int64";
	case "float64": return "float64";
	case "bool": return "bool";
	case "dynamic": return "dynamic";
	case "custom": return "custom(" + t.name + ")";
	case "sequence": return "sequence<" + formatStaticType(t.element) + ">";
	case "dictionary": return "dictionary<" + formatStaticType(t.key) + ", " + formatStaticType(t.value) + ">";
	case "nullable": return "nullable<" + formatStaticType(t.inner) + ">";
	default: return exhaustive(t);
	}
}
