// Type Annotation Ingest
// Parses the annotation strings an introspector records for state fields
// (`list[dict[str, int]]`, `Optional[str]`, `str | None`) into descriptors.
// Anything unrecognized becomes an opaque descriptor carrying the raw text.

import {
	boolDesc,
	collectionDesc,
	floatDesc,
	integerDesc,
	mappingDesc,
	opaqueDesc,
	optionalDesc,
	stringDesc,
	type DynamicTypeDescriptor,
} from "../types.js";

//==============================================================================
// Name Tables
//==============================================================================

const PRIMITIVES: Readonly<Record<string, () => DynamicTypeDescriptor>> = {
	str: stringDesc,
	int: integerDesc,
	float: floatDesc,
	bool: boolDesc,
};

const SEQUENCE_NAMES: ReadonlySet<string> = new Set([
	"list", "List", "Sequence", "MutableSequence", "Iterable",
	"set", "Set", "frozenset", "FrozenSet", "deque", "Deque",
]);

const MAPPING_NAMES: ReadonlySet<string> = new Set([
	"dict", "Dict", "Mapping", "MutableMapping", "OrderedDict", "defaultdict", "DefaultDict",
]);

const ANY_NAMES: ReadonlySet<string> = new Set(["Any", "any", "object"]);

const NONE_NAMES: ReadonlySet<string> = new Set(["None", "NoneType"]);

//==============================================================================
// Tokenizing Helpers
//==============================================================================

function stripModule(name: string): string {
	return name.replace(/^(typing|typing_extensions|collections)\./, "");
}

/** Split on `sep` at bracket depth zero; undefined when brackets don't balance. */
function splitTopLevel(text: string, sep: string): string[] | undefined {
	const parts: string[] = [];
	let depth = 0;
	let start = 0;
	for (let i = 0; i < text.length; i++) {
		const ch = text.charAt(i);
		if (ch === "[") depth++;
		else if (ch === "]") depth--;
		if (depth < 0) return undefined;
		if (ch === sep && depth === 0) {
			parts.push(text.slice(start, i).trim());
			start = i + 1;
		}
	}
	if (depth !== 0) return undefined;
	parts.push(text.slice(start).trim());
	return parts;
}

interface GenericForm {
	name: string;
	args: string[];
}

function parseGeneric(text: string): GenericForm | undefined {
	const open = text.indexOf("[");
	if (open <= 0 || !text.endsWith("]")) return undefined;
	const args = splitTopLevel(text.slice(open + 1, -1), ",");
	if (args === undefined) return undefined;
	return { name: stripModule(text.slice(0, open).trim()), args };
}

//==============================================================================
// Forms
//==============================================================================

function parseUnion(members: string[], raw: string): DynamicTypeDescriptor {
	const rest = members.filter((m) => !NONE_NAMES.has(m));
	if (rest.length === members.length) return opaqueDesc(raw);
	const only = rest[0];
	if (rest.length !== 1 || only === undefined) return opaqueDesc(raw);
	return optionalDesc(parseTypeAnnotation(only));
}

function literalKind(args: string[], raw: string): DynamicTypeDescriptor {
	if (args.every((a) => /^(["']).*\1$/.test(a))) return stringDesc();
	if (args.every((a) => /^-?\d+$/.test(a))) return integerDesc();
	if (args.every((a) => a === "True" || a === "False")) return boolDesc();
	return opaqueDesc(raw);
}

function parseMappingArgs(args: string[]): DynamicTypeDescriptor {
	const [key, value] = args;
	if (args.length !== 2 || key === undefined || value === undefined) {
		return mappingDesc(stringDesc(), opaqueDesc("Any"));
	}
	return mappingDesc(parseTypeAnnotation(key), parseTypeAnnotation(value));
}

function parseTuple(args: string[], raw: string): DynamicTypeDescriptor {
	const [element, ellipsis] = args;
	if (args.length === 2 && element !== undefined && ellipsis === "...") {
		return collectionDesc(parseTypeAnnotation(element));
	}
	return opaqueDesc(raw);
}

function parseGenericForm(form: GenericForm, raw: string): DynamicTypeDescriptor {
	const first = form.args[0];
	if (first === undefined || first === "") return opaqueDesc(raw);
	if (SEQUENCE_NAMES.has(form.name)) return collectionDesc(parseTypeAnnotation(first));
	if (MAPPING_NAMES.has(form.name)) return parseMappingArgs(form.args);
	switch (form.name) {
	case "Optional": return optionalDesc(parseTypeAnnotation(first));
	case "Union": return parseUnion(form.args, raw);
	case "Annotated": return parseTypeAnnotation(first);
	case "Literal": return literalKind(form.args, raw);
	case "tuple": case "Tuple": return parseTuple(form.args, raw);
	default: return opaqueDesc(raw);
	}
}

function parseBare(name: string): DynamicTypeDescriptor {
	const primitive = PRIMITIVES[name];
	if (primitive !== undefined) return primitive();
	if (SEQUENCE_NAMES.has(name)) return collectionDesc(opaqueDesc("Any"));
	if (MAPPING_NAMES.has(name)) return mappingDesc(stringDesc(), opaqueDesc("Any"));
	if (ANY_NAMES.has(name)) return opaqueDesc("Any");
	return opaqueDesc(name);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Parse a type annotation string into a descriptor. Never throws.
 *
 * @example
 * parseTypeAnnotation("dict[str, list[int]]");
 * // { kind: "mapping", key: string, value: collection<integer> }
 */
export function parseTypeAnnotation(annotation: string): DynamicTypeDescriptor {
	const raw = annotation.trim();
	if (raw === "") return opaqueDesc();

	const members = splitTopLevel(raw, "|");
	if (members === undefined) return opaqueDesc(raw);
	if (members.length > 1) return parseUnion(members, raw);

	if (raw.includes("[")) {
		const form = parseGeneric(raw);
		return form === undefined ? opaqueDesc(raw) : parseGenericForm(form, raw);
	}
	return parseBare(stripModule(raw));
}
