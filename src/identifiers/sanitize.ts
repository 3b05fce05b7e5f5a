// Identifier Sanitizer
// Maps arbitrary node, router and field names onto identifiers that are valid
// in every supported target: ASCII letters, digits and underscore, not
// digit-leading, not a reserved word, unique within one symbol table.

import { readFileSync } from "node:fs";
import { z } from "zod/v4";

//==============================================================================
// Reserved Words
//==============================================================================

export type TargetLanguage = "rust" | "typescript";

const ReservedWordsSchema = z.object({
	rust: z.array(z.string()),
	typescript: z.array(z.string()),
});

type ReservedWords = z.infer<typeof ReservedWordsSchema>;

function loadReservedWords(): ReservedWords {
	const url = new URL("./reserved-words.json", import.meta.url);
	const raw: unknown = JSON.parse(readFileSync(url, "utf-8"));
	return ReservedWordsSchema.parse(raw);
}

const RESERVED_BY_TARGET: Readonly<Record<TargetLanguage, ReadonlySet<string>>> = (() => {
	const words = loadReservedWords();
	return Object.freeze({
		rust: new Set(words.rust),
		typescript: new Set(words.typescript),
	});
})();

/** Union of every target's reserved words. Built once, never mutated. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
	...RESERVED_BY_TARGET.rust,
	...RESERVED_BY_TARGET.typescript,
]);

export function reservedWordsFor(target: TargetLanguage): ReadonlySet<string> {
	return RESERVED_BY_TARGET[target];
}

export function isReservedWord(name: string): boolean {
	return RESERVED_WORDS.has(name);
}

//==============================================================================
// Sanitization
//==============================================================================

/** Prefix applied to digit-leading names and reserved words */
export const ESCAPE_PREFIX = "_";

const INVALID_CHARS = /[^A-Za-z0-9_]/g;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
	return IDENTIFIER.test(name) && /[A-Za-z0-9]/.test(name) && !isReservedWord(name);
}

function escapeCandidate(raw: string): string {
	let candidate = raw.replace(INVALID_CHARS, "_");
	// a lone "_" is a pattern, not an identifier, in Rust
	if (!/[A-Za-z0-9]/.test(candidate)) candidate += "unnamed";
	if (/^[0-9]/.test(candidate) || isReservedWord(candidate)) {
		candidate = ESCAPE_PREFIX + candidate;
	}
	return candidate;
}

/**
 * Sanitize `raw` into an identifier not already present in `used`, and
 * record the result in `used`.
 *
 * @example
 * const used = new Set<string>();
 * sanitize("route-a", used); // "route_a"
 * sanitize("route a", used); // "route_a_2"
 * sanitize("type", used);    // "_type"
 */
export function sanitize(raw: string, used: Set<string>): string {
	const base = escapeCandidate(raw);
	let name = base;
	for (let n = 2; used.has(name); n++) {
		name = base + "_" + String(n);
	}
	used.add(name);
	return name;
}

/**
 * A symbol table for one generation pass. Pre-seeded names belong to the
 * generated code itself and can never be handed out.
 *
 * Scopes separate kinds of raw names that share one target namespace: a node
 * and a router both called `check` get two distinct symbols.
 */
export class SymbolTable {
	private readonly used: Set<string>;
	private readonly assigned = new Map<string, string>();

	constructor(seed: Iterable<string> = []) {
		this.used = new Set(seed);
	}

	/** Symbol for `raw`; the same raw name in the same scope always gets the same symbol. */
	symbolFor(raw: string, scope = ""): string {
		return this.symbolAs(raw, raw, scope);
	}

	/**
	 * Symbol for `key`, spelled from `text`. Distinct keys get distinct
	 * symbols even when their spellings coincide (`fetch-data` and
	 * `fetch_data` both spelled `FetchData`).
	 */
	symbolAs(key: string, text: string, scope = ""): string {
		const cacheKey = scope + "\u0000" + key;
		const existing = this.assigned.get(cacheKey);
		if (existing !== undefined) return existing;
		const name = sanitize(text, this.used);
		this.assigned.set(cacheKey, name);
		return name;
	}

	has(name: string): boolean {
		return this.used.has(name);
	}
}

//==============================================================================
// Case Conversion
//==============================================================================

function words(raw: string): string[] {
	return raw
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.split(/[^A-Za-z0-9]+/)
		.filter((w) => w.length > 0);
}

/** `high_path` -> `HighPath`; the result still goes through `sanitize`. */
export function toPascalCase(raw: string): string {
	return words(raw)
		.map((w) => w.charAt(0).toUpperCase() + w.slice(1))
		.join("");
}

/** `CustomerSupport` -> `customer_support` */
export function toSnakeCase(raw: string): string {
	return words(raw).map((w) => w.toLowerCase()).join("_");
}

