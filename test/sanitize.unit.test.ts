import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	RESERVED_WORDS,
	SymbolTable,
	isReservedWord,
	isValidIdentifier,
	reservedWordsFor,
	sanitize,
	toPascalCase,
	toSnakeCase,
} from "../src/identifiers/sanitize.js";

describe("sanitize", () => {
	it("replaces invalid characters and suffixes collisions", () => {
		const used = new Set<string>();
		assert.equal(sanitize("route-a", used), "route_a");
		assert.equal(sanitize("route a", used), "route_a_2");
		assert.equal(sanitize("route.a", used), "route_a_3");
		assert.deepEqual([...used], ["route_a", "route_a_2", "route_a_3"]);
	});

	it("escapes reserved words and digit-leading names", () => {
		const used = new Set<string>();
		assert.equal(sanitize("type", used), "_type");
		assert.equal(sanitize("fn", used), "_fn");
		assert.equal(sanitize("interface", used), "_interface");
		assert.equal(sanitize("Self", used), "_Self");
		assert.equal(sanitize("1st", used), "_1st");
	});

	it("escaped names still collide with earlier ones", () => {
		const used = new Set<string>(["_type"]);
		assert.equal(sanitize("type", used), "_type_2");
	});

	it("preserves case", () => {
		const used = new Set<string>();
		assert.equal(sanitize("HighPath", used), "HighPath");
		assert.equal(sanitize("highPath", used), "highPath");
	});

	it("turns names without letters or digits into identifiers", () => {
		const used = new Set<string>();
		assert.equal(sanitize("", used), "unnamed");
		assert.equal(sanitize("", used), "unnamed_2");
		assert.equal(sanitize("_", used), "_unnamed");
		assert.equal(sanitize("--", used), "__unnamed");
		assert.equal(sanitize("héllo", used), "h_llo");
	});

	it("is deterministic for equal inputs", () => {
		const names = ["a b", "a-b", "class", "9lives", ""];
		const first = new Set<string>();
		const second = new Set<string>();
		assert.deepEqual(
			names.map((n) => sanitize(n, first)),
			names.map((n) => sanitize(n, second)),
		);
	});

	it("produces unique, valid, unreserved identifiers for hostile inputs", () => {
		const names = [
			"type", "type", "Type", "fn", "fn ", "1", "1", "", "", "_", "a-b", "a_b",
			"a b", "class", "Self", "__end__", "默认", "match", "_match", "yield",
		];
		const used = new Set<string>();
		const out = names.map((n) => sanitize(n, used));
		assert.equal(new Set(out).size, out.length);
		for (const name of out) {
			assert.ok(isValidIdentifier(name), name);
			assert.ok(!RESERVED_WORDS.has(name), name);
		}
	});
});

describe("Reserved words", () => {
	it("are kept per target and as a union", () => {
		assert.equal(reservedWordsFor("rust").has("fn"), true);
		assert.equal(reservedWordsFor("typescript").has("fn"), false);
		assert.equal(reservedWordsFor("typescript").has("interface"), true);
		assert.equal(isReservedWord("interface"), true);
		assert.equal(isReservedWord("match"), true);
		assert.equal(isReservedWord("state"), false);
	});
});

describe("SymbolTable", () => {
	it("never hands out seeded names", () => {
		const table = new SymbolTable(["Node"]);
		assert.equal(table.symbolFor("Node"), "Node_2");
		assert.equal(table.has("Node"), true);
	});

	it("returns the same symbol for the same raw name and scope", () => {
		const table = new SymbolTable();
		assert.equal(table.symbolFor("check"), "check");
		assert.equal(table.symbolFor("check"), "check");
		assert.equal(table.symbolFor("check", "router"), "check_2");
		assert.equal(table.symbolFor("check", "router"), "check_2");
	});

	it("keys symbols apart when their spellings coincide", () => {
		const table = new SymbolTable();
		assert.equal(table.symbolAs("fetch-data", "FetchData"), "FetchData");
		assert.equal(table.symbolAs("fetch_data", "FetchData"), "FetchData_2");
		assert.equal(table.symbolAs("fetch-data", "FetchData"), "FetchData");
	});
});

describe("Case conversion", () => {
	it("toPascalCase", () => {
		assert.equal(toPascalCase("high_path"), "HighPath");
		assert.equal(toPascalCase("routeBasedOnValue"), "RouteBasedOnValue");
		assert.equal(toPascalCase("1st-step"), "1stStep");
		assert.equal(toPascalCase("---"), "");
	});

	it("toSnakeCase", () => {
		assert.equal(toSnakeCase("CustomerSupport"), "customer_support");
		assert.equal(toSnakeCase("retry loop"), "retry_loop");
	});
});
