import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
	ErrorCodes,
	GraphError,
	deadEdge,
	defaultIgnored,
	formatDiagnostic,
	implicitTerminal,
	invalidResult,
	isGraphError,
	opaqueFallback,
	unreachableNode,
	validResult,
} from "../src/errors.js";

describe("GraphError class", () => {
	it("constructor sets code, message, name and empty details", () => {
		const err = new GraphError(ErrorCodes.InvalidGraph, "test msg");
		assert.equal(err.code, "InvalidGraph");
		assert.equal(err.message, "test msg");
		assert.equal(err.name, "GraphError");
		assert.equal(err.subject, undefined);
		assert.deepEqual(err.details, []);
		assert.ok(err instanceof Error);
	});

	it("isGraphError distinguishes graph errors from plain errors", () => {
		assert.equal(isGraphError(GraphError.unknownEntryPoint("x")), true);
		assert.equal(isGraphError(new Error("x")), false);
		assert.equal(isGraphError("x"), false);
	});
});

describe("Static factories", () => {
	it("danglingEdge names the edge and the missing node", () => {
		const err = GraphError.danglingEdge("a", "ghost", "ghost");
		assert.equal(err.code, "DanglingEdge");
		assert.equal(err.subject, "a -> ghost");
		assert.equal(err.message, "Edge a -> ghost references undeclared node \"ghost\"");
	});

	it("unreachableEntry carries the entry point", () => {
		const err = GraphError.unreachableEntry("start", "has no outgoing transition");
		assert.equal(err.code, "UnreachableEntry");
		assert.equal(err.subject, "start");
		assert.equal(err.message, "Entry point \"start\" has no outgoing transition");
	});

	it("unknownEntryPoint", () => {
		const err = GraphError.unknownEntryPoint("x");
		assert.equal(err.code, "UnknownEntryPoint");
		assert.equal(err.message, "Entry point \"x\" is not a declared node");
	});

	it("graphTooLarge reports count and limit", () => {
		const err = GraphError.graphTooLarge("nodes", 12, 10);
		assert.equal(err.code, "GraphTooLarge");
		assert.equal(err.subject, "nodes");
		assert.equal(err.message, "Graph has 12 nodes, limit is 10");
	});

	it("invalidGraph lists every validation error", () => {
		const err = GraphError.invalidGraph([
			{ path: "nodes[1].id", message: "Duplicate node id: a", value: "a" },
			{ path: "entryPoint", message: "Graph has no entry point" },
		]);
		assert.equal(err.code, "InvalidGraph");
		assert.equal(
			err.message,
			"Invalid graph:\n  nodes[1].id: Duplicate node id: a (value: \"a\")\n  entryPoint: Graph has no entry point",
		);
		assert.equal(err.details.length, 2);
	});

	it("invalidOptions", () => {
		const err = GraphError.invalidOptions([{ path: "maxNodes", message: "too small" }]);
		assert.equal(err.code, "InvalidOptions");
		assert.equal(err.message, "Invalid conversion options:\n  maxNodes: too small");
	});
});

describe("Validation results", () => {
	it("validResult holds the value", () => {
		assert.deepEqual(validResult(5), { valid: true, errors: [], value: 5 });
	});

	it("invalidResult holds no value", () => {
		const result = invalidResult<number>([{ path: "$", message: "m" }]);
		assert.equal(result.valid, false);
		assert.equal(result.value, undefined);
	});

});

describe("Diagnostics", () => {
	it("opaqueFallback for an opaque leaf", () => {
		const d = opaqueFallback("scores", "scores.value", "opaque", "opaque");
		assert.equal(d.code, "OpaqueFallback");
		assert.equal(d.severity, "warning");
		assert.equal(d.message, "Field \"scores\" at scores.value: unrepresentable type opaque; using dynamic value");
	});

	it("opaqueFallback for an unhashable key", () => {
		const d = opaqueFallback("m", "m", "unhashable-key", "float");
		assert.equal(d.message, "Field \"m\" at m: mapping key float is not hashable; using dynamic value");
	});

	it("deadEdge explains which edge wins", () => {
		assert.equal(
			deadEdge("a", "b", "shadowed-by-conditional").message,
			"Edge a -> b is never taken: the node's conditional edge takes precedence",
		);
		assert.equal(
			deadEdge("a", "c", "duplicate-unconditional").message,
			"Edge a -> c is never taken: an earlier unconditional edge from the same node wins",
		);
	});

	it("implicitTerminal and defaultIgnored messages", () => {
		assert.equal(implicitTerminal("sink").message, "Node \"sink\" has no outgoing edge; the run ends after it");
		assert.equal(
			defaultIgnored("count", "int64").message,
			"Default value of field \"count\" does not fit int64; using the empty value",
		);
	});

	it("formatDiagnostic renders one line", () => {
		assert.equal(
			formatDiagnostic(unreachableNode("orphan", "start")),
			"warning[UnreachableNode]: Node \"orphan\" is unreachable from entry point \"start\"",
		);
	});
});
