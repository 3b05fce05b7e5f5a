// SPDX-License-Identifier: MIT
// Graph Canonicalization - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { canonicalize, graphDigest, graphToJson } from "../src/canonicalize.js";
import { branchingGraph, linearGraph } from "./fixtures/graphs.js";
import { TERMINAL, conditionalEdge, graphInfo } from "../src/types.js";

describe("canonicalize", () => {
	it("sorts object keys and drops whitespace", () => {
		assert.equal(canonicalize({ b: 1, a: [true, null, "x"] }), "{\"a\":[true,null,\"x\"],\"b\":1}");
	});

	it("sorts keys by code unit", () => {
		assert.equal(canonicalize({ a: 1, B: 2, _: 3 }), "{\"B\":2,\"_\":3,\"a\":1}");
	});

	it("serializes numbers like ECMAScript", () => {
		assert.equal(canonicalize(-0), "0");
		assert.equal(canonicalize(1e21), "1e+21");
		assert.equal(canonicalize(0.5), "0.5");
	});

	it("rejects non-finite numbers", () => {
		assert.throws(() => canonicalize(Number.POSITIVE_INFINITY), /JCS: non-finite number Infinity/);
		assert.throws(() => canonicalize(Number.NaN), /JCS: non-finite number NaN/);
	});
});

describe("graphToJson", () => {
	it("keeps branch order as an array", () => {
		assert.deepEqual(graphToJson(branchingGraph()), {
			name: "branching",
			nodes: [
				{ id: "start", displayName: "start", doc: "Pick a path." },
				{ id: "high_path", displayName: "high_path" },
				{ id: "low_path", displayName: "low_path" },
			],
			edges: [
				{ from: "high_path", to: TERMINAL },
				{ from: "low_path", to: TERMINAL },
			],
			conditionalEdges: [
				{
					from: "start",
					routerName: "route_based_on_value",
					branches: [
						{ label: "high", target: "high_path" },
						{ label: "low", target: "low_path" },
					],
				},
			],
			stateSchema: {
				fields: [
					{ name: "value", dynamicType: { kind: "primitive", primitive: "integer" }, optional: false },
				],
			},
			entryPoint: "start",
		});
	});
});

describe("graphDigest", () => {
	it("formats the digest with its algorithm", () => {
		assert.match(graphDigest(linearGraph()), /^sha256:[0-9a-f]{64}$/);
		assert.match(graphDigest(linearGraph(), "sha512"), /^sha512:[0-9a-f]{128}$/);
	});

	it("is stable across equal graphs", () => {
		assert.equal(graphDigest(branchingGraph()), graphDigest(branchingGraph()));
	});

	it("changes when branch order changes", () => {
		const base = branchingGraph();
		const swapped = graphInfo({
			...base,
			conditionalEdges: [
				conditionalEdge("start", "route_based_on_value", [["low", "low_path"], ["high", "high_path"]]),
			],
		});
		assert.notEqual(graphDigest(base), graphDigest(swapped));
	});
});
