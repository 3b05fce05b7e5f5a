import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { artifactFiles, renderArtifact } from "../../src/pipeline.js";
import type { EmitOptions, SourceArtifact } from "../../src/synth/shared.js";
import {
	emitTypeScript,
	literalKey,
	propertyAccess,
	propertyKey,
	renderTypeScriptType,
} from "../../src/synth/typescript.js";
import { resolve } from "../../src/topology/resolver.js";
import {
	dictionaryType,
	dynamicType,
	int64Type,
	mapStateSchema,
	nullableType,
	sequenceType,
	textType,
	type TypeMapOptions,
} from "../../src/type-mapper.js";
import {
	TERMINAL,
	collectionDesc,
	integerDesc,
	mappingDesc,
	opaqueDesc,
	stringDesc,
	type GraphInfo,
} from "../../src/types.js";
import { exportedFunction, importGenerated, typeCheckGenerated } from "../fixtures/generated.js";
import {
	branchingGraph,
	buildGraph,
	collidingGraph,
	edge,
	loopGraph,
	orphanGraph,
} from "../fixtures/graphs.js";

function emit(graph: GraphInfo, options: EmitOptions = {}, typeOptions: TypeMapOptions = {}): SourceArtifact {
	const types = mapStateSchema(graph.stateSchema, typeOptions);
	return emitTypeScript(graph, resolve(graph), types.fields, options);
}

function lines(text: string): string[] {
	return text.split("\n");
}

function customGraph(): GraphInfo {
	return buildGraph({
		nodes: ["a"],
		edges: [edge("a", TERMINAL)],
		fields: [
			{ name: "owner", dynamicType: opaqueDesc("UserId"), optional: false },
			{ name: "user-name", dynamicType: stringDesc(), optional: false },
		],
	});
}

describe("emitTypeScript", () => {
	describe("state type", () => {
		it("renders an interface and its initializer", () => {
			assert.equal(
				emit(branchingGraph()).sections.stateType,
				[
					"/** State threaded through every node. */",
					"export interface GraphState {",
					"\tvalue: bigint;",
					"}",
					"",
					"export function createInitialState(): GraphState {",
					"\treturn {",
					"\t\tvalue: 0n,",
					"\t};",
					"}",
				].join("\n"),
			);
		});

		it("asks the caller for custom-typed fields and quotes non-identifier keys", () => {
			assert.equal(
				emit(customGraph(), {}, { customTypes: { UserId: "UserId" } }).sections.stateType,
				[
					"/** State threaded through every node. */",
					"export interface GraphState {",
					"\towner: UserId;",
					"\t\"user-name\": string;",
					"}",
					"",
					"export function createInitialState(init: Pick<GraphState, \"owner\">): GraphState {",
					"\treturn {",
					"\t\towner: init.owner,",
					"\t\t\"user-name\": \"\",",
					"\t};",
					"}",
				].join("\n"),
			);
		});

		it("renders map and sequence initializers", () => {
			const graph = buildGraph({
				nodes: ["a"],
				edges: [edge("a", TERMINAL)],
				fields: [
					{ name: "limits", dynamicType: mappingDesc(stringDesc(), integerDesc()), optional: false, defaultValue: { x: 1 } },
					{ name: "ids", dynamicType: mappingDesc(integerDesc(), stringDesc()), optional: false, defaultValue: { 2: "b" } },
					{ name: "empty", dynamicType: mappingDesc(stringDesc(), integerDesc()), optional: false },
					{ name: "tags", dynamicType: collectionDesc(stringDesc()), optional: false, defaultValue: ["x"] },
				],
			});
			const state = lines(emit(graph).sections.stateType);
			for (const line of [
				"\tlimits: Map<string, bigint>;",
				"\tids: Map<bigint, string>;",
				"\t\tlimits: new Map<string, bigint>([[\"x\", 1n]]),",
				"\t\tids: new Map<bigint, string>([[2n, \"b\"]]),",
				"\t\tempty: new Map<string, bigint>(),",
				"\t\ttags: [\"x\"],",
			]) {
				assert.ok(state.includes(line), line);
			}
		});

		it("computes a __proto__ key so it stays an own property", () => {
			const graph = buildGraph({
				nodes: ["a"],
				edges: [edge("a", TERMINAL)],
				fields: [{ name: "__proto__", dynamicType: stringDesc(), optional: false }],
			});
			const state = lines(emit(graph).sections.stateType);
			assert.ok(state.includes("\t__proto__: string;"));
			assert.ok(state.includes("\t\t[\"__proto__\"]: \"\","));
		});
	});

	describe("stubs", () => {
		it("renders a node stub returning a failed result", () => {
			assert.equal(
				emit(branchingGraph()).sections.nodes.get("start"),
				[
					"/** start: Pick a path. */",
					"export function start(_state: GraphState): NodeResult {",
					"\treturn { ok: false, error: notImplemented(\"start\") };",
					"}",
				].join("\n"),
			);
		});

		it("notes unreachable nodes", () => {
			assert.equal(
				emit(orphanGraph()).sections.nodes.get("orphan"),
				[
					"/** orphan */",
					"// Unreachable from entry point \"a\"; kept for completion, not dispatched.",
					"export function orphan(_state: GraphState): NodeResult {",
					"\treturn { ok: false, error: notImplemented(\"orphan\") };",
					"}",
				].join("\n"),
			);
		});

		it("renders a router stub that throws", () => {
			assert.equal(
				emit(branchingGraph()).sections.routers.get("route_based_on_value"),
				[
					"/** Router route_based_on_value: must return one of \"high\", \"low\". */",
					"export function route_based_on_value(_state: GraphState): string {",
					"\tthrow new Error(\"router route_based_on_value is not implemented\");",
					"}",
				].join("\n"),
			);
		});
	});

	describe("dispatch", () => {
		it("renders the node table, branch functions and dispatch cases", () => {
			const dispatch = lines(emit(loopGraph()).sections.dispatch);
			for (const line of [
				"export const Node = {",
				"\tInit: \"init\",",
				"\tLoop: \"loop\",",
				"} as const;",
				"export function branch__loop(label: string): Step {",
				"\tcase \"continue\": return { kind: \"next\", node: Node.Loop }; // loops back",
				"\tcase \"done\": return END;",
				"\tdefault: throw new DispatchError(\"loop\", \"should_continue\", label);",
				"\tcase Node.Init:",
				"\t\treturn [invoke(current, init, state), { kind: \"next\", node: Node.Loop }];",
				"\tcase Node.Loop: {",
				"\t\tconst next = invoke(current, _loop, state);",
				"\t\treturn [next, branch__loop(should_continue(next))];",
				"\tlet current: Node = Node.Init;",
			]) {
				assert.ok(dispatch.includes(line), line);
			}
		});

		it("ends the run after a node without outgoing edges", () => {
			const graph = buildGraph({ nodes: ["a", "b"], edges: [edge("a", "b")] });
			const dispatch = lines(emit(graph).sections.dispatch);
			assert.ok(dispatch.includes("\t\treturn [invoke(current, b, state), END]; // no outgoing edge"));
		});

		it("gives ids with the same PascalCase spelling distinct members", () => {
			const dispatch = lines(emit(collidingGraph()).sections.dispatch);
			for (const line of [
				"\tPick: \"pick\",",
				"\tFetchData: \"fetch-data\",",
				"\tFetchData_2: \"fetch_data\",",
				"\tcase \"dash\": return { kind: \"next\", node: Node.FetchData };",
				"\tcase \"under\": return { kind: \"next\", node: Node.FetchData_2 };",
				"\tcase Node.FetchData:",
				"\t\treturn [invoke(current, fetch_data, state), END];",
				"\tcase Node.FetchData_2:",
				"\t\treturn [invoke(current, fetch_data_2, state), END];",
			]) {
				assert.ok(dispatch.includes(line), line);
			}
		});
	});

	describe("tests module", () => {
		it("imports what it uses from the generated module", () => {
			assert.equal(
				emit(branchingGraph()).sections.tests,
				[
					"import assert from \"node:assert/strict\";",
					"import { test } from \"node:test\";",
					"import {",
					"\tDispatchError,",
					"\tNode,",
					"\tbranch_start,",
					"\tcreateInitialState,",
					"\tstart,",
					"\ttype NodeResult,",
					"\ttype GraphState,",
					"} from \"./branching.js\";",
					"",
					"test(\"initial state uses schema defaults\", () => {",
					"\tconst state = createInitialState();",
					"\tassert.deepEqual(state.value, 0n);",
					"});",
					"",
					"test(\"entry node takes and returns the state\", () => {",
					"\tconst entry: (state: GraphState) => NodeResult = start;",
					"\tassert.equal(typeof entry, \"function\");",
					"});",
					"",
					"test(\"branch_start routes every declared label\", () => {",
					"\tassert.deepEqual(branch_start(\"high\"), { kind: \"next\", node: Node.HighPath });",
					"\tassert.deepEqual(branch_start(\"low\"), { kind: \"next\", node: Node.LowPath });",
					"\tassert.throws(() => branch_start(\"__undeclared__\"), DispatchError);",
					"});",
				].join("\n"),
			);
		});

		it("skips the default-state test when custom fields need values", () => {
			const tests = lines(emit(customGraph(), {}, { customTypes: { UserId: "UserId" } }).sections.tests);
			assert.ok(tests.includes("// createInitialState needs values for custom-typed fields; no default-state test."));
			assert.ok(!tests.includes("\tcreateInitialState,"));
		});

		it("imports JsonValue when a compared default names it", () => {
			const graph = buildGraph({
				nodes: ["a"],
				edges: [edge("a", TERMINAL)],
				fields: [{ name: "meta", dynamicType: mappingDesc(stringDesc(), opaqueDesc("Any")), optional: false }],
			});
			const tests = lines(emit(graph).sections.tests);
			assert.ok(tests.includes("\ttype JsonValue,"));
			assert.ok(tests.includes("\tassert.deepEqual(state.meta, new Map<string, JsonValue>());"));
		});

		it("imports from the configured module name", () => {
			const tests = lines(emit(branchingGraph(), { moduleName: "routes" }).sections.tests);
			assert.ok(tests.includes("} from \"./routes.js\";"));
		});
	});

	describe("generated source", () => {
		for (const [name, graph] of [
			["branching", branchingGraph()],
			["loop", loopGraph()],
			["orphan", orphanGraph()],
			["colliding", collidingGraph()],
			["custom", customGraph()],
		] as const) {
			it("type-checks under strict: " + name, () => {
				const artifact = emit(graph, {}, { customTypes: { UserId: "UserId" } });
				assert.deepEqual(typeCheckGenerated(artifactFiles(artifact), "type UserId = string;\n"), []);
			});
		}

		it("dispatches colliding ids to their own nodes at run time", async () => {
			const mod = await importGenerated(renderArtifact(emit(collidingGraph())));
			const branch = exportedFunction(mod, "branch_pick");
			assert.deepEqual(Reflect.get(mod, "Node"), { Pick: "pick", FetchData: "fetch-data", FetchData_2: "fetch_data" });
			assert.deepEqual(branch("dash"), { kind: "next", node: "fetch-data" });
			assert.deepEqual(branch("under"), { kind: "next", node: "fetch_data" });
			assert.throws(() => branch("other"), {
				name: "DispatchError",
				node: "pick",
				router: "choose",
				label: "other",
			});
		});

		it("stops the run with a NodeError from the entry stub", async () => {
			const mod = await importGenerated(renderArtifact(emit(collidingGraph())));
			const initial = exportedFunction(mod, "createInitialState")();
			assert.throws(() => exportedFunction(mod, "runGraph")(initial), {
				name: "NodeError",
				node: "pick",
				message: "node pick failed: node pick is not implemented",
			});
		});
	});
});

describe("TypeScript rendering helpers", () => {
	it("renderTypeScriptType", () => {
		assert.equal(renderTypeScriptType(sequenceType(nullableType(textType()))), "(string | null)[]");
		assert.equal(renderTypeScriptType(dictionaryType(textType(), int64Type())), "Map<string, bigint>");
		assert.equal(renderTypeScriptType(nullableType(dynamicType())), "JsonValue | null");
	});

	it("literalKey computes __proto__", () => {
		assert.equal(literalKey("__proto__"), "[\"__proto__\"]");
		assert.equal(literalKey("user-name"), "\"user-name\"");
	});

	it("propertyKey and propertyAccess quote non-identifiers", () => {
		assert.equal(propertyKey("value"), "value");
		assert.equal(propertyKey("user-name"), "\"user-name\"");
		assert.equal(propertyAccess("state", "user-name"), "state[\"user-name\"]");
		assert.equal(propertyAccess("state", "$ok"), "state.$ok");
	});
});
