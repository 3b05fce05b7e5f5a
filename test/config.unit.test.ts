import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { resolveConfig } from "../src/config.js";
import { GraphError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { DEFAULT_MAX_EDGES, DEFAULT_MAX_NODES } from "../src/topology/resolver.js";

function optionErrors(options: unknown): { path: string; message: string }[] {
	try {
		resolveConfig(options);
	} catch (err) {
		assert.ok(err instanceof GraphError);
		assert.equal(err.code, "InvalidOptions");
		return err.details.map((d) => ({ path: d.path, message: d.message }));
	}
	assert.fail("expected InvalidOptions");
}

describe("resolveConfig", () => {
	it("fills in defaults", () => {
		const config = resolveConfig();
		assert.equal(config.target, "rust");
		assert.equal(config.includeTests, true);
		assert.deepEqual(config.customTypes, {});
		assert.equal(config.maxNodes, DEFAULT_MAX_NODES);
		assert.equal(config.maxEdges, DEFAULT_MAX_EDGES);
		assert.equal(config.moduleName, undefined);
		assert.equal(config.logger, undefined);
	});

	it("keeps caller values", () => {
		const config = resolveConfig({
			target: "typescript",
			moduleName: "support_flow",
			stateTypeName: "SupportState",
			includeTests: false,
			customTypes: { UserId: "UserId" },
			maxNodes: 5,
		});
		assert.equal(config.target, "typescript");
		assert.equal(config.moduleName, "support_flow");
		assert.equal(config.stateTypeName, "SupportState");
		assert.equal(config.includeTests, false);
		assert.deepEqual(config.customTypes, { UserId: "UserId" });
		assert.equal(config.maxNodes, 5);
	});

	it("passes the logger through by reference", () => {
		assert.equal(resolveConfig({ logger: silentLogger }).logger, silentLogger);
	});

	it("rejects an unknown target", () => {
		assert.deepEqual(optionErrors({ target: "go" }).map((e) => e.path), ["target"]);
	});

	it("rejects a module name that is not an identifier", () => {
		assert.deepEqual(optionErrors({ moduleName: "9lives" }), [
			{ path: "moduleName", message: "must be an identifier" },
		]);
	});

	it("rejects an object that is not a logger", () => {
		assert.deepEqual(optionErrors({ logger: {} }), [
			{ path: "logger", message: "must implement debug, info, warn and error" },
		]);
	});

	it("rejects non-positive limits", () => {
		assert.deepEqual(optionErrors({ maxNodes: 0, maxEdges: 1.5 }).map((e) => e.path), ["maxNodes", "maxEdges"]);
	});

	it("renders every problem in the error message", () => {
		assert.throws(() => resolveConfig({ moduleName: "a-b" }), {
			name: "GraphError",
			message: "Invalid conversion options:\n  moduleName: must be an identifier",
		});
	});
});
