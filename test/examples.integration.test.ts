// Example graph suite
// Converts every examples/**/*.graph.json to both targets, checks the
// outcome recorded in its companion .expected.json, and type-checks the
// generated TypeScript.

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import { relative, resolve } from "node:path";
import { globSync } from "glob";
import { z } from "zod/v4";

import { artifactFiles, convertDocument } from "../src/pipeline.js";
import { typeCheckGenerated } from "./fixtures/generated.js";

//==============================================================================
// Discovery
//==============================================================================

const ExpectedSchema = z.object({
	order: z.array(z.string()),
	unreachable: z.array(z.string()).default([]),
	loopBacks: z.number().int().nonnegative().default(0),
	diagnostics: z.array(z.string()),
});

interface ExampleInfo {
	relativePath: string;
	source: string;
	expected: z.infer<typeof ExpectedSchema>;
}

function discoverExamples(): ExampleInfo[] {
	const root = resolve(import.meta.dirname, "..");
	const files = globSync("examples/**/*.graph.json", { cwd: root, absolute: true }).sort();

	return files.map((filePath) => {
		const expectedPath = filePath.replace(/\.graph\.json$/, ".expected.json");
		const expected: unknown = JSON.parse(readFileSync(expectedPath, "utf-8"));
		return {
			relativePath: relative(root, filePath),
			source: readFileSync(filePath, "utf-8"),
			expected: ExpectedSchema.parse(expected),
		};
	});
}

//==============================================================================
// Suite
//==============================================================================

const examples = discoverExamples();

describe("Examples", () => {
	it("finds the example graphs", () => {
		assert.ok(examples.length >= 5, "found " + String(examples.length));
	});

	for (const example of examples) {
		describe(example.relativePath, () => {
			it("resolves to the recorded topology", () => {
				const result = convertDocument(example.source);
				assert.deepEqual(result.resolved.order, example.expected.order);
				assert.deepEqual(result.resolved.unreachable, example.expected.unreachable);
				assert.equal(result.resolved.loopBackEdges.length, example.expected.loopBacks);
			});

			it("reports the recorded diagnostics", () => {
				const result = convertDocument(example.source);
				assert.deepEqual(result.diagnostics.map((d) => d.code), example.expected.diagnostics);
			});

			it("emits a Rust module", () => {
				const result = convertDocument(example.source);
				const files = artifactFiles(result.artifact);
				assert.equal(files.size, 1);
				const [name, source] = [...files][0] ?? ["", ""];
				assert.match(name, /^[a-z_][a-z0-9_]*\.rs$/);
				assert.ok(source.includes("pub fn run_graph("));
				assert.ok(source.includes("#[cfg(test)]"));
			});

			it("emits TypeScript that type-checks under strict", () => {
				const result = convertDocument(example.source, { target: "typescript" });
				const files = artifactFiles(result.artifact);
				assert.equal(files.size, 2);
				assert.deepEqual(typeCheckGenerated(files), []);
			});

			it("converts deterministically", () => {
				const first = artifactFiles(convertDocument(example.source).artifact);
				const second = artifactFiles(convertDocument(example.source).artifact);
				assert.deepEqual(first, second);
			});
		});
	}
});
