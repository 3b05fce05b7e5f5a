// Conversion Pipeline
// validate -> resolve -> map types -> emit. Fatal errors stop the pipeline
// before anything is emitted; warnings are collected and returned with the
// artifact.

import { graphDigest } from "./canonicalize.js";
import { resolveConfig, type ConversionOptions } from "./config.js";
import { formatDiagnostic, type Diagnostic } from "./errors.js";
import { parseIntrospectedGraph } from "./ingest/introspection.js";
import { silentLogger } from "./logger.js";
import { emitRust } from "./synth/rust.js";
import type { SourceArtifact } from "./synth/shared.js";
import { emitTypeScript } from "./synth/typescript.js";
import { resolve, type ResolvedGraph } from "./topology/resolver.js";
import { mapStateSchema, type StaticType } from "./type-mapper.js";
import { freezeValue, type GraphInfo } from "./types.js";
import { assertValidGraph } from "./validator.js";

export interface ConversionResult {
	artifact: SourceArtifact;
	resolved: ResolvedGraph;
	/** field name -> mapped static type, in schema order */
	types: ReadonlyMap<string, StaticType>;
	/** Topology, type-mapping and emission warnings, in that order */
	diagnostics: readonly Diagnostic[];
	digest: string;
}

/**
 * Convert a graph into a source artifact.
 *
 * @throws GraphError on invalid options, an invalid graph, or a topology
 * error; no partial artifact is produced
 */
export function convert(graph: GraphInfo, options: ConversionOptions = {}): ConversionResult {
	const config = resolveConfig(options);
	const log = config.logger ?? silentLogger;

	assertValidGraph(graph);
	log.debug("validated graph", { nodes: graph.nodes.length, edges: graph.edges.length });

	const resolved = resolve(graph, { maxNodes: config.maxNodes, maxEdges: config.maxEdges });
	log.debug("resolved topology", { reachable: resolved.order.length, unreachable: resolved.unreachable.length });

	const mapping = mapStateSchema(graph.stateSchema, { customTypes: config.customTypes });
	const digest = graphDigest(graph);

	const emit = config.target === "rust" ? emitRust : emitTypeScript;
	const artifact = emit(graph, resolved, mapping.fields, {
		moduleName: config.moduleName,
		stateTypeName: config.stateTypeName,
		includeTests: config.includeTests,
		digest,
	});
	log.debug("emitted " + config.target + " module", { module: artifact.moduleName });

	const diagnostics: Diagnostic[] = [
		...resolved.diagnostics,
		...mapping.diagnostics,
		...artifact.diagnostics,
	];
	for (const d of diagnostics) log.warn(formatDiagnostic(d));

	return {
		artifact,
		resolved,
		types: mapping.fields,
		diagnostics: freezeValue(diagnostics),
		digest,
	};
}

/**
 * Parse an introspection document (JSON text or parsed value) and convert it.
 */
export function convertDocument(input: unknown, options: ConversionOptions = {}): ConversionResult {
	return convert(parseIntrospectedGraph(input), options);
}

//==============================================================================
// Rendering
//==============================================================================

function mainSections(artifact: SourceArtifact): string[] {
	const { sections } = artifact;
	return [
		sections.prelude,
		sections.stateType,
		...sections.nodes.values(),
		...sections.routers.values(),
		sections.dispatch,
	];
}

/**
 * Concatenate an artifact into one source file: prelude, state type, node
 * stubs, router stubs, dispatch, and for Rust the test module. TypeScript
 * tests live in their own module (see `artifactFiles`).
 */
export function renderArtifact(artifact: SourceArtifact): string {
	const parts = mainSections(artifact);
	if (artifact.target === "rust" && artifact.sections.tests !== "") {
		parts.push(artifact.sections.tests);
	}
	return parts.join("\n\n") + "\n";
}

/** File name -> contents, relative to the output directory. */
export function artifactFiles(artifact: SourceArtifact): Map<string, string> {
	const files = new Map<string, string>();
	switch (artifact.target) {
	case "rust":
		files.set(artifact.moduleName + ".rs", renderArtifact(artifact));
		break;
	case "typescript":
		files.set(artifact.moduleName + ".ts", renderArtifact(artifact));
		if (artifact.sections.tests !== "") {
			files.set(artifact.moduleName + ".test.ts", artifact.sections.tests + "\n");
		}
		break;
	}
	return files;
}
