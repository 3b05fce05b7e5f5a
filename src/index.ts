// stategraph-codegen
// Converts introspected workflow graphs into statically typed source code.

// IR
export * from "./types.js";
export * from "./errors.js";
export {
	IntrospectedGraphSchema,
	JsonValueSchema,
	type IntrospectedGraph,
} from "./zod-schemas.js";

// Ingest
export { parseTypeAnnotation } from "./ingest/type-annotation.js";
export { parseIntrospectedGraph, validateIntrospectedGraph } from "./ingest/introspection.js";
export { assertValidGraph, validateGraph } from "./validator.js";

// Core
export {
	RESERVED_WORDS,
	SymbolTable,
	isReservedWord,
	isValidIdentifier,
	reservedWordsFor,
	sanitize,
	type TargetLanguage,
} from "./identifiers/sanitize.js";
export * from "./type-mapper.js";
export * from "./topology/resolver.js";

// Emission
export type { EmitOptions, SourceArtifact, SourceSections } from "./synth/shared.js";
export { emitRust, renderRustType } from "./synth/rust.js";
export { emitTypeScript, renderTypeScriptType } from "./synth/typescript.js";
export { generateCargoManifest, type ManifestOptions } from "./synth/manifest.js";
export {
	artifactFiles,
	convert,
	convertDocument,
	renderArtifact,
	type ConversionResult,
} from "./pipeline.js";

// Ambient
export {
	ConversionOptionsSchema,
	resolveConfig,
	type ConversionConfig,
	type ConversionOptions,
} from "./config.js";
export { createLogger, silentLogger, type LogLevel, type Logger, type LogSink } from "./logger.js";
export { canonicalize, graphDigest, graphToJson } from "./canonicalize.js";
export { toDot, toMermaid } from "./visualize.js";
