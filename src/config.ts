// Conversion Options
// Caller-facing options, validated with zod and completed with defaults.

import { z } from "zod/v4";
import { GraphError } from "./errors.js";
import type { Logger } from "./logger.js";
import { DEFAULT_MAX_EDGES, DEFAULT_MAX_NODES } from "./topology/resolver.js";
import { zodToValidationErrors } from "./zod-schemas.js";

function isLogger(value: unknown): value is Logger {
	if (typeof value !== "object" || value === null) return false;
	return ["debug", "info", "warn", "error"].every(
		(method) => method in value && typeof Reflect.get(value, method) === "function",
	);
}

export const ConversionOptionsSchema = z.object({
	target: z.enum(["rust", "typescript"]).default("rust"),
	/** Base name of the generated module; also the Cargo package name */
	moduleName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an identifier").optional(),
	stateTypeName: z.string().min(1).optional(),
	includeTests: z.boolean().default(true),
	/** Opaque annotation hint -> target type name */
	customTypes: z.record(z.string(), z.string().min(1)).default({}),
	maxNodes: z.number().int().positive().default(DEFAULT_MAX_NODES),
	maxEdges: z.number().int().positive().default(DEFAULT_MAX_EDGES),
	logger: z.custom<Logger>(isLogger, "must implement debug, info, warn and error").optional(),
});

/** Options as callers write them; every key may be left out. */
export type ConversionOptions = z.input<typeof ConversionOptionsSchema>;

/** Options after defaults are applied. */
export type ConversionConfig = z.output<typeof ConversionOptionsSchema>;

/**
 * @throws GraphError with code `InvalidOptions`
 */
export function resolveConfig(options: unknown = {}): ConversionConfig {
	const parsed = ConversionOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw GraphError.invalidOptions(zodToValidationErrors(parsed.error));
	}
	return parsed.data;
}
