// Zod Schemas
// Structural schemas for documents that cross the process boundary: the
// introspector's serialized graph and the conversion options.
//
// Recursive shapes are typed manually and annotated with z.ZodType<T>;
// z.infer over z.lazy would erase them to `unknown`.

import { z } from "zod/v4";
import type { ValidationError } from "./errors.js";
import type { JsonValue } from "./types.js";

//==============================================================================
// JSON Values
//==============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([
		z.null(),
		z.boolean(),
		z.number(),
		z.string(),
		z.array(JsonValueSchema),
		z.record(z.string(), JsonValueSchema),
	]),
);

//==============================================================================
// Introspection Document
//==============================================================================

export const IntrospectedNodeSchema = z.object({
	name: z.string().min(1),
	func_name: z.string().min(1).optional(),
	signature: z.string().optional(),
	docstring: z.string().nullable().optional(),
	source_hint: z.string().nullable().optional(),
});

export const IntrospectedEdgeSchema = z.object({
	from: z.string().min(1),
	to: z.string().min(1),
	condition: z.string().nullable().optional(),
});

export const IntrospectedFieldSchema = z.object({
	name: z.string().min(1),
	type_name: z.string(),
	is_optional: z.boolean().default(false),
	default_value: JsonValueSchema.optional(),
});

export const IntrospectedConditionalEdgeSchema = z.object({
	condition_func: z.string().min(1),
	branches: z.record(z.string(), z.string().min(1)),
});

export const IntrospectedGraphSchema = z.object({
	name: z.string().min(1).optional(),
	nodes: z.array(IntrospectedNodeSchema),
	edges: z.array(IntrospectedEdgeSchema).default([]),
	state_schema: z.object({
		name: z.string().min(1).optional(),
		fields: z.array(IntrospectedFieldSchema),
	}),
	entry_point: z.string().optional(),
	conditional_edges: z.record(z.string(), IntrospectedConditionalEdgeSchema).default({}),
});

export type IntrospectedNode = z.infer<typeof IntrospectedNodeSchema>;
export type IntrospectedEdge = z.infer<typeof IntrospectedEdgeSchema>;
export type IntrospectedField = z.infer<typeof IntrospectedFieldSchema>;
export type IntrospectedConditionalEdge = z.infer<typeof IntrospectedConditionalEdgeSchema>;
export type IntrospectedGraph = z.infer<typeof IntrospectedGraphSchema>;

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

export function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map((issue) => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}
