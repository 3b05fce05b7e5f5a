// Conversion Error Types
// Fatal graph errors, non-fatal diagnostics, and validation results

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Topology errors
	UnreachableEntry: "UnreachableEntry",
	DanglingEdge: "DanglingEdge",
	UnknownEntryPoint: "UnknownEntryPoint",

	// Resource limits
	GraphTooLarge: "GraphTooLarge",

	// Validation errors
	InvalidGraph: "InvalidGraph",
	InvalidOptions: "InvalidOptions",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

function formatValidationError(error: ValidationError): string {
	const suffix = error.value !== undefined ? " (value: " + JSON.stringify(error.value) + ")" : "";
	return error.path + ": " + error.message + suffix;
}

//==============================================================================
// Graph Error Class
//==============================================================================

export class GraphError extends Error {
	readonly code: ErrorCode;
	/** Offending node id, edge (`from -> to`) or limit name */
	readonly subject?: string;
	readonly details: readonly ValidationError[];

	constructor(
		code: ErrorCode,
		message: string,
		subject?: string,
		details: readonly ValidationError[] = [],
	) {
		super(message);
		this.name = "GraphError";
		this.code = code;
		if (subject !== undefined) this.subject = subject;
		this.details = details;
	}

	/**
	 * The entry point cannot start a run that ever finishes.
	 */
	static unreachableEntry(entry: string, reason: string): GraphError {
		return new GraphError(
			ErrorCodes.UnreachableEntry,
			"Entry point \"" + entry + "\" " + reason,
			entry,
		);
	}

	/**
	 * An edge names a node that was never declared.
	 */
	static danglingEdge(from: string, to: string, missing: string): GraphError {
		return new GraphError(
			ErrorCodes.DanglingEdge,
			"Edge " + from + " -> " + to + " references undeclared node \"" + missing + "\"",
			from + " -> " + to,
		);
	}

	static unknownEntryPoint(entry: string): GraphError {
		return new GraphError(
			ErrorCodes.UnknownEntryPoint,
			"Entry point \"" + entry + "\" is not a declared node",
			entry,
		);
	}

	static graphTooLarge(what: "nodes" | "edges", count: number, limit: number): GraphError {
		return new GraphError(
			ErrorCodes.GraphTooLarge,
			"Graph has " + String(count) + " " + what + ", limit is " + String(limit),
			what,
		);
	}

	static invalidGraph(errors: readonly ValidationError[]): GraphError {
		const lines = errors.map(formatValidationError);
		return new GraphError(
			ErrorCodes.InvalidGraph,
			"Invalid graph:\n  " + lines.join("\n  "),
			undefined,
			errors,
		);
	}

	static invalidOptions(errors: readonly ValidationError[]): GraphError {
		const lines = errors.map(formatValidationError);
		return new GraphError(
			ErrorCodes.InvalidOptions,
			"Invalid conversion options:\n  " + lines.join("\n  "),
			undefined,
			errors,
		);
	}
}

export function isGraphError(error: unknown): error is GraphError {
	return error instanceof GraphError;
}

//==============================================================================
// Diagnostics (non-fatal)
//==============================================================================

export const DiagnosticCodes = {
	OpaqueFallback: "OpaqueFallback",
	UnreachableNode: "UnreachableNode",
	DeadEdge: "DeadEdge",
	ImplicitTerminal: "ImplicitTerminal",
	DefaultIgnored: "DefaultIgnored",
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export type FallbackReason = "opaque" | "unhashable-key";

export type DeadEdgeReason =
	| "shadowed-by-conditional"
	| "duplicate-unconditional"
	| "duplicate-conditional";

interface DiagnosticBase {
	severity: "warning";
	message: string;
}

export interface OpaqueFallbackDiagnostic extends DiagnosticBase {
	code: "OpaqueFallback";
	field: string;
	/** Position inside the field's descriptor, e.g. `scores.value` */
	path: string;
	reason: FallbackReason;
}

export interface UnreachableNodeDiagnostic extends DiagnosticBase {
	code: "UnreachableNode";
	nodeId: string;
}

export interface DeadEdgeDiagnostic extends DiagnosticBase {
	code: "DeadEdge";
	from: string;
	/** Target node, or the router name for a dead conditional edge */
	to: string;
	reason: DeadEdgeReason;
}

export interface ImplicitTerminalDiagnostic extends DiagnosticBase {
	code: "ImplicitTerminal";
	nodeId: string;
}

export interface DefaultIgnoredDiagnostic extends DiagnosticBase {
	code: "DefaultIgnored";
	field: string;
}

export type Diagnostic =
	| OpaqueFallbackDiagnostic
	| UnreachableNodeDiagnostic
	| DeadEdgeDiagnostic
	| ImplicitTerminalDiagnostic
	| DefaultIgnoredDiagnostic;

export function opaqueFallback(
	field: string,
	path: string,
	reason: FallbackReason,
	detail: string,
): OpaqueFallbackDiagnostic {
	const why = reason === "opaque"
		? "unrepresentable type " + detail
		: "mapping key " + detail + " is not hashable";
	return {
		code: DiagnosticCodes.OpaqueFallback,
		severity: "warning",
		message: "Field \"" + field + "\" at " + path + ": " + why + "; using dynamic value",
		field,
		path,
		reason,
	};
}

export function unreachableNode(nodeId: string, entry: string): UnreachableNodeDiagnostic {
	return {
		code: DiagnosticCodes.UnreachableNode,
		severity: "warning",
		message: "Node \"" + nodeId + "\" is unreachable from entry point \"" + entry + "\"",
		nodeId,
	};
}

const DEAD_EDGE_WHY: Record<DeadEdgeReason, string> = {
	"shadowed-by-conditional": "the node's conditional edge takes precedence",
	"duplicate-unconditional": "an earlier unconditional edge from the same node wins",
	"duplicate-conditional": "an earlier conditional edge from the same node wins",
};

export function deadEdge(from: string, to: string, reason: DeadEdgeReason): DeadEdgeDiagnostic {
	return {
		code: DiagnosticCodes.DeadEdge,
		severity: "warning",
		message: "Edge " + from + " -> " + to + " is never taken: " + DEAD_EDGE_WHY[reason],
		from,
		to,
		reason,
	};
}

export function implicitTerminal(nodeId: string): ImplicitTerminalDiagnostic {
	return {
		code: DiagnosticCodes.ImplicitTerminal,
		severity: "warning",
		message: "Node \"" + nodeId + "\" has no outgoing edge; the run ends after it",
		nodeId,
	};
}

export function defaultIgnored(field: string, expected: string): DefaultIgnoredDiagnostic {
	return {
		code: DiagnosticCodes.DefaultIgnored,
		severity: "warning",
		message: "Default value of field \"" + field + "\" does not fit " + expected + "; using the empty value",
		field,
	};
}

export function formatDiagnostic(d: Diagnostic): string {
	return d.severity + "[" + d.code + "]: " + d.message;
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (type.kind) {
 *   case "text": return ...;
 *   case "int64": return ...;
 *   default:
 *     exhaustive(type); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
