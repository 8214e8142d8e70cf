/**
 * @webpuppet/mcp — protocol-tier error taxonomy.
 *
 * Every failure that ends up as a JSON-RPC error object is an McpError with
 * a `kind`. {@link errorCode} maps each kind to exactly one numeric code and
 * is the only place those codes are chosen.
 */

import { PermissionDeniedError, ValidationError, WebpuppetError, errorMessage } from "@webpuppet/core";
import type { JsonRpcError } from "./types.js";

export type McpErrorKind =
	| "parse"
	| "invalid_request"
	| "method_not_found"
	| "invalid_params"
	| "internal"
	| "serialization"
	| "permission_denied"
	| "automation"
	| "io"
	| "tool_not_found";

// ─── Codes ──────────────────────────────────────────────────────────────────

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;

/** Application range. */
export const PERMISSION_DENIED = -32000;
export const AUTOMATION_ERROR = -32001;
export const IO_ERROR = -32002;
export const TOOL_NOT_FOUND = -32003;

// ─── Errors ─────────────────────────────────────────────────────────────────

/**
 * Base class for all protocol-tier errors.
 */
export class McpError extends WebpuppetError {
	readonly kind: McpErrorKind;

	constructor(kind: McpErrorKind, message: string, cause?: unknown) {
		super(message, `MCP_${kind.toUpperCase()}`, cause);
		this.name = "McpError";
		this.kind = kind;
	}
}

export class McpParseError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("parse", `parse error: ${detail}`, cause);
		this.name = "McpParseError";
	}
}

export class McpInvalidRequestError extends McpError {
	constructor(detail: string) {
		super("invalid_request", `invalid request: ${detail}`);
		this.name = "McpInvalidRequestError";
	}
}

export class McpMethodNotFoundError extends McpError {
	constructor(readonly method: string) {
		super("method_not_found", `method not found: ${method}`);
		this.name = "McpMethodNotFoundError";
	}
}

export class McpInvalidParamsError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("invalid_params", `invalid parameters: ${detail}`, cause);
		this.name = "McpInvalidParamsError";
	}
}

export class McpInternalError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("internal", `internal error: ${detail}`, cause);
		this.name = "McpInternalError";
	}
}

export class McpSerializationError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("serialization", `serialization error: ${detail}`, cause);
		this.name = "McpSerializationError";
	}
}

export class McpPermissionDeniedError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("permission_denied", `permission denied: ${detail}`, cause);
		this.name = "McpPermissionDeniedError";
	}
}

/** A call into the automation engine failed. */
export class McpAutomationError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("automation", `automation error: ${detail}`, cause);
		this.name = "McpAutomationError";
	}
}

/** Reading from or writing to the transport failed. */
export class McpIoError extends McpError {
	constructor(detail: string, cause?: unknown) {
		super("io", `I/O error: ${detail}`, cause);
		this.name = "McpIoError";
	}
}

export class McpToolNotFoundError extends McpError {
	constructor(readonly toolName: string) {
		super("tool_not_found", `tool not found: ${toolName}`);
		this.name = "McpToolNotFoundError";
	}
}

// ─── Mapping ────────────────────────────────────────────────────────────────

/** The JSON-RPC code for an error. Total over {@link McpErrorKind}. */
export function errorCode(error: McpError): number {
	const kind = error.kind;
	switch (kind) {
		case "parse":
			return PARSE_ERROR;
		case "invalid_request":
			return INVALID_REQUEST;
		case "method_not_found":
			return METHOD_NOT_FOUND;
		case "invalid_params":
			return INVALID_PARAMS;
		case "internal":
		case "serialization":
			return INTERNAL_ERROR;
		case "permission_denied":
			return PERMISSION_DENIED;
		case "automation":
			return AUTOMATION_ERROR;
		case "io":
			return IO_ERROR;
		case "tool_not_found":
			return TOOL_NOT_FOUND;
		default: {
			const unreachable: never = kind;
			throw new Error(`unhandled error kind: ${String(unreachable)}`);
		}
	}
}

/**
 * Wrap any thrown value as an McpError. Foundation errors keep their
 * meaning; anything else becomes an internal error carrying the original
 * as `cause`.
 */
export function toMcpError(err: unknown): McpError {
	if (err instanceof McpError) return err;
	if (err instanceof PermissionDeniedError) return new McpPermissionDeniedError(err.message, err);
	if (err instanceof ValidationError) return new McpInvalidParamsError(err.message, err);
	return new McpInternalError(errorMessage(err), err);
}

/**
 * The wire form of any thrown value: code and message only, never a stack.
 */
export function toJsonRpcError(err: unknown): JsonRpcError {
	const mcp = toMcpError(err);
	return { code: errorCode(mcp), message: mcp.message };
}
