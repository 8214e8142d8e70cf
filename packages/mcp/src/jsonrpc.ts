/**
 * @webpuppet/mcp — JSON-RPC 2.0 codec.
 *
 * Response factories, a one-shot classifier for incoming lines and a
 * serializer. Framing (one document per line) belongs to the
 * transport, so nothing here deals with newlines.
 */

import { isPlainObject } from "@webpuppet/core";
import { McpInvalidRequestError, McpParseError, McpSerializationError } from "./mcp-errors.js";
import type { JsonRpcError, JsonRpcId, JsonRpcMessage, JsonRpcResponse, ParsedMessage } from "./types.js";

// ─── Response Factories ─────────────────────────────────────────────────────

export function createResponse(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
	return { jsonrpc: "2.0", id, result };
}

export function createErrorResponse(
	id: JsonRpcId | null,
	code: number,
	message: string,
	data?: unknown,
): JsonRpcResponse {
	const error: JsonRpcError = { code, message };
	if (data !== undefined) {
		error.data = data;
	}
	return { jsonrpc: "2.0", id, error };
}

// ─── Classification ─────────────────────────────────────────────────────────

function isId(value: unknown): value is JsonRpcId {
	return typeof value === "string" || (typeof value === "number" && Number.isInteger(value));
}

function invalid(detail: string, id: JsonRpcId | null = null): ParsedMessage {
	return { kind: "invalid", id, error: new McpInvalidRequestError(detail) };
}

function readError(value: unknown): JsonRpcError | null {
	if (!isPlainObject(value)) return null;
	if (typeof value.code !== "number" || typeof value.message !== "string") return null;
	return {
		code: value.code,
		message: value.message,
		...(value.data !== undefined ? { data: value.data } : {}),
	};
}

/**
 * Parse and classify one incoming line.
 *
 * - object with a string `method`: a request when `id` is present and not
 *   null, otherwise a notification
 * - object with `result` or `error` and no `method`: a response
 * - anything else: invalid, carrying an {@link McpParseError} for malformed
 *   JSON and an {@link McpInvalidRequestError} otherwise, plus the message's
 *   id when it is readable
 *
 * A missing `jsonrpc` field is tolerated; a wrong one is not.
 */
export function parseMessage(line: string): ParsedMessage {
	let parsed: unknown;
	try {
		parsed = JSON.parse(line);
	} catch (err) {
		return {
			kind: "invalid",
			id: null,
			error: new McpParseError(err instanceof Error ? err.message : String(err), err),
		};
	}

	if (!isPlainObject(parsed)) {
		return invalid("expected a JSON object");
	}
	const readableId = isId(parsed.id) ? parsed.id : null;
	if (parsed.jsonrpc !== undefined && parsed.jsonrpc !== "2.0") {
		return invalid(`unsupported jsonrpc version ${JSON.stringify(parsed.jsonrpc)}`, readableId);
	}

	if ("method" in parsed) {
		const method = parsed.method;
		if (typeof method !== "string") {
			return invalid("method must be a string", readableId);
		}
		const params = parsed.params;
		const id = parsed.id;

		if (id === undefined || id === null) {
			return {
				kind: "notification",
				message: { jsonrpc: "2.0", method, ...(params !== undefined ? { params } : {}) },
			};
		}
		if (!isId(id)) {
			return invalid("id must be a string or an integer");
		}
		return {
			kind: "request",
			message: { jsonrpc: "2.0", id, method, ...(params !== undefined ? { params } : {}) },
		};
	}

	const hasResult = "result" in parsed;
	const hasError = "error" in parsed;
	if (hasResult || hasError) {
		if (hasResult && hasError) {
			return invalid("response carries both result and error", readableId);
		}
		const rawId = parsed.id ?? null;
		let id: JsonRpcId | null = null;
		if (rawId !== null) {
			if (!isId(rawId)) {
				return invalid("id must be a string or an integer");
			}
			id = rawId;
		}
		if (hasResult) {
			return { kind: "response", message: { jsonrpc: "2.0", id, result: parsed.result } };
		}
		const error = readError(parsed.error);
		if (!error) {
			return invalid("malformed error object", readableId);
		}
		return { kind: "response", message: { jsonrpc: "2.0", id, error } };
	}

	return invalid("not a request, notification or response", readableId);
}

// ─── Serialization ──────────────────────────────────────────────────────────

/**
 * Serialize a message as one JSON document with no trailing newline.
 * The output always carries `jsonrpc: "2.0"`.
 *
 * @throws {McpSerializationError} When the payload cannot be represented as JSON.
 */
export function serializeMessage(message: JsonRpcMessage): string {
	try {
		return JSON.stringify({ ...message, jsonrpc: "2.0" });
	} catch (err) {
		throw new McpSerializationError(err instanceof Error ? err.message : String(err), err);
	}
}
