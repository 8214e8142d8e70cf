import { describe, it, expect } from "vitest";
import { createResponse, createErrorResponse, parseMessage, serializeMessage } from "../src/jsonrpc.js";
import {
	McpInvalidRequestError,
	McpParseError,
	McpSerializationError,
	PARSE_ERROR,
	toJsonRpcError,
} from "../src/mcp-errors.js";
import type { JsonRpcId, JsonRpcResponse } from "../src/types.js";

/** Id, error class and message of an invalid classification. */
function rejection(line: string): { id: JsonRpcId | null; type: string; message: string } {
	const parsed = parseMessage(line);
	if (parsed.kind !== "invalid") throw new Error(`expected invalid, got ${parsed.kind}`);
	return { id: parsed.id, type: parsed.error.name, message: parsed.error.message };
}

/** Id plus which of result and error a response carries. */
function shape(response: JsonRpcResponse): { id: JsonRpcId | null; outcome: "result" | "error" } {
	return { id: response.id, outcome: "error" in response ? "error" : "result" };
}

describe("jsonrpc", () => {
	// ═══════════════════════════════════════════════════════════════════════
	// Message Factories
	// ═══════════════════════════════════════════════════════════════════════

	describe("createErrorResponse", () => {
		it("should include data only when given", () => {
			expect(createErrorResponse(1, -32601, "method not found: x")).toEqual({
				jsonrpc: "2.0",
				id: 1,
				error: { code: -32601, message: "method not found: x" },
			});
			expect(createErrorResponse(null, -32700, "bad", { at: 3 })).toEqual({
				jsonrpc: "2.0",
				id: null,
				error: { code: -32700, message: "bad", data: { at: 3 } },
			});
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Classification
	// ═══════════════════════════════════════════════════════════════════════

	describe("parseMessage", () => {
		it("should classify a request with a numeric id", () => {
			expect(parseMessage('{"jsonrpc":"2.0","id":1,"method":"ping"}')).toEqual({
				kind: "request",
				message: { jsonrpc: "2.0", id: 1, method: "ping" },
			});
		});

		it("should classify a request with a string id and params", () => {
			expect(parseMessage('{"jsonrpc":"2.0","id":"abc","method":"tools/call","params":{"name":"t"}}')).toEqual({
				kind: "request",
				message: { jsonrpc: "2.0", id: "abc", method: "tools/call", params: { name: "t" } },
			});
		});

		it("should treat a missing id as a notification", () => {
			expect(parseMessage('{"jsonrpc":"2.0","method":"exit"}')).toEqual({
				kind: "notification",
				message: { jsonrpc: "2.0", method: "exit" },
			});
		});

		it("should treat a null id as a notification", () => {
			expect(parseMessage('{"jsonrpc":"2.0","id":null,"method":"exit"}').kind).toBe("notification");
		});

		it("should tolerate a missing jsonrpc field", () => {
			expect(parseMessage('{"id":7,"method":"ping"}')).toEqual({
				kind: "request",
				message: { jsonrpc: "2.0", id: 7, method: "ping" },
			});
		});

		it("should reject a wrong jsonrpc version and keep the id", () => {
			expect(rejection('{"jsonrpc":"1.0","id":1,"method":"ping"}')).toEqual({
				id: 1,
				type: "McpInvalidRequestError",
				message: 'invalid request: unsupported jsonrpc version "1.0"',
			});
		});

		it("should report malformed JSON as a parse error with no id", () => {
			const parsed = parseMessage("{not json");
			if (parsed.kind !== "invalid") throw new Error(`expected invalid, got ${parsed.kind}`);
			expect(parsed.id).toBeNull();
			expect(parsed.error).toBeInstanceOf(McpParseError);
			expect(parsed.error.message.startsWith("parse error: ")).toBe(true);
			expect(toJsonRpcError(parsed.error).code).toBe(PARSE_ERROR);
		});

		it("should reject non-object documents", () => {
			expect(rejection("[1,2]")).toEqual({
				id: null,
				type: "McpInvalidRequestError",
				message: "invalid request: expected a JSON object",
			});
		});

		it("should reject fractional and boolean ids without echoing them", () => {
			const expected = { id: null, type: "McpInvalidRequestError", message: "invalid request: id must be a string or an integer" };
			expect(rejection('{"id":1.5,"method":"ping"}')).toEqual(expected);
			expect(rejection('{"id":true,"method":"ping"}')).toEqual(expected);
		});

		it("should reject a non-string method and keep the id", () => {
			expect(rejection('{"id":"m-1","method":5}')).toEqual({
				id: "m-1",
				type: "McpInvalidRequestError",
				message: "invalid request: method must be a string",
			});
		});

		it("should classify success and error responses", () => {
			expect(parseMessage('{"jsonrpc":"2.0","id":3,"result":{}}')).toEqual({
				kind: "response",
				message: { jsonrpc: "2.0", id: 3, result: {} },
			});
			expect(parseMessage('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"x"}}')).toEqual({
				kind: "response",
				message: { jsonrpc: "2.0", id: null, error: { code: -32700, message: "x" } },
			});
		});

		it("should reject a response with both result and error", () => {
			expect(rejection('{"id":1,"result":1,"error":{"code":1,"message":"m"}}')).toEqual({
				id: 1,
				type: "McpInvalidRequestError",
				message: "invalid request: response carries both result and error",
			});
		});

		it("should reject a malformed error object", () => {
			expect(rejection('{"id":1,"error":"boom"}')).toEqual({
				id: 1,
				type: "McpInvalidRequestError",
				message: "invalid request: malformed error object",
			});
		});

		it("should reject objects that are none of the three", () => {
			const parsed = parseMessage('{"id":1}');
			if (parsed.kind !== "invalid") throw new Error(`expected invalid, got ${parsed.kind}`);
			expect(parsed.id).toBe(1);
			expect(parsed.error).toBeInstanceOf(McpInvalidRequestError);
			expect(parsed.error.message).toBe("invalid request: not a request, notification or response");
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Serialization
	// ═══════════════════════════════════════════════════════════════════════

	describe("serializeMessage", () => {
		it("should produce a single line without a trailing newline", () => {
			const line = serializeMessage(createResponse(1, { text: "a\nb" }));
			expect(line).toBe('{"jsonrpc":"2.0","id":1,"result":{"text":"a\\nb"}}');
			expect(line.includes("\n")).toBe(false);
		});

		it("should parse back to the same request", () => {
			const request = {
				jsonrpc: "2.0" as const,
				id: "req-1",
				method: "tools/call",
				params: { name: "webpuppet_pause", arguments: {} },
			};
			expect(parseMessage(serializeMessage(request))).toEqual({ kind: "request", message: request });
		});

		it("should keep id and outcome of every response the server sends", () => {
			const responses = [
				createResponse(7, { tools: [] }),
				createResponse("call-2", { content: [{ type: "text", text: "ok" }], isError: false }),
				createErrorResponse(3, -32601, "method not found: nope"),
				createErrorResponse(null, -32700, "parse error: Unexpected token"),
			];
			for (const response of responses) {
				const parsed = parseMessage(serializeMessage(response));
				if (parsed.kind !== "response") throw new Error(`expected response, got ${parsed.kind}`);
				expect(shape(parsed.message)).toEqual(shape(response));
				expect(parsed.message).toEqual(response);
			}
		});

		it("should wrap unserialisable payloads", () => {
			const cyclic: Record<string, unknown> = {};
			cyclic.self = cyclic;
			expect(() => serializeMessage(createResponse(1, cyclic))).toThrow(McpSerializationError);
		});
	});
});
