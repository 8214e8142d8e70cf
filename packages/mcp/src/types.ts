/**
 * @webpuppet/mcp — JSON-RPC 2.0 and MCP protocol types.
 */

import type { McpInvalidRequestError, McpParseError } from "./mcp-errors.js";
import type { ToolContext } from "./tool-context.js";

// ─── JSON-RPC 2.0 ──────────────────────────────────────────────────────────

/** Request id. Uniqueness is the peer's business. */
export type JsonRpcId = string | number;

export interface JsonRpcRequest {
	jsonrpc: "2.0";
	id: JsonRpcId;
	method: string;
	params?: unknown;
}

export interface JsonRpcNotification {
	jsonrpc: "2.0";
	method: string;
	params?: unknown;
}

export interface JsonRpcError {
	code: number;
	message: string;
	data?: unknown;
}

export interface JsonRpcSuccess {
	jsonrpc: "2.0";
	/** Null only when the request id could not be read. */
	id: JsonRpcId | null;
	result: unknown;
}

export interface JsonRpcFailure {
	jsonrpc: "2.0";
	id: JsonRpcId | null;
	error: JsonRpcError;
}

/** A response carries exactly one of `result` or `error`. */
export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

/**
 * An incoming line, classified once at parse time.
 */
export type ParsedMessage =
	| { kind: "request"; message: JsonRpcRequest }
	| { kind: "notification"; message: JsonRpcNotification }
	| { kind: "response"; message: JsonRpcResponse }
	/** `id` is the message's own id when it could be read, else null. */
	| { kind: "invalid"; id: JsonRpcId | null; error: McpParseError | McpInvalidRequestError };

// ─── MCP Lifecycle ──────────────────────────────────────────────────────────

export type ServerState = "uninitialized" | "ready" | "shutting_down";

export interface ClientInfo {
	name: string;
	version: string;
}

export interface ServerCapabilities {
	tools: { listChanged: boolean };
}

export interface InitializeResult {
	protocolVersion: string;
	capabilities: ServerCapabilities;
	serverInfo: { name: string; version: string };
}

// ─── MCP Tools ──────────────────────────────────────────────────────────────

export interface ToolDefinition {
	name: string;
	description: string;
	/** JSON Schema describing the accepted arguments. */
	inputSchema: Record<string, unknown>;
}

export type ContentItem =
	| { type: "text"; text: string }
	| { type: "image"; data: string; mimeType: string }
	| { type: "resource"; resource: { uri: string; mimeType?: string; text?: string } };

/**
 * Outcome of a tool call. `isError: true` is a tool-level failure inside a
 * successful JSON-RPC response.
 */
export interface ToolCallResult {
	content: ContentItem[];
	isError: boolean;
}

/**
 * The contract every tool implements.
 *
 * `definition` is static; `execute` may reject with an `McpError`
 * (invalid params, permission denied, automation failure).
 */
export interface McpTool {
	readonly definition: ToolDefinition;
	execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolCallResult>;
}
