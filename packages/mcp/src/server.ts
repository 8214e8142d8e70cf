/**
 * @webpuppet/mcp — MCP Server.
 *
 * Owns the protocol lifecycle, routes requests and notifications, and runs
 * the sequential read-eval-respond loop over a {@link LineTransport}.
 */

import { check, createLogger, v } from "@webpuppet/core";
import type { Logger } from "@webpuppet/core";
import { createErrorResponse, createResponse, parseMessage, serializeMessage } from "./jsonrpc.js";
import {
	McpInternalError,
	McpInvalidParamsError,
	McpMethodNotFoundError,
	toJsonRpcError,
} from "./mcp-errors.js";
import { RwLock } from "./rw-lock.js";
import { ToolRegistry } from "./tool-registry.js";
import type { ToolContext } from "./tool-context.js";
import { builtinTools } from "./tools/index.js";
import type { LineTransport } from "./transport/stdio.js";
import type {
	ClientInfo,
	InitializeResult,
	JsonRpcNotification,
	JsonRpcRequest,
	JsonRpcResponse,
	McpTool,
	ServerState,
} from "./types.js";
import { PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION } from "./version.js";

export interface McpServerOptions {
	context: ToolContext;
	/** Defaults to {@link builtinTools}. */
	tools?: McpTool[];
	logger?: Logger;
}

const initializeParams = v.object({
	protocolVersion: v.string().validate,
	capabilities: v.record().validate,
	clientInfo: v.object({
		name: v.string().validate,
		version: v.string().validate,
	}).validate,
}).validate;

const toolsCallParams = v.object({
	name: v.string().min(1).validate,
	arguments: v.optional(v.record().validate).validate,
}).validate;

/**
 * MCP server over line-delimited JSON-RPC 2.0.
 *
 * @example
 * ```ts
 * const server = new McpServer({ context: new ToolContext({ permissions: PermissionGuard.secure() }) });
 * await server.run(new StdioLineTransport());
 * ```
 */
export class McpServer {
	readonly registry: ToolRegistry;
	private readonly state = new RwLock<ServerState>("uninitialized");
	private client: { info: ClientInfo; capabilities: Record<string, unknown> } | null = null;
	private readonly log: Logger;

	constructor(opts: McpServerOptions) {
		this.log = opts.logger ?? createLogger("mcp:server");
		this.registry = new ToolRegistry(opts.context, opts.tools ?? builtinTools(), this.log.child("tools"));
	}

	/** Current lifecycle state. */
	async getState(): Promise<ServerState> {
		return this.state.read((state) => state);
	}

	/** What the peer reported in its last `initialize`, or null before one. */
	get clientInfo(): ClientInfo | null {
		return this.client?.info ?? null;
	}

	/** Capabilities the peer declared in its last `initialize`. */
	get clientCapabilities(): Record<string, unknown> | null {
		return this.client?.capabilities ?? null;
	}

	// ─── Message Handling ─────────────────────────────────────────────────

	/**
	 * Handle one incoming line. Requests (and unreadable lines) produce a
	 * response; notifications and inbound responses produce null. A rejected
	 * line is answered with its own id when that id could be read.
	 */
	async handleMessage(line: string): Promise<JsonRpcResponse | null> {
		const parsed = parseMessage(line);
		switch (parsed.kind) {
			case "invalid": {
				const error = toJsonRpcError(parsed.error);
				this.log.warn("Rejected malformed message", { reason: error.message });
				return createErrorResponse(parsed.id, error.code, error.message);
			}
			case "request":
				return this.handleRequest(parsed.message);
			case "notification":
				await this.handleNotification(parsed.message);
				return null;
			case "response":
				this.log.debug("Ignoring inbound response", { id: parsed.message.id });
				return null;
		}
	}

	private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
		this.log.debug("Request", { method: request.method, id: request.id });
		try {
			const result = await this.dispatch(request.method, request.params);
			return createResponse(request.id, result);
		} catch (err) {
			const error = toJsonRpcError(err);
			return createErrorResponse(request.id, error.code, error.message);
		}
	}

	private async dispatch(method: string, params: unknown): Promise<unknown> {
		switch (method) {
			case "initialize":
				return this.handleInitialize(params);
			case "tools/list":
				await this.requireReady();
				return { tools: this.registry.listTools() };
			case "tools/call":
				await this.requireReady();
				return this.handleToolsCall(params);
			case "ping":
				return {};
			case "shutdown":
				await this.state.write((slot) => {
					slot.value = "shutting_down";
				});
				this.log.info("Shutdown requested");
				return {};
			default:
				throw new McpMethodNotFoundError(method);
		}
	}

	private async requireReady(): Promise<void> {
		const ready = await this.state.read((state) => state === "ready");
		if (!ready) {
			throw new McpInternalError("server not initialized");
		}
	}

	/**
	 * A repeated `initialize` is accepted and replaces the stored client
	 * info. Initializing a server that is shutting down does not revive it.
	 */
	private async handleInitialize(params: unknown): Promise<InitializeResult> {
		if (params === undefined || params === null) {
			throw new McpInvalidParamsError("initialize params required");
		}
		const parsed = check(params, initializeParams, "initialize params");

		await this.state.write((slot) => {
			if (slot.value !== "shutting_down") slot.value = "ready";
		});
		this.client = { info: parsed.clientInfo, capabilities: parsed.capabilities };
		this.log.info("Client initialized", {
			client: parsed.clientInfo.name,
			clientVersion: parsed.clientInfo.version,
			protocolVersion: parsed.protocolVersion,
		});

		return {
			protocolVersion: PROTOCOL_VERSION,
			capabilities: { tools: { listChanged: false } },
			serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
		};
	}

	private async handleToolsCall(params: unknown): Promise<unknown> {
		const { name, arguments: args } = check(params, toolsCallParams, "tools/call params");
		this.log.debug("Calling tool", { tool: name });
		try {
			return await this.registry.execute(name, args ?? {});
		} catch (err) {
			this.log.error("Tool failed", err, { tool: name });
			throw err;
		}
	}

	private async handleNotification(notification: JsonRpcNotification): Promise<void> {
		switch (notification.method) {
			case "notifications/initialized":
				this.log.info("Client reported initialized");
				return;
			case "notifications/cancelled":
				this.log.info("Client cancelled a request", { requestId: cancelledRequestId(notification.params) });
				return;
			case "exit":
				await this.state.write((slot) => {
					slot.value = "shutting_down";
				});
				this.log.info("Exit requested");
				return;
			default:
				this.log.debug("Ignoring notification", { method: notification.method });
		}
	}

	// ─── Loop ─────────────────────────────────────────────────────────────

	/**
	 * Serve until input ends or the peer shuts the server down. Lines are
	 * handled one at a time and each response is flushed before the next
	 * read. The transport is closed and any automation released on the way
	 * out.
	 *
	 * @throws {McpIoError} When reading or writing the transport fails.
	 */
	async run(transport: LineTransport): Promise<void> {
		this.log.info("MCP server started", { version: SERVER_VERSION, tools: this.registry.size });
		try {
			for (;;) {
				const line = await transport.readLine();
				if (line === null) {
					this.log.info("Input closed");
					break;
				}
				if (line.trim() === "") continue;

				const response = await this.handleMessage(line);
				if (response) {
					await transport.writeLine(serializeMessage(response));
				}
				if ((await this.getState()) === "shutting_down") break;
			}
		} catch (err) {
			this.log.error("Server loop failed", err);
			throw err;
		} finally {
			await transport.close();
			await this.registry.context.releaseAutomation();
			this.log.info("MCP server stopped");
		}
	}
}

function cancelledRequestId(params: unknown): unknown {
	if (typeof params === "object" && params !== null && "requestId" in params) {
		return params.requestId;
	}
	return undefined;
}
