/**
 * @webpuppet/mcp — name-keyed tool table.
 *
 * A pure dispatch table: no policy lives here. Each tool consults the
 * permission gate itself.
 */

import { createLogger } from "@webpuppet/core";
import type { Logger } from "@webpuppet/core";
import { McpToolNotFoundError } from "./mcp-errors.js";
import type { ToolContext } from "./tool-context.js";
import type { McpTool, ToolCallResult, ToolDefinition } from "./types.js";

export class ToolRegistry {
	readonly context: ToolContext;
	private readonly tools = new Map<string, McpTool>();
	private readonly log: Logger;

	constructor(context: ToolContext, tools: McpTool[] = [], logger?: Logger) {
		this.context = context;
		this.log = logger ?? createLogger("mcp:tools");
		for (const tool of tools) {
			this.register(tool);
		}
	}

	/**
	 * Add a tool. A tool with the same name is replaced (last write wins)
	 * and keeps its position in {@link listTools}.
	 */
	register(tool: McpTool): void {
		const name = tool.definition.name;
		if (this.tools.has(name)) {
			this.log.warn("Replacing registered tool", { tool: name });
		}
		this.tools.set(name, tool);
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	get size(): number {
		return this.tools.size;
	}

	/** Definitions in registration order. */
	listTools(): ToolDefinition[] {
		return Array.from(this.tools.values(), (tool) => tool.definition);
	}

	/**
	 * Run a tool with the shared context.
	 *
	 * @throws {McpToolNotFoundError} When no tool has that name.
	 */
	async execute(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
		const tool = this.tools.get(name);
		if (!tool) {
			throw new McpToolNotFoundError(name);
		}
		return tool.execute(args, this.context);
	}
}
