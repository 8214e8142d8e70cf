/**
 * Provider catalog tools.
 */

import { v } from "@webpuppet/core";
import { PROVIDERS, PROVIDER_IDS, parseProvider } from "../providers.js";
import { McpInvalidParamsError } from "../mcp-errors.js";
import type { McpTool } from "../types.js";
import { parseArgs, requirePermission, textResult } from "./shared.js";

// ─── List Providers ─────────────────────────────────────────────────────────

/** Create the `webpuppet_list_providers` tool. Needs no automation. */
export function createListProvidersTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_list_providers",
			description: "List available AI providers and their status.",
			inputSchema: { type: "object", properties: {} },
		},
		async execute() {
			const list = PROVIDERS.map(
				(p) => `- **${p.displayName}** (\`${p.id}\`): [${p.url}](${p.url})\n  _${p.features}_`,
			).join("\n");

			return textResult(
				`# Available Providers\n\n${list}\n\n*Note: Uses browser sessions; some providers require login.*`,
			);
		},
	};
}

// ─── Provider Capabilities ──────────────────────────────────────────────────

const capabilitiesArgs = v.object({
	provider: v.string().min(1).validate,
}).validate;

/** Create the `webpuppet_provider_capabilities` tool. */
export function createProviderCapabilitiesTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_provider_capabilities",
			description:
				"Get declared capabilities for a provider/tool " +
				"(conversation, vision, file upload, web search, etc).",
			inputSchema: {
				type: "object",
				properties: {
					provider: {
						type: "string",
						enum: [...PROVIDER_IDS],
						description: "Provider to describe.",
					},
				},
				required: ["provider"],
			},
		},
		async execute(args, ctx) {
			const parsed = parseArgs("webpuppet_provider_capabilities", args, capabilitiesArgs);
			const provider = parseProvider(parsed.provider);
			requirePermission(ctx.permissions, "ReadContent");

			const caps = await ctx.withAutomation(async (automation) => automation.providerCapabilities(provider));
			if (!caps) {
				throw new McpInvalidParamsError(`provider not available: ${provider}`);
			}

			const body = {
				provider,
				capabilities: {
					conversation: caps.conversation,
					vision: caps.vision,
					file_upload: caps.fileUpload,
					code_execution: caps.codeExecution,
					web_search: caps.webSearch,
					max_context: caps.maxContext,
					models: caps.models,
					note: "Declared capabilities (not runtime UI detection).",
				},
			};
			return textResult(JSON.stringify(body, null, 2));
		},
	};
}
