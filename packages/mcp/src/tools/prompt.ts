/**
 * Prompt tool: send a message to an AI provider through its browser session.
 */

import { createLogger, v } from "@webpuppet/core";
import { callAutomation } from "../tool-context.js";
import { PROVIDER_IDS, parseProvider } from "../providers.js";
import type { PromptRequest } from "../collaborators.js";
import type { McpTool } from "../types.js";
import { parseArgs, requirePermission, textResult } from "./shared.js";

const log = createLogger("mcp:prompt");

const promptArgs = v.object({
	provider: v.string().min(1).validate,
	message: v.string().min(1).validate,
	context: v.optional(v.string().validate).validate,
}).validate;

/**
 * Create the `webpuppet_prompt` tool.
 *
 * Screening is fail-open: a response that fails screening is still
 * returned, prefixed with a warning carrying the risk score. The automation
 * handle is released after every prompt.
 */
export function createPromptTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_prompt",
			description:
				"Send a prompt through browser automation (AI providers + select web tools). " +
				"Uses existing authenticated sessions.",
			inputSchema: {
				type: "object",
				properties: {
					provider: {
						type: "string",
						enum: [...PROVIDER_IDS],
						description: "AI provider to send the prompt to.",
					},
					message: { type: "string", description: "The prompt text." },
					context: { type: "string", description: "Optional context or system instructions." },
				},
				required: ["provider", "message"],
			},
		},
		async execute(args, ctx) {
			const parsed = parseArgs("webpuppet_prompt", args, promptArgs);
			const provider = parseProvider(parsed.provider);
			requirePermission(ctx.permissions, "SendPrompt");

			const request: PromptRequest = { message: parsed.message };
			if (parsed.context !== undefined) request.context = parsed.context;

			try {
				const { response, screening } = await ctx.withAutomation(async (automation) => {
					await callAutomation(`authenticating with ${provider}`, () => automation.authenticate(provider));
					return callAutomation(`prompting ${provider}`, () => automation.promptScreened(provider, request));
				});

				if (!screening.passed) {
					log.warn("Response failed screening", { provider, riskScore: screening.riskScore });
					return textResult(
						`[SECURITY WARNING: Response had risk score ${screening.riskScore.toFixed(2)}]\n\n${response.text}`,
					);
				}
				return textResult(response.text);
			} finally {
				await ctx.releaseAutomation();
			}
		},
	};
}
