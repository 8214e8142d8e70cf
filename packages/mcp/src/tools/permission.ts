/**
 * Permission check tool: ask the policy about an operation without doing it.
 */

import { v } from "@webpuppet/core";
import { OPERATIONS, parseOperation } from "@webpuppet/guard";
import type { McpTool } from "../types.js";
import { parseArgs, textResult } from "./shared.js";

const permissionArgs = v.object({
	operation: v.string().validate,
	url: v.optional(v.string().validate).validate,
}).validate;

/** Create the `webpuppet_check_permission` tool. */
export function createCheckPermissionTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_check_permission",
			description: "Check if an operation is allowed by the security policy.",
			inputSchema: {
				type: "object",
				properties: {
					operation: {
						type: "string",
						description: `Operation to check. One of: ${OPERATIONS.join(", ")}.`,
					},
					url: { type: "string", description: "Optional target URL to check as well." },
				},
				required: ["operation"],
			},
		},
		async execute(args, ctx) {
			const parsed = parseArgs("webpuppet_check_permission", args, permissionArgs);
			const operation = parseOperation(parsed.operation);
			if (!operation) {
				return textResult(
					`Unknown operation: \`${parsed.operation}\`\n\nValid operations: ${OPERATIONS.join(", ")}`,
					true,
				);
			}

			const decision = parsed.url === undefined
				? ctx.permissions.check(operation)
				: ctx.permissions.checkWithUrl(operation, parsed.url);

			const status = decision.allowed ? "✅ ALLOWED" : "❌ DENIED";
			return textResult(
				`# Permission Check\n\n` +
				`**Operation**: \`${operation}\`\n` +
				`**Status**: ${status}\n` +
				`**Reason**: ${decision.reason}\n` +
				`**Risk Level**: ${decision.riskLevel}/10`,
			);
		},
	};
}
