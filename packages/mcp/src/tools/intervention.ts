/**
 * Human-in-the-loop tools: status, completion, pause and resume.
 */

import { v } from "@webpuppet/core";
import type { InterventionOutcome, InterventionState } from "../intervention.js";
import type { McpTool } from "../types.js";
import { parseArgs, textResult } from "./shared.js";

const STATE_LABELS: Record<InterventionState, string> = {
	running: "🟢 Running",
	waiting_for_human: "🟡 Waiting for human",
	resuming: "🔵 Resuming",
	timed_out: "🔴 Timed out",
	cancelled: "⚫ Cancelled",
};

function formatOutcome(outcome: InterventionOutcome): string {
	const status = outcome.success ? "success" : "failure";
	const message = outcome.message ? `: ${outcome.message}` : "";
	return `**Last Intervention**: ${status}${message} (${outcome.completedAt.toISOString()})`;
}

// ─── Status ─────────────────────────────────────────────────────────────────

/** Create the `webpuppet_intervention_status` tool. */
export function createInterventionStatusTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_intervention_status",
			description:
				"Check if human intervention is needed (captcha, 2FA, etc.). " +
				"Returns current automation state and any pending intervention reason.",
			inputSchema: { type: "object", properties: {} },
		},
		async execute(_args, ctx) {
			const snapshot = await ctx.intervention.read((handler) => ({
				state: handler.state(),
				reason: handler.currentReason(),
				outcome: handler.lastOutcome(),
			}));

			let text = `# Intervention Status\n\n**State**: ${STATE_LABELS[snapshot.state]}\n`;
			if (snapshot.reason) {
				text +=
					`**Reason**: ${snapshot.reason}\n\n` +
					"⚠️ **Action Required**: Please complete the intervention in the browser, " +
					"then call `webpuppet_intervention_complete` with success=true.";
			} else {
				text += "\nNo intervention currently required. Automation is running normally.";
			}
			if (snapshot.outcome) {
				text += `\n\n${formatOutcome(snapshot.outcome)}`;
			}
			return textResult(text);
		},
	};
}

// ─── Complete ───────────────────────────────────────────────────────────────

const completeArgs = v.object({
	success: v.boolean().validate,
	message: v.optional(v.string().validate).validate,
}).validate;

/** Create the `webpuppet_intervention_complete` tool. */
export function createInterventionCompleteTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_intervention_complete",
			description:
				"Signal that a human intervention (captcha, 2FA, etc.) has been completed. " +
				"Call this after manually handling the intervention in the browser.",
			inputSchema: {
				type: "object",
				properties: {
					success: { type: "boolean", description: "Whether the intervention was completed successfully." },
					message: { type: "string", description: "Optional note about what was done." },
				},
				required: ["success"],
			},
		},
		async execute(args, ctx) {
			const parsed = parseArgs("webpuppet_intervention_complete", args, completeArgs);
			const outcome = await ctx.intervention.write((slot) => slot.value.complete(parsed.success, parsed.message));

			return textResult(
				`# Intervention Complete\n\n` +
				`**Status**: ${outcome.success ? "✅ SUCCESS" : "❌ FAILED"}\n` +
				`**Message**: ${outcome.message ?? "None"}\n\n` +
				"Automation will now resume.",
			);
		},
	};
}

// ─── Pause / Resume ─────────────────────────────────────────────────────────

/** Create the `webpuppet_pause` tool. */
export function createPauseTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_pause",
			description: "Pause browser automation. Use this when you need to manually interact with the browser.",
			inputSchema: { type: "object", properties: {} },
		},
		async execute(_args, ctx) {
			await ctx.intervention.write((slot) => slot.value.pause());
			return textResult(
				"# Automation Paused\n\n" +
				"⏸️ Automation is now paused. The browser is available for manual interaction.\n\n" +
				"Call `webpuppet_resume` when ready to continue.",
			);
		},
	};
}

/** Create the `webpuppet_resume` tool. */
export function createResumeTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_resume",
			description: "Resume browser automation after a pause or manual intervention.",
			inputSchema: { type: "object", properties: {} },
		},
		async execute(_args, ctx) {
			await ctx.intervention.write((slot) => slot.value.resume());
			return textResult(
				"# Automation Resumed\n\n▶️ Automation has been resumed. Browser operations will continue.",
			);
		},
	};
}
