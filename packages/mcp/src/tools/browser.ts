/**
 * Browser tools: detection, navigation, screenshots and session status.
 */

import { createLogger, errorMessage, v } from "@webpuppet/core";
import { callAutomation } from "../tool-context.js";
import type { ToolContext } from "../tool-context.js";
import { PROVIDER_IDS, parseProvider } from "../providers.js";
import type { ProviderId } from "../providers.js";
import type { AutomationSession, DetectedBrowser } from "../collaborators.js";
import type { McpTool } from "../types.js";
import { SESSION_PROVIDER_SCHEMA, parseArgs, requirePermission, textResult } from "./shared.js";

const log = createLogger("mcp:browser");

const DEFAULT_SESSION_PROVIDER: ProviderId = "grok";

const urlArgs = v.object({
	url: v.string().min(1).validate,
	provider: v.optional(v.string().min(1).validate).validate,
}).validate;

/** Run `fn` on a provider session; the browser stays open until it settles. */
async function withSession<T>(
	ctx: ToolContext,
	provider: string | undefined,
	fn: (session: AutomationSession) => Promise<T>,
): Promise<T> {
	const id = provider === undefined ? DEFAULT_SESSION_PROVIDER : parseProvider(provider);
	return ctx.withAutomation(async (automation) => {
		const session = await callAutomation(`opening ${id} session`, () => automation.getSession(id));
		return fn(session);
	});
}

/** Read a page property, falling back when the engine cannot say. */
async function readOr(what: string, read: () => Promise<string>, fallback: string): Promise<string> {
	try {
		const value = await read();
		return value === "" ? fallback : value;
	} catch (err) {
		log.debug(`Reading ${what} failed`, { error: errorMessage(err) });
		return fallback;
	}
}

// ─── Detect Browsers ────────────────────────────────────────────────────────

function formatBrowser(b: DetectedBrowser): string {
	return (
		`- **${b.browserType}** (${b.version ?? "unknown"})\n` +
		`  - Path: \`${b.executablePath}\`\n` +
		`  - Data: \`${b.userDataDir}\`\n` +
		`  - Profiles: ${b.profiles.join(", ") || "none"}`
	);
}

/** Create the `webpuppet_detect_browsers` tool. */
export function createDetectBrowsersTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_detect_browsers",
			description: "Detect installed browsers that can be used for automation.",
			inputSchema: { type: "object", properties: {} },
		},
		async execute(_args, ctx) {
			const browsers = await ctx.browsers.detectAll();
			if (browsers.length === 0) {
				return textResult("No supported browsers detected. Please install Brave, Chrome, or Chromium.", true);
			}
			return textResult(`# Detected Browsers\n\n${browsers.map(formatBrowser).join("\n\n")}`);
		},
	};
}

// ─── Screenshot ─────────────────────────────────────────────────────────────

/**
 * Create the `webpuppet_screenshot` tool. Engines that cannot capture get
 * a text placeholder instead of an image.
 */
export function createScreenshotTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_screenshot",
			description: "Take a screenshot of a web page. Only allowed domains can be accessed.",
			inputSchema: {
				type: "object",
				properties: {
					url: { type: "string", description: "URL of the page to capture." },
					provider: SESSION_PROVIDER_SCHEMA,
				},
				required: ["url"],
			},
		},
		async execute(args, ctx) {
			const parsed = parseArgs("webpuppet_screenshot", args, urlArgs);
			requirePermission(ctx.permissions, "Navigate", parsed.url);
			requirePermission(ctx.permissions, "Screenshot");

			const png = await withSession(ctx, parsed.provider, async (session) => {
				await callAutomation(`navigating to ${parsed.url}`, () => session.navigate(parsed.url));
				if (!session.screenshot) return null;
				const capture = session.screenshot.bind(session);
				return callAutomation("capturing screenshot", () => capture());
			});

			if (!png) {
				return textResult(
					`Screenshot of \`${parsed.url}\` would be captured here.\n\n` +
					"*Note: Full browser implementation required for actual screenshots.*",
				);
			}
			return {
				content: [{ type: "image", data: Buffer.from(png).toString("base64"), mimeType: "image/png" }],
				isError: false,
			};
		},
	};
}

// ─── Navigate ───────────────────────────────────────────────────────────────

/** Create the `webpuppet_navigate` tool. Launches the browser if needed. */
export function createNavigateTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_navigate",
			description: "Navigate browser to a URL. Opens a browser window if not already open.",
			inputSchema: {
				type: "object",
				properties: {
					url: { type: "string", description: "URL to open." },
					provider: SESSION_PROVIDER_SCHEMA,
				},
				required: ["url"],
			},
		},
		async execute(args, ctx) {
			const parsed = parseArgs("webpuppet_navigate", args, urlArgs);
			requirePermission(ctx.permissions, "Navigate", parsed.url);

			const { url, title } = await withSession(ctx, parsed.provider, async (session) => {
				await callAutomation(`navigating to ${parsed.url}`, () => session.navigate(parsed.url));
				return {
					url: await readOr("current URL", () => session.currentUrl(), parsed.url),
					title: await readOr("page title", () => session.getTitle(), "Unknown"),
				};
			});

			return textResult(
				"# Browser Navigated\n\n✅ Successfully navigated to URL.\n\n" +
				`- **URL**: ${url}\n` +
				`- **Title**: ${title}`,
			);
		},
	};
}

// ─── Browser Status ─────────────────────────────────────────────────────────

/** Create the `webpuppet_browser_status` tool. Never launches a browser. */
export function createBrowserStatusTool(): McpTool {
	return {
		definition: {
			name: "webpuppet_browser_status",
			description: "Get current browser status including URL, title, and visibility.",
			inputSchema: { type: "object", properties: {} },
		},
		async execute(_args, ctx) {
			if (!(await ctx.hasAutomation())) {
				return textResult(
					"# Browser Status\n\n⚪ No browser session is currently active.\n\n" +
					"A browser will be launched when you use `webpuppet_navigate` or `webpuppet_prompt`.",
				);
			}

			return textResult(
				"# Browser Status\n\n🟢 Browser session is active.\n\n" +
				`- **Mode**: ${ctx.headless ? "Headless" : "Visible"}\n` +
				`- **Providers**: ${PROVIDER_IDS.join(", ")}`,
			);
		},
	};
}
