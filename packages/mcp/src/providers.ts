/**
 * @webpuppet/mcp — AI provider catalog.
 */

import { McpInvalidParamsError } from "./mcp-errors.js";

export type ProviderId = "claude" | "grok" | "gemini" | "chatgpt" | "perplexity" | "notebooklm" | "kaggle";

export interface ProviderInfo {
	id: ProviderId;
	displayName: string;
	url: string;
	features: string;
}

export const PROVIDERS: readonly ProviderInfo[] = [
	{ id: "claude", displayName: "Claude (Anthropic)", url: "https://claude.ai", features: "Large context, artifacts, code" },
	{ id: "grok", displayName: "Grok (X/xAI)", url: "https://x.com/i/grok", features: "Real-time info, integrated with X" },
	{ id: "gemini", displayName: "Gemini (Google)", url: "https://gemini.google.com", features: "Google integration, large context" },
	{ id: "chatgpt", displayName: "ChatGPT (OpenAI)", url: "https://chat.openai.com", features: "GPT-4o, vision, code, web search" },
	{ id: "perplexity", displayName: "Perplexity AI", url: "https://www.perplexity.ai", features: "Search-focused, sources cited" },
	{ id: "notebooklm", displayName: "NotebookLM (Google)", url: "https://notebooklm.google.com", features: "Research assistant, 500k context" },
	{ id: "kaggle", displayName: "Kaggle (Datasets)", url: "https://www.kaggle.com/datasets", features: "Dataset search/catalog; returns dataset page links" },
];

export const PROVIDER_IDS: readonly ProviderId[] = PROVIDERS.map((p) => p.id);

const ALIASES: Readonly<Record<string, ProviderId>> = {
	openai: "chatgpt",
	notebook: "notebooklm",
};

/**
 * Resolve a provider name, case-insensitively and through aliases
 * (`openai` → chatgpt, `notebook` → notebooklm).
 *
 * @throws {McpInvalidParamsError} For any other name; there is no default.
 */
export function parseProvider(name: string): ProviderId {
	const key = name.trim().toLowerCase();
	const direct = PROVIDER_IDS.find((id) => id === key);
	if (direct) return direct;
	const alias = ALIASES[key];
	if (alias) return alias;
	throw new McpInvalidParamsError(`unknown provider: ${name}`);
}
