/**
 * @webpuppet/guard — built-in permission policies.
 */

import type { PolicyName } from "@webpuppet/core";
import type { Operation, PermissionPolicy } from "./types.js";

/** Domains the AI providers are served from. Subdomains match too. */
export const PROVIDER_DOMAINS: readonly string[] = [
	"claude.ai",
	"anthropic.com",
	"grok.com",
	"x.com",
	"gemini.google.com",
	"accounts.google.com",
	"chatgpt.com",
	"openai.com",
	"perplexity.ai",
	"notebooklm.google.com",
	"kaggle.com",
];

function ops(...list: Operation[]): ReadonlySet<Operation> {
	return new Set(list);
}

/**
 * SECURE: read and prompt only, provider domains only. The default.
 */
export const SECURE_POLICY: PermissionPolicy = {
	name: "secure",
	description: "Prompting and reading on AI provider sites only",
	allowedOperations: ops("Navigate", "SendPrompt", "ReadResponse", "ReadContent", "Screenshot"),
	urlScope: { kind: "allowlist", domains: PROVIDER_DOMAINS },
};

/**
 * PERMISSIVE: any http(s) site and page interaction, but never account
 * deletion or password changes.
 */
export const PERMISSIVE_POLICY: PermissionPolicy = {
	name: "permissive",
	description: "Any web site and page interaction; account changes stay blocked",
	allowedOperations: ops(
		"Navigate",
		"SendPrompt",
		"ReadResponse",
		"ReadContent",
		"Screenshot",
		"Click",
		"TypeText",
	),
	urlScope: { kind: "any-http" },
};

/**
 * READONLY: observe provider pages without sending anything.
 */
export const READONLY_POLICY: PermissionPolicy = {
	name: "readonly",
	description: "Read-only access to AI provider sites",
	allowedOperations: ops("Navigate", "ReadResponse", "ReadContent", "Screenshot"),
	urlScope: { kind: "allowlist", domains: PROVIDER_DOMAINS },
};

export const BUILT_IN_POLICIES: Readonly<Record<PolicyName, PermissionPolicy>> = {
	secure: SECURE_POLICY,
	permissive: PERMISSIVE_POLICY,
	readonly: READONLY_POLICY,
};

/**
 * Look up a built-in policy by name, case-insensitively.
 *
 * @returns The policy, or null for an unknown name.
 */
export function resolvePolicy(name: string): PermissionPolicy | null {
	const key = name.trim().toLowerCase();
	for (const policy of Object.values(BUILT_IN_POLICIES)) {
		if (policy.name === key) return policy;
	}
	return null;
}
