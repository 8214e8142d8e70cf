/**
 * @webpuppet/guard — permission model types.
 */

import type { PolicyName } from "@webpuppet/core";

// ─── Operations ─────────────────────────────────────────────────────────────

/** A browser operation that may be gated by policy. */
export type Operation =
	| "Navigate"
	| "SendPrompt"
	| "ReadResponse"
	| "ReadContent"
	| "Screenshot"
	| "Click"
	| "TypeText"
	| "DeleteAccount"
	| "ChangePassword";

// ─── Decisions ──────────────────────────────────────────────────────────────

/** Outcome of evaluating one operation against a policy. */
export interface PermissionDecision {
	allowed: boolean;
	reason: string;
	/** 1 (harmless) to 10 (irreversible). */
	riskLevel: number;
}

// ─── Policies ───────────────────────────────────────────────────────────────

/** Which URLs a policy lets the browser visit. */
export type UrlScope =
	| { kind: "allowlist"; domains: readonly string[] }
	| { kind: "any-http" };

/** A named permission policy. */
export interface PermissionPolicy {
	name: PolicyName;
	description: string;
	allowedOperations: ReadonlySet<Operation>;
	urlScope: UrlScope;
}
