/**
 * @webpuppet/guard — PermissionGuard.
 * Evaluates operations (and the URLs they target) against one policy.
 */

import { PermissionDeniedError, createLogger } from "@webpuppet/core";
import type { Logger } from "@webpuppet/core";
import { OPERATION_RISK } from "./operations.js";
import { SECURE_POLICY } from "./presets.js";
import type { Operation, PermissionDecision, PermissionPolicy } from "./types.js";

/**
 * Immutable permission gate over a single {@link PermissionPolicy}.
 *
 * `check*` methods return a decision; `require*` methods throw
 * {@link PermissionDeniedError} on denial. Every denial is logged at warn.
 *
 * @example
 * ```ts
 * const guard = new PermissionGuard(SECURE_POLICY);
 * guard.requireWithUrl("Navigate", "https://claude.ai/new");
 * guard.check("DeleteAccount").allowed; // false
 * ```
 */
export class PermissionGuard {
	readonly policy: PermissionPolicy;
	private readonly log: Logger;

	constructor(policy: PermissionPolicy, logger?: Logger) {
		this.policy = policy;
		this.log = logger ?? createLogger("guard");
	}

	/** Guard over the secure preset. */
	static secure(logger?: Logger): PermissionGuard {
		return new PermissionGuard(SECURE_POLICY, logger);
	}

	check(operation: Operation): PermissionDecision {
		const riskLevel = OPERATION_RISK[operation];
		if (!this.policy.allowedOperations.has(operation)) {
			return this.deny(operation, `${operation} is not permitted by the ${this.policy.name} policy`, riskLevel);
		}
		return {
			allowed: true,
			reason: `${operation} is permitted by the ${this.policy.name} policy`,
			riskLevel,
		};
	}

	/**
	 * Evaluate an operation against a target URL. The operation must be
	 * allowed, the URL must be http(s), and its host must fall inside the
	 * policy's URL scope.
	 */
	checkWithUrl(operation: Operation, url: string): PermissionDecision {
		const base = this.check(operation);
		if (!base.allowed) return base;

		const riskLevel = base.riskLevel;
		let parsed: URL;
		try {
			parsed = new URL(url);
		} catch {
			return this.deny(operation, `Invalid URL: ${url}`, riskLevel, url);
		}

		if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
			return this.deny(operation, `Only http and https URLs are allowed, got ${parsed.protocol}`, riskLevel, url);
		}

		const scope = this.policy.urlScope;
		if (scope.kind === "allowlist") {
			const host = parsed.hostname.toLowerCase();
			const inScope = scope.domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
			if (!inScope) {
				return this.deny(
					operation,
					`Domain ${host} is not allowed by the ${this.policy.name} policy`,
					riskLevel,
					url,
				);
			}
		}

		return {
			allowed: true,
			reason: `${operation} on ${parsed.hostname} is permitted by the ${this.policy.name} policy`,
			riskLevel,
		};
	}

	/** @throws {PermissionDeniedError} When the operation is denied. */
	require(operation: Operation): void {
		const decision = this.check(operation);
		if (!decision.allowed) {
			throw new PermissionDeniedError(decision.reason, operation);
		}
	}

	/** @throws {PermissionDeniedError} When the operation or URL is denied. */
	requireWithUrl(operation: Operation, url: string): void {
		const decision = this.checkWithUrl(operation, url);
		if (!decision.allowed) {
			throw new PermissionDeniedError(decision.reason, operation, url);
		}
	}

	private deny(operation: Operation, reason: string, riskLevel: number, url?: string): PermissionDecision {
		this.log.warn("Permission denied", {
			operation,
			policy: this.policy.name,
			reason,
			...(url !== undefined ? { url } : {}),
		});
		return { allowed: false, reason, riskLevel };
	}
}
