/**
 * @webpuppet/mcp — human-in-the-loop intervention state machine.
 *
 * Automation pauses when a human has to step in (CAPTCHA, two-factor
 * prompt, manual browsing) and continues once the human signals completion.
 */

import { createLogger } from "@webpuppet/core";
import type { Logger } from "@webpuppet/core";

// ─── Types ─────────────────────────────────────────────────────────────────

export type InterventionState = "running" | "waiting_for_human" | "resuming" | "timed_out" | "cancelled";

/** What the human reported when finishing an intervention. */
export interface InterventionOutcome {
	success: boolean;
	message: string | null;
	completedAt: Date;
}

/** How a {@link InterventionHandler.waitForHuman} call ended. */
export type WaitResult =
	| { kind: "completed"; outcome: InterventionOutcome }
	| { kind: "resumed" }
	| { kind: "timed_out" }
	| { kind: "cancelled" };

export const MANUAL_PAUSE_REASON = "Paused for manual interaction";

// ─── Handler ───────────────────────────────────────────────────────────────

/**
 * Tracks whether automation is running or waiting for a human.
 *
 * ```
 * running ──pause / requestIntervention──▶ waiting_for_human
 * waiting_for_human ──complete──▶ resuming (waiters pending) | running
 * waiting_for_human ──resume──▶ running
 * waiting_for_human ──deadline──▶ timed_out
 * any ──cancel──▶ cancelled
 * timed_out / cancelled ──resume──▶ running
 * ```
 *
 * Automation code calls {@link waitForHuman} to suspend until the episode
 * ends; tools call {@link pause}, {@link resume} and {@link complete}.
 */
export class InterventionHandler {
	private _state: InterventionState = "running";
	private reason: string | null = null;
	private outcome: InterventionOutcome | null = null;
	private waiters: { resolve: (result: WaitResult) => void; timer: ReturnType<typeof setTimeout> | null }[] = [];
	private readonly log: Logger;

	constructor(logger?: Logger) {
		this.log = logger ?? createLogger("mcp:intervention");
	}

	state(): InterventionState {
		return this._state;
	}

	/** Why a human is needed; null unless waiting. */
	currentReason(): string | null {
		return this.reason;
	}

	/** The most recent completion, if any. */
	lastOutcome(): InterventionOutcome | null {
		return this.outcome;
	}

	// ─── Transitions ─────────────────────────────────────────────────────

	/** Hand the browser to the human. */
	pause(): void {
		this.requestIntervention(MANUAL_PAUSE_REASON);
	}

	/** Signal that a collaborator needs a human, e.g. for a CAPTCHA. */
	requestIntervention(reason: string): void {
		this._state = "waiting_for_human";
		this.reason = reason;
		this.log.info("Waiting for human", { reason });
	}

	/**
	 * Record the human's outcome and release anyone waiting. The state is
	 * `resuming` while waiters wake up, `running` when nobody was waiting.
	 */
	complete(success: boolean, message?: string): InterventionOutcome {
		const outcome: InterventionOutcome = {
			success,
			message: message ?? null,
			completedAt: new Date(),
		};
		this.outcome = outcome;
		this.reason = null;
		this._state = this.waiters.length > 0 ? "resuming" : "running";
		this.log.info("Intervention complete", { success, message: outcome.message });
		this.settle({ kind: "completed", outcome });
		return outcome;
	}

	/** Go back to running without recording an outcome. */
	resume(): void {
		this._state = "running";
		this.reason = null;
		this.log.info("Automation resumed");
		this.settle({ kind: "resumed" });
	}

	/** End the episode on the peer's request. */
	cancel(): void {
		this._state = "cancelled";
		this.reason = null;
		this.log.info("Intervention cancelled");
		this.settle({ kind: "cancelled" });
	}

	// ─── Waiting ─────────────────────────────────────────────────────────

	/**
	 * Suspend until the current intervention ends. Resolves immediately with
	 * `resumed` when nothing is pending. After `timeoutMs` without an answer
	 * the state becomes `timed_out` and every waiter is released.
	 */
	waitForHuman(timeoutMs?: number): Promise<WaitResult> {
		if (this._state !== "waiting_for_human") {
			return Promise.resolve({ kind: "resumed" });
		}

		const waiting = new Promise<WaitResult>((resolve) => {
			const timer = timeoutMs === undefined
				? null
				: setTimeout(() => this.expire(timeoutMs), timeoutMs);
			this.waiters.push({ resolve, timer });
		});

		// The waiter picking the work back up is what ends `resuming`.
		return waiting.then((result) => {
			if (this._state === "resuming") this._state = "running";
			return result;
		});
	}

	/** Number of callers suspended in {@link waitForHuman}. */
	get pendingWaiters(): number {
		return this.waiters.length;
	}

	private expire(timeoutMs: number): void {
		if (this._state !== "waiting_for_human") return;
		this._state = "timed_out";
		this.log.warn("Intervention timed out", { timeoutMs, reason: this.reason });
		this.reason = null;
		this.settle({ kind: "timed_out" });
	}

	private settle(result: WaitResult): void {
		const waiters = this.waiters;
		this.waiters = [];
		for (const waiter of waiters) {
			if (waiter.timer) clearTimeout(waiter.timer);
			waiter.resolve(result);
		}
	}
}
