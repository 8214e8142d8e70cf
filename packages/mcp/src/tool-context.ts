/**
 * @webpuppet/mcp — the execution context shared by every tool call.
 */

import { createLogger, errorMessage } from "@webpuppet/core";
import type { Logger } from "@webpuppet/core";
import { DEFAULT_SCREENING } from "@webpuppet/guard";
import type { ScreeningConfig } from "@webpuppet/guard";
import { FsBrowserDetector } from "./browser-detector.js";
import type {
	AutomationFactory,
	AutomationHandle,
	BrowserDetector,
	InterventionSignal,
	PermissionGate,
} from "./collaborators.js";
import { InterventionHandler } from "./intervention.js";
import type { WaitResult } from "./intervention.js";
import { McpAutomationError, McpError } from "./mcp-errors.js";
import { PROVIDER_IDS } from "./providers.js";
import { RwLock } from "./rw-lock.js";

export interface ToolContextOptions {
	permissions: PermissionGate;
	screening?: ScreeningConfig;
	/** Run the browser without a window. Default: true. */
	headless?: boolean;
	/** Builds the automation handle. Without one, engine-backed tools fail. */
	automationFactory?: AutomationFactory | null;
	browserDetector?: BrowserDetector;
	intervention?: InterventionHandler;
	logger?: Logger;
}

/**
 * Run a call into the automation engine, wrapping anything it throws
 * (other than an McpError) as an {@link McpAutomationError}.
 */
export async function callAutomation<T>(what: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (err) {
		if (err instanceof McpError) throw err;
		throw new McpAutomationError(`${what} failed: ${errorMessage(err)}`, err);
	}
}

/**
 * Long-lived state handed to every tool.
 *
 * Everything is fixed at construction except the automation handle, which
 * is built on first use under the write lock and may be released and
 * rebuilt later. Tools use the handle only inside {@link withAutomation},
 * which holds the read lock, so a release waits for every call still using
 * the handle.
 */
export class ToolContext {
	readonly permissions: PermissionGate;
	readonly screening: ScreeningConfig;
	readonly headless: boolean;
	readonly browsers: BrowserDetector;
	readonly intervention: RwLock<InterventionHandler>;
	/** Handed to the engine so it can ask for a human. */
	readonly interventionSignal: InterventionSignal;
	private readonly automation = new RwLock<AutomationHandle | null>(null);
	private readonly factory: AutomationFactory | null;
	private readonly log: Logger;

	constructor(opts: ToolContextOptions) {
		this.permissions = opts.permissions;
		this.screening = opts.screening ?? DEFAULT_SCREENING;
		this.headless = opts.headless ?? true;
		this.browsers = opts.browserDetector ?? new FsBrowserDetector();
		this.intervention = new RwLock(opts.intervention ?? new InterventionHandler());
		this.factory = opts.automationFactory ?? null;
		this.log = opts.logger ?? createLogger("mcp:context");
		this.interventionSignal = {
			needHuman: (reason, timeoutMs) => this.needHuman(reason, timeoutMs),
			cancel: () => this.intervention.write((slot) => slot.value.cancel()),
		};
	}

	/**
	 * Run `fn` with the live automation handle, building it first if needed.
	 * The handle stays open until `fn` settles.
	 *
	 * @throws {McpAutomationError} When no engine is configured or it fails to start.
	 */
	async withAutomation<T>(fn: (automation: AutomationHandle) => Promise<T>): Promise<T> {
		for (;;) {
			await this.startAutomation();
			const outcome = await this.automation.read(async (handle) => (handle ? { value: await fn(handle) } : null));
			if (outcome) return outcome.value;
			// Released between start and read; start a fresh one.
		}
	}

	/** Whether an automation handle is currently live. */
	async hasAutomation(): Promise<boolean> {
		return this.automation.read((handle) => handle !== null);
	}

	/**
	 * Close and drop the automation handle, if any, once every call using it
	 * has finished. A failing close is logged; the slot is cleared either way.
	 */
	async releaseAutomation(): Promise<void> {
		await this.automation.write(async (slot) => {
			const handle = slot.value;
			if (!handle) return;
			slot.value = null;
			try {
				await handle.close();
				this.log.debug("Browser automation closed");
			} catch (err) {
				this.log.warn("Closing browser automation failed", { error: errorMessage(err) });
			}
		});
	}

	private async startAutomation(): Promise<void> {
		const running = await this.automation.read((handle) => handle !== null);
		if (running) return;

		await this.automation.write(async (slot) => {
			if (slot.value) return;

			const factory = this.factory;
			if (!factory) {
				throw new McpAutomationError("no automation engine is configured (start the server with --engine)");
			}

			this.log.info("Starting browser automation", { headless: this.headless });
			slot.value = await callAutomation("starting browser automation", () =>
				factory({
					headless: this.headless,
					screening: this.screening,
					providers: PROVIDER_IDS,
					intervention: this.interventionSignal,
				}),
			);
		});
	}

	/**
	 * The wait itself runs outside the intervention lock so the tools that
	 * end the episode can take it.
	 */
	private async needHuman(reason: string, timeoutMs?: number): Promise<WaitResult> {
		const pending = await this.intervention.write((slot) => {
			slot.value.requestIntervention(reason);
			return { result: slot.value.waitForHuman(timeoutMs) };
		});
		return pending.result;
	}
}
