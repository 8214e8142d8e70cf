/**
 * @webpuppet/mcp — interfaces of the components the server drives but does
 * not implement: the permission gate, the automation engine and browser
 * detection.
 */

import type { Operation, PermissionDecision, ScreeningConfig } from "@webpuppet/guard";
import type { WaitResult } from "./intervention.js";
import type { ProviderId } from "./providers.js";

// ─── Permission Gate ────────────────────────────────────────────────────────

/**
 * Policy evaluator consulted by tools. `require*` throw on denial;
 * `check*` report a decision. `PermissionGuard` implements it.
 */
export interface PermissionGate {
	require(operation: Operation): void;
	requireWithUrl(operation: Operation, url: string): void;
	check(operation: Operation): PermissionDecision;
	checkWithUrl(operation: Operation, url: string): PermissionDecision;
}

// ─── Automation Engine ──────────────────────────────────────────────────────

export interface PromptRequest {
	message: string;
	/** Optional context or system instructions. */
	context?: string;
}

export interface PromptResponse {
	text: string;
}

export interface ScreeningResult {
	passed: boolean;
	/** 0 (benign) to 1 (hostile). */
	riskScore: number;
}

/** Capabilities a provider declares; not detected from its live UI. */
export interface ProviderCapabilities {
	conversation: boolean;
	vision: boolean;
	fileUpload: boolean;
	codeExecution: boolean;
	webSearch: boolean;
	maxContext: number | null;
	models: string[];
}

/** One provider tab in the automated browser. */
export interface AutomationSession {
	navigate(url: string): Promise<void>;
	currentUrl(): Promise<string>;
	getTitle(): Promise<string>;
	/** PNG bytes of the visible page. Engines without capture omit it. */
	screenshot?(): Promise<Uint8Array>;
}

/** A running browser automation instance. */
export interface AutomationHandle {
	authenticate(provider: ProviderId): Promise<void>;
	promptScreened(
		provider: ProviderId,
		request: PromptRequest,
	): Promise<{ response: PromptResponse; screening: ScreeningResult }>;
	getSession(provider: ProviderId): Promise<AutomationSession>;
	providerCapabilities(provider: ProviderId): ProviderCapabilities | null;
	close(): Promise<void>;
}

/**
 * How an engine hands the browser to a human. The peer sees the episode
 * through the intervention tools and ends it with
 * `webpuppet_intervention_complete` or `webpuppet_resume`.
 */
export interface InterventionSignal {
	/**
	 * Enter `waiting_for_human` and suspend until the episode ends. After
	 * `timeoutMs` without an answer the state becomes `timed_out`.
	 */
	needHuman(reason: string, timeoutMs?: number): Promise<WaitResult>;
	/** Give up on the current episode, e.g. when the page it needed is gone. */
	cancel(): Promise<void>;
}

export interface AutomationOptions {
	headless: boolean;
	screening: ScreeningConfig;
	providers: readonly ProviderId[];
	intervention: InterventionSignal;
}

/** Builds an automation handle; called lazily on first use. */
export type AutomationFactory = (options: AutomationOptions) => Promise<AutomationHandle>;

// ─── Browser Detection ──────────────────────────────────────────────────────

export type BrowserType = "Brave" | "Chrome" | "Chromium" | "Edge";

export interface DetectedBrowser {
	browserType: BrowserType;
	version: string | null;
	executablePath: string;
	userDataDir: string;
	profiles: string[];
}

export interface BrowserDetector {
	detectAll(): Promise<DetectedBrowser[]>;
}
