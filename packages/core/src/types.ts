/**
 * @webpuppet/core — shared configuration types.
 */

// ─── Configuration ───────────────────────────────────────────────────────────

/**
 * The tier a configuration layer comes from, lowest priority first:
 * built-in defaults, the settings file, environment variables, CLI flags.
 */
export type ConfigLayer = "defaults" | "file" | "env" | "cli";

/** One configuration layer; layers are combined with `cascadeConfigs`. */
export interface Config {
	readonly layer: ConfigLayer;
	/** Deep copy of the stored values. */
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

// ─── Settings ────────────────────────────────────────────────────────────────

/** Names of the built-in permission policies. */
export type PolicyName = "secure" | "permissive" | "readonly";

/** Response screening knobs handed to the automation engine. */
export interface ScreeningSettings {
	enabled: boolean;
	/** Responses scoring above this (0–1) fail screening. */
	riskThreshold: number;
	detectPromptInjection: boolean;
	/** Responses longer than this are truncated before screening. */
	maxResponseChars: number;
}

/** Server settings persisted at `<home>/config/settings.json`. */
export interface WebpuppetSettings {
	/**
	 * Permission policy name. Kept as a free string: an unknown name is
	 * reported by the CLI and replaced with `"secure"`.
	 */
	policy: string;
	/** Show the browser window instead of running headless. */
	visible: boolean;
	verbose: boolean;
	/** Write logs to this file instead of stderr. */
	logFile: string | null;
	/** Module specifier of the automation engine to load. */
	engine: string | null;
	screening: ScreeningSettings;
}

export const DEFAULT_SETTINGS: WebpuppetSettings = {
	policy: "secure",
	visible: false,
	verbose: false,
	logFile: null,
	engine: null,
	screening: {
		enabled: true,
		riskThreshold: 0.7,
		detectPromptInjection: true,
		maxResponseChars: 100_000,
	},
};
