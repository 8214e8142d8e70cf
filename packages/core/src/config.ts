import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import type { Config, ConfigLayer, WebpuppetSettings } from "./types.js";
import { DEFAULT_SETTINGS } from "./types.js";
import { check, isPlainObject, v } from "./validation.js";

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not
 * concatenated; `undefined` values in the source are skipped.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const [key, sv] of Object.entries(source)) {
		if (sv === undefined) continue;
		const tv = target[key];
		if (isPlainObject(sv) && isPlainObject(tv)) {
			deepMerge(tv, sv);
		} else {
			target[key] = isPlainObject(sv) ? structuredClone(sv) : sv;
		}
	}
}

/**
 * Create a config layer backed by a private copy of `initial`.
 *
 * @example
 * ```ts
 * const cfg = createConfig("cli", { policy: "readonly" });
 * cfg.merge({ screening: { riskThreshold: 0.5 } });
 * cfg.all(); // { policy: "readonly", screening: { riskThreshold: 0.5 } }
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = structuredClone(initial);

	return {
		layer,

		all(): Record<string, unknown> {
			return structuredClone(data);
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade config layers into one. Later layers win on key conflicts; the
 * result carries the layer type of the last one given.
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig(layers.length > 0 ? layers[layers.length - 1].layer : "defaults");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

/**
 * The webpuppet home directory: `WEBPUPPET_HOME` when set, otherwise
 * `~/.webpuppet` (`%USERPROFILE%` on Windows).
 */
export function getWebpuppetHome(): string {
	const override = process.env.WEBPUPPET_HOME?.trim();
	if (override) return override;
	return path.join(process.env.HOME || process.env.USERPROFILE || "~", ".webpuppet");
}

/** Absolute path of the settings file. */
export function getSettingsPath(): string {
	return path.join(getWebpuppetHome(), "config", "settings.json");
}

/**
 * Read the settings file. A missing file yields an empty layer.
 *
 * @throws {ConfigError} If the file exists but is not a JSON object.
 */
export function readSettingsFile(settingsPath = getSettingsPath()): Record<string, unknown> {
	if (!fs.existsSync(settingsPath)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${settingsPath}`, err);
	}
	if (!isPlainObject(parsed)) {
		throw new ConfigError(`${settingsPath} must contain a JSON object`);
	}
	return parsed;
}

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

function envFlag(name: string, raw: string): boolean {
	const word = raw.trim().toLowerCase();
	if (TRUE_WORDS.has(word)) return true;
	if (FALSE_WORDS.has(word)) return false;
	throw new ConfigError(`${name} must be a boolean (true/false), got "${raw}"`);
}

/**
 * Settings taken from `WEBPUPPET_*` environment variables. Only variables
 * that are set (and non-empty) appear in the result.
 *
 * @throws {ConfigError} On a malformed boolean.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	const policy = env.WEBPUPPET_POLICY?.trim();
	if (policy) out.policy = policy;
	if (env.WEBPUPPET_VISIBLE) out.visible = envFlag("WEBPUPPET_VISIBLE", env.WEBPUPPET_VISIBLE);
	if (env.WEBPUPPET_VERBOSE) out.verbose = envFlag("WEBPUPPET_VERBOSE", env.WEBPUPPET_VERBOSE);
	const logFile = env.WEBPUPPET_LOG_FILE?.trim();
	if (logFile) out.logFile = logFile;
	const engine = env.WEBPUPPET_ENGINE?.trim();
	if (engine) out.engine = engine;
	return out;
}

const settingsSchema = v.object({
	policy: v.string().min(1).validate,
	visible: v.boolean().validate,
	verbose: v.boolean().validate,
	logFile: v.optional(v.string().min(1).validate).validate,
	engine: v.optional(v.string().min(1).validate).validate,
	screening: v.object({
		enabled: v.boolean().validate,
		riskThreshold: v.number().validate,
		detectPromptInjection: v.boolean().validate,
		maxResponseChars: v.number().integer().validate,
	}).validate,
}).validate;

/**
 * Resolve settings from defaults, the settings file, the environment and
 * explicit overrides (usually CLI flags), in increasing priority.
 *
 * @throws {ConfigError} If the file is unreadable or an env value is malformed.
 * @throws {ValidationError} If the merged settings have the wrong shape.
 */
export function loadSettings(
	overrides: Record<string, unknown> = {},
	env: NodeJS.ProcessEnv = process.env,
): WebpuppetSettings {
	const merged = cascadeConfigs(
		createConfig("defaults", { ...DEFAULT_SETTINGS }),
		createConfig("file", readSettingsFile()),
		createConfig("env", settingsFromEnv(env)),
		createConfig("cli", overrides),
	);

	const raw = check(merged.all(), settingsSchema, "settings");
	return {
		...raw,
		logFile: raw.logFile ?? null,
		engine: raw.engine ?? null,
	};
}
