/**
 * @webpuppet/guard — response screening configuration.
 *
 * The screening filter itself lives in the automation engine; this module
 * only builds and validates the frozen configuration handed to it.
 */

import { ConfigError, DEFAULT_SETTINGS } from "@webpuppet/core";
import type { ScreeningSettings } from "@webpuppet/core";

export type ScreeningConfig = Readonly<ScreeningSettings>;

export const DEFAULT_SCREENING: ScreeningConfig = Object.freeze({ ...DEFAULT_SETTINGS.screening });

/**
 * Build a frozen screening configuration from partial settings.
 *
 * @throws {ConfigError} If the threshold is outside 0–1 or the length limit
 * is not a positive integer.
 */
export function createScreeningConfig(settings: Partial<ScreeningSettings> = {}): ScreeningConfig {
	const config: ScreeningSettings = { ...DEFAULT_SCREENING, ...settings };

	if (!(config.riskThreshold >= 0 && config.riskThreshold <= 1)) {
		throw new ConfigError(`screening.riskThreshold must be between 0 and 1, got ${config.riskThreshold}`);
	}
	if (!Number.isInteger(config.maxResponseChars) || config.maxResponseChars <= 0) {
		throw new ConfigError(`screening.maxResponseChars must be a positive integer, got ${config.maxResponseChars}`);
	}

	return Object.freeze(config);
}
