// @webpuppet/core — Foundation
export * from "./types.js";
export * from "./errors.js";
export {
	createConfig,
	cascadeConfigs,
	getWebpuppetHome,
	getSettingsPath,
	readSettingsFile,
	settingsFromEnv,
	loadSettings,
} from "./config.js";

// Validation
export { v, check, isPlainObject } from "./validation.js";
export type { ValidatorFn, ValidatorResult } from "./validation.js";

// Observability
export * from "./observability/index.js";
