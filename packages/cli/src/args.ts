/**
 * @webpuppet/cli — Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses the server flags from argv.
 */

import { ConfigError } from "@webpuppet/core";

export interface ParsedArgs {
	/** Serve over stdio. The only transport, so this is informational. */
	stdio?: boolean;
	policy?: string;
	visible?: boolean;
	verbose?: boolean;
	logFile?: string;
	/** Module specifier of the automation engine. */
	engine?: string;
	version?: boolean;
	help?: boolean;
	/** Arguments nothing recognised. */
	rest: string[];
}

const VALUE_FLAGS: Record<string, "policy" | "logFile" | "engine"> = {
	"--policy": "policy",
	"--log-file": "logFile",
	"--engine": "engine",
};

/**
 * Parse `process.argv.slice(2)` into structured arguments. Value flags
 * accept both `--flag value` and `--flag=value`.
 *
 * @throws {ConfigError} When a value flag has no value.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {
		rest: [],
	};

	let i = 0;

	while (i < argv.length) {
		const arg = argv[i];

		// ─── Flags with values ──────────────────────────────────────────
		const eq = arg.indexOf("=");
		const flag = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
		const key = VALUE_FLAGS[flag];
		if (key) {
			let value: string | undefined;
			if (flag !== arg) {
				value = arg.slice(eq + 1);
			} else if (i + 1 < argv.length && !argv[i + 1].startsWith("-")) {
				i++;
				value = argv[i];
			}
			if (!value) {
				throw new ConfigError(`${flag} requires a value`);
			}
			result[key] = value;
			i++;
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--stdio") {
			result.stdio = true;
		} else if (arg === "--visible") {
			result.visible = true;
		} else if (arg === "-v" || arg === "--verbose") {
			result.verbose = true;
		} else if (arg === "--version") {
			result.version = true;
		} else if (arg === "-h" || arg === "--help") {
			result.help = true;
		} else {
			result.rest.push(arg);
		}
		i++;
	}

	return result;
}

/**
 * The settings layer the flags form. Only flags that were given appear, so
 * the file and environment keep their say over the rest.
 */
export function toSettingsOverrides(args: ParsedArgs): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	if (args.policy !== undefined) overrides.policy = args.policy;
	if (args.visible) overrides.visible = true;
	if (args.verbose) overrides.verbose = true;
	if (args.logFile !== undefined) overrides.logFile = args.logFile;
	if (args.engine !== undefined) overrides.engine = args.engine;
	return overrides;
}

export const HELP_TEXT =
	"\nwebpuppet-mcp — browser automation tools over the Model Context Protocol\n\n" +
	"Usage:\n" +
	"  webpuppet-mcp [--stdio] [options]\n\n" +
	"Options:\n" +
	"  --policy <name>      Permission policy: secure (default), permissive, readonly\n" +
	"  --visible            Show the browser window instead of running headless\n" +
	"  -v, --verbose        Log at debug level\n" +
	"  --log-file <path>    Write logs to a file instead of stderr\n" +
	"  --engine <module>    Automation engine module exporting createAutomation\n" +
	"  -h, --help           Show this help\n" +
	"  --version            Show the version\n\n" +
	"Environment variables:\n" +
	"  WEBPUPPET_POLICY     Permission policy\n" +
	"  WEBPUPPET_VISIBLE    true to show the browser\n" +
	"  WEBPUPPET_VERBOSE    true for debug logging\n" +
	"  WEBPUPPET_LOG_FILE   Log file path\n" +
	"  WEBPUPPET_ENGINE     Automation engine module\n" +
	"  WEBPUPPET_HOME       Settings directory (default: ~/.webpuppet)\n" +
	"  LOG_LEVEL            Overrides the log level\n\n";
