/**
 * @webpuppet/cli — Server bootstrap.
 *
 * Resolves settings (file, environment, flags), configures logging, builds
 * the permission guard and tool context, and serves MCP over stdio.
 */

import type { Readable, Writable } from "node:stream";
import {
	FileTransport,
	LogLevel,
	StderrTransport,
	configureLogging,
	createLogger,
	errorMessage,
	loadSettings,
} from "@webpuppet/core";
import type { WebpuppetSettings } from "@webpuppet/core";
import { PermissionGuard, SECURE_POLICY, createScreeningConfig, resolvePolicy } from "@webpuppet/guard";
import type { PermissionPolicy } from "@webpuppet/guard";
import { McpServer, SERVER_NAME, SERVER_VERSION, StdioLineTransport, ToolContext } from "@webpuppet/mcp";
import type { AutomationFactory } from "@webpuppet/mcp";
import { HELP_TEXT, parseArgs, toSettingsOverrides } from "./args.js";
import { loadAutomationEngine } from "./engine-loader.js";

/** Streams the process talks through. */
export interface CliIo {
	stdin: Readable;
	/** Protocol output only. */
	stdout: Writable;
	/** Help, version and logs. */
	stderr: Writable;
}

const PROCESS_IO: CliIo = {
	stdin: process.stdin,
	stdout: process.stdout,
	stderr: process.stderr,
};

function setupLogging(settings: WebpuppetSettings, io: CliIo): void {
	configureLogging({
		level: settings.verbose ? LogLevel.DEBUG : LogLevel.INFO,
		transports: settings.logFile
			? [new FileTransport({ filePath: settings.logFile })]
			: [new StderrTransport(io.stderr)],
	});
}

function selectPolicy(name: string): PermissionPolicy {
	const policy = resolvePolicy(name);
	if (policy) return policy;
	createLogger("cli").error(`Unknown policy "${name}", falling back to secure`);
	return SECURE_POLICY;
}

/**
 * Run the server until the peer shuts it down or input ends.
 *
 * @returns The process exit code: 0 after a clean stop, 1 on any failure.
 */
export async function main(argv: string[] = process.argv.slice(2), io: CliIo = PROCESS_IO): Promise<number> {
	let settings: WebpuppetSettings;
	try {
		const args = parseArgs(argv);
		if (args.help) {
			io.stderr.write(HELP_TEXT);
			return 0;
		}
		if (args.version) {
			io.stderr.write(`${SERVER_NAME} v${SERVER_VERSION}\n`);
			return 0;
		}

		settings = loadSettings(toSettingsOverrides(args));
		setupLogging(settings, io);
		if (args.rest.length > 0) {
			createLogger("cli").warn("Ignoring unrecognised arguments", { args: args.rest });
		}
	} catch (err) {
		io.stderr.write(`${SERVER_NAME}: ${errorMessage(err)}\n`);
		return 1;
	}

	const log = createLogger("cli");
	try {
		const policy = selectPolicy(settings.policy);
		const screening = createScreeningConfig(settings.screening);

		let automationFactory: AutomationFactory | null = null;
		if (settings.engine) {
			automationFactory = await loadAutomationEngine(settings.engine);
		} else {
			log.warn("No automation engine configured; browser tools will fail until one is set with --engine");
		}

		const context = new ToolContext({
			permissions: new PermissionGuard(policy),
			screening,
			headless: !settings.visible,
			automationFactory,
		});
		const server = new McpServer({ context });

		log.info("Starting", { policy: policy.name, headless: context.headless });
		await server.run(new StdioLineTransport(io.stdin, io.stdout));
		return 0;
	} catch (err) {
		log.fatal("Server stopped with an error", err);
		return 1;
	}
}
