/**
 * @webpuppet/cli — Automation engine loader.
 *
 * An engine is an ES module exporting `createAutomation`, an
 * {@link AutomationFactory}. Paths are resolved against the working
 * directory; anything else is imported as a package name.
 */

import path from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigError, createLogger, errorMessage, isPlainObject } from "@webpuppet/core";
import { McpAutomationError } from "@webpuppet/mcp";
import type { AutomationFactory, AutomationHandle, AutomationOptions } from "@webpuppet/mcp";

const log = createLogger("cli:engine");

type UntypedFactory = (options: AutomationOptions) => unknown;

function isFactory(value: unknown): value is UntypedFactory {
	return typeof value === "function";
}

const HANDLE_METHODS = ["authenticate", "promptScreened", "getSession", "providerCapabilities", "close"] as const;

/** Whether a value has every method of {@link AutomationHandle}. */
export function isAutomationHandle(value: unknown): value is AutomationHandle {
	if (typeof value !== "object" || value === null) return false;
	return HANDLE_METHODS.every((method) => method in value && typeof Reflect.get(value, method) === "function");
}

/** The URL or bare specifier to import for an `--engine` value. */
export function resolveEngineSpecifier(specifier: string, cwd: string = process.cwd()): string {
	if (specifier.startsWith(".") || path.isAbsolute(specifier)) {
		return pathToFileURL(path.resolve(cwd, specifier)).href;
	}
	return specifier;
}

/**
 * Import an engine module and return its factory. The returned factory
 * checks what the engine hands back before the server uses it.
 *
 * @throws {ConfigError} When the module cannot be imported or exports no factory.
 */
export async function loadAutomationEngine(specifier: string, cwd?: string): Promise<AutomationFactory> {
	const target = resolveEngineSpecifier(specifier, cwd);
	let mod: unknown;
	try {
		mod = await import(target);
	} catch (err) {
		throw new ConfigError(`Failed to load automation engine "${specifier}": ${errorMessage(err)}`, err);
	}

	const factory = isPlainObject(mod) ? mod.createAutomation : undefined;
	if (!isFactory(factory)) {
		throw new ConfigError(`Automation engine "${specifier}" does not export a createAutomation function`);
	}
	log.info("Loaded automation engine", { engine: specifier });

	return async (options) => {
		const handle = await factory(options);
		if (!isAutomationHandle(handle)) {
			throw new McpAutomationError(`engine "${specifier}" returned an object that is not an automation handle`);
		}
		return handle;
	};
}
