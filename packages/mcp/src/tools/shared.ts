/**
 * Helpers shared by the built-in tool factories.
 */

import { PermissionDeniedError, ValidationError, check } from "@webpuppet/core";
import type { ValidatorFn } from "@webpuppet/core";
import type { Operation } from "@webpuppet/guard";
import type { PermissionGate } from "../collaborators.js";
import { McpInvalidParamsError, McpPermissionDeniedError } from "../mcp-errors.js";
import type { ToolCallResult } from "../types.js";

/** A single text content item. */
export function textResult(text: string, isError = false): ToolCallResult {
	return { content: [{ type: "text", text }], isError };
}

/**
 * Validate tool arguments.
 *
 * @throws {McpInvalidParamsError} Naming the tool and the offending field.
 */
export function parseArgs<T>(tool: string, args: Record<string, unknown>, validator: ValidatorFn<T>): T {
	try {
		return check(args, validator, tool);
	} catch (err) {
		if (err instanceof ValidationError) {
			throw new McpInvalidParamsError(err.message, err);
		}
		throw err;
	}
}

/**
 * Ask the gate for an operation, optionally against a target URL.
 *
 * @throws {McpPermissionDeniedError} When the policy says no.
 */
export function requirePermission(gate: PermissionGate, operation: Operation, url?: string): void {
	try {
		if (url === undefined) {
			gate.require(operation);
		} else {
			gate.requireWithUrl(operation, url);
		}
	} catch (err) {
		if (err instanceof PermissionDeniedError) {
			throw new McpPermissionDeniedError(err.message, err);
		}
		throw err;
	}
}

/** JSON Schema for the optional `provider` argument of session tools. */
export const SESSION_PROVIDER_SCHEMA = {
	type: "string",
	description: "Provider whose browser session to use. Default: grok.",
} as const;
