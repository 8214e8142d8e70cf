/**
 * Typed error hierarchy for webpuppet.
 *
 * Every webpuppet error extends {@link WebpuppetError} and carries a
 * machine-readable `code` string so callers can branch on the failure kind
 * without matching on message text.
 */

/**
 * Base error class for all webpuppet errors.
 *
 * `code` is a stable identifier such as `"CONFIG_ERROR"`; `message` is for
 * humans. The optional `cause` keeps the wrapped collaborator error around
 * for logs without exposing it on the wire.
 */
export class WebpuppetError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "WebpuppetError";
		this.code = code;
	}
}

/**
 * Configuration error (unreadable settings file, unknown policy name, etc.).
 */
export class ConfigError extends WebpuppetError {
	constructor(message: string, cause?: unknown) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}

/**
 * A value failed runtime validation. `path` points at the offending field
 * (`"$"` for the root value).
 */
export class ValidationError extends WebpuppetError {
	readonly path: string;

	constructor(message: string, path = "$") {
		super(message, "VALIDATION_ERROR");
		this.name = "ValidationError";
		this.path = path;
	}
}

/**
 * The active permission policy rejected an operation.
 */
export class PermissionDeniedError extends WebpuppetError {
	readonly operation: string;
	readonly url?: string;

	constructor(message: string, operation: string, url?: string) {
		super(message, "PERMISSION_DENIED");
		this.name = "PermissionDeniedError";
		this.operation = operation;
		this.url = url;
	}
}

/**
 * Render any thrown value as a one-line message. Stack traces are never
 * included.
 */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
