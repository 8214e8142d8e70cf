/**
 * Runtime validation for untrusted JSON: RPC params, tool arguments and
 * settings files.
 *
 * A small fluent builder; each builder exposes a `validate` function that
 * returns either the typed value or an error string.
 */

import { ValidationError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorResult<T> = { valid: true; value: T } | { valid: false; error: string };

export type ValidatorFn<T = unknown> = (value: unknown) => ValidatorResult<T>;

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

/** True for plain JSON objects (not arrays, not null). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	validate: ValidatorFn<string> = (value) => {
		if (typeof value !== "string") {
			return { valid: false, error: `expected string, received ${describe(value)}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `must be at least ${this.minLen} character(s)` };
		}
		return { valid: true, value };
	};
}

class NumberValidator {
	private intOnly = false;

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `expected number, received ${describe(value)}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `expected integer, received ${value}` };
		}
		return { valid: true, value };
	};
}

class BooleanValidator {
	validate: ValidatorFn<boolean> = (value) => {
		if (typeof value !== "boolean") {
			return { valid: false, error: `expected boolean, received ${describe(value)}` };
		}
		return { valid: true, value };
	};
}

class RecordValidator {
	validate: ValidatorFn<Record<string, unknown>> = (value) => {
		if (!isPlainObject(value)) {
			return { valid: false, error: `expected object, received ${describe(value)}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private readonly schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value) => {
		if (!isPlainObject(value)) {
			return { valid: false, error: `expected object, received ${describe(value)}` };
		}
		const out: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const field = validator(value[key]);
			if (field.valid) {
				if (field.value !== undefined) out[key] = field.value;
			} else {
				errors.push(`${key}: ${field.error}`);
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		return { valid: true, value: out as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private readonly inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Validator builders.
 *
 * ```ts
 * const args = v.object({
 *   url: v.string().min(1).validate,
 *   timeout: v.optional(v.number().integer().validate).validate,
 * }).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	boolean: () => new BooleanValidator(),
	record: () => new RecordValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
};

/**
 * Validate `value` or throw a {@link ValidationError}.
 *
 * @param label - Prefix for the error message, e.g. `"initialize params"`.
 */
export function check<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validator(value);
	if (!result.valid) {
		throw new ValidationError(label ? `${label}: ${result.error}` : result.error);
	}
	return result.value;
}
