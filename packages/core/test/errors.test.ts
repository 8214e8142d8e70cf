import { describe, it, expect } from "vitest";
import {
	WebpuppetError,
	ConfigError,
	ValidationError,
	PermissionDeniedError,
	errorMessage,
} from "../src/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// WEBPUPPET ERROR (Base)
// ═══════════════════════════════════════════════════════════════════════════

describe("WebpuppetError", () => {
	it("should store message and code", () => {
		const err = new WebpuppetError("something broke", "MY_CODE");
		expect(err.message).toBe("something broke");
		expect(err.code).toBe("MY_CODE");
		expect(err.name).toBe("WebpuppetError");
	});

	it("should be an instance of Error", () => {
		expect(new WebpuppetError("msg", "C")).toBeInstanceOf(Error);
	});

	it("should support cause chaining", () => {
		const cause = new Error("root cause");
		const err = new WebpuppetError("wrapper", "WRAP", cause);
		expect(err.cause).toBe(cause);
	});

	it("should have undefined cause when not provided", () => {
		expect(new WebpuppetError("msg", "C").cause).toBeUndefined();
	});
});

// ═══════════════════════════════════════════════════════════════════════════
// SUBCLASSES
// ═══════════════════════════════════════════════════════════════════════════

describe("ConfigError", () => {
	it("should have code 'CONFIG_ERROR'", () => {
		const err = new ConfigError("bad file");
		expect(err.code).toBe("CONFIG_ERROR");
		expect(err.name).toBe("ConfigError");
		expect(err).toBeInstanceOf(WebpuppetError);
	});
});

describe("ValidationError", () => {
	it("should default the path to the root", () => {
		const err = new ValidationError("expected string");
		expect(err.code).toBe("VALIDATION_ERROR");
		expect(err.path).toBe("$");
	});

	it("should keep an explicit path", () => {
		expect(new ValidationError("bad", "$.clientInfo.name").path).toBe("$.clientInfo.name");
	});
});

describe("PermissionDeniedError", () => {
	it("should carry the operation and url", () => {
		const err = new PermissionDeniedError("denied", "Navigate", "https://example.com");
		expect(err.code).toBe("PERMISSION_DENIED");
		expect(err.operation).toBe("Navigate");
		expect(err.url).toBe("https://example.com");
	});

	it("should leave url undefined when none is given", () => {
		expect(new PermissionDeniedError("denied", "Click").url).toBeUndefined();
	});
});

// ═══════════════════════════════════════════════════════════════════════════
// errorMessage
// ═══════════════════════════════════════════════════════════════════════════

describe("errorMessage", () => {
	it("should return the message of an Error", () => {
		expect(errorMessage(new TypeError("nope"))).toBe("nope");
	});

	it("should stringify anything else", () => {
		expect(errorMessage("plain")).toBe("plain");
		expect(errorMessage(42)).toBe("42");
	});
});
