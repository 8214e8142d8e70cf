import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import { fileURLToPath } from "node:url";
import { resetLoggingConfig } from "@webpuppet/core";
import { SERVER_VERSION } from "@webpuppet/mcp";
import { main } from "../src/main.js";
import type { CliIo } from "../src/main.js";

const echoEngine = fileURLToPath(new URL("./fixtures/echo-engine.ts", import.meta.url));

interface Harness {
	io: CliIo;
	stdout: () => string;
	stderr: () => string;
}

function harness(input: string[]): Harness {
	const stdin = new PassThrough();
	const stdout = new PassThrough();
	const stderr = new PassThrough();
	const out: string[] = [];
	const err: string[] = [];
	stdout.on("data", (chunk: Buffer) => out.push(chunk.toString("utf-8")));
	stderr.on("data", (chunk: Buffer) => err.push(chunk.toString("utf-8")));
	stdin.end(input.map((line) => line + "\n").join(""));
	return {
		io: { stdin, stdout, stderr },
		stdout: () => out.join(""),
		stderr: () => err.join(""),
	};
}

const INITIALIZE = JSON.stringify({
	jsonrpc: "2.0",
	id: 1,
	method: "initialize",
	params: { protocolVersion: "2024-11-05", capabilities: {}, clientInfo: { name: "test-client", version: "1.0" } },
});

function callTool(id: number, name: string, args: Record<string, unknown>): string {
	return JSON.stringify({ jsonrpc: "2.0", id, method: "tools/call", params: { name, arguments: args } });
}

function responses(output: string): Array<Record<string, unknown>> {
	return output
		.split("\n")
		.filter((line) => line !== "")
		.map((line): Record<string, unknown> => JSON.parse(line));
}

function toolText(response: Record<string, unknown>): string {
	const result = response.result;
	if (typeof result !== "object" || result === null || !("content" in result) || !Array.isArray(result.content)) {
		throw new Error(`not a tool result: ${JSON.stringify(response)}`);
	}
	const [item] = result.content;
	return typeof item === "object" && item !== null && "text" in item ? String(item.text) : "";
}

describe("main", () => {
	beforeEach(() => {
		resetLoggingConfig();
		for (const name of ["WEBPUPPET_POLICY", "WEBPUPPET_VISIBLE", "WEBPUPPET_VERBOSE", "WEBPUPPET_LOG_FILE", "WEBPUPPET_ENGINE", "LOG_LEVEL"]) {
			vi.stubEnv(name, "");
		}
	});

	afterEach(() => {
		resetLoggingConfig();
		vi.unstubAllEnvs();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Informational flags
	// ═══════════════════════════════════════════════════════════════════════

	it("should print help to stderr and leave stdout empty", async () => {
		const h = harness([]);
		expect(await main(["--help"], h.io)).toBe(0);
		expect(h.stderr()).toContain("Usage:");
		expect(h.stdout()).toBe("");
	});

	it("should print the version", async () => {
		const h = harness([]);
		expect(await main(["--version"], h.io)).toBe(0);
		expect(h.stderr()).toBe(`webpuppet-mcp v${SERVER_VERSION}\n`);
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Startup failures
	// ═══════════════════════════════════════════════════════════════════════

	it("should fail on a flag without its value", async () => {
		const h = harness([]);
		expect(await main(["--policy"], h.io)).toBe(1);
		expect(h.stderr()).toBe("webpuppet-mcp: --policy requires a value\n");
	});

	it("should fail on a malformed boolean in the environment", async () => {
		vi.stubEnv("WEBPUPPET_VISIBLE", "sometimes");
		const h = harness([]);
		expect(await main([], h.io)).toBe(1);
		expect(h.stderr()).toBe('webpuppet-mcp: WEBPUPPET_VISIBLE must be a boolean (true/false), got "sometimes"\n');
	});

	it("should fail when the engine cannot be loaded", async () => {
		const h = harness([INITIALIZE]);
		expect(await main(["--engine", "./no-such-engine.js"], h.io)).toBe(1);
		expect(h.stderr()).toContain('Failed to load automation engine "./no-such-engine.js"');
		expect(h.stdout()).toBe("");
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Serving
	// ═══════════════════════════════════════════════════════════════════════

	it("should serve until input ends", async () => {
		const h = harness([INITIALIZE, JSON.stringify({ jsonrpc: "2.0", id: 2, method: "ping" })]);
		expect(await main(["--stdio"], h.io)).toBe(0);

		const [init, ping] = responses(h.stdout());
		expect(init.id).toBe(1);
		expect(init.result).toEqual({
			protocolVersion: "2024-11-05",
			capabilities: { tools: { listChanged: false } },
			serverInfo: { name: "webpuppet-mcp", version: SERVER_VERSION },
		});
		expect(ping).toEqual({ jsonrpc: "2.0", id: 2, result: {} });
		expect(h.stderr()).toContain("No automation engine configured");
	});

	it("should apply the policy given on the command line", async () => {
		const h = harness([INITIALIZE, callTool(2, "webpuppet_check_permission", { operation: "SendPrompt" })]);
		expect(await main(["--policy", "readonly"], h.io)).toBe(0);

		const [, check] = responses(h.stdout());
		expect(toolText(check)).toContain("**Status**: ❌ DENIED");
	});

	it("should fall back to the secure policy for an unknown name", async () => {
		const h = harness([INITIALIZE, callTool(2, "webpuppet_check_permission", { operation: "SendPrompt" })]);
		expect(await main(["--policy", "reckless"], h.io)).toBe(0);

		const [, check] = responses(h.stdout());
		expect(toolText(check)).toContain("**Status**: ✅ ALLOWED");
		expect(h.stderr()).toContain('Unknown policy "reckless", falling back to secure');
	});

	it("should prompt through a loaded engine", async () => {
		const h = harness([INITIALIZE, callTool(2, "webpuppet_prompt", { provider: "claude", message: "hi" })]);
		expect(await main(["--engine", echoEngine], h.io)).toBe(0);

		const [, prompt] = responses(h.stdout());
		expect(toolText(prompt)).toBe("echo: hi");
	});

	it("should stop after shutdown without reading further input", async () => {
		const h = harness([
			INITIALIZE,
			JSON.stringify({ jsonrpc: "2.0", id: 2, method: "shutdown" }),
			JSON.stringify({ jsonrpc: "2.0", id: 3, method: "ping" }),
		]);
		expect(await main([], h.io)).toBe(0);
		expect(responses(h.stdout()).map((r) => r.id)).toEqual([1, 2]);
	});

	it("should write logs to the log file instead of stderr", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "webpuppet-main-"));
		const logFile = path.join(dir, "server.log");
		try {
			const h = harness([INITIALIZE]);
			expect(await main(["--log-file", logFile], h.io)).toBe(0);
			expect(h.stderr()).toBe("");
			expect(fs.readFileSync(logFile, "utf-8")).toContain('"message":"Client initialized"');
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});
