import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { PassThrough } from "stream";
import {
	LogLevel,
	Logger,
	StderrTransport,
	FileTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	parseLogLevel,
} from "@webpuppet/core";
import type { LogEntry, LogTransport } from "@webpuppet/core";

// ─── Test Transport ──────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
	last(): LogEntry | undefined {
		return this.entries[this.entries.length - 1];
	}
}

function readAll(stream: PassThrough): string {
	const chunk: unknown = stream.read();
	return chunk === null ? "" : String(chunk);
}

function sampleEntry(overrides: Partial<LogEntry> = {}): LogEntry {
	return {
		timestamp: "2026-01-02T03:04:05.678Z",
		level: LogLevel.INFO,
		levelName: "INFO",
		message: "hello",
		context: {},
		logger: "mcp:server",
		...overrides,
	};
}

describe("Logger", () => {
	let transport: TestTransport;

	beforeEach(() => {
		transport = new TestTransport();
		resetLoggingConfig();
		vi.stubEnv("LOG_LEVEL", "");
	});

	afterEach(() => {
		resetLoggingConfig();
		vi.unstubAllEnvs();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Level Filtering
	// ═══════════════════════════════════════════════════════════════════════

	describe("log level filtering", () => {
		it("should emit entries at or above the configured level", () => {
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			logger.debug("hidden");
			logger.info("shown");
			logger.warn("also shown");
			expect(transport.entries.map((e) => e.message)).toEqual(["shown", "also shown"]);
		});

		it("should default to INFO", () => {
			expect(new Logger("test", { transports: [transport] }).getLevel()).toBe(LogLevel.INFO);
		});

		it("should let LOG_LEVEL override the configured level", () => {
			vi.stubEnv("LOG_LEVEL", "error");
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			expect(logger.getLevel()).toBe(LogLevel.ERROR);
		});

	});

	// ═══════════════════════════════════════════════════════════════════════
	// Entry Shape
	// ═══════════════════════════════════════════════════════════════════════

	describe("entries", () => {
		it("should carry level name, logger name and context", () => {
			const logger = new Logger("mcp", { level: LogLevel.DEBUG, transports: [transport] });
			logger.info("started", { tools: 12 });
			const entry = transport.last();
			expect(entry?.levelName).toBe("INFO");
			expect(entry?.logger).toBe("mcp");
			expect(entry?.context).toEqual({ tools: 12 });
		});

		it("should lift requestId out of the context", () => {
			const logger = new Logger("mcp", { transports: [transport] });
			logger.info("cancelled", { requestId: 7, reason: "user" });
			expect(transport.last()?.requestId).toBe("7");
			expect(transport.last()?.context).toEqual({ reason: "user" });
		});

		it("should record Error details", () => {
			const logger = new Logger("mcp", { transports: [transport] });
			logger.error("failed", new TypeError("bad"));
			expect(transport.last()?.error?.name).toBe("TypeError");
			expect(transport.last()?.error?.message).toBe("bad");
		});

		it("should stringify non-Error values passed as errors", () => {
			const logger = new Logger("mcp", { transports: [transport] });
			logger.fatal("failed", "boom");
			expect(transport.last()?.error).toEqual({ name: "Error", message: "boom" });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Children & Context
	// ═══════════════════════════════════════════════════════════════════════

	describe("child", () => {
		it("should name children parent:child", () => {
			const child = new Logger("mcp", { transports: [transport] }).child("server");
			child.info("x");
			expect(transport.last()?.logger).toBe("mcp:server");
		});

		it("should share level and context with the parent", () => {
			const base = new Logger("mcp", { level: LogLevel.WARN, transports: [transport], defaultContext: { a: 1 } });
			const child = base.child("tools");
			child.info("dropped");
			child.warn("kept", { b: 2 });
			expect(transport.entries.map((e) => e.message)).toEqual(["kept"]);
			expect(transport.last()?.context).toEqual({ a: 1, b: 2 });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Global Configuration
	// ═══════════════════════════════════════════════════════════════════════

	describe("configureLogging", () => {
		it("should apply global transports and level to new loggers", () => {
			configureLogging({ level: LogLevel.WARN, transports: [transport] });
			const logger = createLogger("late");
			logger.info("dropped");
			logger.warn("kept");
			expect(transport.entries.map((e) => e.message)).toEqual(["kept"]);
		});

		it("should reach loggers created before it was called", () => {
			const early = createLogger("early");
			configureLogging({ level: LogLevel.DEBUG, transports: [transport] });
			early.debug("seen");
			expect(transport.entries.map((e) => e.message)).toEqual(["seen"]);
			expect(early.child("sub").getLevel()).toBe(LogLevel.DEBUG);
		});
	});
});

describe("parseLogLevel", () => {
	it("should parse names case-insensitively", () => {
		expect(parseLogLevel("DEBUG")).toBe(LogLevel.DEBUG);
		expect(parseLogLevel(" warn ")).toBe(LogLevel.WARN);
	});

	it("should return undefined for unknown or empty names", () => {
		expect(parseLogLevel("loud")).toBeUndefined();
		expect(parseLogLevel(undefined)).toBeUndefined();
	});
});

// ═══════════════════════════════════════════════════════════════════════════
// Transports
// ═══════════════════════════════════════════════════════════════════════════

describe("StderrTransport", () => {
	it("should write one human-readable line", () => {
		const out = new PassThrough();
		new StderrTransport(out).write(sampleEntry({ context: { n: 1 }, requestId: "3" }));
		expect(readAll(out)).toBe("03:04:05.678 INFO  [mcp:server] hello n=1 req=3\n");
	});
});

describe("FileTransport", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "webpuppet-log-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("should append JSON lines", () => {
		const filePath = path.join(dir, "server.log");
		const transport = new FileTransport({ filePath });
		transport.write(sampleEntry({ message: "one" }));
		transport.write(sampleEntry({ message: "two" }));

		const lines = fs.readFileSync(filePath, "utf-8").trim().split("\n");
		expect(lines.map((line) => JSON.parse(line).message)).toEqual(["one", "two"]);
	});

	it("should rotate once the size limit is reached", () => {
		const filePath = path.join(dir, "server.log");
		const transport = new FileTransport({ filePath, maxSizeBytes: 10, maxFiles: 2 });
		transport.write(sampleEntry({ message: "first" }));
		transport.write(sampleEntry({ message: "second" }));

		expect(JSON.parse(fs.readFileSync(`${filePath}.1`, "utf-8")).message).toBe("first");
		expect(JSON.parse(fs.readFileSync(filePath, "utf-8")).message).toBe("second");
	});
});
