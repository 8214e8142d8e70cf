/**
 * @webpuppet/mcp — line-delimited stdio transport.
 *
 * One JSON document per line in each direction. Reads are pulled one line
 * at a time; each write resolves only once the stream has flushed it.
 *
 * @module transport/stdio
 */

import type { Readable, Writable } from "node:stream";
import { errorMessage } from "@webpuppet/core";
import { McpIoError } from "../mcp-errors.js";

/** The byte-stream seam the server loop runs over. */
export interface LineTransport {
	/** Next line without its terminator, or null once input has ended. */
	readLine(): Promise<string | null>;
	/** Write `line` plus a newline and wait until it is flushed. */
	writeLine(line: string): Promise<void>;
	close(): Promise<void>;
}

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/** Create a zero-length Buffer. */
function emptyBuffer(): Buffer {
	return Buffer.alloc(0);
}

/** Split one complete line off the front of the buffer, if there is one. */
function tryConsumeLine(buffer: Buffer): { line: string; consumed: number } | null {
	const newlineIndex = buffer.indexOf(NEWLINE);
	if (newlineIndex === -1) return null;

	const end = newlineIndex > 0 && buffer[newlineIndex - 1] === CARRIAGE_RETURN ? newlineIndex - 1 : newlineIndex;
	return {
		line: buffer.subarray(0, end).toString("utf8"),
		consumed: newlineIndex + 1,
	};
}

/** Queued lines at which reading from the input stream pauses. */
export const DEFAULT_MAX_QUEUED_LINES = 64;

export interface StdioLineTransportOptions {
	/** Pause the input once this many lines wait unread; resume at half. */
	maxQueuedLines?: number;
}

type PendingRead = {
	resolve: (line: string | null) => void;
	reject: (err: Error) => void;
};

/**
 * {@link LineTransport} over a readable and a writable stream,
 * `process.stdin` / `process.stdout` by default.
 *
 * A final line without a trailing newline is still delivered when input
 * ends. Input is paused while too many lines wait unread. Closing stops
 * reading but leaves the output stream open.
 */
export class StdioLineTransport implements LineTransport {
	private readonly input: Readable;
	private readonly output: Writable;
	private readonly maxQueuedLines: number;
	private buffer: Buffer = emptyBuffer();
	private readonly lines: string[] = [];
	private pending: PendingRead | null = null;
	private started = false;
	private throttled = false;
	private ended = false;
	private failure: McpIoError | null = null;

	private readonly onData = (chunk: Buffer | string): void => {
		const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
		this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

		let next = tryConsumeLine(this.buffer);
		while (next) {
			this.lines.push(next.line);
			this.buffer = this.buffer.subarray(next.consumed);
			next = tryConsumeLine(this.buffer);
		}
		this.deliver();
		if (!this.throttled && this.lines.length >= this.maxQueuedLines) {
			this.throttled = true;
			this.input.pause();
		}
	};

	private readonly onEnd = (): void => {
		if (this.buffer.length > 0) {
			this.lines.push(this.buffer.toString("utf8"));
			this.buffer = emptyBuffer();
		}
		this.ended = true;
		this.deliver();
	};

	private readonly onError = (err: Error): void => {
		this.failure = new McpIoError(`reading input failed: ${errorMessage(err)}`, err);
		this.deliver();
	};

	constructor(
		input: Readable = process.stdin,
		output: Writable = process.stdout,
		options: StdioLineTransportOptions = {},
	) {
		this.input = input;
		this.output = output;
		this.maxQueuedLines = Math.max(1, options.maxQueuedLines ?? DEFAULT_MAX_QUEUED_LINES);
	}

	readLine(): Promise<string | null> {
		this.start();
		const line = this.lines.shift();
		if (line !== undefined) {
			this.resumeIfDrained();
			return Promise.resolve(line);
		}
		if (this.failure) return Promise.reject(this.failure);
		if (this.ended) return Promise.resolve(null);

		return new Promise<string | null>((resolve, reject) => {
			this.pending = { resolve, reject };
		});
	}

	writeLine(line: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this.output.write(`${line}\n`, (err) => {
				if (err) {
					reject(new McpIoError(`writing output failed: ${errorMessage(err)}`, err));
				} else {
					resolve();
				}
			});
		});
	}

	async close(): Promise<void> {
		this.input.off("data", this.onData);
		this.input.off("end", this.onEnd);
		this.input.off("error", this.onError);
		this.input.pause();
		this.throttled = false;
		this.ended = true;
		this.deliver();
	}

	private start(): void {
		if (this.started) return;
		this.started = true;
		this.input.on("data", this.onData);
		this.input.on("end", this.onEnd);
		this.input.on("error", this.onError);
	}

	private resumeIfDrained(): void {
		if (!this.throttled || this.ended) return;
		if (this.lines.length > Math.floor(this.maxQueuedLines / 2)) return;
		this.throttled = false;
		this.input.resume();
	}

	private deliver(): void {
		const pending = this.pending;
		if (!pending) return;

		const line = this.lines.shift();
		if (line !== undefined) {
			this.pending = null;
			pending.resolve(line);
		} else if (this.failure) {
			this.pending = null;
			pending.reject(this.failure);
		} else if (this.ended) {
			this.pending = null;
			pending.resolve(null);
		}
	}
}
