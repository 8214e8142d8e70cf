import { describe, it, expect } from "vitest";
import { PassThrough, Writable } from "node:stream";
import { McpIoError } from "../src/mcp-errors.js";
import { McpServer } from "../src/server.js";
import { StdioLineTransport } from "../src/transport/stdio.js";
import { createTestContext, quietLogger } from "./fakes.js";

function collect(stream: PassThrough): string {
	const chunks: string[] = [];
	let chunk: unknown = stream.read();
	while (chunk !== null) {
		chunks.push(String(chunk));
		chunk = stream.read();
	}
	return chunks.join("");
}

describe("StdioLineTransport", () => {
	// ═══════════════════════════════════════════════════════════════════════
	// Reading
	// ═══════════════════════════════════════════════════════════════════════

	it("should split chunks into lines", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough());

		input.write('{"a":1}\n{"b"');
		input.write(':2}\r\n');
		expect(await transport.readLine()).toBe('{"a":1}');
		expect(await transport.readLine()).toBe('{"b":2}');
	});

	it("should wait for a line that has not arrived yet", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough());

		const pending = transport.readLine();
		input.write("late\n");
		expect(await pending).toBe("late");
	});

	it("should deliver an unterminated last line and then end", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough());

		input.end("first\nlast");
		expect(await transport.readLine()).toBe("first");
		expect(await transport.readLine()).toBe("last");
		expect(await transport.readLine()).toBeNull();
		expect(await transport.readLine()).toBeNull();
	});

	it("should keep empty lines for the caller to skip", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough());

		input.end("\n\nx\n");
		expect(await transport.readLine()).toBe("");
		expect(await transport.readLine()).toBe("");
		expect(await transport.readLine()).toBe("x");
	});

	it("should pause the input while too many lines wait and resume once drained", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough(), { maxQueuedLines: 4 });

		input.write("1\n2\n3\n4\n5\n");
		expect(await transport.readLine()).toBe("1");
		expect(input.isPaused()).toBe(true);

		expect(await transport.readLine()).toBe("2");
		expect(input.isPaused()).toBe(true);

		expect(await transport.readLine()).toBe("3");
		expect(input.isPaused()).toBe(false);

		input.end("6\n");
		expect(await transport.readLine()).toBe("4");
		expect(await transport.readLine()).toBe("5");
		expect(await transport.readLine()).toBe("6");
		expect(await transport.readLine()).toBeNull();
	});

	it("should turn input errors into I/O errors", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough());

		const pending = transport.readLine();
		input.destroy(new Error("EIO"));
		await expect(pending).rejects.toThrow("I/O error: reading input failed: EIO");
	});

	it("should end pending reads on close", async () => {
		const input = new PassThrough();
		const transport = new StdioLineTransport(input, new PassThrough());

		const pending = transport.readLine();
		await transport.close();
		expect(await pending).toBeNull();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Writing
	// ═══════════════════════════════════════════════════════════════════════

	it("should terminate each written line with a newline", async () => {
		const output = new PassThrough();
		const transport = new StdioLineTransport(new PassThrough(), output);

		await transport.writeLine('{"jsonrpc":"2.0","id":1,"result":{}}');
		await transport.writeLine("second");
		expect(collect(output)).toBe('{"jsonrpc":"2.0","id":1,"result":{}}\nsecond\n');
	});

	it("should reject when the output fails", async () => {
		const output = new Writable({
			write(_chunk, _encoding, callback) {
				callback(new Error("EPIPE"));
			},
		});
		output.on("error", () => {});
		const transport = new StdioLineTransport(new PassThrough(), output);

		await expect(transport.writeLine("x")).rejects.toBeInstanceOf(McpIoError);
	});

	// ═══════════════════════════════════════════════════════════════════════
	// End to End
	// ═══════════════════════════════════════════════════════════════════════

	it("should serve a session over streams", async () => {
		const input = new PassThrough();
		const output = new PassThrough();
		const { ctx } = createTestContext();
		const server = new McpServer({ context: ctx, logger: quietLogger() });

		input.end(
			'{"jsonrpc":"2.0","id":1,"method":"initialize","params":' +
			'{"protocolVersion":"2024-11-05","capabilities":{},"clientInfo":{"name":"t","version":"1"}}}\n' +
			'{"jsonrpc":"2.0","method":"notifications/initialized"}\n' +
			'{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"webpuppet_pause","arguments":{}}}\n' +
			"not json\n",
		);
		await server.run(new StdioLineTransport(input, output));

		const lines = collect(output).trimEnd().split("\n");
		expect(lines).toHaveLength(3);
		expect(JSON.parse(lines[0]).result.serverInfo.name).toBe("webpuppet-mcp");
		expect(JSON.parse(lines[1]).result.content[0].text).toContain("Automation Paused");
		expect(JSON.parse(lines[2])).toMatchObject({ id: null, error: { code: -32700 } });
	});
});
