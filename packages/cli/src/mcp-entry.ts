#!/usr/bin/env node

/**
 * @webpuppet/cli — MCP Server Entry Point.
 *
 * Standalone binary for MCP clients:
 *
 *   webpuppet-mcp                          Stdio mode, secure policy
 *   webpuppet-mcp --policy readonly        Read-only browsing
 *   webpuppet-mcp --engine ./engine.js     Load an automation engine
 */

import { main } from "./main.js";

main().then(
	(code) => process.exit(code),
	(err: unknown) => {
		process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
		process.exit(1);
	},
);
