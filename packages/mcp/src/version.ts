import { readFileSync } from "node:fs";
import { isPlainObject } from "@webpuppet/core";

/** Version from this package's package.json (`0.0.0` when the field is missing). */
function readVersion(): string {
	const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
	if (isPlainObject(raw) && typeof raw.version === "string") return raw.version;
	return "0.0.0";
}

export const SERVER_NAME = "webpuppet-mcp";
export const SERVER_VERSION = readVersion();
export const PROTOCOL_VERSION = "2024-11-05";
