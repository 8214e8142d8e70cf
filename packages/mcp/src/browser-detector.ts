/**
 * @webpuppet/mcp — filesystem browser detection.
 *
 * Scans the well-known install locations of Chromium-family browsers and
 * lists the profiles in each one's user data directory.
 */

import { execFile } from "node:child_process";
import { access, readdir } from "node:fs/promises";
import { constants } from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { createLogger, errorMessage } from "@webpuppet/core";
import type { BrowserDetector, BrowserType, DetectedBrowser } from "./collaborators.js";

const execFileAsync = promisify(execFile);
const log = createLogger("mcp:browsers");

/** Where one browser may be installed on the current platform. */
export interface BrowserCandidate {
	browserType: BrowserType;
	/** Tried in order; the first executable one wins. */
	executablePaths: string[];
	userDataDir: string;
}

export type VersionReader = (executablePath: string) => Promise<string | null>;

/**
 * Install locations for Brave, Chrome, Chromium and Edge, Brave first.
 */
export function defaultCandidates(
	platform: NodeJS.Platform = process.platform,
	home: string = os.homedir(),
	env: NodeJS.ProcessEnv = process.env,
): BrowserCandidate[] {
	if (platform === "win32") {
		const join = path.win32.join;
		const local = env.LOCALAPPDATA ?? join(home, "AppData", "Local");
		const programFiles = env.PROGRAMFILES ?? "C:\\Program Files";
		const programFilesX86 = env["PROGRAMFILES(X86)"] ?? "C:\\Program Files (x86)";
		return [
			{
				browserType: "Brave",
				executablePaths: [join(programFiles, "BraveSoftware", "Brave-Browser", "Application", "brave.exe")],
				userDataDir: join(local, "BraveSoftware", "Brave-Browser", "User Data"),
			},
			{
				browserType: "Chrome",
				executablePaths: [
					join(programFiles, "Google", "Chrome", "Application", "chrome.exe"),
					join(programFilesX86, "Google", "Chrome", "Application", "chrome.exe"),
				],
				userDataDir: join(local, "Google", "Chrome", "User Data"),
			},
			{
				browserType: "Chromium",
				executablePaths: [join(local, "Chromium", "Application", "chrome.exe")],
				userDataDir: join(local, "Chromium", "User Data"),
			},
			{
				browserType: "Edge",
				executablePaths: [join(programFilesX86, "Microsoft", "Edge", "Application", "msedge.exe")],
				userDataDir: join(local, "Microsoft", "Edge", "User Data"),
			},
		];
	}

	const join = path.posix.join;
	if (platform === "darwin") {
		const support = join(home, "Library", "Application Support");
		return [
			{
				browserType: "Brave",
				executablePaths: ["/Applications/Brave Browser.app/Contents/MacOS/Brave Browser"],
				userDataDir: join(support, "BraveSoftware", "Brave-Browser"),
			},
			{
				browserType: "Chrome",
				executablePaths: ["/Applications/Google Chrome.app/Contents/MacOS/Google Chrome"],
				userDataDir: join(support, "Google", "Chrome"),
			},
			{
				browserType: "Chromium",
				executablePaths: ["/Applications/Chromium.app/Contents/MacOS/Chromium"],
				userDataDir: join(support, "Chromium"),
			},
			{
				browserType: "Edge",
				executablePaths: ["/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge"],
				userDataDir: join(support, "Microsoft Edge"),
			},
		];
	}

	const config = env.XDG_CONFIG_HOME ?? join(home, ".config");
	return [
		{
			browserType: "Brave",
			executablePaths: ["/usr/bin/brave-browser", "/usr/bin/brave", "/snap/bin/brave"],
			userDataDir: join(config, "BraveSoftware", "Brave-Browser"),
		},
		{
			browserType: "Chrome",
			executablePaths: ["/usr/bin/google-chrome", "/usr/bin/google-chrome-stable"],
			userDataDir: join(config, "google-chrome"),
		},
		{
			browserType: "Chromium",
			executablePaths: ["/usr/bin/chromium", "/usr/bin/chromium-browser", "/snap/bin/chromium"],
			userDataDir: join(config, "chromium"),
		},
		{
			browserType: "Edge",
			executablePaths: ["/usr/bin/microsoft-edge", "/usr/bin/microsoft-edge-stable"],
			userDataDir: join(config, "microsoft-edge"),
		},
	];
}

/**
 * Ask the binary for its version (`--version`) and pull out the dotted
 * number. Null when the binary does not answer within three seconds.
 */
export async function readVersion(executablePath: string): Promise<string | null> {
	try {
		const { stdout } = await execFileAsync(executablePath, ["--version"], { timeout: 3000 });
		return /\d+(?:\.\d+)+/.exec(stdout)?.[0] ?? null;
	} catch (err) {
		log.debug("Version check failed", { executablePath, error: errorMessage(err) });
		return null;
	}
}

async function isExecutable(file: string): Promise<boolean> {
	try {
		await access(file, constants.X_OK);
		return true;
	} catch {
		return false;
	}
}

const PROFILE_DIR = /^(Default|Profile \d+)$/;

/** Chromium profile directories (`Default`, `Profile 1`, ...) under a user data dir. */
export async function listProfiles(userDataDir: string): Promise<string[]> {
	try {
		const entries = await readdir(userDataDir, { withFileTypes: true });
		return entries
			.filter((entry) => entry.isDirectory() && PROFILE_DIR.test(entry.name))
			.map((entry) => entry.name)
			.sort();
	} catch {
		return [];
	}
}

/**
 * {@link BrowserDetector} backed by the filesystem.
 */
export class FsBrowserDetector implements BrowserDetector {
	private readonly candidates: BrowserCandidate[];
	private readonly versionReader: VersionReader;

	constructor(opts: { candidates?: BrowserCandidate[]; versionReader?: VersionReader } = {}) {
		this.candidates = opts.candidates ?? defaultCandidates();
		this.versionReader = opts.versionReader ?? readVersion;
	}

	async detectAll(): Promise<DetectedBrowser[]> {
		const found: DetectedBrowser[] = [];
		for (const candidate of this.candidates) {
			const executablePath = await this.firstExecutable(candidate.executablePaths);
			if (!executablePath) continue;

			found.push({
				browserType: candidate.browserType,
				version: await this.versionReader(executablePath),
				executablePath,
				userDataDir: candidate.userDataDir,
				profiles: await listProfiles(candidate.userDataDir),
			});
		}
		log.debug("Browser detection finished", { found: found.length });
		return found;
	}

	private async firstExecutable(paths: string[]): Promise<string | null> {
		for (const file of paths) {
			if (await isExecutable(file)) return file;
		}
		return null;
	}
}
