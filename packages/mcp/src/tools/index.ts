import type { McpTool } from "../types.js";
import {
	createBrowserStatusTool,
	createDetectBrowsersTool,
	createNavigateTool,
	createScreenshotTool,
} from "./browser.js";
import {
	createInterventionCompleteTool,
	createInterventionStatusTool,
	createPauseTool,
	createResumeTool,
} from "./intervention.js";
import { createCheckPermissionTool } from "./permission.js";
import { createPromptTool } from "./prompt.js";
import { createListProvidersTool, createProviderCapabilitiesTool } from "./providers.js";

export {
	createBrowserStatusTool,
	createCheckPermissionTool,
	createDetectBrowsersTool,
	createInterventionCompleteTool,
	createInterventionStatusTool,
	createListProvidersTool,
	createNavigateTool,
	createPauseTool,
	createPromptTool,
	createProviderCapabilitiesTool,
	createResumeTool,
	createScreenshotTool,
};

/** The twelve built-in tools, in the order `tools/list` reports them. */
export function builtinTools(): McpTool[] {
	return [
		createPromptTool(),
		createListProvidersTool(),
		createProviderCapabilitiesTool(),
		createDetectBrowsersTool(),
		createScreenshotTool(),
		createCheckPermissionTool(),
		createInterventionStatusTool(),
		createInterventionCompleteTool(),
		createPauseTool(),
		createResumeTool(),
		createNavigateTool(),
		createBrowserStatusTool(),
	];
}
