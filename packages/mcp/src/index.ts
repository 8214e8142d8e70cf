// @webpuppet/mcp — MCP server, tool registry & intervention state machine
export type {
	JsonRpcId,
	JsonRpcRequest,
	JsonRpcNotification,
	JsonRpcError,
	JsonRpcSuccess,
	JsonRpcFailure,
	JsonRpcResponse,
	JsonRpcMessage,
	ParsedMessage,
	ServerState,
	ClientInfo,
	ServerCapabilities,
	InitializeResult,
	ToolDefinition,
	ContentItem,
	ToolCallResult,
	McpTool,
} from "./types.js";
export {
	createResponse,
	createErrorResponse,
	parseMessage,
	serializeMessage,
} from "./jsonrpc.js";
export {
	PARSE_ERROR,
	INVALID_REQUEST,
	METHOD_NOT_FOUND,
	INVALID_PARAMS,
	INTERNAL_ERROR,
	PERMISSION_DENIED,
	AUTOMATION_ERROR,
	IO_ERROR,
	TOOL_NOT_FOUND,
	McpError,
	McpParseError,
	McpInvalidRequestError,
	McpMethodNotFoundError,
	McpInvalidParamsError,
	McpInternalError,
	McpSerializationError,
	McpPermissionDeniedError,
	McpAutomationError,
	McpIoError,
	McpToolNotFoundError,
	errorCode,
	toMcpError,
	toJsonRpcError,
} from "./mcp-errors.js";
export type { McpErrorKind } from "./mcp-errors.js";
export { RwLock } from "./rw-lock.js";
export type { WriteSlot } from "./rw-lock.js";
export { InterventionHandler, MANUAL_PAUSE_REASON } from "./intervention.js";
export type { InterventionState, InterventionOutcome, WaitResult } from "./intervention.js";
export type {
	PermissionGate,
	PromptRequest,
	PromptResponse,
	ScreeningResult,
	ProviderCapabilities,
	AutomationSession,
	AutomationHandle,
	AutomationOptions,
	InterventionSignal,
	AutomationFactory,
	BrowserType,
	DetectedBrowser,
	BrowserDetector,
} from "./collaborators.js";
export { PROVIDERS, PROVIDER_IDS, parseProvider } from "./providers.js";
export type { ProviderId, ProviderInfo } from "./providers.js";
export { FsBrowserDetector, defaultCandidates, listProfiles, readVersion } from "./browser-detector.js";
export type { BrowserCandidate, VersionReader } from "./browser-detector.js";
export { ToolContext, callAutomation } from "./tool-context.js";
export type { ToolContextOptions } from "./tool-context.js";
export { ToolRegistry } from "./tool-registry.js";
export * from "./tools/index.js";
export { McpServer } from "./server.js";
export type { McpServerOptions } from "./server.js";
export { StdioLineTransport } from "./transport/stdio.js";
export type { LineTransport, StdioLineTransportOptions } from "./transport/stdio.js";
export { SERVER_NAME, SERVER_VERSION, PROTOCOL_VERSION } from "./version.js";
