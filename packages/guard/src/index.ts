// @webpuppet/guard — Permission policies & screening configuration
export type { Operation, PermissionDecision, PermissionPolicy, UrlScope } from "./types.js";
export { OPERATIONS, OPERATION_RISK, parseOperation } from "./operations.js";
export {
	PROVIDER_DOMAINS,
	SECURE_POLICY,
	PERMISSIVE_POLICY,
	READONLY_POLICY,
	BUILT_IN_POLICIES,
	resolvePolicy,
} from "./presets.js";
export { PermissionGuard } from "./guard.js";
export { DEFAULT_SCREENING, createScreeningConfig } from "./screening.js";
export type { ScreeningConfig } from "./screening.js";
