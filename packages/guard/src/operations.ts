/**
 * @webpuppet/guard — the operation table.
 */

import type { Operation } from "./types.js";

/** Every gated operation, in display order. */
export const OPERATIONS: readonly Operation[] = [
	"Navigate",
	"SendPrompt",
	"ReadResponse",
	"ReadContent",
	"Screenshot",
	"Click",
	"TypeText",
	"DeleteAccount",
	"ChangePassword",
];

/** Risk on a 1–10 scale; 10 is irreversible account damage. */
export const OPERATION_RISK: Readonly<Record<Operation, number>> = {
	Navigate: 2,
	SendPrompt: 3,
	ReadResponse: 1,
	ReadContent: 1,
	Screenshot: 2,
	Click: 4,
	TypeText: 5,
	DeleteAccount: 10,
	ChangePassword: 10,
};

const BY_KEY = new Map<string, Operation>(OPERATIONS.map((op) => [op.toLowerCase(), op]));

/**
 * Map a free-text operation name to an {@link Operation}. Matching ignores
 * case as well as `_` and `-`, so `"DeleteAccount"`, `"delete_account"` and
 * `"deleteaccount"` are the same operation.
 *
 * @returns The operation, or null when the name is not recognised.
 */
export function parseOperation(name: string): Operation | null {
	const key = name.trim().toLowerCase().replace(/[_-]/g, "");
	return BY_KEY.get(key) ?? null;
}
