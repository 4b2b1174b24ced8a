import { StorageUnavailableError } from "../errors.js";
import {
	DEFAULT_BUDGET,
	type TruncationBudget,
	trimTurns,
} from "./truncation.js";

export type TurnRole = "user" | "assistant";

export type Turn = {
	role: TurnRole;
	text: string;
	timestamp: string;
};

/**
 * Per-user rolling dialogue. Implementations apply the truncation budget
 * on every append and throw `StorageUnavailableError` when the backend fails.
 */
export type DialogueStore = {
	loadContext: (userId: string) => Promise<Turn[]>;
	appendTurn: (userId: string, role: TurnRole, text: string) => Promise<void>;
	/** Appends a user turn and its answer as one step. */
	appendExchange: (
		userId: string,
		userText: string,
		assistantText: string,
	) => Promise<void>;
	reset: (userId: string) => Promise<void>;
	close: () => void;
};

type MemoryStoreOptions = {
	budget?: TruncationBudget;
	now?: () => Date;
};

export function createMemoryDialogueStore(
	options: MemoryStoreOptions = {},
): DialogueStore {
	const budget = options.budget ?? DEFAULT_BUDGET;
	const now = options.now ?? (() => new Date());
	const dialogues = new Map<string, Turn[]>();
	let closed = false;

	function ensureOpen(operation: string) {
		if (closed) {
			throw new StorageUnavailableError(operation, {
				cause: new Error("store is closed"),
			});
		}
	}

	function append(
		userId: string,
		entries: ReadonlyArray<Pick<Turn, "role" | "text">>,
	) {
		const timestamp = now().toISOString();
		const next = [
			...(dialogues.get(userId) ?? []),
			...entries.map((entry): Turn => ({ ...entry, timestamp })),
		];
		dialogues.set(userId, trimTurns(next, budget));
	}

	return {
		async loadContext(userId) {
			ensureOpen("loadContext");
			return [...(dialogues.get(userId) ?? [])];
		},
		async appendTurn(userId, role, text) {
			ensureOpen("appendTurn");
			append(userId, [{ role, text }]);
		},
		async appendExchange(userId, userText, assistantText) {
			ensureOpen("appendExchange");
			append(userId, [
				{ role: "user", text: userText },
				{ role: "assistant", text: assistantText },
			]);
		},
		async reset(userId) {
			ensureOpen("reset");
			dialogues.delete(userId);
		},
		close() {
			closed = true;
			dialogues.clear();
		},
	};
}
