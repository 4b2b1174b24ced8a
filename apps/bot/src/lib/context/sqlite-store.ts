import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StorageUnavailableError } from "../errors.js";
import type { DialogueStore, Turn, TurnRole } from "./dialogue-store.js";
import {
	countTurnsToDrop,
	DEFAULT_BUDGET,
	type TruncationBudget,
} from "./truncation.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS dialogue_turns (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	user_id TEXT NOT NULL,
	role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
	text TEXT NOT NULL,
	created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_dialogue_turns_user ON dialogue_turns(user_id, id);
`;

type TurnRow = {
	id: number;
	role: string;
	text: string;
	created_at: string;
};

type SqliteStoreOptions = {
	/** File path, or ":memory:". */
	filename: string;
	budget?: TruncationBudget;
	now?: () => Date;
};

function toRole(value: string): TurnRole {
	return value === "assistant" ? "assistant" : "user";
}

function ensureParentDir(filename: string) {
	if (filename === ":memory:") return;
	const dir = path.dirname(path.resolve(filename));
	fs.mkdirSync(dir, { recursive: true });
}

export function createSqliteDialogueStore(
	options: SqliteStoreOptions,
): DialogueStore {
	const budget = options.budget ?? DEFAULT_BUDGET;
	const now = options.now ?? (() => new Date());

	let db: Database.Database;
	try {
		ensureParentDir(options.filename);
		db = new Database(options.filename);
		if (options.filename !== ":memory:") db.pragma("journal_mode = WAL");
		db.exec(SCHEMA);
	} catch (error) {
		throw new StorageUnavailableError("open", { cause: error });
	}

	const selectTurns = db.prepare<[string], TurnRow>(
		"SELECT id, role, text, created_at FROM dialogue_turns WHERE user_id = ? ORDER BY id ASC",
	);
	const insertTurn = db.prepare<[string, string, string, string]>(
		"INSERT INTO dialogue_turns (user_id, role, text, created_at) VALUES (?, ?, ?, ?)",
	);
	const deleteBefore = db.prepare<[string, number]>(
		"DELETE FROM dialogue_turns WHERE user_id = ? AND id < ?",
	);
	const deleteUser = db.prepare<[string]>(
		"DELETE FROM dialogue_turns WHERE user_id = ?",
	);

	const appendAndTrim = db.transaction(
		(
			userId: string,
			entries: ReadonlyArray<Pick<Turn, "role" | "text">>,
			timestamp: string,
		) => {
			for (const entry of entries) {
				insertTurn.run(userId, entry.role, entry.text, timestamp);
			}
			const rows = selectTurns.all(userId);
			const drop = countTurnsToDrop(
				rows.map((row) => ({ role: toRole(row.role), text: row.text })),
				budget,
			);
			const firstKept = rows[drop];
			if (drop > 0 && firstKept) {
				deleteBefore.run(userId, firstKept.id);
			}
		},
	);

	function run<T>(operation: string, fn: () => T): T {
		try {
			return fn();
		} catch (error) {
			throw new StorageUnavailableError(operation, { cause: error });
		}
	}

	return {
		async loadContext(userId) {
			return run("loadContext", () =>
				selectTurns.all(userId).map(
					(row): Turn => ({
						role: toRole(row.role),
						text: row.text,
						timestamp: row.created_at,
					}),
				),
			);
		},
		async appendTurn(userId, role, text) {
			run("appendTurn", () => {
				appendAndTrim(userId, [{ role, text }], now().toISOString());
			});
		},
		async appendExchange(userId, userText, assistantText) {
			run("appendExchange", () => {
				appendAndTrim(
					userId,
					[
						{ role: "user", text: userText },
						{ role: "assistant", text: assistantText },
					],
					now().toISOString(),
				);
			});
		},
		async reset(userId) {
			run("reset", () => {
				deleteUser.run(userId);
			});
		},
		close() {
			if (db.open) db.close();
		},
	};
}
