import type { Turn } from "./dialogue-store.js";

export type TruncationBudget = {
	/** Maximum retained turns. */
	maxTurns: number;
	/** Maximum aggregate `text.length` of retained turns; 0 disables the limit. */
	maxChars: number;
};

export const DEFAULT_BUDGET: TruncationBudget = {
	maxTurns: 12,
	maxChars: 16_000,
};

/**
 * Number of leading turns to discard so the rest fits the budget.
 * The newest user turn and everything after it are never discarded.
 */
export function countTurnsToDrop(
	turns: ReadonlyArray<Pick<Turn, "role" | "text">>,
	budget: TruncationBudget,
): number {
	let protectedFrom = turns.length - 1;
	for (let i = turns.length - 1; i >= 0; i -= 1) {
		if (turns[i]?.role === "user") {
			protectedFrom = i;
			break;
		}
	}

	let chars = turns.reduce((sum, turn) => sum + turn.text.length, 0);
	let count = turns.length;
	let drop = 0;
	const overBudget = () =>
		count > budget.maxTurns || (budget.maxChars > 0 && chars > budget.maxChars);

	while (drop < protectedFrom && overBudget()) {
		chars -= turns[drop]?.text.length ?? 0;
		count -= 1;
		drop += 1;
	}
	return drop;
}

export function trimTurns<T extends Pick<Turn, "role" | "text">>(
	turns: T[],
	budget: TruncationBudget,
): T[] {
	const drop = countTurnsToDrop(turns, budget);
	return drop > 0 ? turns.slice(drop) : turns;
}
