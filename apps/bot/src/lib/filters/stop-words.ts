import fs from "node:fs/promises";
import path from "node:path";
import { regex } from "arkregex";
import { z } from "zod";
import { ConfigError } from "../errors.js";

export type StopWordMatchMode = "substring" | "word";

export type StopWordCheck =
	| { status: "allowed" }
	| { status: "blocked"; matchedTerm: string };

export type StopWordFilter = {
	readonly terms: readonly string[];
	check: (text: string) => StopWordCheck;
};

const STOP_WORDS_FILE_SCHEMA = z.array(z.string());
const REGEX_SPECIALS_RE = regex.as("[.*+?^${}()|[\\]\\\\]", "g");

export function normalizeStopWords(words: Iterable<string>): string[] {
	const terms: string[] = [];
	for (const word of words) {
		const term = word.trim().toLowerCase();
		if (term && !terms.includes(term)) terms.push(term);
	}
	return terms;
}

function escapeRegex(text: string) {
	return text.replace(REGEX_SPECIALS_RE, "\\$&");
}

function buildWordMatcher(term: string) {
	const re = regex.as(
		`(?<![\\p{L}\\p{N}_])${escapeRegex(term)}(?![\\p{L}\\p{N}_])`,
		"u",
	);
	return (lowered: string) => re.test(lowered);
}

export function createStopWordFilter(
	words: Iterable<string>,
	mode: StopWordMatchMode = "substring",
): StopWordFilter {
	const terms = Object.freeze(normalizeStopWords(words));
	const matchers = terms.map((term) => ({
		term,
		matches:
			mode === "word"
				? buildWordMatcher(term)
				: (lowered: string) => lowered.includes(term),
	}));

	return {
		terms,
		check(text) {
			const lowered = text.toLowerCase();
			for (const { term, matches } of matchers) {
				if (matches(lowered)) return { status: "blocked", matchedTerm: term };
			}
			return { status: "allowed" };
		},
	};
}

export async function loadStopWords(filePath: string): Promise<string[]> {
	const fullPath = path.resolve(filePath);
	let raw: string;
	try {
		raw = await fs.readFile(fullPath, "utf8");
	} catch (error) {
		throw new ConfigError(`Cannot read stop-words file ${fullPath}`, {
			cause: error,
		});
	}
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		throw new ConfigError(`Stop-words file ${fullPath} is not valid JSON`, {
			cause: error,
		});
	}
	const parsed = STOP_WORDS_FILE_SCHEMA.safeParse(json);
	if (!parsed.success) {
		throw new ConfigError(
			`Stop-words file ${fullPath} must contain an array of strings`,
		);
	}
	return normalizeStopWords(parsed.data);
}
