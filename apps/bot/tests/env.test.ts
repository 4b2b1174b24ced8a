import { describe, expect, it } from "vitest";
import { loadBotEnv, parseApiKeys } from "../src/lib/config/env.js";
import { ConfigError } from "../src/lib/errors.js";

const BASE_ENV = { BOT_TOKEN: "test-token", ZENMUX_API_KEY: "test-key" };

describe("loadBotEnv", () => {
	it("applies defaults", () => {
		const config = loadBotEnv(BASE_ENV);
		expect(config).toEqual({
			botToken: "test-token",
			apiKeys: ["test-key"],
			baseUrl: "https://zenmux.ai/api/v1",
			modelName: "openai/gpt-4o",
			dialogueDbPath: "data/dialogue.db",
			budget: { maxTurns: 12, maxChars: 16_000 },
			stopWordsPath: "config/stop-words.json",
			stopWordsMatch: "substring",
			temperature: 0.6,
			maxOutputTokens: 1024,
			completionTimeoutMs: 60_000,
			systemPrompt: "",
			telegramTimeoutSeconds: 60,
			telegramTextChunkLimit: 4000,
			mediaMaxBytes: 10_485_760,
			debugLogs: false,
			serviceName: "telegram-llm-proxy",
			releaseVersion: "dev",
		});
	});

	it("reads overrides", () => {
		const config = loadBotEnv({
			...BASE_ENV,
			MODEL_NAME: " anthropic/claude-sonnet ",
			DIALOGUE_MAX_TURNS: "2",
			DIALOGUE_MAX_CHARS: "0",
			STOP_WORDS_MATCH: "WORD",
			DEBUG_LOGS: "true",
		});
		expect(config.modelName).toBe("anthropic/claude-sonnet");
		expect(config.budget).toEqual({ maxTurns: 2, maxChars: 0 });
		expect(config.stopWordsMatch).toBe("word");
		expect(config.debugLogs).toBe(true);
	});

	it("requires a bot token", () => {
		expect(() => loadBotEnv({ ZENMUX_API_KEY: "test-key" })).toThrow(
			"BOT_TOKEN is unset",
		);
		expect(() => loadBotEnv({ ...BASE_ENV, BOT_TOKEN: "  " })).toThrow(
			ConfigError,
		);
	});

	it("requires at least one completion key", () => {
		expect(() => loadBotEnv({ BOT_TOKEN: "test-token" })).toThrow(
			new ConfigError("ZENMUX_API_KEY is unset"),
		);
	});

	it("rejects malformed numbers", () => {
		expect(() =>
			loadBotEnv({ ...BASE_ENV, DIALOGUE_MAX_TURNS: "many" }),
		).toThrow(/^Invalid configuration: DIALOGUE_MAX_TURNS: /);
		expect(() => loadBotEnv({ ...BASE_ENV, DIALOGUE_MAX_TURNS: "1" })).toThrow(
			ConfigError,
		);
	});

	it("rejects unknown match modes", () => {
		expect(() =>
			loadBotEnv({ ...BASE_ENV, STOP_WORDS_MATCH: "regex" }),
		).toThrow(/STOP_WORDS_MATCH/);
	});
});

describe("parseApiKeys", () => {
	it("merges the primary key with the extra list", () => {
		expect(parseApiKeys("key-a", "key-b, key-c;key-a\n")).toEqual([
			"key-a",
			"key-b",
			"key-c",
		]);
	});

	it("works without a primary key", () => {
		expect(parseApiKeys("", "key-b")).toEqual(["key-b"]);
	});
});
