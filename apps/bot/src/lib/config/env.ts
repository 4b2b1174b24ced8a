import { regex } from "arkregex";
import { z } from "zod";
import { ConfigError } from "../errors.js";

export type BotEnv = Record<string, string | undefined>;

const DEFAULT_BASE_URL = "https://zenmux.ai/api/v1";
const DEFAULT_MODEL = "openai/gpt-4o";
const KEY_SEPARATOR_RE = regex("[,;\\n]");

const optionalText = z
	.string()
	.optional()
	.transform((value) => value?.trim() ?? "");

function intWithDefault(fallback: number, min: number) {
	return z
		.string()
		.optional()
		.transform((value) => (value?.trim() ? Number(value.trim()) : fallback))
		.pipe(z.number().int().min(min));
}

function numberWithDefault(fallback: number, min: number, max: number) {
	return z
		.string()
		.optional()
		.transform((value) => (value?.trim() ? Number(value.trim()) : fallback))
		.pipe(z.number().min(min).max(max));
}

const booleanFlag = z
	.string()
	.optional()
	.transform((value) => {
		const normalized = value?.trim().toLowerCase() ?? "";
		return normalized === "1" || normalized === "true" || normalized === "yes";
	});

const ENV_SCHEMA = z.object({
	BOT_TOKEN: z
		.string({ required_error: "BOT_TOKEN is unset" })
		.trim()
		.min(1, "BOT_TOKEN is unset"),
	ZENMUX_API_KEY: optionalText,
	ZENMUX_API_KEYS: optionalText,
	ZENMUX_BASE_URL: optionalText
		.transform((value) => value || DEFAULT_BASE_URL)
		.pipe(z.string().url("ZENMUX_BASE_URL must be a URL")),
	MODEL_NAME: optionalText.transform((value) => value || DEFAULT_MODEL),
	DIALOGUE_DB_PATH: optionalText.transform(
		(value) => value || "data/dialogue.db",
	),
	// One full exchange is two turns; the newest one is never trimmed.
	DIALOGUE_MAX_TURNS: intWithDefault(12, 2),
	DIALOGUE_MAX_CHARS: intWithDefault(16_000, 0),
	STOP_WORDS_PATH: optionalText.transform(
		(value) => value || "config/stop-words.json",
	),
	STOP_WORDS_MATCH: optionalText
		.transform((value) => value.toLowerCase() || "substring")
		.pipe(z.enum(["substring", "word"])),
	COMPLETION_TEMPERATURE: numberWithDefault(0.6, 0, 2),
	COMPLETION_MAX_TOKENS: intWithDefault(1024, 1),
	COMPLETION_TIMEOUT_MS: intWithDefault(60_000, 1000),
	SYSTEM_PROMPT: optionalText,
	TELEGRAM_TIMEOUT_SECONDS: intWithDefault(60, 1),
	TELEGRAM_TEXT_CHUNK_LIMIT: intWithDefault(4000, 100),
	MEDIA_MAX_BYTES: intWithDefault(10 * 1024 * 1024, 1),
	DEBUG_LOGS: booleanFlag,
	SERVICE_NAME: optionalText.transform(
		(value) => value || "telegram-llm-proxy",
	),
	RELEASE_VERSION: optionalText.transform((value) => value || "dev"),
});

export type BotConfig = {
	botToken: string;
	apiKeys: string[];
	baseUrl: string;
	modelName: string;
	dialogueDbPath: string;
	budget: { maxTurns: number; maxChars: number };
	stopWordsPath: string;
	stopWordsMatch: "substring" | "word";
	temperature: number;
	maxOutputTokens: number;
	completionTimeoutMs: number;
	systemPrompt: string;
	telegramTimeoutSeconds: number;
	telegramTextChunkLimit: number;
	mediaMaxBytes: number;
	debugLogs: boolean;
	serviceName: string;
	releaseVersion: string;
};

export function parseApiKeys(primary: string, extra: string): string[] {
	const keys: string[] = [];
	for (const chunk of [primary, ...extra.split(KEY_SEPARATOR_RE)]) {
		const trimmed = chunk.trim();
		if (trimmed && !keys.includes(trimmed)) keys.push(trimmed);
	}
	return keys;
}

export function loadBotEnv(env: BotEnv): BotConfig {
	const parsed = ENV_SCHEMA.safeParse(env);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration: ${details}`);
	}
	const values = parsed.data;
	const apiKeys = parseApiKeys(values.ZENMUX_API_KEY, values.ZENMUX_API_KEYS);
	if (apiKeys.length === 0) {
		throw new ConfigError("ZENMUX_API_KEY is unset");
	}

	return {
		botToken: values.BOT_TOKEN,
		apiKeys,
		baseUrl: values.ZENMUX_BASE_URL,
		modelName: values.MODEL_NAME,
		dialogueDbPath: values.DIALOGUE_DB_PATH,
		budget: {
			maxTurns: values.DIALOGUE_MAX_TURNS,
			maxChars: values.DIALOGUE_MAX_CHARS,
		},
		stopWordsPath: values.STOP_WORDS_PATH,
		stopWordsMatch: values.STOP_WORDS_MATCH,
		temperature: values.COMPLETION_TEMPERATURE,
		maxOutputTokens: values.COMPLETION_MAX_TOKENS,
		completionTimeoutMs: values.COMPLETION_TIMEOUT_MS,
		systemPrompt: values.SYSTEM_PROMPT,
		telegramTimeoutSeconds: values.TELEGRAM_TIMEOUT_SECONDS,
		telegramTextChunkLimit: values.TELEGRAM_TEXT_CHUNK_LIMIT,
		mediaMaxBytes: values.MEDIA_MAX_BYTES,
		debugLogs: values.DEBUG_LOGS,
		serviceName: values.SERVICE_NAME,
		releaseVersion: values.RELEASE_VERSION,
	};
}
