import { regex } from "arkregex";
import { formatError } from "../logger.js";
import { markdownToTelegramChunks } from "../telegram/format.js";

type SendTextContext = {
	reply: (text: string, options?: Record<string, unknown>) => Promise<unknown>;
};

type TelegramHelpersOptions = {
	textChunkLimit: number;
	logDebug: (message: string, data?: unknown) => void;
	sleep?: (ms: number) => Promise<void>;
};

type RetryConfig = {
	attempts: number;
	minDelayMs: number;
	maxDelayMs: number;
	jitter: number;
};

const TELEGRAM_RETRY_DEFAULTS: RetryConfig = {
	attempts: 3,
	minDelayMs: 400,
	maxDelayMs: 30_000,
	jitter: 0.1,
};

const TELEGRAM_RETRY_RE = regex.as(
	"429|timeout|connect|reset|closed|unavailable|temporarily|network request",
	"i",
);
const TELEGRAM_PARSE_ERR_RE = regex.as(
	"can't parse entities|parse entities|find end of the entity",
	"i",
);

function readRetryAfter(source: unknown): number | undefined {
	if (!source || typeof source !== "object" || !("parameters" in source)) {
		return undefined;
	}
	const parameters = source.parameters;
	if (!parameters || typeof parameters !== "object") return undefined;
	if (!("retry_after" in parameters)) return undefined;
	return typeof parameters.retry_after === "number"
		? parameters.retry_after
		: undefined;
}

export function getRetryAfterMs(error: unknown): number | null {
	if (!error || typeof error !== "object") return null;
	const nested = [
		error,
		"response" in error ? error.response : undefined,
		"error" in error ? error.error : undefined,
	];
	for (const source of nested) {
		const seconds = readRetryAfter(source);
		if (seconds !== undefined && Number.isFinite(seconds)) {
			return seconds * 1000;
		}
	}
	return null;
}

export function createTelegramHelpers(options: TelegramHelpersOptions) {
	const { textChunkLimit, logDebug } = options;
	const sleep =
		options.sleep ??
		((ms: number) =>
			new Promise<void>((resolve) => {
				setTimeout(resolve, ms);
			}));

	async function retryTelegram<T>(
		fn: () => Promise<T>,
		label: string,
	): Promise<T> {
		let lastError: unknown = null;
		for (
			let attempt = 1;
			attempt <= TELEGRAM_RETRY_DEFAULTS.attempts;
			attempt += 1
		) {
			try {
				return await fn();
			} catch (error) {
				lastError = error;
				const errorText = formatError(error);
				if (TELEGRAM_PARSE_ERR_RE.test(errorText)) {
					throw error;
				}
				const shouldRetry = TELEGRAM_RETRY_RE.test(errorText);
				if (!shouldRetry || attempt >= TELEGRAM_RETRY_DEFAULTS.attempts) {
					throw error;
				}
				const retryAfterMs = getRetryAfterMs(error);
				const baseDelay =
					retryAfterMs ??
					Math.min(
						TELEGRAM_RETRY_DEFAULTS.minDelayMs * 2 ** (attempt - 1),
						TELEGRAM_RETRY_DEFAULTS.maxDelayMs,
					);
				const jitter = TELEGRAM_RETRY_DEFAULTS.jitter;
				const delayMs = Math.max(
					0,
					Math.round(baseDelay * (1 + (Math.random() * 2 - 1) * jitter)),
				);
				logDebug("telegram send retry", {
					label,
					attempt,
					delayMs,
					error: errorText,
				});
				await sleep(delayMs);
			}
		}
		throw lastError ?? new Error("telegram send failed");
	}

	async function sendText(
		ctx: SendTextContext,
		text: string,
		options?: Record<string, unknown>,
	) {
		const limit =
			Number.isFinite(textChunkLimit) && textChunkLimit > 0
				? textChunkLimit
				: 4000;
		const htmlOptions = options?.parse_mode
			? options
			: { ...(options ?? {}), parse_mode: "HTML" };
		const { parse_mode: _parseMode, ...plainOptions } = options ?? {};
		const chunks = markdownToTelegramChunks(text, limit);

		for (const [index, chunk] of chunks.entries()) {
			// Only the last chunk carries the inline keyboard.
			const forChunk = (base: Record<string, unknown>) =>
				index === chunks.length - 1 ? base : { ...base, reply_markup: undefined };
			try {
				await retryTelegram(
					() => ctx.reply(chunk.html, forChunk(htmlOptions)),
					"sendMessage",
				);
				continue;
			} catch (error) {
				if (!TELEGRAM_PARSE_ERR_RE.test(formatError(error))) throw error;
				logDebug("telegram html reply failed, retrying as plain text", {
					error: formatError(error),
					chunk: index,
				});
			}
			await retryTelegram(
				() => ctx.reply(chunk.text, forChunk(plainOptions)),
				"sendMessage_plain",
			);
		}
	}

	return {
		sendText,
		retryTelegram,
	};
}

export type TelegramHelpers = ReturnType<typeof createTelegramHelpers>;
