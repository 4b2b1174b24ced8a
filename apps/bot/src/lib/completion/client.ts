import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type LanguageModel } from "ai";
import type { Turn } from "../context/dialogue-store.js";
import { type CompletionError, ConfigError, ProtocolError } from "../errors.js";
import type { Logger } from "../logger.js";
import { classifyCompletionError, isRateLimited } from "./errors.js";
import { buildMessages, type MediaAttachment } from "./prompt.js";

export type CompletionResult =
	| { ok: true; text: string }
	| { ok: false; error: CompletionError };

export type CompleteOptions = {
	system?: string;
	attachments?: readonly MediaAttachment[];
	abortSignal?: AbortSignal;
};

export type CompletionClient = {
	readonly modelName: string;
	complete: (
		context: readonly Turn[],
		newUserText: string,
		options?: CompleteOptions,
	) => Promise<CompletionResult>;
};

export type CompletionClientOptions = {
	apiKeys: string[];
	baseUrl: string;
	modelName: string;
	temperature?: number;
	maxOutputTokens?: number;
	timeoutMs?: number;
	logger?: Logger;
	/** Builds the model for a given key; defaults to the OpenAI-compatible chat model. */
	createModel?: (apiKey: string) => LanguageModel;
};

export function createCompletionClient(
	options: CompletionClientOptions,
): CompletionClient {
	const { apiKeys, baseUrl, modelName, logger } = options;
	const timeoutMs = options.timeoutMs ?? 60_000;
	const createModel =
		options.createModel ??
		((apiKey: string) =>
			createOpenAI({ apiKey, baseURL: baseUrl }).chat(modelName));
	const models = new Map<string, LanguageModel>();
	let keyIndex = 0;

	function currentModel(): LanguageModel | null {
		const apiKey = apiKeys[keyIndex];
		if (!apiKey) return null;
		const cached = models.get(apiKey);
		if (cached) return cached;
		const model = createModel(apiKey);
		models.set(apiKey, model);
		return model;
	}

	function rotateKey() {
		if (apiKeys.length <= 1) return;
		keyIndex = (keyIndex + 1) % apiKeys.length;
		logger?.info({ event: "completion_key_rotated", key_index: keyIndex });
	}

	async function complete(
		context: readonly Turn[],
		newUserText: string,
		completeOptions: CompleteOptions = {},
	): Promise<CompletionResult> {
		const model = currentModel();
		if (!model) {
			return {
				ok: false,
				error: new ConfigError("No completion API key configured"),
			};
		}
		const timeoutSignal = AbortSignal.timeout(timeoutMs);
		const abortSignal = completeOptions.abortSignal
			? AbortSignal.any([completeOptions.abortSignal, timeoutSignal])
			: timeoutSignal;
		const startedAt = Date.now();

		try {
			const result = await generateText({
				model,
				system: completeOptions.system,
				messages: buildMessages(
					context,
					newUserText,
					completeOptions.attachments,
				),
				temperature: options.temperature,
				maxOutputTokens: options.maxOutputTokens,
				maxRetries: 0,
				abortSignal,
			});
			const text = result.text.trim();
			logger?.debug("completion finished", {
				model: modelName,
				context_turns: context.length,
				attachments: completeOptions.attachments?.length ?? 0,
				finish_reason: result.finishReason,
				duration_ms: Date.now() - startedAt,
			});
			if (!text) {
				return {
					ok: false,
					error: new ProtocolError(
						`empty_response (finish_reason=${result.finishReason})`,
					),
				};
			}
			return { ok: true, text };
		} catch (error) {
			if (isRateLimited(error)) rotateKey();
			const classified = classifyCompletionError(error);
			logger?.error({
				event: "completion_failed",
				model: modelName,
				kind: classified.kind,
				error: classified.message,
				duration_ms: Date.now() - startedAt,
			});
			return { ok: false, error: classified };
		}
	}

	return { modelName, complete };
}
