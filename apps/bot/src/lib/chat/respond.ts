import type { CompletionClient } from "../completion/client.js";
import {
	type BotProfile,
	buildSystemPrompt,
	describeUserMessage,
	type MediaAttachment,
	type UserProfile,
} from "../completion/prompt.js";
import type { DialogueStore, Turn } from "../context/dialogue-store.js";
import { isStorageUnavailable } from "../errors.js";
import type { StopWordFilter } from "../filters/stop-words.js";
import { formatError, type Logger } from "../logger.js";
import {
	COMPLETION_FAILURE_TEXT,
	EMPTY_MESSAGE_HINT,
	STOP_WORD_REFUSAL,
} from "../bot/messages.js";

export type ChatOutcome =
	| "answered"
	| "empty"
	| "blocked"
	| "ConfigError"
	| "TransientError"
	| "ProtocolError";

export type ChatReply = {
	text: string;
	outcome: ChatOutcome;
	/** True when the exchange was appended to the dialogue store. */
	stored: boolean;
};

export type ChatRequest = {
	userId: string;
	text: string;
	profile?: UserProfile;
	attachments?: MediaAttachment[];
	abortSignal?: AbortSignal;
};

type ChatResponderOptions = {
	store: DialogueStore;
	filter: StopWordFilter;
	completion: CompletionClient;
	logger: Logger;
	systemPrompt: string;
	/** Known once the bot has fetched its own account. */
	getBotProfile?: () => BotProfile | undefined;
};

export function createChatResponder(options: ChatResponderOptions) {
	const { store, filter, completion, logger, systemPrompt } = options;
	const getBotProfile = options.getBotProfile ?? (() => undefined);

	async function loadContextBestEffort(userId: string): Promise<Turn[]> {
		try {
			return await store.loadContext(userId);
		} catch (error) {
			if (!isStorageUnavailable(error)) throw error;
			logger.error({
				event: "dialogue_load_failed",
				user_id: userId,
				error: error.message,
			});
			return [];
		}
	}

	async function persistExchange(
		userId: string,
		userText: string,
		answer: string,
	): Promise<boolean> {
		try {
			await store.appendExchange(userId, userText, answer);
			return true;
		} catch (error) {
			if (!isStorageUnavailable(error)) throw error;
			logger.error({
				event: "dialogue_append_failed",
				user_id: userId,
				error: formatError(error),
			});
			return false;
		}
	}

	async function respond(request: ChatRequest): Promise<ChatReply> {
		const text = request.text.trim();
		const attachments = request.attachments ?? [];
		if (!text && !attachments.length) {
			return { text: EMPTY_MESSAGE_HINT, outcome: "empty", stored: false };
		}

		const verdict = filter.check(text);
		if (verdict.status === "blocked") {
			logger.info({
				event: "stop_word_blocked",
				user_id: request.userId,
				term: verdict.matchedTerm,
			});
			return { text: STOP_WORD_REFUSAL, outcome: "blocked", stored: false };
		}

		const context = await loadContextBestEffort(request.userId);
		const result = await completion.complete(context, text, {
			system: buildSystemPrompt(systemPrompt, request.profile, getBotProfile()),
			attachments,
			abortSignal: request.abortSignal,
		});
		if (!result.ok) {
			return {
				text: COMPLETION_FAILURE_TEXT[result.error.kind],
				outcome: result.error.kind,
				stored: false,
			};
		}

		const stored = await persistExchange(
			request.userId,
			describeUserMessage(text, attachments),
			result.text,
		);
		return { text: result.text, outcome: "answered", stored };
	}

	return { respond };
}

export type ChatResponder = ReturnType<typeof createChatResponder>;
