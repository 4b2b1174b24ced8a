import type { ChatReply, ChatResponder } from "../chat/respond.js";
import type { MediaAttachment, UserProfile } from "../completion/prompt.js";
import { MediaUnavailableError } from "../errors.js";
import { MEDIA_FAILURE_TEXT, UNKNOWN_COMMAND } from "./messages.js";
import type { LogContext } from "./types.js";

type TelegramUser = {
	id: number;
	first_name?: string;
	last_name?: string;
	username?: string;
	language_code?: string;
};

export type TextContext = {
	from?: TelegramUser;
	reply: (text: string, options?: Record<string, unknown>) => Promise<unknown>;
	replyWithChatAction: (action: "typing") => Promise<unknown>;
};

type MessageHandlerDeps = {
	responder: ChatResponder;
	sendText: (
		ctx: TextContext,
		text: string,
		options?: Record<string, unknown>,
	) => Promise<void>;
	logDebug: (message: string, data?: unknown) => void;
	typingIntervalMs?: number;
};

export function toUserProfile(user: TelegramUser): UserProfile {
	return {
		id: user.id,
		firstName: user.first_name,
		lastName: user.last_name,
		username: user.username,
		languageCode: user.language_code,
	};
}

function replyLogFields(reply: ChatReply): Partial<LogContext> {
	const fields: Partial<LogContext> = { completion_outcome: reply.outcome };
	if (reply.outcome === "blocked") fields.outcome = "blocked";
	if (
		reply.outcome === "TransientError" ||
		reply.outcome === "ConfigError" ||
		reply.outcome === "ProtocolError"
	) {
		fields.outcome = "error";
		fields.error = reply.outcome;
	}
	return fields;
}

export function createMessageHandlers(deps: MessageHandlerDeps) {
	const { responder, sendText, logDebug } = deps;
	const typingIntervalMs = deps.typingIntervalMs ?? 4500;

	function startTypingHeartbeat(ctx: TextContext) {
		let stopped = false;
		const tick = async () => {
			if (stopped) return;
			try {
				await ctx.replyWithChatAction("typing");
			} catch (error) {
				logDebug("typing action failed", { error: String(error) });
			}
		};
		void tick();
		const timer = setInterval(() => {
			void tick();
		}, typingIntervalMs);
		return () => {
			stopped = true;
			clearInterval(timer);
		};
	}

	async function withTyping<T>(ctx: TextContext, fn: () => Promise<T>) {
		const stopTyping = startTypingHeartbeat(ctx);
		try {
			return await fn();
		} finally {
			stopTyping();
		}
	}

	/** Returns the log fields describing how the message was handled. */
	async function handleText(
		ctx: TextContext,
		rawText: string,
	): Promise<Partial<LogContext>> {
		const text = rawText.trim();
		if (text.startsWith("/")) {
			await sendText(ctx, UNKNOWN_COMMAND);
			return { completion_outcome: "unknown_command" };
		}
		const user = ctx.from;
		if (!user) return { outcome: "blocked", error: "missing_sender" };

		const reply = await withTyping(ctx, () =>
			responder.respond({
				userId: user.id.toString(),
				text,
				profile: toUserProfile(user),
			}),
		);
		await sendText(ctx, reply.text);
		return replyLogFields(reply);
	}

	/** Downloads a photo or audio file and answers it together with its caption. */
	async function handleMedia(
		ctx: TextContext,
		caption: string | undefined,
		load: () => Promise<MediaAttachment>,
	): Promise<Partial<LogContext>> {
		const user = ctx.from;
		if (!user) return { outcome: "blocked", error: "missing_sender" };

		let reply: ChatReply;
		try {
			reply = await withTyping(ctx, async () => {
				const attachment = await load();
				return responder.respond({
					userId: user.id.toString(),
					text: caption?.trim() ?? "",
					profile: toUserProfile(user),
					attachments: [attachment],
				});
			});
		} catch (error) {
			if (!(error instanceof MediaUnavailableError)) throw error;
			logDebug("media unavailable", {
				reason: error.reason,
				error: error.message,
			});
			await sendText(ctx, MEDIA_FAILURE_TEXT[error.reason]);
			return { outcome: "error", error: error.message };
		}
		await sendText(ctx, reply.text);
		return replyLogFields(reply);
	}

	return { handleText, handleMedia };
}

export type MessageHandlers = ReturnType<typeof createMessageHandlers>;
