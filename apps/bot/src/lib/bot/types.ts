import type { Context } from "grammy";

export type LogContext = {
	request_id?: string;
	update_type?: string;
	chat_id?: string;
	user_id?: string;
	username?: string;
	command?: string;
	message_type?:
		| "command"
		| "callback"
		| "text"
		| "photo"
		| "audio"
		| "voice"
		| "other";
	outcome?: "success" | "blocked" | "error";
	completion_outcome?: string;
	context_turns?: number;
	error?: string;
};

export type BotState = {
	logContext: LogContext;
};

export type BotContext = Context & {
	state: BotState;
};
