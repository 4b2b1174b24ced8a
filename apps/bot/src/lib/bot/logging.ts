import { randomUUID } from "node:crypto";
import type { Middleware } from "grammy";
import { formatError, type Logger } from "../logger.js";
import type { BotContext, LogContext } from "./types.js";

const UPDATE_TYPES = [
	"message",
	"edited_message",
	"callback_query",
	"inline_query",
	"my_chat_member",
	"chat_member",
] as const;

export function getUpdateType(ctx: BotContext): string {
	for (const type of UPDATE_TYPES) {
		if (ctx.update[type] !== undefined) return type;
	}
	return "other";
}

export function createLogHelpers() {
	function getLogContext(ctx: BotContext): LogContext {
		return ctx.state?.logContext ?? {};
	}

	function setLogContext(ctx: BotContext, update: Partial<LogContext>) {
		ctx.state.logContext = { ...ctx.state.logContext, ...update };
	}

	function setLogError(ctx: BotContext, error: unknown) {
		setLogContext(ctx, { outcome: "error", error: formatError(error) });
	}

	return { getLogContext, setLogContext, setLogError };
}

export type LogHelpers = ReturnType<typeof createLogHelpers>;

type RequestLoggerOptions = LogHelpers & {
	logger: Logger;
	now?: () => number;
};

/**
 * Seeds `ctx.state` and writes one `telegram_update` event per update,
 * after downstream middleware finished or threw.
 */
export function createRequestLoggerMiddleware(
	options: RequestLoggerOptions,
): Middleware<BotContext> {
	const { logger, getLogContext, setLogError } = options;
	const now = options.now ?? (() => Date.now());

	return async (ctx, next) => {
		const startedAt = now();
		ctx.state = {
			logContext: {
				request_id: randomUUID(),
				update_type: getUpdateType(ctx),
				chat_id: ctx.chat?.id?.toString(),
				user_id: ctx.from?.id?.toString(),
				username: ctx.from?.username,
			},
		};
		try {
			await next();
		} catch (error) {
			setLogError(ctx, error);
			throw error;
		} finally {
			const context = getLogContext(ctx);
			const payload = {
				event: "telegram_update",
				...context,
				outcome: context.outcome ?? "success",
				duration_ms: now() - startedAt,
			};
			if (payload.outcome === "error") {
				logger.error(payload);
			} else {
				logger.info(payload);
			}
		}
	};
}
