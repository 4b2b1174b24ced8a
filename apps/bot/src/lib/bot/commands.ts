import { regex } from "arkregex";
import { type Bot, InlineKeyboard } from "grammy";
import type { DialogueStore } from "../context/dialogue-store.js";
import { isStorageUnavailable } from "../errors.js";
import type { Logger } from "../logger.js";
import type { LogHelpers } from "./logging.js";
import {
	aboutText,
	contextSummary,
	HELP_TEXT,
	RESET_DONE,
	RESET_FAILED,
	START_GREETING,
} from "./messages.js";
import type { BotContext } from "./types.js";

export type MenuAction = "help" | "about" | "reset";

export const MENU_CALLBACK_RE = regex("^cmd:(help|about|reset)$");

export const BOT_COMMANDS = [
	{ command: "start", description: "Запустить бота и показать меню" },
	{ command: "help", description: "Показать справку" },
	{ command: "about", description: "Информация о модели" },
	{ command: "reset", description: "Очистить контекст диалога" },
];

export function createMenuKeyboard() {
	return new InlineKeyboard()
		.text("ℹ️ Помощь", "cmd:help")
		.row()
		.text("🤖 О модели", "cmd:about")
		.text("♻️ Сброс", "cmd:reset");
}

export function resolveMenuAction(data: string | undefined): MenuAction | null {
	return MENU_CALLBACK_RE.exec(data ?? "")?.[1] ?? null;
}

export type CommandContext = {
	from?: { id: number };
	reply: (text: string, options?: Record<string, unknown>) => Promise<unknown>;
};

type SendText = (
	ctx: CommandContext,
	text: string,
	options?: Record<string, unknown>,
) => Promise<void>;

type CommandHandlerDeps = {
	store: DialogueStore;
	modelName: string;
	sendText: SendText;
	logger: Logger;
	menuKeyboard?: InlineKeyboard;
};

export function createCommandHandlers(deps: CommandHandlerDeps) {
	const { store, modelName, sendText, logger } = deps;
	const menuKeyboard = deps.menuKeyboard ?? createMenuKeyboard();
	const withMenu = { reply_markup: menuKeyboard };

	async function countRetainedTurns(userId: string): Promise<number> {
		try {
			const turns = await store.loadContext(userId);
			return turns.length;
		} catch (error) {
			if (!isStorageUnavailable(error)) throw error;
			logger.error({
				event: "dialogue_load_failed",
				user_id: userId,
				error: error.message,
			});
			return 0;
		}
	}

	async function start(ctx: CommandContext) {
		const userId = ctx.from?.id?.toString() ?? "";
		const turns = userId ? await countRetainedTurns(userId) : 0;
		const text =
			turns > 0
				? `${START_GREETING}\n\n${contextSummary(turns)}`
				: START_GREETING;
		await sendText(ctx, text, withMenu);
		return turns;
	}

	async function help(ctx: CommandContext) {
		await sendText(ctx, HELP_TEXT, withMenu);
	}

	async function about(ctx: CommandContext) {
		await sendText(ctx, aboutText(modelName), withMenu);
	}

	async function reset(ctx: CommandContext): Promise<boolean> {
		const userId = ctx.from?.id?.toString() ?? "";
		if (!userId) {
			await sendText(ctx, RESET_DONE, withMenu);
			return true;
		}
		try {
			await store.reset(userId);
		} catch (error) {
			if (!isStorageUnavailable(error)) throw error;
			logger.error({
				event: "dialogue_reset_failed",
				user_id: userId,
				error: error.message,
			});
			await sendText(ctx, RESET_FAILED, withMenu);
			return false;
		}
		await sendText(ctx, RESET_DONE, withMenu);
		return true;
	}

	return { start, help, about, reset };
}

export type CommandHandlers = ReturnType<typeof createCommandHandlers>;

type RegisterCommandsDeps = {
	bot: Bot<BotContext>;
	handlers: CommandHandlers;
	setLogContext: LogHelpers["setLogContext"];
	logDebug: (message: string, data?: unknown) => void;
};

export function registerCommands(deps: RegisterCommandsDeps) {
	const { bot, handlers, setLogContext, logDebug } = deps;

	bot.command("start", async (ctx) => {
		setLogContext(ctx, { command: "/start", message_type: "command" });
		const turns = await handlers.start(ctx);
		setLogContext(ctx, { context_turns: turns });
	});

	bot.command("help", (ctx) => {
		setLogContext(ctx, { command: "/help", message_type: "command" });
		return handlers.help(ctx);
	});

	bot.command("about", (ctx) => {
		setLogContext(ctx, { command: "/about", message_type: "command" });
		return handlers.about(ctx);
	});

	bot.command("reset", async (ctx) => {
		setLogContext(ctx, { command: "/reset", message_type: "command" });
		const ok = await handlers.reset(ctx);
		if (!ok) setLogContext(ctx, { outcome: "error", error: "reset_failed" });
	});

	async function safeAnswerCallback(ctx: {
		answerCallbackQuery: () => Promise<unknown>;
	}) {
		try {
			await ctx.answerCallbackQuery();
		} catch (error) {
			logDebug("callback_query answer failed", { error: String(error) });
		}
	}

	bot.callbackQuery(MENU_CALLBACK_RE, async (ctx) => {
		setLogContext(ctx, { message_type: "callback" });
		await safeAnswerCallback(ctx);
		const action = resolveMenuAction(ctx.callbackQuery.data);
		if (!action) return;
		setLogContext(ctx, { command: `cmd:${action}` });
		if (action === "reset") {
			const ok = await handlers.reset(ctx);
			if (!ok) setLogContext(ctx, { outcome: "error", error: "reset_failed" });
			return;
		}
		await handlers[action](ctx);
	});

	bot.on("callback_query:data", async (ctx) => {
		setLogContext(ctx, { message_type: "callback" });
		await safeAnswerCallback(ctx);
	});
}
