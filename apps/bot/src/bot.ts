import { sequentialize } from "@grammyjs/runner";
import { apiThrottler } from "@grammyjs/transformer-throttler";
import { API_CONSTANTS, Bot } from "grammy";
import {
	BOT_COMMANDS,
	createCommandHandlers,
	createMenuKeyboard,
	registerCommands,
} from "./lib/bot/commands.js";
import {
	createLogHelpers,
	createRequestLoggerMiddleware,
} from "./lib/bot/logging.js";
import { createMediaLoader } from "./lib/bot/media.js";
import { UNSUPPORTED_MESSAGE_HINT } from "./lib/bot/messages.js";
import { createTelegramHelpers } from "./lib/bot/telegram.js";
import { createMessageHandlers } from "./lib/bot/text.js";
import type { BotContext } from "./lib/bot/types.js";
import { createChatResponder } from "./lib/chat/respond.js";
import {
	type CompletionClient,
	createCompletionClient,
} from "./lib/completion/client.js";
import type { BotConfig } from "./lib/config/env.js";
import type { DialogueStore } from "./lib/context/dialogue-store.js";
import type { StopWordFilter } from "./lib/filters/stop-words.js";
import type { Logger } from "./lib/logger.js";

export type { BotConfig } from "./lib/config/env.js";

export type CreateBotOptions = {
	config: BotConfig;
	store: DialogueStore;
	filter: StopWordFilter;
	logger: Logger;
	completion?: CompletionClient;
};

export function createBot(options: CreateBotOptions) {
	const { config, store, filter, logger } = options;

	const bot = new Bot<BotContext>(config.botToken, {
		client: { timeoutSeconds: config.telegramTimeoutSeconds },
	});

	const completion =
		options.completion ??
		createCompletionClient({
			apiKeys: config.apiKeys,
			baseUrl: config.baseUrl,
			modelName: config.modelName,
			temperature: config.temperature,
			maxOutputTokens: config.maxOutputTokens,
			timeoutMs: config.completionTimeoutMs,
			logger,
		});

	const logDebug = logger.debug;
	const { getLogContext, setLogContext, setLogError } = createLogHelpers();
	const { sendText } = createTelegramHelpers({
		textChunkLimit: config.telegramTextChunkLimit,
		logDebug,
	});

	bot.api.config.use(apiThrottler());
	bot.use(
		createRequestLoggerMiddleware({
			logger,
			getLogContext,
			setLogContext,
			setLogError,
		}),
	);
	// Updates of one user are handled strictly in arrival order.
	bot.use(
		sequentialize((ctx) => {
			if (ctx.from?.id) return `telegram:user:${ctx.from.id}`;
			if (ctx.chat?.id) return `telegram:${ctx.chat.id}`;
			return "telegram:unknown";
		}),
	);

	const handlers = createCommandHandlers({
		store,
		modelName: completion.modelName,
		sendText,
		logger,
		menuKeyboard: createMenuKeyboard(),
	});
	registerCommands({ bot, handlers, setLogContext, logDebug });

	const responder = createChatResponder({
		store,
		filter,
		completion,
		logger,
		systemPrompt: config.systemPrompt,
		getBotProfile: () =>
			bot.isInited()
				? {
						id: bot.botInfo.id,
						firstName: bot.botInfo.first_name,
						username: bot.botInfo.username,
					}
				: undefined,
	});
	const { handleText, handleMedia } = createMessageHandlers({
		responder,
		sendText,
		logDebug,
	});
	const media = createMediaLoader({
		botToken: config.botToken,
		maxBytes: config.mediaMaxBytes,
	});

	bot.on("message:text", async (ctx) => {
		setLogContext(ctx, { message_type: "text" });
		const fields = await handleText(ctx, ctx.message.text);
		setLogContext(ctx, fields);
	});

	bot.on("message:photo", async (ctx) => {
		setLogContext(ctx, { message_type: "photo" });
		const photo = ctx.message.photo.at(-1);
		if (!photo) return;
		const fields = await handleMedia(ctx, ctx.message.caption, () =>
			media.loadPhoto(ctx.api, photo),
		);
		setLogContext(ctx, fields);
	});

	bot.on("message:audio", async (ctx) => {
		setLogContext(ctx, { message_type: "audio" });
		const audio = ctx.message.audio;
		const fields = await handleMedia(ctx, ctx.message.caption, () =>
			media.loadAudio(ctx.api, audio),
		);
		setLogContext(ctx, fields);
	});

	bot.on("message:voice", async (ctx) => {
		setLogContext(ctx, { message_type: "voice" });
		const voice = ctx.message.voice;
		const fields = await handleMedia(ctx, ctx.message.caption, () =>
			media.loadAudio(ctx.api, voice),
		);
		setLogContext(ctx, fields);
	});

	bot.on("message", (ctx) => {
		if (
			ctx.message.new_chat_members ||
			ctx.message.left_chat_member ||
			ctx.message.pinned_message ||
			ctx.message.group_chat_created ||
			ctx.message.migrate_to_chat_id
		) {
			return;
		}
		setLogContext(ctx, { message_type: "other" });
		return sendText(ctx, UNSUPPORTED_MESSAGE_HINT);
	});

	bot.catch((err) => {
		logger.error({
			event: "bot_error",
			update_id: err.ctx.update.update_id,
			error: String(err.error),
		});
	});

	const allowedUpdates = [...API_CONSTANTS.DEFAULT_UPDATE_TYPES];

	async function publishCommands() {
		await bot.api.setMyCommands(BOT_COMMANDS);
	}

	return { bot, allowedUpdates, completion, publishCommands };
}
