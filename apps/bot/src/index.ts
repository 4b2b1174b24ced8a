import { run } from "@grammyjs/runner";
import dotenv from "dotenv";
import { createBot } from "./bot.js";
import { loadBotEnv } from "./lib/config/env.js";
import { createSqliteDialogueStore } from "./lib/context/sqlite-store.js";
import { createStopWordFilter, loadStopWords } from "./lib/filters/stop-words.js";
import { createLogger, formatError } from "./lib/logger.js";

dotenv.config();

async function main() {
	const config = loadBotEnv(process.env);
	const logger = createLogger(
		{ service: config.serviceName, version: config.releaseVersion },
		{ debug: config.debugLogs },
	);

	const stopWords = await loadStopWords(config.stopWordsPath);
	const filter = createStopWordFilter(stopWords, config.stopWordsMatch);
	const store = createSqliteDialogueStore({
		filename: config.dialogueDbPath,
		budget: config.budget,
	});

	const { bot, allowedUpdates, publishCommands } = createBot({
		config,
		store,
		filter,
		logger,
	});

	await bot.init();
	await publishCommands();
	await bot.api.deleteWebhook({ drop_pending_updates: true });

	const runner = run(bot, {
		runner: { fetch: { allowed_updates: allowedUpdates } },
	});
	logger.info({
		event: "bot_started",
		username: bot.botInfo.username,
		model: config.modelName,
		stop_words: filter.terms.length,
		max_turns: config.budget.maxTurns,
		max_chars: config.budget.maxChars,
	});

	let stopping = false;
	const stop = async (signal: string) => {
		if (stopping) return;
		stopping = true;
		logger.info({ event: "bot_stopping", signal });
		if (runner.isRunning()) await runner.stop();
		store.close();
	};
	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.once(signal, () => {
			stop(signal).catch((error: unknown) => {
				logger.error({ event: "bot_stop_failed", error: formatError(error) });
			});
		});
	}

	await runner.task();
}

main().catch((error: unknown) => {
	console.error(
		JSON.stringify({
			timestamp: new Date().toISOString(),
			level: "error",
			event: "startup_failed",
			error: formatError(error),
		}),
	);
	process.exit(1);
});
