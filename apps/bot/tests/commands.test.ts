import { describe, expect, it, type Mock, vi } from "vitest";
import {
	type CommandContext,
	createCommandHandlers,
	resolveMenuAction,
} from "../src/lib/bot/commands.js";
import {
	aboutText,
	contextSummary,
	HELP_TEXT,
	RESET_DONE,
	RESET_FAILED,
	START_GREETING,
} from "../src/lib/bot/messages.js";
import {
	createMemoryDialogueStore,
	type DialogueStore,
} from "../src/lib/context/dialogue-store.js";
import { StorageUnavailableError } from "../src/lib/errors.js";
import { createLogger } from "../src/lib/logger.js";

type SendTextFn = (
	ctx: CommandContext,
	text: string,
	options?: Record<string, unknown>,
) => Promise<void>;

function setup(store: DialogueStore = createMemoryDialogueStore()) {
	const sendText = vi.fn<SendTextFn>(async () => {});
	const handlers = createCommandHandlers({
		store,
		modelName: "test/model",
		sendText,
		logger: createLogger({}, { write: vi.fn() }),
	});
	const ctx = { from: { id: 7 }, reply: vi.fn(async () => ({})) };
	return { handlers, sendText, ctx, store };
}

function sentTexts(sendText: Mock<SendTextFn>) {
	return sendText.mock.calls.map(([, text]) => text);
}

describe("command handlers", () => {
	it("greets a new user with the menu", async () => {
		const { handlers, sendText, ctx } = setup();
		await expect(handlers.start(ctx)).resolves.toBe(0);
		expect(sendText).toHaveBeenCalledWith(
			ctx,
			START_GREETING,
			expect.objectContaining({ reply_markup: expect.anything() }),
		);
	});

	it("mentions retained context on /start", async () => {
		const { handlers, sendText, ctx, store } = setup();
		await store.appendTurn("7", "user", "hi");
		await store.appendTurn("7", "assistant", "hello");
		await handlers.start(ctx);
		expect(sentTexts(sendText)).toEqual([
			`${START_GREETING}\n\n${contextSummary(2)}`,
		]);
	});

	it("clears the dialogue on /reset so /start sees an empty context", async () => {
		const { handlers, sendText, ctx, store } = setup();
		for (let index = 0; index < 5; index += 1) {
			await store.appendTurn("7", index % 2 ? "assistant" : "user", `t${index}`);
		}

		await expect(handlers.reset(ctx)).resolves.toBe(true);
		await expect(handlers.start(ctx)).resolves.toBe(0);

		await expect(store.loadContext("7")).resolves.toEqual([]);
		expect(sentTexts(sendText)).toEqual([RESET_DONE, START_GREETING]);
	});

	it("reports a failed reset", async () => {
		const memory = createMemoryDialogueStore();
		const store: DialogueStore = {
			...memory,
			reset: async () => {
				throw new StorageUnavailableError("reset");
			},
		};
		const { handlers, sendText, ctx } = setup(store);
		await expect(handlers.reset(ctx)).resolves.toBe(false);
		expect(sentTexts(sendText)).toEqual([RESET_FAILED]);
	});

	it("sends static help and about texts", async () => {
		const { handlers, sendText, ctx } = setup();
		await handlers.help(ctx);
		await handlers.about(ctx);
		expect(sentTexts(sendText)).toEqual([HELP_TEXT, aboutText("test/model")]);
		expect(aboutText("test/model").startsWith("Модель: test/model")).toBe(true);
	});
});

describe("menu callbacks", () => {
	it.each([
		["cmd:help", "help"],
		["cmd:about", "about"],
		["cmd:reset", "reset"],
	])("maps %s to %s", (data, action) => {
		expect(resolveMenuAction(data)).toBe(action);
	});

	it("ignores unknown callback data", () => {
		expect(resolveMenuAction("cmd:status")).toBeNull();
		expect(resolveMenuAction(undefined)).toBeNull();
	});
});
