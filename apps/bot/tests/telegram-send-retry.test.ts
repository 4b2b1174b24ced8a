import { describe, expect, it, vi } from "vitest";
import {
	createTelegramHelpers,
	getRetryAfterMs,
} from "../src/lib/bot/telegram.js";

type ReplyFn = (
	text: string,
	options?: Record<string, unknown>,
) => Promise<unknown>;

describe("createTelegramHelpers sendText retries", () => {
	it("retries transient sendMessage failures", async () => {
		vi.useFakeTimers();
		const logDebug = vi.fn();
		const { sendText } = createTelegramHelpers({
			textChunkLimit: 4000,
			logDebug,
		});
		let calls = 0;
		const ctx = {
			reply: vi.fn<ReplyFn>(async () => {
				calls += 1;
				if (calls < 3) {
					throw new Error("Network request for 'sendMessage' failed!");
				}
				return { ok: true };
			}),
		};

		const promise = sendText(ctx, "hello");
		await vi.runAllTimersAsync();
		await promise;

		expect(ctx.reply).toHaveBeenCalledTimes(3);
		expect(logDebug).toHaveBeenCalledWith(
			"telegram send retry",
			expect.objectContaining({ label: "sendMessage", attempt: 1 }),
		);
		expect(logDebug).toHaveBeenCalledWith(
			"telegram send retry",
			expect.objectContaining({ label: "sendMessage", attempt: 2 }),
		);
		vi.useRealTimers();
	});

	it("falls back to plain text without retrying on HTML parse errors", async () => {
		const logDebug = vi.fn();
		const { sendText } = createTelegramHelpers({
			textChunkLimit: 4000,
			logDebug,
		});
		const ctx = {
			reply: vi.fn<ReplyFn>(async (_text, options) => {
				if (options?.parse_mode) {
					throw new Error("Bad Request: can't parse entities");
				}
				return { ok: true };
			}),
		};

		await sendText(ctx, "**oops**");

		expect(ctx.reply).toHaveBeenCalledTimes(2);
		expect(ctx.reply).toHaveBeenNthCalledWith(1, "<b>oops</b>", {
			parse_mode: "HTML",
		});
		expect(ctx.reply).toHaveBeenNthCalledWith(2, "**oops**", {});
		expect(logDebug).toHaveBeenCalledWith(
			"telegram html reply failed, retrying as plain text",
			{ error: "Bad Request: can't parse entities", chunk: 0 },
		);
	});

	it("rethrows permanent failures after one attempt", async () => {
		const { sendText } = createTelegramHelpers({
			textChunkLimit: 4000,
			logDebug: vi.fn(),
		});
		const ctx = {
			reply: vi.fn<ReplyFn>(async () => {
				throw new Error("Forbidden: bot was blocked by the user");
			}),
		};

		await expect(sendText(ctx, "hello")).rejects.toThrow("Forbidden");
		expect(ctx.reply).toHaveBeenCalledTimes(1);
	});

	it("splits long replies and attaches the keyboard to the last chunk", async () => {
		const { sendText } = createTelegramHelpers({
			textChunkLimit: 100,
			logDebug: vi.fn(),
		});
		const ctx = { reply: vi.fn<ReplyFn>(async () => ({ ok: true })) };
		const keyboard = { inline_keyboard: [] };

		await sendText(ctx, "x".repeat(250), { reply_markup: keyboard });

		expect(ctx.reply.mock.calls.map(([text]) => text.length)).toEqual([
			100, 100, 50,
		]);
		expect(ctx.reply.mock.calls.map(([, options]) => options?.reply_markup)).toEqual(
			[undefined, undefined, keyboard],
		);
	});
});

describe("createTelegramHelpers long replies", () => {
	const countOf = (text: string, needle: string) =>
		text.split(needle).length - 1;

	it("keeps a code block that crosses a chunk boundary valid HTML", async () => {
		const { sendText } = createTelegramHelpers({
			textChunkLimit: 100,
			logDebug: vi.fn(),
		});
		const ctx = {
			reply: vi.fn<ReplyFn>(async (text) => {
				if (countOf(text, "<pre>") !== countOf(text, "</pre>")) {
					throw new Error("Bad Request: can't parse entities");
				}
				return { ok: true };
			}),
		};
		const intro = Array.from({ length: 9 }, (_, i) => `intro line ${i + 1}`);
		const code = Array.from(
			{ length: 12 },
			(_, i) => `const value${i + 1} = ${i + 1};`,
		);
		const answer = `${intro.join("\n")}\n\`\`\`ts\n${code.join("\n")}\n\`\`\``;

		await sendText(ctx, answer);

		const sent = ctx.reply.mock.calls;
		expect(sent.length).toBeGreaterThan(1);
		expect(sent.every(([, options]) => options?.parse_mode === "HTML")).toBe(
			true,
		);
		for (const line of [...intro, ...code]) {
			expect(sent.filter(([text]) => text.includes(line))).toHaveLength(1);
		}
	});

	it("falls back to plain text only for the chunk that failed", async () => {
		const logDebug = vi.fn();
		const { sendText } = createTelegramHelpers({ textChunkLimit: 100, logDebug });
		const ctx = {
			reply: vi.fn<ReplyFn>(async (text) => {
				if (text.includes("<b>")) {
					throw new Error("Bad Request: can't parse entities");
				}
				return { ok: true };
			}),
		};

		await sendText(ctx, `${"x".repeat(100)}**bold** tail`);

		expect(ctx.reply.mock.calls.map(([text]) => text)).toEqual([
			"x".repeat(100),
			"<b>bold</b> tail",
			"**bold** tail",
		]);
		expect(logDebug).toHaveBeenCalledWith(
			"telegram html reply failed, retrying as plain text",
			{ error: "Bad Request: can't parse entities", chunk: 1 },
		);
	});
});

describe("telegram helpers", () => {
	it("reads retry_after from Bot API errors", () => {
		expect(getRetryAfterMs({ parameters: { retry_after: 3 } })).toBe(3000);
		expect(
			getRetryAfterMs({ error: { parameters: { retry_after: 1 } } }),
		).toBe(1000);
		expect(getRetryAfterMs(new Error("boom"))).toBeNull();
	});
});
