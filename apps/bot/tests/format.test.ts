import { describe, expect, it } from "vitest";
import {
	markdownToTelegramChunks,
	markdownToTelegramHtml,
	splitText,
} from "../src/lib/telegram/format.js";

describe("markdownToTelegramHtml", () => {
	it("escapes HTML in plain text", () => {
		expect(markdownToTelegramHtml("a < b && c > d")).toBe(
			"a &lt; b &amp;&amp; c &gt; d",
		);
	});

	it("renders bold and drops single-star emphasis", () => {
		expect(markdownToTelegramHtml("Use **bold** and *soft* text")).toBe(
			"Use <b>bold</b> and soft text",
		);
	});

	it("keeps fenced code verbatim with its language", () => {
		expect(markdownToTelegramHtml("Пример:\n```ts\nconsole.log(1 < 2)\n```")).toBe(
			'Пример:\n<pre><code class="language-ts">console.log(1 &lt; 2)</code></pre>',
		);
	});

	it("does not touch markers inside inline code", () => {
		expect(markdownToTelegramHtml("Run `a*b*c` now")).toBe(
			"Run <code>a*b*c</code> now",
		);
	});

	it("leaves snake_case identifiers alone", () => {
		expect(markdownToTelegramHtml("set my_var_name")).toBe("set my_var_name");
	});
});

describe("splitText", () => {
	it("prefers line breaks when splitting", () => {
		const text = `${"a".repeat(70)}\n${"b".repeat(70)}`;
		expect(splitText(text, 100)).toEqual([`${"a".repeat(70)}\n`, "b".repeat(70)]);
	});
});

describe("markdownToTelegramChunks", () => {
	it("closes and reopens a code fence cut between chunks", () => {
		const chunks = markdownToTelegramChunks(
			"Intro\n```ts\nconst a = 1;\nconst b = 2;\n```",
			20,
		);
		expect(chunks).toEqual([
			{ html: "Intro", text: "Intro" },
			{
				html: '<pre><code class="language-ts">const a = 1;</code></pre>',
				text: "```ts\nconst a = 1;\n```",
			},
			{
				html: '<pre><code class="language-ts">const b = 2;</code></pre>',
				text: "```ts\nconst b = 2;\n```",
			},
		]);
	});

	it("returns a single chunk for short text", () => {
		expect(markdownToTelegramChunks("**hi**", 100)).toEqual([
			{ html: "<b>hi</b>", text: "**hi**" },
		]);
	});
});
