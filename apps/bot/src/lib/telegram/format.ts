import { regex } from "arkregex";

const FENCED_CODE_RE = regex.as("```([\\w+#-]*)[ \\t]*\\n?([\\s\\S]*?)```", "g");
const FENCE_RE = regex.as("```([\\w+#-]*)", "g");
const INLINE_CODE_RE = regex.as("`([^`\\n]+)`", "g");
const BOLD_RE = regex.as("\\*\\*([^*\\n]+)\\*\\*", "g");
const STRONG_UNDERSCORE_RE = regex.as("__([^_\\n]+)__", "g");
const EMPHASIS_RE = regex.as("(^|[^\\w*])\\*([^*\\n]+)\\*(?=[^\\w*]|$)", "g");
const PLACEHOLDER_RE = regex.as("\\u0000(\\d+)\\u0000", "g");
const TRAILING_NEWLINES_RE = regex("\n+$");
const AMP_RE = regex("&", "g");
const LT_RE = regex("<", "g");
const GT_RE = regex(">", "g");

export type TelegramFormattedChunk = {
	html: string;
	text: string;
};

export function escapeHtml(text: string): string {
	return text
		.replace(AMP_RE, "&amp;")
		.replace(LT_RE, "&lt;")
		.replace(GT_RE, "&gt;");
}

/**
 * Renders model output as Telegram HTML. Fenced and inline code are kept
 * verbatim (escaped), `**bold**` becomes `<b>`, other emphasis markers are dropped.
 */
export function markdownToTelegramHtml(markdown: string): string {
	if (!markdown) return "";
	const fragments: string[] = [];
	const stash = (html: string) => {
		fragments.push(html);
		return `\u0000${fragments.length - 1}\u0000`;
	};

	const withoutCode = markdown
		.replace(FENCED_CODE_RE, (_match, lang: string, code: string) => {
			const body = escapeHtml(code.replace(TRAILING_NEWLINES_RE, ""));
			const open = lang
				? `<pre><code class="language-${escapeHtml(lang)}">`
				: "<pre><code>";
			return stash(`${open}${body}</code></pre>`);
		})
		.replace(INLINE_CODE_RE, (_match, code: string) =>
			stash(`<code>${escapeHtml(code)}</code>`),
		);

	const html = escapeHtml(withoutCode)
		.replace(BOLD_RE, "<b>$1</b>")
		.replace(STRONG_UNDERSCORE_RE, "$1")
		.replace(EMPHASIS_RE, "$1$2");

	return html.replace(
		PLACEHOLDER_RE,
		(_match, index: string) => fragments[Number(index)] ?? "",
	);
}

export function splitText(text: string, limit: number): string[] {
	if (text.length <= limit) return [text];
	const chunks: string[] = [];
	let rest = text;
	while (rest.length > limit) {
		const window = rest.slice(0, limit);
		const breakAt = window.lastIndexOf("\n");
		const cut = breakAt > limit / 2 ? breakAt + 1 : limit;
		chunks.push(rest.slice(0, cut));
		rest = rest.slice(cut);
	}
	if (rest) chunks.push(rest);
	return chunks;
}

/**
 * Closes a code fence left open at the end of a chunk and reopens it, with
 * the same language, at the start of the next one.
 */
function balanceFences(chunks: readonly string[]): string[] {
	const balanced: string[] = [];
	let carry: string | null = null;
	for (const chunk of chunks) {
		const text: string = carry === null ? chunk : `\`\`\`${carry}\n${chunk}`;
		let open: { lang: string; start: number; end: number } | null = null;
		for (const match of text.matchAll(FENCE_RE)) {
			const start = match.index ?? 0;
			open = open
				? null
				: { lang: match[1] ?? "", start, end: start + match[0].length };
		}
		if (!open) {
			balanced.push(text);
			carry = null;
			continue;
		}
		carry = open.lang;
		// A fence opened right at the cut moves to the next chunk whole.
		const closed = text.slice(open.end).trim()
			? `${text.replace(TRAILING_NEWLINES_RE, "")}\n\`\`\``
			: text.slice(0, open.start).trimEnd();
		if (closed) balanced.push(closed);
	}
	return balanced;
}

/** Splits the markdown source first so every chunk renders to valid HTML on its own. */
export function markdownToTelegramChunks(
	markdown: string,
	limit: number,
): TelegramFormattedChunk[] {
	if (!markdown) return [];
	return balanceFences(splitText(markdown, limit)).map((text) => ({
		html: markdownToTelegramHtml(text),
		text,
	}));
}
