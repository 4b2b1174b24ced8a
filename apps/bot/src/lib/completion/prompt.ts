import type { FilePart, ImagePart, ModelMessage, TextPart } from "ai";
import type { Turn } from "../context/dialogue-store.js";

export const DEFAULT_SYSTEM_PROMPT =
	"Отвечай по делу, дружелюбно и без лишних украшательств. " +
	"Не используй markdown-выделение (звёздочки, подчёркивания). " +
	"Код оборачивай в тройные бэктики с указанием языка, например ```ts. " +
	"Списки оформляй маркерами «-», обычные ответы делай короткими.";

export type UserProfile = {
	id?: number;
	firstName?: string;
	lastName?: string;
	username?: string;
	languageCode?: string;
};

export type BotProfile = {
	id: number;
	firstName: string;
	username: string;
};

/** Photo or audio file sent along with (or instead of) the message text. */
export type MediaAttachment = {
	kind: "image" | "audio";
	mediaType: string;
	data: Uint8Array;
};

const ATTACHMENT_PLACEHOLDERS: Record<MediaAttachment["kind"], string> = {
	image: "[изображение]",
	audio: "[аудио]",
};

export function formatUserProfile(profile: UserProfile | undefined): string {
	if (!profile) return "";
	const lines = [
		profile.firstName ? `Имя: ${profile.firstName}` : "",
		profile.lastName ? `Фамилия: ${profile.lastName}` : "",
		profile.username ? `Username: @${profile.username}` : "",
		profile.id !== undefined ? `ID: ${profile.id}` : "",
		profile.languageCode ? `Язык: ${profile.languageCode}` : "",
	].filter(Boolean);
	if (!lines.length) return "";
	return ["Информация о собеседнике:", ...lines].join("\n");
}

export function formatBotProfile(bot: BotProfile | undefined): string {
	if (!bot) return "";
	return [
		"Информация о боте:",
		`Имя бота: ${bot.firstName}`,
		`Username бота: @${bot.username}`,
		`ID бота: ${bot.id}`,
		"Используй эту информацию для ответа на вопросы о боте.",
	].join("\n");
}

export function buildSystemPrompt(
	basePrompt: string,
	profile?: UserProfile,
	bot?: BotProfile,
): string {
	const base = basePrompt.trim() || DEFAULT_SYSTEM_PROMPT;
	return [base, formatBotProfile(bot), formatUserProfile(profile)]
		.filter(Boolean)
		.join("\n\n");
}

/** Text kept in the dialogue for a message that carried attachments. */
export function describeUserMessage(
	text: string,
	attachments: readonly MediaAttachment[] = [],
): string {
	const placeholders = attachments.map(
		(attachment) => ATTACHMENT_PLACEHOLDERS[attachment.kind],
	);
	return [...placeholders, text].filter(Boolean).join(" ");
}

function toContentPart(attachment: MediaAttachment): ImagePart | FilePart {
	if (attachment.kind === "image") {
		return {
			type: "image",
			image: attachment.data,
			mediaType: attachment.mediaType,
		};
	}
	return {
		type: "file",
		data: attachment.data,
		mediaType: attachment.mediaType,
	};
}

export function buildMessages(
	context: readonly Turn[],
	newUserText: string,
	attachments: readonly MediaAttachment[] = [],
): ModelMessage[] {
	const history = context.map(
		(turn): ModelMessage =>
			turn.role === "assistant"
				? { role: "assistant", content: turn.text }
				: { role: "user", content: turn.text },
	);
	if (!attachments.length) {
		return [...history, { role: "user", content: newUserText }];
	}
	const textParts: TextPart[] = newUserText
		? [{ type: "text", text: newUserText }]
		: [];
	return [
		...history,
		{
			role: "user",
			content: [...textParts, ...attachments.map(toContentPart)],
		},
	];
}
