import type { CompletionError, MediaFailureReason } from "../errors.js";

export const START_GREETING =
	"Привет! Я AI-ассистент.\n\n" +
	"Пиши обычные сообщения — я отвечу с учётом предыдущего контекста.\n" +
	"Задавай вопросы или используй кнопки ниже!";

export const HELP_TEXT =
	"Команды:\n" +
	"— /start — приветствие и меню\n" +
	"— /help — эта справка\n" +
	"— /about — информация о модели\n" +
	"— /reset — очистка контекста\n\n" +
	"Пиши обычные сообщения, я отвечу с учётом предыдущего контекста.\n" +
	"Можно прислать фото (с подписью или без) или аудиофайл MP3/WAV.";

export function aboutText(modelName: string) {
	return (
		`Модель: ${modelName}\n\n` +
		"Я пересылаю твои сообщения языковой модели и помню последние реплики диалога. " +
		"Команда /reset очищает контекст."
	);
}

export function contextSummary(turns: number) {
	return `В контексте сообщений: ${turns}. Команда /reset начнёт диалог заново.`;
}

export const RESET_DONE = "Контекст очищен. Можем начать заново!";
export const RESET_FAILED =
	"Не удалось очистить контекст. Попробуй позже.";
export const STOP_WORD_REFUSAL = "Пожалуйста, без нецензурных слов 🙏";
export const EMPTY_MESSAGE_HINT = "Напиши вопрос текстом, и я отвечу.";
export const UNKNOWN_COMMAND = "Неизвестная команда. Список команд: /help";
export const UNSUPPORTED_MESSAGE_HINT =
	"Я понимаю текст, фото и аудиофайлы MP3/WAV.";

export const MEDIA_FAILURE_TEXT: Record<MediaFailureReason, string> = {
	unsupported:
		"Этот формат аудио не поддерживается. Пришли файл MP3 или WAV.",
	too_large: "Файл слишком большой. Пришли что-нибудь поменьше.",
	missing_file: "Не удалось получить файл. Попробуй отправить его ещё раз.",
	download_failed: "Не удалось получить файл. Попробуй отправить его ещё раз.",
};

export const COMPLETION_FAILURE_TEXT: Record<CompletionError["kind"], string> = {
	TransientError: "Упс, сервис временно недоступен. Попробуй позже.",
	ConfigError:
		"Бот не может обратиться к модели: проблема с настройками. Сообщи администратору.",
	ProtocolError:
		"Не удалось получить ответ от модели. Попробуй переформулировать вопрос.",
};
