import type { MediaAttachment } from "../completion/prompt.js";
import { MediaUnavailableError } from "../errors.js";

const TELEGRAM_API_ROOT = "https://api.telegram.org";

// Telegram photos are always re-encoded as JPEG.
const PHOTO_MEDIA_TYPE = "image/jpeg";

// Audio formats the OpenAI-compatible chat API accepts as input.
const AUDIO_MEDIA_TYPES = new Map([
	["audio/mpeg", "audio/mpeg"],
	["audio/mp3", "audio/mpeg"],
	["audio/wav", "audio/wav"],
	["audio/x-wav", "audio/wav"],
	["audio/wave", "audio/wav"],
]);

export type TelegramFileRef = {
	file_id: string;
	file_size?: number;
	mime_type?: string;
};

type FileApi = {
	getFile: (fileId: string) => Promise<{ file_path?: string }>;
};

type FetchResponse = {
	ok: boolean;
	status: number;
	arrayBuffer: () => Promise<ArrayBuffer>;
};

type MediaLoaderOptions = {
	botToken: string;
	maxBytes: number;
	apiRoot?: string;
	fetchFile?: (url: string) => Promise<FetchResponse>;
};

export function resolveAudioMediaType(mimeType: string | undefined) {
	return AUDIO_MEDIA_TYPES.get(mimeType?.trim().toLowerCase() ?? "") ?? null;
}

export function createMediaLoader(options: MediaLoaderOptions) {
	const { botToken, maxBytes } = options;
	const apiRoot = options.apiRoot ?? TELEGRAM_API_ROOT;
	const fetchFile = options.fetchFile ?? ((url: string) => fetch(url));

	function assertSize(kind: MediaAttachment["kind"], size: number | undefined) {
		if (size !== undefined && size > maxBytes) {
			throw new MediaUnavailableError("too_large", `${kind}_too_large:${size}`);
		}
	}

	async function download(
		api: FileApi,
		ref: TelegramFileRef,
		kind: MediaAttachment["kind"],
		mediaType: string,
	): Promise<MediaAttachment> {
		assertSize(kind, ref.file_size);
		let data: Uint8Array;
		try {
			const file = await api.getFile(ref.file_id);
			if (!file.file_path) {
				throw new MediaUnavailableError("missing_file", `${kind}_missing_path`);
			}
			const response = await fetchFile(
				`${apiRoot}/file/bot${botToken}/${file.file_path}`,
			);
			if (!response.ok) {
				throw new MediaUnavailableError(
					"download_failed",
					`${kind}_download_failed:${response.status}`,
				);
			}
			data = new Uint8Array(await response.arrayBuffer());
		} catch (error) {
			if (error instanceof MediaUnavailableError) throw error;
			throw new MediaUnavailableError(
				"download_failed",
				`${kind}_download_failed`,
				{ cause: error },
			);
		}
		assertSize(kind, data.byteLength);
		return { kind, mediaType, data };
	}

	function loadPhoto(api: FileApi, photo: TelegramFileRef) {
		return download(api, photo, "image", PHOTO_MEDIA_TYPE);
	}

	async function loadAudio(api: FileApi, audio: TelegramFileRef) {
		const mediaType = resolveAudioMediaType(audio.mime_type);
		if (!mediaType) {
			throw new MediaUnavailableError(
				"unsupported",
				`audio_unsupported:${audio.mime_type ?? "unknown"}`,
			);
		}
		return download(api, audio, "audio", mediaType);
	}

	return { loadPhoto, loadAudio };
}

export type MediaLoader = ReturnType<typeof createMediaLoader>;
