import { describe, expect, it, vi } from "vitest";
import {
	createMediaLoader,
	resolveAudioMediaType,
} from "../src/lib/bot/media.js";
import { MediaUnavailableError } from "../src/lib/errors.js";

type FetchFile = (url: string) => Promise<{
	ok: boolean;
	status: number;
	arrayBuffer: () => Promise<ArrayBuffer>;
}>;

function okResponse(bytes: number[]) {
	return {
		ok: true,
		status: 200,
		arrayBuffer: async () => new Uint8Array(bytes).buffer,
	};
}

function setup(fetchFile: FetchFile, maxBytes = 1024) {
	const api = {
		getFile: vi.fn(async (_fileId: string) => ({
			file_path: "photos/file_1.jpg",
		})),
	};
	const loader = createMediaLoader({
		botToken: "test-token",
		maxBytes,
		apiRoot: "https://telegram.test",
		fetchFile,
	});
	return { api, loader };
}

describe("media loader", () => {
	it("downloads the photo through the file endpoint", async () => {
		const fetchFile = vi.fn<FetchFile>(async () => okResponse([1, 2, 3]));
		const { api, loader } = setup(fetchFile);

		const attachment = await loader.loadPhoto(api, { file_id: "photo-1" });

		expect(api.getFile).toHaveBeenCalledWith("photo-1");
		expect(fetchFile).toHaveBeenCalledWith(
			"https://telegram.test/file/bottest-token/photos/file_1.jpg",
		);
		expect(attachment).toEqual({
			kind: "image",
			mediaType: "image/jpeg",
			data: new Uint8Array([1, 2, 3]),
		});
	});

	it("normalizes audio media types", async () => {
		const { api, loader } = setup(async () => okResponse([9]));
		const attachment = await loader.loadAudio(api, {
			file_id: "audio-1",
			mime_type: "audio/mp3",
		});
		expect(attachment.mediaType).toBe("audio/mpeg");
		expect(resolveAudioMediaType("audio/x-wav")).toBe("audio/wav");
		expect(resolveAudioMediaType(undefined)).toBeNull();
	});

	it("rejects voice notes before downloading", async () => {
		const fetchFile = vi.fn<FetchFile>(async () => okResponse([1]));
		const { api, loader } = setup(fetchFile);

		await expect(
			loader.loadAudio(api, { file_id: "voice-1", mime_type: "audio/ogg" }),
		).rejects.toMatchObject({
			kind: "MediaUnavailable",
			reason: "unsupported",
			message: "audio_unsupported:audio/ogg",
		});
		expect(api.getFile).not.toHaveBeenCalled();
		expect(fetchFile).not.toHaveBeenCalled();
	});

	it("rejects files over the size limit", async () => {
		const { api, loader } = setup(async () => okResponse([1, 2, 3, 4]), 3);

		await expect(
			loader.loadPhoto(api, { file_id: "big", file_size: 10 }),
		).rejects.toMatchObject({ reason: "too_large", message: "image_too_large:10" });
		await expect(loader.loadPhoto(api, { file_id: "unsized" })).rejects.toMatchObject(
			{ reason: "too_large", message: "image_too_large:4" },
		);
	});

	it("wraps download failures", async () => {
		const { api, loader } = setup(async () => ({
			ok: false,
			status: 404,
			arrayBuffer: async () => new ArrayBuffer(0),
		}));
		await expect(loader.loadPhoto(api, { file_id: "gone" })).rejects.toMatchObject({
			reason: "download_failed",
			message: "image_download_failed:404",
		});

		const broken = setup(async () => {
			throw new TypeError("fetch failed");
		});
		const error = await broken.loader
			.loadPhoto(broken.api, { file_id: "x" })
			.catch((caught: unknown) => caught);
		expect(error).toBeInstanceOf(MediaUnavailableError);
		expect(error).toMatchObject({ reason: "download_failed" });
	});
});
