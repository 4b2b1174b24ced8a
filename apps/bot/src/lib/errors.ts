export type BotErrorKind =
	| "ConfigError"
	| "TransientError"
	| "ProtocolError"
	| "StorageUnavailable"
	| "MediaUnavailable";

abstract class BotError extends Error {
	abstract readonly kind: BotErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Missing or rejected credentials, unknown model, bad base URL. */
export class ConfigError extends BotError {
	readonly kind = "ConfigError";
}

/** Network failure, timeout, rate limit or upstream 5xx. Worth trying again later. */
export class TransientError extends BotError {
	readonly kind = "TransientError";
}

/** The completion API answered with something we cannot use. */
export class ProtocolError extends BotError {
	readonly kind = "ProtocolError";
}

export class StorageUnavailableError extends BotError {
	readonly kind = "StorageUnavailable";
	readonly operation: string;

	constructor(operation: string, options?: { cause?: unknown }) {
		const reason =
			options?.cause instanceof Error ? `: ${options.cause.message}` : "";
		super(`dialogue storage unavailable during ${operation}${reason}`, options);
		this.operation = operation;
	}
}

export type MediaFailureReason =
	| "unsupported"
	| "too_large"
	| "missing_file"
	| "download_failed";

/** A photo or audio file could not be fetched from Telegram or is not accepted. */
export class MediaUnavailableError extends BotError {
	readonly kind = "MediaUnavailable";
	readonly reason: MediaFailureReason;

	constructor(
		reason: MediaFailureReason,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.reason = reason;
	}
}

export type CompletionError = ConfigError | TransientError | ProtocolError;

export function isStorageUnavailable(
	error: unknown,
): error is StorageUnavailableError {
	return error instanceof StorageUnavailableError;
}
