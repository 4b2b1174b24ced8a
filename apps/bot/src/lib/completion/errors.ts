import { regex } from "arkregex";
import {
	APICallError,
	InvalidResponseDataError,
	JSONParseError,
	LoadAPIKeyError,
	NoContentGeneratedError,
	RetryError,
	TypeValidationError,
} from "ai";
import {
	type CompletionError,
	ConfigError,
	ProtocolError,
	TransientError,
} from "../errors.js";
import { formatError } from "../logger.js";

const CONFIG_STATUS_CODES = new Set([401, 403, 404]);
const TRANSIENT_STATUS_CODES = new Set([408, 409, 425, 429]);
const NETWORK_ERROR_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EPIPE",
	"ENETUNREACH",
]);
const NETWORK_MESSAGE_RE = regex.as(
	"fetch failed|network|socket hang up|timed? ?out",
	"i",
);

function readCode(error: unknown): string | undefined {
	if (!error || typeof error !== "object" || !("code" in error)) return;
	return typeof error.code === "string" ? error.code : undefined;
}

function isNetworkFailure(error: unknown, depth = 0): boolean {
	if (!(error instanceof Error) || depth > 3) return false;
	if (error.name === "AbortError" || error.name === "TimeoutError") return true;
	const code = readCode(error);
	if (code && (NETWORK_ERROR_CODES.has(code) || code.startsWith("UND_ERR_"))) {
		return true;
	}
	if (error instanceof TypeError && NETWORK_MESSAGE_RE.test(error.message)) {
		return true;
	}
	return isNetworkFailure(error.cause, depth + 1);
}

export function isRateLimited(error: unknown): boolean {
	const unwrapped = RetryError.isInstance(error) ? error.lastError : error;
	return APICallError.isInstance(unwrapped) && unwrapped.statusCode === 429;
}

export function classifyCompletionError(error: unknown): CompletionError {
	if (RetryError.isInstance(error)) {
		return classifyCompletionError(error.lastError);
	}
	if (
		error instanceof ConfigError ||
		error instanceof TransientError ||
		error instanceof ProtocolError
	) {
		return error;
	}
	const message = formatError(error);

	if (LoadAPIKeyError.isInstance(error)) {
		return new ConfigError(message, { cause: error });
	}
	if (APICallError.isInstance(error)) {
		const status = error.statusCode;
		const label = status ? `HTTP ${status}: ${message}` : message;
		if (status !== undefined && CONFIG_STATUS_CODES.has(status)) {
			return new ConfigError(label, { cause: error });
		}
		if (
			error.isRetryable ||
			(status !== undefined &&
				(TRANSIENT_STATUS_CODES.has(status) || status >= 500))
		) {
			return new TransientError(label, { cause: error });
		}
		if (status === undefined && isNetworkFailure(error.cause)) {
			return new TransientError(label, { cause: error });
		}
		return new ProtocolError(label, { cause: error });
	}
	if (
		JSONParseError.isInstance(error) ||
		TypeValidationError.isInstance(error) ||
		InvalidResponseDataError.isInstance(error) ||
		NoContentGeneratedError.isInstance(error)
	) {
		return new ProtocolError(message, { cause: error });
	}
	if (isNetworkFailure(error)) {
		return new TransientError(message, { cause: error });
	}
	return new ProtocolError(message, { cause: error });
}
