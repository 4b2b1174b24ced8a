export type LogLevel = "info" | "error";

export type LogEvent = Record<string, unknown>;

export type Logger = {
	info: (event: LogEvent) => void;
	error: (event: LogEvent) => void;
	debug: (message: string, data?: unknown) => void;
};

type LoggerOptions = {
	debug?: boolean;
	write?: (level: LogLevel, line: string) => void;
};

function stripUndefined<T extends Record<string, unknown>>(obj: T) {
	const cleaned: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		if (value !== undefined) cleaned[key] = value;
	}
	return cleaned;
}

function writeConsole(level: LogLevel, line: string) {
	if (level === "error") {
		console.error(line);
		return;
	}
	console.log(line);
}

export function createLogger(
	base: Record<string, unknown>,
	options: LoggerOptions = {},
): Logger {
	const baseFields = stripUndefined(base);
	const write = options.write ?? writeConsole;
	const log = (level: LogLevel, event: LogEvent) => {
		const payload = {
			timestamp: new Date().toISOString(),
			level,
			...baseFields,
			...stripUndefined(event),
		};
		write(level, JSON.stringify(payload));
	};

	return {
		info: (event) => log("info", event),
		error: (event) => log("error", event),
		debug: (message, data) => {
			if (!options.debug) return;
			log("info", { event: "debug", message, data });
		},
	};
}

export function formatError(error: unknown): string {
	if (typeof error === "string") return error;
	if (error instanceof Error) return error.message;
	return String(error);
}
