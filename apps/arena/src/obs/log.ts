import { redactRecord } from "./redact";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

let minimumLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
	minimumLevel = level;
};

export const log = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => {
	if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) return;

	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...(fields ? redactRecord(fields) : {}),
	};

	// eslint-disable-next-line no-console
	const fn = console[level] ?? console.log;
	fn(JSON.stringify(payload));
};

export const errorFields = (error: unknown): Record<string, unknown> => {
	if (error instanceof Error) {
		return { error: error.message, errorName: error.name };
	}
	return { error: String(error) };
};
