import type { ProviderCredentials, ProviderId } from "@connect-arena/agent-client";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./obs/log";

export const DEFAULT_DB_PATH = "data/arena.db";
export const DEFAULT_PORT = 8787;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

export type ArenaConfig = {
	// Offered model identifiers; empty means the whole registry.
	models: string[];
	credentials: ProviderCredentials;
	baseUrls: Partial<Record<ProviderId, string>>;
	dbPath: string;
	logLevel: LogLevel;
	retryDelayMs: number;
	port: number;
};

export class ConfigError extends Error {
	readonly code = "invalid_config";

	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

const optionalText = z.string().trim().min(1).optional();

const EnvSchema = z.object({
	ARENA_MODELS: optionalText,
	OPENAI_API_KEY: optionalText,
	ANTHROPIC_API_KEY: optionalText,
	GOOGLE_API_KEY: optionalText,
	DEEPSEEK_API_KEY: optionalText,
	GROQ_API_KEY: optionalText,
	OLLAMA_BASE_URL: z.string().url().optional(),
	ARENA_DB_PATH: z.string().trim().min(1).default(DEFAULT_DB_PATH),
	ARENA_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	ARENA_RETRY_DELAY_MS: z.coerce
		.number()
		.int()
		.min(0)
		.default(DEFAULT_RETRY_DELAY_MS),
	PORT: z.coerce.number().int().min(1).max(65_535).default(DEFAULT_PORT),
});

/** Comma-separated identifiers; blanks and duplicates are dropped. */
export function parseModelList(value: string | undefined): string[] {
	if (!value) return [];
	const models: string[] = [];
	for (const entry of value.split(",")) {
		const identifier = entry.trim();
		if (identifier.length > 0 && !models.includes(identifier)) {
			models.push(identifier);
		}
	}
	return models;
}

/**
 * Validate an environment into an ArenaConfig. Empty variables count as
 * unset.
 */
export function parseArenaConfig(
	env: Record<string, string | undefined>,
): ArenaConfig {
	const present: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== "") {
			present[key] = value;
		}
	}

	const result = EnvSchema.safeParse(present);
	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new ConfigError(`Invalid arena configuration: ${errors}`);
	}

	const parsed = result.data;
	const baseUrls: Partial<Record<ProviderId, string>> = {};
	if (parsed.OLLAMA_BASE_URL) {
		baseUrls.ollama = parsed.OLLAMA_BASE_URL;
	}

	return {
		models: parseModelList(parsed.ARENA_MODELS),
		credentials: {
			openai: parsed.OPENAI_API_KEY,
			anthropic: parsed.ANTHROPIC_API_KEY,
			gemini: parsed.GOOGLE_API_KEY,
			deepseek: parsed.DEEPSEEK_API_KEY,
			groq: parsed.GROQ_API_KEY,
		},
		baseUrls,
		dbPath: parsed.ARENA_DB_PATH,
		logLevel: parsed.ARENA_LOG_LEVEL,
		retryDelayMs: parsed.ARENA_RETRY_DELAY_MS,
		port: parsed.PORT,
	};
}

/** Load `.env` from the working directory, then parse `process.env`. */
export function loadArenaConfig(): ArenaConfig {
	loadDotenv();
	return parseArenaConfig(process.env);
}
