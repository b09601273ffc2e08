import { describe, expect, test } from "vitest";
import { ConfigError, parseArenaConfig, parseModelList } from "../src/config";

describe("parseArenaConfig", () => {
	test("fills in defaults for an empty environment", () => {
		expect(parseArenaConfig({})).toEqual({
			models: [],
			credentials: {
				openai: undefined,
				anthropic: undefined,
				gemini: undefined,
				deepseek: undefined,
				groq: undefined,
			},
			baseUrls: {},
			dbPath: "data/arena.db",
			logLevel: "info",
			retryDelayMs: 2000,
			port: 8787,
		});
	});

	test("maps provider keys and overrides", () => {
		const config = parseArenaConfig({
			ARENA_MODELS: "gpt-5-mini, llama3.2 local",
			OPENAI_API_KEY: "test-secret",
			GOOGLE_API_KEY: "test-google",
			OLLAMA_BASE_URL: "http://gpu-box:11434/v1",
			ARENA_DB_PATH: "/tmp/results.db",
			ARENA_LOG_LEVEL: "debug",
			ARENA_RETRY_DELAY_MS: "250",
			PORT: "3000",
		});
		expect(config.models).toEqual(["gpt-5-mini", "llama3.2 local"]);
		expect(config.credentials.openai).toBe("test-secret");
		expect(config.credentials.gemini).toBe("test-google");
		expect(config.baseUrls).toEqual({ ollama: "http://gpu-box:11434/v1" });
		expect(config.dbPath).toBe("/tmp/results.db");
		expect(config.logLevel).toBe("debug");
		expect(config.retryDelayMs).toBe(250);
		expect(config.port).toBe(3000);
	});

	test("blank variables count as unset", () => {
		const config = parseArenaConfig({
			ANTHROPIC_API_KEY: "",
			ARENA_LOG_LEVEL: "  ",
			PORT: "",
		});
		expect(config.credentials.anthropic).toBeUndefined();
		expect(config.logLevel).toBe("info");
		expect(config.port).toBe(8787);
	});

	test("rejects invalid values with every problem listed", () => {
		let caught: unknown;
		try {
			parseArenaConfig({ ARENA_LOG_LEVEL: "loud", ARENA_RETRY_DELAY_MS: "-5" });
		} catch (error) {
			caught = error;
		}
		expect(caught).toBeInstanceOf(ConfigError);
		if (!(caught instanceof ConfigError)) return;
		expect(caught.message).toContain("ARENA_LOG_LEVEL");
		expect(caught.message).toContain("ARENA_RETRY_DELAY_MS");
	});

	test("rejects a malformed Ollama URL", () => {
		expect(() => parseArenaConfig({ OLLAMA_BASE_URL: "not a url" })).toThrow(
			ConfigError,
		);
	});
});

describe("parseModelList", () => {
	test("splits on commas and drops blanks and repeats", () => {
		expect(parseModelList(" gpt-5 ,, phi4 local,gpt-5 ")).toEqual([
			"gpt-5",
			"phi4 local",
		]);
		expect(parseModelList(undefined)).toEqual([]);
	});
});
