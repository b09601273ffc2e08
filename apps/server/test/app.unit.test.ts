import { type AgentClient, UnsupportedAgentError } from "@connect-arena/agent-client";
import type { AgentFactory } from "@connect-arena/arena";
import {
	createMemoryResultStore,
	type GameResult,
	type ResultStore,
} from "@connect-arena/db";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/app";

const moves = (columns: string) =>
	[...columns].map((column) => JSON.stringify({ move_column: column }));

const SCRIPTS: Record<string, string[]> = {
	"test-red": moves("AAAA"),
	"test-yellow": moves("BBB"),
};

const createAgent: AgentFactory = (identifier) => {
	const script = SCRIPTS[identifier];
	if (!script) throw new UnsupportedAgentError(identifier);
	const queue = [...script];
	const agent: AgentClient = {
		identifier,
		modelId: identifier,
		send: async () => queue.shift() ?? "{}",
	};
	return agent;
};

const result = (
	redAgent: string,
	yellowAgent: string,
	redWon: boolean,
	iso: string,
): GameResult => ({
	redAgent,
	yellowAgent,
	redWon,
	yellowWon: !redWon,
	when: new Date(iso),
});

function setup(store: ResultStore = createMemoryResultStore()) {
	const app = createApp({
		store,
		createAgent,
		listModels: () => ["test-red", "test-yellow"],
	});
	return { app, store };
}

const postGame = (app: ReturnType<typeof setup>["app"], body: unknown) =>
	app.request("/v1/games", {
		method: "POST",
		headers: { "content-type": "application/json" },
		body: JSON.stringify(body),
	});

describe("system routes", () => {
	it("answers health checks with a request id", async () => {
		const { app } = setup();
		const res = await app.request("/health");
		expect(res.status).toBe(200);
		expect(await res.text()).toBe("OK");
		expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
	});

	it("lists the offered models", async () => {
		const { app } = setup();
		const res = await app.request("/v1/models");
		expect(await res.json()).toEqual({ models: ["test-red", "test-yellow"] });
	});

	it("rates only offered models unless all are asked for", async () => {
		const { app } = setup(
			createMemoryResultStore([
				result("test-red", "retired-model", true, "2025-04-01T10:00:00Z"),
				result("test-yellow", "test-red", true, "2025-04-01T11:00:00Z"),
			]),
		);

		const offered = await app.request("/v1/leaderboard");
		const offeredBody: unknown = await offered.json();
		expect(offeredBody).toEqual({
			leaderboard: [
				{ agent: "test-yellow", rating: 1017 },
				{ agent: "test-red", rating: 999 },
			],
		});

		const all = await app.request("/v1/leaderboard?all=1");
		const allBody: unknown = await all.json();
		expect(allBody).toEqual({
			leaderboard: [
				{ agent: "test-yellow", rating: 1017 },
				{ agent: "test-red", rating: 999 },
				{ agent: "retired-model", rating: 984 },
			],
		});
	});

	it("wraps unknown routes in the error envelope", async () => {
		const { app } = setup();
		const res = await app.request("/v1/nothing-here");
		expect(res.status).toBe(404);
		const body: unknown = await res.json();
		expect(body).toMatchObject({ ok: false, error: "Not found.", code: "not_found" });
	});
});

describe("games routes", () => {
	it("plays a headless game and records it", async () => {
		const { app, store } = setup();

		const res = await postGame(app, { red: "test-red", yellow: "test-yellow" });

		expect(res.status).toBe(200);
		const body: unknown = await res.json();
		expect(body).toMatchObject({
			ok: true,
			status: "Red wins",
			winner: "red",
			forfeit: false,
			draw: false,
			turns: 7,
			recorded: true,
		});
		const games = await store.getGames();
		expect(games).toHaveLength(1);
		expect(games[0]?.redAgent).toBe("test-red");

		const list = await app.request("/v1/games");
		const listBody: unknown = await list.json();
		expect(listBody).toMatchObject({
			games: [{ red: "test-red", yellow: "test-yellow", winner: "Red" }],
		});
	});

	it("skips recording when asked", async () => {
		const { app, store } = setup();

		const res = await postGame(app, {
			red: "test-red",
			yellow: "test-yellow",
			record: false,
		});

		const body: unknown = await res.json();
		expect(body).toMatchObject({ ok: true, recorded: false });
		await expect(store.getGames()).resolves.toEqual([]);
	});

	it("refuses unsupported models", async () => {
		const { app } = setup();

		const res = await postGame(app, { red: "test-red", yellow: "not-a-model" });

		expect(res.status).toBe(400);
		const body: unknown = await res.json();
		expect(body).toEqual({
			agent: "not-a-model",
			ok: false,
			error: "Unrecognized agent model: not-a-model",
			code: "unsupported_agent",
			requestId: res.headers.get("x-request-id"),
		});
	});

	it("rejects malformed payloads", async () => {
		const { app } = setup();

		const missing = await postGame(app, { red: "test-red" });
		expect(missing.status).toBe(400);
		const missingBody: unknown = await missing.json();
		expect(missingBody).toMatchObject({ ok: false, code: "invalid_payload" });

		const notJson = await app.request("/v1/games", {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: "{",
		});
		expect(notJson.status).toBe(400);
	});

	it("turns unexpected failures into a 500 envelope", async () => {
		const broken: ResultStore = {
			recordGame: async () => false,
			getGames: async () => {
				throw new Error("store exploded");
			},
			close: () => {},
		};
		const { app } = setup(broken);

		const res = await app.request("/v1/games");

		expect(res.status).toBe(500);
		const body: unknown = await res.json();
		expect(body).toMatchObject({
			ok: false,
			error: "Internal error.",
			code: "internal_error",
		});
	});
});
