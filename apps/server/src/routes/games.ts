import { isUnsupportedAgentError } from "@connect-arena/agent-client";
import { log, playMatch, summarizeResults } from "@connect-arena/arena";
import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../appTypes";
import { badRequest } from "../utils/httpErrors";

export const gamesRoutes = new Hono<AppEnv>();

const playGameSchema = z.object({
	red: z.string().trim().min(1),
	yellow: z.string().trim().min(1),
	record: z.boolean().optional(),
});

gamesRoutes.get("/v1/games", async (c) => {
	const games = await c.get("deps").store.getGames();
	return c.json({ games: summarizeResults(games) });
});

gamesRoutes.post("/v1/games", async (c) => {
	const json = await c.req.json().catch(() => null);
	const parsed = playGameSchema.safeParse(json);
	if (!parsed.success) {
		return badRequest(c, "Invalid game payload.", "invalid_payload");
	}

	const deps = c.get("deps");
	const { red, yellow } = parsed.data;
	const record = parsed.data.record ?? true;

	try {
		const summary = await playMatch({
			red,
			yellow,
			createAgent: deps.createAgent,
			store: record ? deps.store : undefined,
		});
		log("info", "game_finished", {
			requestId: c.get("requestId"),
			red,
			yellow,
			status: summary.status,
			turns: summary.turns,
			recorded: summary.recorded,
		});
		return c.json({
			ok: true,
			status: summary.status,
			grid: summary.grid,
			winner: summary.winner,
			forfeit: summary.forfeit,
			draw: summary.draw,
			turns: summary.turns,
			recorded: summary.recorded,
		});
	} catch (error) {
		if (isUnsupportedAgentError(error)) {
			return badRequest(c, error.message, error.code, {
				agent: error.identifier,
			});
		}
		throw error;
	}
});
