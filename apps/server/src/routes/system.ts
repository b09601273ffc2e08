import { loadLeaderboard } from "@connect-arena/arena";
import { Hono } from "hono";
import type { AppEnv } from "../appTypes";

export const systemRoutes = new Hono<AppEnv>();

systemRoutes.get("/health", (c) => {
	return c.text("OK");
});

systemRoutes.get("/v1/models", (c) => {
	return c.json({ models: c.get("deps").listModels() });
});

systemRoutes.get("/v1/leaderboard", async (c) => {
	const deps = c.get("deps");
	const all = c.req.query("all");
	const identifiers = all === "1" || all === "true" ? undefined : deps.listModels();
	const leaderboard = await loadLeaderboard(deps.store, identifiers);
	return c.json({ leaderboard });
});
