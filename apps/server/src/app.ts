import { errorFields, log } from "@connect-arena/arena";
import { Hono } from "hono";
import type { AppDeps, AppEnv } from "./appTypes";
import { requestContext } from "./middleware/requestContext";
import { requestLogger } from "./obs/requestLogger";
import { gamesRoutes } from "./routes/games";
import { systemRoutes } from "./routes/system";
import { internalServerError, notFound } from "./utils/httpErrors";

export function createApp(deps: AppDeps) {
	const app = new Hono<AppEnv>();

	app.use("/*", requestContext);
	app.use("/*", async (c, next) => {
		c.set("deps", deps);
		await next();
	});
	app.use("/*", requestLogger);

	app.onError((err, c) => {
		log("error", "unhandled_error", {
			requestId: c.get("requestId"),
			...errorFields(err),
		});
		return internalServerError(c, "Internal error.");
	});

	app.notFound((c) => notFound(c, "Not found."));

	app.route("/", systemRoutes);
	app.route("/", gamesRoutes);

	return app;
}
