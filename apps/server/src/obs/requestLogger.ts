import { log } from "@connect-arena/arena";
import type { Context, Next } from "hono";
import type { AppEnv } from "../appTypes";

type AppContext = Context<AppEnv>;

const truncateStack = (stack: string, max = 4000) =>
	stack.length > max ? `${stack.slice(0, max)}...` : stack;

export const requestLogger = async (c: AppContext, next: Next) => {
	const { requestId, startedAtMs } = c.get("requestContext");
	const method = c.req.method;
	const route = c.req.path;

	log("debug", "request_start", { requestId, method, route });

	try {
		await next();
	} catch (error) {
		log("error", "request_error", {
			requestId,
			method,
			route,
			durationMs: Date.now() - startedAtMs,
			error:
				error instanceof Error
					? {
							name: error.name,
							message: error.message,
							stack:
								typeof error.stack === "string"
									? truncateStack(error.stack)
									: null,
						}
					: { name: "Error", message: String(error), stack: null },
		});
		throw error;
	}

	log("info", "request_end", {
		requestId,
		method,
		route,
		status: c.res.status,
		durationMs: Date.now() - startedAtMs,
	});
};
