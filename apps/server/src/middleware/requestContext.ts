import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../appTypes";

type AppContext = Context<AppEnv>;

export const requestContext = async (c: AppContext, next: Next) => {
	const requestId = randomUUID();
	const startedAtMs = Date.now();
	c.set("requestId", requestId);
	c.set("requestContext", { requestId, startedAtMs });
	// Set early so it applies even when handlers throw and onError returns a response.
	c.header("x-request-id", requestId);

	try {
		await next();
	} finally {
		// Responses built outside c.json/c.text skip c.header, so stamp the final one too.
		const res = c.res;
		if (res && !res.headers.has("x-request-id")) {
			const headers = new Headers(res.headers);
			headers.set("x-request-id", requestId);
			c.res = new Response(res.body, {
				status: res.status,
				statusText: res.statusText,
				headers,
			});
		}
	}
};
