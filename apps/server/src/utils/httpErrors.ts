import type { Context } from "hono";

const reservedEnvelopeKeys = new Set(["ok", "error", "code", "requestId"]);

const readRequestId = (c: Context) => {
	const value: unknown = c.get("requestId");
	return typeof value === "string" ? value : undefined;
};

const sanitizeExtra = (extra?: Record<string, unknown>) => {
	if (!extra) return undefined;
	const entries = Object.entries(extra).filter(
		([key]) => !reservedEnvelopeKeys.has(key),
	);
	if (entries.length === 0) return undefined;
	return Object.fromEntries(entries);
};

export const errorBody = (
	c: Context,
	error: string,
	code?: string,
	extra?: Record<string, unknown>,
) => {
	const requestId = readRequestId(c);
	const safeExtra = sanitizeExtra(extra);
	return {
		...(safeExtra ?? {}),
		ok: false,
		error,
		...(code ? { code } : {}),
		...(requestId ? { requestId } : {}),
	};
};

export const badRequest = (
	c: Context,
	error: string,
	code?: string,
	extra?: Record<string, unknown>,
) => {
	return c.json(errorBody(c, error, code, extra), 400);
};

export const notFound = (c: Context, error: string) => {
	return c.json(errorBody(c, error, "not_found"), 404);
};

export const internalServerError = (c: Context, error: string) => {
	return c.json(errorBody(c, error, "internal_error"), 500);
};
