export class AgentClientError extends Error {
	readonly code: string;

	constructor(message: string, code: string) {
		super(message);
		this.name = "AgentClientError";
		this.code = code;
	}
}

export class UnsupportedAgentError extends AgentClientError {
	readonly identifier: string;

	constructor(identifier: string) {
		super(`Unrecognized agent model: ${identifier}`, "unsupported_agent");
		this.name = "UnsupportedAgentError";
		this.identifier = identifier;
	}
}

export const isUnsupportedAgentError = (
	error: unknown,
): error is UnsupportedAgentError => error instanceof UnsupportedAgentError;

export function formatRequestError(error: unknown): string {
	if (error instanceof AggregateError) {
		const details = error.errors
			.map((entry) => formatRequestErrorEntry(entry))
			.filter((entry) => entry.length > 0);
		if (details.length === 0) return error.message;
		return `${error.message}: ${details.join(" | ")}`;
	}
	return formatRequestErrorEntry(error);
}

function formatRequestErrorEntry(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
