export type ProviderId =
	| "openai"
	| "anthropic"
	| "gemini"
	| "deepseek"
	| "groq"
	| "ollama";

export type ClientLogEvent = {
	type: "request" | "response" | "retry" | "exhausted";
	message: string;
	details?: Record<string, unknown>;
};

/**
 * How one model identifier is reached. Every provider is spoken to through
 * its OpenAI-compatible chat completions endpoint.
 */
export type ModelBinding = {
	provider: ProviderId;
	// Ask for response_format json_object.
	jsonMode: boolean;
	reasoningEffort?: "low" | "medium" | "high";
	sendsMaxTokens: boolean;
	sendsTemperature: boolean;
	// Drop a leading <think>...</think> block from the reply.
	stripThinking: boolean;
};

export type ProviderEndpoint = {
	baseUrl?: string;
	// Used when no credential is configured (local servers).
	defaultApiKey?: string;
};

export type ProviderCredentials = Partial<Record<ProviderId, string>>;

export type CompletionRequest = {
	model: string;
	system: string;
	user: string;
	maxOutputTokens: number;
	temperature: number;
};

export type CompletionTransport = (request: CompletionRequest) => Promise<string>;

export type AgentClientOptions = {
	credentials?: ProviderCredentials;
	// Overrides the provider's base URL, e.g. a remote Ollama host.
	baseUrls?: Partial<Record<ProviderId, string>>;
	// When non-empty, only these identifiers may be instantiated.
	allowList?: readonly string[];
	temperature?: number;
	maxAttempts?: number;
	retryDelayMs?: number;
	timeoutMs?: number;
	transport?: CompletionTransport;
	onLog?: (event: ClientLogEvent) => void;
};

export interface AgentClient {
	readonly identifier: string;
	// Provider-facing model id (identifier up to the first space).
	readonly modelId: string;
	send(system: string, user: string, maxOutputTokens?: number): Promise<string>;
}
