export {
	buildCompletionParams,
	createAgentClient,
	createOpenAiTransport,
	DEFAULT_MAX_ATTEMPTS,
	DEFAULT_MAX_OUTPUT_TOKENS,
	DEFAULT_RETRY_DELAY_MS,
	DEFAULT_TEMPERATURE,
	DEFAULT_TIMEOUT_MS,
	EMPTY_REPLY,
	LlmAgentClient,
	stripThinking,
} from "./client";
export {
	AgentClientError,
	formatRequestError,
	isUnsupportedAgentError,
	UnsupportedAgentError,
} from "./errors";
export {
	getModelBinding,
	isSupportedAgent,
	listAgentIdentifiers,
	MODEL_REGISTRY,
	PROVIDER_ENDPOINTS,
	resolveModelId,
} from "./registry";
export type {
	AgentClient,
	AgentClientOptions,
	ClientLogEvent,
	CompletionRequest,
	CompletionTransport,
	ModelBinding,
	ProviderCredentials,
	ProviderEndpoint,
	ProviderId,
} from "./types";
