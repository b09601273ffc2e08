import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { formatRequestError, UnsupportedAgentError } from "./errors";
import {
	getModelBinding,
	PROVIDER_ENDPOINTS,
	resolveModelId,
} from "./registry";
import type {
	AgentClient,
	AgentClientOptions,
	ClientLogEvent,
	CompletionRequest,
	CompletionTransport,
	ModelBinding,
	ProviderId,
} from "./types";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 2_000;
export const DEFAULT_TEMPERATURE = 0.5;
export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_OUTPUT_TOKENS = 3_000;

// Returned once every attempt has failed; callers treat it as a reply with
// no move in it.
export const EMPTY_REPLY = "{}";

const THINKING_BLOCK = /^\s*<think>[\s\S]*?<\/think>\s*/;

export class LlmAgentClient implements AgentClient {
	readonly identifier: string;
	readonly modelId: string;
	private readonly binding: ModelBinding;
	private readonly transport: CompletionTransport;
	private readonly maxAttempts: number;
	private readonly retryDelayMs: number;
	private readonly temperature: number;
	private readonly onLog?: (event: ClientLogEvent) => void;

	constructor(
		identifier: string,
		binding: ModelBinding,
		options: AgentClientOptions = {},
	) {
		this.identifier = identifier;
		this.modelId = resolveModelId(identifier);
		this.binding = binding;
		this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
		this.retryDelayMs = Math.max(
			0,
			options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
		);
		this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
		this.onLog = options.onLog;
		this.transport =
			options.transport ??
			createOpenAiTransport(binding, {
				apiKey: options.credentials?.[binding.provider],
				baseUrl: options.baseUrls?.[binding.provider],
				timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			});
	}

	private log(event: ClientLogEvent) {
		this.onLog?.(event);
	}

	/**
	 * Send one system + user exchange. Failures are retried after a fixed
	 * delay; when every attempt fails the reply is {@link EMPTY_REPLY}.
	 */
	async send(
		system: string,
		user: string,
		maxOutputTokens = DEFAULT_MAX_OUTPUT_TOKENS,
	): Promise<string> {
		const request: CompletionRequest = {
			model: this.modelId,
			system,
			user,
			maxOutputTokens,
			temperature: this.temperature,
		};

		for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
			const startedAt = Date.now();
			this.log({
				type: "request",
				message: "completion request",
				details: { agent: this.identifier, attempt },
			});
			try {
				const reply = await this.transport(request);
				this.log({
					type: "response",
					message: "completion response",
					details: {
						agent: this.identifier,
						attempt,
						latencyMs: Date.now() - startedAt,
						chars: reply.length,
					},
				});
				return this.binding.stripThinking ? stripThinking(reply) : reply;
			} catch (error) {
				this.log({
					type: "retry",
					message: "completion attempt failed",
					details: {
						agent: this.identifier,
						attempt,
						maxAttempts: this.maxAttempts,
						error: formatRequestError(error),
					},
				});
				if (attempt < this.maxAttempts) {
					await sleep(this.retryDelayMs);
				}
			}
		}

		this.log({
			type: "exhausted",
			message: "completion attempts exhausted",
			details: { agent: this.identifier, attempts: this.maxAttempts },
		});
		return EMPTY_REPLY;
	}
}

/**
 * Build a client for a registered identifier. Identifiers outside the
 * registry, or outside a non-empty allow-list, are refused.
 */
export function createAgentClient(
	identifier: string,
	options: AgentClientOptions = {},
): AgentClient {
	const allowList = options.allowList ?? [];
	if (allowList.length > 0 && !allowList.includes(identifier)) {
		throw new UnsupportedAgentError(identifier);
	}
	const binding = getModelBinding(identifier);
	if (!binding) {
		throw new UnsupportedAgentError(identifier);
	}
	return new LlmAgentClient(identifier, binding, options);
}

export function stripThinking(reply: string): string {
	return reply.replace(THINKING_BLOCK, "");
}

export function buildCompletionParams(
	binding: ModelBinding,
	request: CompletionRequest,
): ChatCompletionCreateParamsNonStreaming {
	const params: ChatCompletionCreateParamsNonStreaming = {
		model: request.model,
		messages: [
			{ role: "system", content: request.system },
			{ role: "user", content: request.user },
		],
	};
	if (binding.jsonMode) {
		params.response_format = { type: "json_object" };
	}
	if (binding.reasoningEffort) {
		params.reasoning_effort = binding.reasoningEffort;
	}
	if (binding.sendsMaxTokens) {
		params.max_tokens = request.maxOutputTokens;
	}
	if (binding.sendsTemperature) {
		params.temperature = request.temperature;
	}
	return params;
}

type TransportConfig = {
	apiKey?: string;
	baseUrl?: string;
	timeoutMs: number;
};

/**
 * Chat completions over the provider's OpenAI-compatible endpoint. The SDK
 * client is created on first use, so a missing credential surfaces as a
 * failed attempt rather than a construction error.
 */
export function createOpenAiTransport(
	binding: ModelBinding,
	config: TransportConfig,
): CompletionTransport {
	let client: OpenAI | undefined;

	const getClient = (): OpenAI => {
		if (!client) {
			client = new OpenAI(
				resolveClientOptions(binding.provider, config),
			);
		}
		return client;
	};

	return async (request) => {
		const controller = new AbortController();
		const timeout = setTimeout(() => {
			controller.abort();
		}, config.timeoutMs);

		try {
			const completion = await getClient().chat.completions.create(
				buildCompletionParams(binding, request),
				{ signal: controller.signal },
			);
			return completion.choices[0]?.message?.content ?? "";
		} catch (error) {
			if (controller.signal.aborted) {
				throw new Error(`API timeout after ${config.timeoutMs}ms`);
			}
			throw error;
		} finally {
			clearTimeout(timeout);
		}
	};
}

function resolveClientOptions(provider: ProviderId, config: TransportConfig) {
	const endpoint = PROVIDER_ENDPOINTS[provider];
	const apiKey = config.apiKey ?? endpoint.defaultApiKey;
	if (!apiKey) {
		throw new Error(`No API key configured for provider ${provider}`);
	}
	return {
		apiKey,
		baseURL: config.baseUrl ?? endpoint.baseUrl,
		maxRetries: 0,
		timeout: config.timeoutMs,
	};
}

function sleep(ms: number): Promise<void> {
	return new Promise((r) => setTimeout(r, ms));
}
