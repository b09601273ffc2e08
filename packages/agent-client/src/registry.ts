import type { ModelBinding, ProviderEndpoint, ProviderId } from "./types";

export const PROVIDER_ENDPOINTS: Record<ProviderId, ProviderEndpoint> = {
	openai: {},
	anthropic: { baseUrl: "https://api.anthropic.com/v1/" },
	gemini: {
		baseUrl: "https://generativelanguage.googleapis.com/v1beta/openai/",
	},
	deepseek: { baseUrl: "https://api.deepseek.com" },
	groq: { baseUrl: "https://api.groq.com/openai/v1" },
	ollama: { baseUrl: "http://localhost:11434/v1", defaultApiKey: "ollama" },
};

const chat = (
	provider: ProviderId,
	overrides: Partial<Omit<ModelBinding, "provider">> = {},
): ModelBinding => ({
	provider,
	jsonMode: true,
	sendsMaxTokens: false,
	sendsTemperature: false,
	stripThinking: false,
	...overrides,
});

const claude = chat("anthropic", {
	jsonMode: false,
	sendsMaxTokens: true,
	sendsTemperature: true,
});
const gpt5 = chat("openai", { reasoningEffort: "low" });
const local = chat("ollama", { stripThinking: true });

/**
 * Identifier -> provider binding. Text after the first space in an
 * identifier is a display suffix and never reaches the provider.
 */
export const MODEL_REGISTRY: Record<string, ModelBinding> = {
	"gpt-5": gpt5,
	"gpt-5-mini": gpt5,
	"gpt-5-nano": gpt5,
	"claude-opus-4-1-20250805": claude,
	"claude-sonnet-4-5": claude,
	"claude-haiku-4-5": claude,
	"gemini-2.5-pro": chat("gemini"),
	"gemini-2.5-flash": chat("gemini"),
	"gemini-2.5-flash-lite": chat("gemini"),
	"deepseek-chat V3": chat("deepseek"),
	"deepseek-reasoner R1": chat("deepseek"),
	"openai/gpt-oss-120b via Groq": chat("groq"),
	"llama3.2 local": local,
	"gemma2 local": local,
	"qwen2.5 local": local,
	"phi4 local": local,
};

export function resolveModelId(identifier: string): string {
	const separator = identifier.indexOf(" ");
	return separator === -1 ? identifier : identifier.slice(0, separator);
}

export function isSupportedAgent(identifier: string): boolean {
	return Object.hasOwn(MODEL_REGISTRY, identifier);
}

export function getModelBinding(identifier: string): ModelBinding | undefined {
	return isSupportedAgent(identifier) ? MODEL_REGISTRY[identifier] : undefined;
}

/**
 * Identifiers on offer: the whole registry, or the allow-listed ones that
 * the registry knows, in allow-list order.
 */
export function listAgentIdentifiers(allowList?: readonly string[]): string[] {
	if (!allowList || allowList.length === 0) {
		return Object.keys(MODEL_REGISTRY);
	}
	return allowList.filter((identifier) => isSupportedAgent(identifier));
}
