import {
	type ClientLogEvent,
	createAgentClient,
	listAgentIdentifiers,
} from "@connect-arena/agent-client";
import type { ArenaConfig } from "./config";
import { type LogLevel, log } from "./obs/log";
import type { AgentFactory } from "./player";

const CLIENT_LOG_LEVEL: Record<ClientLogEvent["type"], LogLevel> = {
	request: "debug",
	response: "debug",
	retry: "warn",
	exhausted: "error",
};

export const logClientEvent = (event: ClientLogEvent) => {
	log(CLIENT_LOG_LEVEL[event.type], event.message, event.details);
};

/** Agent clients bound to the configured credentials and allow-list. */
export function createAgentFactory(config: ArenaConfig): AgentFactory {
	return (identifier) =>
		createAgentClient(identifier, {
			credentials: config.credentials,
			baseUrls: config.baseUrls,
			allowList: config.models,
			retryDelayMs: config.retryDelayMs,
			onLog: logClientEvent,
		});
}

export function offeredModels(config: ArenaConfig): string[] {
	return listAgentIdentifiers(config.models);
}
