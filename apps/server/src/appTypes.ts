import type { AgentFactory } from "@connect-arena/arena";
import type { ResultStore } from "@connect-arena/db";

export type RequestContext = {
	requestId: string;
	startedAtMs: number;
};

export type AppDeps = {
	store: ResultStore;
	createAgent: AgentFactory;
	// Offered model identifiers, in display order.
	listModels: () => string[];
};

export type AppVariables = {
	requestContext: RequestContext;
	requestId: string;
	deps: AppDeps;
};

export type AppEnv = { Variables: AppVariables };
