import {
	type AgentClient,
	resolveModelId,
	UnsupportedAgentError,
} from "@connect-arena/agent-client";
import type { AgentFactory } from "../src/player";

export type SentMessage = {
	system: string;
	user: string;
	maxOutputTokens?: number;
};

export type ScriptedAgent = AgentClient & {
	sent: SentMessage[];
};

/** Replies in order; once the script runs out every reply is "{}". */
export function scriptedAgent(
	identifier: string,
	replies: readonly string[],
): ScriptedAgent {
	const queue = [...replies];
	const sent: SentMessage[] = [];
	return {
		identifier,
		modelId: resolveModelId(identifier),
		sent,
		async send(system, user, maxOutputTokens) {
			sent.push({ system, user, maxOutputTokens });
			return queue.shift() ?? "{}";
		},
	};
}

export function moveReply(column: string, strategy = "keep building"): string {
	return JSON.stringify({
		evaluation: "balanced",
		threats: "none yet",
		opportunities: "centre control",
		strategy,
		move_column: column,
	});
}

export function movesScript(columns: string): string[] {
	return [...columns].map((column) => moveReply(column));
}

/**
 * Factory over fixed scripts. Each call builds a fresh agent, and the
 * agents it built are kept for inspection.
 */
export function scriptedFactory(scripts: Record<string, readonly string[]>): {
	createAgent: AgentFactory;
	agents: ScriptedAgent[];
} {
	const agents: ScriptedAgent[] = [];
	const createAgent: AgentFactory = (identifier) => {
		const script = scripts[identifier];
		if (!script) throw new UnsupportedAgentError(identifier);
		const agent = scriptedAgent(identifier, script);
		agents.push(agent);
		return agent;
	};
	return { createAgent, agents };
}

// Fills the board with no four in a row; even indices are red's moves.
export const DRAW_SEQUENCE = "ACBDEGF".repeat(6);

export function splitTurns(sequence: string): { red: string; yellow: string } {
	let red = "";
	let yellow = "";
	[...sequence].forEach((column, idx) => {
		if (idx % 2 === 0) red += column;
		else yellow += column;
	});
	return { red, yellow };
}
