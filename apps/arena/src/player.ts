import type { AgentClient } from "@connect-arena/agent-client";
import {
	applyMove,
	type BoardState,
	type Color,
	forfeitTurn,
	illegalColumns,
	isActive,
	legalColumns,
} from "@connect-arena/engine";
import { GameOverError, TurnOrderError } from "./errors";
import { errorFields, log } from "./obs/log";
import { buildMovePrompts } from "./prompts";
import {
	type MoveRejectionReason,
	parseAgentReply,
	type Rationale,
	resolveColumn,
} from "./replyParser";
import type { Rng } from "./rng";

export const DEFAULT_MAX_OUTPUT_TOKENS = 3_000;

export type AgentFactory = (identifier: string) => AgentClient;

export type MoveRejection = {
	reason: MoveRejectionReason;
	error: string;
};

export type PlayerTurn = {
	state: BoardState;
	accepted: boolean;
	// Index of the column played, on an accepted move.
	column?: number;
	rejection?: MoveRejection;
	rawReply: string;
};

export type PlayerOptions = {
	rng?: Rng;
	maxOutputTokens?: number;
};

const EMPTY_RATIONALE: Rationale = {
	evaluation: "",
	threats: "",
	opportunities: "",
	strategy: "",
};

/**
 * One side of a game. Asks its agent for a column each turn; anything but a
 * playable column forfeits the game.
 */
export class Player {
	readonly color: Color;
	private agent: AgentClient;
	private rationale: Rationale = EMPTY_RATIONALE;
	private readonly createAgent: AgentFactory;
	private readonly rng: Rng;
	private readonly maxOutputTokens: number;

	constructor(
		color: Color,
		agentIdentifier: string,
		createAgent: AgentFactory,
		options: PlayerOptions = {},
	) {
		this.color = color;
		this.createAgent = createAgent;
		this.agent = createAgent(agentIdentifier);
		this.rng = options.rng ?? Math.random;
		this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
	}

	get agentIdentifier(): string {
		return this.agent.identifier;
	}

	get lastRationale(): Rationale {
		return { ...this.rationale };
	}

	switchAgent(identifier: string) {
		this.agent = this.createAgent(identifier);
	}

	async move(state: BoardState): Promise<PlayerTurn> {
		if (!isActive(state)) throw new GameOverError();
		if (state.currentPlayer !== this.color) {
			throw new TurnOrderError(this.color);
		}

		const prompts = buildMovePrompts({
			state,
			color: this.color,
			legal: legalColumns(state),
			illegal: illegalColumns(state),
			rng: this.rng,
		});

		let rawReply: string;
		try {
			rawReply = await this.agent.send(
				prompts.system,
				prompts.user,
				this.maxOutputTokens,
			);
		} catch (error) {
			log("error", "agent call failed", {
				agent: this.agent.identifier,
				color: this.color,
				...errorFields(error),
			});
			return this.forfeit(state, "", {
				reason: "agent_error",
				error: error instanceof Error ? error.message : String(error),
			});
		}

		const parsed = parseAgentReply(rawReply);
		if (!parsed.ok) {
			return this.forfeit(state, rawReply, parsed);
		}
		const resolved = resolveColumn(state, parsed.moveColumn);
		if (!resolved.ok) {
			return this.forfeit(state, rawReply, resolved);
		}

		const applied = applyMove(state, resolved.column);
		if (!applied.ok) {
			// resolveColumn already checked the column; only a caller error lands here
			throw new Error(applied.error);
		}

		this.rationale = parsed.rationale;
		log("debug", "agent move accepted", {
			agent: this.agent.identifier,
			color: this.color,
			column: parsed.moveColumn,
		});
		return {
			state: applied.state,
			accepted: true,
			column: resolved.column,
			rawReply,
		};
	}

	private forfeit(
		state: BoardState,
		rawReply: string,
		rejection: MoveRejection,
	): PlayerTurn {
		log("warn", "agent move rejected, forfeiting", {
			agent: this.agent.identifier,
			color: this.color,
			reason: rejection.reason,
			error: rejection.error,
		});
		return {
			state: forfeitTurn(state),
			accepted: false,
			rejection: { reason: rejection.reason, error: rejection.error },
			rawReply,
		};
	}
}
