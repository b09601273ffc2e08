import type { GameResult, ResultStore } from "@connect-arena/db";
import {
	type BoardState,
	type Color,
	createBoard,
	isActive,
	statusMessage,
} from "@connect-arena/engine";
import { GameOverError } from "./errors";
import { errorFields, log } from "./obs/log";
import {
	type AgentFactory,
	Player,
	type PlayerOptions,
	type PlayerTurn,
} from "./player";
import type { Rationale } from "./replyParser";

export type GameSnapshot = {
	state: BoardState;
	status: string;
	// Half-moves played so far.
	turn: number;
	final: boolean;
	lastTurn?: PlayerTurn;
};

export type GameOptions = PlayerOptions & {
	store?: ResultStore;
	now?: () => Date;
};

export class Game {
	private state: BoardState = createBoard();
	private turns = 0;
	private recording: Promise<boolean> = Promise.resolve(false);
	private readonly players: Record<Color, Player>;
	private readonly store?: ResultStore;
	private readonly now: () => Date;

	constructor(
		redAgent: string,
		yellowAgent: string,
		createAgent: AgentFactory,
		options: GameOptions = {},
	) {
		const playerOptions: PlayerOptions = {
			rng: options.rng,
			maxOutputTokens: options.maxOutputTokens,
		};
		this.players = {
			red: new Player("red", redAgent, createAgent, playerOptions),
			yellow: new Player("yellow", yellowAgent, createAgent, playerOptions),
		};
		this.store = options.store;
		this.now = options.now ?? (() => new Date());
	}

	get board(): BoardState {
		return this.state;
	}

	get turn(): number {
		return this.turns;
	}

	/** Settles once the last recording attempt has finished; never rejects. */
	get lastRecording(): Promise<boolean> {
		return this.recording;
	}

	player(color: Color): Player {
		return this.players[color];
	}

	thoughts(color: Color): Rationale {
		return this.players[color].lastRationale;
	}

	isActive(): boolean {
		return isActive(this.state);
	}

	reset() {
		this.state = createBoard();
		this.turns = 0;
	}

	async move(): Promise<PlayerTurn> {
		if (!this.isActive()) throw new GameOverError();
		const turn = await this.players[this.state.currentPlayer].move(this.state);
		this.state = turn.state;
		this.turns++;
		return turn;
	}

	/**
	 * Play a fresh game, yielding after every half-move. Once the board is
	 * terminal the result is handed to the store and a final snapshot follows.
	 */
	async *play(): AsyncGenerator<GameSnapshot, void, undefined> {
		this.reset();
		while (this.isActive()) {
			const lastTurn = await this.move();
			yield this.snapshot(false, lastTurn);
		}
		void this.record();
		yield this.snapshot(true);
	}

	/**
	 * Move until the game is over, continuing from the current board, then
	 * record the result. A board that is already finished is returned as is.
	 */
	async run(): Promise<BoardState> {
		if (!this.isActive()) return this.state;
		while (this.isActive()) {
			await this.move();
		}
		void this.record();
		return this.state;
	}

	toResult(when: Date = this.now()): GameResult {
		return {
			redAgent: this.players.red.agentIdentifier,
			yellowAgent: this.players.yellow.agentIdentifier,
			redWon: this.state.winner === "red",
			yellowWon: this.state.winner === "yellow",
			when,
		};
	}

	/**
	 * Hand the current outcome to the store without waiting for it. Failures
	 * are logged; the game never sees them.
	 */
	record(): Promise<boolean> {
		const store = this.store;
		if (!store) {
			this.recording = Promise.resolve(false);
			return this.recording;
		}
		const result = this.toResult();
		// a store that throws instead of rejecting lands in the same catch
		this.recording = Promise.resolve()
			.then(() => store.recordGame(result))
			.then((recorded) => {
				if (!recorded) {
					log("warn", "game result not recorded", {
						red: result.redAgent,
						yellow: result.yellowAgent,
					});
				}
				return recorded;
			})
			.catch((error: unknown) => {
				log("error", "recording game result failed", {
					red: result.redAgent,
					yellow: result.yellowAgent,
					...errorFields(error),
				});
				return false;
			});
		return this.recording;
	}

	private snapshot(final: boolean, lastTurn?: PlayerTurn): GameSnapshot {
		return {
			state: this.state,
			status: statusMessage(this.state),
			turn: this.turns,
			final,
			lastTurn,
		};
	}
}
