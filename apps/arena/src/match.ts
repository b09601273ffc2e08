import type { ResultStore } from "@connect-arena/db";
import {
	type BoardGrid,
	type Color,
	statusMessage,
	toGrid,
} from "@connect-arena/engine";
import { Game, type GameSnapshot } from "./game";
import type { AgentFactory } from "./player";
import { mulberry32 } from "./rng";

export type MatchSummary = {
	red: string;
	yellow: string;
	status: string;
	grid: BoardGrid;
	winner: Color | null;
	forfeit: boolean;
	draw: boolean;
	turns: number;
	recorded: boolean;
};

/**
 * Play one game to the end. With a store the result is recorded and the
 * summary reports whether that worked.
 */
export async function playMatch(opts: {
	red: string;
	yellow: string;
	createAgent: AgentFactory;
	store?: ResultStore;
	seed?: number;
	onSnapshot?: (snapshot: GameSnapshot) => void;
}): Promise<MatchSummary> {
	const game = new Game(opts.red, opts.yellow, opts.createAgent, {
		store: opts.store,
		rng: opts.seed === undefined ? undefined : mulberry32(opts.seed),
	});

	for await (const snapshot of game.play()) {
		opts.onSnapshot?.(snapshot);
	}
	const recorded = await game.lastRecording;
	const state = game.board;

	return {
		red: opts.red,
		yellow: opts.yellow,
		status: statusMessage(state),
		grid: toGrid(state),
		winner: state.winner,
		forfeit: state.forfeit,
		draw: state.draw,
		turns: game.turn,
		recorded,
	};
}
