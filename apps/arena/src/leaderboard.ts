import type { GameResult, ResultStore } from "@connect-arena/db";
import { computeRatings, type RatingOptions, type Ratings } from "./rating";

export type LeaderboardEntry = {
	agent: string;
	rating: number;
};

export type GameWinner = "Red" | "Yellow" | "Draw";

export type ResultSummaryRow = {
	when: string;
	red: string;
	yellow: string;
	winner: GameWinner;
};

export function winnerOf(
	result: Pick<GameResult, "redWon" | "yellowWon">,
): GameWinner {
	if (result.redWon) return "Red";
	if (result.yellowWon) return "Yellow";
	return "Draw";
}

/**
 * Highest rating first, rounded to whole points. Equal ratings keep the
 * order the agents first appeared in. With `identifiers`, only those agents
 * are listed.
 */
export function rankRatings(
	ratings: Ratings,
	identifiers?: readonly string[],
): LeaderboardEntry[] {
	const allowed = identifiers ? new Set(identifiers) : null;
	return Object.entries(ratings)
		.filter(([agent]) => allowed === null || allowed.has(agent))
		.sort((a, b) => b[1] - a[1])
		.map(([agent, rating]) => ({ agent, rating: Math.round(rating) }));
}

/**
 * Newest first; `when` is ISO-8601 truncated to whole seconds, or empty
 * for an unreadable date.
 */
export function summarizeResults(
	results: readonly GameResult[],
): ResultSummaryRow[] {
	return [...results].reverse().map((result) => ({
		when: formatWhen(result.when),
		red: result.redAgent,
		yellow: result.yellowAgent,
		winner: winnerOf(result),
	}));
}

export async function loadLeaderboard(
	store: ResultStore,
	identifiers?: readonly string[],
	options?: RatingOptions,
): Promise<LeaderboardEntry[]> {
	const games = await store.getGames();
	return rankRatings(computeRatings(games, options), identifiers);
}

function formatWhen(when: Date): string {
	if (Number.isNaN(when.getTime())) return "";
	return `${when.toISOString().slice(0, 19)}Z`;
}
