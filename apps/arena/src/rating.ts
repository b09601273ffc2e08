import type { GameResult } from "@connect-arena/db";

export const DEFAULT_RATING = 1000;
export const ELO_K = 32;

export type Ratings = Record<string, number>;

export type RatingOptions = {
	// Games where an agent played itself are ignored by default.
	skipSelfPlay?: boolean;
	kFactor?: number;
	defaultRating?: number;
};

/** Probability that a player rated `rating` scores against `opponent`. */
export const expectedScore = (rating: number, opponent: number) =>
	1 / (1 + 10 ** ((opponent - rating) / 400));

/** Red and yellow scores for one result: a win is 1, anything else splits. */
export function outcomeScores(
	result: Pick<GameResult, "redWon" | "yellowWon">,
): [red: number, yellow: number] {
	if (result.redWon && !result.yellowWon) return [1, 0];
	if (result.yellowWon && !result.redWon) return [0, 1];
	return [0.5, 0.5];
}

/**
 * Replay every result in chronological order (ties keep their input order)
 * and return the final ELO ratings. Unrated agents start at the default.
 */
export function computeRatings(
	results: readonly GameResult[],
	options: RatingOptions = {},
): Ratings {
	const skipSelfPlay = options.skipSelfPlay ?? true;
	const k = options.kFactor ?? ELO_K;
	const initial = options.defaultRating ?? DEFAULT_RATING;

	const ordered = results
		.map((result, index) => ({ result, index }))
		.sort(
			(a, b) =>
				a.result.when.getTime() - b.result.when.getTime() || a.index - b.index,
		);

	const ratings = new Map<string, number>();
	for (const { result } of ordered) {
		const red = result.redAgent;
		const yellow = result.yellowAgent;
		if (skipSelfPlay && red === yellow) continue;

		const redRating = ratings.get(red) ?? initial;
		const yellowRating = ratings.get(yellow) ?? initial;
		const [redScore, yellowScore] = outcomeScores(result);

		ratings.set(
			red,
			redRating + k * (redScore - expectedScore(redRating, yellowRating)),
		);
		ratings.set(
			yellow,
			yellowRating + k * (yellowScore - expectedScore(yellowRating, redRating)),
		);
	}

	return Object.fromEntries(ratings);
}
