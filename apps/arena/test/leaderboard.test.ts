import { createMemoryResultStore, type GameResult } from "@connect-arena/db";
import { describe, expect, test } from "vitest";
import {
	loadLeaderboard,
	rankRatings,
	summarizeResults,
	winnerOf,
} from "../src/leaderboard";

const result = (
	redAgent: string,
	yellowAgent: string,
	outcome: "red" | "yellow" | "draw",
	iso: string,
): GameResult => ({
	redAgent,
	yellowAgent,
	redWon: outcome === "red",
	yellowWon: outcome === "yellow",
	when: new Date(iso),
});

describe("rankRatings", () => {
	test("sorts highest first and rounds", () => {
		expect(
			rankRatings({ alpha: 998.53, beta: 1001.47, gamma: 1000.5 }),
		).toEqual([
			{ agent: "beta", rating: 1001 },
			{ agent: "gamma", rating: 1001 },
			{ agent: "alpha", rating: 999 },
		]);
	});

	test("equal ratings keep their original order", () => {
		expect(rankRatings({ zeta: 1000, alpha: 1000 })).toEqual([
			{ agent: "zeta", rating: 1000 },
			{ agent: "alpha", rating: 1000 },
		]);
	});

	test("restricts to the given identifiers", () => {
		expect(
			rankRatings({ alpha: 1010, beta: 990, retired: 1200 }, ["alpha", "beta"]),
		).toEqual([
			{ agent: "alpha", rating: 1010 },
			{ agent: "beta", rating: 990 },
		]);
		expect(rankRatings({ alpha: 1010 }, [])).toEqual([]);
	});
});

describe("summarizeResults", () => {
	test("lists games newest first with a winner column", () => {
		const rows = summarizeResults([
			result("alpha", "beta", "red", "2025-02-01T08:00:00.250Z"),
			result("beta", "alpha", "yellow", "2025-02-01T09:00:00.000Z"),
			result("alpha", "gamma", "draw", "2025-02-01T10:00:00.000Z"),
		]);
		expect(rows).toEqual([
			{ when: "2025-02-01T10:00:00Z", red: "alpha", yellow: "gamma", winner: "Draw" },
			{ when: "2025-02-01T09:00:00Z", red: "beta", yellow: "alpha", winner: "Yellow" },
			{ when: "2025-02-01T08:00:00Z", red: "alpha", yellow: "beta", winner: "Red" },
		]);
	});

	test("an unreadable date becomes an empty cell", () => {
		const [row] = summarizeResults([
			{ ...result("alpha", "beta", "red", "2025-02-01T08:00:00Z"), when: new Date("not a date") },
		]);
		expect(row?.when).toBe("");
	});

	test("red is named winner when both flags are set", () => {
		expect(winnerOf({ redWon: true, yellowWon: true })).toBe("Red");
	});
});

describe("loadLeaderboard", () => {
	test("rates everything in the store", async () => {
		const store = createMemoryResultStore([
			result("alpha", "beta", "red", "2025-02-01T08:00:00Z"),
			result("gamma", "gamma", "red", "2025-02-01T09:00:00Z"),
		]);

		await expect(loadLeaderboard(store)).resolves.toEqual([
			{ agent: "alpha", rating: 1016 },
			{ agent: "beta", rating: 984 },
		]);
		await expect(loadLeaderboard(store, ["beta"])).resolves.toEqual([
			{ agent: "beta", rating: 984 },
		]);
	});
});
