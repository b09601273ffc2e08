import {
	applyMove,
	type BoardState,
	createBoard,
	illegalColumns,
	legalColumns,
} from "@connect-arena/engine";
import { describe, expect, test } from "vitest";
import {
	buildMovePrompts,
	buildSystemPrompt,
	illegalColumnsWarning,
} from "../src/prompts";
import { mulberry32 } from "../src/rng";

function play(columns: number[]): BoardState {
	let state = createBoard();
	for (const column of columns) {
		const result = applyMove(state, column);
		if (!result.ok) throw new Error(result.error);
		state = result.state;
	}
	return state;
}

describe("buildSystemPrompt", () => {
	test("names both colours and the legal columns", () => {
		const prompt = buildSystemPrompt("yellow", ["A", "C"], []);
		const lines = prompt.split("\n");
		expect(lines[0]).toBe("You are playing the board game Connect 4.");
		expect(lines[3]).toBe("You are yellow and your opponent is red.");
		expect(lines[4]).toBe(
			"You must pick a column for your move. You must pick one of the following legal moves: A, C.",
		);
		expect(lines.at(-1)).toBe(
			"You must pick one of these letters for your move_column: A, C",
		);
	});

	test("ends with the illegal column warning when columns are full", () => {
		const prompt = buildSystemPrompt("red", ["B"], ["A", "C"]);
		expect(prompt.endsWith(
			"move_column: B\nYou must NOT make any of these moves which are ILLEGAL: A, C",
		)).toBe(true);
	});
});

describe("illegalColumnsWarning", () => {
	test("is empty when every column is open", () => {
		expect(illegalColumnsWarning([])).toBe("");
	});
});

describe("buildMovePrompts", () => {
	test("shows the board both as JSON and as the compact grid", () => {
		const state = play([3, 3]);
		const { user } = buildMovePrompts({
			state,
			color: "red",
			legal: legalColumns(state),
			illegal: illegalColumns(state),
			rng: () => 0,
		});
		expect(user.startsWith("It is your turn to make a move as red.\n")).toBe(true);
		expect(user).toContain('    "Row 1": ["", "", "", "red", "", "", ""]\n');
		expect(user).toContain('    "Row 2": ["", "", "", "yellow", "", "", ""],');
		expect(user).toContain(" A B C D E F G\n");
		expect(user).toContain(" _ _ _ R _ _ _\n");
		expect(user).toContain('    "move_column": "A"\n');
	});

	test("the same seed gives the same prompts", () => {
		const state = createBoard();
		const input = {
			state,
			color: "red" as const,
			legal: legalColumns(state),
			illegal: illegalColumns(state),
		};
		const first = buildMovePrompts({ ...input, rng: mulberry32(7) });
		const second = buildMovePrompts({ ...input, rng: mulberry32(7) });
		expect(first).toEqual(second);
	});
});
