import { z } from "zod";

// Connect Four: 7 columns x 6 rows, four in a row wins, red moves first

export const ROWS = 6;
export const COLUMNS = 7;
export const CONNECT = 4;
export const COLUMN_LETTERS = ["A", "B", "C", "D", "E", "F", "G"] as const;

export type Color = "red" | "yellow";
export type Cell = Color | null;
export type ColumnLetter = (typeof COLUMN_LETTERS)[number];
export type CellName = "" | Color;

export type BoardState = {
	// cells[0] is the bottom row
	cells: Cell[][];
	currentPlayer: Color;
	winner: Color | null;
	draw: boolean;
	forfeit: boolean;
	lastMove: { column: number; row: number } | null;
};

export type BoardPhase = "active" | "won" | "draw";

export type MoveRejectionReason = "terminal" | "unknown_column" | "column_full";

export type ApplyMoveResult =
	| { ok: true; state: BoardState; column: number; row: number }
	| {
			ok: false;
			state: BoardState;
			reason: MoveRejectionReason;
			error: string;
	  };

export type BoardGrid = {
	columns: ColumnLetter[];
	// highest row first
	rows: CellName[][];
};

export const ColumnLetterSchema = z.enum(COLUMN_LETTERS);

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

// Only half of the eight directions: every line is found from its first cell.
const DIRECTIONS: ReadonlyArray<readonly [dx: number, dy: number]> = [
	[0, 1],
	[1, 1],
	[1, 0],
	[1, -1],
];

const DISPLAY_NAME: Record<Color, string> = {
	red: "Red",
	yellow: "Yellow",
};

const COMPACT_CHAR: Record<Color, string> = {
	red: "R",
	yellow: "Y",
};

const EMOJI: Record<Color, string> = {
	red: "🔴",
	yellow: "🟡",
};
const EMPTY_EMOJI = "⚪️";

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function createBoard(): BoardState {
	return {
		cells: Array.from({ length: ROWS }, () =>
			Array.from({ length: COLUMNS }, (): Cell => null),
		),
		currentPlayer: "red",
		winner: null,
		draw: false,
		forfeit: false,
		lastMove: null,
	};
}

export function opponent(color: Color): Color {
	return color === "red" ? "yellow" : "red";
}

export function cellAt(state: BoardState, row: number, column: number): Cell {
	return state.cells[row]?.[column] ?? null;
}

export function height(state: BoardState, column: number): number {
	let filled = 0;
	while (filled < ROWS && cellAt(state, filled, column) !== null) {
		filled++;
	}
	return filled;
}

export function legalColumns(state: BoardState): ColumnLetter[] {
	return COLUMN_LETTERS.filter((_, column) => height(state, column) < ROWS);
}

export function illegalColumns(state: BoardState): ColumnLetter[] {
	return COLUMN_LETTERS.filter((_, column) => height(state, column) >= ROWS);
}

/**
 * Map a column letter to its index. Lower-case letters are accepted; anything
 * that is not exactly one of A-G yields null.
 */
export function columnIndex(letter: string): number | null {
	const parsed = ColumnLetterSchema.safeParse(letter.toUpperCase());
	if (!parsed.success) return null;
	return COLUMN_LETTERS.indexOf(parsed.data);
}

export function isActive(state: BoardState): boolean {
	return state.winner === null && !state.draw;
}

export function phase(state: BoardState): BoardPhase {
	if (state.winner !== null) return "won";
	if (state.draw) return "draw";
	return "active";
}

export function isFull(state: BoardState): boolean {
	return legalColumns(state).length === 0;
}

/**
 * Scan the whole grid for four in a row. The result depends only on the cell
 * contents, never on the order the pieces were played.
 */
export function findWinner(state: BoardState): Color | null {
	for (let row = 0; row < ROWS; row++) {
		for (let column = 0; column < COLUMNS; column++) {
			const color = cellAt(state, row, column);
			if (color === null) continue;
			for (const [dx, dy] of DIRECTIONS) {
				if (isLineFrom(state, row, column, dx, dy, color)) {
					return color;
				}
			}
		}
	}
	return null;
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export function applyMove(state: BoardState, column: number): ApplyMoveResult {
	if (!isActive(state)) {
		return failMove(state, "terminal", "The game is already over.");
	}
	if (!Number.isInteger(column) || column < 0 || column >= COLUMNS) {
		return failMove(state, "unknown_column", `Unknown column ${column}.`);
	}
	const row = height(state, column);
	if (row >= ROWS) {
		return failMove(
			state,
			"column_full",
			`Column ${COLUMN_LETTERS[column]} is full.`,
		);
	}

	const mover = state.currentPlayer;
	const placed: BoardState = {
		...state,
		cells: state.cells.map((cells, y) =>
			y === row ? cells.map((cell, x) => (x === column ? mover : cell)) : [...cells],
		),
		lastMove: { column, row },
	};

	const winner = findWinner(placed);
	if (winner !== null) {
		return { ok: true, state: { ...placed, winner }, column, row };
	}
	if (isFull(placed)) {
		return { ok: true, state: { ...placed, draw: true }, column, row };
	}
	return {
		ok: true,
		state: { ...placed, currentPlayer: opponent(mover) },
		column,
		row,
	};
}

/**
 * End the game against the side to move. A terminal board is returned as is.
 */
export function forfeitTurn(state: BoardState): BoardState {
	if (!isActive(state)) return state;
	return {
		...state,
		forfeit: true,
		winner: opponent(state.currentPlayer),
	};
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function toGrid(state: BoardState): BoardGrid {
	return {
		columns: [...COLUMN_LETTERS],
		rows: rowsTopDown(state).map((cells) => cells.map((cell) => cell ?? "")),
	};
}

/** The grid as the JSON text agents are shown, highest row first. */
export function renderGridJson(state: BoardState): string {
	const rows = rowsTopDown(state);
	const lines = [
		"{",
		`    "Column names": [${COLUMN_LETTERS.map((name) => `"${name}"`).join(", ")}],`,
	];
	rows.forEach((cells, idx) => {
		const label = ROWS - idx;
		const separator = idx < rows.length - 1 ? "," : "";
		const values = cells.map((cell) => `"${cell ?? ""}"`).join(", ");
		lines.push(`    "Row ${label}": [${values}]${separator}`);
	});
	lines.push("}");
	return lines.join("\n");
}

export function renderCompact(state: BoardState): string {
	let result = ` ${COLUMN_LETTERS.join(" ")}\n`;
	for (const cells of rowsTopDown(state)) {
		result += cells.map((cell) => ` ${cell ? COMPACT_CHAR[cell] : "_"}`).join("");
		result += "\n";
	}
	return result;
}

export function statusMessage(state: BoardState): string {
	if (state.winner !== null && state.forfeit) {
		return `${DISPLAY_NAME[state.winner]} wins after an illegal move by ${DISPLAY_NAME[opponent(state.winner)]}`;
	}
	if (state.winner !== null) {
		return `${DISPLAY_NAME[state.winner]} wins`;
	}
	if (state.draw) {
		return "The game is a draw";
	}
	return `${DISPLAY_NAME[state.currentPlayer]} to play`;
}

export function renderAscii(state: BoardState): string {
	const lines = rowsTopDown(state).map((cells) =>
		cells.map((cell) => (cell ? EMOJI[cell] : EMPTY_EMOJI)).join(""),
	);
	lines.push("");
	lines.push(statusMessage(state));
	return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function rowsTopDown(state: BoardState): Cell[][] {
	return [...state.cells].reverse();
}

function inBounds(row: number, column: number): boolean {
	return row >= 0 && row < ROWS && column >= 0 && column < COLUMNS;
}

function isLineFrom(
	state: BoardState,
	row: number,
	column: number,
	dx: number,
	dy: number,
	color: Color,
): boolean {
	for (let step = 1; step < CONNECT; step++) {
		const y = row + dy * step;
		const x = column + dx * step;
		if (!inBounds(y, x) || cellAt(state, y, x) !== color) {
			return false;
		}
	}
	return true;
}

function failMove(
	state: BoardState,
	reason: MoveRejectionReason,
	error: string,
): ApplyMoveResult {
	return { ok: false, state, reason, error };
}
