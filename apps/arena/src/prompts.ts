import {
	type BoardState,
	type Color,
	type ColumnLetter,
	opponent,
	renderCompact,
	renderGridJson,
} from "@connect-arena/engine";
import { pickOne, type Rng } from "./rng";

export type MovePromptInput = {
	state: BoardState;
	color: Color;
	legal: readonly ColumnLetter[];
	illegal: readonly ColumnLetter[];
	rng: Rng;
};

export type MovePrompts = {
	system: string;
	user: string;
};

export function formatColumnList(columns: readonly ColumnLetter[]): string {
	return columns.join(", ");
}

export function illegalColumnsWarning(
	illegal: readonly ColumnLetter[],
): string {
	if (illegal.length === 0) return "";
	return `\nYou must NOT make any of these moves which are ILLEGAL: ${formatColumnList(illegal)}`;
}

function replyShape(moveHint: string): string[] {
	return [
		"{",
		'    "evaluation": "my assessment of the board",',
		'    "threats": "any threats from my opponent that I should block",',
		'    "opportunities": "my best chances to win",',
		'    "strategy": "my thought process",',
		`    "move_column": "${moveHint}"`,
		"}",
	];
}

function exampleReply(
	fields: {
		evaluation: string;
		threats: string;
		opportunities: string;
		strategy: string;
	},
	column: ColumnLetter,
): string[] {
	return [
		"{",
		`    "evaluation": "${fields.evaluation}",`,
		`    "threats": "${fields.threats}",`,
		`    "opportunities": "${fields.opportunities}",`,
		`    "strategy": "${fields.strategy}",`,
		`    "move_column": "${column}"`,
		"}",
	];
}

export function buildSystemPrompt(
	color: Color,
	legal: readonly ColumnLetter[],
	illegal: readonly ColumnLetter[],
): string {
	const legalList = formatColumnList(legal);
	return [
		"You are playing the board game Connect 4.",
		"Players take turns to drop counters into one of 7 columns A, B, C, D, E, F, G.",
		"The winner is the first player to get 4 counters in a row in any direction.",
		`You are ${color} and your opponent is ${opponent(color)}.`,
		`You must pick a column for your move. You must pick one of the following legal moves: ${legalList}.`,
		"You should respond in JSON according to this spec:",
		"",
		...replyShape(`one letter from this list of legal moves: ${legalList}`),
		"",
		`You must pick one of these letters for your move_column: ${legalList}${illegalColumnsWarning(illegal)}`,
	].join("\n");
}

export function buildUserPrompt(input: MovePromptInput): string {
	const legalList = formatColumnList(input.legal);
	// Example columns only ever name legal moves.
	const firstExample = pickOne(input.legal, input.rng);
	const secondExample = pickOne(input.legal, input.rng);

	return [
		`It is your turn to make a move as ${input.color}.`,
		"Here is the current board, with row 1 at the bottom of the board:",
		"",
		renderGridJson(input.state),
		"",
		"Here's another way of looking at the board visually, where R represents a red counter, Y for a yellow counter, and _ represents an empty square.",
		"",
		renderCompact(input.state),
		"Your final response should be only in JSON strictly according to this spec:",
		"",
		...replyShape(`one of ${legalList} which are the legal moves`),
		"",
		"For example, the following could be a response:",
		"",
		...exampleReply(
			{
				evaluation:
					"the board is equally balanced but I have a slight advantage",
				threats: "my opponent has a threat but I can block it",
				opportunities:
					"I've developed several promising 3 in a row opportunities",
				strategy:
					"I must first block my opponent, then I can continue to develop",
			},
			firstExample,
		),
		"",
		"And this is another example of a well formed response:",
		"",
		...exampleReply(
			{
				evaluation:
					"although my opponent has more threats, I can win immediately",
				threats: "my opponent has several threats",
				opportunities:
					"I can immediately win the game by making a diagonal 4",
				strategy: "I will take the winning move",
			},
			secondExample,
		),
		"",
		"Now make your decision.",
		`You must pick one of these letters for your move_column: ${legalList}${illegalColumnsWarning(input.illegal)}`,
		"",
	].join("\n");
}

export function buildMovePrompts(input: MovePromptInput): MovePrompts {
	return {
		system: buildSystemPrompt(input.color, input.legal, input.illegal),
		user: buildUserPrompt(input),
	};
}
