import type { Color } from "@connect-arena/engine";

export class GameOverError extends Error {
	readonly code = "game_over";

	constructor(message = "The game is already over.") {
		super(message);
		this.name = "GameOverError";
	}
}

export class TurnOrderError extends Error {
	readonly code = "not_your_turn";

	constructor(color: Color) {
		super(`It is not ${color}'s turn.`);
		this.name = "TurnOrderError";
	}
}
