export type GameResult = {
	redAgent: string;
	yellowAgent: string;
	redWon: boolean;
	yellowWon: boolean;
	when: Date;
};

export type StoreOperation = "recordGame" | "getGames";

export type StoreErrorHandler = (operation: StoreOperation, error: unknown) => void;

/**
 * Where finished games go. Implementations never reject: an unavailable
 * store records nothing (false) and reads as empty.
 */
export interface ResultStore {
	recordGame(result: GameResult): Promise<boolean>;
	// Insertion order.
	getGames(): Promise<GameResult[]>;
	close(): void;
}
