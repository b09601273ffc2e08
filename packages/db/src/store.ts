import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { asc } from "drizzle-orm";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { type ResultRow, results } from "./schema/results";
import type { GameResult, ResultStore, StoreErrorHandler } from "./types";

export const MEMORY_DB_PATH = ":memory:";

const MIGRATIONS = [new URL("./migrations/0000_results.sql", import.meta.url)];

export type SqliteResultStoreOptions = {
	path: string;
	onError?: StoreErrorHandler;
};

type Connection = {
	sqlite: Database.Database;
	db: BetterSQLite3Database;
};

/**
 * Results in a SQLite file (or `:memory:`). The file and table are created
 * on first use; any failure is reported to `onError` and degrades the call.
 */
export function createSqliteResultStore(
	options: SqliteResultStoreOptions,
): ResultStore {
	let connection: Connection | null = null;

	const open = (): Connection => {
		if (connection) return connection;
		if (options.path !== MEMORY_DB_PATH) {
			mkdirSync(dirname(options.path), { recursive: true });
		}
		const sqlite = new Database(options.path);
		try {
			for (const migration of MIGRATIONS) {
				sqlite.exec(readFileSync(migration, "utf8"));
			}
		} catch (error) {
			sqlite.close();
			throw error;
		}
		connection = { sqlite, db: drizzle(sqlite) };
		return connection;
	};

	return {
		async recordGame(result) {
			try {
				open()
					.db.insert(results)
					.values({
						redAgent: result.redAgent,
						yellowAgent: result.yellowAgent,
						redWon: result.redWon,
						yellowWon: result.yellowWon,
						playedAt: result.when.toISOString(),
					})
					.run();
				return true;
			} catch (error) {
				options.onError?.("recordGame", error);
				return false;
			}
		},

		async getGames() {
			try {
				const rows = open()
					.db.select()
					.from(results)
					.orderBy(asc(results.id))
					.all();
				return rows.map(toGameResult);
			} catch (error) {
				options.onError?.("getGames", error);
				return [];
			}
		},

		close() {
			connection?.sqlite.close();
			connection = null;
		},
	};
}

export function createMemoryResultStore(
	initial: readonly GameResult[] = [],
): ResultStore {
	const games = initial.map(copyResult);
	return {
		async recordGame(result) {
			games.push(copyResult(result));
			return true;
		},
		async getGames() {
			return games.map(copyResult);
		},
		close() {},
	};
}

function toGameResult(row: ResultRow): GameResult {
	return {
		redAgent: row.redAgent,
		yellowAgent: row.yellowAgent,
		redWon: row.redWon,
		yellowWon: row.yellowWon,
		when: new Date(row.playedAt),
	};
}

function copyResult(result: GameResult): GameResult {
	return { ...result, when: new Date(result.when.getTime()) };
}
