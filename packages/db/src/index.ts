export { type ResultRow, results } from "./schema/results";
export {
	createMemoryResultStore,
	createSqliteResultStore,
	MEMORY_DB_PATH,
	type SqliteResultStoreOptions,
} from "./store";
export type {
	GameResult,
	ResultStore,
	StoreErrorHandler,
	StoreOperation,
} from "./types";
