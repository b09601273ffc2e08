import {
	createSqliteResultStore,
	type ResultStore,
} from "@connect-arena/db";
import type { ArenaConfig } from "./config";
import { errorFields, log } from "./obs/log";

export function openResultStore(config: Pick<ArenaConfig, "dbPath">): ResultStore {
	return createSqliteResultStore({
		path: config.dbPath,
		onError: (operation, error) => {
			log("error", "result store unavailable", {
				operation,
				dbPath: config.dbPath,
				...errorFields(error),
			});
		},
	});
}
