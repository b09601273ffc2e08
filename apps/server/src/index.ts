import {
	createAgentFactory,
	loadArenaConfig,
	log,
	offeredModels,
	openResultStore,
	setLogLevel,
} from "@connect-arena/arena";
import { serve } from "@hono/node-server";
import { createApp } from "./app";

const config = loadArenaConfig();
setLogLevel(config.logLevel);

const store = openResultStore(config);
const app = createApp({
	store,
	createAgent: createAgentFactory(config),
	listModels: () => offeredModels(config),
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
	log("info", "server_listening", {
		port: info.port,
		dbPath: config.dbPath,
		models: offeredModels(config).length,
	});
});

const shutdown = () => {
	server.close(() => {
		store.close();
		process.exit(0);
	});
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
