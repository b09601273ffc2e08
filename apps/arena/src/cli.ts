import { isUnsupportedAgentError } from "@connect-arena/agent-client";
import type { ResultStore } from "@connect-arena/db";
import { renderAscii } from "@connect-arena/engine";
import minimist from "minimist";
import { createAgentFactory, offeredModels } from "./agents";
import { type ArenaConfig, loadArenaConfig } from "./config";
import { loadLeaderboard, summarizeResults } from "./leaderboard";
import { playMatch } from "./match";
import { setLogLevel } from "./obs/log";
import { openResultStore } from "./storage";

type Args = ReturnType<typeof minimist>;

type CliContext = {
	config: ArenaConfig;
	store: ResultStore;
	json: boolean;
};

function stringArg(argv: Args, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = argv[key];
		if (typeof value === "string") {
			return value;
		}
	}
	return undefined;
}

function num(v: unknown): number | undefined {
	const n =
		typeof v === "string" ? Number(v) : typeof v === "number" ? v : Number.NaN;
	return Number.isFinite(n) ? n : undefined;
}

function handleModelsCommand(context: CliContext) {
	const models = offeredModels(context.config);
	if (context.json) {
		console.log(JSON.stringify({ models }, null, 2));
		return;
	}
	for (const model of models) {
		console.log(model);
	}
}

async function handlePlayCommand(argv: Args, context: CliContext) {
	const red = stringArg(argv, "red");
	const yellow = stringArg(argv, "yellow");
	if (!red || !yellow) {
		console.error("play needs both --red and --yellow model identifiers.");
		printUsageAndExit();
	}
	// minimist turns --no-record into record: false
	const record = argv.record !== false;

	try {
		const summary = await playMatch({
			red,
			yellow,
			createAgent: createAgentFactory(context.config),
			store: record ? context.store : undefined,
			seed: num(argv.seed),
			onSnapshot: context.json
				? undefined
				: (snapshot) => {
						console.log(`Move ${snapshot.turn}`);
						console.log(renderAscii(snapshot.state));
						console.log("");
					},
		});

		if (context.json) {
			console.log(JSON.stringify(summary, null, 2));
			return;
		}
		console.log(`${summary.red} (Red) vs ${summary.yellow} (Yellow)`);
		console.log(summary.status);
		if (record) {
			console.log(summary.recorded ? "Result recorded." : "Result not recorded.");
		}
	} catch (error) {
		if (isUnsupportedAgentError(error)) {
			console.error(error.message);
			console.error("Run 'models' to list the offered identifiers.");
			process.exit(1);
		}
		throw error;
	}
}

async function handleGamesCommand(context: CliContext) {
	const rows = summarizeResults(await context.store.getGames());
	if (context.json) {
		console.log(JSON.stringify({ games: rows }, null, 2));
		return;
	}
	if (rows.length === 0) {
		console.log("No games recorded.");
		return;
	}
	for (const row of rows) {
		console.log(`${row.when}  ${row.red} vs ${row.yellow}  ${row.winner}`);
	}
}

async function handleLeaderboardCommand(argv: Args, context: CliContext) {
	const identifiers = argv.all ? undefined : offeredModels(context.config);
	const leaderboard = await loadLeaderboard(context.store, identifiers);
	if (context.json) {
		console.log(JSON.stringify({ leaderboard }, null, 2));
		return;
	}
	if (leaderboard.length === 0) {
		console.log("No rated games yet.");
		return;
	}
	leaderboard.forEach((entry, idx) => {
		console.log(`${String(idx + 1).padStart(3)}. ${entry.agent}  ${entry.rating}`);
	});
}

function printUsageAndExit(): never {
	console.error("Usage:");
	console.error("  tsx src/cli.ts models [--json]");
	console.error(
		"  tsx src/cli.ts play --red <model> --yellow <model> [--no-record] [--json] [--seed N]",
	);
	console.error("  tsx src/cli.ts games [--json]");
	console.error("  tsx src/cli.ts leaderboard [--all] [--json]");
	console.error("");
	console.error("Environment:");
	console.error("  ARENA_MODELS          Comma-separated models to offer (default: all)");
	console.error("  ARENA_DB_PATH         SQLite file for results (default: data/arena.db)");
	console.error("  ARENA_LOG_LEVEL       debug | info | warn | error (default: info)");
	console.error("  ARENA_RETRY_DELAY_MS  Delay between agent retries (default: 2000)");
	process.exit(1);
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2), {
		boolean: ["json", "all"],
	});
	const cmd = argv._[0];
	const config = loadArenaConfig();
	setLogLevel(config.logLevel);

	const context: CliContext = {
		config,
		store: openResultStore(config),
		json: !!argv.json,
	};

	try {
		switch (cmd) {
			case "models":
				handleModelsCommand(context);
				return;
			case "play":
				await handlePlayCommand(argv, context);
				return;
			case "games":
				await handleGamesCommand(context);
				return;
			case "leaderboard":
				await handleLeaderboardCommand(argv, context);
				return;
			default:
				printUsageAndExit();
		}
	} finally {
		context.store.close();
	}
}

main().catch((e) => {
	console.error(e);
	process.exit(1);
});
