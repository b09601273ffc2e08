export { createAgentFactory, logClientEvent, offeredModels } from "./agents";
export {
	type ArenaConfig,
	ConfigError,
	loadArenaConfig,
	parseArenaConfig,
	parseModelList,
} from "./config";
export { GameOverError, TurnOrderError } from "./errors";
export { Game, type GameOptions, type GameSnapshot } from "./game";
export {
	type GameWinner,
	type LeaderboardEntry,
	loadLeaderboard,
	rankRatings,
	type ResultSummaryRow,
	summarizeResults,
	winnerOf,
} from "./leaderboard";
export { type MatchSummary, playMatch } from "./match";
export {
	errorFields,
	LOG_LEVELS,
	type LogLevel,
	log,
	setLogLevel,
} from "./obs/log";
export { redactRecord, redactValue } from "./obs/redact";
export {
	type AgentFactory,
	type MoveRejection,
	Player,
	type PlayerOptions,
	type PlayerTurn,
} from "./player";
export { buildMovePrompts, buildSystemPrompt, buildUserPrompt } from "./prompts";
export {
	computeRatings,
	DEFAULT_RATING,
	ELO_K,
	expectedScore,
	outcomeScores,
	type RatingOptions,
	type Ratings,
} from "./rating";
export {
	type MoveRejectionReason,
	parseAgentReply,
	type Rationale,
	resolveColumn,
} from "./replyParser";
export { mulberry32, pickOne, type Rng } from "./rng";
export { openResultStore } from "./storage";
