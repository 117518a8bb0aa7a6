export * from './chess/index.js';
export * from './bot/index.js';

export { BotMatch, DEFAULT_MAX_MOVES, DEFAULT_MOVE_TIMEOUT_MS, DRAW, MOVE_LIMIT_REASON } from './match/BotMatch.js';
export type { MatchMoveEvent, MatchOptions, MatchResult } from './match/BotMatch.js';
export { computeStats } from './match/stats.js';
export type { AggregateStats } from './match/stats.js';
export { MAX_CONCURRENT_GAMES, defaultConcurrency, runMatches } from './match/runMatches.js';
export type { MatchSeries, RunMatchesOptions } from './match/runMatches.js';
export { DEFAULT_EXPORT_DIR, exportFileName, exportStats, saveSessionExport } from './match/export.js';
export type { GameExport, GameOutcome, SessionExport } from './match/export.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
