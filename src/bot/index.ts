/**
 * Bot Module
 *
 * - Random engine (easy)
 * - Alpha-beta engines (medium, hard) over a tiered evaluator
 * - Capability interfaces and factories
 *
 * @module bot
 */

// Evaluation
export {
  ChessEvaluator,
  MATE_SCORE,
  PIECE_VALUES,
  evaluate,
  evaluationBreakdown,
} from './ChessEvaluator.js';
export type { EvaluatorConfig } from './ChessEvaluator.js';
export { EVALUATION_TABLES, parseEvaluationTables } from './evaluationTables.js';
export type { EvaluationTables } from './evaluationTables.js';

// Search
export { ChessSearch, perft } from './ChessSearch.js';
export type { RootResult, SearchContext } from './ChessSearch.js';
export { givesCheck, isCapture, orderMoves } from './moveOrdering.js';
export { Deadline, systemClock } from './Deadline.js';
export type { Clock } from './Deadline.js';

// Engines
export { RandomEngine, CAPTURE_PROBABILITY, CHECK_PROBABILITY } from './RandomEngine.js';
export type { RandomEngineConfig } from './RandomEngine.js';
export { MinimaxEngine, DIFFICULTY_CONFIGS, ENGINE_NAMES } from './MinimaxEngine.js';
export type { MinimaxConfig, MinimaxEngineConfig } from './MinimaxEngine.js';
export { createEngine, createMinimaxEngine, createRandomEngine } from './factory.js';
export type { EngineOptions } from './factory.js';
export { MAX_SEARCH_DEPTH, MIN_SEARCH_DEPTH } from './options.js';

// Errors
export { BOT_ERROR_MESSAGES, BotError, BotErrorCode, isBotError } from './errors.js';

// Types
export {
  DEFAULT_EVAL_WEIGHTS,
  DEFAULT_SEARCH_CONFIG,
  DIFFICULTY_LEVELS,
  isConfigurable,
  isDifficulty,
  isInspectable,
  isStateful,
} from './types.js';
export type {
  Configurable,
  Difficulty,
  Engine,
  EngineInfo,
  EngineSettings,
  EngineType,
  EvalWeights,
  EvaluationBreakdown,
  Inspectable,
  SearchConfig,
  SearchDifficulty,
  SearchIteration,
  SearchResult,
  Stateful,
} from './types.js';
