/**
 * Bot Type Definitions
 *
 * Difficulty tiers, engine capability interfaces, search configuration and
 * result shapes shared by the engines, the match runner and the CLI.
 */

import type { Position } from '../chess/Position.js';
import type { Move } from '../chess/types.js';
import type { Deadline } from './Deadline.js';

// =============================================================================
// Difficulty
// =============================================================================

/** Bot strength, weakest first */
export type Difficulty = 'easy' | 'medium' | 'hard';

export const DIFFICULTY_LEVELS: readonly Difficulty[] = ['easy', 'medium', 'hard'];

export function isDifficulty(value: string): value is Difficulty {
  return value === 'easy' || value === 'medium' || value === 'hard';
}

/** Tiers that run the alpha-beta search */
export type SearchDifficulty = Exclude<Difficulty, 'easy'>;

export type EngineType = 'random' | 'minimax';

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Multipliers for each evaluation layer. Passed-pawn bonuses scale with
 * `pieceSquare`.
 */
export interface EvalWeights {
  material: number;
  pieceSquare: number;
  mobility: number;
  kingSafety: number;
}

export const DEFAULT_EVAL_WEIGHTS: Readonly<EvalWeights> = Object.freeze({
  material: 1,
  pieceSquare: 1,
  mobility: 1,
  kingSafety: 1,
});

/** Evaluation split by layer, pawn units, White-relative */
export interface EvaluationBreakdown {
  material: number;
  pieceSquares: number;
  passedPawns: number;
  mobility: number;
  kingSafety: number;
  total: number;
  /** 1 = all non-pawn material on the board, 0 = none */
  gamePhase: number;
}

// =============================================================================
// Search
// =============================================================================

export interface SearchConfig {
  /** Cut off branches once alpha >= beta */
  useAlphaBeta: boolean;
  /** Try captures first */
  useMoveOrdering: boolean;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  useAlphaBeta: true,
  useMoveOrdering: true,
};

/** One completed iterative deepening pass */
export interface SearchIteration {
  depth: number;
  move: Move;
  score: number;
  nodes: number;
}

export interface SearchResult {
  move: Move;
  /** Side-to-move relative score of the deepest completed iteration */
  score: number;
  /** Deepest completed depth, 0 when no iteration finished */
  depth: number;
  nodes: number;
  timeMs: number;
  timedOut: boolean;
  iterations: SearchIteration[];
}

// =============================================================================
// Engine Capabilities
// =============================================================================

/**
 * Every bot implements this. `selectMove` rejects with a BotError when the
 * engine is closed or the position has no legal moves; running out of time
 * still yields a move.
 */
export interface Engine {
  selectMove(position: Position, deadline?: Deadline): Promise<Move>;
  name(): string;
  /** Idempotent */
  close(): Promise<void>;
}

/** Options accepted by `Configurable.configure` */
export interface EngineSettings {
  searchDepth?: number;
  timeLimitMs?: number;
  materialWeight?: number;
  pieceSquareWeight?: number;
  mobilityWeight?: number;
  kingSafetyWeight?: number;
}

export interface Configurable {
  /**
   * Applies every option or none of them.
   * @throws BotError INVALID_CONFIGURATION
   */
  configure(options: EngineSettings): void;
}

export interface Stateful {
  /** Positions of the game so far, oldest first, current last */
  setPositionHistory(history: readonly Position[]): Promise<void>;
}

export interface EngineInfo {
  name: string;
  author: string;
  version: string;
  type: EngineType;
  difficulty: Difficulty;
  features: Record<string, boolean>;
}

export interface Inspectable {
  info(): EngineInfo;
}

export function isConfigurable<T extends Engine>(engine: T): engine is T & Configurable {
  return 'configure' in engine && typeof engine.configure === 'function';
}

export function isStateful<T extends Engine>(engine: T): engine is T & Stateful {
  return 'setPositionHistory' in engine && typeof engine.setPositionHistory === 'function';
}

export function isInspectable<T extends Engine>(engine: T): engine is T & Inspectable {
  return 'info' in engine && typeof engine.info === 'function';
}
