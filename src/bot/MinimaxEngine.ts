/**
 * MinimaxEngine - the medium and hard bots
 *
 * Iterative deepening alpha-beta over the tiered evaluator. Hard adds the
 * king safety layer and searches deeper by default.
 */

import type { Position } from '../chess/Position.js';
import { cloneMove, moveToUci } from '../chess/moves.js';
import type { Move } from '../chess/types.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import { ChessSearch } from './ChessSearch.js';
import { Clock, Deadline, systemClock } from './Deadline.js';
import { BotError, BotErrorCode } from './errors.js';
import { EngineSettingsSchema, parseOptions } from './options.js';
import {
  Configurable,
  DEFAULT_EVAL_WEIGHTS,
  Engine,
  EngineInfo,
  EngineSettings,
  EvalWeights,
  Inspectable,
  SearchDifficulty,
  SearchResult,
} from './types.js';

// =============================================================================
// Difficulty Presets
// =============================================================================

export const DIFFICULTY_CONFIGS: Record<SearchDifficulty, { maxDepth: number; timeLimitMs: number }> = {
  medium: {
    maxDepth: 4,
    timeLimitMs: 4000,
  },
  hard: {
    maxDepth: 6,
    timeLimitMs: 8000,
  },
};

export const ENGINE_NAMES = {
  easy: 'Easy Bot',
  medium: 'Medium Bot',
  hard: 'Hard Bot',
} as const;

/** Current settings of a minimax engine */
export interface MinimaxConfig {
  difficulty: SearchDifficulty;
  maxDepth: number;
  timeLimitMs: number;
  weights: EvalWeights;
}

export interface MinimaxEngineConfig {
  difficulty: SearchDifficulty;
  name?: string;
  maxDepth?: number;
  timeLimitMs?: number;
  weights?: Partial<EvalWeights>;
  clock?: Clock;
  /** Log each completed iteration */
  debug?: boolean;
}

export class MinimaxEngine implements Engine, Configurable, Inspectable {
  private readonly engineName: string;
  private readonly difficulty: SearchDifficulty;
  private maxDepth: number;
  private timeLimitMs: number;
  private weights: EvalWeights;
  private readonly clock: Clock;
  private readonly debug: boolean;
  private closed = false;
  private lastSearch: SearchResult | null = null;

  constructor(config: MinimaxEngineConfig) {
    const preset = DIFFICULTY_CONFIGS[config.difficulty];
    this.difficulty = config.difficulty;
    this.engineName = config.name ?? ENGINE_NAMES[config.difficulty];
    this.maxDepth = config.maxDepth ?? preset.maxDepth;
    this.timeLimitMs = config.timeLimitMs ?? preset.timeLimitMs;
    this.weights = { ...DEFAULT_EVAL_WEIGHTS, ...config.weights };
    this.clock = config.clock ?? systemClock;
    this.debug = config.debug ?? false;
  }

  async selectMove(position: Position, deadline?: Deadline): Promise<Move> {
    if (this.closed) {
      throw new BotError(BotErrorCode.ENGINE_CLOSED);
    }
    if (position.legalMoves().length === 0) {
      throw new BotError(BotErrorCode.NO_LEGAL_MOVES);
    }

    const evaluator = new ChessEvaluator({ difficulty: this.difficulty, weights: this.weights });
    const search = new ChessSearch(evaluator);
    const limit = Deadline.after(this.timeLimitMs, this.clock).earliest(deadline);

    const result = search.selectMove(position, this.maxDepth, limit);
    this.lastSearch = result;

    if (this.debug) {
      for (const iteration of result.iterations) {
        console.debug(
          `[Bot] ${this.engineName} depth ${iteration.depth}: ${moveToUci(iteration.move)} ` +
            `score=${iteration.score.toFixed(2)} nodes=${iteration.nodes}`,
        );
      }
      if (result.timedOut) {
        console.debug(`[Bot] ${this.engineName} stopped at depth ${result.depth} after ${result.timeMs}ms`);
      }
    }

    return cloneMove(result.move);
  }

  name(): string {
    return this.engineName;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Validates every option before applying any of them.
   * @throws BotError INVALID_CONFIGURATION
   */
  configure(options: EngineSettings): void {
    const parsed = parseOptions(EngineSettingsSchema, options);

    if (parsed.searchDepth !== undefined) this.maxDepth = parsed.searchDepth;
    if (parsed.timeLimitMs !== undefined) this.timeLimitMs = parsed.timeLimitMs;
    this.weights = {
      material: parsed.materialWeight ?? this.weights.material,
      pieceSquare: parsed.pieceSquareWeight ?? this.weights.pieceSquare,
      mobility: parsed.mobilityWeight ?? this.weights.mobility,
      kingSafety: parsed.kingSafetyWeight ?? this.weights.kingSafety,
    };
  }

  getConfig(): MinimaxConfig {
    return {
      difficulty: this.difficulty,
      maxDepth: this.maxDepth,
      timeLimitMs: this.timeLimitMs,
      weights: { ...this.weights },
    };
  }

  /** Result of the most recent search, if any */
  getLastSearch(): SearchResult | null {
    return this.lastSearch;
  }

  info(): EngineInfo {
    return {
      name: this.engineName,
      author: 'chess-bots',
      version: '1.0.0',
      type: 'minimax',
      difficulty: this.difficulty,
      features: {
        alpha_beta: true,
        iterative_deepening: true,
        move_ordering: true,
        configurable: true,
        piece_square_tables: true,
        mobility: true,
        passed_pawns: true,
        king_safety: this.difficulty === 'hard',
      },
    };
  }
}
