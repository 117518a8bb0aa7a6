/**
 * Engine factories. Options are checked here so a bad value fails at
 * construction instead of at the first move.
 */

import type { Clock } from './Deadline.js';
import { DIFFICULTY_CONFIGS, ENGINE_NAMES, MinimaxEngine } from './MinimaxEngine.js';
import { RandomEngine, RANDOM_ENGINE_TIME_LIMIT_MS } from './RandomEngine.js';
import { BotError, BotErrorCode } from './errors.js';
import { EngineLimitsSchema, parseOptions } from './options.js';
import type { Difficulty, Engine } from './types.js';

export interface EngineOptions {
  /** Per-move time cap */
  timeLimitMs?: number;
  /** Search depth; minimax only */
  searchDepth?: number;
  clock?: Clock;
  /** Random source in [0, 1); random engine only */
  random?: () => number;
  /** Log search iterations; minimax only */
  debug?: boolean;
}

export function createRandomEngine(options: Omit<EngineOptions, 'searchDepth' | 'debug'> = {}): RandomEngine {
  const limits = parseOptions(EngineLimitsSchema, { timeLimitMs: options.timeLimitMs });
  return new RandomEngine({
    name: ENGINE_NAMES.easy,
    timeLimitMs: limits.timeLimitMs ?? RANDOM_ENGINE_TIME_LIMIT_MS,
    random: options.random,
    clock: options.clock,
  });
}

/**
 * @throws BotError INVALID_CONFIGURATION for 'easy' or out-of-range options
 */
export function createMinimaxEngine(
  difficulty: Difficulty,
  options: Omit<EngineOptions, 'random'> = {},
): MinimaxEngine {
  if (difficulty === 'easy') {
    throw new BotError(BotErrorCode.INVALID_CONFIGURATION, 'minimax engine requires medium or hard difficulty');
  }

  const limits = parseOptions(EngineLimitsSchema, {
    searchDepth: options.searchDepth,
    timeLimitMs: options.timeLimitMs,
  });
  const preset = DIFFICULTY_CONFIGS[difficulty];

  return new MinimaxEngine({
    difficulty,
    maxDepth: limits.searchDepth ?? preset.maxDepth,
    timeLimitMs: limits.timeLimitMs ?? preset.timeLimitMs,
    clock: options.clock,
    debug: options.debug,
  });
}

/**
 * Engine for a difficulty: random for easy, minimax otherwise
 */
export function createEngine(difficulty: Difficulty, options: EngineOptions = {}): Engine {
  if (difficulty === 'easy') {
    return createRandomEngine(options);
  }
  return createMinimaxEngine(difficulty, options);
}
