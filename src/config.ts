/**
 * Runtime configuration from environment variables
 *
 *   CHESS_BOTS_DEBUG            log search iterations and game results (1/true)
 *   CHESS_BOTS_MOVE_TIMEOUT_MS  per-move deadline in matches
 *   CHESS_BOTS_MAX_MOVES        plies before a match is drawn
 *   CHESS_BOTS_CONCURRENCY      match games in flight at once (0 = from CPU count)
 */

import { z } from 'zod';
import { parseOptions } from './bot/options.js';
import { DEFAULT_MAX_MOVES, DEFAULT_MOVE_TIMEOUT_MS } from './match/BotMatch.js';

export interface AppConfig {
  debug: boolean;
  moveTimeoutMs: number;
  maxMoves: number;
  concurrency: number;
}

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', ''])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  CHESS_BOTS_DEBUG: booleanFlag.optional(),
  CHESS_BOTS_MOVE_TIMEOUT_MS: positiveInt.optional(),
  CHESS_BOTS_MAX_MOVES: positiveInt.optional(),
  CHESS_BOTS_CONCURRENCY: nonNegativeInt.optional(),
});

/**
 * @throws BotError INVALID_CONFIGURATION naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseOptions(EnvSchema, env);
  return {
    debug: parsed.CHESS_BOTS_DEBUG ?? false,
    moveTimeoutMs: parsed.CHESS_BOTS_MOVE_TIMEOUT_MS ?? DEFAULT_MOVE_TIMEOUT_MS,
    maxMoves: parsed.CHESS_BOTS_MAX_MOVES ?? DEFAULT_MAX_MOVES,
    concurrency: parsed.CHESS_BOTS_CONCURRENCY ?? 0,
  };
}
