/**
 * Validation of engine options. Failures surface as INVALID_CONFIGURATION
 * carrying the first problem found.
 */

import { z } from 'zod';
import { BotError, BotErrorCode } from './errors.js';

export const MIN_SEARCH_DEPTH = 1;
export const MAX_SEARCH_DEPTH = 20;

const searchDepth = z
  .number()
  .int('search depth must be a whole number')
  .min(MIN_SEARCH_DEPTH, `search depth must be ${MIN_SEARCH_DEPTH}-${MAX_SEARCH_DEPTH}`)
  .max(MAX_SEARCH_DEPTH, `search depth must be ${MIN_SEARCH_DEPTH}-${MAX_SEARCH_DEPTH}`);

const timeLimitMs = z.number().positive('time limit must be positive');

export const EngineSettingsSchema = z
  .object({
    searchDepth: searchDepth.optional(),
    timeLimitMs: timeLimitMs.optional(),
    materialWeight: z.number().optional(),
    pieceSquareWeight: z.number().optional(),
    mobilityWeight: z.number().optional(),
    kingSafetyWeight: z.number().optional(),
  })
  .strict();

/** Numeric options taken by the engine factories */
export const EngineLimitsSchema = z.object({
  searchDepth: searchDepth.optional(),
  timeLimitMs: timeLimitMs.optional(),
});

export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new BotError(BotErrorCode.INVALID_CONFIGURATION, issue ? `${where}${issue.message}` : undefined);
  }
  return result.data;
}
