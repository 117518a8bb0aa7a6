/**
 * runMatches - a series of games between two bots
 *
 * Games start in order (1, 2, 3, ...) with at most `concurrency` in flight.
 * Searches are synchronous, so games in flight take turns between moves
 * rather than running in parallel threads. Every game gets its own pair of
 * engines, closed when that game is over.
 */

import { availableParallelism } from 'os';
import { z } from 'zod';
import { Position } from '../chess/Position.js';
import { parseOptions } from '../bot/options.js';
import type { Engine } from '../bot/types.js';
import { BotMatch, MatchOptions, MatchResult } from './BotMatch.js';
import { AggregateStats, computeStats } from './stats.js';

/** Upper bound on games in flight */
export const MAX_CONCURRENT_GAMES = 50;

export interface RunMatchesOptions {
  games: number;
  /** Games in flight at once; 0 or absent derives it from the CPU count */
  concurrency?: number;
  createWhite: (gameNumber: number) => Engine;
  createBlack: (gameNumber: number) => Engine;
  /** Applied to every game; game numbers are assigned here */
  match?: Omit<MatchOptions, 'gameNumber'>;
  /** Stops new games from starting and drops games still being played */
  signal?: AbortSignal;
  onGameStart?: (gameNumber: number) => void;
  onGameEnd?: (result: MatchResult) => void;
}

export interface MatchSeries {
  /** Finished games by game number */
  results: MatchResult[];
  stats: AggregateStats;
  concurrency: number;
  /** True when the signal fired before every game finished */
  aborted: boolean;
}

interface Pairing {
  white: Engine;
  black: Engine;
}

const SeriesLimitsSchema = z.object({
  games: z.number().int().positive('games must be a positive integer'),
  concurrency: z.number().int().nonnegative('concurrency must not be negative').optional(),
});

/**
 * Games to run at once for a machine with `cpuCount` cores:
 * all of them up to 2, half again up to 4, twice as many beyond.
 */
export function defaultConcurrency(cpuCount: number = availableParallelism()): number {
  let concurrency: number;
  if (cpuCount <= 2) {
    concurrency = cpuCount;
  } else if (cpuCount <= 4) {
    concurrency = Math.floor(cpuCount * 1.5);
  } else {
    concurrency = cpuCount * 2;
  }
  return clampConcurrency(concurrency);
}

function clampConcurrency(concurrency: number): number {
  return Math.min(MAX_CONCURRENT_GAMES, Math.max(1, concurrency));
}

/**
 * @throws BotError INVALID_CONFIGURATION for a bad game count or concurrency
 * @throws BotError INVALID_FEN for a bad start position
 */
export async function runMatches(options: RunMatchesOptions): Promise<MatchSeries> {
  const limits = parseOptions(SeriesLimitsSchema, { games: options.games, concurrency: options.concurrency });
  const requested = limits.concurrency ?? 0;
  const concurrency = Math.min(
    limits.games,
    requested === 0 ? defaultConcurrency() : clampConcurrency(requested),
  );

  const startFen = options.match?.startFen;
  if (startFen) Position.fromFen(startFen);

  const pairings = await createPairings(options, limits.games);
  const whiteName = pairings[0].white.name();
  const blackName = pairings[0].black.name();

  if (options.match?.debug) {
    console.debug(`[Match] ${whiteName} vs ${blackName}: ${limits.games} games, ${concurrency} at a time`);
  }

  const results: MatchResult[] = [];
  let next = 0;

  const playOne = async (index: number): Promise<MatchResult | null> => {
    const { white, black } = pairings[index];
    const gameNumber = index + 1;
    try {
      options.onGameStart?.(gameNumber);
      const match = new BotMatch(white, black, { ...options.match, gameNumber });
      while (!match.isFinished()) {
        if (options.signal?.aborted) return null;
        await match.playMove();
      }
      return match.getResult();
    } finally {
      await Promise.all([white.close(), black.close()]);
    }
  };

  const worker = async (): Promise<void> => {
    while (next < pairings.length && !options.signal?.aborted) {
      const result = await playOne(next++);
      if (result) {
        results.push(result);
        options.onGameEnd?.(result);
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: concurrency }, () => worker()));
  } finally {
    // Games never started still hold open engines
    await Promise.all(pairings.slice(next).flatMap(({ white, black }) => [white.close(), black.close()]));
  }

  results.sort((a, b) => a.gameNumber - b.gameNumber);
  return {
    results,
    stats: computeStats(results, whiteName, blackName),
    concurrency,
    aborted: results.length < limits.games,
  };
}

async function createPairings(options: RunMatchesOptions, games: number): Promise<Pairing[]> {
  const pairings: Pairing[] = [];
  try {
    for (let gameNumber = 1; gameNumber <= games; gameNumber++) {
      const white = options.createWhite(gameNumber);
      try {
        pairings.push({ white, black: options.createBlack(gameNumber) });
      } catch (error) {
        await white.close();
        throw error;
      }
    }
  } catch (error) {
    await Promise.all(pairings.flatMap(({ white, black }) => [white.close(), black.close()]));
    throw error;
  }
  return pairings;
}
