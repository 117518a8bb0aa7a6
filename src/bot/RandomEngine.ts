/**
 * RandomEngine - the easy bot
 *
 * Picks uniformly at random, leaning toward captures and then checks.
 */

import type { Position } from '../chess/Position.js';
import { cloneMove } from '../chess/moves.js';
import type { Move } from '../chess/types.js';
import { Clock, Deadline, systemClock } from './Deadline.js';
import { BotError, BotErrorCode } from './errors.js';
import { givesCheck, isCapture } from './moveOrdering.js';
import type { Engine, EngineInfo, Inspectable } from './types.js';

/** Chance of taking a capture when one exists */
export const CAPTURE_PROBABILITY = 0.7;
/** Chance of giving check when one exists and no capture was taken */
export const CHECK_PROBABILITY = 0.5;

export const RANDOM_ENGINE_TIME_LIMIT_MS = 2000;

export interface RandomEngineConfig {
  name?: string;
  timeLimitMs?: number;
  /** Uniform in [0, 1) */
  random?: () => number;
  clock?: Clock;
}

export class RandomEngine implements Engine, Inspectable {
  private readonly engineName: string;
  private readonly timeLimitMs: number;
  private readonly random: () => number;
  private readonly clock: Clock;
  private closed = false;

  constructor(config: RandomEngineConfig = {}) {
    this.engineName = config.name ?? 'Easy Bot';
    this.timeLimitMs = config.timeLimitMs ?? RANDOM_ENGINE_TIME_LIMIT_MS;
    this.random = config.random ?? Math.random;
    this.clock = config.clock ?? systemClock;
  }

  async selectMove(position: Position, deadline?: Deadline): Promise<Move> {
    if (this.closed) {
      throw new BotError(BotErrorCode.ENGINE_CLOSED);
    }

    const moves = position.legalMoves();
    if (moves.length === 0) {
      throw new BotError(BotErrorCode.NO_LEGAL_MOVES);
    }
    if (moves.length === 1) {
      return cloneMove(moves[0]);
    }

    const limit = Deadline.after(this.timeLimitMs, this.clock).earliest(deadline);
    if (limit.expired()) {
      return this.pick(moves);
    }

    const captures = moves.filter((move) => isCapture(position, move));
    const checks = moves.filter((move) => givesCheck(position, move));

    // Both draws happen even when the category is empty
    if (this.random() < CAPTURE_PROBABILITY && captures.length > 0) {
      return this.pick(captures);
    }
    if (this.random() < CHECK_PROBABILITY && checks.length > 0) {
      return this.pick(checks);
    }
    return this.pick(moves);
  }

  name(): string {
    return this.engineName;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  info(): EngineInfo {
    return {
      name: this.engineName,
      author: 'chess-bots',
      version: '1.0.0',
      type: 'random',
      difficulty: 'easy',
      features: {
        random_selection: true,
        tactical_awareness: true,
        weighted_selection: true,
      },
    };
  }

  private pick(moves: readonly Move[]): Move {
    const index = Math.min(moves.length - 1, Math.floor(this.random() * moves.length));
    return cloneMove(moves[index]);
  }
}
