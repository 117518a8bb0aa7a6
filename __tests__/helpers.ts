/**
 * Shared test helpers: thrown errors, scripted random sources, stub engines
 */

import type { Position } from '../src/chess/Position.js';
import { parseUci } from '../src/chess/moves.js';
import type { Move } from '../src/chess/types.js';
import type { Deadline } from '../src/bot/Deadline.js';
import type { Engine, Stateful } from '../src/bot/types.js';

/** White mates on its fourth move */
export const SCHOLARS_MATE_WHITE = ['e2e4', 'f1c4', 'd1h5', 'h5f7'];
export const SCHOLARS_MATE_BLACK = ['e7e5', 'b8c6', 'g8f6'];

/** Whatever `fn` throws, or undefined */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/** Whatever `promise` rejects with, or undefined */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

/** A random source replaying `values`, cycling when exhausted */
export function sequence(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index++;
    return value;
  };
}

/**
 * Clock that reads `start` for the first `calls` reads and `end` afterwards
 */
export function countingClock(calls: number, start = 0, end = 1_000_000): { clock: () => number; reads: () => number } {
  let count = 0;
  return {
    clock: () => {
      count++;
      return count <= calls ? start : end;
    },
    reads: () => count,
  };
}

/**
 * Engine playing a fixed list of UCI moves, cycling through them.
 * Records the history length it is given before each move.
 */
export class ScriptedEngine implements Engine, Stateful {
  readonly historyLengths: number[] = [];
  readonly deadlines: Deadline[] = [];
  closed = false;
  private index = 0;

  constructor(
    private readonly engineName: string,
    private readonly script: string[],
  ) {}

  async selectMove(_position: Position, deadline?: Deadline): Promise<Move> {
    if (deadline) this.deadlines.push(deadline);
    const text = this.script[this.index % this.script.length];
    this.index++;
    const move = parseUci(text);
    if (!move) throw new Error(`bad scripted move ${text}`);
    return move;
  }

  async setPositionHistory(history: readonly Position[]): Promise<void> {
    this.historyLengths.push(history.length);
  }

  name(): string {
    return this.engineName;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Engine whose every move fails */
export class FailingEngine implements Engine {
  constructor(
    private readonly engineName: string,
    private readonly message: string,
  ) {}

  async selectMove(): Promise<Move> {
    throw new Error(this.message);
  }

  name(): string {
    return this.engineName;
  }

  async close(): Promise<void> {}
}
