/**
 * BotMatch - one engine-vs-engine game
 *
 * Each turn the side to move gets its own copy of the position and a
 * per-move deadline. The game ends on any game-over status, on the move cap,
 * or when an engine fails; the failing side loses.
 */

import { Position } from '../chess/Position.js';
import { moveToUci } from '../chess/moves.js';
import type { Color, GameStatus, Move } from '../chess/types.js';
import { Clock, Deadline, systemClock } from '../bot/Deadline.js';
import { errorMessage } from '../bot/errors.js';
import { Engine, isStateful } from '../bot/types.js';

export const DEFAULT_MAX_MOVES = 500;
export const DEFAULT_MOVE_TIMEOUT_MS = 30000;
export const MOVE_LIMIT_REASON = 'move limit exceeded';
export const DRAW = 'Draw';

export interface MatchMoveEvent {
  /** 1 for White's first move */
  ply: number;
  color: Color;
  engineName: string;
  move: Move;
  uci: string;
  fen: string;
}

export interface MatchOptions {
  startFen?: string;
  /** Plies before the game is called a draw */
  maxMoves?: number;
  moveTimeoutMs?: number;
  gameNumber?: number;
  clock?: Clock;
  onMove?: (event: MatchMoveEvent) => void;
  debug?: boolean;
}

export interface MatchResult {
  gameNumber: number;
  /** Winning engine's name, or 'Draw' */
  winner: string;
  winnerColor: Color | null;
  /** A game status, 'move limit exceeded' or 'engine error: ...' */
  endReason: string;
  /** Plies played */
  moveCount: number;
  durationMs: number;
  finalFen: string;
  moves: string[];
}

export class BotMatch {
  private readonly white: Engine;
  private readonly black: Engine;
  private readonly maxMoves: number;
  private readonly moveTimeoutMs: number;
  private readonly gameNumber: number;
  private readonly clock: Clock;
  private readonly onMove?: (event: MatchMoveEvent) => void;
  private readonly debug: boolean;

  private position: Position;
  private readonly history: Position[];
  private readonly moves: Move[] = [];
  private startTime: number | null = null;
  private result: MatchResult | null = null;

  constructor(white: Engine, black: Engine, options: MatchOptions = {}) {
    this.white = white;
    this.black = black;
    this.maxMoves = options.maxMoves ?? DEFAULT_MAX_MOVES;
    this.moveTimeoutMs = options.moveTimeoutMs ?? DEFAULT_MOVE_TIMEOUT_MS;
    this.gameNumber = options.gameNumber ?? 1;
    this.clock = options.clock ?? systemClock;
    this.onMove = options.onMove;
    this.debug = options.debug ?? false;

    this.position = options.startFen ? Position.fromFen(options.startFen) : Position.initial();
    this.history = [this.position.copy()];
  }

  /**
   * Play a single move. Null once the game is over.
   */
  async playMove(): Promise<Move | null> {
    if (this.result) return null;
    if (this.startTime === null) this.startTime = this.clock();

    // Games handed over already finished
    const before = this.position.status();
    if (before !== 'ongoing') {
      this.finishWithStatus(before);
      return null;
    }

    const color = this.position.activeColor();
    const engine = color === 'w' ? this.white : this.black;

    let move: Move;
    try {
      if (isStateful(engine)) {
        await engine.setPositionHistory(this.history.map((p) => p.copy()));
      }
      move = await engine.selectMove(this.position.copy(), Deadline.after(this.moveTimeoutMs, this.clock));
      this.position.makeMove(move);
    } catch (error) {
      this.finish(color === 'w' ? 'b' : 'w', `engine error: ${errorMessage(error)}`);
      return null;
    }

    this.moves.push(move);
    this.history.push(this.position.copy());

    this.onMove?.({
      ply: this.moves.length,
      color,
      engineName: engine.name(),
      move,
      uci: moveToUci(move),
      fen: this.position.fen(),
    });

    const status = this.position.status();
    if (status !== 'ongoing') {
      this.finishWithStatus(status);
    } else if (this.moves.length >= this.maxMoves) {
      this.finish(null, MOVE_LIMIT_REASON);
    }

    return move;
  }

  /**
   * Play until the game ends
   */
  async playGame(): Promise<MatchResult> {
    let result = this.result;
    while (!result) {
      await this.playMove();
      result = this.result;
    }
    return result;
  }

  isFinished(): boolean {
    return this.result !== null;
  }

  getResult(): MatchResult | null {
    return this.result;
  }

  getPosition(): Position {
    return this.position.copy();
  }

  getMoves(): string[] {
    return this.moves.map(moveToUci);
  }

  private finishWithStatus(status: GameStatus): void {
    this.finish(this.position.winner(), status);
  }

  private finish(winnerColor: Color | null, endReason: string): void {
    const winnerEngine = winnerColor === 'w' ? this.white : winnerColor === 'b' ? this.black : null;
    this.result = {
      gameNumber: this.gameNumber,
      winner: winnerEngine ? winnerEngine.name() : DRAW,
      winnerColor,
      endReason,
      moveCount: this.moves.length,
      durationMs: this.startTime === null ? 0 : this.clock() - this.startTime,
      finalFen: this.position.fen(),
      moves: this.getMoves(),
    };

    if (this.debug) {
      console.debug(
        `[Match] Game ${this.gameNumber}: ${this.result.winner} (${endReason}) after ${this.result.moveCount} plies`,
      );
    }
  }
}
