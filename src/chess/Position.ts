/**
 * Position - a chess.js-backed game position for the bots
 *
 * Wraps chess.js with repetition counting, draw-rule detection and cached
 * move generation. Searches call `copy()` before trying a move; a Position
 * handed to an engine is never changed by it.
 */

import { Chess } from 'chess.js';
import { BotError, BotErrorCode, errorMessage } from '../bot/errors.js';
import { moveToUci } from './moves.js';
import { coordsToSquare, squareIndex } from './squares.js';
import {
  Color,
  GameStatus,
  Move,
  Piece,
  PieceOnBoard,
  Square,
  STARTING_FEN,
  opponent,
} from './types.js';

export class Position {
  private readonly chess: Chess;
  private readonly positionCounts: Map<string, number>;

  // Cleared on every move
  private legalMovesCache: readonly Move[] | null = null;
  private squaresCache: (Piece | null)[] | null = null;
  private statusCache: GameStatus | null = null;

  private constructor(chess: Chess, positionCounts: Map<string, number>) {
    this.chess = chess;
    this.positionCounts = positionCounts;
  }

  static initial(): Position {
    return Position.fromFen(STARTING_FEN);
  }

  /**
   * @throws BotError INVALID_FEN when chess.js rejects the FEN
   */
  static fromFen(fen: string): Position {
    let chess: Chess;
    try {
      chess = new Chess(fen);
    } catch (error) {
      throw new BotError(BotErrorCode.INVALID_FEN, errorMessage(error));
    }
    const position = new Position(chess, new Map());
    position.recordPosition();
    return position;
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  /**
   * Legal moves for the side to move, in chess.js generation order.
   * The list and its moves are frozen; copy a move before handing it out.
   */
  legalMoves(): readonly Move[] {
    if (!this.legalMovesCache) {
      this.legalMovesCache = Object.freeze(
        this.chess
          .moves({ verbose: true })
          .map((m): Move =>
            Object.freeze(m.promotion ? { from: m.from, to: m.to, promotion: m.promotion } : { from: m.from, to: m.to }),
          ),
      );
    }
    return this.legalMovesCache;
  }

  /**
   * Play a move in place.
   * @throws BotError ILLEGAL_MOVE when the move is not legal here
   */
  makeMove(move: Move): void {
    try {
      this.chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    } catch {
      throw new BotError(BotErrorCode.ILLEGAL_MOVE, moveToUci(move));
    }
    this.legalMovesCache = null;
    this.squaresCache = null;
    this.statusCache = null;
    this.recordPosition();
  }

  /**
   * Independent copy, repetition history included
   */
  copy(): Position {
    return new Position(new Chess(this.chess.fen()), new Map(this.positionCounts));
  }

  // ===========================================================================
  // Board Queries
  // ===========================================================================

  activeColor(): Color {
    return this.chess.turn();
  }

  fen(): string {
    return this.chess.fen();
  }

  ascii(): string {
    return this.chess.ascii();
  }

  /** Get half-move clock */
  halfMoveClock(): number {
    const parts = this.chess.fen().split(' ');
    return parseInt(parts[4] || '0', 10);
  }

  pieceAt(square: Square): Piece | null {
    return this.squares()[squareIndex(square)];
  }

  /**
   * All 64 squares indexed rank * 8 + file (a1 = 0, h8 = 63)
   */
  squares(): readonly (Piece | null)[] {
    if (!this.squaresCache) {
      const squares: (Piece | null)[] = new Array<Piece | null>(64).fill(null);
      this.chess.board().forEach((row, rowIndex) => {
        row.forEach((cell, file) => {
          if (cell) squares[(7 - rowIndex) * 8 + file] = { type: cell.type, color: cell.color };
        });
      });
      this.squaresCache = squares;
    }
    return this.squaresCache;
  }

  pieces(): PieceOnBoard[] {
    const pieces: PieceOnBoard[] = [];
    this.squares().forEach((piece, index) => {
      const square = coordsToSquare(index % 8, Math.floor(index / 8));
      if (piece && square) pieces.push({ ...piece, square });
    });
    return pieces;
  }

  inCheck(): boolean {
    return this.chess.isCheck();
  }

  isSquareAttacked(square: Square, byColor: Color): boolean {
    return this.chess.isAttacked(square, byColor);
  }

  // ===========================================================================
  // Game Status
  // ===========================================================================

  /**
   * Checked in order: no legal moves, insufficient material, 75-move rule,
   * fivefold repetition, 50-move rule, threefold repetition.
   */
  status(): GameStatus {
    if (this.statusCache) return this.statusCache;

    let status: GameStatus;
    if (this.legalMoves().length === 0) {
      status = this.chess.isCheck() ? 'checkmate' : 'stalemate';
    } else if (this.chess.isInsufficientMaterial()) {
      status = 'insufficient_material';
    } else {
      const clock = this.halfMoveClock();
      const repetitions = this.repetitionCount();
      if (clock >= 150) status = 'seventy_five_move_rule';
      else if (repetitions >= 5) status = 'fivefold_repetition';
      else if (clock >= 100) status = 'fifty_move_rule';
      else if (repetitions >= 3) status = 'threefold_repetition';
      else status = 'ongoing';
    }

    this.statusCache = status;
    return status;
  }

  isGameOver(): boolean {
    return this.status() !== 'ongoing';
  }

  /**
   * The mating side, or null when the game is not won
   */
  winner(): Color | null {
    return this.status() === 'checkmate' ? opponent(this.activeColor()) : null;
  }

  // ===========================================================================
  // Repetition Tracking
  // ===========================================================================

  /**
   * How many times the current position has occurred
   */
  repetitionCount(): number {
    return this.positionCounts.get(this.positionKey()) || 1;
  }

  private recordPosition(): void {
    const key = this.positionKey();
    this.positionCounts.set(key, (this.positionCounts.get(key) || 0) + 1);
  }

  private positionKey(): string {
    // Placement, turn, castling, en passant
    return this.chess.fen().split(' ').slice(0, 4).join(' ');
  }
}
