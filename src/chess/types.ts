/**
 * Chess Module Type Definitions
 *
 * Board, piece and move types shared by the position adapter and the bots.
 * Follows chess.js conventions so values pass straight through to the rules engine.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Square notation (a1-h8) */
export type Square =
  | 'a1' | 'a2' | 'a3' | 'a4' | 'a5' | 'a6' | 'a7' | 'a8'
  | 'b1' | 'b2' | 'b3' | 'b4' | 'b5' | 'b6' | 'b7' | 'b8'
  | 'c1' | 'c2' | 'c3' | 'c4' | 'c5' | 'c6' | 'c7' | 'c8'
  | 'd1' | 'd2' | 'd3' | 'd4' | 'd5' | 'd6' | 'd7' | 'd8'
  | 'e1' | 'e2' | 'e3' | 'e4' | 'e5' | 'e6' | 'e7' | 'e8'
  | 'f1' | 'f2' | 'f3' | 'f4' | 'f5' | 'f6' | 'f7' | 'f8'
  | 'g1' | 'g2' | 'g3' | 'g4' | 'g5' | 'g6' | 'g7' | 'g8'
  | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6' | 'h7' | 'h8';

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** A piece with its position */
export interface PieceOnBoard extends Piece {
  square: Square;
}

// =============================================================================
// Move Representation
// =============================================================================

/**
 * A move as the bots see it. Written in UCI form (`e2e4`, `e7e8q`)
 * wherever it is shown or logged.
 */
export interface Move {
  from: Square;
  to: Square;
  /** Piece a pawn promotes to */
  promotion?: PieceType;
}

// =============================================================================
// Game Status
// =============================================================================

/**
 * Where a game stands. Everything except `ongoing` ends the game.
 */
export type GameStatus =
  | 'ongoing'
  | 'checkmate'
  | 'stalemate'
  | 'insufficient_material'
  | 'fifty_move_rule'
  | 'seventy_five_move_rule'
  | 'threefold_repetition'
  | 'fivefold_repetition';

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position FEN */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Files a-h */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Ranks 1-8 */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** The opposing color */
export function opponent(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}
