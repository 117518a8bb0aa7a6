import type { Position } from '../chess/Position.js';
import type { Move } from '../chess/types.js';

/**
 * A move is a capture when its target square is occupied.
 * En passant does not count.
 */
export function isCapture(position: Position, move: Move): boolean {
  return position.pieceAt(move.to) !== null;
}

/**
 * Gives check to the opponent once played
 */
export function givesCheck(position: Position, move: Move): boolean {
  const child = position.copy();
  child.makeMove(move);
  return child.inCheck();
}

/**
 * Captures first, then everything else. Order inside each group is kept.
 */
export function orderMoves(position: Position, moves: readonly Move[]): Move[] {
  const captures: Move[] = [];
  const quiet: Move[] = [];
  for (const move of moves) {
    if (isCapture(position, move)) captures.push(move);
    else quiet.push(move);
  }
  return [...captures, ...quiet];
}
