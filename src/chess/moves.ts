import { isSquare } from './squares.js';
import { Move, PieceType } from './types.js';

/**
 * Two moves are equal when source, target and promotion piece all match
 */
export function movesEqual(a: Move, b: Move): boolean {
  return a.from === b.from && a.to === b.to && (a.promotion ?? null) === (b.promotion ?? null);
}

/** A fresh, mutable copy */
export function cloneMove(move: Move): Move {
  return move.promotion ? { from: move.from, to: move.to, promotion: move.promotion } : { from: move.from, to: move.to };
}

/**
 * Long algebraic form: e2e4, e7e8q
 */
export function moveToUci(move: Move): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

function isPromotionPiece(value: string): value is PieceType {
  return value === 'q' || value === 'r' || value === 'b' || value === 'n';
}

/**
 * Parse a UCI move string. Returns null when the text is not a move.
 */
export function parseUci(text: string): Move | null {
  const trimmed = text.trim().toLowerCase();
  if (trimmed.length !== 4 && trimmed.length !== 5) return null;

  const from = trimmed.slice(0, 2);
  const to = trimmed.slice(2, 4);
  if (!isSquare(from) || !isSquare(to)) return null;

  if (trimmed.length === 4) return { from, to };

  const promotion = trimmed.charAt(4);
  if (!isPromotionPiece(promotion)) return null;
  return { from, to, promotion };
}
