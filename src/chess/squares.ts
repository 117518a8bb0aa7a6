/**
 * Square indexing. Index = rank * 8 + file, with rank 0 = rank 1 and
 * file 0 = the a-file.
 */

import { FILES, RANKS, Square } from './types.js';

const ALL_SQUARES: readonly Square[] = buildSquares();

function buildSquares(): Square[] {
  const squares: Square[] = [];
  for (const rank of RANKS) {
    for (const file of FILES) {
      const square = `${file}${rank}` as const;
      squares.push(square);
    }
  }
  return squares;
}

export function isSquare(value: string): value is Square {
  return /^[a-h][1-8]$/.test(value);
}

/**
 * Convert square notation to board coordinates
 */
export function squareToCoords(square: Square): { file: number; rank: number } {
  return {
    file: square.charCodeAt(0) - 97,
    rank: square.charCodeAt(1) - 49,
  };
}

/**
 * Convert coordinates to square notation, or null when off the board
 */
export function coordsToSquare(file: number, rank: number): Square | null {
  if (file < 0 || file > 7 || rank < 0 || rank > 7) return null;
  return ALL_SQUARES[rank * 8 + file];
}

export function squareIndex(square: Square): number {
  const { file, rank } = squareToCoords(square);
  return rank * 8 + file;
}

/** Same file, opposite side of the board */
export function mirrorIndex(index: number): number {
  return (7 - Math.floor(index / 8)) * 8 + (index % 8);
}
