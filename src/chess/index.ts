/**
 * Chess Module
 *
 * Position handling over chess.js: legal moves, draw rules, repetition
 * counting and UCI move text.
 *
 * @module chess
 */

export { Position } from './Position.js';

export { cloneMove, movesEqual, moveToUci, parseUci } from './moves.js';

export {
  coordsToSquare,
  isSquare,
  mirrorIndex,
  squareIndex,
  squareToCoords,
} from './squares.js';

export { FILES, RANKS, STARTING_FEN, opponent } from './types.js';

export type { Color, GameStatus, Move, Piece, PieceOnBoard, PieceType, Square } from './types.js';
