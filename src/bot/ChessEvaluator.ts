/**
 * ChessEvaluator - Position evaluation for the search tiers
 *
 * Layers, each added on top of the previous tier:
 * - easy: material
 * - medium: piece-square tables, passed pawns, mobility
 * - hard: king safety
 *
 * Scores are in pawns from White's perspective (positive = White advantage).
 * Finished games short-circuit: checkmate is +/-MATE_SCORE, any draw is 0.
 */

import type { Position } from '../chess/Position.js';
import { coordsToSquare, mirrorIndex } from '../chess/squares.js';
import { opponent } from '../chess/types.js';
import type { Color, Piece, PieceType } from '../chess/types.js';
import { EVALUATION_TABLES } from './evaluationTables.js';
import { DEFAULT_EVAL_WEIGHTS, Difficulty, EvalWeights, EvaluationBreakdown } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Checkmate score, exact */
export const MATE_SCORE = 10000;

/** Piece values in pawns */
export const PIECE_VALUES: Readonly<Record<PieceType, number>> = Object.freeze({
  p: 1,
  n: 3,
  b: 3.25,
  r: 5,
  q: 9,
  k: 0,
});

/** Non-pawn, non-king material of both sides at the start */
const OPENING_MATERIAL = 63;

const MOBILITY_PER_MOVE = 0.1;

const MISSING_SHIELD_PAWN_PENALTY = 0.3;
const OPEN_FILE_PENALTY = 0.25;
const ATTACKED_ZONE_SQUARE_PENALTY = 0.1;

const EMPTY_BREAKDOWN: Omit<EvaluationBreakdown, 'total' | 'gamePhase'> = {
  material: 0,
  pieceSquares: 0,
  passedPawns: 0,
  mobility: 0,
  kingSafety: 0,
};

type Board = readonly (Piece | null)[];

// =============================================================================
// ChessEvaluator Class
// =============================================================================

export interface EvaluatorConfig {
  difficulty?: Difficulty;
  weights?: Partial<EvalWeights>;
}

export class ChessEvaluator {
  private readonly difficulty: Difficulty;
  private weights: EvalWeights;

  constructor(config: EvaluatorConfig = {}) {
    this.difficulty = config.difficulty ?? 'medium';
    this.weights = { ...DEFAULT_EVAL_WEIGHTS, ...config.weights };
  }

  evaluate(position: Position): number {
    return this.getEvaluationBreakdown(position).total;
  }

  getEvaluationBreakdown(position: Position): EvaluationBreakdown {
    return evaluationBreakdown(position, this.difficulty, this.weights);
  }

  getWeights(): EvalWeights {
    return { ...this.weights };
  }

  setWeights(weights: Partial<EvalWeights>): void {
    this.weights = { ...this.weights, ...weights };
  }
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * White-relative score of a position for the given tier
 */
export function evaluate(
  position: Position,
  difficulty: Difficulty,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS,
): number {
  return evaluationBreakdown(position, difficulty, weights).total;
}

export function evaluationBreakdown(
  position: Position,
  difficulty: Difficulty,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS,
): EvaluationBreakdown {
  const board = position.squares();
  const gamePhase = calculatePhase(board);

  const status = position.status();
  if (status !== 'ongoing') {
    const winner = position.winner();
    const total = winner === 'w' ? MATE_SCORE : winner === 'b' ? -MATE_SCORE : 0;
    return { ...EMPTY_BREAKDOWN, total, gamePhase };
  }

  const breakdown = { ...EMPTY_BREAKDOWN };
  breakdown.material = evaluateMaterial(board) * weights.material;

  if (difficulty !== 'easy') {
    breakdown.pieceSquares = evaluatePieceSquares(board, gamePhase) * weights.pieceSquare;
    breakdown.passedPawns = evaluatePassedPawns(board, gamePhase) * weights.pieceSquare;
    breakdown.mobility = evaluateMobility(position) * weights.mobility;
  }

  if (difficulty === 'hard') {
    breakdown.kingSafety = evaluateKingSafety(position, board) * weights.kingSafety;
  }

  const total =
    breakdown.material +
    breakdown.pieceSquares +
    breakdown.passedPawns +
    breakdown.mobility +
    breakdown.kingSafety;

  return { ...breakdown, total, gamePhase };
}

function sign(color: Color): number {
  return color === 'w' ? 1 : -1;
}

/**
 * 1 with all minor and major pieces on the board, 0 with none
 */
function calculatePhase(board: Board): number {
  let material = 0;
  for (const piece of board) {
    if (piece && piece.type !== 'p' && piece.type !== 'k') {
      material += PIECE_VALUES[piece.type];
    }
  }
  return Math.min(1, Math.max(0, material / OPENING_MATERIAL));
}

function evaluateMaterial(board: Board): number {
  let score = 0;
  for (const piece of board) {
    if (piece) score += sign(piece.color) * PIECE_VALUES[piece.type];
  }
  return score;
}

function evaluatePieceSquares(board: Board, phase: number): number {
  let score = 0;

  board.forEach((piece, index) => {
    if (!piece || piece.type === 'q') return;
    const i = piece.color === 'w' ? index : mirrorIndex(index);
    score += sign(piece.color) * squareBonus(piece.type, i, phase);
  });

  return score;
}

function squareBonus(type: Exclude<PieceType, 'q'>, index: number, phase: number): number {
  const tables = EVALUATION_TABLES;
  switch (type) {
    case 'p':
      return tables.pawn[index];
    case 'n':
      return tables.knight[index];
    case 'b':
      return tables.bishop[index];
    case 'r':
      return tables.rook[index];
    case 'k':
      return phase * tables.kingMiddlegame[index] + (1 - phase) * tables.kingEndgame[index];
  }
}

/**
 * Passed pawns (no enemy pawn ahead on the same or an adjacent file).
 * The bonus doubles as the game reaches a bare endgame.
 */
function evaluatePassedPawns(board: Board, phase: number): number {
  const endgameScale = 1 + (1 - phase);
  let score = 0;

  board.forEach((piece, index) => {
    if (piece?.type !== 'p') return;
    const rank = Math.floor(index / 8);
    const file = index % 8;
    if (!isPassedPawn(board, file, rank, piece.color)) return;

    const relativeRank = piece.color === 'w' ? rank : 7 - rank;
    score += sign(piece.color) * EVALUATION_TABLES.passedPawn[relativeRank] * endgameScale;
  });

  return score;
}

function isPassedPawn(board: Board, file: number, rank: number, color: Color): boolean {
  const step = color === 'w' ? 1 : -1;
  for (let r = rank + step; r >= 0 && r <= 7; r += step) {
    for (let f = Math.max(0, file - 1); f <= Math.min(7, file + 1); f++) {
      const piece = board[r * 8 + f];
      if (piece?.type === 'p' && piece.color !== color) return false;
    }
  }
  return true;
}

/**
 * Legal moves of the side to move, signed by that side
 */
function evaluateMobility(position: Position): number {
  return sign(position.activeColor()) * position.legalMoves().length * MOBILITY_PER_MOVE;
}

/**
 * White's king term minus Black's, each the negated sum of its penalties
 */
function evaluateKingSafety(position: Position, board: Board): number {
  let score = 0;
  board.forEach((piece, index) => {
    if (piece?.type !== 'k') return;
    score += sign(piece.color) * -kingDanger(position, board, index, piece.color);
  });
  return score;
}

function kingDanger(position: Position, board: Board, kingIndex: number, color: Color): number {
  const kingRank = Math.floor(kingIndex / 8);
  const kingFile = kingIndex % 8;
  const shieldRank = kingRank + (color === 'w' ? 1 : -1);
  const enemy = opponent(color);
  let penalty = 0;

  // Pawn shield; squares off the board count as missing
  for (let f = kingFile - 1; f <= kingFile + 1; f++) {
    const onBoard = f >= 0 && f <= 7 && shieldRank >= 0 && shieldRank <= 7;
    const piece = onBoard ? board[shieldRank * 8 + f] : null;
    if (piece?.type !== 'p' || piece.color !== color) penalty += MISSING_SHIELD_PAWN_PENALTY;
  }

  // Open files beside the king
  for (let f = Math.max(0, kingFile - 1); f <= Math.min(7, kingFile + 1); f++) {
    if (isOpenFile(board, f)) penalty += OPEN_FILE_PENALTY;
  }

  // Attacked squares of the 3x3 zone, king square included
  for (let r = Math.max(0, kingRank - 1); r <= Math.min(7, kingRank + 1); r++) {
    for (let f = Math.max(0, kingFile - 1); f <= Math.min(7, kingFile + 1); f++) {
      const square = coordsToSquare(f, r);
      if (square && position.isSquareAttacked(square, enemy)) {
        penalty += ATTACKED_ZONE_SQUARE_PENALTY;
      }
    }
  }

  return penalty;
}

function isOpenFile(board: Board, file: number): boolean {
  for (let r = 0; r < 8; r++) {
    if (board[r * 8 + file]?.type === 'p') return false;
  }
  return true;
}
