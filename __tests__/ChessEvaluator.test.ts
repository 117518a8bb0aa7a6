/**
 * Evaluator Tests
 *
 * - Finished games
 * - Material
 * - Piece-square, passed pawn and mobility layers
 * - King safety
 * - Weights
 */

import { describe, it, expect } from 'vitest';
import { Position } from '../src/chess/Position.js';
import {
  ChessEvaluator,
  MATE_SCORE,
  evaluate,
  evaluationBreakdown,
} from '../src/bot/ChessEvaluator.js';
import { EVALUATION_TABLES, parseEvaluationTables } from '../src/bot/evaluationTables.js';
import { BotErrorCode } from '../src/bot/errors.js';
import { DEFAULT_EVAL_WEIGHTS, DIFFICULTY_LEVELS } from '../src/bot/types.js';
import { thrown } from './helpers.js';

const at = (fen: string) => Position.fromFen(fen);

const NO_BLACK_QUEEN = 'rnb1kbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';
const NO_BLACK_BISHOP = 'rn1qkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';
const LONE_WHITE_PAWN = '4k3/8/8/8/8/8/4P3/4K3 w - - 0 1';
const ROOK_ON_F_FILE = '4k3/8/8/8/8/8/8/4KR2 w - - 0 1';

// =============================================================================
// Terminal Positions
// =============================================================================

describe('Terminal evaluation', () => {
  it.each(DIFFICULTY_LEVELS)('should score checkmate exactly at %s', (difficulty) => {
    expect(evaluate(at('7k/6Q1/5K2/8/8/8/8/8 b - - 0 1'), difficulty)).toBe(MATE_SCORE);
    expect(evaluate(at('8/8/8/8/8/5k2/6q1/7K w - - 0 1'), difficulty)).toBe(-MATE_SCORE);
  });

  it.each(DIFFICULTY_LEVELS)('should score draws as zero at %s', (difficulty) => {
    expect(evaluate(at('7k/5Q2/5K2/8/8/8/8/8 b - - 0 1'), difficulty)).toBe(0);
    expect(evaluate(at('8/8/8/4k3/8/8/8/4K3 w - - 0 1'), difficulty)).toBe(0);
    expect(evaluate(at('8/8/8/3k4/8/8/4R3/4K3 w - - 100 80'), difficulty)).toBe(0);
  });

  it('should ignore weights once the game is over', () => {
    const weights = { material: 3, pieceSquare: 3, mobility: 3, kingSafety: 3 };
    expect(evaluate(at('7k/6Q1/5K2/8/8/8/8/8 b - - 0 1'), 'hard', weights)).toBe(MATE_SCORE);
  });

  it('should score a repeated position as a draw', () => {
    const position = Position.initial();
    for (let i = 0; i < 2; i++) {
      for (const [from, to] of [['g1', 'f3'], ['g8', 'f6'], ['f3', 'g1'], ['f6', 'g8']] as const) {
        position.makeMove({ from, to });
      }
    }
    expect(position.status()).toBe('threefold_repetition');
    expect(evaluate(position, 'medium')).toBe(0);
  });

  it.each(DIFFICULTY_LEVELS)('should score the 75-move rule as zero at %s', (difficulty) => {
    const position = at('8/8/8/3k4/8/8/4R3/4K3 w - - 150 100');
    expect(position.status()).toBe('seventy_five_move_rule');
    expect(evaluate(position, difficulty)).toBe(0);
  });

  it('should score fivefold repetition as zero', () => {
    const position = Position.initial();
    for (let i = 0; i < 4; i++) {
      for (const [from, to] of [['g1', 'f3'], ['g8', 'f6'], ['f3', 'g1'], ['f6', 'g8']] as const) {
        position.makeMove({ from, to });
      }
    }
    expect(position.status()).toBe('fivefold_repetition');
    expect(evaluate(position, 'hard')).toBe(0);
  });
});

// =============================================================================
// Material
// =============================================================================

describe('Material', () => {
  it('should balance in the starting position', () => {
    expect(evaluate(Position.initial(), 'easy')).toBeCloseTo(0, 10);
  });

  it('should count piece values in pawns', () => {
    expect(evaluate(at(NO_BLACK_QUEEN), 'easy')).toBeCloseTo(9, 10);
    expect(evaluate(at(NO_BLACK_BISHOP), 'easy')).toBeCloseTo(3.25, 10);
  });

  it('should scale with the material weight', () => {
    const weights = { ...DEFAULT_EVAL_WEIGHTS, material: 2 };
    expect(evaluate(at(NO_BLACK_QUEEN), 'easy', weights)).toBeCloseTo(18, 10);
  });

  it('should leave the other layers at zero for easy', () => {
    const breakdown = evaluationBreakdown(Position.initial(), 'easy');
    expect(breakdown.pieceSquares).toBe(0);
    expect(breakdown.passedPawns).toBe(0);
    expect(breakdown.mobility).toBe(0);
    expect(breakdown.kingSafety).toBe(0);
  });
});

// =============================================================================
// Positional Layers
// =============================================================================

describe('Positional layers', () => {
  it('should count mobility for the side to move', () => {
    const white = evaluationBreakdown(Position.initial(), 'medium');
    expect(white.mobility).toBeCloseTo(2, 10);
    expect(white.pieceSquares).toBeCloseTo(0, 10);
    expect(white.total).toBeCloseTo(2, 10);

    const black = evaluationBreakdown(at('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR b KQkq - 0 1'), 'medium');
    expect(black.mobility).toBeCloseTo(-2, 10);
  });

  it('should report the game phase', () => {
    expect(evaluationBreakdown(Position.initial(), 'medium').gamePhase).toBe(1);
    expect(evaluationBreakdown(at(LONE_WHITE_PAWN), 'medium').gamePhase).toBe(0);
  });

  it('should reward a passed pawn, doubled in a bare endgame', () => {
    const endgame = evaluationBreakdown(at(LONE_WHITE_PAWN), 'medium');
    expect(endgame.passedPawns).toBeCloseTo(EVALUATION_TABLES.passedPawn[1] * 2, 10);

    const withQueens = evaluationBreakdown(at('3qk3/8/8/8/8/8/4P3/3QK3 w - - 0 1'), 'medium');
    expect(withQueens.gamePhase).toBeCloseTo(18 / 63, 10);
    expect(withQueens.passedPawns).toBeCloseTo(EVALUATION_TABLES.passedPawn[1] * (2 - 18 / 63), 10);
  });

  it('should not reward pawns blocked on the same or adjacent file', () => {
    expect(evaluationBreakdown(at('4k3/4p3/8/8/8/8/4P3/4K3 w - - 0 1'), 'medium').passedPawns).toBe(0);
    expect(evaluationBreakdown(at('4k3/3p4/8/8/8/8/4P3/4K3 w - - 0 1'), 'medium').passedPawns).toBe(0);
  });

  it('should score a mirrored position with the opposite sign', () => {
    const white = evaluate(at(LONE_WHITE_PAWN), 'medium');
    const black = evaluate(at('4k3/4p3/8/8/8/8/8/4K3 b - - 0 1'), 'medium');
    expect(white).toBeGreaterThan(0);
    expect(black).toBeCloseTo(-white, 10);
  });

  it('should scale positional layers with their weights', () => {
    const base = evaluationBreakdown(at(LONE_WHITE_PAWN), 'medium');
    const weighted = evaluationBreakdown(at(LONE_WHITE_PAWN), 'medium', {
      ...DEFAULT_EVAL_WEIGHTS,
      pieceSquare: 2,
      mobility: 0,
    });
    expect(weighted.pieceSquares).toBeCloseTo(base.pieceSquares * 2, 10);
    expect(weighted.passedPawns).toBeCloseTo(base.passedPawns * 2, 10);
    expect(weighted.mobility).toBe(0);
  });
});

// =============================================================================
// King Safety
// =============================================================================

describe('King safety', () => {
  it('should apply only at hard', () => {
    expect(evaluationBreakdown(at(ROOK_ON_F_FILE), 'medium').kingSafety).toBe(0);
    expect(evaluationBreakdown(at(ROOK_ON_F_FILE), 'hard').kingSafety).toBeCloseTo(0.2, 10);
  });

  it('should add to the medium score', () => {
    const medium = evaluate(at(ROOK_ON_F_FILE), 'medium');
    const hard = evaluate(at(ROOK_ON_F_FILE), 'hard');
    expect(hard - medium).toBeCloseTo(0.2, 10);
  });

  it('should find nothing wrong with both kings at home', () => {
    expect(evaluationBreakdown(Position.initial(), 'hard').kingSafety).toBeCloseTo(0, 10);
  });

  it('should scale with the king safety weight', () => {
    const weights = { ...DEFAULT_EVAL_WEIGHTS, kingSafety: 2 };
    expect(evaluationBreakdown(at(ROOK_ON_F_FILE), 'hard', weights).kingSafety).toBeCloseTo(0.4, 10);
  });
});

// =============================================================================
// Evaluator Class and Tables
// =============================================================================

describe('ChessEvaluator', () => {
  it('should match the functional form', () => {
    const evaluator = new ChessEvaluator({ difficulty: 'hard', weights: { mobility: 0.5 } });
    const position = at(ROOK_ON_F_FILE);
    expect(evaluator.evaluate(position)).toBe(
      evaluate(position, 'hard', { ...DEFAULT_EVAL_WEIGHTS, mobility: 0.5 }),
    );
  });

  it('should update weights', () => {
    const evaluator = new ChessEvaluator({ difficulty: 'easy' });
    evaluator.setWeights({ material: 0.5 });
    expect(evaluator.getWeights()).toEqual({ material: 0.5, pieceSquare: 1, mobility: 1, kingSafety: 1 });
    expect(evaluator.evaluate(at(NO_BLACK_QUEEN))).toBeCloseTo(4.5, 10);
  });

  it('should freeze the loaded tables', () => {
    expect(Object.isFrozen(EVALUATION_TABLES)).toBe(true);
    expect(Object.isFrozen(EVALUATION_TABLES.pawn)).toBe(true);
    expect(EVALUATION_TABLES.knight).toHaveLength(64);
  });

  it('should reject malformed tables', () => {
    const error = thrown(() => parseEvaluationTables({ ...EVALUATION_TABLES, rook: [0, 0, 0] }));
    expect(error).toMatchObject({ code: BotErrorCode.INVALID_CONFIGURATION });
  });
});
