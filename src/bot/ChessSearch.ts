/**
 * ChessSearch - Alpha-Beta Search with Iterative Deepening
 *
 * - Negamax with fail-soft alpha-beta pruning
 * - Iterative deepening under a cooperative deadline
 * - Captures-first move ordering
 * - Mate scores adjusted by distance so quicker mates win out
 *
 * Every trial move is played on a copy; the caller's Position is left alone.
 */

import type { Position } from '../chess/Position.js';
import type { Move } from '../chess/types.js';
import { ChessEvaluator, MATE_SCORE } from './ChessEvaluator.js';
import type { Deadline } from './Deadline.js';
import { BotError, BotErrorCode } from './errors.js';
import { orderMoves } from './moveOrdering.js';
import { DEFAULT_SEARCH_CONFIG, SearchConfig, SearchIteration, SearchResult } from './types.js';

/** Mutable state of one search, shared by every node */
export interface SearchContext {
  deadline: Deadline;
  nodes: number;
  /** Set once the deadline is seen expired; scores after that are meaningless */
  timedOut: boolean;
}

export interface RootResult {
  move: Move;
  score: number;
}

export class ChessSearch {
  private readonly config: SearchConfig;
  private readonly evaluator: ChessEvaluator;

  constructor(evaluator?: ChessEvaluator, config?: Partial<SearchConfig>) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
    this.evaluator = evaluator || new ChessEvaluator();
  }

  static createContext(deadline: Deadline): SearchContext {
    return { deadline, nodes: 0, timedOut: false };
  }

  /**
   * Best move found within `maxDepth` plies before the deadline.
   * A lone legal move is returned without searching; when not even depth 1
   * completes, the first legal move is returned.
   * @throws BotError NO_LEGAL_MOVES
   */
  selectMove(position: Position, maxDepth: number, deadline: Deadline): SearchResult {
    const startTime = deadline.now();
    const root = position.copy();
    const moves = root.legalMoves();

    if (moves.length === 0) {
      throw new BotError(BotErrorCode.NO_LEGAL_MOVES);
    }

    if (moves.length === 1) {
      return {
        move: moves[0],
        score: this.staticScore(root, 0),
        depth: 0,
        nodes: 0,
        timeMs: deadline.now() - startTime,
        timedOut: false,
        iterations: [],
      };
    }

    const context = ChessSearch.createContext(deadline);
    const iterations: SearchIteration[] = [];

    for (let depth = 1; depth <= maxDepth; depth++) {
      if (deadline.expired()) {
        context.timedOut = true;
        break;
      }

      const nodesBefore = context.nodes;
      const result = this.searchRoot(root, depth, context);
      // An interrupted iteration is thrown away
      if (context.timedOut || !result) break;

      iterations.push({ depth, move: result.move, score: result.score, nodes: context.nodes - nodesBefore });
    }

    const best = iterations.length > 0 ? iterations[iterations.length - 1] : null;
    return {
      move: best ? best.move : moves[0],
      score: best ? best.score : 0,
      depth: best ? best.depth : 0,
      nodes: context.nodes,
      timeMs: deadline.now() - startTime,
      timedOut: context.timedOut,
      iterations,
    };
  }

  /**
   * Search every root move to `depth` and report the best one. The first of
   * equally scored moves wins. Null when interrupted or there are no moves.
   */
  searchRoot(position: Position, depth: number, context: SearchContext): RootResult | null {
    const moves = this.order(position, position.legalMoves());
    let alpha = -Infinity;
    const beta = Infinity;
    let best: RootResult | null = null;

    for (const move of moves) {
      if (context.deadline.expired()) {
        context.timedOut = true;
        return null;
      }

      const child = position.copy();
      child.makeMove(move);
      const score = -this.search(child, depth - 1, -beta, -alpha, 1, context);
      if (context.timedOut) return null;

      if (!best || score > best.score) {
        best = { move, score };
      }
      if (score > alpha) alpha = score;
      if (this.config.useAlphaBeta && alpha >= beta) break;
    }

    return best;
  }

  /**
   * Negamax score of `position` for the side to move. Returns 0 once the
   * deadline has passed and marks the context as timed out.
   */
  search(
    position: Position,
    depth: number,
    alpha: number,
    beta: number,
    ply: number,
    context: SearchContext,
  ): number {
    if (context.deadline.expired()) {
      context.timedOut = true;
      return 0;
    }
    context.nodes++;

    if (depth <= 0 || position.isGameOver()) {
      return this.staticScore(position, ply);
    }

    const moves = position.legalMoves();
    if (moves.length === 0) {
      return this.staticScore(position, ply);
    }

    let maxScore = -Infinity;
    for (const move of this.order(position, moves)) {
      const child = position.copy();
      child.makeMove(move);
      const score = -this.search(child, depth - 1, -beta, -alpha, ply + 1, context);
      if (context.timedOut) return 0;

      if (score > maxScore) maxScore = score;
      if (score > alpha) alpha = score;
      if (this.config.useAlphaBeta && alpha >= beta) break;
    }

    return maxScore;
  }

  /**
   * Evaluation from the side to move's point of view, with mates pulled
   * toward zero by their distance from the root
   */
  private staticScore(position: Position, ply: number): number {
    let score = this.evaluator.evaluate(position);
    if (position.status() === 'checkmate') {
      score = score >= MATE_SCORE ? score - ply : score + ply;
    }
    return position.activeColor() === 'w' ? score : -score;
  }

  private order(position: Position, moves: readonly Move[]): readonly Move[] {
    return this.config.useMoveOrdering ? orderMoves(position, moves) : moves;
  }
}

/**
 * Perft - leaf count of the move tree, for checking move generation
 */
export function perft(position: Position, depth: number): number {
  if (depth === 0) return 1;

  let nodes = 0;
  for (const move of position.legalMoves()) {
    const child = position.copy();
    child.makeMove(move);
    nodes += perft(child, depth - 1);
  }
  return nodes;
}
