import type { MatchResult } from './BotMatch.js';

export interface AggregateStats {
  totalGames: number;
  whiteBotName: string;
  blackBotName: string;
  whiteWins: number;
  blackWins: number;
  draws: number;
  /** 0-100 */
  whiteWinPct: number;
  blackWinPct: number;
  avgMoveCount: number;
  avgDurationMs: number;
  shortestGame: MatchResult | null;
  longestGame: MatchResult | null;
  results: MatchResult[];
}

/**
 * Totals over a series of games between the same two bots. Wins are counted
 * by color, so a bot playing itself is scored correctly. The first game wins
 * ties for shortest and longest.
 */
export function computeStats(results: readonly MatchResult[], whiteName: string, blackName: string): AggregateStats {
  const stats: AggregateStats = {
    totalGames: results.length,
    whiteBotName: whiteName,
    blackBotName: blackName,
    whiteWins: 0,
    blackWins: 0,
    draws: 0,
    whiteWinPct: 0,
    blackWinPct: 0,
    avgMoveCount: 0,
    avgDurationMs: 0,
    shortestGame: null,
    longestGame: null,
    results: [...results],
  };
  if (results.length === 0) return stats;

  let totalMoves = 0;
  let totalDuration = 0;

  for (const result of results) {
    if (result.winnerColor === 'w') stats.whiteWins++;
    else if (result.winnerColor === 'b') stats.blackWins++;
    else stats.draws++;

    totalMoves += result.moveCount;
    totalDuration += result.durationMs;

    if (!stats.shortestGame || result.moveCount < stats.shortestGame.moveCount) stats.shortestGame = result;
    if (!stats.longestGame || result.moveCount > stats.longestGame.moveCount) stats.longestGame = result;
  }

  const total = results.length;
  stats.whiteWinPct = (stats.whiteWins / total) * 100;
  stats.blackWinPct = (stats.blackWins / total) * 100;
  stats.avgMoveCount = totalMoves / total;
  stats.avgDurationMs = totalDuration / total;

  return stats;
}
