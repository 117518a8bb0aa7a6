/**
 * Match export - a finished series as JSON
 *
 * One file per series, named after the export's timestamp:
 *   ~/.chess-bots/stats/match_2026-01-31_14-05-09.json
 */

import { mkdir, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import type { AggregateStats } from './stats.js';

export type GameOutcome = 'White' | 'Black' | 'Draw';

export interface GameExport {
  gameNumber: number;
  result: GameOutcome;
  /** Game status or the match runner's end reason */
  termination: string;
  moveCount: number;
  /** UCI moves in order */
  moves: string[];
  finalFen: string;
}

export interface SessionExport {
  /** ISO 8601, UTC */
  timestamp: string;
  whiteBot: string;
  blackBot: string;
  totalGames: number;
  whiteWins: number;
  blackWins: number;
  draws: number;
  averageMoves: number;
  games: GameExport[];
}

export const DEFAULT_EXPORT_DIR = join(homedir(), '.chess-bots', 'stats');

export function exportStats(stats: AggregateStats, timestamp: Date = new Date()): SessionExport {
  return {
    timestamp: timestamp.toISOString(),
    whiteBot: stats.whiteBotName,
    blackBot: stats.blackBotName,
    totalGames: stats.totalGames,
    whiteWins: stats.whiteWins,
    blackWins: stats.blackWins,
    draws: stats.draws,
    averageMoves: stats.avgMoveCount,
    games: stats.results.map((result): GameExport => ({
      gameNumber: result.gameNumber,
      result: result.winnerColor === 'w' ? 'White' : result.winnerColor === 'b' ? 'Black' : 'Draw',
      termination: result.endReason,
      moveCount: result.moveCount,
      moves: [...result.moves],
      finalFen: result.finalFen,
    })),
  };
}

/**
 * `match_YYYY-MM-DD_HH-MM-SS.json` from an ISO timestamp
 */
export function exportFileName(timestamp: string): string {
  const stamp = timestamp.slice(0, 19).replace('T', '_').replace(/:/g, '-');
  return `match_${stamp}.json`;
}

/**
 * Write the export as indented JSON, creating `dir` if needed.
 * Resolves to the file's path.
 */
export async function saveSessionExport(exported: SessionExport, dir: string = DEFAULT_EXPORT_DIR): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = join(dir, exportFileName(exported.timestamp));
  await writeFile(filePath, JSON.stringify(exported, null, 2), 'utf-8');
  return filePath;
}
