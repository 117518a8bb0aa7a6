/**
 * Match Export Tests
 */

import { afterEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DRAW, MatchResult } from '../src/match/BotMatch.js';
import { exportFileName, exportStats, saveSessionExport } from '../src/match/export.js';
import { computeStats } from '../src/match/stats.js';

const TIMESTAMP = new Date('2026-01-31T14:05:09.250Z');

function game(gameNumber: number, winnerColor: MatchResult['winnerColor'], moves: string[]): MatchResult {
  return {
    gameNumber,
    winner: winnerColor === 'w' ? 'Medium Bot' : winnerColor === 'b' ? 'Easy Bot' : DRAW,
    winnerColor,
    endReason: winnerColor ? 'checkmate' : 'move limit exceeded',
    moveCount: moves.length,
    durationMs: 10,
    finalFen: `fen ${gameNumber}`,
    moves,
  };
}

const RESULTS = [
  game(1, 'w', ['e2e4', 'e7e5', 'd1h5']),
  game(2, null, ['g1f3']),
  game(3, 'b', ['f2f3', 'e7e5', 'g2g4', 'd8h4']),
];

describe('exportStats', () => {
  it('should summarise the series and list every game', () => {
    const exported = exportStats(computeStats(RESULTS, 'Medium Bot', 'Easy Bot'), TIMESTAMP);

    expect(exported).toEqual({
      timestamp: '2026-01-31T14:05:09.250Z',
      whiteBot: 'Medium Bot',
      blackBot: 'Easy Bot',
      totalGames: 3,
      whiteWins: 1,
      blackWins: 1,
      draws: 1,
      averageMoves: 8 / 3,
      games: [
        {
          gameNumber: 1,
          result: 'White',
          termination: 'checkmate',
          moveCount: 3,
          moves: ['e2e4', 'e7e5', 'd1h5'],
          finalFen: 'fen 1',
        },
        {
          gameNumber: 2,
          result: 'Draw',
          termination: 'move limit exceeded',
          moveCount: 1,
          moves: ['g1f3'],
          finalFen: 'fen 2',
        },
        {
          gameNumber: 3,
          result: 'Black',
          termination: 'checkmate',
          moveCount: 4,
          moves: ['f2f3', 'e7e5', 'g2g4', 'd8h4'],
          finalFen: 'fen 3',
        },
      ],
    });
  });

  it('should export an empty series', () => {
    const exported = exportStats(computeStats([], 'Hard Bot', 'Hard Bot'), TIMESTAMP);
    expect(exported).toMatchObject({ totalGames: 0, averageMoves: 0, games: [] });
  });
});

describe('exportFileName', () => {
  it('should name the file after the timestamp to the second', () => {
    expect(exportFileName('2026-01-31T14:05:09.250Z')).toBe('match_2026-01-31_14-05-09.json');
  });
});

describe('saveSessionExport', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('should write indented JSON into a new directory', async () => {
    dir = await mkdtemp(join(tmpdir(), 'chess-bots-export-'));
    const target = join(dir, 'nested', 'stats');
    const exported = exportStats(computeStats(RESULTS, 'Medium Bot', 'Easy Bot'), TIMESTAMP);

    const filePath = await saveSessionExport(exported, target);

    expect(filePath).toBe(join(target, 'match_2026-01-31_14-05-09.json'));
    const text = await readFile(filePath, 'utf-8');
    expect(text).toBe(JSON.stringify(exported, null, 2));
    expect(JSON.parse(text)).toEqual(exported);
  });
});
