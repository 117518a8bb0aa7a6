#!/usr/bin/env node
/**
 * chess-bots CLI
 *
 * Usage: chess-bots <command> [fen]
 *
 * Commands:
 *   move <fen>   - Pick a move for the side to move
 *   eval <fen>   - Show the evaluation by layer
 *   match        - Play bots against each other
 */

import chalk from 'chalk';
import meow from 'meow';
import { evaluationBreakdown } from './bot/ChessEvaluator.js';
import { errorMessage } from './bot/errors.js';
import { createEngine, createMinimaxEngine } from './bot/factory.js';
import { Difficulty, isDifficulty } from './bot/types.js';
import { Position } from './chess/Position.js';
import { moveToUci } from './chess/moves.js';
import { STARTING_FEN } from './chess/types.js';
import { loadConfig } from './config.js';
import { DRAW, MatchResult } from './match/BotMatch.js';
import { exportStats, saveSessionExport } from './match/export.js';
import { runMatches } from './match/runMatches.js';

const cli = meow(`
  Usage
    $ chess-bots <command> [fen]

  Commands
    move <fen>     Pick a move for the side to move
    eval <fen>     Show the evaluation by layer
    match          Play bots against each other

  Options
    --difficulty, -d  easy | medium | hard (default: medium)
    --depth           Search depth, 1-20
    --time, -t        Time limit per move in milliseconds
    --white           White bot difficulty for match (default: medium)
    --black           Black bot difficulty for match (default: easy)
    --games, -g       Games to play in a match (default: 1)
    --max-moves       Plies before a match game is drawn
    --concurrency, -c Match games in flight at once (default: from CPU count)
    --export          Save the match results as JSON
    --export-dir      Directory for --export (default: ~/.chess-bots/stats)
    --verbose, -v     Log search iterations and game results

  Examples
    $ chess-bots move "rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1" -d hard
    $ chess-bots eval "6k1/5ppp/8/8/8/8/8/R6K w - - 0 1"
    $ chess-bots match --white hard --black medium --games 8 -c 4 --export
`, {
  importMeta: import.meta,
  flags: {
    difficulty: {
      type: 'string',
      shortFlag: 'd',
      default: 'medium',
    },
    depth: {
      type: 'number',
    },
    time: {
      type: 'number',
      shortFlag: 't',
    },
    white: {
      type: 'string',
      default: 'medium',
    },
    black: {
      type: 'string',
      default: 'easy',
    },
    games: {
      type: 'number',
      shortFlag: 'g',
      default: 1,
    },
    maxMoves: {
      type: 'number',
    },
    concurrency: {
      type: 'number',
      shortFlag: 'c',
    },
    export: {
      type: 'boolean',
      default: false,
    },
    exportDir: {
      type: 'string',
    },
    verbose: {
      type: 'boolean',
      shortFlag: 'v',
      default: false,
    },
  },
});

function difficultyFlag(value: string, flag: string): Difficulty {
  if (!isDifficulty(value)) {
    throw new Error(`--${flag} must be easy, medium or hard (got "${value}")`);
  }
  return value;
}

function formatScore(score: number): string {
  const text = score.toFixed(2);
  return score > 0 ? chalk.green(`+${text}`) : score < 0 ? chalk.red(text) : text;
}

async function runMove(fen: string, debug: boolean): Promise<void> {
  const difficulty = difficultyFlag(cli.flags.difficulty, 'difficulty');
  const position = Position.fromFen(fen);
  const options = { searchDepth: cli.flags.depth, timeLimitMs: cli.flags.time, debug };

  if (difficulty === 'easy') {
    const engine = createEngine(difficulty, options);
    const move = await engine.selectMove(position);
    console.log(`${chalk.bold(engine.name())}: ${chalk.cyan(moveToUci(move))}`);
    await engine.close();
    return;
  }

  const engine = createMinimaxEngine(difficulty, options);
  const move = await engine.selectMove(position);
  const search = engine.getLastSearch();
  console.log(`${chalk.bold(engine.name())}: ${chalk.cyan(moveToUci(move))}`);
  if (search) {
    console.log(`  score  ${formatScore(search.score)}`);
    console.log(`  depth  ${search.depth}${search.timedOut ? chalk.yellow(' (time limit)') : ''}`);
    console.log(`  nodes  ${search.nodes.toLocaleString()}`);
    console.log(`  time   ${search.timeMs}ms`);
  }
  await engine.close();
}

function runEval(fen: string): void {
  const difficulty = difficultyFlag(cli.flags.difficulty, 'difficulty');
  const position = Position.fromFen(fen);
  const breakdown = evaluationBreakdown(position, difficulty);

  console.log(position.ascii());
  console.log(`Status: ${position.status()}`);
  console.log(`Phase:  ${breakdown.gamePhase.toFixed(2)}`);
  console.log(`Material      ${formatScore(breakdown.material)}`);
  console.log(`Piece-square  ${formatScore(breakdown.pieceSquares)}`);
  console.log(`Passed pawns  ${formatScore(breakdown.passedPawns)}`);
  console.log(`Mobility      ${formatScore(breakdown.mobility)}`);
  console.log(`King safety   ${formatScore(breakdown.kingSafety)}`);
  console.log(chalk.bold(`Total         ${formatScore(breakdown.total)}`));
}

function describeResult(result: MatchResult): string {
  const winner = result.winner === DRAW ? chalk.yellow(DRAW) : chalk.green(result.winner);
  return `Game ${result.gameNumber}: ${winner} - ${result.endReason} (${result.moveCount} plies, ${result.durationMs}ms)`;
}

async function runMatch(fen: string | undefined, debug: boolean): Promise<void> {
  const config = loadConfig();
  const whiteLevel = difficultyFlag(cli.flags.white, 'white');
  const blackLevel = difficultyFlag(cli.flags.black, 'black');
  const engineOptions = { timeLimitMs: cli.flags.time, searchDepth: cli.flags.depth, debug };

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const series = await runMatches({
      games: cli.flags.games,
      concurrency: cli.flags.concurrency ?? config.concurrency,
      createWhite: () => createEngine(whiteLevel, engineOptions),
      createBlack: () => createEngine(blackLevel, engineOptions),
      match: {
        startFen: fen,
        maxMoves: cli.flags.maxMoves ?? config.maxMoves,
        moveTimeoutMs: config.moveTimeoutMs,
        debug,
      },
      signal: controller.signal,
      onGameEnd: (result) => console.log(describeResult(result)),
    });

    const { stats } = series;
    console.log('');
    if (series.aborted) {
      console.log(chalk.yellow(`Interrupted after ${stats.totalGames} of ${cli.flags.games} games`));
    }
    console.log(chalk.bold(`${stats.whiteBotName} (White) vs ${stats.blackBotName} (Black)`));
    console.log(`  White wins  ${stats.whiteWins} (${stats.whiteWinPct.toFixed(1)}%)`);
    console.log(`  Black wins  ${stats.blackWins} (${stats.blackWinPct.toFixed(1)}%)`);
    console.log(`  Draws       ${stats.draws}`);
    console.log(`  Avg plies   ${stats.avgMoveCount.toFixed(1)}`);
    console.log(`  Avg time    ${Math.round(stats.avgDurationMs)}ms`);

    if (cli.flags.export || cli.flags.exportDir) {
      const filePath = await saveSessionExport(exportStats(stats), cli.flags.exportDir);
      console.log(`Saved ${chalk.cyan(filePath)}`);
    }
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function main(): Promise<void> {
  const [command, ...args] = cli.input;
  const fen = args.length > 0 ? args.join(' ') : undefined;

  if (!command || command === 'help') {
    cli.showHelp();
    return;
  }

  try {
    const debug = cli.flags.verbose || loadConfig().debug;
    switch (command) {
      case 'move':
        await runMove(fen ?? STARTING_FEN, debug);
        break;
      case 'eval':
        runEval(fen ?? STARTING_FEN);
        break;
      case 'match':
        await runMatch(fen, debug);
        break;
      default:
        console.error(chalk.red(`Unknown command: ${command}`));
        cli.showHelp(2);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    if (cli.flags.verbose) {
      console.error(error);
    }
    process.exit(1);
  }
}

main().catch(console.error);
