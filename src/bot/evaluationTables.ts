/**
 * Piece-square and passed-pawn tables, read from data/evaluation-tables.json.
 *
 * Square tables hold 64 entries indexed rank * 8 + file from White's side
 * (a1 = 0); Black looks them up mirrored. Values are in pawns.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { BotError, BotErrorCode } from './errors.js';

const squareTable = z.array(z.number()).length(64);

const EvaluationTablesSchema = z.object({
  pawn: squareTable,
  knight: squareTable,
  bishop: squareTable,
  rook: squareTable,
  kingMiddlegame: squareTable,
  kingEndgame: squareTable,
  /** By rank counted from the pawn's own side */
  passedPawn: z.array(z.number()).length(8),
});

export type EvaluationTables = {
  readonly [K in keyof z.infer<typeof EvaluationTablesSchema>]: readonly number[];
};

const TABLES_URL = new URL('../../data/evaluation-tables.json', import.meta.url);

export function parseEvaluationTables(raw: unknown): EvaluationTables {
  const parsed = EvaluationTablesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BotError(
      BotErrorCode.INVALID_CONFIGURATION,
      `evaluation tables: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'malformed'}`,
    );
  }
  const t = parsed.data;
  return Object.freeze({
    pawn: Object.freeze(t.pawn),
    knight: Object.freeze(t.knight),
    bishop: Object.freeze(t.bishop),
    rook: Object.freeze(t.rook),
    kingMiddlegame: Object.freeze(t.kingMiddlegame),
    kingEndgame: Object.freeze(t.kingEndgame),
    passedPawn: Object.freeze(t.passedPawn),
  });
}

function loadEvaluationTables(): EvaluationTables {
  const raw: unknown = JSON.parse(readFileSync(TABLES_URL, 'utf8'));
  return parseEvaluationTables(raw);
}

export const EVALUATION_TABLES: EvaluationTables = loadEvaluationTables();
