/**
 * Bot error codes and the error type every engine rejects with.
 */

export enum BotErrorCode {
  // Engine lifecycle (1xxx)
  ENGINE_CLOSED = 1001,
  NO_LEGAL_MOVES = 1002,

  // Configuration (2xxx)
  INVALID_CONFIGURATION = 2001,

  // Position input (3xxx)
  INVALID_FEN = 3001,
  ILLEGAL_MOVE = 3002,
}

export const BOT_ERROR_MESSAGES: Record<BotErrorCode, string> = {
  [BotErrorCode.ENGINE_CLOSED]: 'Engine is closed',
  [BotErrorCode.NO_LEGAL_MOVES]: 'No legal moves available',
  [BotErrorCode.INVALID_CONFIGURATION]: 'Invalid configuration',
  [BotErrorCode.INVALID_FEN]: 'Invalid FEN',
  [BotErrorCode.ILLEGAL_MOVE]: 'Illegal move',
};

export class BotError extends Error {
  readonly code: BotErrorCode;
  readonly details?: string;

  constructor(code: BotErrorCode, details?: string) {
    super(details ? `${BOT_ERROR_MESSAGES[code]}: ${details}` : BOT_ERROR_MESSAGES[code]);
    this.name = 'BotError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, BotError);
  }
}

export function isBotError(error: unknown): error is BotError {
  return error instanceof BotError;
}

/**
 * Message of anything thrown, for logs and match results
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
