/**
 * Haven Error Codes and Classes
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  LEXICON_INVALID: 'LEXICON_INVALID',
  LEXICON_UNREADABLE: 'LEXICON_UNREADABLE',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Error Classes
// ============================================================================

export class HavenError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HavenError';
    this.code = code;
  }
}

/**
 * Raised while loading keyword and template tables. Fatal at startup.
 */
export class LexiconConfigError extends HavenError {
  readonly problems: string[];
  readonly source: string;

  constructor(source: string, problems: string[], code: ErrorCode = ErrorCodes.LEXICON_INVALID) {
    super(code, `Invalid lexicon (${source}): ${problems.join('; ')}`);
    this.name = 'LexiconConfigError';
    this.problems = problems;
    this.source = source;
  }
}

export class PersistenceError extends HavenError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.PERSISTENCE_FAILED, message, { cause });
    this.name = 'PersistenceError';
  }
}

export function isHavenError(error: unknown): error is HavenError {
  return error instanceof HavenError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
