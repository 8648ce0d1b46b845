import type { ZodIssue } from 'zod';

export type NewsdeskErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CORPUS_UNAVAILABLE'
  | 'CORPUS_INVALID'
  | 'CORPUS_CONFLICT'
  | 'NOT_FOUND'
  | 'SIGNING_UNAVAILABLE';

/**
 * Base class for every error the core raises on purpose.
 * `code` is what crosses the tool boundary; messages are for humans.
 */
export class NewsdeskError extends Error {
  constructor(
    message: string,
    public readonly code: NewsdeskErrorCode,
  ) {
    super(message);
    this.name = 'NewsdeskError';
  }
}

/** Bad section name, empty query, out-of-range limit, unparseable timestamp. */
export class InvalidArgumentError extends NewsdeskError {
  constructor(
    message: string,
    public readonly argument?: string,
  ) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/** No snapshot has been loaded yet. */
export class CorpusUnavailableError extends NewsdeskError {
  constructor(message = 'Corpus not loaded yet') {
    super(message, 'CORPUS_UNAVAILABLE');
    this.name = 'CorpusUnavailableError';
  }
}

export class CorpusLoadError extends NewsdeskError {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(message, 'CORPUS_INVALID');
    this.name = 'CorpusLoadError';
  }
}

export class CorpusValidationError extends CorpusLoadError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
    filePath?: string,
  ) {
    super(message, filePath);
    this.name = 'CorpusValidationError';
  }
}

/** A refresh tried to rewrite history (published timestamps, stale statistics). */
export class CorpusConflictError extends NewsdeskError {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message, 'CORPUS_CONFLICT');
    this.name = 'CorpusConflictError';
  }
}

export class NotFoundError extends NewsdeskError {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/** Key material is missing or unusable. Never reported as a data error. */
export class SigningUnavailableError extends NewsdeskError {
  constructor(message: string) {
    super(message, 'SIGNING_UNAVAILABLE');
    this.name = 'SigningUnavailableError';
  }
}

export function isNewsdeskError(err: unknown): err is NewsdeskError {
  return err instanceof NewsdeskError;
}
