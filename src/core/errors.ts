// Taxonomie des erreurs du scraper
// Fatales : SourceUnavailable, WriteFailed, RunCancelled
// Par instrument (skip) : FetchFailed, UnparseableRecord

export type ScraperErrorCode =
  | 'SourceUnavailable'
  | 'FetchFailed'
  | 'UnparseableRecord'
  | 'WriteFailed'
  | 'RunCancelled'
  | 'HttpStatus'
  | 'Config';

export type SkipReason = 'FetchFailed' | 'UnparseableRecord';

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class SourceUnavailableError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super('SourceUnavailable', message, cause);
  }
}

export class FetchFailedError extends ScraperError {
  constructor(
    readonly isin: string,
    message: string,
    cause?: unknown
  ) {
    super('FetchFailed', message, cause);
  }
}

export class UnparseableRecordError extends ScraperError {
  constructor(
    readonly isin: string,
    message: string
  ) {
    super('UnparseableRecord', message);
  }
}

export class WriteFailedError extends ScraperError {
  constructor(
    readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super('WriteFailed', message, cause);
  }
}

export class RunCancelledError extends ScraperError {
  constructor(message: string = 'Run cancelled') {
    super('RunCancelled', message);
  }
}

/**
 * Réponse HTTP hors 2xx. `status` vaut 0 pour un échec réseau ou un timeout.
 */
export class HttpStatusError extends ScraperError {
  constructor(
    readonly status: number,
    readonly url: string,
    message: string,
    readonly transient: boolean
  ) {
    super('HttpStatus', message);
  }
}

export class ConfigError extends ScraperError {
  constructor(readonly errors: string[]) {
    super('Config', `Invalid configuration: ${errors.join('; ')}`);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
