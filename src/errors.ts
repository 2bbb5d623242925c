import type { CandidateType } from './types';

export class SearchError extends Error {
  readonly statusCode: number;
  readonly publicMessage: string;

  constructor(message: string, statusCode: number, publicMessage: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.publicMessage = publicMessage;
  }
}

export class InvalidQueryError extends SearchError {
  constructor() {
    super('Query is empty after trimming', 400, 'Invalid query');
  }
}

export class SearchUnavailableError extends SearchError {
  constructor(attempts: number, cause: unknown) {
    super(`Search failed after ${attempts} attempts`, 503, 'Service unavailable', { cause });
  }
}

/** A single content type could not be fetched; recovered locally and never surfaced. */
export class PartialFetchFailure extends Error {
  readonly candidateType: CandidateType;

  constructor(candidateType: CandidateType, cause: unknown) {
    super(`${candidateType} fetch failed: ${describeError(cause)}`, { cause });
    this.name = 'PartialFetchFailure';
    this.candidateType = candidateType;
  }
}

/** Raised when no content type could be fetched; triggers the search retry policy. */
export class RepositoryUnavailableError extends Error {
  readonly failures: PartialFetchFailure[];

  constructor(failures: PartialFetchFailure[]) {
    super(`All content fetches failed: ${failures.map((f) => f.message).join('; ')}`);
    this.name = 'RepositoryUnavailableError';
    this.failures = failures;
  }
}

export class UnknownCollectionError extends Error {
  constructor(collection: string) {
    super(`Unknown collection: ${collection}`);
    this.name = 'UnknownCollectionError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
