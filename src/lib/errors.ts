/**
 * Matchflow — Error Taxonomy
 *
 * Local failures (one provider, one backend, one item) are absorbed by the
 * component that owns them. Failures that compromise a whole operation are
 * thrown as one of these classes.
 */

import type { TrackedStatus } from '../types';

export type ErrorCode =
  | 'PROVIDER_FAILED'
  | 'AGGREGATION_FAILED'
  | 'BACKEND_FAILED'
  | 'EVALUATION_PARSE_FAILED'
  | 'INVALID_TRANSITION'
  | 'RECORD_NOT_FOUND'
  | 'PERSISTENCE_FAILED'
  | 'CONFIG_INVALID';

export class MatchflowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A single provider failed or timed out. Never fatal to a search.
 */
export class ProviderError extends MatchflowError {
  readonly provider: string;
  readonly reason: string;

  constructor(provider: string, reason: string, options?: { cause?: unknown }) {
    super('PROVIDER_FAILED', `${provider}: ${reason}`, options);
    this.provider = provider;
    this.reason = reason;
  }
}

export interface ProviderFailure {
  provider: string;
  error: string;
}

/**
 * Zero providers succeeded.
 */
export class AggregationError extends MatchflowError {
  readonly failures: ProviderFailure[];

  constructor(failures: ProviderFailure[]) {
    const detail = failures.length > 0
      ? failures.map(f => `${f.provider} (${f.error})`).join(', ')
      : 'no providers enabled';
    super('AGGREGATION_FAILED', `All providers failed: ${detail}`);
    this.failures = failures;
  }
}

/**
 * A backend call failed. Transient errors are retried; permanent ones
 * (auth, configuration, bad request) advance the fallback chain immediately.
 */
export class BackendError extends MatchflowError {
  readonly backend: string;
  readonly reason: string;
  readonly transient: boolean;

  constructor(
    backend: string,
    reason: string,
    options: { transient: boolean; cause?: unknown }
  ) {
    super('BACKEND_FAILED', `${backend}: ${reason}`, { cause: options.cause });
    this.backend = backend;
    this.reason = reason;
    this.transient = options.transient;
  }
}

/**
 * One item's score could not be read from a backend response.
 */
export class EvaluationParseError extends MatchflowError {
  readonly index: number;

  constructor(index: number, message: string) {
    super('EVALUATION_PARSE_FAILED', `Item ${index}: ${message}`);
    this.index = index;
  }
}

export class InvalidTransitionError extends MatchflowError {
  readonly fingerprint: string;
  readonly from: TrackedStatus;
  readonly to: TrackedStatus;

  constructor(fingerprint: string, from: TrackedStatus, to: TrackedStatus) {
    super('INVALID_TRANSITION', `Cannot move ${fingerprint} from ${from} to ${to}`);
    this.fingerprint = fingerprint;
    this.from = from;
    this.to = to;
  }
}

export class RecordNotFoundError extends MatchflowError {
  readonly fingerprint: string;

  constructor(fingerprint: string) {
    super('RECORD_NOT_FOUND', `No tracked record for ${fingerprint}`);
    this.fingerprint = fingerprint;
  }
}

/**
 * The store could not be durably written. The mutation did not happen.
 */
export class PersistenceError extends MatchflowError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', `${path}: ${message}`, options);
    this.path = path;
  }
}

export class ConfigError extends MatchflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
