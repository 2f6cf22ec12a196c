/**
 * Research Core Errors
 *
 * Typed failures surfaced by the research core. Only InsufficientHistoryError
 * and JobNotFoundError are meant to reach callers; provider and HTTP failures
 * are recovered internally by failover.
 */

export class ProviderFailureError extends Error {
  readonly code = 'PROVIDER_FAILURE' as const;
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
    this.name = 'ProviderFailureError';
  }
}

export class InsufficientHistoryError extends Error {
  readonly code = 'INSUFFICIENT_HISTORY' as const;
  constructor(
    readonly jobId: string,
    readonly runCount: number,
  ) {
    super(`Not enough history to compute diff for job ${jobId}: ${runCount}/2 runs recorded`);
    this.name = 'InsufficientHistoryError';
  }
}

export class JobNotFoundError extends Error {
  readonly code = 'JOB_NOT_FOUND' as const;
  constructor(readonly jobId: string) {
    super(`Research job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG' as const;
  constructor(readonly keys: string[], message: string) {
    super(`Invalid configuration (${keys.join(', ')}): ${message}`);
    this.name = 'ConfigError';
  }
}

export class HttpRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: 'HTTP_ERROR' | 'TIMEOUT' | 'INVALID_RESPONSE',
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
