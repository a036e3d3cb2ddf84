import { ApiError } from '../core/errors';

/**
 * Retry decision for a failed apply/delete call.
 *
 * Ordering problems between objects of one batch (a Pod sent before its
 * Namespace, a custom resource before its CRD) show up here as retryable
 * errors. Anything that cannot be recognised is terminal.
 */

export type RetryableCause =
  | 'network'
  | 'unavailable'
  | 'kind-not-recognized'
  | 'not-found'
  | 'server-error'
  | 'throttled'
  | 'request-timeout';

export type TerminalCause =
  | 'invalid'
  | 'unauthorized'
  | 'forbidden'
  | 'conflict'
  | 'unsupported'
  | 'gone'
  | 'unclassified';

export type Verdict =
  | { kind: 'retryable'; cause: RetryableCause }
  | { kind: 'terminal'; cause: TerminalCause };

const retryable = (cause: RetryableCause): Verdict => ({ kind: 'retryable', cause });
const terminal = (cause: TerminalCause): Verdict => ({ kind: 'terminal', cause });

export function classifyError(error: unknown): Verdict {
  if (!(error instanceof ApiError)) {
    return terminal('unclassified');
  }

  switch (error.category) {
    case 'network':
      return retryable('network');
    case 'discovery':
      return retryable('kind-not-recognized');
    case 'status':
      return classifyStatus(error.statusCode, error.reason);
  }
}

export function classifyStatus(statusCode: number | undefined, reason?: string): Verdict {
  if (reason === 'ServiceUnavailable' || statusCode === 503) {
    return retryable('unavailable');
  }
  if (reason === 'Timeout' || reason === 'ServerTimeout' || statusCode === 408) {
    return retryable('request-timeout');
  }
  if (statusCode === undefined) {
    return terminal('unclassified');
  }
  if (statusCode >= 500 && statusCode <= 599) {
    return retryable('server-error');
  }

  switch (statusCode) {
    case 404:
      // Namespace or owner not created yet by a sibling operation
      return retryable('not-found');
    case 429:
      return retryable('throttled');
    case 400:
    case 422:
      return terminal('invalid');
    case 401:
      return terminal('unauthorized');
    case 403:
      return terminal('forbidden');
    case 409:
      return terminal('conflict');
    case 405:
    case 406:
    case 415:
      return terminal('unsupported');
    case 410:
      return terminal('gone');
    default:
      return terminal('unclassified');
  }
}

export function isRetryable(verdict: Verdict): verdict is Extract<Verdict, { kind: 'retryable' }> {
  return verdict.kind === 'retryable';
}
