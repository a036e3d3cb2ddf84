import type { ErrorSummary } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

export type ApiVerb = 'apply' | 'delete' | 'discover';

// 'status': the server answered with a Status object
// 'network': the request never got a response
// 'discovery': the API group/version/kind is not served (yet)
export type ApiErrorCategory = 'status' | 'network' | 'discovery';

export interface ApiErrorInit {
  verb: ApiVerb;
  category: ApiErrorCategory;
  statusCode?: number;
  reason?: string;
  networkCode?: string;
  details?: Record<string, unknown>;
}

// Failure reported by the cluster API client
export class ApiError extends DomainError {
  readonly code = 'API_ERROR';
  readonly verb: ApiVerb;
  readonly category: ApiErrorCategory;
  readonly statusCode?: number;
  readonly reason?: string;
  readonly networkCode?: string;

  constructor(message: string, init: ApiErrorInit) {
    super(message, {
      verb: init.verb,
      category: init.category,
      statusCode: init.statusCode,
      reason: init.reason,
      ...init.details,
    });
    this.verb = init.verb;
    this.category = init.category;
    this.statusCode = init.statusCode;
    this.reason = init.reason;
    this.networkCode = init.networkCode;
  }

  static status(verb: ApiVerb, statusCode: number, message: string, reason?: string): ApiError {
    return new ApiError(message, { verb, category: 'status', statusCode, reason });
  }

  static network(verb: ApiVerb, message: string, networkCode?: string): ApiError {
    return new ApiError(message, { verb, category: 'network', networkCode });
  }

  static kindNotRecognized(apiVersion: string, kind: string, statusCode?: number): ApiError {
    return new ApiError(`Unrecognized API version and kind: ${apiVersion} ${kind}`, {
      verb: 'discover',
      category: 'discovery',
      statusCode,
      reason: 'NotFound',
      details: { apiVersion, kind },
    });
  }
}

// Invalid configuration or arguments; fails the batch before any operation starts
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }

  static invalidParallelism(value: unknown): ValidationError {
    return new ValidationError(
      `Invalid parallelism: ${String(value)}. Parallelism must be a non-negative integer.`,
      'parallelism',
      value
    );
  }

  static invalidTimeout(value: unknown): ValidationError {
    return new ValidationError(
      `Invalid timeout: ${String(value)}. Timeout must be a non-negative number.`,
      'timeout',
      value
    );
  }
}

export interface ManifestIssue {
  document: number;
  message: string;
}

// Input documents that cannot become target objects
export class ManifestError extends DomainError {
  readonly code = 'MANIFEST_ERROR';

  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: ManifestIssue[] = []
  ) {
    super(message, { source, issues });
  }

  static invalidDocuments(source: string, issues: ManifestIssue[]): ManifestError {
    const lines = issues.map(issue => `document ${issue.document}: ${issue.message}`);
    return new ManifestError(
      `Invalid manifest in ${source}:\n  ${lines.join('\n  ')}`,
      source,
      issues
    );
  }

  static unreadable(source: string, cause: unknown): ManifestError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ManifestError(`Failed to read manifests from ${source}: ${message}`, source);
  }
}

export class CancelledError extends DomainError {
  readonly code = 'CANCELLED';

  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

// Raised on an illegal state machine transition; indicates a bug, never an API condition
export class InvariantError extends DomainError {
  readonly code = 'INVARIANT_ERROR';
}

/**
 * Reduce any thrown value to the summary stored in outcomes and events
 */
export function toErrorSummary(error: unknown, cause?: string): ErrorSummary {
  const summary: ErrorSummary =
    error instanceof DomainError
      ? { name: error.name, code: error.code, message: error.message }
      : error instanceof Error
        ? { name: error.name, code: 'UNEXPECTED_ERROR', message: error.message }
        : { name: 'Error', code: 'UNEXPECTED_ERROR', message: String(error) };

  if (error instanceof ApiError) {
    if (error.statusCode !== undefined) {
      summary.statusCode = error.statusCode;
    }
    if (error.reason !== undefined) {
      summary.reason = error.reason;
    }
  }
  if (cause !== undefined) {
    summary.cause = cause;
  }
  return summary;
}
