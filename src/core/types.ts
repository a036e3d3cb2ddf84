import { z } from 'zod';

// Base types
export type Action = 'apply' | 'delete';
export type Manifest = Record<string, unknown>;

export const ActionSchema = z.enum(['apply', 'delete']);

// One unit of work. Built once from parsed input, never mutated afterwards.
export interface TargetObject {
  readonly apiVersion: string;
  readonly kind: string;
  readonly name: string;
  // As written in the manifest; part of the object's identity
  readonly namespace?: string;
  // Used by namespaced kinds that do not set one; cluster-scoped kinds ignore it
  readonly defaultNamespace?: string;
  readonly action: Action;
  readonly manifest: Readonly<Manifest>;
}

export interface ObjectRef {
  apiVersion: string;
  kind: string;
  namespace?: string;
  name: string;
}

export function toObjectRef(target: TargetObject): ObjectRef {
  const ref: ObjectRef = {
    apiVersion: target.apiVersion,
    kind: target.kind,
    name: target.name,
  };
  if (target.namespace !== undefined) {
    ref.namespace = target.namespace;
  }
  return ref;
}

export function formatObjectRef(ref: ObjectRef): string {
  const parts = [ref.apiVersion, ref.kind];
  if (ref.namespace) {
    parts.push(ref.namespace);
  }
  parts.push(ref.name);
  return parts.join('/');
}

// Serialisable view of the last error seen by an operation
export interface ErrorSummary {
  name: string;
  code: string;
  message: string;
  statusCode?: number;
  reason?: string;
  cause?: string;
}

// Progress of one operation as of its latest attempt
export interface OperationAttempt {
  attempt: number;
  elapsedMs: number;
  lastError?: ErrorSummary;
}

export type FailureReason = 'terminal' | 'timeout' | 'cancelled';

// Per-object state machine
export type OperationState =
  | { status: 'idle' }
  | { status: 'attempting'; attempt: number; startedAt: number }
  | { status: 'succeeded'; attempts: number; elapsedMs: number }
  | {
      status: 'failed';
      reason: FailureReason;
      error?: ErrorSummary;
      attempts: number;
      elapsedMs: number;
    };

export type SucceededOutcome = Extract<OperationState, { status: 'succeeded' }>;
export type FailedOutcome = Extract<OperationState, { status: 'failed' }>;
export type Outcome = SucceededOutcome | FailedOutcome;

export interface ObjectResult {
  object: ObjectRef;
  action: Action;
  outcome: Outcome;
}

export interface BatchReport {
  runId: string;
  applied: number;
  failed: number;
  results: ObjectResult[];
  elapsedMs: number;
  success: boolean;
}

// Single deadline shared by every operation of a batch
export interface GlobalBudget {
  readonly startedAt: number;
  readonly timeoutMs: number;
  readonly deadline?: number;
}

export function isSucceeded(outcome: Outcome): outcome is SucceededOutcome {
  return outcome.status === 'succeeded';
}

export function isFailed(outcome: Outcome): outcome is FailedOutcome {
  return outcome.status === 'failed';
}
