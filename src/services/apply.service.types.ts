import type { Logger } from '../core/logger';
import type { GlobalBudget, TargetObject } from '../core/types';
import type { BackoffOptions, BackoffPolicy } from '../utils/backoff';
import type { Bulkhead } from '../utils/bulkhead';
import type { Clock } from '../utils/clock';
import type { ApplyObserver } from './apply.service.events';

/**
 * Cluster API surface consumed by the apply service. Both calls are
 * idempotent; delete resolves when the object is already gone.
 * Failures are reported as ApiError. An aborted signal means the caller has
 * stopped waiting, so no further request should be started.
 */
export interface ApiClient {
  apply(target: TargetObject, signal?: AbortSignal): Promise<void>;
  delete(target: TargetObject, signal?: AbortSignal): Promise<void>;
}

export interface BatchOptions {
  client: ApiClient;
  // 0 = unbounded
  parallelism: number;
  // 0 = no deadline
  timeoutMs: number;
  // Per-object limit on top of the batch deadline, 0 = none
  operationTimeoutMs?: number;
  observer?: ApplyObserver;
  signal?: AbortSignal;
  backoff?: BackoffPolicy | Partial<BackoffOptions>;
  clock?: Clock;
  runId?: string;
}

// Everything an object operation shares with its siblings; read-only except the gate
export interface OperationContext {
  readonly runId: string;
  readonly client: ApiClient;
  readonly gate: Bulkhead;
  readonly budget: GlobalBudget;
  readonly operationTimeoutMs: number;
  readonly backoff: BackoffPolicy;
  readonly clock: Clock;
  readonly observer: ApplyObserver;
  readonly signal?: AbortSignal;
  readonly logger: Logger;
}
