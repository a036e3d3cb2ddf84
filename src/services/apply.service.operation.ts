import { CancelledError, InvariantError, toErrorSummary } from '../core/errors';
import type { Logger } from '../core/logger';
import {
  formatObjectRef,
  toObjectRef,
  type ErrorSummary,
  type FailedOutcome,
  type FailureReason,
  type ObjectRef,
  type OperationState,
  type Outcome,
  type TargetObject,
} from '../core/types';
import { admits, createBudget } from '../utils/backoff';
import { untilAborted } from '../utils/clock';
import { classifyError, type Verdict } from './apply.service.classify';
import { notify, type AttemptEvent } from './apply.service.events';
import type { OperationContext } from './apply.service.types';

type Status = OperationState['status'];
type Attempting = Extract<OperationState, { status: 'attempting' }>;

const LEGAL_TRANSITIONS: Record<Status, readonly Status[]> = {
  idle: ['attempting', 'failed'],
  attempting: ['attempting', 'succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

/**
 * Validate a state change; attempts must advance one at a time
 */
export function transition(from: OperationState, to: OperationState): OperationState {
  if (!LEGAL_TRANSITIONS[from.status].includes(to.status)) {
    throw new InvariantError(`Illegal operation transition ${from.status} -> ${to.status}`);
  }
  if (from.status === 'idle' && to.status === 'attempting' && to.attempt !== 1) {
    throw new InvariantError(`First attempt must be 1, got ${to.attempt}`);
  }
  if (from.status === 'attempting' && to.status === 'attempting' && to.attempt !== from.attempt + 1) {
    throw new InvariantError(`Attempt must advance from ${from.attempt} to ${from.attempt + 1}, got ${to.attempt}`);
  }
  return to;
}

type CallResult =
  | { status: 'ok' }
  | { status: 'error'; error: unknown }
  // `called` is false when the gate was never acquired
  | { status: 'cancelled'; called: boolean };

/**
 * Retry loop for a single object. Attempts are strictly sequential; the
 * concurrency gate is held only while the client call is in flight.
 */
export class ObjectOperation {
  private current: OperationState = { status: 'idle' };
  private lastError?: ErrorSummary;
  private readonly ref: ObjectRef;
  private readonly log: Logger;

  constructor(
    private readonly target: TargetObject,
    private readonly context: OperationContext
  ) {
    this.ref = toObjectRef(target);
    this.log = context.logger.child({
      object: formatObjectRef(this.ref),
      action: target.action,
    });
  }

  get state(): OperationState {
    return this.current;
  }

  /**
   * Drive the object to a terminal state. Never rejects.
   */
  async run(): Promise<Outcome> {
    const startedAt = this.context.clock.now();
    try {
      return await this.loop(startedAt);
    } catch (error) {
      this.log.error({ err: error }, 'Unexpected error in object operation');
      const attempts = this.current.status === 'attempting' ? this.current.attempt : 0;
      return this.fail('terminal', attempts, startedAt, toErrorSummary(error, 'unclassified'));
    }
  }

  private async loop(startedAt: number): Promise<Outcome> {
    const { clock, signal } = this.context;
    const budgets = this.context.operationTimeoutMs > 0
      ? [this.context.budget, createBudget(startedAt, this.context.operationTimeoutMs)]
      : [this.context.budget];

    if (signal?.aborted) {
      return this.fail('cancelled', 0, startedAt);
    }

    let attempting = this.moveTo({ status: 'attempting', attempt: 1, startedAt });
    this.log.debug('Starting operation');

    for (;;) {
      const result = await this.callOnce();

      if (result.status === 'cancelled') {
        if (!result.called) {
          return this.fail('cancelled', attempting.attempt - 1, startedAt, this.lastError);
        }
        this.emit(attempting.attempt, clock.now() - startedAt, { result: 'failed', failure: 'cancelled' });
        return this.fail('cancelled', attempting.attempt, startedAt, this.lastError);
      }

      if (result.status === 'ok') {
        const elapsedMs = clock.now() - startedAt;
        this.emit(attempting.attempt, elapsedMs, { result: 'succeeded' });
        return this.finish({ status: 'succeeded', attempts: attempting.attempt, elapsedMs });
      }

      const verdict = classifyError(result.error);
      this.lastError = toErrorSummary(result.error, verdict.cause);
      const now = clock.now();
      const elapsedMs = now - startedAt;

      if (verdict.kind === 'terminal') {
        return this.failAttempt('terminal', attempting.attempt, startedAt, verdict);
      }

      if (signal?.aborted) {
        return this.failAttempt('cancelled', attempting.attempt, startedAt, verdict);
      }

      const delay = this.context.backoff.nextDelay(attempting.attempt);
      if (!budgets.every(budget => admits(budget, now, delay))) {
        return this.failAttempt('timeout', attempting.attempt, startedAt, verdict);
      }

      this.emit(attempting.attempt, elapsedMs, {
        result: 'retrying',
        cause: verdict.cause,
        nextDelayMs: delay,
      });

      try {
        await clock.sleep(delay, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return this.fail('cancelled', attempting.attempt, startedAt, this.lastError);
        }
        throw error;
      }

      attempting = this.moveTo({
        status: 'attempting',
        attempt: attempting.attempt + 1,
        startedAt,
      });
    }
  }

  private async callOnce(): Promise<CallResult> {
    const { gate, client, signal } = this.context;

    try {
      await gate.acquire(signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        return { status: 'cancelled', called: false };
      }
      throw error;
    }

    try {
      // A call still in flight when the signal aborts is abandoned
      await untilAborted(
        this.target.action === 'apply'
          ? client.apply(this.target, signal)
          : client.delete(this.target, signal),
        signal
      );
      return { status: 'ok' };
    } catch (error) {
      if (error instanceof CancelledError && signal?.aborted) {
        return { status: 'cancelled', called: true };
      }
      return { status: 'error', error };
    } finally {
      gate.release();
    }
  }

  private moveTo(next: Attempting): Attempting {
    this.current = transition(this.current, next);
    return next;
  }

  private finish(outcome: Outcome): Outcome {
    this.current = transition(this.current, outcome);
    return outcome;
  }

  private failAttempt(
    reason: FailureReason,
    attempt: number,
    startedAt: number,
    verdict: Verdict
  ): Outcome {
    const elapsedMs = this.context.clock.now() - startedAt;
    this.emit(attempt, elapsedMs, { result: 'failed', cause: verdict.cause, failure: reason });
    return this.fail(reason, attempt, startedAt, this.lastError);
  }

  private fail(
    reason: FailureReason,
    attempts: number,
    startedAt: number,
    error?: ErrorSummary
  ): Outcome {
    const current = this.current;
    if (current.status === 'failed' || current.status === 'succeeded') {
      return current;
    }

    const outcome: FailedOutcome = {
      status: 'failed',
      reason,
      attempts,
      elapsedMs: this.context.clock.now() - startedAt,
    };
    if (error !== undefined) {
      outcome.error = error;
    }
    return this.finish(outcome);
  }

  private emit(
    attempt: number,
    elapsedMs: number,
    fields: Pick<AttemptEvent, 'result'> & Partial<Pick<AttemptEvent, 'cause' | 'failure' | 'nextDelayMs'>>
  ): void {
    const event: AttemptEvent = {
      runId: this.context.runId,
      object: this.ref,
      action: this.target.action,
      attempt,
      elapsedMs,
      ...fields,
    };
    if (fields.result !== 'succeeded' && this.lastError) {
      event.lastError = this.lastError;
    }
    notify(this.context.observer, observer => observer.onAttempt(event), this.log);
  }
}

export function runObjectOperation(target: TargetObject, context: OperationContext): Promise<Outcome> {
  return new ObjectOperation(target, context).run();
}
