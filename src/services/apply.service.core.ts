import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ValidationError } from '../core/errors';
import { logger } from '../core/logger';
import {
  isSucceeded,
  toObjectRef,
  type BatchReport,
  type ObjectResult,
  type Outcome,
  type TargetObject,
} from '../core/types';
import { BackoffPolicy, createBudget } from '../utils/backoff';
import { Bulkhead } from '../utils/bulkhead';
import { systemClock } from '../utils/clock';
import { LoggingObserver, notify } from './apply.service.events';
import { runObjectOperation } from './apply.service.operation';
import type { BatchOptions, OperationContext } from './apply.service.types';

const BatchLimitsSchema = z.object({
  parallelism: z.number().int().min(0),
  timeoutMs: z.number().finite().min(0),
  operationTimeoutMs: z.number().finite().min(0).optional(),
});

function validateLimits(options: BatchOptions): void {
  const parsed = BatchLimitsSchema.safeParse({
    parallelism: options.parallelism,
    timeoutMs: options.timeoutMs,
    operationTimeoutMs: options.operationTimeoutMs,
  });
  if (parsed.success) {
    return;
  }

  const issue = parsed.error.errors[0];
  switch (issue?.path[0]) {
    case 'parallelism':
      throw ValidationError.invalidParallelism(options.parallelism);
    case 'timeoutMs':
      throw ValidationError.invalidTimeout(options.timeoutMs);
    default:
      throw new ValidationError(
        `Invalid batch options: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
        issue?.path.join('.'),
        options.operationTimeoutMs
      );
  }
}

export function buildReport(
  runId: string,
  objects: readonly TargetObject[],
  outcomes: readonly Outcome[],
  elapsedMs: number
): BatchReport {
  const results: ObjectResult[] = objects.map((target, index) => {
    const outcome = outcomes[index];
    if (outcome === undefined) {
      throw new Error(`Missing outcome for object at index ${index}`);
    }
    return { object: toObjectRef(target), action: target.action, outcome };
  });
  const applied = results.filter(result => isSucceeded(result.outcome)).length;

  return {
    runId,
    applied,
    failed: results.length - applied,
    results,
    elapsedMs,
    success: applied === results.length,
  };
}

/**
 * Apply every object independently and in no particular order.
 *
 * Each object gets its own retry loop; a failure, terminal or not, never
 * cancels its siblings. Resolves once every object has an outcome, or once
 * the signal aborts and in-flight calls have returned.
 */
export async function applyBatch(
  objects: readonly TargetObject[],
  options: BatchOptions
): Promise<BatchReport> {
  validateLimits(options);

  const clock = options.clock ?? systemClock;
  const runId = options.runId ?? uuidv4();
  const backoff = options.backoff instanceof BackoffPolicy
    ? options.backoff
    : new BackoffPolicy(options.backoff);
  const log = logger.child({ runId });
  const startedAt = clock.now();

  const context: OperationContext = {
    runId,
    client: options.client,
    gate: new Bulkhead({ name: 'apply', limit: options.parallelism }),
    budget: createBudget(startedAt, options.timeoutMs),
    operationTimeoutMs: options.operationTimeoutMs ?? 0,
    backoff,
    clock,
    observer: options.observer ?? new LoggingObserver(log),
    signal: options.signal,
    logger: log,
  };

  log.info({
    objects: objects.length,
    parallelism: options.parallelism === 0 ? 'unbounded' : options.parallelism,
    timeoutMs: options.timeoutMs === 0 ? 'infinite' : options.timeoutMs,
  }, 'Applying objects');

  const outcomes = await Promise.all(objects.map(target => runObjectOperation(target, context)));

  const report = buildReport(runId, objects, outcomes, clock.now() - startedAt);
  log.debug({ gate: context.gate.getStats() }, 'Batch finished');
  notify(context.observer, observer => observer.onReport(report), log);
  return report;
}
