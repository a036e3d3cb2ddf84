import { logger as rootLogger, type Logger } from '../core/logger';
import {
  formatObjectRef,
  isFailed,
  type Action,
  type BatchReport,
  type FailureReason,
  type ObjectRef,
  type OperationAttempt,
} from '../core/types';
import type { RetryableCause, TerminalCause } from './apply.service.classify';

export type AttemptResult = 'succeeded' | 'retrying' | 'failed';

// One client call made on behalf of one object
export interface AttemptEvent extends OperationAttempt {
  runId: string;
  object: ObjectRef;
  action: Action;
  result: AttemptResult;
  cause?: RetryableCause | TerminalCause;
  failure?: FailureReason;
  nextDelayMs?: number;
}

export interface ApplyObserver {
  onAttempt(event: AttemptEvent): void;
  onReport(report: BatchReport): void;
}

/**
 * Default observer: attempt events and the batch summary go to the structured log
 */
export class LoggingObserver implements ApplyObserver {
  constructor(private readonly log: Logger = rootLogger) {}

  onAttempt(event: AttemptEvent): void {
    const fields = {
      runId: event.runId,
      object: formatObjectRef(event.object),
      action: event.action,
      attempt: event.attempt,
      elapsedMs: event.elapsedMs,
      cause: event.cause,
      nextDelayMs: event.nextDelayMs,
      error: event.lastError?.message,
    };

    switch (event.result) {
      case 'succeeded':
        this.log.info(fields, event.action === 'apply' ? 'Applied object' : 'Deleted object');
        break;
      case 'retrying':
        this.log.warn(fields, `Failed to ${event.action} object, retrying`);
        break;
      case 'failed':
        this.log.error({ ...fields, failure: event.failure }, `Failed to ${event.action} object`);
        break;
    }
  }

  onReport(report: BatchReport): void {
    const failures = report.results.filter(result => isFailed(result.outcome));
    const fields = {
      runId: report.runId,
      applied: report.applied,
      failed: report.failed,
      elapsedMs: report.elapsedMs,
    };

    if (report.success) {
      this.log.info(fields, 'Batch applied');
      return;
    }

    this.log.error({
      ...fields,
      failures: failures.map(result => formatObjectRef(result.object)),
    }, 'Error(s) while applying objects');
  }
}

/**
 * Deliver to an observer without letting its failures leak into outcomes
 */
export function notify(
  observer: ApplyObserver,
  deliver: (target: ApplyObserver) => void,
  log: Logger = rootLogger
): void {
  try {
    deliver(observer);
  } catch (error) {
    log.error({ err: error }, 'Observer failed to handle event');
  }
}
