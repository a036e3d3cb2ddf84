import { z } from 'zod';
import { config } from '../core/config';
import { ValidationError } from '../core/errors';
import type { GlobalBudget } from '../core/types';
import { random } from '../testing/rng';

export interface BackoffOptions {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  // Fraction of the delay that jitter may add or remove, 0..1
  randomizationFactor: number;
}

const BackoffOptionsSchema = z
  .object({
    initialDelayMs: z.number().int().positive(),
    multiplier: z.number().min(1),
    maxDelayMs: z.number().int().positive(),
    randomizationFactor: z.number().min(0).max(1),
  })
  .refine(options => options.maxDelayMs >= options.initialDelayMs, {
    message: 'maxDelayMs must not be lower than initialDelayMs',
    path: ['maxDelayMs'],
  });

export function defaultBackoffOptions(): BackoffOptions {
  return {
    initialDelayMs: config.BACKOFF_INITIAL_MS,
    multiplier: config.BACKOFF_MULTIPLIER,
    maxDelayMs: config.BACKOFF_MAX_MS,
    randomizationFactor: config.BACKOFF_RANDOMIZATION,
  };
}

/**
 * Exponential backoff with jitter. Stateless: the delay depends only on the
 * attempt number, so one policy is shared by every operation of a batch.
 */
export class BackoffPolicy {
  readonly options: Readonly<BackoffOptions>;

  constructor(options: Partial<BackoffOptions> = {}) {
    const merged = { ...defaultBackoffOptions(), ...options };
    const parsed = BackoffOptionsSchema.safeParse(merged);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new ValidationError(
        `Invalid backoff options: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
        'backoff',
        merged
      );
    }
    this.options = Object.freeze(parsed.data);
  }

  /**
   * Delay before the retry that follows the given (1-based) failed attempt
   */
  baseDelay(attempt: number): number {
    const { initialDelayMs, multiplier, maxDelayMs } = this.options;
    const exponent = Math.max(0, attempt - 1);
    return Math.min(initialDelayMs * Math.pow(multiplier, exponent), maxDelayMs);
  }

  nextDelay(attempt: number): number {
    const base = this.baseDelay(attempt);
    const delta = base * this.options.randomizationFactor;
    const jittered = base - delta + random() * (2 * delta);
    return Math.min(Math.round(jittered), this.options.maxDelayMs);
  }
}

export function createBudget(startedAt: number, timeoutMs: number): GlobalBudget {
  return Object.freeze(
    timeoutMs > 0
      ? { startedAt, timeoutMs, deadline: startedAt + timeoutMs }
      : { startedAt, timeoutMs }
  );
}

export function remainingMs(budget: GlobalBudget, now: number): number {
  return budget.deadline === undefined ? Number.POSITIVE_INFINITY : budget.deadline - now;
}

export function isExhausted(budget: GlobalBudget, now: number): boolean {
  return budget.deadline !== undefined && now >= budget.deadline;
}

/**
 * Whether sleeping `delayMs` from `now` still ends on or before the deadline
 */
export function admits(budget: GlobalBudget, now: number, delayMs: number): boolean {
  if (budget.deadline === undefined) {
    return true;
  }
  return !isExhausted(budget, now) && now + delayMs <= budget.deadline;
}
