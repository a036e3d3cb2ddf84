/**
 * Centralized Apply Configuration
 *
 * Environment-driven configuration with typed defaults. Command-line flags
 * override these values per run.
 * - Concurrency (parallelism gate)
 * - Global timeout
 * - Field manager identity
 * - Retry backoff schedule
 * - Logging
 */

import {
  type Env,
  parseEnum,
  parseNonNegativeFloat,
  parseNonNegativeInt,
  parsePositiveInt,
  parseString,
} from './config.utils';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ApplyConfig {
  // Concurrency: 0 disables the limit
  readonly APPLY_PARALLELISM: number;

  // Global budget in seconds: 0 waits indefinitely
  readonly APPLY_TIMEOUT_SECONDS: number;
  // Per-object budget in seconds: 0 leaves only the global one
  readonly APPLY_OPERATION_TIMEOUT_SECONDS: number;

  // Field ownership
  readonly APPLY_FIELD_MANAGER: string;

  // Retry backoff
  readonly BACKOFF_INITIAL_MS: number;
  readonly BACKOFF_MULTIPLIER: number;
  readonly BACKOFF_MAX_MS: number;
  readonly BACKOFF_RANDOMIZATION: number;

  // Logging
  readonly LOG_LEVEL: LogLevel;
}

export const DEFAULT_FIELD_MANAGER = 'batch-apply';

/**
 * Build a configuration from an environment record
 */
export function loadConfig(env: Env = process.env): ApplyConfig {
  return Object.freeze({
    APPLY_PARALLELISM: parseNonNegativeInt(env, 'APPLY_PARALLELISM', 10),
    APPLY_TIMEOUT_SECONDS: parseNonNegativeInt(env, 'APPLY_TIMEOUT_SECONDS', 300),
    APPLY_OPERATION_TIMEOUT_SECONDS: parseNonNegativeInt(env, 'APPLY_OPERATION_TIMEOUT_SECONDS', 0),
    APPLY_FIELD_MANAGER: parseString(env, 'APPLY_FIELD_MANAGER', DEFAULT_FIELD_MANAGER),

    BACKOFF_INITIAL_MS: parsePositiveInt(env, 'BACKOFF_INITIAL_MS', 400),
    BACKOFF_MULTIPLIER: parseNonNegativeFloat(env, 'BACKOFF_MULTIPLIER', 5),
    BACKOFF_MAX_MS: parsePositiveInt(env, 'BACKOFF_MAX_MS', 30000),
    BACKOFF_RANDOMIZATION: parseNonNegativeFloat(env, 'BACKOFF_RANDOMIZATION', 0.5, 1),

    LOG_LEVEL: parseEnum(env, 'LOG_LEVEL', 'info', LOG_LEVELS),
  });
}

export const config: ApplyConfig = loadConfig();

/**
 * Check if configuration is consistent; returns the list of problems found
 */
export function validateConfig(target: ApplyConfig = config): string[] {
  const issues: string[] = [];

  if (target.APPLY_FIELD_MANAGER.length === 0) {
    issues.push('APPLY_FIELD_MANAGER must not be empty');
  }

  if (target.BACKOFF_MULTIPLIER < 1) {
    issues.push('BACKOFF_MULTIPLIER must be at least 1');
  }

  if (target.BACKOFF_MAX_MS < target.BACKOFF_INITIAL_MS) {
    issues.push('BACKOFF_MAX_MS must not be lower than BACKOFF_INITIAL_MS');
  }

  if (target.BACKOFF_RANDOMIZATION < 0 || target.BACKOFF_RANDOMIZATION > 1) {
    issues.push('BACKOFF_RANDOMIZATION must be between 0 and 1');
  }

  return issues;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(target: ApplyConfig = config): Record<string, unknown> {
  return {
    parallelism: target.APPLY_PARALLELISM === 0 ? 'unbounded' : target.APPLY_PARALLELISM,
    timeoutSeconds: target.APPLY_TIMEOUT_SECONDS === 0 ? 'infinite' : target.APPLY_TIMEOUT_SECONDS,
    operationTimeoutSeconds:
      target.APPLY_OPERATION_TIMEOUT_SECONDS === 0 ? 'none' : target.APPLY_OPERATION_TIMEOUT_SECONDS,
    fieldManager: target.APPLY_FIELD_MANAGER,
    backoff: {
      initialMs: target.BACKOFF_INITIAL_MS,
      multiplier: target.BACKOFF_MULTIPLIER,
      maxMs: target.BACKOFF_MAX_MS,
      randomization: target.BACKOFF_RANDOMIZATION,
    },
    logLevel: target.LOG_LEVEL,
  };
}
