export * from './core/types';
export {
  ApiError,
  CancelledError,
  DomainError,
  InvariantError,
  ManifestError,
  ValidationError,
  toErrorSummary,
} from './core/errors';
export type { ApiErrorCategory, ApiVerb, ManifestIssue } from './core/errors';
export * from './core/exitCodes';
export { config, loadConfig, validateConfig, type ApplyConfig } from './core/config';
export { createLogger, logger, type Logger } from './core/logger';

export { applyBatch, buildReport } from './services/apply.service.core';
export { ObjectOperation, runObjectOperation, transition } from './services/apply.service.operation';
export { classifyError, classifyStatus, isRetryable } from './services/apply.service.classify';
export type { RetryableCause, TerminalCause, Verdict } from './services/apply.service.classify';
export { LoggingObserver } from './services/apply.service.events';
export type { ApplyObserver, AttemptEvent, AttemptResult } from './services/apply.service.events';
export type { ApiClient, BatchOptions } from './services/apply.service.types';

export { BackoffPolicy, createBudget, type BackoffOptions } from './utils/backoff';
export { Bulkhead, type BulkheadStats } from './utils/bulkhead';
export { systemClock, untilAborted, type Clock } from './utils/clock';

export { KubernetesApiClient, loadKubeConfig, toApiError, type ObjectApi } from './clients/kube.client';
export { parseManifests, readManifests, ACTION_ANNOTATION } from './manifests/manifest.loader';
export { exitCodeFor, formatReport, type ReportFormat } from './report/report.format';
