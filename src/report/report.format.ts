import { EXIT_ALL_FAILED, EXIT_OK, EXIT_PARTIAL } from '../core/exitCodes';
import { formatObjectRef, type BatchReport, type ObjectResult } from '../core/types';

export const REPORT_FORMATS = ['text', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function formatResult(result: ObjectResult): string {
  const ref = formatObjectRef(result.object);
  const { outcome } = result;

  if (outcome.status === 'succeeded') {
    const verb = result.action === 'apply' ? 'applied' : 'deleted';
    return `${verb} ${ref} (${plural(outcome.attempts, 'attempt')})`;
  }

  const detail = outcome.error ? `: ${outcome.error.message}` : '';
  return `failed ${ref} (${outcome.reason} after ${plural(outcome.attempts, 'attempt')})${detail}`;
}

export function formatText(report: BatchReport): string {
  const lines = report.results.map(formatResult);
  lines.push(
    `${plural(report.results.length, 'object')}: ${report.applied} succeeded, ${report.failed} failed in ${report.elapsedMs}ms`
  );
  return lines.join('\n');
}

export function formatJson(report: BatchReport): string {
  return JSON.stringify(
    {
      runId: report.runId,
      success: report.success,
      applied: report.applied,
      failed: report.failed,
      elapsedMs: report.elapsedMs,
      results: report.results.map(result => ({
        object: formatObjectRef(result.object),
        action: result.action,
        ...result.outcome,
      })),
    },
    null,
    2
  );
}

export function formatReport(report: BatchReport, format: ReportFormat): string {
  return format === 'json' ? formatJson(report) : formatText(report);
}

export function exitCodeFor(report: BatchReport): number {
  if (report.success) {
    return EXIT_OK;
  }
  return report.applied === 0 ? EXIT_ALL_FAILED : EXIT_PARTIAL;
}
