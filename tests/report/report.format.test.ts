import { describe, it, expect } from 'vitest';
import type { BatchReport } from '../../src/core/types';
import { EXIT_ALL_FAILED, EXIT_OK, EXIT_PARTIAL } from '../../src/core/exitCodes';
import { exitCodeFor, formatJson, formatReport, formatText } from '../../src/report/report.format';

const report: BatchReport = {
  runId: 'test-run',
  applied: 2,
  failed: 1,
  elapsedMs: 2430,
  success: false,
  results: [
    {
      object: { apiVersion: 'v1', kind: 'Namespace', name: 'demo' },
      action: 'apply',
      outcome: { status: 'succeeded', attempts: 1, elapsedMs: 10 },
    },
    {
      object: { apiVersion: 'v1', kind: 'Pod', namespace: 'demo', name: 'old' },
      action: 'delete',
      outcome: { status: 'succeeded', attempts: 2, elapsedMs: 420 },
    },
    {
      object: { apiVersion: 'v1', kind: 'Pod', namespace: 'missing', name: 'web' },
      action: 'apply',
      outcome: {
        status: 'failed',
        reason: 'timeout',
        attempts: 3,
        elapsedMs: 2430,
        error: { name: 'ApiError', code: 'API_ERROR', message: 'namespaces "missing" not found', statusCode: 404 },
      },
    },
  ],
};

describe('Report Formatting', () => {
  it('should render one line per object and a summary', () => {
    expect(formatText(report).split('\n')).toEqual([
      'applied v1/Namespace/demo (1 attempt)',
      'deleted v1/Pod/demo/old (2 attempts)',
      'failed v1/Pod/missing/web (timeout after 3 attempts): namespaces "missing" not found',
      '3 objects: 2 succeeded, 1 failed in 2430ms',
    ]);
  });

  it('should render a summary for an empty batch', () => {
    const empty: BatchReport = { runId: 'r', applied: 0, failed: 0, elapsedMs: 0, success: true, results: [] };

    expect(formatReport(empty, 'text')).toBe('0 objects: 0 succeeded, 0 failed in 0ms');
  });

  it('should render JSON with flattened outcomes', () => {
    const parsed: unknown = JSON.parse(formatJson(report));

    expect(parsed).toMatchObject({
      runId: 'test-run',
      success: false,
      applied: 2,
      failed: 1,
      results: [
        { object: 'v1/Namespace/demo', action: 'apply', status: 'succeeded', attempts: 1 },
        { object: 'v1/Pod/demo/old', action: 'delete', status: 'succeeded', attempts: 2 },
        { object: 'v1/Pod/missing/web', status: 'failed', reason: 'timeout', error: { statusCode: 404 } },
      ],
    });
    expect(formatReport(report, 'json')).toBe(formatJson(report));
  });

  it.each([
    [{ applied: 3, failed: 0, success: true }, EXIT_OK],
    [{ applied: 2, failed: 1, success: false }, EXIT_PARTIAL],
    [{ applied: 0, failed: 3, success: false }, EXIT_ALL_FAILED],
  ])('should map %o to exit code %i', (counts, code) => {
    expect(exitCodeFor({ ...report, ...counts })).toBe(code);
  });
});
