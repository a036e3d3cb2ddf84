import { describe, it, expect } from 'vitest';
import { ApiError, ValidationError } from '../../src/core/errors';
import type { TargetObject } from '../../src/core/types';
import { applyBatch, buildReport } from '../../src/services/apply.service.core';
import type { ApiClient, BatchOptions } from '../../src/services/apply.service.types';
import { FakeCluster } from '../../src/testing/fakeCluster';
import { VirtualClock } from '../../src/testing/time';
import { RecordingObserver, TEST_BACKOFF } from '../helpers/context';
import { configMap, namespaceObject, pod, widget, widgetCrd } from '../helpers/objects';

function setup(options: { discoveryLagMs?: number } = {}) {
  const clock = new VirtualClock();
  const cluster = new FakeCluster({ clock, discoveryLagMs: options.discoveryLagMs });
  const observer = new RecordingObserver();
  const run = (objects: TargetObject[], overrides: Partial<BatchOptions> = {}) =>
    applyBatch(objects, {
      client: cluster,
      parallelism: 10,
      timeoutMs: 300_000,
      clock,
      observer,
      backoff: TEST_BACKOFF,
      runId: 'test-run',
      ...overrides,
    });
  return { clock, cluster, observer, run };
}

function attemptsOf(report: Awaited<ReturnType<typeof applyBatch>>): number[] {
  return report.results.map(result => result.outcome.attempts);
}

describe('applyBatch', () => {
  describe('Reports', () => {
    it('should succeed trivially for an empty batch', async () => {
      const { cluster, observer, run } = setup();

      const report = await run([]);

      expect(report).toEqual({
        runId: 'test-run',
        applied: 0,
        failed: 0,
        results: [],
        elapsedMs: 0,
        success: true,
      });
      expect(cluster.calls).toHaveLength(0);
      expect(observer.reports).toEqual([report]);
    });

    it('should list results in input order', async () => {
      const { run } = setup();
      const objects = [configMap('c'), configMap('a'), configMap('b')];

      const report = await run(objects);

      expect(report.results.map(result => result.object.name)).toEqual(['c', 'a', 'b']);
      expect(report.results[0]).toEqual({
        object: { apiVersion: 'v1', kind: 'ConfigMap', namespace: 'default', name: 'c' },
        action: 'apply',
        outcome: { status: 'succeeded', attempts: 1, elapsedMs: 10 },
      });
      expect(report).toMatchObject({ applied: 3, failed: 0, success: true, elapsedMs: 10 });
    });

    it('should generate a run id when none is given', async () => {
      const { run } = setup();

      const report = await run([configMap('a')], { runId: undefined });

      expect(report.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
  });

  describe('Parallelism', () => {
    it.each([
      [1, 1],
      [10, 10],
      [0, 20],
    ])('should apply everything with parallelism %i (peak %i calls)', async (parallelism, peak) => {
      const { cluster, run } = setup();
      const objects = Array.from({ length: 20 }, (_, index) => configMap(`config-${index}`));

      const report = await run(objects, { parallelism });

      expect(report.success).toBe(true);
      expect(report.applied).toBe(20);
      expect(cluster.objectCount).toBe(21);
      expect(cluster.peakInFlight).toBe(peak);
    });

    it('should keep the bound while objects are retrying', async () => {
      const { cluster, run } = setup();
      const objects = Array.from({ length: 12 }, (_, index) => pod(`web-${index}`, 'late'));

      const report = await run([...objects, namespaceObject('late')], { parallelism: 3 });

      expect(report.success).toBe(true);
      expect(cluster.peakInFlight).toBeLessThanOrEqual(3);
    });
  });

  describe('Independence', () => {
    it('should converge when a Pod comes before its Namespace', async () => {
      const { observer, run } = setup();

      const report = await run([pod('web', 'demo'), namespaceObject('demo')]);

      expect(report.success).toBe(true);
      expect(attemptsOf(report)).toEqual([2, 1]);
      expect(observer.events[0]).toMatchObject({
        object: { kind: 'Pod', name: 'web' },
        attempt: 1,
        result: 'retrying',
        cause: 'not-found',
        nextDelayMs: 400,
      });
    });

    it('should converge when the Namespace comes first', async () => {
      const { run } = setup();

      const report = await run([namespaceObject('demo'), pod('web', 'demo')]);

      expect(report.success).toBe(true);
      expect(attemptsOf(report)).toEqual([1, 1]);
    });

    it('should not starve with a single slot', async () => {
      const { clock, run } = setup();

      const report = await run([pod('web', 'demo'), namespaceObject('demo')], { parallelism: 1 });

      expect(report.success).toBe(true);
      expect(attemptsOf(report)).toEqual([2, 1]);
      expect(clock.now()).toBe(420);
    });

    it('should retry a custom resource until its CRD is served', async () => {
      const { cluster, observer, run } = setup({ discoveryLagMs: 1000 });
      const resource = widget('gadget');

      const report = await run([resource, widgetCrd()]);

      expect(report.success).toBe(true);
      expect(attemptsOf(report)).toEqual([3, 1]);
      expect(cluster.has(resource)).toBe(true);
      expect(observer.events.filter(event => event.result === 'retrying').map(event => event.cause)).toEqual([
        'kind-not-recognized',
        'kind-not-recognized',
      ]);
    });

    it('should not let a terminal failure cancel siblings', async () => {
      const { cluster, run } = setup();
      const denied = configMap('denied');
      cluster.failNext(denied, ApiError.status('apply', 403, 'configmaps is forbidden', 'Forbidden'));

      const report = await run([pod('web', 'demo'), denied, namespaceObject('demo')]);

      expect(report).toMatchObject({ applied: 2, failed: 1, success: false });
      expect(report.results[1]?.outcome).toMatchObject({ status: 'failed', reason: 'terminal', attempts: 1 });
      expect(report.results[0]?.outcome).toMatchObject({ status: 'succeeded', attempts: 2 });
    });
  });

  describe('Budget and Cancellation', () => {
    it('should time out objects that never converge and keep the rest', async () => {
      const { run } = setup();

      const report = await run([pod('web', 'missing'), configMap('settings')], { timeoutMs: 5000 });

      expect(report).toMatchObject({ applied: 1, failed: 1, success: false });
      expect(report.results[0]?.outcome).toMatchObject({ status: 'failed', reason: 'timeout', attempts: 3 });
      expect(report.results[1]?.outcome).toEqual({ status: 'succeeded', attempts: 1, elapsedMs: 10 });
    });

    it('should record unfinished objects as cancelled and keep completed outcomes', async () => {
      const { clock, observer, run } = setup();
      const controller = new AbortController();
      clock.at(1000, () => controller.abort());

      const report = await run([pod('web', 'missing'), configMap('settings')], {
        timeoutMs: 0,
        signal: controller.signal,
      });

      expect(report.results[0]?.outcome).toMatchObject({ status: 'failed', reason: 'cancelled', attempts: 2 });
      expect(report.results[1]?.outcome.status).toBe('succeeded');
      expect(report.elapsedMs).toBe(1000);
      expect(observer.reports).toHaveLength(1);
    });

    it('should report after cancellation even when a call never returns', async () => {
      const { clock, cluster, run } = setup();
      const stuck: ApiClient = {
        apply: (target, signal) => target.name === 'hung'
          ? new Promise<void>(() => undefined)
          : cluster.apply(target, signal),
        delete: (target, signal) => cluster.delete(target, signal),
      };
      const controller = new AbortController();
      clock.at(20, () => controller.abort());

      const report = await run([configMap('hung'), configMap('settings')], {
        client: stuck,
        parallelism: 1,
        timeoutMs: 50,
        signal: controller.signal,
      });

      expect(report.results.map(result => result.outcome)).toEqual([
        { status: 'failed', reason: 'cancelled', attempts: 1, elapsedMs: 20 },
        { status: 'failed', reason: 'cancelled', attempts: 0, elapsedMs: 20 },
      ]);
      expect(report.elapsedMs).toBe(20);
    });
  });

  describe('Validation', () => {
    it.each([-1, 1.5, Number.NaN])('should reject parallelism %s before any call', async (parallelism) => {
      const { cluster, run } = setup();

      await expect(run([configMap('a')], { parallelism })).rejects.toThrow(ValidationError);
      expect(cluster.calls).toHaveLength(0);
    });

    it('should reject a negative timeout', async () => {
      const { run } = setup();

      await expect(run([configMap('a')], { timeoutMs: -1 })).rejects.toThrow(
        'Invalid timeout: -1. Timeout must be a non-negative number.'
      );
    });

    it('should reject invalid backoff options', async () => {
      const { run } = setup();

      await expect(run([configMap('a')], { backoff: { multiplier: 0 } })).rejects.toThrow(
        'Invalid backoff options'
      );
    });
  });
});

describe('buildReport', () => {
  it('should count failures', () => {
    const report = buildReport('run', [configMap('a'), configMap('b')], [
      { status: 'succeeded', attempts: 1, elapsedMs: 5 },
      { status: 'failed', reason: 'timeout', attempts: 4, elapsedMs: 5000 },
    ], 5000);

    expect(report).toMatchObject({ applied: 1, failed: 1, success: false, elapsedMs: 5000 });
  });

  it('should refuse mismatched outcomes', () => {
    expect(() => buildReport('run', [configMap('a')], [], 0)).toThrow('Missing outcome for object at index 0');
  });
});
