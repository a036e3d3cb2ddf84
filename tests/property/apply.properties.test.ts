import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ApiError } from '../../src/core/errors';
import { applyBatch } from '../../src/services/apply.service.core';
import { runObjectOperation } from '../../src/services/apply.service.operation';
import { FakeCluster } from '../../src/testing/fakeCluster';
import { VirtualClock } from '../../src/testing/time';
import { makeContext, RecordingObserver, TEST_BACKOFF } from '../helpers/context';
import { configMap, namespaceObject, pod, widget, widgetCrd } from '../helpers/objects';

function retryableError(kind: number): ApiError {
  switch (kind % 4) {
    case 0:
      return ApiError.status('apply', 503, 'service unavailable', 'ServiceUnavailable');
    case 1:
      return ApiError.status('apply', 429, 'too many requests', 'TooManyRequests');
    case 2:
      return ApiError.status('apply', 500, 'etcdserver: leader changed', 'InternalError');
    default:
      return ApiError.network('apply', 'socket hang up', 'ECONNRESET');
  }
}

describe('Batch properties', () => {
  it('should converge to the same state whatever the input order', async () => {
    const objects = [
      namespaceObject('demo'),
      pod('web', 'demo'),
      configMap('settings', 'demo'),
      widgetCrd(),
      widget('gadget', 'demo'),
    ];

    await fc.assert(
      fc.asyncProperty(
        fc.shuffledSubarray(objects, { minLength: objects.length }),
        fc.integer({ min: 0, max: 4 }),
        async (ordered, parallelism) => {
          const clock = new VirtualClock();
          const cluster = new FakeCluster({ clock, discoveryLagMs: 300 });

          const report = await applyBatch(ordered, {
            client: cluster,
            parallelism,
            timeoutMs: 300_000,
            clock,
            backoff: TEST_BACKOFF,
            observer: new RecordingObserver(),
          });

          expect(report.success).toBe(true);
          expect(objects.every(target => cluster.has(target))).toBe(true);
          expect(cluster.objectCount).toBe(6);
        }
      ),
      { numRuns: 40 }
    );
  });

  it('should never exceed the parallelism bound', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 5 }),
        fc.array(fc.integer({ min: 0, max: 3 }), { minLength: 1, maxLength: 25 }),
        async (parallelism, failuresPerObject) => {
          const clock = new VirtualClock();
          const cluster = new FakeCluster({ clock });
          const objects = failuresPerObject.map((failures, index) => {
            const target = configMap(`config-${index}`);
            cluster.failNext(
              target,
              ...Array.from({ length: failures }, (_, attempt) => retryableError(attempt))
            );
            return target;
          });

          const report = await applyBatch(objects, {
            client: cluster,
            parallelism,
            timeoutMs: 0,
            clock,
            backoff: TEST_BACKOFF,
            observer: new RecordingObserver(),
          });

          expect(report.success).toBe(true);
          expect(cluster.peakInFlight).toBeLessThanOrEqual(parallelism);
        }
      ),
      { numRuns: 40 }
    );
  });

  it('should take exactly K+1 attempts after K retryable failures', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.integer({ min: 0, max: 3 }), { maxLength: 6 }),
        async (failures) => {
          const clock = new VirtualClock();
          const cluster = new FakeCluster({ clock });
          const target = pod('web');
          cluster.failNext(target, ...failures.map(retryableError));

          const outcome = await runObjectOperation(target, makeContext(cluster, { clock }));

          expect(outcome).toMatchObject({ status: 'succeeded', attempts: failures.length + 1 });
          expect(cluster.callsFor(target)).toHaveLength(failures.length + 1);
        }
      ),
      { numRuns: 40 }
    );
  });
});
