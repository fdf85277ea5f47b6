import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../../src/errors.js';
import { partition, runBatches } from '../../src/index-system/batcher.js';
import type {
  DocumentCategory,
  IndexProgress,
  UploadFn,
  WorkItem,
} from '../../src/index-system/types.js';

function makeItems(
  count: number,
  category: DocumentCategory = 'code',
  fileName = (i: number) => `file-${i}.py`,
): WorkItem[] {
  return Array.from({ length: count }, (_, i) => {
    const path = `/project/${fileName(i)}`;
    return {
      path,
      metadata: {
        path,
        relativePath: fileName(i),
        category,
        size: 10,
        lastModified: 0,
        projectId: 'test',
      },
    };
  });
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('partition', () => {
  it('should split into consecutive batches with a short tail', () => {
    expect(partition([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5, 6], [7]]);
  });

  it('should return no batches for no items', () => {
    expect(partition([], 4)).toEqual([]);
  });

  it('should reject non-positive sizes', () => {
    expect(() => partition([1], 0)).toThrow(ConfigurationError);
    expect(() => partition([1], 1.5)).toThrow('Batch size must be a positive integer, got 1.5');
  });
});

describe('runBatches', () => {
  it.each([1, 10, 11])('should account for every item with batch size %i', async (batchSize) => {
    const items = makeItems(10);
    const upload: UploadFn = async (item) =>
      item.path.endsWith('3.py') || item.path.endsWith('7.py')
        ? { ok: false, error: 'HTTP 500' }
        : { ok: true };

    const stats = await runBatches(items, batchSize, upload);

    expect(stats.totalFiles).toBe(10);
    expect(stats.successful).toBe(8);
    expect(stats.failed).toBe(2);
    expect(stats.successful + stats.failed).toBe(stats.totalFiles);
  });

  it('should run 10 items in batches of 3 without overlapping batches', async () => {
    const items = makeItems(10);
    const timings = new Map<string, { start: number; end: number }>();

    const upload: UploadFn = async (item) => {
      const start = performance.now();
      // First item of each batch is the slow one
      const index = Number(item.metadata.relativePath.match(/\d+/)?.[0]);
      await sleep(index % 3 === 0 ? 40 : 5);
      timings.set(item.path, { start, end: performance.now() });
      return { ok: true };
    };

    const progress: IndexProgress[] = [];
    const stats = await runBatches(items, 3, upload, { onProgress: (p) => progress.push(p) });

    expect(stats.successful).toBe(10);
    expect(progress.map((p) => p.batch)).toEqual([1, 2, 3, 4]);
    expect(progress.map((p) => p.batches)).toEqual([4, 4, 4, 4]);
    expect(progress.map((p) => p.current)).toEqual([3, 6, 9, 10]);

    const batches = partition(items, 3);
    expect(batches.map((batch) => batch.length)).toEqual([3, 3, 3, 1]);

    for (let k = 0; k < batches.length - 1; k++) {
      const lastEnd = Math.max(...batches[k].map((item) => timings.get(item.path)?.end ?? Infinity));
      const nextStart = Math.min(
        ...batches[k + 1].map((item) => timings.get(item.path)?.start ?? -Infinity),
      );
      expect(nextStart).toBeGreaterThanOrEqual(lastEnd);
    }
  });

  it('should start every upload of a batch before any of them settles', async () => {
    const items = makeItems(3);
    let inFlight = 0;
    let peak = 0;

    const upload: UploadFn = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(10);
      inFlight--;
      return { ok: true };
    };

    await runBatches(items, 3, upload);
    expect(peak).toBe(3);
  });

  it('should count failed uploads in their category tally', async () => {
    const items = [
      ...makeItems(2, 'code'),
      ...makeItems(1, 'documentation', (i) => `doc-${i}.md`),
    ];
    const upload: UploadFn = async (item) =>
      item.metadata.category === 'documentation' ? { ok: false, error: 'HTTP 413' } : { ok: true };

    const stats = await runBatches(items, 2, upload);

    expect(stats.byCategory).toEqual({ code: 2, documentation: 1 });
    expect(stats.failed).toBe(1);
    expect(stats.failures).toEqual([{ path: '/project/doc-0.md', error: 'HTTP 413' }]);
  });

  it('should isolate an upload that throws from the rest of its batch', async () => {
    const items = makeItems(4);
    const upload: UploadFn = async (item) => {
      if (item.path.endsWith('1.py')) throw new Error('socket hang up');
      return { ok: true };
    };

    const stats = await runBatches(items, 4, upload);

    expect(stats.successful).toBe(3);
    expect(stats.failed).toBe(1);
    expect(stats.failures).toEqual([{ path: '/project/file-1.py', error: 'socket hang up' }]);
  });

  it('should log one line per batch and a completion summary', async () => {
    const info = vi.fn();
    const logger = {
      debug: vi.fn(),
      info,
      warn: vi.fn(),
      error: vi.fn(),
      child: vi.fn(),
    };

    await runBatches(makeItems(4), 2, async () => ({ ok: true }), { logger });

    expect(info.mock.calls.map((call) => call[0])).toEqual([
      'Processed batch 1/2',
      'Processed batch 2/2',
      'Indexing complete. Success: 4, Failed: 0',
    ]);
  });

  it('should return zero stats for an empty worklist', async () => {
    const upload = vi.fn<Parameters<UploadFn>, ReturnType<UploadFn>>();
    const stats = await runBatches([], 5, upload);

    expect(stats).toMatchObject({ totalFiles: 0, successful: 0, failed: 0, byCategory: {} });
    expect(upload).not.toHaveBeenCalled();
  });
});
