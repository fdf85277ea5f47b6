import { ConfigurationError, errorMessage } from '../errors.js';
import { silentLogger } from '../logger.js';
import type {
  BatchOptions,
  DocumentCategory,
  IndexingStats,
  UploadFn,
  UploadOutcome,
  WorkItem,
} from './types.js';

export const DEFAULT_BATCH_SIZE = 10;

interface SettledItem {
  item: WorkItem;
  outcome: UploadOutcome;
}

export function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`);
  }
}

/**
 * Split items into consecutive batches of at most `size`
 */
export function partition<T>(items: readonly T[], size: number): T[][] {
  assertBatchSize(size);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Run one upload, turning a rejection or a synchronous throw into a failed outcome
 */
async function settle(upload: UploadFn, item: WorkItem): Promise<SettledItem> {
  try {
    const outcome = await upload(item);
    return { item, outcome };
  } catch (error) {
    return { item, outcome: { ok: false, error: errorMessage(error) } };
  }
}

export function emptyStats(totalFiles = 0): IndexingStats {
  return {
    totalFiles,
    successful: 0,
    failed: 0,
    byCategory: {},
    failures: [],
    durationMs: 0,
  };
}

/**
 * Fold one settled batch into the run's statistics.
 * Category tallies count processed items, failed uploads included.
 */
function applyBatch(stats: IndexingStats, settled: readonly SettledItem[]): void {
  for (const { item, outcome } of settled) {
    if (outcome.ok) {
      stats.successful++;
    } else {
      stats.failed++;
      stats.failures.push({ path: item.path, error: outcome.error });
    }

    const category: DocumentCategory = item.metadata.category;
    stats.byCategory[category] = (stats.byCategory[category] ?? 0) + 1;
  }
}

/**
 * Upload the worklist batch by batch. Uploads inside a batch run concurrently;
 * the next batch starts only once every upload of the current one has settled.
 */
export async function runBatches(
  items: readonly WorkItem[],
  batchSize: number,
  upload: UploadFn,
  options: BatchOptions = {},
): Promise<IndexingStats> {
  const logger = options.logger ?? silentLogger;
  const startTime = Date.now();
  const batches = partition(items, batchSize);
  const stats = emptyStats(items.length);

  for (const [index, batch] of batches.entries()) {
    const settled = await Promise.all(batch.map((item) => settle(upload, item)));
    applyBatch(stats, settled);

    for (const { item, outcome } of settled) {
      if (!outcome.ok) logger.debug(`Upload failed: ${item.path}`, { error: outcome.error });
    }

    logger.info(`Processed batch ${index + 1}/${batches.length}`);
    options.onProgress?.({
      phase: 'uploading',
      current: stats.successful + stats.failed,
      total: stats.totalFiles,
      batch: index + 1,
      batches: batches.length,
    });
  }

  stats.durationMs = Date.now() - startTime;
  logger.info(`Indexing complete. Success: ${stats.successful}, Failed: ${stats.failed}`);

  return stats;
}
