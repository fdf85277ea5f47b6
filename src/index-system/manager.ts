import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import type { RetrievalClient } from '../client.js';
import { ConfigurationError, ServiceUnavailableError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { DEFAULT_BATCH_SIZE, assertBatchSize, emptyStats, runBatches } from './batcher.js';
import { classify } from './classifier.js';
import { DEFAULT_INCLUSION } from './inclusion-filter.js';
import { createDocumentUploader, uploadWorkItem } from './uploader.js';
import { walkProject } from './walker.js';
import type {
  FileMetadata,
  InclusionSpec,
  IndexingStats,
  ProgressCallback,
  UploadOutcome,
} from './types.js';

export type IndexTarget = Pick<RetrievalClient, 'apiUrl' | 'healthCheck' | 'uploadDocument'>;

export interface IndexManagerOptions {
  client: IndexTarget;
  projectId: string;
  batchSize?: number;
  maxFileSize?: number;
  logger?: Logger;
}

export interface IndexProjectOptions {
  recursive?: boolean;
  inclusion?: InclusionSpec;
  onProgress?: ProgressCallback;
}

/**
 * Drives one indexing run: health precondition, walk, batched upload.
 */
export class IndexManager {
  private readonly client: IndexTarget;
  private readonly projectId: string;
  private readonly batchSize: number;
  private readonly maxFileSize?: number;
  private readonly logger: Logger;

  constructor(options: IndexManagerOptions) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    assertBatchSize(this.batchSize);

    this.client = options.client;
    this.projectId = options.projectId;
    this.maxFileSize = options.maxFileSize;
    this.logger = options.logger ?? silentLogger;
  }

  private async requireService(): Promise<void> {
    if (!(await this.client.healthCheck())) {
      throw new ServiceUnavailableError(this.client.apiUrl);
    }
  }

  /**
   * Index every selected file under `projectPath`.
   * An empty selection returns zero stats rather than failing.
   */
  async indexProject(
    projectPath: string,
    options: IndexProjectOptions = {},
  ): Promise<IndexingStats> {
    await this.requireService();

    const root = path.resolve(projectPath);
    const inclusion = options.inclusion ?? DEFAULT_INCLUSION;
    this.logger.info(`Starting project indexing: ${root}`);

    options.onProgress?.({
      phase: 'scanning',
      current: 0,
      total: 0,
      message: 'Scanning project files...',
    });

    const items = await walkProject(root, {
      recursive: options.recursive ?? true,
      inclusion,
      projectId: this.projectId,
      maxFileSize: this.maxFileSize,
      logger: this.logger.child('walker'),
    });

    if (items.length === 0) {
      this.logger.info('No files found to process');
      options.onProgress?.({ phase: 'done', current: 0, total: 0 });
      return emptyStats();
    }

    this.logger.info(`Found ${items.length} files to process`);

    const stats = await runBatches(items, this.batchSize, createDocumentUploader(this.client), {
      logger: this.logger.child('batcher'),
      onProgress: options.onProgress,
    });

    options.onProgress?.({ phase: 'done', current: stats.totalFiles, total: stats.totalFiles });
    return stats;
  }

  /**
   * Upload one explicitly named file, bypassing the inclusion filter
   */
  async indexFile(filePath: string): Promise<UploadOutcome> {
    await this.requireService();

    const absolutePath = path.resolve(filePath);
    let stats: Stats;
    try {
      stats = await fs.stat(absolutePath);
    } catch (error) {
      throw new ConfigurationError(`File does not exist: ${filePath}`, errorMessage(error));
    }
    if (!stats.isFile()) {
      throw new ConfigurationError(`Not a regular file: ${filePath}`);
    }

    // Only the name: the directories above an ad hoc file say nothing about it
    const classification = classify(path.basename(absolutePath));
    const metadata: FileMetadata = Object.freeze({
      path: absolutePath,
      relativePath: path.basename(absolutePath),
      ...classification,
      size: stats.size,
      lastModified: stats.mtimeMs,
      projectId: this.projectId,
    });

    const outcome = await uploadWorkItem(this.client, { path: absolutePath, metadata });
    if (!outcome.ok) {
      this.logger.warn(`Failed to upload ${filePath}`, { error: outcome.error });
    }
    return outcome;
  }
}
