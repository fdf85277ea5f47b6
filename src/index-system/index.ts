/**
 * Document classification and selective-indexing pipeline
 */

export { IndexManager } from './manager.js';
export { classify, detectLanguage, isTestPath } from './classifier.js';
export {
  shouldInclude,
  decideInclusion,
  resolveInclusion,
  DEFAULT_INCLUSION,
  MAX_FILE_SIZE,
} from './inclusion-filter.js';
export { walkProject } from './walker.js';
export { runBatches, partition, DEFAULT_BATCH_SIZE } from './batcher.js';
export { createDocumentUploader } from './uploader.js';
export type {
  DocumentCategory,
  FileMetadata,
  InclusionSpec,
  IndexingStats,
  IndexProgress,
  ProgressCallback,
  UploadOutcome,
  WorkItem,
} from './types.js';
