/**
 * Types for the document classification and indexing pipeline
 */

import type { Logger } from '../logger.js';

export const DOCUMENT_CATEGORIES = [
  'code',
  'documentation',
  'configuration',
  'test',
  'other',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

export interface Classification {
  category: DocumentCategory;
  language?: string;
}

export interface FileMetadata {
  readonly path: string; // Absolute
  readonly relativePath: string; // Relative to the walk root
  readonly category: DocumentCategory;
  readonly language?: string;
  readonly size: number;
  readonly lastModified: number; // mtime in ms
  readonly projectId: string;
}

export interface InclusionSpec {
  includeCode: boolean;
  includeDocs: boolean;
  includeConfigs: boolean;
  includeTests: boolean;
  includeAll: boolean;
}

export type ExclusionReason = 'hidden' | 'denied' | 'size' | 'unreadable' | 'category';

export type InclusionDecision =
  | ({ included: true } & Classification)
  | { included: false; reason: ExclusionReason };

export interface WorkItem {
  readonly path: string;
  readonly metadata: FileMetadata;
}

export type UploadOutcome = { ok: true } | { ok: false; error: string };

export type UploadFn = (item: WorkItem) => Promise<UploadOutcome>;

export interface UploadFailure {
  path: string;
  error: string;
}

export interface IndexingStats {
  totalFiles: number;
  successful: number;
  failed: number;
  byCategory: Partial<Record<DocumentCategory, number>>; // processed, not succeeded
  failures: UploadFailure[];
  durationMs: number;
}

export interface IndexProgress {
  phase: 'scanning' | 'uploading' | 'done';
  current: number;
  total: number;
  batch?: number;
  batches?: number;
  message?: string;
}

export type ProgressCallback = (progress: IndexProgress) => void;

export interface WalkOptions {
  recursive: boolean;
  inclusion: InclusionSpec;
  projectId: string;
  maxFileSize?: number;
  logger?: Logger;
}

export interface BatchOptions {
  logger?: Logger;
  onProgress?: ProgressCallback;
}
