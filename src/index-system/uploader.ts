import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../errors.js';
import type { DocumentEnvelope, RetrievalClient } from '../client.js';
import type { FileMetadata, UploadFn, UploadOutcome, WorkItem } from './types.js';

export type DocumentSink = Pick<RetrievalClient, 'uploadDocument'>;

export function toEnvelope(metadata: FileMetadata): DocumentEnvelope {
  return {
    source: metadata.path,
    file_type: metadata.category,
    language: metadata.language ?? null,
    size: metadata.size,
    last_modified: metadata.lastModified,
    project_id: metadata.projectId,
  };
}

/**
 * Read one work item from disk and send it for ingestion.
 * A file that vanished since the walk is a failed outcome, not an exception.
 */
export async function uploadWorkItem(sink: DocumentSink, item: WorkItem): Promise<UploadOutcome> {
  let content: Buffer;
  try {
    content = await fs.readFile(item.path);
  } catch (error) {
    return { ok: false, error: `Read failed: ${errorMessage(error)}` };
  }

  return sink.uploadDocument({
    content,
    filename: path.basename(item.path),
    projectId: item.metadata.projectId,
    metadata: toEnvelope(item.metadata),
  });
}

export const createDocumentUploader =
  (sink: DocumentSink): UploadFn =>
  (item) =>
    uploadWorkItem(sink, item);
