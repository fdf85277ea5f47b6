import { z } from 'zod';
import { RetrievalError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  DOCUMENT_CATEGORIES,
  type DocumentCategory,
  type UploadOutcome,
} from './index-system/types.js';

export const SEARCH_MODES = ['semantic', 'hybrid', 'keyword'] as const;

export type SearchMode = (typeof SEARCH_MODES)[number];

export interface SearchResult {
  rank: number;
  source: string;
  content: string;
  score?: number;
  category: DocumentCategory;
  language?: string;
}

export interface SearchOptions {
  mode?: SearchMode;
  limit?: number;
  fileTypes?: string[];
  languages?: string[];
  projectId?: string;
}

export interface DocumentEnvelope {
  source: string;
  file_type: DocumentCategory;
  language: string | null;
  size: number;
  last_modified: number;
  project_id: string;
}

export interface IngestRequest {
  content: Uint8Array;
  filename: string;
  projectId: string;
  metadata: DocumentEnvelope;
}

export interface PatternRecord {
  type: string;
  source: string;
  content: string;
  category: DocumentCategory;
  score?: number;
}

export interface HealthReport {
  healthy: boolean;
  /** `status` field of the health body, when the server sends one */
  status?: string;
}

export interface RetrievalClientOptions {
  apiUrl: string;
  projectId: string;
  timeoutMs?: number;
  healthTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export const DEFAULT_SEARCH_LIMIT = 5;

const documentSchema = z
  .object({
    page_content: z.string().optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .passthrough();

type RemoteDocument = z.infer<typeof documentSchema>;

const searchItemSchema = z.union([
  z.tuple([documentSchema, z.number()]),
  z.tuple([documentSchema]),
  documentSchema,
  z.string(),
]);

const searchResponseSchema = z.array(searchItemSchema);

const healthBodySchema = z.object({ status: z.string().optional() }).passthrough();

const statsSchema = z.record(z.unknown());

const stringField = (metadata: Record<string, unknown>, key: string): string | undefined => {
  const value = metadata[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

const toCategory = (value: string | undefined): DocumentCategory =>
  DOCUMENT_CATEGORIES.find((category) => category === value) ?? 'other';

/**
 * Normalise one search record: either a bare document or a `[document, score]` pair
 */
export function toSearchResult(item: z.infer<typeof searchItemSchema>, rank: number): SearchResult {
  let document: RemoteDocument | string;
  let score: number | undefined;

  if (Array.isArray(item)) {
    document = item[0];
    if (item.length === 2) score = item[1];
  } else {
    document = item;
  }

  if (typeof document === 'string') {
    return {
      rank,
      source: 'Unknown file',
      content: document,
      category: 'other',
      ...(score !== undefined ? { score } : {}),
    };
  }

  const metadata = document.metadata ?? {};
  const language = stringField(metadata, 'language');

  return {
    rank,
    source: stringField(metadata, 'source') ?? 'Unknown file',
    content: document.page_content ?? '',
    category: toCategory(stringField(metadata, 'file_type')),
    ...(score !== undefined ? { score } : {}),
    ...(language ? { language } : {}),
  };
}

/**
 * HTTP client for the remote retrieval API
 */
export class RetrievalClient {
  readonly apiUrl: string;
  readonly projectId: string;
  private readonly timeoutMs: number;
  private readonly healthTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: RetrievalClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.projectId = options.projectId;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 5000;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  private url(pathname: string): string {
    return `${this.apiUrl}${pathname}`;
  }

  /**
   * GET /health. Never throws: timeouts and transport errors mean unhealthy.
   */
  async getHealth(): Promise<HealthReport> {
    try {
      const res = await this.fetchImpl(this.url('/health'), {
        signal: AbortSignal.timeout(this.healthTimeoutMs),
      });
      if (!res.ok) return { healthy: false };

      let status: string | undefined;
      try {
        status = healthBodySchema.parse(await res.json()).status;
      } catch {
        status = undefined;
      }
      return status === undefined ? { healthy: true } : { healthy: true, status };
    } catch (error) {
      this.logger.debug('Health check failed', { error: errorMessage(error) });
      return { healthy: false };
    }
  }

  async healthCheck(): Promise<boolean> {
    return (await this.getHealth()).healthy;
  }

  /**
   * POST /documents as multipart form data. Non-2xx and transport errors are failures.
   */
  async uploadDocument(request: IngestRequest): Promise<UploadOutcome> {
    const form = new FormData();
    form.append('file', new Blob([request.content]), request.filename);
    form.append('project_id', request.projectId);
    form.append('metadata', JSON.stringify(request.metadata));

    try {
      const res = await this.fetchImpl(this.url('/documents'), { method: 'POST', body: form });
      if (res.ok) {
        // The socket returns to the keep-alive pool only once the body is consumed
        await res.arrayBuffer();
        return { ok: true };
      }

      const body = await res.text().catch(() => '');
      return { ok: false, error: `HTTP ${res.status}${body ? ` - ${body.slice(0, 200)}` : ''}` };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const requested = options.mode ?? 'semantic';
    // No keyword-combination endpoint exists remotely: hybrid runs as semantic
    const mode: SearchMode = requested === 'hybrid' ? 'semantic' : requested;
    if (requested === 'hybrid') {
      this.logger.debug('Using semantic search for hybrid mode');
    }

    const body: Record<string, unknown> = {
      query,
      project_id: options.projectId ?? this.projectId,
      limit: options.limit ?? DEFAULT_SEARCH_LIMIT,
      mode,
    };
    if (options.fileTypes?.length) body.file_types = options.fileTypes;
    if (options.languages?.length) body.languages = options.languages;

    const payload = await this.requestJson('/search', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });

    return this.toResults(payload);
  }

  /**
   * Documents close to an already indexed file, by its source path
   */
  async findSimilar(
    filePath: string,
    limit: number = DEFAULT_SEARCH_LIMIT,
  ): Promise<SearchResult[]> {
    const payload = await this.requestJson('/search/similar', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ file_path: filePath, limit, project_id: this.projectId }),
    });

    return this.toResults(payload);
  }

  /**
   * Search for `<type> patterns` and reshape the hits into pattern records
   */
  async extractPatterns(
    patternType = 'architectural',
    limit = 10,
    projectId: string = this.projectId,
  ): Promise<PatternRecord[]> {
    const results = await this.search(`${patternType} patterns`, { limit, projectId });

    return results.slice(0, limit).map((result) => ({
      type: patternType,
      source: result.source,
      content: result.content,
      category: result.category,
      ...(result.score !== undefined ? { score: result.score } : {}),
    }));
  }

  private toResults(payload: unknown): SearchResult[] {
    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RetrievalError('Unexpected search response shape', undefined, parsed.error.message);
    }

    return parsed.data.map((item, index) => toSearchResult(item, index + 1));
  }

  async getStats(projectId: string = this.projectId): Promise<Record<string, unknown>> {
    const payload = await this.requestJson(`/projects/${encodeURIComponent(projectId)}/stats`);
    const parsed = statsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RetrievalError('Unexpected stats response shape', undefined, parsed.error.message);
    }
    return parsed.data;
  }

  async deleteProject(projectId: string = this.projectId): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.url(`/projects/${encodeURIComponent(projectId)}`), {
        method: 'DELETE',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await res.arrayBuffer();
      return res.ok;
    } catch (error) {
      this.logger.error('Delete project failed', error);
      return false;
    }
  }

  private async requestJson(pathname: string, init: RequestInit = {}): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.url(pathname), {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RetrievalError(`Request to ${pathname} failed`, undefined, errorMessage(error));
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new RetrievalError(
        `Request to ${pathname} failed: HTTP ${res.status}`,
        res.status,
        text || undefined,
      );
    }

    try {
      return await res.json();
    } catch (error) {
      throw new RetrievalError(`Invalid JSON from ${pathname}`, res.status, errorMessage(error));
    }
  }
}
