import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Classification, DocumentCategory } from './types.js';

const fileTypesSchema = z.object({
  testIndicators: z.array(z.string().min(1)),
  codeExtensions: z.array(z.string().startsWith('.')),
  documentationExtensions: z.array(z.string().startsWith('.')),
  configurationExtensions: z.array(z.string().startsWith('.')),
  languages: z.record(z.string()),
});

export interface FileTypeTables {
  readonly testIndicators: readonly string[];
  readonly codeExtensions: ReadonlySet<string>;
  readonly extensionSets: ReadonlyArray<readonly [DocumentCategory, ReadonlySet<string>]>;
  readonly languages: ReadonlyMap<string, string>;
}

const FILE_TYPES_PATH = new URL('../../data/file-types.json', import.meta.url);

function loadFileTypeTables(): FileTypeTables {
  const raw: unknown = JSON.parse(fs.readFileSync(FILE_TYPES_PATH, 'utf-8'));
  const data = fileTypesSchema.parse(raw);

  const codeExtensions = new Set(data.codeExtensions);

  // Code before documentation before configuration
  const extensionSets = Object.freeze([
    ['code', codeExtensions],
    ['documentation', new Set(data.documentationExtensions)],
    ['configuration', new Set(data.configurationExtensions)],
  ] as const);

  return Object.freeze({
    testIndicators: Object.freeze(data.testIndicators.map((p) => p.toLowerCase())),
    codeExtensions,
    extensionSets,
    languages: new Map(Object.entries(data.languages)),
  });
}

export const FILE_TYPES: FileTypeTables = loadFileTypeTables();

const normalize = (filePath: string): string => filePath.replace(/\\/g, '/').toLowerCase();

/**
 * Lower-cased extension including the dot, '' for dotfiles and extensionless names
 */
export function extensionOf(filePath: string): string {
  return path.posix.extname(normalize(filePath));
}

export function isTestPath(filePath: string): boolean {
  const normalized = normalize(filePath);
  return FILE_TYPES.testIndicators.some((indicator) => normalized.includes(indicator));
}

/**
 * Language tag for code-like extensions only
 */
export function detectLanguage(filePath: string): string | undefined {
  const ext = extensionOf(filePath);
  if (!FILE_TYPES.codeExtensions.has(ext)) return undefined;
  return FILE_TYPES.languages.get(ext);
}

function categoryByExtension(ext: string): DocumentCategory {
  for (const [category, extensions] of FILE_TYPES.extensionSets) {
    if (extensions.has(ext)) return category;
  }
  return 'other';
}

/**
 * Classify a path into a document category and optional language.
 * Pure: no filesystem access, total over all strings.
 */
export function classify(filePath: string): Classification {
  const language = detectLanguage(filePath);
  const category: DocumentCategory = isTestPath(filePath)
    ? 'test'
    : categoryByExtension(extensionOf(filePath));

  return language ? { category, language } : { category };
}
