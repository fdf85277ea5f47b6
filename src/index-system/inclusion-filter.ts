import fs from 'fs/promises';
import path from 'path';
import { classify } from './classifier.js';
import type { DocumentCategory, InclusionDecision, InclusionSpec } from './types.js';

/**
 * Directory (and junk file) names that exclude a path wherever they appear.
 * Not overridable by the inclusion spec.
 */
export const DENIED_SEGMENTS: ReadonlySet<string> = new Set([
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.tox',
  '.coverage',
  'dist',
  'build',
  'out',
  'target',
  'bin',
  'obj',
  '.venv',
  'venv',
  'env',
  '.DS_Store',
  'Thumbs.db',
]);

/** Dotfiles indexed despite being hidden */
export const ALLOWED_DOTFILES: ReadonlySet<string> = new Set([
  '.gitignore',
  '.dockerignore',
  '.env.example',
  '.env.template',
]);

export const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10 MiB

export const DEFAULT_INCLUSION: InclusionSpec = {
  includeCode: true,
  includeDocs: true,
  includeConfigs: false,
  includeTests: false,
  includeAll: false,
};

export interface InclusionOptions {
  /** Segment rules apply to the path relative to this root */
  root?: string;
  maxFileSize?: number;
}

const segmentsOf = (filePath: string, root?: string): string[] => {
  const relative = root && path.isAbsolute(filePath) ? path.relative(root, filePath) : filePath;
  return relative.split(/[\\/]+/).filter((part) => part !== '' && part !== '.');
};

export function isHiddenExcluded(segments: readonly string[]): boolean {
  const fileName = segments[segments.length - 1] ?? '';
  if (ALLOWED_DOTFILES.has(fileName)) return false;
  return segments.some((part) => part.startsWith('.') && part !== '..');
}

export function isDenied(segments: readonly string[]): boolean {
  return segments.some((part) => DENIED_SEGMENTS.has(part));
}

export function isCategoryEnabled(category: DocumentCategory, spec: InclusionSpec): boolean {
  if (spec.includeAll) return true;

  switch (category) {
    case 'code':
      return spec.includeCode;
    case 'documentation':
      return spec.includeDocs;
    case 'configuration':
      return spec.includeConfigs;
    case 'test':
      return spec.includeTests;
    case 'other':
      return false;
  }
}

/**
 * Decide whether a file takes part in indexing, with the reason when it does not.
 * Rules short-circuit in order: hidden, deny-list, size, category.
 */
export async function decideInclusion(
  filePath: string,
  spec: InclusionSpec,
  options: InclusionOptions = {},
): Promise<InclusionDecision> {
  const segments = segmentsOf(filePath, options.root);

  if (isHiddenExcluded(segments)) return { included: false, reason: 'hidden' };
  if (isDenied(segments)) return { included: false, reason: 'denied' };

  const absolutePath = options.root ? path.resolve(options.root, filePath) : filePath;
  try {
    const stats = await fs.stat(absolutePath);
    if (stats.size > (options.maxFileSize ?? MAX_FILE_SIZE)) {
      return { included: false, reason: 'size' };
    }
  } catch {
    // Broken symlink, permission error or vanished file
    return { included: false, reason: 'unreadable' };
  }

  const classification = classify(segments.join('/'));
  if (!isCategoryEnabled(classification.category, spec)) {
    return { included: false, reason: 'category' };
  }

  return { included: true, ...classification };
}

export async function shouldInclude(
  filePath: string,
  spec: InclusionSpec,
  options: InclusionOptions = {},
): Promise<boolean> {
  return (await decideInclusion(filePath, spec, options)).included;
}

/**
 * Build an inclusion spec from the `--include-*` style flags
 */
export function resolveInclusion(flags: Partial<InclusionSpec>): InclusionSpec {
  return {
    includeCode: flags.includeCode ?? DEFAULT_INCLUSION.includeCode,
    includeDocs: flags.includeDocs ?? DEFAULT_INCLUSION.includeDocs,
    includeConfigs: flags.includeConfigs ?? DEFAULT_INCLUSION.includeConfigs,
    includeTests: flags.includeTests ?? DEFAULT_INCLUSION.includeTests,
    includeAll: flags.includeAll ?? DEFAULT_INCLUSION.includeAll,
  };
}
