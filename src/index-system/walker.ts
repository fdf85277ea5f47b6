import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { InvalidRootError, errorMessage } from '../errors.js';
import { silentLogger } from '../logger.js';
import { DENIED_SEGMENTS, decideInclusion } from './inclusion-filter.js';
import type { ExclusionReason, FileMetadata, WalkOptions, WorkItem } from './types.js';

async function assertReadableDirectory(root: string): Promise<void> {
  try {
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      throw new InvalidRootError(root, 'not a directory');
    }
    await fs.access(root, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    if (error instanceof InvalidRootError) throw error;
    throw new InvalidRootError(root, errorMessage(error));
  }
}

/**
 * Regular file, or a symlink resolving to one
 */
async function isRegularFile(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await fs.stat(fullPath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Collect candidate files. Entries are sorted by name so batch membership
 * is reproducible for a given tree.
 */
async function collectFiles(
  dirPath: string,
  recursive: boolean,
  files: string[],
  onSkippedDir: (dir: string, reason: string) => void,
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    onSkippedDir(dirPath, errorMessage(error));
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      if (!recursive) continue;
      // Deny-listed directories can never contribute a file
      if (DENIED_SEGMENTS.has(entry.name)) continue;
      await collectFiles(fullPath, recursive, files, onSkippedDir);
    } else if (await isRegularFile(entry, fullPath)) {
      files.push(fullPath);
    }
  }
}

/**
 * Enumerate the files under `root` that pass the inclusion filter and
 * build their metadata. The whole worklist is materialised before returning.
 */
export async function walkProject(root: string, options: WalkOptions): Promise<WorkItem[]> {
  const logger = options.logger ?? silentLogger;
  const projectRoot = path.resolve(root);

  await assertReadableDirectory(projectRoot);

  const candidates: string[] = [];
  await collectFiles(projectRoot, options.recursive, candidates, (dir, reason) =>
    logger.debug(`Skipping unreadable directory ${dir}`, { reason }),
  );

  const skipped: Partial<Record<ExclusionReason, number>> = {};
  const items: WorkItem[] = [];

  for (const absolutePath of candidates) {
    const relativePath = path.relative(projectRoot, absolutePath);
    const decision = await decideInclusion(relativePath, options.inclusion, {
      root: projectRoot,
      maxFileSize: options.maxFileSize,
    });

    if (!decision.included) {
      skipped[decision.reason] = (skipped[decision.reason] ?? 0) + 1;
      logger.debug(`Excluded ${relativePath}`, { reason: decision.reason });
      continue;
    }

    let size: number;
    let lastModified: number;
    try {
      const stats = await fs.stat(absolutePath);
      size = stats.size;
      lastModified = stats.mtimeMs;
    } catch (error) {
      // Vanished between filtering and metadata collection
      skipped.unreadable = (skipped.unreadable ?? 0) + 1;
      logger.debug(`Excluded ${relativePath}`, { reason: errorMessage(error) });
      continue;
    }

    const metadata: FileMetadata = Object.freeze({
      path: absolutePath,
      relativePath,
      category: decision.category,
      ...(decision.language ? { language: decision.language } : {}),
      size,
      lastModified,
      projectId: options.projectId,
    });

    items.push({ path: absolutePath, metadata });
  }

  logger.debug(`Walked ${projectRoot}`, {
    candidates: candidates.length,
    selected: items.length,
    skipped,
  });

  return items;
}
