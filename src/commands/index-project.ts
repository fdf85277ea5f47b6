import ora, { type Ora } from 'ora';
import path from 'path';
import { IndexManager } from '../index-system/manager.js';
import { resolveInclusion } from '../index-system/inclusion-filter.js';
import type { IndexProgress, InclusionSpec, IndexingStats } from '../index-system/types.js';
import {
  formatError,
  formatInfo,
  formatProgress,
  formatSuccess,
  formatWarning,
} from '../ui/colors.js';
import { formatIndexSummary } from '../ui/format.js';
import type { CommandContext } from './context.js';

export interface IndexCommandOptions extends Partial<InclusionSpec> {
  path: string;
  /** Index one file and skip the walk */
  file?: string;
  recursive: boolean;
  batchSize?: number;
  verbose?: boolean;
}

const progressText = (progress: IndexProgress): string => {
  if (progress.phase === 'scanning') return progress.message ?? 'Scanning project files...';
  if (progress.phase === 'uploading') {
    const percent = progress.total > 0 ? Math.round((progress.current / progress.total) * 100) : 0;
    const batch = `${progress.batch ?? 0}/${progress.batches ?? 0}`;
    return `Uploading batch ${batch} (${progress.current}/${progress.total}, ${percent}%)`;
  }
  return 'Finishing...';
};

/**
 * A run failed only when files were selected and none of them made it
 */
export const indexSucceeded = (stats: IndexingStats): boolean =>
  stats.totalFiles === 0 || stats.successful > 0;

async function indexSingleFile(ctx: CommandContext, manager: IndexManager, file: string) {
  const outcome = await manager.indexFile(file);

  if (ctx.json) {
    ctx.print(JSON.stringify({ file, ...outcome }, null, 2));
  } else if (outcome.ok) {
    ctx.print(formatSuccess(`Indexed ${file}`));
  } else {
    ctx.print(formatError(`Failed to index ${file}: ${outcome.error}`));
  }
  return outcome.ok;
}

export async function runIndex(
  ctx: CommandContext,
  options: IndexCommandOptions,
): Promise<boolean> {
  const manager = new IndexManager({
    client: ctx.client,
    projectId: ctx.config.projectId,
    batchSize: options.batchSize ?? ctx.config.batchSize,
    logger: ctx.logger.child('index'),
  });

  if (options.file) {
    return indexSingleFile(ctx, manager, options.file);
  }

  const projectPath = path.resolve(options.path);
  const inclusion = resolveInclusion(options);

  if (!ctx.json) ctx.print(formatProgress(`Indexing project: ${projectPath}`));

  let spinner: Ora | undefined;
  if (!ctx.json && process.stderr.isTTY) {
    spinner = ora({ text: 'Scanning project files...', color: 'cyan' }).start();
  }

  let stats: IndexingStats;
  try {
    stats = await manager.indexProject(projectPath, {
      recursive: options.recursive,
      inclusion,
      onProgress: (progress) => {
        if (spinner) spinner.text = progressText(progress);
      },
    });
  } catch (error) {
    spinner?.fail('Indexing failed');
    throw error;
  }
  spinner?.stop();

  if (ctx.json) {
    ctx.print(JSON.stringify(stats, null, 2));
    return indexSucceeded(stats);
  }

  const { totalFiles, successful, failed } = stats;

  if (totalFiles === 0) {
    ctx.print(formatWarning('No files found to index'));
    ctx.print(formatInfo('Try adjusting --include-* flags or check project path'));
    return true;
  }

  if (successful > 0) {
    ctx.print(formatSuccess(`Successfully indexed ${successful}/${totalFiles} files`));
    if (failed > 0) ctx.print(formatWarning(`Failed to index ${failed}/${totalFiles} files`));
  } else {
    ctx.print(formatError(`Failed to index ${failed}/${totalFiles} files`));
  }

  for (const line of formatIndexSummary(stats, options.verbose)) {
    ctx.print(line);
  }

  if (successful > 0) ctx.print(formatSuccess('Ready for search!'));
  return indexSucceeded(stats);
}
