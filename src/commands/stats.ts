import { ServiceUnavailableError } from '../errors.js';
import { formatError, formatSuccess, formatWarning } from '../ui/colors.js';
import { startExplorer } from '../ui/explore.js';
import { formatPatterns, formatProjectStats } from '../ui/format.js';
import type { CommandContext } from './context.js';

export async function runStats(ctx: CommandContext): Promise<boolean> {
  const stats = await ctx.client.getStats();
  ctx.print(
    ctx.json ? JSON.stringify(stats, null, 2) : formatProjectStats(ctx.config.projectId, stats),
  );
  return true;
}

export async function runExplore(ctx: CommandContext): Promise<boolean> {
  if (!(await ctx.client.healthCheck())) {
    throw new ServiceUnavailableError(ctx.client.apiUrl);
  }
  await startExplorer(ctx.client);
  return true;
}

export async function runPatterns(
  ctx: CommandContext,
  patternType: string,
  limit: number,
): Promise<boolean> {
  const patterns = await ctx.client.extractPatterns(patternType, limit);
  if (ctx.json) {
    ctx.print(JSON.stringify(patterns, null, 2));
  } else {
    ctx.print(patterns.length ? formatPatterns(patterns) : formatWarning('No patterns found'));
  }
  return patterns.length > 0;
}

/**
 * Remove every indexed document of the configured project. Needs `yes` to proceed.
 */
export async function runDelete(
  ctx: CommandContext,
  options: { yes?: boolean },
): Promise<boolean> {
  const { projectId } = ctx.config;
  if (!options.yes) {
    ctx.print(
      formatWarning(`This deletes every document of project '${projectId}'. Re-run with --yes`),
    );
    return false;
  }

  const deleted = await ctx.client.deleteProject(projectId);
  if (ctx.json) {
    ctx.print(JSON.stringify({ projectId, deleted }));
  } else {
    ctx.print(
      deleted
        ? formatSuccess(`Deleted project ${projectId}`)
        : formatError(`Failed to delete project ${projectId}`),
    );
  }
  return deleted;
}
