import { SEARCH_MODES, type SearchMode } from '../client.js';
import { ConfigurationError, ServiceUnavailableError } from '../errors.js';
import { formatProgress, formatSuccess, formatWarning } from '../ui/colors.js';
import { formatSearchResults } from '../ui/format.js';
import type { CommandContext } from './context.js';

export interface SearchCommandOptions {
  limit: number;
  hybrid?: boolean;
  mode?: string;
  fileTypes?: string[];
  languages?: string[];
}

export function parseSearchMode(value: string): SearchMode {
  const mode = SEARCH_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new ConfigurationError(
      `Unknown search mode: ${value}. Expected one of ${SEARCH_MODES.join(', ')}`,
    );
  }
  return mode;
}

/**
 * Returns false when nothing matched, so the exit code reflects an empty answer
 */
export async function runSearch(
  ctx: CommandContext,
  query: string,
  options: SearchCommandOptions,
): Promise<boolean> {
  if (!(await ctx.client.healthCheck())) {
    throw new ServiceUnavailableError(ctx.client.apiUrl);
  }

  const mode = options.hybrid ? 'hybrid' : parseSearchMode(options.mode ?? 'semantic');

  if (!ctx.json) ctx.print(formatProgress(`Searching for: '${query}'`));

  const results = await ctx.client.search(query, {
    mode,
    limit: options.limit,
    fileTypes: options.fileTypes,
    languages: options.languages,
  });

  if (ctx.json) {
    ctx.print(JSON.stringify(results, null, 2));
    return results.length > 0;
  }

  if (results.length === 0) {
    ctx.print(formatWarning('No results found'));
    return false;
  }

  ctx.print(formatSuccess(`Found ${results.length} results:`));
  ctx.print('');
  ctx.print(formatSearchResults(results));
  return true;
}
