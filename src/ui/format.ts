import type { PatternRecord, SearchResult } from '../client.js';
import type { IndexingStats } from '../index-system/types.js';
import type { ServerStatus } from '../lifecycle/types.js';
import { formatCategory, formatHeader, formatPath, formatSeparator, theme } from './colors.js';

export const CONTENT_PREVIEW_LENGTH = 200;

const COMPONENTS = ['ragApi', 'database', 'embeddings'] as const;

const COMPONENT_LABELS: Record<(typeof COMPONENTS)[number], string> = {
  ragApi: 'RAG API',
  database: 'Database',
  embeddings: 'Embeddings',
};

/**
 * Ten-cell bar for a score in [0, 1]
 */
export function relevanceBar(score: number): string {
  const filled = Math.max(0, Math.min(10, Math.floor(score * 10)));
  return theme.relevance('█'.repeat(filled)) + theme.relevanceEmpty('░'.repeat(10 - filled));
}

export function truncate(text: string, max = CONTENT_PREVIEW_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatSearchResult(result: SearchResult): string {
  const lines = [`📄 Result ${result.rank}: ${formatPath(result.source)}`];

  if (result.score !== undefined) {
    lines.push(`   Relevance: ${result.score.toFixed(3)} [${relevanceBar(result.score)}]`);
  }

  const type = formatCategory(result.category);
  lines.push(`   Type: ${result.language ? `${type} (${result.language})` : type}`);
  lines.push(`   Content: ${truncate(result.content)}`);

  return lines.join('\n');
}

export function formatSearchResults(results: SearchResult[]): string {
  return results.map(formatSearchResult).join('\n\n');
}

export function formatPatterns(patterns: PatternRecord[]): string {
  return patterns
    .map((pattern, index) =>
      [
        `🧩 Pattern ${index + 1} (${pattern.type}): ${formatPath(pattern.source)}`,
        `   ${truncate(pattern.content)}`,
      ].join('\n'),
    )
    .join('\n\n');
}

/**
 * Summary printed after `index`. Failures are listed only when `verbose`.
 */
export function formatIndexSummary(stats: IndexingStats, verbose = false): string[] {
  const lines: string[] = [];
  const categories = Object.entries(stats.byCategory);

  if (categories.length > 0) {
    lines.push('Files by type:');
    for (const [category, count] of categories) {
      lines.push(`  • ${category}: ${count}`);
    }
  }

  lines.push(theme.dim(`Duration: ${stats.durationMs} ms`));

  if (stats.failed > 0) {
    if (verbose) {
      lines.push(theme.error(`Failed files (${stats.failed}):`));
      for (const failure of stats.failures) {
        lines.push(`  ${formatPath(failure.path)}: ${failure.error}`);
      }
    } else {
      lines.push(theme.dim('Run with --verbose to list failed files'));
    }
  }

  return lines;
}

export function formatProjectStats(projectId: string, stats: Record<string, unknown>): string {
  return [
    formatHeader(`Project Statistics: ${projectId}`),
    formatSeparator(20),
    JSON.stringify(stats, null, 2),
  ].join('\n');
}

const serviceIcon = (state: string) => (state === 'running' ? '✅' : '❌');

const healthIcon = (health: string) => {
  if (health === 'healthy') return '🟢';
  if (health === 'starting') return '🟡';
  return '🔴';
};

export function formatServerStatus(status: ServerStatus): string {
  const lines = [
    formatHeader('RAG Server Status'),
    formatSeparator(),
    `Deployment: ${status.deployment}`,
    '',
    'Services:',
  ];

  const services = Object.entries(status.services);
  if (services.length === 0) {
    lines.push(theme.dim('  No running services'));
  }
  for (const [name, info] of services) {
    lines.push(`  ${serviceIcon(info.state)} ${name}: ${info.state} ${healthIcon(info.health)}`);
  }

  lines.push('', 'Health Checks:');
  for (const key of COMPONENTS) {
    lines.push(`  ${status.health[key] ? '✅' : '❌'} ${COMPONENT_LABELS[key]}`);
  }

  lines.push('', 'Ports:');
  for (const key of COMPONENTS) {
    const port = status.ports[key];
    if (port !== null) lines.push(`  🌐 ${COMPONENT_LABELS[key]}: localhost:${port}`);
  }

  return lines.join('\n');
}
