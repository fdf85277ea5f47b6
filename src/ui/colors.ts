/**
 * Terminal color theme
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { DocumentCategory } from '../index-system/types.js';

export const colors = {
  teal: chalk.hex('#5FB3B3'),
  sand: chalk.hex('#E5C07B'),
  coral: chalk.hex('#E06C75'),
  sage: chalk.hex('#98C379'),
  lavender: chalk.hex('#C678DD'),
  sky: chalk.hex('#61AFEF'),
  slate: chalk.hex('#7F848E'),
} as const;

/**
 * Semantic color mappings for different UI contexts
 */
export const theme = {
  success: colors.sage,
  info: colors.sky,
  warning: colors.sand,
  error: colors.coral,
  progress: colors.teal,

  dim: colors.slate,
  emphasis: chalk.bold,
  path: colors.teal,
  separator: colors.slate,

  relevance: colors.sage,
  relevanceEmpty: colors.slate,
} as const;

const CATEGORY_COLORS: Record<DocumentCategory, ChalkInstance> = {
  code: colors.sky,
  documentation: colors.sage,
  configuration: colors.sand,
  test: colors.lavender,
  other: colors.slate,
};

export function formatSuccess(message: string): string {
  return `${theme.success('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${theme.error('✗')} ${message}`;
}

export function formatInfo(message: string): string {
  return `${theme.info('ℹ')} ${message}`;
}

export function formatWarning(message: string): string {
  return `${theme.warning('⚠')} ${message}`;
}

export function formatProgress(message: string): string {
  return `${theme.progress('→')} ${message}`;
}

export function formatHeader(text: string): string {
  return theme.emphasis(text);
}

export function formatPath(path: string): string {
  return theme.path(path);
}

export function formatSeparator(length: number = 40): string {
  return theme.separator('─'.repeat(length));
}

export function formatCategory(category: DocumentCategory): string {
  return CATEGORY_COLORS[category](category);
}
