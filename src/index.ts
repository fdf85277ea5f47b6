#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadEnvFiles } from './config.js';
import { DEFAULT_SEARCH_LIMIT } from './client.js';
import { runConfig } from './commands/config.js';
import { createContext, type GlobalOptions } from './commands/context.js';
import { runIndex } from './commands/index-project.js';
import { execute } from './commands/report.js';
import { runSearch } from './commands/search.js';
import { SERVER_ACTIONS, runServer } from './commands/server.js';
import { runDelete, runExplore, runPatterns, runStats } from './commands/stats.js';
import { DEPLOYMENT_PROFILES } from './lifecycle/types.js';

loadEnvFiles();

const positiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
};

const program = new Command();

program
  .name('corpus')
  .description('Index local projects into a retrieval service and search them')
  .version('0.1.0')
  .option('--api-url <url>', 'RAG API URL')
  .option('--project-id <id>', 'Project identifier')
  .option('--json', 'Output in JSON format')
  .option('--log-level <level>', 'Logging level: debug, info, warn, error');

const context = () => createContext(program.opts<GlobalOptions>());

// Index command
program
  .command('index')
  .description('Index project files')
  .option('--path <path>', 'Project directory path', '.')
  .option('--file <file>', 'Index a single file')
  .option('--recursive', 'Process subdirectories (default)')
  .option('--no-recursive', 'Only index files directly under the path')
  .option('--include-code', 'Include source code files (default)')
  .option('--no-include-code', 'Exclude source code files')
  .option('--include-docs', 'Include documentation files (default)')
  .option('--no-include-docs', 'Exclude documentation files')
  .option('--include-configs', 'Include configuration files')
  .option('--include-tests', 'Include test files')
  .option('--include-all', 'Include all supported file types')
  .option('--batch-size <n>', 'Files uploaded concurrently per batch', positiveInt)
  .option('-v, --verbose', 'List files that failed to upload')
  .action(async (options) => {
    await execute(() =>
      runIndex(context(), {
        path: options.path,
        file: options.file,
        recursive: options.recursive ?? true,
        includeCode: options.includeCode,
        includeDocs: options.includeDocs,
        includeConfigs: options.includeConfigs,
        includeTests: options.includeTests,
        includeAll: options.includeAll,
        batchSize: options.batchSize,
        verbose: options.verbose,
      }),
    );
  });

// Search command
program
  .command('search')
  .description('Search indexed documents')
  .argument('<query>', 'Search query')
  .option('--limit <n>', 'Number of results to return', positiveInt, DEFAULT_SEARCH_LIMIT)
  .option('--hybrid', 'Use hybrid search (vector + keyword)')
  .option('--mode <mode>', 'Search mode: semantic, hybrid, keyword')
  .option('--file-types <types...>', 'Filter by file types')
  .option('--languages <languages...>', 'Filter by programming languages')
  .action(async (query: string, options) => {
    await execute(() =>
      runSearch(context(), query, {
        limit: options.limit,
        hybrid: options.hybrid,
        mode: options.mode,
        fileTypes: options.fileTypes,
        languages: options.languages,
      }),
    );
  });

program
  .command('stats')
  .description('Get project statistics')
  .action(async () => {
    await execute(() => runStats(context()));
  });

program
  .command('patterns')
  .description('Extract recurring patterns from indexed documents')
  .argument('[type]', 'Kind of pattern to look for', 'architectural')
  .option('--limit <n>', 'Maximum patterns to return', positiveInt, 10)
  .action(async (type: string, options) => {
    await execute(() => runPatterns(context(), type, options.limit));
  });

program
  .command('delete')
  .description('Delete every indexed document of the project')
  .option('-y, --yes', 'Confirm the deletion')
  .action(async (options) => {
    await execute(() => runDelete(context(), { yes: options.yes }));
  });

program
  .command('explore')
  .description('Interactive exploration')
  .action(async () => {
    await execute(() => runExplore(context()));
  });

// Server management
program
  .command('server')
  .description('Manage the backing RAG service')
  .argument('<action>', `Action: ${SERVER_ACTIONS.join(', ')}`)
  .option('-d, --deployment <profile>', `Deployment profile: ${DEPLOYMENT_PROFILES.join(', ')}`)
  .option('--docker-dir <dir>', 'Directory holding the compose files')
  .option('--service <name>', 'Specific service for logs')
  .option('--tail <n>', 'Number of log lines to show', positiveInt, 100)
  .action(async (action: string, options) => {
    await execute(() =>
      runServer(context(), action, {
        deployment: options.deployment,
        dockerDir: options.dockerDir,
        service: options.service,
        tail: options.tail,
      }),
    );
  });

// Config command
program
  .command('config')
  .description('Show or update stored settings')
  .argument('[key]', 'Setting to update')
  .argument('[value]', 'New value')
  .option('--reset', 'Reset all configuration to defaults')
  .action(async (key: string | undefined, value: string | undefined, options) => {
    await execute(() =>
      runConfig(
        key,
        value,
        { reset: options.reset, json: program.opts<GlobalOptions>().json },
        (text) => console.log(text),
      ),
    );
  });

await program.parseAsync(process.argv);
