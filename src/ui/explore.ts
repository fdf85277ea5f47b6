import * as readline from 'readline';
import type { RetrievalClient } from '../client.js';
import { errorMessage } from '../errors.js';
import { formatError, formatHeader, formatInfo, formatWarning } from './colors.js';
import { formatPatterns, formatProjectStats, formatSearchResults } from './format.js';

export type ExploreClient = Pick<
  RetrievalClient,
  | 'projectId'
  | 'search'
  | 'findSimilar'
  | 'extractPatterns'
  | 'getStats'
  | 'healthCheck'
>;

export type Print = (text: string) => void;

export type ExploreStep = 'continue' | 'exit';

export const EXPLORE_HELP = `
Available commands:
  search <query>    - Search indexed documents
  similar <file>    - Find documents similar to an indexed file
  patterns [type]   - Extract patterns of a kind (default: architectural)
  stats             - Show project statistics
  health            - Check RAG API health
  help              - Show this help message
  quit              - Exit interactive mode
`;

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

/**
 * Run one explorer command line. Errors are printed, never thrown.
 */
export async function handleExploreCommand(
  line: string,
  client: ExploreClient,
  print: Print,
): Promise<ExploreStep> {
  const input = line.trim();
  const lower = input.toLowerCase();

  if (!input) return 'continue';
  if (EXIT_WORDS.has(lower)) return 'exit';

  try {
    if (lower === 'help') {
      print(EXPLORE_HELP);
    } else if (lower.startsWith('search ')) {
      const results = await client.search(input.slice('search '.length).trim());
      print(results.length ? formatSearchResults(results) : formatWarning('No results found.'));
    } else if (lower.startsWith('similar ')) {
      const results = await client.findSimilar(input.slice('similar '.length).trim());
      print(results.length ? formatSearchResults(results) : formatWarning('No results found.'));
    } else if (lower === 'patterns' || lower.startsWith('patterns ')) {
      const type = input.slice('patterns'.length).trim();
      const patterns = await client.extractPatterns(type || undefined);
      print(patterns.length ? formatPatterns(patterns) : formatWarning('No patterns found.'));
    } else if (lower === 'stats') {
      print(formatProjectStats(client.projectId, await client.getStats()));
    } else if (lower === 'health') {
      print(`RAG API: ${(await client.healthCheck()) ? '✅ Healthy' : '❌ Unhealthy'}`);
    } else {
      print("Unknown command. Type 'help' for available commands.");
    }
  } catch (error) {
    print(formatError(`Error: ${errorMessage(error)}`));
  }

  return 'continue';
}

/**
 * Line-oriented explorer over stdin until `quit` or end of input
 */
export async function startExplorer(
  client: ExploreClient,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<void> {
  const print: Print = (text) => {
    output.write(`${text}\n`);
  };

  print(formatHeader('🔍 RAG Interactive Explorer'));
  print(formatInfo("Type 'help' for commands, 'quit' to exit"));

  const rl = readline.createInterface({ input, output, prompt: '\nrag> ' });
  rl.prompt();

  try {
    for await (const line of rl) {
      if ((await handleExploreCommand(line, client, print)) === 'exit') break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }

  print(formatInfo('Interactive exploration ended'));
}
