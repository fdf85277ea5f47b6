import chalk from 'chalk';
import { CorpusError, ServiceUnavailableError, errorMessage } from '../errors.js';

/**
 * Lines printed to stderr for an error that ended a command
 */
export function formatCliError(error: unknown): string[] {
  if (!(error instanceof CorpusError)) {
    return [chalk.red(`Unexpected error: ${errorMessage(error)}`)];
  }

  const lines = [chalk.red(`Error: ${error.message}`)];
  if (error.internalDetails) {
    lines.push(chalk.dim(`Details: ${error.internalDetails}`));
  }
  if (error instanceof ServiceUnavailableError) {
    lines.push(chalk.dim('Run: corpus server start'));
  }
  return lines;
}

/**
 * Run a command body and translate its result into `process.exitCode`
 */
export async function execute(
  task: () => Promise<boolean> | boolean,
  printError: (text: string) => void = (text) => console.error(text),
): Promise<number> {
  let code: number;
  try {
    code = (await task()) ? 0 : 1;
  } catch (error) {
    for (const line of formatCliError(error)) printError(line);
    code = 1;
  }
  process.exitCode = code;
  return code;
}
