import { execFile } from 'child_process';
import util from 'util';

const execFileAsync = util.promisify(execFile);

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (
  command: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  stdout?: string;
  stderr?: string;
  message?: string;
}

const isExecFailure = (error: unknown): error is ExecFailure =>
  typeof error === 'object' && error !== null;

/**
 * Run a command without a shell. Never rejects: spawn failures, timeouts and
 * non-zero exits all come back as a result with a non-zero code.
 */
export const runCommand: CommandRunner = async (command, options = {}) => {
  const [file, ...args] = command;
  if (!file) {
    return { code: 1, stdout: '', stderr: 'Empty command' };
  }

  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs ?? 300000, // 5 minute timeout
      maxBuffer: 10 * 1024 * 1024, // 10MB buffer
      encoding: 'utf-8',
    });
    return { code: 0, stdout, stderr };
  } catch (error) {
    if (!isExecFailure(error)) {
      return { code: 1, stdout: '', stderr: String(error) };
    }

    const timedOut = error.killed === true;
    return {
      code: typeof error.code === 'number' ? error.code : 1,
      stdout: error.stdout ?? '',
      stderr: timedOut
        ? `Command timed out after ${(options.timeoutMs ?? 300000) / 1000} seconds`
        : error.stderr || error.message || 'Command failed',
    };
  }
};
