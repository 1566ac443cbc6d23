import { execFile } from 'child_process';
import { promisify } from 'util';
import { DependencyError, ProcessError } from '../errors/index.js';
import { getErrorCode, getErrorMessage, isError } from './errorHandling.js';

const execFilePromise = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs?: number;
  /** Upper bound for captured stdout/stderr (bytes) */
  maxBuffer?: number;
}

/**
 * Runs an external command. Implementations throw ProcessError for a
 * non-zero exit and DependencyError when the binary cannot be started.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Default runner: execFile, never a shell, so file names with quotes or
 * `$` are passed through as single arguments.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFilePromise(command, args, {
      timeout: options.timeoutMs ?? 0,
      maxBuffer: options.maxBuffer ?? 10 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { stdout, stderr };
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      throw new DependencyError(
        command,
        `Executable not found: ${command}`,
        { operation: 'execFile' },
        isError(error) ? error : undefined
      );
    }

    const exitCode = readExitCode(error);
    throw new ProcessError(
      command,
      exitCode,
      `${command} failed${exitCode !== null ? ` with exit code ${exitCode}` : ''}: ${getErrorMessage(error)}`,
      { operation: 'execFile', metadata: { args } },
      isError(error) ? error : undefined
    );
  }
};

function readExitCode(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}
