import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandFailedError } from '@hostwatch/shared';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeout?: number;
}

/**
 * Runs an external tool without a shell. Rejects with
 * {@link CommandFailedError} when the tool is missing, exits non-zero or
 * times out.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandOutput>;

const DEFAULT_COMMAND_TIMEOUT = 10_000;

export const execFileRunner: CommandRunner = async (file, args, options = {}) => {
  const { timeout = DEFAULT_COMMAND_TIMEOUT } = options;
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      timeout,
      maxBuffer: 4 * 1024 * 1024,
      // sar and free localise decimal separators and row labels
      env: { ...process.env, LC_ALL: 'C' },
    });
    return { stdout, stderr };
  } catch (err) {
    throw new CommandFailedError(
      [file, ...args].join(' '),
      exitCodeOf(err),
      err instanceof Error ? err.message.split('\n')[0] : undefined,
    );
  }
};

function exitCodeOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return null;
}
