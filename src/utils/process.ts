import { spawn } from 'node:child_process';
import { access, constants } from 'node:fs/promises';
import { delimiter, isAbsolute, join, sep } from 'node:path';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kills the child with SIGKILL when aborted */
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number | null;
}

/**
 * Run a command to completion. Resolves with whatever exit code it produced;
 * rejects only when the process cannot be started or the signal aborts.
 */
export const runCommand = (
  command: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const { signal } = options;
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    const onAbort = (): void => {
      child.kill('SIGKILL');
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    // Decode across chunk boundaries so split multi-byte characters survive
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', error => {
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });

    child.on('close', code => {
      signal?.removeEventListener('abort', onAbort);
      resolve({ stdout, stderr, code });
    });
  });

/**
 * Locate an executable the way the shell would. Returns its path, or null.
 */
export async function resolveExecutable(command: string, pathEnv: string = process.env.PATH ?? ''): Promise<string | null> {
  const candidates = isAbsolute(command) || command.includes(sep)
    ? [command]
    : pathEnv.split(delimiter).filter(Boolean).map(dir => join(dir, command));

  for (const candidate of candidates) {
    const executable = await access(candidate, constants.X_OK).then(() => true, () => false);
    if (executable) return candidate;
  }
  return null;
}

export function tail(value: string, maxLength: number): string {
  return value.length <= maxLength ? value : value.slice(value.length - maxLength);
}
