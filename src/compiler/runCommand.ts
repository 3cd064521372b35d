import { spawnSync } from 'child_process';

export type RunOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type CommandResult = {
  /** Exit code, or null when the process never started or was killed by a signal. */
  status: number | null;
  /** stdout followed by stderr. cargo reports progress and diagnostics on stderr. */
  output: string;
  /** Set when the process could not be spawned at all. */
  error?: NodeJS.ErrnoException;
};

/**
 * Synchronous process launcher.
 *
 * Everything that shells out goes through this seam so tests can swap in an
 * in-process stand-in instead of requiring cargo/rustc on the machine.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunOptions,
) => CommandResult;

const LAUNCH_ERRORS = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR']);

export function isLaunchFailure(result: CommandResult): boolean {
  const code = result.error?.code;
  return code != null && LAUNCH_ERRORS.has(code);
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const res = spawnSync(command, [...args], {
    cwd: options.cwd,
    env: options.env,
    encoding: 'utf8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 64 * 1024 * 1024,
    windowsHide: true,
  });

  const output = [res.stdout, res.stderr].filter(Boolean).join('');
  const result: CommandResult = { status: res.status, output };
  if (res.error) result.error = res.error;
  return result;
};

function quoteArg(arg: string): string {
  if (arg === '') return '""';
  return /[\s"']/.test(arg) ? JSON.stringify(arg) : arg;
}

export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}
