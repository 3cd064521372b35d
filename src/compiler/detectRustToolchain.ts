import semver from 'semver';

import { logDebug } from '../dx/logger.js';
import type { ToolchainInfo } from './compilerTypes.js';
import { runCommand, type CommandRunner } from './runCommand.js';

const VERSION_RE = /\b(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?)\b/;

/**
 * Pull the version out of `rustc -V` output (`rustc 1.75.0 (82e1608df 2023-12-21)`).
 *
 * Falls back to the first `x.y.z` looking token for wrappers that print
 * something else first; returns null when there is none.
 */
export function parseRustcVersion(text: string): string | null {
  const tokens = text.trim().split(/\s+/);
  if (tokens[0] === 'rustc' && tokens[1] && VERSION_RE.test(tokens[1])) {
    return tokens[1];
  }
  const m = text.match(VERSION_RE);
  return m ? m[1] : null;
}

export function detectRustToolchain(
  runner: CommandRunner = runCommand,
  env: NodeJS.ProcessEnv = process.env,
): ToolchainInfo {
  const rustc = env.RUSTC || 'rustc';
  const cargo = env.CARGO || 'cargo';

  const res = runner(rustc, ['-V'], { env });
  if (res.error || res.status !== 0) {
    logDebug('rustc -V failed', { rustc, status: res.status, error: res.error?.code });
    return { version: null, rustc, cargo };
  }

  const raw = res.output.trim();
  const version = parseRustcVersion(raw);
  logDebug('rustc -V', { rustc, version, raw });
  return { version, rustc, cargo, raw };
}

/** Nightly and beta toolchains (`1.76.0-nightly`) may satisfy plain ranges. */
export function versionSatisfies(actual: string, constraint: string): boolean {
  return semver.satisfies(actual, constraint, { includePrerelease: true });
}
