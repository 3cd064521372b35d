import { buildCargoCleanCommand } from '../compiler/buildCommand.js';
import { summarizeErrors } from '../compiler/diagnostics.js';
import { formatCommandLine, isLaunchFailure, runCommand, type CommandRunner } from '../compiler/runCommand.js';
import { echo, logDebug } from '../dx/logger.js';
import type { RustExtension } from '../extension/rustExtension.js';
import { CompilerFailedError, isRustExtError, ToolchainMissingError, type RustExtError } from './errors.js';

export type CleanOptions = {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
};

export type CleanResult =
  | { ok: true; extension: RustExtension }
  | { ok: false; extension: RustExtension; error: RustExtError };

function cleanOne(extension: RustExtension, runner: CommandRunner, env: NodeJS.ProcessEnv): void {
  extension.validateManifestExists();

  const { command, args } = buildCargoCleanCommand({ cargo: env.CARGO || 'cargo' }, extension);
  if (!extension.quiet) echo(formatCommandLine(command, args));
  logDebug('clean', { extension: extension.label, command, args });

  const res = runner(command, args, { env });
  if (isLaunchFailure(res)) throw new ToolchainMissingError(command, res.error?.code);
  if (res.error || res.status !== 0) {
    throw new CompilerFailedError(res.status, res.output, summarizeErrors(res.output) || res.error?.message);
  }
}

/** `cargo clean` every extension's crate, removing its whole `target/` directory. */
export function cleanRustExtensions(
  extensions: readonly RustExtension[],
  options: CleanOptions = {},
): CleanResult[] {
  const runner = options.runner ?? runCommand;
  const env = options.env ?? process.env;

  return extensions.map((extension): CleanResult => {
    try {
      cleanOne(extension, runner, env);
      return { ok: true, extension };
    } catch (err) {
      if (!isRustExtError(err)) throw err;
      return { ok: false, extension, error: err };
    }
  });
}
