import { CompilerFailedError, ToolchainMissingError } from '../build/errors.js';
import { echo, logDebug } from '../dx/logger.js';
import { traceDebug } from '../dx/trace.js';
import type { RustExtension } from '../extension/rustExtension.js';
import { buildCargoCommand, type CargoEnvOptions, type CargoInvocation } from './buildCommand.js';
import type { RuntimeFeature, ToolchainInfo } from './compilerTypes.js';
import { summarizeErrors } from './diagnostics.js';
import { formatCommandLine, isLaunchFailure, runCommand, type CommandRunner } from './runCommand.js';

export type CompileOptions = CargoEnvOptions & {
  runner?: CommandRunner;
};

export type CompileResult = {
  invocation: CargoInvocation;
  /** Combined cargo output of the successful run. */
  output: string;
};

/**
 * Run `cargo build` for one extension.
 *
 * Throws ToolchainMissingError when cargo cannot be launched and
 * CompilerFailedError on a non-zero exit; the full cargo output is kept on the
 * error even for quiet extensions.
 */
export function compileExtension(
  toolchain: ToolchainInfo,
  extension: RustExtension,
  runtime: RuntimeFeature,
  options: CompileOptions = {},
): CompileResult {
  const runner = options.runner ?? runCommand;
  const invocation = buildCargoCommand(toolchain, extension, runtime, options);
  const commandLine = formatCommandLine(invocation.command, invocation.args);

  if (!extension.quiet) echo(commandLine);
  logDebug('compile', { extension: extension.label, cmd: commandLine });
  traceDebug('compile.spawn', { extension: extension.label, command: invocation.command, args: invocation.args });

  const res = runner(invocation.command, invocation.args, { env: invocation.env });

  if (isLaunchFailure(res)) {
    throw new ToolchainMissingError(invocation.command, res.error?.code);
  }
  if (res.error || res.status !== 0) {
    const summary = summarizeErrors(res.output) || res.error?.message;
    throw new CompilerFailedError(res.status, res.output, summary);
  }

  if (!extension.quiet) echo(res.output);
  return { invocation, output: res.output };
}
