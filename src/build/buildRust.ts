import { installArtifact } from '../artifacts/installArtifact.js';
import { resolveLayout, type ExtensionLayout } from '../artifacts/extensionPaths.js';
import type { RuntimeFeature, ToolchainInfo } from '../compiler/compilerTypes.js';
import { compileExtension } from '../compiler/compileExtension.js';
import { detectPlatform, type PlatformInfo } from '../compiler/detectPlatform.js';
import { detectRustToolchain, versionSatisfies } from '../compiler/detectRustToolchain.js';
import { runCommand, type CommandRunner } from '../compiler/runCommand.js';
import { selectRuntimeFeature } from '../compiler/runtimeFeatures.js';
import { logInfo } from '../dx/logger.js';
import { traceError, traceInfo } from '../dx/trace.js';
import type { RustExtension } from '../extension/rustExtension.js';
import type { BuildFailure, BuildOptions, BuildResult, BuildSuccess } from './buildTypes.js';
import { isRustExtError, ToolchainMissingError, VersionMismatchError } from './errors.js';

type BuildContext = {
  toolchain: ToolchainInfo & { version: string };
  layout: ExtensionLayout;
  platform: PlatformInfo;
  runner: CommandRunner;
  nodeVersion: string;
  runtimeFeatures: readonly RuntimeFeature[] | undefined;
  env: NodeJS.ProcessEnv | undefined;
  execPath: string | undefined;
};

function buildOne(extension: RustExtension, ctx: BuildContext): BuildSuccess {
  const { toolchain } = ctx;

  if (extension.version !== undefined && !versionSatisfies(toolchain.version, extension.version)) {
    throw new VersionMismatchError(toolchain.version, extension.version);
  }

  extension.validateManifestExists();
  const runtime = selectRuntimeFeature(ctx.nodeVersion, ctx.runtimeFeatures);

  const { output } = compileExtension(toolchain, extension, runtime, {
    runner: ctx.runner,
    env: ctx.env,
    execPath: ctx.execPath,
  });

  const installed = installArtifact(extension, ctx.layout, ctx.platform);
  return { ok: true, extension, output, ...installed };
}

/**
 * Build every extension with cargo and install the results.
 *
 * One result per extension, in input order. A missing toolchain fails the
 * whole batch without running cargo; every other failure only affects its own
 * extension, including I/O failures while installing (InstallFailedError).
 */
export function buildRustExtensions(
  extensions: readonly RustExtension[],
  options: BuildOptions = {},
): BuildResult[] {
  if (!extensions.length) return [];

  const runner = options.runner ?? runCommand;
  const toolchain = options.toolchain ?? detectRustToolchain(runner, options.env ?? process.env);
  traceInfo('build.begin', { extensions: extensions.length, rustc: toolchain.version });

  const { version } = toolchain;
  if (version === null) {
    const error = new ToolchainMissingError(toolchain.rustc, 'can not find Rust compiler');
    traceError('build.toolchainMissing', { rustc: toolchain.rustc });
    return extensions.map((extension): BuildFailure => ({ ok: false, extension, error }));
  }

  const ctx: BuildContext = {
    toolchain: { ...toolchain, version },
    layout: resolveLayout(options.layout, options.cwd),
    platform: options.platform ?? detectPlatform(),
    runner,
    nodeVersion: options.nodeVersion ?? process.versions.node,
    runtimeFeatures: options.runtimeFeatures,
    env: options.env,
    execPath: options.execPath,
  };

  return extensions.map((extension): BuildResult => {
    try {
      const res = buildOne(extension, ctx);
      logInfo('built', { extension: res.name, installedPath: res.installedPath });
      return res;
    } catch (err) {
      if (!isRustExtError(err)) throw err;
      traceError('build.failed', { extension: extension.label, code: err.code });
      return { ok: false, extension, error: err };
    }
  });
}

export class BuildBatchError extends Error {
  constructor(readonly failures: BuildFailure[]) {
    super(
      `${failures.length} rust extensions failed to build:\n` +
        failures.map((f) => `  - ${f.extension.label}: ${f.error.message.split('\n')[0]}`).join('\n'),
    );
    this.name = 'BuildBatchError';
  }
}

/**
 * Throwing view over build results for hosts that expect exceptions.
 * Returns the successes when every extension built.
 */
export function assertAllBuilt(results: readonly BuildResult[]): BuildSuccess[] {
  const failures = results.filter((r): r is BuildFailure => !r.ok);
  if (failures.length === 1) throw failures[0].error;
  if (failures.length > 1) throw new BuildBatchError(failures);
  return results.filter((r): r is BuildSuccess => r.ok);
}
