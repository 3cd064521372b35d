import { assertAllBuilt, buildRustExtensions } from '../build/buildRust.js';
import type { BuildOptions, BuildSuccess } from '../build/buildTypes.js';
import { cleanRustExtensions, type CleanOptions } from '../build/cleanRust.js';
import { logDebug } from '../dx/logger.js';
import type { RustExtension } from '../extension/rustExtension.js';

export type HostStepContext = {
  /** Install next to the sources instead of into the staged build tree. */
  inplace?: boolean;
};

/**
 * A build step a host build tool can register and sequence with its own.
 * Steps hold no state between runs, so calling `run` again is always safe.
 */
export interface HostStep<T> {
  readonly name: string;
  /** Whether the step has anything to do (hosts may skip it otherwise). */
  hasWork(): boolean;
  run(ctx?: HostStepContext): T;
}

type ExtensionSource = readonly RustExtension[] | (() => readonly RustExtension[]);

function resolveExtensions(source: ExtensionSource): readonly RustExtension[] {
  return typeof source === 'function' ? source() : source;
}

export function createBuildRustStep(
  extensions: ExtensionSource,
  options: BuildOptions = {},
): HostStep<BuildSuccess[]> {
  return {
    name: 'build_rust',
    hasWork: () => resolveExtensions(extensions).length > 0,
    run(ctx = {}) {
      const layout = { ...options.layout };
      if (ctx.inplace !== undefined) layout.inplace = ctx.inplace;
      const results = buildRustExtensions(resolveExtensions(extensions), { ...options, layout });
      return assertAllBuilt(results);
    },
  };
}

export function createCleanRustStep(extensions: ExtensionSource, options: CleanOptions = {}): HostStep<number> {
  return {
    name: 'clean_rust',
    hasWork: () => resolveExtensions(extensions).length > 0,
    run() {
      const results = cleanRustExtensions(resolveExtensions(extensions), options);
      const failed = results.find((r) => !r.ok);
      if (failed && !failed.ok) throw failed.error;
      return results.length;
    },
  };
}

export type DevelopChainOptions = {
  /** Host steps after which extensions are rebuilt in place. */
  triggers?: readonly string[];
};

/**
 * Re-runs the build step in place after the host finishes one of `triggers`
 * during a development install. The host calls `afterStep` explicitly from
 * its own workflow.
 */
export function createDevelopChain(step: HostStep<BuildSuccess[]>, options: DevelopChainOptions = {}) {
  const triggers = new Set(options.triggers ?? ['build_ext']);

  return {
    afterStep(stepName: string): BuildSuccess[] | null {
      if (!triggers.has(stepName)) return null;
      logDebug('develop chain', { after: stepName, run: step.name });
      return step.run({ inplace: true });
    },
  };
}
