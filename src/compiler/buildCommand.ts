import { delimiter, dirname } from 'path';

import type { RustExtension } from '../extension/rustExtension.js';
import type { RuntimeFeature, ToolchainInfo } from './compilerTypes.js';

export type CargoInvocation = {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
};

export type CargoEnvOptions = {
  /** Ambient environment to start from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Node.js executable the extension is built for. Defaults to process.execPath. */
  execPath?: string;
};

/**
 * Binding crates built for the legacy generation locate Node through pkg-config
 * first. Always turned off so they fall back to the `node` found on PATH.
 */
export const LEGACY_PKG_CONFIG_OPT_OUT = 'NAPI_LEGACY_NO_PKG_CONFIG';

function pathKey(env: NodeJS.ProcessEnv): string {
  // Windows spells it `Path`; keep whatever spelling is already there.
  return Object.keys(env).find((k) => k.toUpperCase() === 'PATH') ?? 'PATH';
}

/**
 * Environment for cargo: the ambient one, the pkg-config opt-out, the runtime
 * generation's overrides, and PATH led by the directory of the running Node.js so binding crates link
 * against this runtime rather than another `node` found later on PATH.
 */
export function buildCargoEnv(runtime: RuntimeFeature, options: CargoEnvOptions = {}): NodeJS.ProcessEnv {
  const base = options.env ?? process.env;
  const execPath = options.execPath ?? process.execPath;
  const key = pathKey(base);
  const current = base[key];

  return {
    ...base,
    [LEGACY_PKG_CONFIG_OPT_OUT]: '1',
    ...(runtime.env ?? {}),
    [key]: current ? `${dirname(execPath)}${delimiter}${current}` : dirname(execPath),
  };
}

export function buildCargoCommand(
  toolchain: ToolchainInfo,
  extension: RustExtension,
  runtime: RuntimeFeature,
  options: CargoEnvOptions = {},
): CargoInvocation {
  const features = [runtime.feature, ...extension.features].join(',');

  // Profile flag goes before user args so a trailing `-- <rustc args>` keeps working.
  const args = [
    'build',
    '--manifest-path',
    extension.manifestPath,
    '--features',
    features,
    ...(extension.release ? ['--release'] : []),
    ...extension.args,
  ];

  return {
    command: toolchain.cargo,
    args,
    env: buildCargoEnv(runtime, options),
  };
}

export function buildCargoCleanCommand(
  toolchain: Pick<ToolchainInfo, 'cargo'>,
  extension: RustExtension,
): Omit<CargoInvocation, 'env'> {
  return {
    command: toolchain.cargo,
    args: ['clean', '--manifest-path', extension.manifestPath],
  };
}
