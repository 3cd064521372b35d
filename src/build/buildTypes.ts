import type { ExtensionLayout } from '../artifacts/extensionPaths.js';
import type { RuntimeFeature, ToolchainInfo } from '../compiler/compilerTypes.js';
import type { PlatformInfo } from '../compiler/detectPlatform.js';
import type { CommandRunner } from '../compiler/runCommand.js';
import type { RustExtension } from '../extension/rustExtension.js';
import type { RustExtError } from './errors.js';

export type BuildOptions = {
  /** inplace / sourceRoot / buildLib. Relative paths resolve against `cwd`. */
  layout?: Partial<ExtensionLayout>;
  cwd?: string;
  /** A toolchain detected by the caller; when omitted the batch runs `rustc -V` once. */
  toolchain?: ToolchainInfo;
  runner?: CommandRunner;
  platform?: PlatformInfo;
  /** Node.js version to build for. Defaults to process.versions.node. */
  nodeVersion?: string;
  runtimeFeatures?: readonly RuntimeFeature[];
  env?: NodeJS.ProcessEnv;
  execPath?: string;
};

export type BuildSuccess = {
  ok: true;
  extension: RustExtension;
  /** Given or derived extension name. */
  name: string;
  artifactPath: string;
  installedPath: string;
  /** cargo output of the build, kept for hosts that log quiet extensions. */
  output: string;
};

export type BuildFailure = {
  ok: false;
  extension: RustExtension;
  error: RustExtError;
};

export type BuildResult = BuildSuccess | BuildFailure;
