export { createRustExtension, RustExtension } from './extension/rustExtension.js';
export type { CargoProfile, RustExtensionOptions } from './extension/extensionTypes.js';

export { assertAllBuilt, BuildBatchError, buildRustExtensions } from './build/buildRust.js';
export type { BuildFailure, BuildOptions, BuildResult, BuildSuccess } from './build/buildTypes.js';
export { cleanRustExtensions } from './build/cleanRust.js';
export type { CleanOptions, CleanResult } from './build/cleanRust.js';
export {
  ArtifactNotFoundError,
  CompilerFailedError,
  InstallFailedError,
  InvalidConfigError,
  InvalidExtensionError,
  isRustExtError,
  ManifestNotFoundError,
  RustExtError,
  ToolchainMissingError,
  UnsupportedRuntimeError,
  VersionMismatchError,
} from './build/errors.js';
export type { RustExtErrorCode } from './build/errors.js';

export { detectRustToolchain, parseRustcVersion, versionSatisfies } from './compiler/detectRustToolchain.js';
export { DEFAULT_RUNTIME_FEATURES, selectRuntimeFeature } from './compiler/runtimeFeatures.js';
export type { RuntimeFeature, ToolchainInfo } from './compiler/compilerTypes.js';
export { detectPlatform } from './compiler/detectPlatform.js';
export type { PlatformInfo } from './compiler/detectPlatform.js';
export { runCommand } from './compiler/runCommand.js';
export type { CommandResult, CommandRunner, RunOptions } from './compiler/runCommand.js';

export { getExtensionFullPath, getTargetDir, resolveLayout } from './artifacts/extensionPaths.js';
export type { ExtensionLayout } from './artifacts/extensionPaths.js';
export { locateArtifact } from './artifacts/locateArtifact.js';
export { installArtifact } from './artifacts/installArtifact.js';

export { createBuildRustStep, createCleanRustStep, createDevelopChain } from './host/steps.js';
export type { DevelopChainOptions, HostStep, HostStepContext } from './host/steps.js';

export { extensionsFromConfig, loadOptionalConfig, parseConfig } from './dx/config.js';
export type { RustextConfig } from './dx/config.js';
export { setDebugEnabled } from './dx/logger.js';
