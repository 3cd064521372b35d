export type RustExtErrorCode =
  | 'TOOLCHAIN_MISSING'
  | 'VERSION_MISMATCH'
  | 'MANIFEST_NOT_FOUND'
  | 'UNSUPPORTED_RUNTIME'
  | 'COMPILER_FAILED'
  | 'ARTIFACT_NOT_FOUND'
  | 'INSTALL_FAILED'
  | 'INVALID_EXTENSION'
  | 'INVALID_CONFIG';

/**
 * Base class for every failure rustext reports.
 *
 * `code` is stable and meant for programmatic handling; `message` is for humans
 * and already carries the context (paths, versions, exit code) needed to
 * diagnose the failure without rerunning.
 */
export abstract class RustExtError extends Error {
  abstract readonly code: RustExtErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ToolchainMissingError extends RustExtError {
  readonly code = 'TOOLCHAIN_MISSING';

  constructor(
    readonly executable: string,
    detail?: string,
  ) {
    super(
      `Unable to execute '${executable}': this package requires Rust to be installed ` +
        `and cargo/rustc to be on the PATH${detail ? ` (${detail})` : ''}`,
    );
  }
}

export class VersionMismatchError extends RustExtError {
  readonly code = 'VERSION_MISMATCH';

  constructor(
    readonly actual: string,
    readonly required: string,
  ) {
    super(`Rust ${actual} does not match extension requirement ${required}`);
  }
}

export class ManifestNotFoundError extends RustExtError {
  readonly code = 'MANIFEST_NOT_FOUND';

  constructor(readonly path: string) {
    super(`Can not find rust extension manifest: ${path}`);
  }
}

export class UnsupportedRuntimeError extends RustExtError {
  readonly code = 'UNSUPPORTED_RUNTIME';

  constructor(readonly version: string) {
    super(`Unsupported Node.js version: ${version}`);
  }
}

export class CompilerFailedError extends RustExtError {
  readonly code = 'COMPILER_FAILED';

  constructor(
    readonly exitCode: number | null,
    readonly output: string,
    summary?: string,
  ) {
    const status = exitCode === null ? 'was terminated by a signal' : `failed with code: ${exitCode}`;
    const details = summary || output.trim();
    super(`cargo ${status}${details ? `\n\n${details}` : ''}`);
  }
}

export class ArtifactNotFoundError extends RustExtError {
  readonly code = 'ARTIFACT_NOT_FOUND';

  constructor(
    readonly searchedDir: string,
    readonly pattern: string,
  ) {
    super(`rust build failed; unable to find any ${pattern} in ${searchedDir}`);
  }
}

export class InstallFailedError extends RustExtError {
  readonly code = 'INSTALL_FAILED';

  constructor(
    readonly path: string,
    readonly cause: Error,
  ) {
    super(`Unable to install rust extension at ${path}: ${cause.message}`);
  }
}

export class InvalidExtensionError extends RustExtError {
  readonly code = 'INVALID_EXTENSION';
}

export class InvalidConfigError extends RustExtError {
  readonly code = 'INVALID_CONFIG';

  constructor(
    readonly path: string,
    readonly issues: string[],
  ) {
    super(`Invalid config ${path}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }
}

export function isRustExtError(err: unknown): err is RustExtError {
  return err instanceof RustExtError;
}
