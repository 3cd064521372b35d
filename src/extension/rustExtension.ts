import { statSync } from 'fs';
import { dirname, resolve } from 'path';
import semver from 'semver';

import { InvalidExtensionError, ManifestNotFoundError } from '../build/errors.js';
import type { CargoProfile, RustExtensionOptions } from './extensionTypes.js';

/**
 * Everything needed to build one Rust crate into one native extension.
 *
 * Instances are frozen: the build orchestrator and artifact installer only
 * read them. The manifest is not checked here since build scripts may create
 * the crate after declaring it.
 */
export class RustExtension {
  readonly name: string | undefined;
  readonly manifestPath: string;
  readonly args: readonly string[];
  readonly features: readonly string[];
  readonly version: string | undefined;
  readonly quiet: boolean;
  readonly debug: boolean;

  constructor(options: RustExtensionOptions) {
    if (!options.manifestPath) {
      throw new InvalidExtensionError(`Extension ${options.name ?? '<unnamed>'} has no manifest path`);
    }
    if (options.name !== undefined && !isDottedName(options.name)) {
      throw new InvalidExtensionError(`Invalid extension name: ${JSON.stringify(options.name)}`);
    }
    if (options.version !== undefined && semver.validRange(options.version) === null) {
      throw new InvalidExtensionError(
        `Invalid rust version requirement for ${options.name ?? options.manifestPath}: ${options.version}`,
      );
    }

    this.name = options.name;
    this.manifestPath = options.manifestPath;
    this.args = Object.freeze([...(options.args ?? [])]);
    this.features = Object.freeze([...(options.features ?? [])]);
    this.version = options.version;
    this.quiet = options.quiet ?? false;
    this.debug = options.debug ?? false;
    Object.freeze(this);
  }

  get release(): boolean {
    return !this.debug;
  }

  get profile(): CargoProfile {
    return this.debug ? 'debug' : 'release';
  }

  /** Directory holding Cargo.toml; cargo's `target/` lives beside it. */
  get crateDir(): string {
    return dirname(resolve(this.manifestPath));
  }

  /** Human label for logs and error messages. */
  get label(): string {
    return this.name ?? this.manifestPath;
  }

  validateManifestExists(): void {
    // Must be a regular file; a directory named Cargo.toml does not count.
    if (!statSync(this.manifestPath, { throwIfNoEntry: false })?.isFile()) {
      throw new ManifestNotFoundError(this.manifestPath);
    }
  }
}

function isDottedName(name: string): boolean {
  return /^[A-Za-z_][\w-]*(\.[A-Za-z_][\w-]*)*$/.test(name);
}

export function createRustExtension(options: RustExtensionOptions): RustExtension {
  return new RustExtension(options);
}
