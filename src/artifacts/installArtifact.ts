import { copyFileSync, mkdirSync } from 'fs';
import { basename, dirname } from 'path';

import { InstallFailedError } from '../build/errors.js';
import type { PlatformInfo } from '../compiler/detectPlatform.js';
import { deriveExtensionName } from '../compiler/outputNaming.js';
import { logDebug } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import type { RustExtension } from '../extension/rustExtension.js';
import { getExtensionFullPath, type ExtensionLayout } from './extensionPaths.js';
import { locateArtifact } from './locateArtifact.js';

export type InstalledArtifact = {
  /** Extension name used for the destination (given or derived). */
  name: string;
  artifactPath: string;
  installedPath: string;
};

/**
 * Copy the cargo artifact to where the package layout expects the compiled
 * extension. The artifact stays in `target/` so it can be installed again
 * without rebuilding.
 */
export function installArtifact(
  extension: RustExtension,
  layout: ExtensionLayout,
  platform: PlatformInfo,
): InstalledArtifact {
  const artifact = locateArtifact(extension, platform);

  let name = extension.name;
  if (name === undefined) {
    name = deriveExtensionName(basename(artifact.path), platform);
    warn({
      code: 'DERIVED_EXTENSION_NAME',
      message: `extension for ${extension.manifestPath} has no name; installing as ${name}`,
    });
  }

  const installedPath = getExtensionFullPath(name, layout);
  try {
    mkdirSync(dirname(installedPath), { recursive: true });
    copyFileSync(artifact.path, installedPath);
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    throw new InstallFailedError(installedPath, err);
  }

  logDebug('installed', { extension: name, from: artifact.path, to: installedPath });
  traceInfo('install.copied', { extension: name, artifactPath: artifact.path, installedPath });
  return { name, artifactPath: artifact.path, installedPath };
}
