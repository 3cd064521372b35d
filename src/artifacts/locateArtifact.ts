import { readdirSync, statSync, type Dirent } from 'fs';
import { join } from 'path';

import { ArtifactNotFoundError, InstallFailedError } from '../build/errors.js';
import type { PlatformInfo } from '../compiler/detectPlatform.js';
import { getSharedLibExtension } from '../compiler/outputNaming.js';
import { logDebug } from '../dx/logger.js';
import { warn } from '../dx/warnings.js';
import type { RustExtension } from '../extension/rustExtension.js';
import { getTargetDir } from './extensionPaths.js';

export type LocatedArtifact = {
  path: string;
  /** Every matching file in the profile directory, sorted by name. */
  candidates: string[];
};

function listDir(dir: string, pattern: string): Dirent[] {
  try {
    return readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT' || code === 'ENOTDIR') throw new ArtifactNotFoundError(dir, pattern);
    throw err instanceof Error ? new InstallFailedError(dir, err) : err;
  }
}

function isRegularFile(dir: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  // cargo may symlink the final artifact out of deps/; a dangling link is stale.
  return statSync(join(dir, entry.name), { throwIfNoEntry: false })?.isFile() ?? false;
}

function mtimeOf(path: string): number {
  try {
    return statSync(path).mtimeMs;
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    throw new InstallFailedError(path, err);
  }
}

/**
 * Find the shared library cargo produced for this extension.
 *
 * Several matches usually mean a stale crate was built into the same target
 * directory. The most recently written file wins (ties go to the first name)
 * and a warning is emitted.
 */
export function locateArtifact(extension: RustExtension, platform: PlatformInfo): LocatedArtifact {
  const dir = getTargetDir(extension);
  const suffix = getSharedLibExtension(platform);
  const pattern = `*${suffix}`;

  const candidates = listDir(dir, pattern)
    .filter((e) => e.name.endsWith(suffix) && isRegularFile(dir, e))
    .map((e) => e.name)
    .sort();

  if (!candidates.length) throw new ArtifactNotFoundError(dir, pattern);

  let chosen = candidates[0];
  if (candidates.length > 1) {
    let newest = mtimeOf(join(dir, chosen));
    for (const name of candidates.slice(1)) {
      const mtime = mtimeOf(join(dir, name));
      if (mtime > newest) {
        newest = mtime;
        chosen = name;
      }
    }
    warn({
      code: 'AMBIGUOUS_ARTIFACT',
      message: `found ${candidates.length} ${pattern} files in ${dir} (${candidates.join(', ')}); using ${chosen}`,
      hint: 'run `rustext clean` to drop stale artifacts',
    });
  }

  logDebug('artifact', { extension: extension.label, path: join(dir, chosen) });
  return { path: join(dir, chosen), candidates };
}
