import type { PlatformInfo } from './detectPlatform.js';

/** Suffix cargo gives a `cdylib` on this host. */
export function getSharedLibExtension(platform: PlatformInfo): string {
  if (platform.isWindows) return '.dll';
  if (platform.isMac) return '.dylib';
  return '.so';
}

/** Prefix cargo puts in front of the crate name (`libfoo.so`, but `foo.dll`). */
export function getSharedLibPrefix(platform: PlatformInfo): string {
  return platform.isWindows ? '' : 'lib';
}

export function getSharedLibName(baseName: string, platform: PlatformInfo): string {
  return `${getSharedLibPrefix(platform)}${baseName}${getSharedLibExtension(platform)}`;
}

/**
 * Recover the extension name from a cargo artifact file name:
 * `libfast_math.so` -> `fast_math`.
 */
export function deriveExtensionName(artifactFile: string, platform: PlatformInfo): string {
  const prefix = getSharedLibPrefix(platform);
  const suffix = getSharedLibExtension(platform);

  let name = artifactFile;
  if (prefix && name.startsWith(prefix)) name = name.slice(prefix.length);
  if (name.endsWith(suffix)) name = name.slice(0, -suffix.length);
  return name;
}

/** File suffix Node.js expects for a compiled addon. */
export const NODE_EXTENSION_SUFFIX = '.node';
