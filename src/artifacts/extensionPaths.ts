import { join, resolve } from 'path';

import { NODE_EXTENSION_SUFFIX } from '../compiler/outputNaming.js';
import type { RustExtension } from '../extension/rustExtension.js';

/**
 * Where compiled extensions go.
 *
 * In-place builds drop `mypkg/_native.node` into the source tree next to the
 * package's JavaScript; staged builds put it under `buildLib` for the packaging
 * step to pick up.
 */
export type ExtensionLayout = {
  inplace: boolean;
  sourceRoot: string;
  buildLib: string;
};

export function resolveLayout(partial: Partial<ExtensionLayout> = {}, cwd: string = process.cwd()): ExtensionLayout {
  return {
    inplace: partial.inplace ?? false,
    sourceRoot: resolve(cwd, partial.sourceRoot ?? '.'),
    buildLib: resolve(cwd, partial.buildLib ?? join('build', 'lib')),
  };
}

/** `<root>/<target dir>` for a dotted name: `mypkg._native` -> `<root>/mypkg/_native.node`. */
export function getExtensionFullPath(name: string, layout: ExtensionLayout): string {
  const parts = name.split('.');
  const last = parts.pop() ?? name;
  const root = layout.inplace ? layout.sourceRoot : layout.buildLib;
  return join(root, ...parts, `${last}${NODE_EXTENSION_SUFFIX}`);
}

/** cargo's output directory for the extension's profile. */
export function getTargetDir(extension: RustExtension): string {
  return join(extension.crateDir, 'target', extension.profile);
}
