import semver from 'semver';

import { UnsupportedRuntimeError } from '../build/errors.js';
import type { RuntimeFeature } from './compilerTypes.js';

/**
 * Node.js generations an extension can be built for, oldest first.
 * Supporting a new generation means adding a row.
 */
export const DEFAULT_RUNTIME_FEATURES: readonly RuntimeFeature[] = [
  { range: '>=14.0.0 <18.0.0', feature: 'napi6' },
  { range: '>=18.0.0', feature: 'napi8' },
];

export function selectRuntimeFeature(
  nodeVersion: string = process.versions.node,
  table: readonly RuntimeFeature[] = DEFAULT_RUNTIME_FEATURES,
): RuntimeFeature {
  const match = table.find((row) =>
    semver.satisfies(nodeVersion, row.range, { includePrerelease: true }),
  );
  if (!match) throw new UnsupportedRuntimeError(nodeVersion);
  return match;
}
