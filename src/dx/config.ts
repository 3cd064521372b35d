import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';

import { InvalidConfigError } from '../build/errors.js';
import { createRustExtension, type RustExtension } from '../extension/rustExtension.js';
import { logDebug } from './logger.js';

const extensionSchema = z
  .object({
    name: z.string().min(1).optional(),
    manifestPath: z.string().min(1),
    args: z.array(z.string()).optional(),
    features: z.array(z.string().min(1)).optional(),
    version: z.string().min(1).optional(),
    quiet: z.boolean().optional(),
    debug: z.boolean().optional(),
  })
  .strict();

const runtimeFeatureSchema = z
  .object({
    range: z.string().min(1),
    feature: z.string().min(1),
    env: z.record(z.string()).optional(),
  })
  .strict();

const configSchema = z
  .object({
    /** Extensions to build, manifest paths relative to the project root. */
    extensions: z.array(extensionSchema).default([]),
    /** Install next to sources by default (`rustext build --inplace` also sets this). */
    inplace: z.boolean().optional(),
    sourceRoot: z.string().optional(),
    buildLib: z.string().optional(),
    /** Enable debug logs without env var */
    debug: z.boolean().optional(),
    /** Replaces the built-in Node.js generation -> cargo feature table. */
    runtimeFeatures: z.array(runtimeFeatureSchema).optional(),
  })
  .strict();

export type RustextConfig = z.infer<typeof configSchema>;

const CONFIG_FILES = ['rustext.config.js', 'rustext.config.mjs'];

let cached:
  | { loaded: true; root: string; config: RustextConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string): string | null {
  for (const name of CONFIG_FILES) {
    const p = join(projectRoot, name);
    if (existsSync(p)) return p;
  }
  return null;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

export function parseConfig(raw: unknown, source: string): RustextConfig {
  const res = configSchema.safeParse(raw);
  if (!res.success) throw new InvalidConfigError(source, formatIssues(res.error));
  return res.data;
}

/**
 * Loads optional `rustext.config.js` (or `.mjs`) from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process and root
 * - Validated: a malformed config throws InvalidConfigError
 */
export async function loadOptionalConfig(projectRoot: string = process.cwd()): Promise<RustextConfig | null> {
  const root = resolve(projectRoot);
  if (cached.loaded && cached.root === root) return cached.config;

  const p = configPath(root);
  if (!p) {
    cached = { loaded: true, root, config: null };
    return null;
  }

  const mod: unknown = await import(pathToFileURL(p).href);
  const raw = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
  const config = parseConfig(raw, p);

  cached = { loaded: true, root, config };
  logDebug('loaded config', { path: p, extensions: config.extensions.length });
  return config;
}

/** Turn config entries into descriptors, resolving manifests against the project root. */
export function extensionsFromConfig(config: RustextConfig, projectRoot: string = process.cwd()): RustExtension[] {
  return config.extensions.map((e) =>
    createRustExtension({ ...e, manifestPath: resolve(projectRoot, e.manifestPath) }),
  );
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
