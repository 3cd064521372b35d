import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InvalidExtensionError, ManifestNotFoundError } from '../build/errors.js';
import { createRustExtension } from './rustExtension.js';

describe('RustExtension', () => {
  it('defaults to a loud release build with no extra args', () => {
    const ext = createRustExtension({ name: 'mypkg._native', manifestPath: 'crate/Cargo.toml' });
    expect(ext.release).toBe(true);
    expect(ext.profile).toBe('release');
    expect(ext.quiet).toBe(false);
    expect(ext.args).toEqual([]);
    expect(ext.version).toBeUndefined();
  });

  it('selects the debug profile when debug is set', () => {
    const ext = createRustExtension({ manifestPath: 'crate/Cargo.toml', debug: true });
    expect(ext.release).toBe(false);
    expect(ext.profile).toBe('debug');
  });

  it('is immutable once constructed', () => {
    const args = ['--locked'];
    const ext = createRustExtension({ manifestPath: 'crate/Cargo.toml', args });
    args.push('--offline');

    expect(ext.args).toEqual(['--locked']);
    expect(Object.isFrozen(ext)).toBe(true);
    expect(Object.isFrozen(ext.args)).toBe(true);
    expect(Reflect.set(ext, 'quiet', true)).toBe(false);
    expect(ext.quiet).toBe(false);
  });

  it('rejects an empty manifest path', () => {
    expect(() => createRustExtension({ manifestPath: '' })).toThrow(InvalidExtensionError);
  });

  it('rejects a malformed version requirement', () => {
    expect(() => createRustExtension({ manifestPath: 'Cargo.toml', version: 'not a range' })).toThrow(
      InvalidExtensionError,
    );
  });

  it('rejects names that are not dotted identifiers', () => {
    expect(() => createRustExtension({ name: 'mypkg/_native', manifestPath: 'Cargo.toml' })).toThrow(
      InvalidExtensionError,
    );
  });

  it('checks the manifest only when asked', () => {
    const dir = mkdtempSync(join(tmpdir(), 'rustext-ext-'));
    const manifestPath = join(dir, 'Cargo.toml');
    const ext = createRustExtension({ manifestPath });

    expect(() => ext.validateManifestExists()).toThrow(ManifestNotFoundError);

    writeFileSync(manifestPath, '[package]\nname = "demo"\n');
    expect(() => ext.validateManifestExists()).not.toThrow();
  });

  it('does not accept a directory as the manifest', () => {
    const dir = mkdtempSync(join(tmpdir(), 'rustext-ext-'));
    const manifestPath = join(dir, 'Cargo.toml');
    mkdirSync(manifestPath);

    expect(() => createRustExtension({ manifestPath }).validateManifestExists()).toThrow(ManifestNotFoundError);
  });

  it('reports the missing path', () => {
    const ext = createRustExtension({ manifestPath: 'missing/Cargo.toml' });
    try {
      ext.validateManifestExists();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ManifestNotFoundError);
      if (err instanceof ManifestNotFoundError) expect(err.path).toBe('missing/Cargo.toml');
    }
  });
});
