import { describe, it, expect } from 'vitest';
import { chmodSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { delimiter, join } from 'node:path';

import { which } from './which.js';

describe.skipIf(process.platform === 'win32')('which', () => {
  it('finds the first executable on PATH', () => {
    const a = mkdtempSync(join(tmpdir(), 'rustext-which-a-'));
    const b = mkdtempSync(join(tmpdir(), 'rustext-which-b-'));
    writeFileSync(join(b, 'cargo'), '#!/bin/sh\n');
    chmodSync(join(b, 'cargo'), 0o755);

    expect(which('cargo', { PATH: `${a}${delimiter}${b}` })).toBe(join(b, 'cargo'));
  });

  it('skips files that are not executable', () => {
    const dir = mkdtempSync(join(tmpdir(), 'rustext-which-'));
    writeFileSync(join(dir, 'cargo'), '');
    chmodSync(join(dir, 'cargo'), 0o644);

    expect(which('cargo', { PATH: dir })).toBe(null);
  });

  it('checks explicit paths directly', () => {
    expect(which('/definitely/not/here/cargo', { PATH: '' })).toBe(null);
  });
});
