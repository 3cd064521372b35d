import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { runCli, type CliIo, type CliOptions } from './cliRunner.js';
import { detectPlatform } from './compiler/detectPlatform.js';
import { getSharedLibName } from './compiler/outputNaming.js';
import type { CommandResult } from './compiler/runCommand.js';
import { __resetConfigCacheForTests } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';

let root: string;
let bin: string;

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = { out: (l) => out.push(l), err: (l) => err.push(l) };
  return { io, out, err };
}

function fakeRunner(rustc: CommandResult = { status: 0, output: 'rustc 1.75.0 (82e1608df 2023-12-21)' }) {
  return (command: string, args: readonly string[]): CommandResult => {
    if (command === 'rustc') return rustc;
    if (args[0] === 'build') {
      const target = join(dirname(args[2]), 'target', args.includes('--release') ? 'release' : 'debug');
      mkdirSync(target, { recursive: true });
      writeFileSync(join(target, getSharedLibName('demo', detectPlatform())), 'lib');
    }
    return { status: 0, output: '' };
  };
}

function writeConfig(body: string) {
  writeFileSync(join(root, 'rustext.config.js'), `export default ${body};\n`, 'utf8');
}

function writeCrate() {
  mkdirSync(join(root, 'native'), { recursive: true });
  writeFileSync(join(root, 'native', 'Cargo.toml'), '[package]\nname = "demo"\n');
}

function options(io: CliIo, extra: Partial<CliOptions> = {}): CliOptions {
  return {
    cwd: root,
    env: { PATH: bin },
    runner: fakeRunner(),
    nodeVersion: '20.11.1',
    io,
    ...extra,
  };
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'rustext-cli-'));
  writeFileSync(join(root, 'package.json'), '{ "type": "module" }\n');
  bin = join(root, 'bin');
  mkdirSync(bin);
  writeFileSync(join(bin, 'cargo'), '#!/bin/sh\n');
  chmodSync(join(bin, 'cargo'), 0o755);
});

afterEach(() => {
  __resetConfigCacheForTests();
  setDebugEnabled(false);
  rmSync(root, { recursive: true, force: true });
});

describe('cli', () => {
  it('prints usage', async () => {
    const { io, out } = capture();
    expect(await runCli(['--help'], options(io))).toBe(0);
    expect(out[0]).toMatch(/^rustext\n\nUsage:/);
  });

  it('rejects unknown commands', async () => {
    const { io, err } = capture();
    expect(await runCli(['bench'], options(io))).toBe(1);
    expect(err[0]).toBe('Unknown command: bench');
  });

  it('needs a config to build', async () => {
    const { io, err } = capture();
    expect(await runCli(['build'], options(io))).toBe(1);
    expect(err).toEqual([`No rustext.config.js found in ${root}`]);
  });

  it('builds the configured extensions', async () => {
    writeCrate();
    writeConfig(`{ extensions: [{ name: "mypkg._native", manifestPath: "native/Cargo.toml", quiet: true }] }`);
    const { io, out } = capture();

    expect(await runCli(['build'], options(io))).toBe(0);
    expect(out).toEqual([`✓ mypkg._native -> ${join(root, 'build', 'lib', 'mypkg', '_native.node')}`]);
  });

  it('honours --inplace', async () => {
    writeCrate();
    writeConfig(`{ extensions: [{ name: "mypkg._native", manifestPath: "native/Cargo.toml", quiet: true }] }`);
    const { io, out } = capture();

    expect(await runCli(['build', '--inplace'], options(io))).toBe(0);
    expect(out).toEqual([`✓ mypkg._native -> ${join(root, 'mypkg', '_native.node')}`]);
  });

  it('exits non-zero and names the failure code', async () => {
    writeConfig(`{ extensions: [{ name: "mypkg._native", manifestPath: "missing/Cargo.toml", quiet: true }] }`);
    const { io, out } = capture();

    expect(await runCli(['build'], options(io))).toBe(1);
    expect(out).toEqual([
      `✗ mypkg._native [MANIFEST_NOT_FOUND]: Can not find rust extension manifest: ${join(root, 'missing', 'Cargo.toml')}`,
    ]);
  });

  it('reports an invalid config', async () => {
    writeConfig(`{ extensions: [{ name: "a" }] }`);
    const { io, err } = capture();

    expect(await runCli(['build'], options(io))).toBe(1);
    expect(err[0]).toMatch(/^✗ Invalid config .*rustext\.config\.js:\n {2}- extensions\.0\.manifestPath: /);
  });

  it('cleans the configured crates', async () => {
    writeCrate();
    writeConfig(`{ extensions: [{ name: "mypkg._native", manifestPath: "native/Cargo.toml", quiet: true }] }`);
    const { io, out } = capture();

    expect(await runCli(['clean'], options(io))).toBe(0);
    expect(out).toEqual(['✓ cleaned mypkg._native']);
  });
});

describe.skipIf(process.platform === 'win32')('cli doctor', () => {
  it('prints human-readable diagnostics', async () => {
    writeConfig(`{ extensions: [{ name: "a", manifestPath: "native/Cargo.toml", version: ">=1.70.0" }] }`);
    const { io, out } = capture();

    expect(await runCli(['doctor'], options(io))).toBe(0);
    expect(out[0].split('\n')).toEqual([
      '✓ Rust compiler detected (1.75.0)',
      `✓ cargo found at ${join(bin, 'cargo')}`,
      '✓ Config OK (1 extensions)',
      '✓ Node.js 20.11.1 builds with cargo feature napi8',
      '✓ a accepts Rust 1.75.0',
    ]);
  });

  it('fails when rustc is missing', async () => {
    const { io, out } = capture();
    const code = await runCli(['doctor'], options(io, { runner: fakeRunner({ status: 1, output: '' }) }));

    expect(code).toBe(1);
    expect(out[0].split('\n')[0]).toBe('✗ Rust compiler missing (rustc -V failed; install rustc + cargo)');
  });

  it('flags unsatisfied version requirements', async () => {
    writeConfig(`{ extensions: [{ name: "a", manifestPath: "native/Cargo.toml", version: ">=2.0.0" }] }`);
    const { io, out } = capture();

    expect(await runCli(['doctor'], options(io))).toBe(1);
    expect(out[0].split('\n')[4]).toBe('✗ a requires Rust >=2.0.0 (found 1.75.0)');
  });
});
