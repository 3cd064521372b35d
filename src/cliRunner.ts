import { buildRustExtensions } from './build/buildRust.js';
import type { BuildResult } from './build/buildTypes.js';
import { cleanRustExtensions } from './build/cleanRust.js';
import { isRustExtError } from './build/errors.js';
import { detectRustToolchain, versionSatisfies } from './compiler/detectRustToolchain.js';
import { runCommand, type CommandRunner } from './compiler/runCommand.js';
import { selectRuntimeFeature } from './compiler/runtimeFeatures.js';
import { extensionsFromConfig, loadOptionalConfig, type RustextConfig } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { which } from './utils/which.js';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export type CliOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  nodeVersion?: string;
  io?: CliIo;
};

const defaultIo: CliIo = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

export const USAGE = `rustext

Usage:
	rustext build [--inplace] [--build-lib <dir>] [--source-root <dir>] [--verbose]
	rustext clean
	rustext doctor

Extensions are declared in rustext.config.js at the project root:

	export default {
		extensions: [{ name: 'mypkg._native', manifestPath: 'native/Cargo.toml' }],
	};

Environment:
	RUSTC, CARGO        toolchain executables (default: rustc, cargo on PATH)
	RUSTEXT_DEBUG=1     debug logs
	RUSTEXT_TRACE=1     JSON trace events (RUSTEXT_TRACE_LEVEL=error|warn|info|debug)
`;

function getFlagValue(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

export function fmtOk(msg: string) {
  return `✓ ${msg}`;
}

export function fmtFail(msg: string) {
  return `✗ ${msg}`;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function formatBuildResult(r: BuildResult): string {
  if (r.ok) return fmtOk(`${r.name} -> ${r.installedPath}`);
  return fmtFail(`${r.extension.label} [${r.error.code}]: ${r.error.message}`);
}

async function requireConfig(cwd: string, io: CliIo): Promise<RustextConfig | null> {
  const config = await loadOptionalConfig(cwd);
  if (!config) {
    io.err(`No rustext.config.js found in ${cwd}`);
    return null;
  }
  if (config.debug) setDebugEnabled(true);
  if (!config.extensions.length) io.out('No rust extensions declared');
  return config;
}

async function runBuild(argv: string[], options: Required<Pick<CliOptions, 'cwd' | 'io'>> & CliOptions) {
  const { cwd, io } = options;
  const config = await requireConfig(cwd, io);
  if (!config) return 1;

  const results = buildRustExtensions(extensionsFromConfig(config, cwd), {
    cwd,
    env: options.env,
    runner: options.runner,
    nodeVersion: options.nodeVersion,
    runtimeFeatures: config.runtimeFeatures,
    layout: {
      inplace: hasFlag(argv, '--inplace') || config.inplace,
      sourceRoot: getFlagValue(argv, '--source-root') ?? config.sourceRoot,
      buildLib: getFlagValue(argv, '--build-lib') ?? config.buildLib,
    },
  });

  for (const r of results) io.out(formatBuildResult(r));
  return results.every((r) => r.ok) ? 0 : 1;
}

async function runClean(options: Required<Pick<CliOptions, 'cwd' | 'io'>> & CliOptions) {
  const { cwd, io } = options;
  const config = await requireConfig(cwd, io);
  if (!config) return 1;

  const results = cleanRustExtensions(extensionsFromConfig(config, cwd), {
    env: options.env,
    runner: options.runner,
  });
  for (const r of results) {
    io.out(r.ok ? fmtOk(`cleaned ${r.extension.label}`) : fmtFail(`${r.extension.label}: ${r.error.message}`));
  }
  return results.every((r) => r.ok) ? 0 : 1;
}

async function runDoctor(options: Required<Pick<CliOptions, 'cwd' | 'io'>> & CliOptions) {
  const { cwd, io } = options;
  const env = options.env ?? process.env;
  const lines: string[] = [];

  const toolchain = detectRustToolchain(options.runner ?? runCommand, env);
  if (toolchain.version) lines.push(fmtOk(`Rust compiler detected (${toolchain.version})`));
  else lines.push(fmtFail(`Rust compiler missing (${toolchain.rustc} -V failed; install rustc + cargo)`));

  const cargoPath = which(toolchain.cargo, env);
  if (cargoPath) lines.push(fmtOk(`cargo found at ${cargoPath}`));
  else lines.push(fmtFail(`cargo not found on PATH (${toolchain.cargo})`));

  let config: RustextConfig | null = null;
  try {
    config = await loadOptionalConfig(cwd);
    if (!config) lines.push(fmtOk('No rustext.config.js (nothing to build)'));
    else lines.push(fmtOk(`Config OK (${config.extensions.length} extensions)`));
  } catch (e) {
    lines.push(fmtFail(isRustExtError(e) ? e.message : `Config failed to load: ${errorMessage(e)}`));
  }

  const nodeVersion = options.nodeVersion ?? process.versions.node;
  try {
    const row = selectRuntimeFeature(nodeVersion, config?.runtimeFeatures);
    lines.push(fmtOk(`Node.js ${nodeVersion} builds with cargo feature ${row.feature}`));
  } catch (e) {
    lines.push(fmtFail(errorMessage(e)));
  }

  if (config && toolchain.version) {
    for (const e of config.extensions) {
      if (e.version === undefined) continue;
      const label = e.name ?? e.manifestPath;
      if (versionSatisfies(toolchain.version, e.version)) lines.push(fmtOk(`${label} accepts Rust ${toolchain.version}`));
      else lines.push(fmtFail(`${label} requires Rust ${e.version} (found ${toolchain.version})`));
    }
  }

  io.out(lines.join('\n'));
  return lines.some((l) => l.startsWith('✗')) ? 1 : 0;
}

/** Runs one CLI command and resolves to the process exit code. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIo;
  const cwd = options.cwd ?? process.cwd();
  const ctx = { ...options, io, cwd };
  const [cmd] = argv;

  if (hasFlag(argv, '--verbose')) setDebugEnabled(true);

  if (!cmd || cmd === '-h' || cmd === '--help') {
    io.out(USAGE);
    return 0;
  }

  try {
    if (cmd === 'build') return await runBuild(argv.slice(1), ctx);
    if (cmd === 'clean') return await runClean(ctx);
    if (cmd === 'doctor') return await runDoctor(ctx);
  } catch (e) {
    // Config and descriptor errors: report them the same way build failures are.
    if (!isRustExtError(e)) throw e;
    io.err(fmtFail(e.message));
    return 1;
  }

  io.err(`Unknown command: ${cmd}`);
  io.err(USAGE);
  return 1;
}
