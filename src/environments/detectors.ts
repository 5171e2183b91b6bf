/**
 * Environment detectors for conda, mamba, venv and pyenv.
 *
 * conda and mamba are asked for their inventory with `<tool> info --json`;
 * venv and pyenv are found on disk. A manager that is not installed makes
 * its detector reject with {@link DependencyMissingError}, which the
 * tracker reports and skips.
 *
 * @module environments/detectors
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { access, readdir, readFile, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { Config } from '../config/schema.js';
import type {
  DetectionResult,
  EnvironmentDescriptor,
  EnvironmentDetector,
} from './types.js';
import { DependencyMissingError, errnoCode, toError } from '../errors.js';

const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 15_000;

/** Runs an external tool and returns its stdout. */
export type CommandRunner = (file: string, args: string[], signal?: AbortSignal) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, signal) => {
  const { stdout } = await execFileAsync(file, args, {
    timeout: COMMAND_TIMEOUT_MS,
    maxBuffer: 8 * 1024 * 1024,
    signal,
  });
  return stdout;
};

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function subdirectories(path: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(path, { withFileTypes: true });
  } catch (err) {
    if (errnoCode(err) === 'ENOENT' || errnoCode(err) === 'ENOTDIR') return [];
    throw err;
  }
  return entries
    .filter((e) => e.isDirectory() || e.isSymbolicLink())
    .map((e) => e.name)
    .sort();
}

// ============================================================================
// conda / mamba
// ============================================================================

const CondaInfoSchema = z.object({
  root_prefix: z.string().optional(),
  active_prefix: z.string().nullable().optional(),
  envs: z.array(z.string()).default([]),
  envs_dirs: z.array(z.string()).default([]),
}).passthrough();

export class CondaDetector implements EnvironmentDetector {
  constructor(
    readonly type: 'conda' | 'mamba',
    private readonly run: CommandRunner = runCommand,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async detect(signal?: AbortSignal): Promise<DetectionResult> {
    let stdout: string;
    try {
      stdout = await this.run(this.type, ['info', '--json'], signal);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new DependencyMissingError(this.type);
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (err) {
      throw new Error(`${this.type} info returned invalid JSON: ${toError(err).message}`);
    }
    const info = CondaInfoSchema.parse(parsed);

    const root = info.root_prefix;
    const active = info.active_prefix ?? this.env.CONDA_PREFIX;
    const environments: EnvironmentDescriptor[] = info.envs.map((path) => ({
      type: this.type,
      name: path === root ? 'base' : basename(path),
      path,
      status: path === active ? 'active' : 'available',
    }));

    const candidates = info.envs_dirs.length > 0
      ? info.envs_dirs
      : root ? [join(root, 'envs')] : [];
    const watchDirs: string[] = [];
    for (const dir of candidates) {
      if (await isDirectory(dir)) watchDirs.push(dir);
    }

    return { type: this.type, environments, watchDirs };
  }
}

// ============================================================================
// venv
// ============================================================================

export const DEFAULT_VENV_DIRS = ['.virtualenvs', 'venvs', '.venvs'];

async function hasActivateScript(dir: string): Promise<boolean> {
  for (const candidate of [join(dir, 'bin', 'activate'), join(dir, 'Scripts', 'activate')]) {
    try {
      await access(candidate);
      return true;
    } catch {
      // not this layout
    }
  }
  return false;
}

export class VenvDetector implements EnvironmentDetector {
  readonly type = 'venv' as const;
  private readonly roots: string[];

  constructor(
    extraRoots: readonly string[] = [],
    private readonly env: NodeJS.ProcessEnv = process.env,
    home: string = homedir(),
  ) {
    const defaults = DEFAULT_VENV_DIRS.map((d) => join(home, d));
    this.roots = [...new Set([...defaults, ...extraRoots.map((r) => resolve(r))])];
  }

  async detect(): Promise<DetectionResult> {
    const environments: EnvironmentDescriptor[] = [];
    const watchDirs: string[] = [];
    const active = this.env.VIRTUAL_ENV;

    for (const root of this.roots) {
      if (!(await isDirectory(root))) continue;
      watchDirs.push(root);

      for (const name of await subdirectories(root)) {
        const path = join(root, name);
        if (await hasActivateScript(path)) {
          environments.push({
            type: 'venv',
            name,
            path,
            status: path === active ? 'active' : 'available',
          });
        }
      }
    }
    return { type: 'venv', environments, watchDirs };
  }
}

// ============================================================================
// pyenv
// ============================================================================

export class PyenvDetector implements EnvironmentDetector {
  readonly type = 'pyenv' as const;

  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly home: string = homedir(),
  ) {}

  get root(): string {
    return this.env.PYENV_ROOT ?? join(this.home, '.pyenv');
  }

  async detect(): Promise<DetectionResult> {
    const versionsDir = join(this.root, 'versions');
    if (!(await isDirectory(versionsDir))) {
      throw new DependencyMissingError('pyenv', `pyenv versions directory not found: ${versionsDir}`);
    }

    const selected = await this.selectedVersions();
    const environments: EnvironmentDescriptor[] = (await subdirectories(versionsDir)).map((name) => ({
      type: 'pyenv',
      name,
      path: join(versionsDir, name),
      status: selected.has(name) ? 'active' : 'available',
    }));
    return { type: 'pyenv', environments, watchDirs: [versionsDir] };
  }

  /** Versions named by PYENV_VERSION, or else by the global version file. */
  private async selectedVersions(): Promise<Set<string>> {
    const fromEnv = this.env.PYENV_VERSION;
    if (fromEnv) return new Set(fromEnv.split(':').filter((v) => v !== ''));

    try {
      const content = await readFile(join(this.root, 'version'), 'utf-8');
      return new Set(content.split(/\s+/).filter((v) => v !== '' && !v.startsWith('#')));
    } catch {
      return new Set();
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface DetectorDeps {
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

/** Detectors for every manager enabled in config, in watch-priority order. */
export function createDetectors(
  settings: Config['environments'],
  deps: DetectorDeps = {},
): EnvironmentDetector[] {
  const run = deps.run ?? runCommand;
  const env = deps.env ?? process.env;
  const home = deps.home ?? homedir();

  const detectors: EnvironmentDetector[] = [];
  if (settings.conda) detectors.push(new CondaDetector('conda', run, env));
  if (settings.mamba) detectors.push(new CondaDetector('mamba', run, env));
  if (settings.venv) detectors.push(new VenvDetector(settings.venv_dirs, env, home));
  if (settings.pyenv) detectors.push(new PyenvDetector(env, home));
  return detectors;
}
