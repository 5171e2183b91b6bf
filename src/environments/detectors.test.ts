import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  CondaDetector,
  PyenvDetector,
  VenvDetector,
  createDetectors,
} from './detectors.js';
import type { CommandRunner } from './detectors.js';
import { DependencyMissingError } from '../errors.js';
import { DEFAULT_CONFIG } from '../config/schema.js';

async function touch(path: string): Promise<void> {
  await mkdir(join(path, '..'), { recursive: true });
  await writeFile(path, '', 'utf-8');
}

describe('environment detectors', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'detectors-test-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('CondaDetector', () => {
    it('names the root prefix base and marks the active prefix', async () => {
      const envsDir = join(tmpDir, 'conda', 'envs');
      await mkdir(envsDir, { recursive: true });
      const calls: string[][] = [];
      const run: CommandRunner = async (file, args) => {
        calls.push([file, ...args]);
        return JSON.stringify({
          root_prefix: '/opt/conda',
          active_prefix: '/opt/conda/envs/ml',
          envs: ['/opt/conda', '/opt/conda/envs/ml'],
          envs_dirs: [envsDir, join(tmpDir, 'missing')],
        });
      };

      const result = await new CondaDetector('conda', run, {}).detect();

      expect(calls).toEqual([['conda', 'info', '--json']]);
      expect(result.environments).toEqual([
        { type: 'conda', name: 'base', path: '/opt/conda', status: 'available' },
        { type: 'conda', name: 'ml', path: '/opt/conda/envs/ml', status: 'active' },
      ]);
      expect(result.watchDirs).toEqual([envsDir]);
    });

    it('falls back to CONDA_PREFIX for the active environment', async () => {
      const run: CommandRunner = async () => JSON.stringify({
        root_prefix: '/opt/mamba',
        envs: ['/opt/mamba', '/opt/mamba/envs/web'],
      });

      const result = await new CondaDetector('mamba', run, { CONDA_PREFIX: '/opt/mamba' }).detect();

      expect(result.environments.map((e) => [e.type, e.name, e.status])).toEqual([
        ['mamba', 'base', 'active'],
        ['mamba', 'web', 'available'],
      ]);
    });

    it('reports a missing tool as DependencyMissingError', async () => {
      const run: CommandRunner = async () => {
        throw Object.assign(new Error('spawn conda ENOENT'), { code: 'ENOENT' });
      };

      await expect(new CondaDetector('conda', run, {}).detect()).rejects.toBeInstanceOf(DependencyMissingError);
    });

    it('rejects output that is not JSON', async () => {
      const run: CommandRunner = async () => 'Traceback (most recent call last)';

      await expect(new CondaDetector('conda', run, {}).detect()).rejects.toThrow(/^conda info returned invalid JSON/);
    });
  });

  describe('VenvDetector', () => {
    it('lists directories holding an activate script under each root', async () => {
      await touch(join(tmpDir, '.virtualenvs', 'web', 'bin', 'activate'));
      await mkdir(join(tmpDir, '.virtualenvs', 'broken'), { recursive: true });
      await touch(join(tmpDir, 'venvs', 'win', 'Scripts', 'activate'));
      const active = join(tmpDir, '.virtualenvs', 'web');

      const result = await new VenvDetector([], { VIRTUAL_ENV: active }, tmpDir).detect();

      expect(result.environments).toEqual([
        { type: 'venv', name: 'web', path: active, status: 'active' },
        { type: 'venv', name: 'win', path: join(tmpDir, 'venvs', 'win'), status: 'available' },
      ]);
      expect(result.watchDirs).toEqual([join(tmpDir, '.virtualenvs'), join(tmpDir, 'venvs')]);
    });

    it('scans configured extra roots', async () => {
      const extra = join(tmpDir, 'projects', 'envs');
      await touch(join(extra, 'api', 'bin', 'activate'));

      const result = await new VenvDetector([extra], {}, tmpDir).detect();

      expect(result.environments.map((e) => e.name)).toEqual(['api']);
      expect(result.watchDirs).toEqual([extra]);
    });
  });

  describe('PyenvDetector', () => {
    it('lists installed versions and marks the global one active', async () => {
      const root = join(tmpDir, 'pyenv');
      await mkdir(join(root, 'versions', '3.12.1'), { recursive: true });
      await mkdir(join(root, 'versions', '3.11.9'), { recursive: true });
      await writeFile(join(root, 'version'), '3.12.1\n', 'utf-8');

      const result = await new PyenvDetector({ PYENV_ROOT: root }, tmpDir).detect();

      expect(result.environments.map((e) => [e.name, e.status])).toEqual([
        ['3.11.9', 'available'],
        ['3.12.1', 'active'],
      ]);
      expect(result.watchDirs).toEqual([join(root, 'versions')]);
    });

    it('prefers PYENV_VERSION over the version file', async () => {
      const root = join(tmpDir, '.pyenv');
      await mkdir(join(root, 'versions', '3.11.9'), { recursive: true });
      await writeFile(join(root, 'version'), '3.12.1\n', 'utf-8');

      const result = await new PyenvDetector({ PYENV_VERSION: '3.11.9' }, tmpDir).detect();

      expect(result.environments).toEqual([
        { type: 'pyenv', name: '3.11.9', path: join(root, 'versions', '3.11.9'), status: 'active' },
      ]);
    });

    it('rejects with DependencyMissingError when pyenv is not installed', async () => {
      await expect(new PyenvDetector({}, tmpDir).detect()).rejects.toBeInstanceOf(DependencyMissingError);
    });
  });

  describe('createDetectors', () => {
    it('creates one detector per enabled manager in watch order', () => {
      const detectors = createDetectors({ ...DEFAULT_CONFIG.environments, mamba: false }, { env: {}, home: tmpDir });
      expect(detectors.map((d) => d.type)).toEqual(['conda', 'venv', 'pyenv']);
    });
  });
});
