import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('picocolors', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    green: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { envsCommand } from './envs.js';
import { missingTool, testRuntime } from '../__fixtures__/test-runtime.js';
import type { CommandRunner } from '../../environments/detectors.js';

describe('envsCommand', () => {
  let home: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    home = await mkdtemp(join(tmpdir(), 'cli-envs-test-'));
    await mkdir(join(home, '.virtualenvs', 'webapp', 'bin'), { recursive: true });
    await writeFile(join(home, '.virtualenvs', 'webapp', 'bin', 'activate'), '');
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('lists environments from every detector in sorted order', async () => {
    const root = join(home, 'miniconda');
    const condaInfo: CommandRunner = async (file, args) => {
      if (file !== 'conda') return missingTool(file, args);
      return JSON.stringify({
        envs: [root, join(root, 'envs', 'ml')],
        root_prefix: root,
        active_prefix: join(root, 'envs', 'ml'),
        envs_dirs: [],
      });
    };
    const { runtime } = testRuntime(home, { run: condaInfo });

    expect(await envsCommand([], runtime)).toBe(0);

    expect(vi.mocked(p.log.message).mock.calls.map((call) => call[0])).toEqual([
      `conda:base ${root}`,
      `conda:ml (active) ${join(root, 'envs', 'ml')}`,
      `venv:webapp ${join(home, '.virtualenvs', 'webapp')}`,
      'mamba: Required tool not found: mamba (skipped)',
      `pyenv: pyenv versions directory not found: ${join(home, '.pyenv', 'versions')} (skipped)`,
    ]);
  });

  it('says so when nothing is found', async () => {
    await rm(join(home, '.virtualenvs'), { recursive: true });
    const { runtime } = testRuntime(home, {
      configure: (config) => {
        config.environments = { ...config.environments, conda: false, mamba: false, pyenv: false };
      },
    });

    expect(await envsCommand([], runtime)).toBe(0);
    expect(p.log.info).toHaveBeenCalledWith('No environments found');
  });
});
