import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  log: {
    message: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
    step: vi.fn(),
  },
}));

vi.mock('picocolors', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    blue: (s: string) => s,
    cyan: (s: string) => s,
    bgCyan: (s: string) => s,
    black: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { restoreCommand } from './restore.js';
import { saveCommand } from './save.js';
import { testRuntime } from '../__fixtures__/test-runtime.js';
import type { TestRuntime } from '../__fixtures__/test-runtime.js';
import {
  FakeCompositor,
  makeWindow,
  makeWorkspace,
} from '../../compositor/__fixtures__/fake-compositor.js';

/**
 * Save kitty on 1 and firefox on 2, then empty the compositor as after a
 * reboot. Only kitty comes back when launched.
 */
async function savedThenRebooted(home: string): Promise<TestRuntime> {
  const compositor = new FakeCompositor({
    workspaces: [makeWorkspace(1), makeWorkspace(2)],
    windows: [
      makeWindow({ address: '0x1', class: 'kitty', workspaceId: 1 }),
      makeWindow({ address: '0x2', class: 'firefox', title: 'Docs', workspaceId: 2 }),
    ],
  });
  const test = testRuntime(home, { compositor });
  expect(await saveCommand([], test.runtime)).toBe(0);

  compositor.windows = [];
  compositor.workspaces = [makeWorkspace(1)];
  compositor.onExec = (command, workspace) =>
    command === 'kitty'
      ? makeWindow({ address: compositor.allocateAddress(), class: 'kitty', workspaceId: workspace ?? 1 })
      : null;
  vi.clearAllMocks();
  return test;
}

describe('restoreCommand', () => {
  let home: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    vi.clearAllMocks();
    home = await mkdtemp(join(tmpdir(), 'cli-restore-test-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await rm(home, { recursive: true, force: true });
  });

  it('reports missing windows as a warning and still exits 0', async () => {
    const { runtime } = await savedThenRebooted(home);

    const exitCode = await restoreCommand([], runtime);

    expect(exitCode).toBe(0);
    expect(p.log.warn).toHaveBeenCalledWith('Restored with warnings: 1/2 windows present');
    expect(p.log.message).toHaveBeenCalledWith('Workspaces created: 2');
    expect(p.log.success).not.toHaveBeenCalled();
  });

  it('prints the restore report as JSON', async () => {
    const { runtime } = await savedThenRebooted(home);

    expect(await restoreCommand(['--json'], runtime)).toBe(0);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toMatchObject({
      restored: true,
      workspacesCreated: [2],
      launched: ['kitty', 'firefox'],
      skipped: [],
      failed: [],
      windowsExpected: 2,
      windowsPresent: 1,
      mismatch: true,
    });
  });

  it('warns about an environment that disappeared since the save', async () => {
    const venv = join(home, '.virtualenvs', 'webapp');
    await mkdir(join(venv, 'bin'), { recursive: true });
    await writeFile(join(venv, 'bin', 'activate'), '');
    const { runtime } = await savedThenRebooted(home);
    await rm(venv, { recursive: true });

    expect(await restoreCommand(['--json'], runtime)).toBe(0);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.restored).toBe(true);
    expect(output.environmentsMissing).toEqual(['venv:webapp']);
    expect(output.warnings).toContain('Environment venv:webapp from the saved session no longer exists');
  });

  it('exits 1 when nothing has been saved', async () => {
    const { runtime } = testRuntime(home);

    const exitCode = await restoreCommand([], runtime);

    expect(exitCode).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(`No saved session in ${join(home, 'session')}`);
  });

  it('exits 1 when the compositor never becomes ready', async () => {
    const { runtime, compositor } = await savedThenRebooted(home);
    compositor.unreachable = true;

    const exitCode = await restoreCommand([], runtime);

    expect(exitCode).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith(expect.stringContaining('Compositor not ready after 2 attempts'));
  });

  it('reports an interrupted restore', async () => {
    const { runtime } = await savedThenRebooted(home);
    const controller = new AbortController();
    controller.abort();

    const exitCode = await restoreCommand([], runtime, { signal: controller.signal });

    expect(exitCode).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('Restore interrupted');
  });
});
