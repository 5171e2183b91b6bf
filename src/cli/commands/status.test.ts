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
import { collectStatus, statusCommand } from './status.js';
import { testRuntime } from '../__fixtures__/test-runtime.js';
import { FakeCompositor, makeWindow } from '../../compositor/__fixtures__/fake-compositor.js';
import type { DaemonStatus } from '../../daemon/status-store.js';

function runningStatus(): DaemonStatus {
  return {
    pid: process.pid,
    state: 'running',
    startedAt: '2026-06-01T09:00:00.000Z',
    updatedAt: '2026-06-01T09:05:00.000Z',
    cycles: 5,
    lastScanAt: '2026-06-01T09:05:00.000Z',
    environments: 3,
    watches: [
      { directory: '/envs', origin: 'conda', state: 'WATCHING', startedAt: null, restarts: 0, lastError: null },
      { directory: '/venvs', origin: 'venv', state: 'STOPPED', startedAt: null, restarts: 1, lastError: 'gone' },
    ],
    skipped: [],
    missing: [],
    droppedEvents: 0,
    lastAutoSave: null,
  };
}

describe('statusCommand', () => {
  let home: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    vi.clearAllMocks();
    home = await mkdtemp(join(tmpdir(), 'cli-status-test-'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await rm(home, { recursive: true, force: true });
  });

  it('exits 0 with nothing saved and no daemon', async () => {
    const { runtime } = testRuntime(home);

    expect(await statusCommand([], runtime)).toBe(0);
    expect(p.log.info).toHaveBeenCalledWith('No saved session');
    expect(p.log.message).toHaveBeenCalledWith('Hooks: 0 pre-save, 0 post-restore');
    expect(p.log.message).toHaveBeenCalledWith('Daemon not running');
  });

  it('summarizes the saved session and hooks', async () => {
    const compositor = new FakeCompositor({ windows: [makeWindow()] });
    const { runtime } = testRuntime(home, { compositor });
    await runtime.saves.save('manual');
    await mkdir(join(home, 'hooks', 'post-restore'), { recursive: true });
    await writeFile(join(home, 'hooks', 'post-restore', 'browser'), '#!/bin/sh\n', { mode: 0o755 });

    const report = await collectStatus(runtime);

    expect(report.session).toMatchObject({ reason: 'manual', monitors: 1, workspaces: 1, windows: 1, applications: 1 });
    expect(report.hooks).toEqual({ 'pre-save': 0, 'post-restore': 1 });
  });

  it('exits 0 when the saved session is unreadable', async () => {
    const { runtime } = testRuntime(home);
    await mkdir(join(home, 'session'), { recursive: true });
    await writeFile(join(home, 'session', 'snapshot.json'), 'not json');

    expect(await statusCommand(['--json'], runtime)).toBe(0);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.session).toBeNull();
    expect(output.sessionError).toContain('snapshot.json');
  });

  it('reports the running daemon from its pid and status files', async () => {
    const { runtime } = testRuntime(home);
    await runtime.pidFile.write(process.pid);
    await runtime.daemonStatus.write(runningStatus());

    const report = await collectStatus(runtime);

    expect(report.daemon).toEqual({
      running: true,
      pid: process.pid,
      stale: false,
      lastScanAt: '2026-06-01T09:05:00.000Z',
      watching: 1,
    });
  });

  it('flags a stale pid file', async () => {
    const { runtime } = testRuntime(home);
    await runtime.pidFile.write(999_999);

    const report = await collectStatus(runtime);

    expect(report.daemon).toMatchObject({ running: false, pid: null, stale: true, watching: 0 });
  });
});
