import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Daemon } from './daemon.js';
import { BoundedChannel } from './channel.js';
import { WatchManager } from './watch-manager.js';
import { AutoSaveTrigger } from './trigger.js';
import { DaemonStatusStore } from './status-store.js';
import type { DaemonStatus } from './status-store.js';
import { FakeWatchSource, settle, waitFor } from './__fixtures__/fake-watch-source.js';
import { BaselineTracker } from '../environments/tracker.js';
import { BaselineStore } from '../environments/baseline-store.js';
import type {
  DetectionResult,
  EnvironmentDescriptor,
  EnvironmentDetector,
  EnvironmentType,
} from '../environments/types.js';
import { ChangeLog } from '../changes/change-log.js';
import type { ChangeEvent } from '../changes/types.js';
import { NullNotifier } from '../notify/notifier.js';
import type { SaveResult } from '../session/types.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import type { Config } from '../config/schema.js';
import { silentLogger } from '../logging/logger.js';

class StaticDetector implements EnvironmentDetector {
  constructor(
    readonly type: EnvironmentType,
    public environments: EnvironmentDescriptor[],
    public watchDirs: string[],
  ) {}

  async detect(): Promise<DetectionResult> {
    return { type: this.type, environments: this.environments, watchDirs: this.watchDirs };
  }
}

function env(type: EnvironmentType, name: string): EnvironmentDescriptor {
  return { type, name, path: `/envs/${name}`, status: 'available' };
}

function saveResult(reason: string): SaveResult {
  return {
    snapshot: {
      timestamp: '2026-03-01T10:00:00.000Z',
      reason,
      monitors: [],
      workspaces: [],
      windows: [],
      activeWorkspace: 1,
      applications: [],
    },
    hooks: { phase: 'pre-save', succeeded: 0, failed: 0, total: 0, results: [] },
  };
}

describe('Daemon', () => {
  let tmpDir: string;
  let condaEnvs: string;
  let statusStore: DaemonStatusStore;
  let changeLog: ChangeLog;
  let watchSource: FakeWatchSource;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'daemon-test-'));
    condaEnvs = join(tmpDir, 'conda', 'envs');
    await mkdir(condaEnvs, { recursive: true });
    statusStore = new DaemonStatusStore(join(tmpDir, 'state', 'daemon-status.json'));
    changeLog = new ChangeLog(join(tmpDir, 'logs', 'changes.jsonl'));
    watchSource = new FakeWatchSource();
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  /**
   * Build a daemon whose sleeps run `steps` in order; once they are used
   * up the next sleep aborts the run.
   */
  function harness(
    detectors: EnvironmentDetector[],
    steps: Array<() => Promise<void>>,
    configure: (config: Config) => Config = (c) => c,
  ) {
    const config = configure(DEFAULT_CONFIG);
    const save = vi.fn(async (reason: string) => saveResult(reason));
    const controller = new AbortController();
    const channel = new BoundedChannel<ChangeEvent>(config.daemon.event_queue_size);
    const sleeps: number[] = [];
    const daemon = new Daemon({
      config,
      tracker: new BaselineTracker({
        detectors,
        store: new BaselineStore(join(tmpDir, 'state', 'environment-baseline.json')),
        logger: silentLogger,
      }),
      watches: new WatchManager({
        sink: (event) => channel.offer(event),
        logger: silentLogger,
        maxWatches: config.daemon.max_watches,
        recursive: config.daemon.recursive,
        source: watchSource.source,
      }),
      channel,
      trigger: new AutoSaveTrigger({
        saver: { save },
        notifier: new NullNotifier(),
        logger: silentLogger,
        autoSave: config.auto_save,
        notifications: config.notifications,
      }),
      statusStore,
      logger: silentLogger,
      changeLog,
      pid: 4242,
      sleep: async (ms, signal) => {
        sleeps.push(ms);
        const step = steps.shift();
        if (step) await step();
        else controller.abort();
        signal?.throwIfAborted();
      },
    });
    return { daemon, run: () => daemon.run(controller.signal), sleeps, save };
  }

  it('cycles on the scan interval until aborted, then reports itself stopped', async () => {
    const conda = new StaticDetector('conda', [env('conda', 'base')], [condaEnvs]);
    const { daemon, run, sleeps } = harness([conda], [async () => {}]);

    await run();

    expect(daemon.cycleCount).toBe(2);
    expect(sleeps).toEqual([60_000, 60_000]);
    const status = await statusStore.read();
    expect(status).toMatchObject({
      pid: 4242,
      state: 'stopped',
      cycles: 2,
      environments: 1,
      skipped: [],
      missing: [],
      lastAutoSave: null,
    });
    expect(status?.watches.map((w) => [w.directory, w.state])).toEqual([[condaEnvs, 'STOPPED']]);
    expect(watchSource.latest(condaEnvs).aborted).toBe(true);
  });

  it('auto-saves when a scan finds a new environment', async () => {
    const conda = new StaticDetector('conda', [env('conda', 'base')], [condaEnvs]);
    const { run, save } = harness([conda], [
      async () => {
        conda.environments = [env('conda', 'base'), env('conda', 'newenv')];
      },
    ]);

    await run();

    expect(save).toHaveBeenCalledTimes(1);
    expect(save.mock.calls[0][0]).toBe('auto: environment_created');
    const logged = await changeLog.entries();
    expect(logged.map((c) => [c.changeType, c.path, c.score, c.source])).toEqual([
      ['environment_created', 'conda:newenv', 4, 'baseline'],
    ]);
    expect((await statusStore.read())?.lastAutoSave).toMatchObject({
      outcome: 'saved',
      changeType: 'environment_created',
      details: 'conda:newenv',
    });
  });

  it('classifies watch events and saves once for a burst', async () => {
    const conda = new StaticDetector('conda', [env('conda', 'base')], [condaEnvs]);
    const { run, save } = harness([conda], [
      async () => {
        await mkdir(join(condaEnvs, 'ml', 'bin'), { recursive: true });
        const stream = watchSource.latest(condaEnvs);
        stream.emit('rename', 'ml');
        stream.emit('change', 'ml/bin/python');
        stream.emit('change', 'notes.txt');
        await waitFor(async () => (await changeLog.entries()).length === 3);
      },
    ]);

    await run();

    expect(save).toHaveBeenCalledTimes(1);
    const logged = await changeLog.entries();
    expect(logged.map((c) => [c.changeType, c.score])).toEqual([
      ['environment_created', 4],
      ['environment_binary_modified', 2],
      ['file_modified', 1],
    ]);
  });

  it('watches at most max_watches directories and lists the rest as skipped', async () => {
    const dirs = ['a', 'b', 'c', 'd'].map((d) => join(tmpDir, d));
    for (const dir of dirs) await mkdir(dir);
    const seen: { status: DaemonStatus | null } = { status: null };
    const { run } = harness(
      [
        new StaticDetector('conda', [], [dirs[0]]),
        new StaticDetector('venv', [], [dirs[1]]),
      ],
      [
        async () => {
          seen.status = await statusStore.read();
        },
      ],
      (config) => ({
        ...config,
        daemon: { ...config.daemon, max_watches: 2 },
        environments: { ...config.environments, additional_watch_dirs: [dirs[2], dirs[3], join(tmpDir, 'nope')] },
      }),
    );

    await run();

    const status = seen.status;
    expect(status).not.toBeNull();
    expect(status?.watches.filter((w) => w.state === 'WATCHING').map((w) => w.directory)).toEqual([dirs[0], dirs[1]]);
    expect(status?.skipped).toEqual([dirs[2], dirs[3]]);
    expect(status?.missing).toEqual([join(tmpDir, 'nope')]);
  });

  it('restarts a watch whose stream died on the next cycle', async () => {
    const conda = new StaticDetector('conda', [], [condaEnvs]);
    const { run } = harness([conda], [
      async () => {
        watchSource.latest(condaEnvs).crash(new Error('inotify queue overflow'));
        await settle();
      },
    ]);

    await run();

    expect(watchSource.opened.filter((s) => s.directory === condaEnvs)).toHaveLength(2);
    const status = await statusStore.read();
    expect(status?.watches[0]).toMatchObject({ restarts: 1, lastError: `Watch on ${condaEnvs} failed: inotify queue overflow` });
  });
});
