import { describe, it, expect, beforeEach } from 'vitest';
import { WatchManager, toChangeEvent } from './watch-manager.js';
import type { WatchTarget } from './watch-targets.js';
import type { ChangeEvent } from '../changes/types.js';
import { FakeWatchSource, settle } from './__fixtures__/fake-watch-source.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';

const TIME = '2026-03-01T10:00:00.000Z';

function target(directory: string, origin: WatchTarget['origin'] = 'configured'): WatchTarget {
  return { directory, origin };
}

describe('WatchManager', () => {
  let fake: FakeWatchSource;
  let events: ChangeEvent[];
  let lines: string[];
  let logger: Logger;
  let accept: boolean;

  beforeEach(() => {
    fake = new FakeWatchSource();
    events = [];
    lines = [];
    accept = true;
    logger = createLogger({
      tag: 'watch-manager',
      level: 'warn',
      sink: (line) => lines.push(line),
      now: () => new Date(TIME),
    });
  });

  function manager(maxWatches: number): WatchManager {
    return new WatchManager({
      sink: (event) => {
        if (!accept) return false;
        events.push(event);
        return true;
      },
      logger,
      maxWatches,
      recursive: true,
      source: fake.source,
      exists: async (path) => !path.endsWith('gone'),
      now: () => new Date(TIME),
    });
  }

  it('watches only up to the bound and logs the skipped directories', async () => {
    const wm = manager(2);

    const result = await wm.reconcile([
      target('/opt/conda/envs', 'conda'),
      target('/home/u/.virtualenvs', 'venv'),
      target('/home/u/.pyenv/versions', 'pyenv'),
      target('/home/u/projects'),
    ]);

    expect(wm.list().filter((w) => w.state === 'WATCHING').map((w) => w.directory)).toEqual([
      '/opt/conda/envs',
      '/home/u/.virtualenvs',
    ]);
    expect(result.skipped).toEqual(['/home/u/.pyenv/versions', '/home/u/projects']);
    expect(lines).toEqual([
      `[watch-manager] ${TIME} - Skipping watch on /home/u/.pyenv/versions: limit of 2 watches reached`,
      `[watch-manager] ${TIME} - Skipping watch on /home/u/projects: limit of 2 watches reached`,
    ]);
    expect(fake.opened).toHaveLength(2);
  });

  it('does not repeat skip warnings on later cycles', async () => {
    const wm = manager(1);
    const targets = [target('/a'), target('/b')];

    await wm.reconcile(targets);
    await wm.reconcile(targets);

    expect(lines).toHaveLength(1);
    expect(fake.opened).toHaveLength(1);
  });

  it('forwards events with create, delete and modify kinds', async () => {
    const wm = manager(2);
    await wm.reconcile([target('/opt/conda/envs', 'conda')]);
    const stream = fake.latest('/opt/conda/envs');

    stream.emit('rename', 'ml');
    stream.emit('rename', 'gone');
    stream.emit('change', 'ml/bin/python');
    stream.emit('rename', null);
    await settle();

    expect(events).toEqual([
      { path: '/opt/conda/envs/ml', kind: 'create', time: TIME },
      { path: '/opt/conda/envs/gone', kind: 'delete', time: TIME },
      { path: '/opt/conda/envs/ml/bin/python', kind: 'modify', time: TIME },
    ]);
  });

  it('counts events the sink refuses', async () => {
    const wm = manager(1);
    await wm.reconcile([target('/a')]);
    accept = false;

    fake.latest('/a').emit('change', 'x');
    await settle();

    expect(wm.dropped).toBe(1);
  });

  it('returns a dead worker to STOPPED on health check and restarts it next cycle', async () => {
    const wm = manager(2);
    const targets = [target('/a'), target('/b')];
    await wm.reconcile(targets);

    fake.latest('/a').crash(new Error('inotify queue overflow'));
    fake.latest('/b').end();
    await settle();

    const failures = wm.healthCheck();
    expect(failures.map((f) => f.message)).toEqual([
      'Watch on /a failed: inotify queue overflow',
      'Watch on /b ended unexpectedly',
    ]);
    expect(wm.list().map((w) => w.state)).toEqual(['STOPPED', 'STOPPED']);

    const result = await wm.reconcile(targets);
    expect(result.started).toEqual(['/a', '/b']);
    expect(wm.list().map((w) => [w.state, w.restarts])).toEqual([['WATCHING', 1], ['WATCHING', 1]]);
    expect(wm.list()[0].lastError).toBe('Watch on /a failed: inotify queue overflow');
  });

  it('leaves healthy workers alone', async () => {
    const wm = manager(1);
    await wm.reconcile([target('/a')]);

    expect(wm.healthCheck()).toEqual([]);
    expect(wm.list()[0].state).toBe('WATCHING');
  });

  it('stops watches whose directory is no longer a target', async () => {
    const wm = manager(2);
    await wm.reconcile([target('/a'), target('/b')]);

    const result = await wm.reconcile([target('/b')]);

    expect(result.stopped).toEqual(['/a']);
    expect(fake.latest('/a').aborted).toBe(true);
    expect(wm.list().map((w) => w.directory)).toEqual(['/b']);
  });

  it('keeps a directory STOPPED when its watch cannot be opened', async () => {
    fake.refused.add('/a');
    const wm = manager(2);

    const result = await wm.reconcile([target('/a'), target('/b')]);

    expect(result.started).toEqual(['/b']);
    expect(wm.list()[0]).toMatchObject({ directory: '/a', state: 'STOPPED' });
    expect(lines).toEqual([`[watch-manager] ${TIME} - Cannot watch /a: ENOSPC: no watches left for /a`]);
  });

  it('stops every watch', async () => {
    const wm = manager(3);
    await wm.reconcile([target('/a'), target('/b')]);

    await wm.stopAll();

    expect(wm.activeCount).toBe(0);
    expect(fake.opened.every((s) => s.aborted)).toBe(true);
  });
});

describe('toChangeEvent', () => {
  it('ignores events without a file name', async () => {
    expect(await toChangeEvent('/a', { eventType: 'change', filename: null }, TIME)).toBeNull();
  });
});
