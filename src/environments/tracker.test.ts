import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BaselineTracker } from './tracker.js';
import { BaselineStore } from './baseline-store.js';
import { diffInventories, inventoryIds } from './differ.js';
import type {
  DetectionResult,
  EnvironmentDescriptor,
  EnvironmentDetector,
  EnvironmentType,
} from './types.js';
import type { ClassifiedChange } from '../changes/types.js';
import { changeLabel } from '../changes/types.js';
import { DependencyMissingError } from '../errors.js';
import { silentLogger } from '../logging/logger.js';

function env(type: EnvironmentType, name: string): EnvironmentDescriptor {
  return { type, name, path: `/envs/${type}/${name}`, status: 'available' };
}

/** Detector returning whatever the test last assigned. */
class StaticDetector implements EnvironmentDetector {
  constructor(
    readonly type: EnvironmentType,
    public result: EnvironmentDescriptor[] | Error,
  ) {}

  async detect(): Promise<DetectionResult> {
    if (this.result instanceof Error) throw this.result;
    return { type: this.type, environments: this.result, watchDirs: [] };
  }
}

describe('BaselineTracker', () => {
  let tmpDir: string;
  let store: BaselineStore;
  let clock: Date;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'tracker-test-'));
    store = new BaselineStore(join(tmpDir, 'state', 'environment-baseline.json'));
    clock = new Date('2026-03-01T10:00:00.000Z');
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  function tracker(...detectors: EnvironmentDetector[]): BaselineTracker {
    return new BaselineTracker({ detectors, store, logger: silentLogger, now: () => clock });
  }

  it('only establishes the baseline on the first cycle', async () => {
    const result = await tracker(new StaticDetector('conda', [env('conda', 'base')])).scan();

    expect(result.firstRun).toBe(true);
    expect(result.changes).toEqual([]);
    expect(await store.load()).toEqual({
      timestamp: '2026-03-01T10:00:00.000Z',
      environments: [env('conda', 'base')],
    });
  });

  it('reports a new conda environment as a created change scored 4', async () => {
    await store.replace({ timestamp: '2026-02-28T10:00:00.000Z', environments: [env('conda', 'base')] });
    const detector = new StaticDetector('conda', [env('conda', 'base'), env('conda', 'newenv')]);

    const result = await tracker(detector).scan();

    expect(result.changes).toEqual([{
      path: 'conda:newenv',
      kind: 'create',
      time: '2026-03-01T10:00:00.000Z',
      changeType: 'environment_created',
      score: 4,
      source: 'baseline',
    }]);
    expect(changeLabel(result.changes[0])).toBe('environment_created:conda:newenv');
  });

  it('reports a removed venv as a deleted change scored 3', async () => {
    await store.replace({ timestamp: '2026-02-28T10:00:00.000Z', environments: [env('venv', 'old'), env('venv', 'web')] });

    const result = await tracker(new StaticDetector('venv', [env('venv', 'web')])).scan();

    expect(result.changes.map((c) => [changeLabel(c), c.score])).toEqual([['environment_deleted:venv:old', 3]]);
  });

  it('emits every change before replacing the baseline', async () => {
    await store.replace({ timestamp: '2026-02-28T10:00:00.000Z', environments: [env('conda', 'base')] });
    const seen: Array<[string, number | undefined]> = [];
    const emit = vi.fn(async (change: ClassifiedChange) => {
      seen.push([change.path, (await store.load())?.environments.length]);
    });

    await tracker(new StaticDetector('conda', [env('conda', 'base'), env('conda', 'a'), env('conda', 'b')])).scan({ emit });

    expect(seen).toEqual([['conda:a', 1], ['conda:b', 1]]);
    expect((await store.load())?.environments).toHaveLength(3);
  });

  it('finds nothing new when scanned twice without changes', async () => {
    const t = tracker(new StaticDetector('conda', [env('conda', 'base')]), new StaticDetector('venv', [env('venv', 'web')]));
    await t.scan();

    const second = await t.scan();

    expect(second.firstRun).toBe(false);
    expect(second.changes).toEqual([]);
  });

  it('writes the same baseline apart from the timestamp when nothing changed', async () => {
    const t = tracker(new StaticDetector('venv', [env('venv', 'zeta'), env('venv', 'alpha')]), new StaticDetector('conda', [env('conda', 'base')]));
    await t.scan();
    const first = await readFile(store.path, 'utf-8');

    clock = new Date('2026-03-01T11:00:00.000Z');
    await t.scan();
    const second = await readFile(store.path, 'utf-8');

    expect(second).not.toBe(first);
    expect(second.replace('2026-03-01T11:00:00.000Z', 'T')).toBe(first.replace('2026-03-01T10:00:00.000Z', 'T'));
    expect((await store.load())?.environments.map((e) => e.name)).toEqual(['base', 'alpha', 'zeta']);
  });

  it('keeps the previous entries of a detector that failed', async () => {
    await store.replace({
      timestamp: '2026-02-28T10:00:00.000Z',
      environments: [env('conda', 'base'), env('venv', 'web')],
    });

    const result = await tracker(
      new StaticDetector('conda', [env('conda', 'base')]),
      new StaticDetector('venv', new Error('permission denied')),
      new StaticDetector('pyenv', new DependencyMissingError('pyenv')),
    ).scan();

    expect(result.changes).toEqual([]);
    expect(result.failures).toEqual([
      { type: 'venv', missing: false, message: 'permission denied' },
      { type: 'pyenv', missing: true, message: 'Required tool not found: pyenv' },
    ]);
    expect(inventoryIds(result.baseline.environments)).toEqual(['conda:base', 'venv:web']);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(tracker(new StaticDetector('conda', [])).scan({ signal: controller.signal }))
      .rejects.toHaveProperty('name', 'AbortError');
  });
});

describe('diffInventories', () => {
  it('returns sorted additions and removals', () => {
    const diff = diffInventories(
      [env('venv', 'b'), env('conda', 'base'), env('venv', 'a')],
      [env('conda', 'base'), env('pyenv', '3.12.1'), env('conda', 'ml')],
    );

    expect(diff).toEqual({ added: ['conda:ml', 'pyenv:3.12.1'], removed: ['venv:a', 'venv:b'] });
  });

  it('is empty for identical inventories', () => {
    const inventory = [env('conda', 'base'), env('venv', 'web')];
    expect(diffInventories(inventory, [...inventory].reverse())).toEqual({ added: [], removed: [] });
  });
});
