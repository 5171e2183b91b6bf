import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, repairConfig, validateConfig, writeDefaultConfig } from './reader.js';
import { DEFAULT_CONFIG } from './schema.js';

describe('DEFAULT_CONFIG', () => {
  it('is fully populated from an empty object', () => {
    expect(DEFAULT_CONFIG.daemon.scan_interval_seconds).toBe(60);
    expect(DEFAULT_CONFIG.daemon.max_watches).toBe(10);
    expect(DEFAULT_CONFIG.auto_save).toEqual({ enabled: true, impact_threshold: 3 });
    expect(DEFAULT_CONFIG.notifications).toEqual({ enabled: true, urgency: 'normal' });
    expect(DEFAULT_CONFIG.hooks.entries).toEqual([]);
    expect(DEFAULT_CONFIG.environments.additional_watch_dirs).toEqual([]);
  });
});

describe('repairConfig', () => {
  it('keeps valid overrides and resets each invalid field to its default', () => {
    const { config, errors } = repairConfig({
      daemon: { max_watches: 0, scan_interval_seconds: 30 },
      auto_save: { impact_threshold: 'high' },
    });

    expect(config.daemon.scan_interval_seconds).toBe(30);
    expect(config.daemon.max_watches).toBe(10);
    expect(config.auto_save.impact_threshold).toBe(3);
    expect(errors.map((e) => e.field).sort()).toEqual([
      'auto_save.impact_threshold',
      'daemon.max_watches',
    ]);
    expect(errors.every((e) => e.code === 'CONFIGURATION')).toBe(true);
  });

  it('resets a whole list when one element is invalid', () => {
    const { config, errors } = repairConfig({
      environments: { additional_watch_dirs: ['/srv/envs', ''] },
    });

    expect(config.environments.additional_watch_dirs).toEqual([]);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.field).toBe('environments.additional_watch_dirs');
  });

  it('resets a section that is not an object', () => {
    const { config, errors } = repairConfig({ restore: 'fast' });

    expect(config.restore).toEqual(DEFAULT_CONFIG.restore);
    expect(errors[0]?.field).toBe('restore');
  });

  it('falls back to defaults when the root is not an object', () => {
    const { config, errors } = repairConfig([1, 2]);

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(errors).toHaveLength(1);
  });
});

describe('validateConfig', () => {
  it('accepts a partial config', () => {
    const result = validateConfig({ notifications: { enabled: false } });
    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.config.notifications.enabled).toBe(false);
      expect(result.config.notifications.urgency).toBe('normal');
    }
  });

  it('reports field paths without falling back', () => {
    const result = validateConfig({ hooks: { timeout_seconds: -1 } });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^hooks\.timeout_seconds: /);
    }
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'config-reader-test-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults silently when the file is missing', async () => {
    const loaded = await loadConfig(join(tmpDir, 'config.json'));

    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.errors).toEqual([]);
    expect(loaded.fromFile).toBe(false);
  });

  it('returns defaults with one error on invalid JSON', async () => {
    const path = join(tmpDir, 'config.json');
    await writeFile(path, '{ not json', 'utf-8');

    const loaded = await loadConfig(path);

    expect(loaded.config).toEqual(DEFAULT_CONFIG);
    expect(loaded.errors).toHaveLength(1);
    expect(loaded.errors[0]?.message).toContain('Invalid JSON');
    expect(loaded.fromFile).toBe(true);
  });

  it('merges file settings over defaults', async () => {
    const path = join(tmpDir, 'config.json');
    await writeFile(path, JSON.stringify({ daemon: { max_watches: 2 } }), 'utf-8');

    const loaded = await loadConfig(path);

    expect(loaded.config.daemon.max_watches).toBe(2);
    expect(loaded.config.daemon.event_queue_size).toBe(256);
    expect(loaded.errors).toEqual([]);
  });
});

describe('writeDefaultConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'config-init-test-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('writes defaults once and never overwrites', async () => {
    const path = join(tmpDir, 'nested', 'config.json');

    expect(await writeDefaultConfig(path)).toBe(true);
    await writeFile(path, '{"daemon":{"max_watches":4}}', 'utf-8');
    expect(await writeDefaultConfig(path)).toBe(false);

    expect(await readFile(path, 'utf-8')).toBe('{"daemon":{"max_watches":4}}');
  });
});
