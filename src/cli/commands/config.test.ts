import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('@clack/prompts', () => ({
  log: {
    message: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  },
}));

vi.mock('picocolors', () => ({
  default: {
    red: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { configCommand } from './config.js';
import { resolvePaths } from '../../config/paths.js';
import type { AppPaths } from '../../config/paths.js';
import { DEFAULT_CONFIG } from '../../config/schema.js';

describe('configCommand', () => {
  let home: string;
  let paths: AppPaths;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    vi.clearAllMocks();
    home = await mkdtemp(join(tmpdir(), 'cli-config-test-'));
    paths = resolvePaths(home);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await rm(home, { recursive: true, force: true });
  });

  function printedJson(): unknown {
    return JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
  }

  describe('show', () => {
    it('prints defaults when no file exists', async () => {
      expect(await configCommand(['show'], paths)).toBe(0);

      expect(printedJson()).toEqual(DEFAULT_CONFIG);
      expect(p.log.info).toHaveBeenCalledWith(`No config file at ${paths.configFile}; showing defaults`);
    });

    it('falls back per field and reports each fallback', async () => {
      await writeFile(paths.configFile, JSON.stringify({
        auto_save: { impact_threshold: 'high', enabled: false },
      }));

      expect(await configCommand(['show'], paths)).toBe(0);

      expect(printedJson()).toMatchObject({ auto_save: { impact_threshold: 3, enabled: false } });
      expect(p.log.warn).toHaveBeenCalledTimes(1);
      expect(p.log.warn).toHaveBeenCalledWith(expect.stringContaining('auto_save.impact_threshold'));
    });
  });

  describe('validate', () => {
    it('accepts a missing file', async () => {
      expect(await configCommand(['validate', '--json'], paths)).toBe(0);

      expect(printedJson()).toEqual({
        valid: true,
        errors: [],
        message: `No config file at ${paths.configFile}. Using defaults.`,
      });
    });

    it('rejects invalid JSON', async () => {
      await writeFile(paths.configFile, '{ nope');

      expect(await configCommand(['validate'], paths)).toBe(1);
      expect(p.log.error).toHaveBeenCalledWith('Invalid JSON in config file');
    });

    it('lists every invalid field without falling back', async () => {
      await writeFile(paths.configFile, JSON.stringify({
        daemon: { max_watches: 0 },
        notifications: { urgency: 'loud' },
      }));

      expect(await configCommand(['validate', '--json'], paths)).toBe(1);

      const output = printedJson();
      expect(output).toMatchObject({ valid: false });
      expect(JSON.stringify(output)).toContain('daemon.max_watches');
      expect(JSON.stringify(output)).toContain('notifications.urgency');
    });

    it('accepts a valid file', async () => {
      await writeFile(paths.configFile, JSON.stringify({ daemon: { max_watches: 4 } }));

      expect(await configCommand(['validate'], paths)).toBe(0);
      expect(p.log.success).toHaveBeenCalledWith(`${paths.configFile} is valid`);
    });
  });

  describe('init', () => {
    it('writes the defaults once', async () => {
      expect(await configCommand(['init'], paths)).toBe(0);
      const written: unknown = JSON.parse(await readFile(paths.configFile, 'utf-8'));
      expect(written).toEqual(DEFAULT_CONFIG);

      await writeFile(paths.configFile, '{"auto_save":{"enabled":false}}');
      expect(await configCommand(['init'], paths)).toBe(0);

      expect(await readFile(paths.configFile, 'utf-8')).toBe('{"auto_save":{"enabled":false}}');
      expect(p.log.info).toHaveBeenCalledWith(`Config already exists at ${paths.configFile}; left unchanged`);
    });
  });

  it('rejects unknown subcommands', async () => {
    expect(await configCommand(['edit'], paths)).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('Unknown config command: edit');
  });
});
