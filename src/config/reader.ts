/**
 * Config file reader with Zod validation.
 *
 * `loadConfig` never fails: a missing file yields defaults, broken JSON
 * yields defaults plus one {@link ConfigurationError}, and every invalid
 * field falls back to its own default with a {@link ConfigurationError}
 * naming the field. `validateConfig` is the strict, no-fallback variant
 * behind `config validate`.
 *
 * The returned config is built once at startup and handed to every
 * component constructor.
 *
 * @module config/reader
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ZodIssue } from 'zod';
import { ConfigSchema, DEFAULT_CONFIG } from './schema.js';
import type { Config } from './schema.js';
import { ConfigurationError, errnoCode } from '../errors.js';

/** Cap on fallback passes; each pass removes at least one bad field. */
const MAX_REPAIR_PASSES = 10;

export interface LoadedConfig {
  config: Config;
  /** One entry per setting that fell back to its default. */
  errors: ConfigurationError[];
  /** Whether a config file was found on disk. */
  fromFile: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return `${path || '(root)'}: ${issue.message}`;
}

/**
 * Path of the setting to reset for an issue. Issues inside arrays reset
 * the whole array, so a bad hook entry drops the declared list.
 */
function settingPath(issue: ZodIssue): Array<string> {
  const path: string[] = [];
  for (const segment of issue.path) {
    if (typeof segment === 'number') break;
    path.push(segment);
  }
  return path;
}

function removeSetting(raw: Record<string, unknown>, path: string[]): boolean {
  let current: Record<string, unknown> = raw;
  for (let i = 0; i < path.length - 1; i++) {
    const next = current[path[i]];
    if (!isRecord(next)) {
      // Parent is itself the bad value; drop it instead
      delete current[path[i]];
      return true;
    }
    current = next;
  }
  const last = path[path.length - 1];
  if (last === undefined || !(last in current)) return false;
  delete current[last];
  return true;
}

/**
 * Parse raw input, dropping invalid settings until the rest validates.
 */
export function repairConfig(raw: unknown): { config: Config; errors: ConfigurationError[] } {
  const errors: ConfigurationError[] = [];

  if (!isRecord(raw)) {
    errors.push(new ConfigurationError('Config root must be a JSON object; using defaults'));
    return { config: DEFAULT_CONFIG, errors };
  }

  const working = structuredClone(raw);

  for (let pass = 0; pass < MAX_REPAIR_PASSES; pass++) {
    const result = ConfigSchema.safeParse(working);
    if (result.success) {
      return { config: result.data, errors };
    }

    let removed = false;
    for (const issue of result.error.issues) {
      const path = settingPath(issue);
      if (path.length === 0) continue;
      if (removeSetting(working, path)) {
        removed = true;
        errors.push(new ConfigurationError(
          `${formatIssue(issue)}; using default`,
          path.join('.'),
        ));
      }
    }

    if (!removed) break;
  }

  errors.push(new ConfigurationError('Config could not be repaired; using defaults'));
  return { config: DEFAULT_CONFIG, errors };
}

/**
 * Read the config file and return a fully populated config.
 *
 * Only unexpected I/O errors (not ENOENT) propagate.
 */
export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return { config: DEFAULT_CONFIG, errors: [], fromFile: false };
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return {
      config: DEFAULT_CONFIG,
      errors: [new ConfigurationError(`Invalid JSON in config file: ${configPath}; using defaults`)],
      fromFile: true,
    };
  }

  return { ...repairConfig(raw), fromFile: true };
}

/**
 * Validate raw input against the schema without any fallback.
 */
export function validateConfig(
  raw: unknown,
): { valid: true; config: Config } | { valid: false; errors: string[] } {
  const result = ConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return { valid: false, errors: result.error.issues.map(formatIssue) };
}

/**
 * Write the default config unless a file already exists.
 *
 * @returns true when a file was written
 */
export async function writeDefaultConfig(configPath: string): Promise<boolean> {
  await mkdir(dirname(configPath), { recursive: true });
  try {
    await writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', {
      encoding: 'utf-8',
      flag: 'wx',
    });
    return true;
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') {
      return false;
    }
    throw err;
  }
}
