/**
 * Ordered hook records per phase.
 *
 * Declared hooks (from config, then those registered in code) run first in
 * declaration order; executables found in `<hooksDir>/<phase>/` follow,
 * sorted by file name so `10-browser` runs before `20-editor`. The
 * directory is read each time a phase is listed, so dropping a script in
 * place takes effect on the next save or restore.
 *
 * @module hooks/registry
 */

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import type { HookEntry } from '../config/schema.js';
import type { HookDescriptor, HookPhase } from './types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { errnoCode } from '../errors.js';

type HookRecord = Omit<HookDescriptor, 'position'>;

export class HookRegistry {
  private readonly declared: HookRecord[] = [];

  constructor(
    private readonly hooksDir: string,
    entries: readonly HookEntry[] = [],
    private readonly logger: Logger = silentLogger,
  ) {
    for (const entry of entries) {
      this.declared.push({
        name: entry.name,
        phase: entry.phase,
        path: isAbsolute(entry.path) ? entry.path : resolve(hooksDir, entry.path),
        source: 'config',
      });
    }
  }

  /** Add a hook after every previously declared one of its phase. */
  register(hook: { name: string; path: string; phase: HookPhase }): void {
    this.declared.push({ ...hook, path: resolve(hook.path), source: 'registered' });
  }

  /** Directory scanned for executables of a phase. */
  phaseDir(phase: HookPhase): string {
    return join(this.hooksDir, phase);
  }

  async list(phase: HookPhase): Promise<HookDescriptor[]> {
    const records = this.declared.filter((h) => h.phase === phase);
    const declaredPaths = new Set(records.map((h) => h.path));

    for (const record of await this.scanPhaseDir(phase)) {
      if (!declaredPaths.has(record.path)) {
        records.push(record);
      }
    }

    return records.map((record, position) => ({ ...record, position }));
  }

  private async scanPhaseDir(phase: HookPhase): Promise<HookRecord[]> {
    const dir = this.phaseDir(phase);
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      this.logger.warn(`Cannot read hook directory ${dir}: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }

    return entries
      .filter((e) => (e.isFile() || e.isSymbolicLink()) && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort()
      .map((name) => ({ name, phase, path: join(dir, name), source: 'directory' as const }));
  }
}
