/**
 * Append-only JSONL log of classified changes.
 *
 * Writes are serialized so lines from the watch consumer and the baseline
 * scan never interleave. Entries are validated on read; malformed lines
 * are skipped.
 *
 * @module changes/change-log
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ClassifiedChangeSchema } from './types.js';
import type { ChangeType, ClassifiedChange } from './types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { errnoCode } from '../errors.js';

export interface ChangeLogQuery {
  /** ISO timestamp; older entries are left out. */
  since?: string;
  changeType?: ChangeType;
  /** Keep only the newest N entries. */
  limit?: number;
}

export class ChangeLog {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async append(change: ClassifiedChange): Promise<void> {
    const line = JSON.stringify(change) + '\n';
    const write = this.writeQueue.then(async () => {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, line, 'utf-8');
    });
    // The queue keeps going after a failed write; the caller still sees the failure
    this.writeQueue = write.catch(() => undefined);
    await write;
  }

  async entries(query: ChangeLogQuery = {}): Promise<ClassifiedChange[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }

    const entries: ClassifiedChange[] = [];
    let skipped = 0;

    for (const line of content.split(/\r?\n/)) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skipped++;
        continue;
      }

      const result = ClassifiedChangeSchema.safeParse(parsed);
      if (!result.success) {
        skipped++;
        continue;
      }

      const entry = result.data;
      if (query.since && entry.time < query.since) continue;
      if (query.changeType && entry.changeType !== query.changeType) continue;
      entries.push(entry);
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} malformed line(s) in ${this.path}`);
    }
    return query.limit !== undefined ? entries.slice(-query.limit) : entries;
  }
}
