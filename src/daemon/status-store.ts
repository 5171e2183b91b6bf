/**
 * The running daemon's self-reported state, rewritten every cycle.
 *
 * @module daemon/status-store
 */

import { z } from 'zod';
import { readJson, writeJsonAtomic } from '../storage/atomic-json.js';

const WatchStatusSchema = z.object({
  directory: z.string(),
  origin: z.string(),
  state: z.enum(['STOPPED', 'STARTING', 'WATCHING', 'STOPPING']),
  startedAt: z.string().nullable(),
  restarts: z.number().int(),
  lastError: z.string().nullable(),
}).passthrough();

const LastAutoSaveSchema = z.object({
  at: z.string(),
  outcome: z.enum(['saved', 'failed']),
  changeType: z.string(),
  details: z.string(),
  error: z.string().optional(),
}).passthrough();

export const DaemonStatusSchema = z.object({
  pid: z.number().int(),
  state: z.enum(['running', 'stopped']),
  startedAt: z.string(),
  updatedAt: z.string(),
  cycles: z.number().int(),
  lastScanAt: z.string().nullable(),
  environments: z.number().int(),
  watches: z.array(WatchStatusSchema),
  skipped: z.array(z.string()),
  missing: z.array(z.string()),
  droppedEvents: z.number().int(),
  lastAutoSave: LastAutoSaveSchema.nullable(),
}).passthrough();

export type DaemonStatus = z.infer<typeof DaemonStatusSchema>;

export class DaemonStatusStore {
  constructor(readonly path: string) {}

  async write(status: DaemonStatus): Promise<void> {
    await writeJsonAtomic(this.path, status);
  }

  /** Null when absent or unreadable. */
  async read(): Promise<DaemonStatus | null> {
    const result = await readJson(this.path, DaemonStatusSchema);
    return result.status === 'ok' ? result.value : null;
  }
}
