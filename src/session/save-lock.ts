/**
 * Cross-process lock around the snapshot store.
 *
 * The lock file is created with O_EXCL and records the holder's pid. A
 * lock whose holder is no longer alive is reclaimed. A lock file that does
 * not parse may belong to a rival that has created it but not yet written
 * it, so it is only reclaimed once it is older than
 * {@link UNREADABLE_STALE_MS}. Acquisition waits a bounded time for a live
 * holder.
 *
 * @module session/save-lock
 */

import { open, readFile, stat, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { hostname } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { errnoCode } from '../errors.js';

// ============================================================================
// Lock file
// ============================================================================

const LockInfoSchema = z.object({
  pid: z.number().int(),
  operation: z.string(),
  acquiredAt: z.string(),
  hostname: z.string(),
}).passthrough();

export type LockInfo = z.infer<typeof LockInfoSchema>;

export type LockAcquireResult =
  | { acquired: true; release: () => Promise<void> }
  | { acquired: false; holder: LockInfo; message: string };

export interface AcquireOptions {
  /** How long to wait for a live holder; 0 tries once. */
  waitMs?: number;
  pollMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_POLL_MS = 250;

/** Age after which a lock file that does not parse is considered abandoned. */
export const UNREADABLE_STALE_MS = 10_000;

type LockState =
  | { kind: 'free' }
  | { kind: 'held'; info: LockInfo }
  | { kind: 'unreadable'; ageMs: number };

function parseLockInfo(content: string): LockInfo | null {
  try {
    const result = LockInfoSchema.safeParse(JSON.parse(content));
    return result.success ? result.data : null;
  } catch {
    // Empty or partly written
    return null;
  }
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) === 'EPERM';
  }
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') throw err;
  }
}

// ============================================================================
// SaveLock
// ============================================================================

export class SaveLock {
  constructor(private readonly lockPath: string) {}

  /**
   * Acquire the lock, polling while a live process holds it until
   * `waitMs` has passed.
   */
  async acquire(operation: string, options: AcquireOptions = {}): Promise<LockAcquireResult> {
    const deadline = Date.now() + (options.waitMs ?? 0);
    const pollMs = options.pollMs ?? DEFAULT_POLL_MS;

    for (;;) {
      const result = await this.tryAcquire(operation, true);
      if (result.acquired || Date.now() >= deadline) {
        return result;
      }
      await sleep(Math.min(pollMs, Math.max(0, deadline - Date.now())), undefined, {
        signal: options.signal,
      });
    }
  }

  /** Current holder, or null when the lock is free or unreadable. */
  async holder(): Promise<LockInfo | null> {
    const state = await this.inspect();
    return state.kind === 'held' ? state.info : null;
  }

  private async inspect(): Promise<LockState> {
    try {
      const [content, info] = await Promise.all([readFile(this.lockPath, 'utf-8'), stat(this.lockPath)]);
      const parsed = parseLockInfo(content);
      return parsed
        ? { kind: 'held', info: parsed }
        : { kind: 'unreadable', ageMs: Date.now() - info.mtimeMs };
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return { kind: 'free' };
      throw err;
    }
  }

  private async tryAcquire(operation: string, allowReclaim: boolean): Promise<LockAcquireResult> {
    await mkdir(dirname(this.lockPath), { recursive: true });

    const info: LockInfo = {
      pid: process.pid,
      operation,
      acquiredAt: new Date().toISOString(),
      hostname: hostname(),
    };

    try {
      // O_CREAT | O_EXCL: fails if the file already exists
      const handle = await open(this.lockPath, 'wx');
      try {
        await handle.writeFile(JSON.stringify(info), 'utf-8');
      } finally {
        await handle.close();
      }
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') throw err;
      return this.contended(operation, allowReclaim);
    }

    let released = false;
    const release = async (): Promise<void> => {
      if (released) return;
      released = true;
      const current = await this.holder();
      if (current && current.pid === process.pid && current.acquiredAt === info.acquiredAt) {
        await unlinkIfPresent(this.lockPath);
      }
    };
    return { acquired: true, release };
  }

  private async contended(operation: string, allowReclaim: boolean): Promise<LockAcquireResult> {
    const state = await this.inspect();

    const reclaimable =
      state.kind === 'free' ||
      (state.kind === 'held' && !isPidAlive(state.info.pid)) ||
      (state.kind === 'unreadable' && state.ageMs >= UNREADABLE_STALE_MS);

    if (reclaimable && allowReclaim) {
      if (state.kind !== 'free') await unlinkIfPresent(this.lockPath);
      return this.tryAcquire(operation, false);
    }

    if (state.kind === 'held') {
      const holder = state.info;
      return {
        acquired: false,
        holder,
        message: `Session store locked by PID ${holder.pid} (${holder.operation}, since ${holder.acquiredAt})`,
      };
    }

    return {
      acquired: false,
      holder: { pid: -1, operation: 'unknown', acquiredAt: '', hostname: '' },
      message: 'Session store lock is held and could not be reclaimed',
    };
  }
}
