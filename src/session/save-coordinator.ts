/**
 * Single-flight access to the snapshot store.
 *
 * Within a process, save requests queue on one promise chain, so a manual
 * save and an automatic one never capture at the same time. Across
 * processes (a CLI `save` while the daemon auto-saves) the session lock
 * file serializes them; a request that cannot get the lock within the wait
 * bound fails with {@link SaveInProgressError}.
 *
 * @module session/save-coordinator
 */

import type { SessionCapturer } from './capturer.js';
import type { SaveLock } from './save-lock.js';
import type { SaveResult } from './types.js';
import type { Logger } from '../logging/logger.js';
import { SaveInProgressError } from '../errors.js';

const DEFAULT_LOCK_WAIT_MS = 30_000;

/** The part of {@link SessionCapturer} the coordinator drives. */
export type SnapshotSaver = Pick<SessionCapturer, 'save'>;

export interface SaveCoordinatorOptions {
  capturer: SnapshotSaver;
  lock: SaveLock;
  logger: Logger;
  lockWaitMs?: number;
}

export class SaveCoordinator {
  private readonly capturer: SnapshotSaver;
  private readonly lock: SaveLock;
  private readonly logger: Logger;
  private readonly lockWaitMs: number;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(options: SaveCoordinatorOptions) {
    this.capturer = options.capturer;
    this.lock = options.lock;
    this.logger = options.logger;
    this.lockWaitMs = options.lockWaitMs ?? DEFAULT_LOCK_WAIT_MS;
  }

  /** Saves queued or running in this process. */
  get inFlight(): number {
    return this.pending;
  }

  save(reason: string, signal?: AbortSignal): Promise<SaveResult> {
    this.pending += 1;
    if (this.pending > 1) {
      this.logger.debug(`Save "${reason}" queued behind ${this.pending - 1} other(s)`);
    }

    const run = this.tail.then(() => this.exclusive(reason, signal));
    // The chain only orders saves; each caller sees its own outcome through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run.finally(() => {
      this.pending -= 1;
    });
  }

  private async exclusive(reason: string, signal?: AbortSignal): Promise<SaveResult> {
    const acquired = await this.lock.acquire(`save: ${reason}`, {
      waitMs: this.lockWaitMs,
      signal,
    });
    if (!acquired.acquired) {
      throw new SaveInProgressError(acquired.message);
    }

    try {
      return await this.capturer.save(reason, signal);
    } finally {
      await acquired.release();
    }
  }
}
