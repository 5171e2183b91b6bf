/**
 * Supervised pool of directory watches.
 *
 * Each watch moves through STOPPED → STARTING → WATCHING → STOPPING →
 * STOPPED and owns one long-lived worker that forwards raw events into
 * the daemon's channel. At most `maxWatches` are active; the rest of the
 * targets are skipped and logged. A worker whose stream ends or fails
 * stays marked until the next health check returns it to STOPPED, and the
 * following reconcile starts it again.
 *
 * @module daemon/watch-manager
 */

import { access, watch } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChangeEvent } from '../changes/types.js';
import type { Logger } from '../logging/logger.js';
import type { WatchOrigin, WatchTarget } from './watch-targets.js';
import { WatchFailureError, toError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export type WatchState = 'STOPPED' | 'STARTING' | 'WATCHING' | 'STOPPING';

/** One event as reported by the platform watcher. */
export interface RawWatchEvent {
  eventType: 'rename' | 'change';
  /** Path relative to the watched directory. */
  filename: string | null;
}

export interface WatchSourceOptions {
  recursive: boolean;
  signal: AbortSignal;
}

/** Opens a stream of raw events for one directory. Must stop when `signal` aborts. */
export type WatchSource = (directory: string, options: WatchSourceOptions) => AsyncIterable<RawWatchEvent>;

export const fsWatchSource: WatchSource = (directory, { recursive, signal }) =>
  watch(directory, { recursive, signal });

export type PathExists = (path: string) => Promise<boolean>;

const pathExists: PathExists = async (path) => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

export type WatchStatus = {
  directory: string;
  origin: WatchOrigin;
  state: WatchState;
  startedAt: string | null;
  restarts: number;
  lastError: string | null;
};

export interface ReconcileResult {
  started: string[];
  stopped: string[];
  skipped: string[];
}

export interface WatchManagerOptions {
  /** Receives each event; returns false when the event was dropped. */
  sink: (event: ChangeEvent) => boolean;
  logger: Logger;
  maxWatches: number;
  recursive: boolean;
  source?: WatchSource;
  exists?: PathExists;
  now?: () => Date;
}

interface WatchRecord {
  target: WatchTarget;
  state: WatchState;
  controller: AbortController | null;
  task: Promise<void> | null;
  failure: WatchFailureError | null;
  startedAt: string | null;
  starts: number;
  lastError: string | null;
}

/**
 * Map a platform event to a change event. `change` is a modification; a
 * `rename` is a creation when the path exists afterwards and a deletion
 * when it does not.
 */
export async function toChangeEvent(
  directory: string,
  raw: RawWatchEvent,
  time: string,
  exists: PathExists = pathExists,
): Promise<ChangeEvent | null> {
  if (raw.filename === null) return null;
  const path = join(directory, raw.filename);
  if (raw.eventType === 'change') {
    return { path, kind: 'modify', time };
  }
  return { path, kind: (await exists(path)) ? 'create' : 'delete', time };
}

// ============================================================================
// WatchManager
// ============================================================================

export class WatchManager {
  private readonly watches = new Map<string, WatchRecord>();
  private readonly sink: (event: ChangeEvent) => boolean;
  private readonly logger: Logger;
  private readonly maxWatches: number;
  private readonly recursive: boolean;
  private readonly source: WatchSource;
  private readonly exists: PathExists;
  private readonly now: () => Date;
  private skippedDirs: string[] = [];
  private droppedEvents = 0;

  constructor(options: WatchManagerOptions) {
    this.sink = options.sink;
    this.logger = options.logger;
    this.maxWatches = options.maxWatches;
    this.recursive = options.recursive;
    this.source = options.source ?? fsWatchSource;
    this.exists = options.exists ?? pathExists;
    this.now = options.now ?? (() => new Date());
  }

  /** Directories left unwatched by the last reconcile because of the bound. */
  get skipped(): readonly string[] {
    return this.skippedDirs;
  }

  get dropped(): number {
    return this.droppedEvents;
  }

  get activeCount(): number {
    let count = 0;
    for (const record of this.watches.values()) {
      if (record.state === 'STARTING' || record.state === 'WATCHING') count++;
    }
    return count;
  }

  list(): WatchStatus[] {
    return [...this.watches.values()].map((record) => ({
      directory: record.target.directory,
      origin: record.target.origin,
      state: record.state,
      startedAt: record.startedAt,
      restarts: Math.max(0, record.starts - 1),
      lastError: record.lastError,
    }));
  }

  /**
   * Bring the pool in line with `targets`: the first `maxWatches` targets
   * are watched, everything else is stopped or skipped.
   */
  async reconcile(targets: readonly WatchTarget[]): Promise<ReconcileResult> {
    const desired = targets.slice(0, this.maxWatches);
    const overflow = targets.slice(this.maxWatches).map((t) => t.directory);
    const wanted = new Set(desired.map((t) => t.directory));

    const stopped: string[] = [];
    for (const record of this.watches.values()) {
      if (!wanted.has(record.target.directory) && record.state !== 'STOPPED') {
        await this.stop(record);
        stopped.push(record.target.directory);
      }
    }
    for (const [directory, record] of this.watches) {
      if (!wanted.has(directory) && record.state === 'STOPPED') {
        this.watches.delete(directory);
      }
    }

    const started: string[] = [];
    for (const target of desired) {
      let record = this.watches.get(target.directory);
      if (!record) {
        record = {
          target,
          state: 'STOPPED',
          controller: null,
          task: null,
          failure: null,
          startedAt: null,
          starts: 0,
          lastError: null,
        };
        this.watches.set(target.directory, record);
      }
      if (record.state === 'STOPPED' && this.start(record)) {
        started.push(target.directory);
      }
    }

    const previouslySkipped = new Set(this.skippedDirs);
    for (const directory of overflow) {
      const message = `Skipping watch on ${directory}: limit of ${this.maxWatches} watches reached`;
      if (previouslySkipped.has(directory)) {
        this.logger.debug(message);
      } else {
        this.logger.warn(message);
      }
    }
    this.skippedDirs = overflow;

    return { started, stopped, skipped: overflow };
  }

  /**
   * Return workers that died since the last check to STOPPED so the next
   * reconcile restarts them.
   */
  healthCheck(): WatchFailureError[] {
    const failures: WatchFailureError[] = [];
    for (const record of this.watches.values()) {
      if (record.state !== 'WATCHING' || record.failure === null) continue;

      const failure = record.failure;
      record.state = 'STOPPED';
      record.controller?.abort();
      record.controller = null;
      record.task = null;
      record.failure = null;
      record.lastError = failure.message;
      this.logger.warn(`${failure.message}; restarting on the next cycle`);
      failures.push(failure);
    }
    return failures;
  }

  async stopAll(): Promise<void> {
    await Promise.all(
      [...this.watches.values()]
        .filter((record) => record.state !== 'STOPPED')
        .map((record) => this.stop(record)),
    );
    this.skippedDirs = [];
  }

  private start(record: WatchRecord): boolean {
    const { directory } = record.target;
    record.state = 'STARTING';
    const controller = new AbortController();

    let events: AsyncIterable<RawWatchEvent>;
    try {
      events = this.source(directory, { recursive: this.recursive, signal: controller.signal });
    } catch (err) {
      record.state = 'STOPPED';
      record.lastError = `Cannot watch ${directory}: ${toError(err).message}`;
      this.logger.warn(record.lastError);
      return false;
    }

    record.controller = controller;
    record.failure = null;
    record.startedAt = this.now().toISOString();
    record.starts++;
    record.state = 'WATCHING';
    record.task = this.pump(record, events, controller.signal);
    this.logger.info(`Watching ${directory} (${record.target.origin})`);
    return true;
  }

  private async stop(record: WatchRecord): Promise<void> {
    record.state = 'STOPPING';
    record.controller?.abort();
    await record.task;
    record.controller = null;
    record.task = null;
    record.failure = null;
    record.state = 'STOPPED';
    this.logger.debug(`Stopped watching ${record.target.directory}`);
  }

  /** Worker body. Never rejects; failures are recorded on the watch. */
  private async pump(record: WatchRecord, events: AsyncIterable<RawWatchEvent>, signal: AbortSignal): Promise<void> {
    const { directory } = record.target;
    try {
      for await (const raw of events) {
        const event = await toChangeEvent(directory, raw, this.now().toISOString(), this.exists);
        if (event && !this.sink(event)) {
          this.droppedEvents++;
          this.logger.debug(`Dropped ${event.kind} event for ${event.path}: queue full`);
        }
      }
      if (!signal.aborted) {
        record.failure = new WatchFailureError(directory, `Watch on ${directory} ended unexpectedly`);
      }
    } catch (err) {
      if (signal.aborted) return;
      const error = toError(err);
      record.failure = new WatchFailureError(directory, `Watch on ${directory} failed: ${error.message}`, error);
    }
  }
}
