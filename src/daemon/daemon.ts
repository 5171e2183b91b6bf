/**
 * The monitoring daemon loop.
 *
 * Each cycle wakes, health-checks the watch pool, runs a baseline scan
 * (whose changes go straight to the trigger), reconciles the watch pool
 * with the directories the scan found, writes its status document and
 * sleeps. Alongside the loop a single consumer task drains the event
 * channel: a burst of queued events is classified as one batch, every
 * change is logged and recorded, and only the highest-scoring one goes to
 * the trigger. The trigger decides once per batch: one save covers the
 * whole burst, and with auto-save disabled the skip is logged once per
 * batch, not once per change.
 *
 * Everything observes one AbortSignal; aborting it stops the loop, the
 * consumer and every watch.
 *
 * @module daemon/daemon
 */

import type { Config } from '../config/schema.js';
import type { ChangeEvent, ClassifiedChange } from '../changes/types.js';
import { changeLabel } from '../changes/types.js';
import { classifyEvent } from '../changes/classifier.js';
import type { ChangeLog } from '../changes/change-log.js';
import type { BaselineTracker } from '../environments/tracker.js';
import type { DetectionResult, EnvironmentType } from '../environments/types.js';
import type { Logger } from '../logging/logger.js';
import { sleep as defaultSleep } from '../session/retry.js';
import type { Sleep } from '../session/retry.js';
import type { BoundedChannel } from './channel.js';
import type { AutoSaveTrigger } from './trigger.js';
import type { WatchManager } from './watch-manager.js';
import { planWatchTargets } from './watch-targets.js';
import type { DaemonStatus, DaemonStatusStore } from './status-store.js';
import { isAbortError, toError } from '../errors.js';

export interface DaemonOptions {
  config: Config;
  tracker: BaselineTracker;
  watches: WatchManager;
  channel: BoundedChannel<ChangeEvent>;
  trigger: AutoSaveTrigger;
  statusStore: DaemonStatusStore;
  logger: Logger;
  changeLog?: ChangeLog | null;
  sleep?: Sleep;
  now?: () => Date;
  pid?: number;
}

export class Daemon {
  private readonly config: Config;
  private readonly tracker: BaselineTracker;
  private readonly watches: WatchManager;
  private readonly channel: BoundedChannel<ChangeEvent>;
  private readonly trigger: AutoSaveTrigger;
  private readonly statusStore: DaemonStatusStore;
  private readonly logger: Logger;
  private readonly changeLog: ChangeLog | null;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly pid: number;

  private readonly detections = new Map<EnvironmentType, DetectionResult>();
  private startedAt = '';
  private cycles = 0;
  private lastScanAt: string | null = null;
  private environmentCount = 0;
  private missing: string[] = [];

  constructor(options: DaemonOptions) {
    this.config = options.config;
    this.tracker = options.tracker;
    this.watches = options.watches;
    this.channel = options.channel;
    this.trigger = options.trigger;
    this.statusStore = options.statusStore;
    this.logger = options.logger;
    this.changeLog = options.changeLog ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /** Run until `signal` aborts. */
  async run(signal: AbortSignal): Promise<void> {
    this.startedAt = this.now().toISOString();
    const intervalMs = this.config.daemon.scan_interval_seconds * 1000;
    this.logger.info(
      `Daemon started (pid ${this.pid}, scan every ${this.config.daemon.scan_interval_seconds}s, ` +
        `auto-save ${this.config.auto_save.enabled ? `at impact >= ${this.config.auto_save.impact_threshold}` : 'off'})`,
    );

    const consumer = this.consume(signal);
    try {
      while (!signal.aborted) {
        await this.cycle(signal);
        await this.sleep(intervalMs, signal);
      }
    } catch (err) {
      if (!(isAbortError(err) && signal.aborted)) throw err;
    } finally {
      await this.watches.stopAll();
      this.channel.close();
      await consumer;
      await this.writeStatus('stopped');
      this.logger.info(`Daemon stopped after ${this.cycles} cycle(s)`);
    }
  }

  /** One wake-up: health check, baseline scan, watch reconcile, status. */
  async cycle(signal: AbortSignal): Promise<void> {
    this.cycles++;
    this.watches.healthCheck();

    try {
      const scan = await this.tracker.scan({
        signal,
        emit: (change) => this.handle(change, signal),
      });
      this.lastScanAt = scan.baseline.timestamp;
      this.environmentCount = scan.baseline.environments.length;

      for (const detection of scan.detections) {
        this.detections.set(detection.type, detection);
      }
      for (const failure of scan.failures) {
        // A missing tool has no directories; a transient failure keeps the last known ones
        if (failure.missing) this.detections.delete(failure.type);
      }

      const plan = await planWatchTargets(
        [...this.detections.values()],
        this.config.environments.additional_watch_dirs,
      );
      const known = new Set(this.missing);
      for (const dir of plan.missing) {
        if (!known.has(dir)) this.logger.warn(`Not watching ${dir}: directory does not exist`);
      }
      this.missing = plan.missing;

      await this.watches.reconcile(plan.targets);
    } catch (err) {
      if (isAbortError(err) && signal.aborted) throw err;
      this.logger.error(`Scan cycle ${this.cycles} failed: ${toError(err).message}`);
    }

    await this.writeStatus('running');
  }

  private async consume(signal: AbortSignal): Promise<void> {
    for (;;) {
      const first = await this.channel.receive(signal);
      if (first === undefined) return;

      const batch = [first, ...this.channel.drain()].map(classifyEvent);
      let top: ClassifiedChange | null = null;
      for (const change of batch) {
        this.logger.debug(`Change ${changeLabel(change)} (impact ${change.score})`);
        await this.record(change);
        if (top === null || change.score > top.score) top = change;
      }
      if (top === null) continue;

      try {
        await this.trigger.onChange(top.changeType, top.path, top.score, signal);
      } catch (err) {
        if (isAbortError(err) && signal.aborted) return;
        this.logger.error(`Handling ${changeLabel(top)} failed: ${toError(err).message}`);
      }
    }
  }

  private async handle(change: ClassifiedChange, signal: AbortSignal): Promise<void> {
    await this.record(change);
    await this.trigger.onChange(change.changeType, change.path, change.score, signal);
  }

  private async record(change: ClassifiedChange): Promise<void> {
    if (!this.changeLog) return;
    try {
      await this.changeLog.append(change);
    } catch (err) {
      this.logger.warn(`Cannot append to change log: ${toError(err).message}`);
    }
  }

  status(state: DaemonStatus['state']): DaemonStatus {
    return {
      pid: this.pid,
      state,
      startedAt: this.startedAt,
      updatedAt: this.now().toISOString(),
      cycles: this.cycles,
      lastScanAt: this.lastScanAt,
      environments: this.environmentCount,
      watches: this.watches.list(),
      skipped: [...this.watches.skipped],
      missing: this.missing,
      droppedEvents: this.watches.dropped,
      lastAutoSave: this.trigger.lastSave,
    };
  }

  private async writeStatus(state: DaemonStatus['state']): Promise<void> {
    try {
      await this.statusStore.write(this.status(state));
    } catch (err) {
      this.logger.warn(`Cannot write daemon status: ${toError(err).message}`);
    }
  }
}
