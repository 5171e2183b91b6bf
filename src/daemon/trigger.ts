/**
 * Auto-save trigger: decides whether a scored change is worth a save.
 *
 * @module daemon/trigger
 */

import type { ChangeType } from '../changes/types.js';
import type { Config } from '../config/schema.js';
import type { Notifier } from '../notify/notifier.js';
import type { SnapshotSaver } from '../session/save-coordinator.js';
import type { Logger } from '../logging/logger.js';
import { isAbortError, toError } from '../errors.js';

export type TriggerOutcome = 'disabled' | 'below-threshold' | 'coalesced' | 'saved' | 'failed';

/** A change fires a save when its score reaches the threshold. */
export function shouldAutoSave(score: number, threshold: number): boolean {
  return score >= threshold;
}

export interface AutoSaveTriggerOptions {
  saver: SnapshotSaver;
  notifier: Notifier;
  logger: Logger;
  autoSave: Config['auto_save'];
  notifications: Config['notifications'];
}

export type LastAutoSave = {
  at: string;
  outcome: 'saved' | 'failed';
  changeType: ChangeType;
  details: string;
  error?: string;
};

export class AutoSaveTrigger {
  private readonly saver: SnapshotSaver;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly autoSave: Config['auto_save'];
  private readonly notifications: Config['notifications'];
  private running = false;
  private rerun: { changeType: ChangeType; details: string } | null = null;
  private last: LastAutoSave | null = null;

  constructor(options: AutoSaveTriggerOptions) {
    this.saver = options.saver;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.autoSave = options.autoSave;
    this.notifications = options.notifications;
  }

  get lastSave(): LastAutoSave | null {
    return this.last;
  }

  /**
   * React to one scored change. A qualifying change that arrives while an
   * automatic save is running is folded into one follow-up save.
   */
  async onChange(changeType: ChangeType, details: string, score: number, signal?: AbortSignal): Promise<TriggerOutcome> {
    if (!this.autoSave.enabled) {
      this.logger.info(`Automatic saving disabled; not saving after ${changeType}: ${details}`);
      return 'disabled';
    }

    if (!shouldAutoSave(score, this.autoSave.impact_threshold)) {
      this.logger.debug(
        `${changeType}: ${details} scored ${score}, below threshold ${this.autoSave.impact_threshold}`,
      );
      return 'below-threshold';
    }

    if (this.running) {
      this.rerun = { changeType, details };
      this.logger.debug(`Save already running; ${changeType}: ${details} will be covered by a follow-up save`);
      return 'coalesced';
    }

    this.running = true;
    try {
      let outcome = await this.saveFor(changeType, details, signal);
      while (this.rerun && !signal?.aborted) {
        const next = this.rerun;
        this.rerun = null;
        outcome = await this.saveFor(next.changeType, next.details, signal);
      }
      return outcome;
    } finally {
      this.running = false;
      this.rerun = null;
    }
  }

  private async saveFor(changeType: ChangeType, details: string, signal?: AbortSignal): Promise<'saved' | 'failed'> {
    this.logger.info(`Saving session after ${changeType}: ${details}`);
    const at = new Date().toISOString();
    try {
      const result = await this.saver.save(`auto: ${changeType}`, signal);
      this.last = { at, outcome: 'saved', changeType, details };
      this.logger.info(
        `Automatic save completed (${result.snapshot.windows.length} windows; hooks ${result.hooks.succeeded}/${result.hooks.total})`,
      );
      this.notify('Session Saved', `Session saved after ${changeType}: ${details}`, this.notifications.urgency);
      return 'saved';
    } catch (err) {
      if (isAbortError(err)) throw err;
      const error = toError(err);
      this.last = { at, outcome: 'failed', changeType, details, error: error.message };
      this.logger.error(`Automatic save failed: ${error.message}`);
      this.notify('Session Save Failed', error.message, 'critical');
      return 'failed';
    }
  }

  private notify(title: string, message: string, urgency: Config['notifications']['urgency']): void {
    if (this.notifications.enabled) {
      this.notifier.notify({ title, message, urgency });
    }
  }
}
