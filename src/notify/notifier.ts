/**
 * Fire-and-forget desktop notifications through `notify-send`.
 *
 * @module notify/notifier
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Urgency } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import { toError } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface Notification {
  title: string;
  message: string;
  urgency: Urgency;
}

export interface Notifier {
  /** Never throws and never blocks the caller. */
  notify(notification: Notification): void;
}

export type NotifyCommand = (file: string, args: string[]) => Promise<unknown>;

const DISPLAY_MS = 5000;

export class DesktopNotifier implements Notifier {
  private pending = new Set<Promise<void>>();

  constructor(
    private readonly logger: Logger,
    private readonly run: NotifyCommand = (file, args) => execFileAsync(file, args, { timeout: 10_000 }),
  ) {}

  notify({ title, message, urgency }: Notification): void {
    const delivery = this.run('notify-send', ['-u', urgency, '-t', String(DISPLAY_MS), title, message])
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.debug(`Notification "${title}" not shown: ${toError(err).message}`);
        },
      )
      .finally(() => this.pending.delete(delivery));
    this.pending.add(delivery);
  }

  /** Resolves once every notification sent so far has been delivered or dropped. */
  async settle(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}

export class NullNotifier implements Notifier {
  notify(): void {}
}
