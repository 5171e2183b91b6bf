/**
 * Session snapshot capture.
 *
 * A save is all-or-nothing: every compositor query must succeed and the
 * store write must complete, otherwise a {@link CaptureFailureError} is
 * raised and the stored snapshot is left as it was. The pre-save hook
 * phase runs only after a successful write; its failures never fail the
 * save.
 *
 * When an environment source is configured, the environments detected at
 * save time are recorded with the snapshot so a restore can tell which of
 * them have gone. Detection problems are logged and never fail the save.
 *
 * @module session/capturer
 */

import type { CompositorClient } from '../compositor/client.js';
import type { Monitor, Window, Workspace } from '../compositor/types.js';
import type { HookPipeline } from '../hooks/types.js';
import type { Logger } from '../logging/logger.js';
import type { EnvironmentDescriptor } from '../environments/types.js';
import type { EnvironmentSource } from '../environments/validation.js';
import { sortEnvironments } from '../environments/differ.js';
import type { SnapshotStore } from './snapshot-store.js';
import type { Application, SaveResult, SessionSnapshot } from './types.js';
import { createCommandResolver } from './process-command.js';
import type { CommandResolver } from './process-command.js';
import { CaptureFailureError, LayoutKeeperError, isAbortError, toError } from '../errors.js';

export interface SessionCapturerOptions {
  compositor: CompositorClient;
  store: SnapshotStore;
  hooks: HookPipeline;
  logger: Logger;
  environments?: EnvironmentSource;
  resolveCommand?: CommandResolver;
  now?: () => Date;
}

export class SessionCapturer {
  private readonly compositor: CompositorClient;
  private readonly store: SnapshotStore;
  private readonly hooks: HookPipeline;
  private readonly logger: Logger;
  private readonly environments: EnvironmentSource | null;
  private readonly resolveCommand: CommandResolver;
  private readonly now: () => Date;

  constructor(options: SessionCapturerOptions) {
    this.compositor = options.compositor;
    this.store = options.store;
    this.hooks = options.hooks;
    this.logger = options.logger;
    this.environments = options.environments ?? null;
    this.resolveCommand = options.resolveCommand ?? createCommandResolver();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read live compositor state into a snapshot without storing it.
   */
  async capture(reason = 'manual', signal?: AbortSignal): Promise<SessionSnapshot> {
    let monitors: Monitor[];
    let workspaces: Workspace[];
    let windows: Window[];
    let activeWorkspace: number;
    try {
      [monitors, workspaces, windows, activeWorkspace] = await Promise.all([
        this.compositor.listMonitors(),
        this.compositor.listWorkspaces(),
        this.compositor.listWindows(),
        this.compositor.activeWorkspace(),
      ]);
    } catch (err) {
      const cause = toError(err);
      throw new CaptureFailureError(`Cannot capture session: ${cause.message}`, cause);
    }

    const known = new Set(workspaces.map((w) => w.id));
    const placed = windows.filter((w) => {
      if (known.has(w.workspaceId)) return true;
      this.logger.warn(
        `Skipping window ${w.address} (${w.class}): workspace ${w.workspaceId} is not listed`,
      );
      return false;
    });

    const snapshot: SessionSnapshot = {
      timestamp: this.now().toISOString(),
      reason,
      monitors,
      workspaces,
      windows: placed,
      activeWorkspace,
      applications: await this.applicationsFor(placed),
    };
    const environments = await this.detectEnvironments(signal);
    return environments ? { ...snapshot, environments } : snapshot;
  }

  /**
   * Capture, store, then run the pre-save hooks.
   */
  async save(reason = 'manual', signal?: AbortSignal): Promise<SaveResult> {
    const snapshot = await this.capture(reason, signal);

    try {
      await this.store.write(snapshot);
    } catch (err) {
      if (err instanceof LayoutKeeperError) throw err;
      const cause = toError(err);
      throw new CaptureFailureError(`Cannot write snapshot: ${cause.message}`, cause);
    }

    this.logger.info(
      `Saved session (${reason}): ${snapshot.windows.length} windows on ${snapshot.workspaces.length} workspaces`,
    );

    const hooks = await this.hooks.run('pre-save', signal);
    return { snapshot, hooks };
  }

  private async detectEnvironments(signal?: AbortSignal): Promise<EnvironmentDescriptor[] | undefined> {
    if (!this.environments) return undefined;
    try {
      const { detections } = await this.environments.detectAll(signal);
      return sortEnvironments(detections.flatMap((d) => d.environments));
    } catch (err) {
      if (isAbortError(err)) throw err;
      this.logger.warn(`Not recording environments: ${toError(err).message}`);
      return undefined;
    }
  }

  /** One record per (class, workspace), in window order. */
  private async applicationsFor(windows: Window[]): Promise<Application[]> {
    const seen = new Set<string>();
    const applications: Application[] = [];

    for (const window of windows) {
      if (window.class === '') continue;
      const key = `${window.class}\u0000${window.workspaceId}`;
      if (seen.has(key)) continue;
      seen.add(key);

      applications.push({
        class: window.class,
        command: await this.resolveCommand(window.pid, window.class),
        workspaceId: window.workspaceId,
        title: window.title,
      });
    }
    return applications;
  }
}
