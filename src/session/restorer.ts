/**
 * Session restore.
 *
 * Before anything is replayed, the environments recorded with the snapshot
 * are checked against the ones detected now; each one that has gone is a
 * warning. Then the snapshot is replayed against the running compositor:
 *
 *  1. wait for the compositor to answer, with bounded retries and backoff
 *  2. make sure every recorded workspace exists
 *  3. relaunch each recorded application, pausing between launches
 *  4. poll until the expected windows appear, or attempts run out
 *  5. move, resize and re-flag each window that appeared
 *  6. focus the recorded active workspace
 *  7. run the post-restore hooks
 *  8. compare present windows against the snapshot; a shortfall is a
 *     {@link RestoreMismatch} warning in the report, never a failure
 *
 * Only a missing snapshot, a compositor that never becomes ready, or an
 * abort reject; everything after step 1 degrades to warnings.
 *
 * @module session/restorer
 */

import type { CompositorClient } from '../compositor/client.js';
import type { DispatchCommand, Window } from '../compositor/types.js';
import type { HookPipeline, HookSummary } from '../hooks/types.js';
import type { Logger } from '../logging/logger.js';
import type { Config } from '../config/schema.js';
import { checkEnvironments } from '../environments/validation.js';
import type { EnvironmentCheck, EnvironmentSource } from '../environments/validation.js';
import type { SnapshotStore } from './snapshot-store.js';
import type { AppLauncher, LaunchResult } from './launcher.js';
import type { SessionSnapshot } from './types.js';
import { retry, sleep as defaultSleep } from './retry.js';
import type { Sleep } from './retry.js';
import { CompositorUnreachableError, RestoreMismatch, isAbortError, toError } from '../errors.js';

export type RestoreSettings = Config['restore'];

export interface RestoreReport {
  snapshotTimestamp: string;
  /** Recorded environments checked against live detection; null when not checked. */
  environments: EnvironmentCheck | null;
  /** Workspace ids present after step 2. */
  workspaces: number[];
  /** Workspaces that did not exist and were created. */
  workspacesCreated: number[];
  launches: LaunchResult[];
  /** Applications not launched because a window of their class was already open. */
  alreadyRunning: string[];
  windowsExpected: number;
  windowsPresent: number;
  /** Windows whose geometry and flags were applied without error. */
  windowsPlaced: number;
  hooks: HookSummary;
  warnings: string[];
  mismatch: RestoreMismatch | null;
}

export interface SessionRestorerOptions {
  compositor: CompositorClient;
  store: SnapshotStore;
  hooks: HookPipeline;
  launcher: AppLauncher;
  logger: Logger;
  settings: RestoreSettings;
  environments?: EnvironmentSource;
  sleep?: Sleep;
}

/**
 * Pair snapshot windows with live ones: same class, preferring an equal
 * title. Each live window is used at most once.
 */
export function matchWindows(expected: readonly Window[], live: readonly Window[]): Map<string, Window> {
  const unused = [...live];
  const matches = new Map<string, Window>();

  const take = (predicate: (w: Window) => boolean): Window | undefined => {
    const index = unused.findIndex(predicate);
    if (index === -1) return undefined;
    const [found] = unused.splice(index, 1);
    return found;
  };

  // Exact title matches first so they are not consumed by class-only matches
  for (const want of expected) {
    const found = take((w) => w.class === want.class && w.title === want.title);
    if (found) matches.set(want.address, found);
  }
  for (const want of expected) {
    if (matches.has(want.address)) continue;
    const found = take((w) => w.class === want.class);
    if (found) matches.set(want.address, found);
  }
  return matches;
}

export class SessionRestorer {
  private readonly compositor: CompositorClient;
  private readonly store: SnapshotStore;
  private readonly hooks: HookPipeline;
  private readonly launcher: AppLauncher;
  private readonly logger: Logger;
  private readonly settings: RestoreSettings;
  private readonly environments: EnvironmentSource | null;
  private readonly sleep: Sleep;

  constructor(options: SessionRestorerOptions) {
    this.compositor = options.compositor;
    this.store = options.store;
    this.hooks = options.hooks;
    this.launcher = options.launcher;
    this.logger = options.logger;
    this.settings = options.settings;
    this.environments = options.environments ?? null;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async restore(signal?: AbortSignal): Promise<RestoreReport> {
    const snapshot = await this.store.read();
    const warnings: string[] = [];
    const warn = (message: string): void => {
      warnings.push(message);
      this.logger.warn(message);
    };

    const environments = await this.validateEnvironments(snapshot, warn, signal);

    // 1. Readiness
    await this.waitForCompositor(signal);

    // 2. Workspaces
    const { present: workspaces, created } = await this.ensureWorkspaces(snapshot, warn);

    // 3. Applications
    const { launches, alreadyRunning } = await this.launchApplications(snapshot, warn, signal);

    // 4. Windows
    const matches = await this.awaitWindows(snapshot, signal);

    // 5. Geometry and flags
    let placed = 0;
    for (const want of snapshot.windows) {
      const live = matches.get(want.address);
      if (live && (await this.placeWindow(want, live, warn))) {
        placed += 1;
      }
    }

    // 6. Focus
    const focus = await this.compositor.dispatch({
      type: 'switch-workspace',
      workspace: snapshot.activeWorkspace,
    });
    if (!focus.ok) {
      warn(`Cannot focus workspace ${snapshot.activeWorkspace}: ${focus.error.message}`);
    }

    // 7. Hooks
    const hooks = await this.hooks.run('post-restore', signal);

    // 8. Validation
    const present = await this.countPresent(snapshot, matches.size);
    let mismatch: RestoreMismatch | null = null;
    if (present < snapshot.windows.length) {
      mismatch = new RestoreMismatch(snapshot.windows.length, present);
      warn(mismatch.message);
    }

    this.logger.info(
      `Restore finished: ${present}/${snapshot.windows.length} windows, ${hooks.succeeded}/${hooks.total} post-restore hooks`,
    );

    return {
      snapshotTimestamp: snapshot.timestamp,
      environments,
      workspaces,
      workspacesCreated: created,
      launches,
      alreadyRunning,
      windowsExpected: snapshot.windows.length,
      windowsPresent: present,
      windowsPlaced: placed,
      hooks,
      warnings,
      mismatch,
    };
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async validateEnvironments(
    snapshot: SessionSnapshot,
    warn: (message: string) => void,
    signal?: AbortSignal,
  ): Promise<EnvironmentCheck | null> {
    if (!this.environments || snapshot.environments === undefined) return null;
    let check: EnvironmentCheck;
    try {
      const { detections, failures } = await this.environments.detectAll(signal);
      check = checkEnvironments(snapshot.environments, detections, failures);
    } catch (err) {
      if (isAbortError(err)) throw err;
      warn(`Cannot check saved environments: ${toError(err).message}`);
      return null;
    }

    for (const id of check.missing) {
      warn(`Environment ${id} from the saved session no longer exists`);
    }
    for (const { ids, reason } of check.unverified) {
      warn(`Cannot check ${ids.join(', ')}: ${reason}`);
    }
    return check;
  }

  private async waitForCompositor(signal?: AbortSignal): Promise<void> {
    try {
      await retry(() => this.compositor.activeWorkspace(), {
        attempts: this.settings.readiness_attempts,
        initialDelayMs: this.settings.readiness_initial_delay_ms,
        maxDelayMs: this.settings.readiness_max_delay_ms,
        signal,
        sleep: this.sleep,
        onRetry: (attempt, _err, delayMs) => {
          this.logger.debug(`Compositor not ready (attempt ${attempt}); retrying in ${delayMs}ms`);
        },
      });
    } catch (err) {
      if (isAbortError(err)) throw err;
      const cause = toError(err);
      throw new CompositorUnreachableError(
        `Compositor not ready after ${this.settings.readiness_attempts} attempts: ${cause.message}`,
        cause,
      );
    }
  }

  private async ensureWorkspaces(
    snapshot: SessionSnapshot,
    warn: (message: string) => void,
  ): Promise<{ present: number[]; created: number[] }> {
    let live: Set<number>;
    try {
      live = new Set((await this.compositor.listWorkspaces()).map((w) => w.id));
    } catch (err) {
      warn(`Cannot list workspaces: ${toError(err).message}`);
      live = new Set();
    }

    const present: number[] = [];
    const created: number[] = [];
    const wanted = [...snapshot.workspaces].sort((a, b) => a.id - b.id);

    for (const workspace of wanted) {
      if (live.has(workspace.id)) {
        present.push(workspace.id);
        continue;
      }
      if (workspace.id <= 0) {
        // Special workspaces come back when a window is sent to them
        this.logger.debug(`Not creating special workspace ${workspace.name}`);
        continue;
      }

      const switched = await this.compositor.dispatch({
        type: 'switch-workspace',
        workspace: workspace.id,
      });
      if (!switched.ok) {
        warn(`Cannot create workspace ${workspace.id}: ${switched.error.message}`);
        continue;
      }
      present.push(workspace.id);
      created.push(workspace.id);

      if (workspace.name !== String(workspace.id)) {
        const renamed = await this.compositor.dispatch({
          type: 'rename-workspace',
          workspace: workspace.id,
          name: workspace.name,
        });
        if (!renamed.ok) {
          warn(`Cannot name workspace ${workspace.id} "${workspace.name}": ${renamed.error.message}`);
        }
      }
    }
    return { present, created };
  }

  private async launchApplications(
    snapshot: SessionSnapshot,
    warn: (message: string) => void,
    signal?: AbortSignal,
  ): Promise<{ launches: LaunchResult[]; alreadyRunning: string[] }> {
    let running: Set<string>;
    try {
      running = new Set((await this.compositor.listWindows()).map((w) => w.class));
    } catch (err) {
      warn(`Cannot list windows before launch: ${toError(err).message}`);
      running = new Set();
    }

    const launches: LaunchResult[] = [];
    const alreadyRunning: string[] = [];
    let launchedAny = false;

    for (const app of snapshot.applications) {
      if (running.has(app.class)) {
        alreadyRunning.push(app.class);
        continue;
      }
      if (launchedAny) {
        await this.sleep(this.settings.launch_delay_ms, signal);
      }
      const result = await this.launcher.launch(app);
      launches.push(result);
      if (result.status === 'launched') {
        launchedAny = true;
      } else {
        warn(result.error.message);
      }
    }
    return { launches, alreadyRunning };
  }

  private async awaitWindows(snapshot: SessionSnapshot, signal?: AbortSignal): Promise<Map<string, Window>> {
    let matches = new Map<string, Window>();

    for (let attempt = 1; attempt <= this.settings.window_poll_attempts; attempt++) {
      try {
        matches = matchWindows(snapshot.windows, await this.compositor.listWindows());
      } catch (err) {
        this.logger.debug(`Window poll ${attempt} failed: ${toError(err).message}`);
      }
      if (matches.size >= snapshot.windows.length) break;
      if (attempt < this.settings.window_poll_attempts) {
        await this.sleep(this.settings.window_poll_interval_ms, signal);
      }
    }
    return matches;
  }

  /** @returns true when every command for the window succeeded */
  private async placeWindow(want: Window, live: Window, warn: (message: string) => void): Promise<boolean> {
    const commands: DispatchCommand[] = [];
    const address = live.address;

    if (live.workspaceId !== want.workspaceId) {
      commands.push({ type: 'move-to-workspace', address, workspace: want.workspaceId });
    }
    if (live.floating !== want.floating) {
      commands.push({ type: 'toggle-floating', address });
    }
    if (live.x !== want.x || live.y !== want.y) {
      commands.push({ type: 'move-window', address, x: want.x, y: want.y });
    }
    if (live.width !== want.width || live.height !== want.height) {
      commands.push({ type: 'resize-window', address, width: want.width, height: want.height });
    }
    if (live.pinned !== want.pinned) {
      commands.push({ type: 'pin', address });
    }
    if (want.fullscreen && !live.fullscreen) {
      commands.push({ type: 'focus-window', address }, { type: 'fullscreen' });
    }

    let ok = true;
    for (const command of commands) {
      const result = await this.compositor.dispatch(command);
      if (!result.ok) {
        ok = false;
        warn(`Cannot ${command.type} ${want.class} (${address}): ${result.error.message}`);
      }
    }
    return ok;
  }

  private async countPresent(snapshot: SessionSnapshot, fallback: number): Promise<number> {
    try {
      return matchWindows(snapshot.windows, await this.compositor.listWindows()).size;
    } catch (err) {
      this.logger.debug(`Final window count unavailable: ${toError(err).message}`);
      return fallback;
    }
  }
}
