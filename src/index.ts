/**
 * layout-keeper public API and composition root.
 *
 * {@link createRuntime} builds every long-lived component from one
 * {@link Config} value. The CLI creates a single runtime per invocation;
 * tests substitute the compositor, hook runner, detectors or watch source
 * through {@link RuntimeOptions}.
 *
 * @module layout-keeper
 */

import { fileURLToPath } from 'node:url';
import type { Config } from './config/schema.js';
import type { AppPaths } from './config/paths.js';
import type { Logger } from './logging/logger.js';
import type { CompositorClient } from './compositor/client.js';
import { HyprlandIpcClient } from './compositor/ipc-client.js';
import { HookRegistry } from './hooks/registry.js';
import { HookExecutor } from './hooks/executor.js';
import type { HookRunner } from './hooks/types.js';
import { SnapshotStore } from './session/snapshot-store.js';
import { SessionCapturer } from './session/capturer.js';
import { SaveLock } from './session/save-lock.js';
import { SaveCoordinator } from './session/save-coordinator.js';
import { AppLauncher, createPathLocator } from './session/launcher.js';
import type { CommandLocator } from './session/launcher.js';
import { SessionRestorer } from './session/restorer.js';
import type { CommandResolver } from './session/process-command.js';
import type { Sleep } from './session/retry.js';
import { createDetectors } from './environments/detectors.js';
import type { DetectorDeps } from './environments/detectors.js';
import { BaselineStore } from './environments/baseline-store.js';
import { BaselineTracker } from './environments/tracker.js';
import { ChangeLog } from './changes/change-log.js';
import type { ChangeEvent } from './changes/types.js';
import { DesktopNotifier, NullNotifier } from './notify/notifier.js';
import type { Notifier } from './notify/notifier.js';
import { BoundedChannel } from './daemon/channel.js';
import { WatchManager } from './daemon/watch-manager.js';
import type { WatchSource } from './daemon/watch-manager.js';
import { AutoSaveTrigger } from './daemon/trigger.js';
import { DaemonStatusStore } from './daemon/status-store.js';
import { PidFile } from './daemon/pid-file.js';
import { Daemon } from './daemon/daemon.js';
import { DaemonController, createDaemonSpawner } from './daemon/control.js';
import type { DaemonSpawner } from './daemon/control.js';

// Errors
export * from './errors.js';

// Subsystems
export * from './config/index.js';
export { createLogger, formatLine, silentLogger } from './logging/logger.js';
export type { LogLevel, LogSink, Logger, LoggerOptions, RootLogger } from './logging/logger.js';
export * from './compositor/index.js';
export * from './hooks/index.js';
export * from './session/index.js';
export * from './environments/index.js';
export * from './changes/index.js';
export * from './notify/index.js';
export * from './daemon/index.js';

// ============================================================================
// Runtime
// ============================================================================

export interface RuntimeOptions {
  paths: AppPaths;
  config: Config;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  compositor?: CompositorClient;
  hookRunner?: HookRunner;
  resolveCommand?: CommandResolver;
  locateCommand?: CommandLocator;
  detectorDeps?: DetectorDeps;
  notifier?: Notifier;
  watchSource?: WatchSource;
  /** Entry script re-run by `daemon start`. */
  cliPath?: string;
  spawnDaemon?: DaemonSpawner;
  sleep?: Sleep;
}

export interface Runtime {
  paths: AppPaths;
  config: Config;
  logger: Logger;
  compositor: CompositorClient;
  store: SnapshotStore;
  hooks: HookRegistry;
  hookExecutor: HookExecutor;
  capturer: SessionCapturer;
  saves: SaveCoordinator;
  restorer: SessionRestorer;
  tracker: BaselineTracker;
  changeLog: ChangeLog | null;
  notifier: Notifier;
  daemonStatus: DaemonStatusStore;
  pidFile: PidFile;
  controller: DaemonController;
  /** Build the daemon loop with its watch pool, channel and trigger. */
  createDaemon(): Daemon;
}

const DEFAULT_CLI_PATH = fileURLToPath(new URL('./cli.js', import.meta.url));

export function createRuntime(options: RuntimeOptions): Runtime {
  const { paths, config, logger } = options;
  const env = options.env ?? process.env;

  const compositor = options.compositor ?? new HyprlandIpcClient({ env });
  const store = new SnapshotStore(paths.sessionDir);

  const hooks = new HookRegistry(paths.hooksDir, config.hooks.entries, logger.child('hooks'));
  const hookExecutor = new HookExecutor({
    registry: hooks,
    logger: logger.child('hooks'),
    timeoutMs: config.hooks.timeout_seconds * 1000,
    env: {
      LAYOUT_KEEPER_SESSION_DIR: store.directory,
      LAYOUT_KEEPER_APPS_DIR: store.appsDir,
    },
    runner: options.hookRunner,
  });

  const tracker = new BaselineTracker({
    detectors: createDetectors(config.environments, { env, ...options.detectorDeps }),
    store: new BaselineStore(paths.baselineFile, logger.child('baseline')),
    logger: logger.child('baseline'),
  });

  const capturer = new SessionCapturer({
    compositor,
    store,
    hooks: hookExecutor,
    logger: logger.child('capturer'),
    environments: tracker,
    resolveCommand: options.resolveCommand,
  });
  const saves = new SaveCoordinator({
    capturer,
    lock: new SaveLock(paths.saveLock),
    logger: logger.child('save'),
  });

  const restorer = new SessionRestorer({
    compositor,
    store,
    hooks: hookExecutor,
    launcher: new AppLauncher(
      compositor,
      options.locateCommand ?? createPathLocator(env),
      logger.child('launcher'),
    ),
    logger: logger.child('restorer'),
    settings: config.restore,
    environments: tracker,
    sleep: options.sleep,
  });

  const changeLog = config.logging.change_log
    ? new ChangeLog(paths.changeLog, logger.child('change-log'))
    : null;
  const notifier = options.notifier
    ?? (config.notifications.enabled ? new DesktopNotifier(logger.child('notify')) : new NullNotifier());

  const daemonStatus = new DaemonStatusStore(paths.daemonStatusFile);
  const pidFile = new PidFile(paths.daemonPidFile);
  const controller = new DaemonController({
    pidFile,
    statusStore: daemonStatus,
    logger: logger.child('daemon-control'),
    spawnDaemon: options.spawnDaemon ?? createDaemonSpawner(options.cliPath ?? DEFAULT_CLI_PATH),
  });

  const createDaemon = (): Daemon => {
    const channel = new BoundedChannel<ChangeEvent>(config.daemon.event_queue_size);
    const watches = new WatchManager({
      sink: (event) => channel.offer(event),
      logger: logger.child('watch-manager'),
      maxWatches: config.daemon.max_watches,
      recursive: config.daemon.recursive,
      source: options.watchSource,
    });
    const trigger = new AutoSaveTrigger({
      saver: saves,
      notifier,
      logger: logger.child('auto-save'),
      autoSave: config.auto_save,
      notifications: config.notifications,
    });
    return new Daemon({
      config,
      tracker,
      watches,
      channel,
      trigger,
      statusStore: daemonStatus,
      logger: logger.child('daemon'),
      changeLog,
      sleep: options.sleep,
    });
  };

  return {
    paths,
    config,
    logger,
    compositor,
    store,
    hooks,
    hookExecutor,
    capturer,
    saves,
    restorer,
    tracker,
    changeLog,
    notifier,
    daemonStatus,
    pidFile,
    controller,
    createDaemon,
  };
}
