/**
 * The monitoring daemon: watches, trigger, loop and process control.
 *
 * @module daemon
 */

export { BoundedChannel } from './channel.js';
export { planWatchTargets } from './watch-targets.js';
export type { WatchOrigin, WatchTarget, WatchTargetPlan } from './watch-targets.js';
export { WatchManager, fsWatchSource, toChangeEvent } from './watch-manager.js';
export type {
  PathExists,
  RawWatchEvent,
  ReconcileResult,
  WatchManagerOptions,
  WatchSource,
  WatchSourceOptions,
  WatchState,
  WatchStatus,
} from './watch-manager.js';
export { AutoSaveTrigger, shouldAutoSave } from './trigger.js';
export type { AutoSaveTriggerOptions, LastAutoSave, TriggerOutcome } from './trigger.js';
export { DaemonStatusStore, DaemonStatusSchema } from './status-store.js';
export type { DaemonStatus } from './status-store.js';
export { PidFile, isProcessAlive } from './pid-file.js';
export { Daemon } from './daemon.js';
export type { DaemonOptions } from './daemon.js';
export { DaemonController, createDaemonSpawner } from './control.js';
export type {
  DaemonControllerOptions,
  DaemonSpawner,
  DaemonState,
  SignalSender,
  StopResult,
} from './control.js';
