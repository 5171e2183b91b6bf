/**
 * Session snapshot capture, storage and restore.
 *
 * @module session
 */

export {
  ApplicationSchema,
  SessionSnapshotSchema,
  SnapshotManifestSchema,
  SNAPSHOT_VERSION,
} from './types.js';
export type {
  Application,
  SaveResult,
  SessionSnapshot,
  SnapshotManifest,
  SnapshotStatus,
} from './types.js';
export { SnapshotStore, appDirName } from './snapshot-store.js';
export { SaveLock } from './save-lock.js';
export type { AcquireOptions, LockAcquireResult, LockInfo } from './save-lock.js';
export { createCommandResolver, shellQuote, fallbackCommand } from './process-command.js';
export type { CommandResolver } from './process-command.js';
export { SessionCapturer } from './capturer.js';
export type { SessionCapturerOptions } from './capturer.js';
export { SaveCoordinator } from './save-coordinator.js';
export type { SaveCoordinatorOptions, SnapshotSaver } from './save-coordinator.js';
export { AppLauncher, createPathLocator, executableOf } from './launcher.js';
export type { CommandLocator, LaunchResult } from './launcher.js';
export { retry, sleep } from './retry.js';
export type { RetryOptions, Sleep } from './retry.js';
export { SessionRestorer, matchWindows } from './restorer.js';
export type { RestoreReport, RestoreSettings, SessionRestorerOptions } from './restorer.js';
