/**
 * Development environment detection and baseline tracking.
 *
 * @module environments
 */

export {
  EnvironmentTypeSchema,
  EnvironmentStatusSchema,
  EnvironmentDescriptorSchema,
  BaselineSchema,
  environmentId,
} from './types.js';
export type {
  EnvironmentType,
  EnvironmentStatus,
  EnvironmentDescriptor,
  Baseline,
  DetectionResult,
  EnvironmentDetector,
} from './types.js';
export {
  CondaDetector,
  VenvDetector,
  PyenvDetector,
  createDetectors,
  runCommand,
  DEFAULT_VENV_DIRS,
} from './detectors.js';
export type { CommandRunner, DetectorDeps } from './detectors.js';
export { BaselineStore } from './baseline-store.js';
export { diffInventories, inventoryIds, sortEnvironments } from './differ.js';
export type { InventoryDiff } from './differ.js';
export { BaselineTracker } from './tracker.js';
export type {
  BaselineTrackerOptions,
  DetectorFailure,
  ScanOptions,
  ScanResult,
} from './tracker.js';
export { checkEnvironments } from './validation.js';
export type { EnvironmentCheck, EnvironmentSource, UnverifiedEnvironments } from './validation.js';
