/**
 * Configuration subsystem: schema, defaults, file loading and paths.
 *
 * @module config
 */

export {
  ConfigSchema,
  DEFAULT_CONFIG,
  HookPhaseSchema,
  UrgencySchema,
} from './schema.js';
export type { Config, HookPhase, HookEntry, Urgency } from './schema.js';

export {
  loadConfig,
  repairConfig,
  validateConfig,
  writeDefaultConfig,
} from './reader.js';
export type { LoadedConfig } from './reader.js';

export { resolveHome, resolvePaths } from './paths.js';
export type { AppPaths } from './paths.js';
