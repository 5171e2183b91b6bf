/**
 * Hook pipeline: registry, process runner and fail-isolated executor.
 *
 * @module hooks
 */

export { HOOK_PHASES } from './types.js';
export type {
  HookDescriptor,
  HookOutcome,
  HookPhase,
  HookPipeline,
  HookResult,
  HookRunOptions,
  HookRunner,
  HookSummary,
} from './types.js';
export { HookRegistry } from './registry.js';
export { ProcessHookRunner } from './runner.js';
export { HookExecutor, formatSummary } from './executor.js';
export type { HookExecutorOptions } from './executor.js';
