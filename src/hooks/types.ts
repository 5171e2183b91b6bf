/**
 * Hook pipeline types.
 *
 * A hook is an external executable invoked with exactly one argument, the
 * phase name. Exit code 0 is success; anything else, a timeout, or a hook
 * that cannot be started is a failure that never stops the pipeline.
 *
 * @module hooks/types
 */

import type { HookPhase } from '../config/schema.js';
import type { HookFailureError } from '../errors.js';

export type { HookPhase };

export const HOOK_PHASES: readonly HookPhase[] = ['pre-save', 'post-restore'];

export interface HookDescriptor {
  name: string;
  /** Absolute path to the executable. */
  path: string;
  phase: HookPhase;
  /** Zero-based run order within the phase. */
  position: number;
  /** Declared in config, registered in code, or found in the phase directory. */
  source: 'config' | 'registered' | 'directory';
}

export type HookOutcome =
  | 'success'
  | 'failed'
  | 'timeout'
  | 'missing'
  | 'not-executable'
  | 'spawn-error'
  | 'aborted';

export interface HookResult {
  hook: HookDescriptor;
  outcome: HookOutcome;
  /** Process exit code; null when the hook never ran or was killed. */
  exitCode: number | null;
  durationMs: number;
  /** Last lines of stderr, for the log. */
  stderrTail: string;
  error?: HookFailureError;
}

export interface HookSummary {
  phase: HookPhase;
  succeeded: number;
  failed: number;
  total: number;
  results: HookResult[];
}

export interface HookRunOptions {
  timeoutMs: number;
  /** Extra environment variables for the hook process. */
  env: Record<string, string>;
  signal?: AbortSignal;
}

/** Runs one hook; never rejects. */
export interface HookRunner {
  run(hook: HookDescriptor, options: HookRunOptions): Promise<HookResult>;
}

/** Runs every hook of a phase in order; never rejects. */
export interface HookPipeline {
  run(phase: HookPhase, signal?: AbortSignal): Promise<HookSummary>;
}
