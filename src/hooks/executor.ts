/**
 * Fail-isolated hook pipeline.
 *
 * Every hook of a phase runs in registry order. A hook that is missing,
 * not executable, exits non-zero or times out is logged and counted as
 * failed; the next hook runs regardless. `run` never rejects.
 *
 * @module hooks/executor
 */

import type { HookRegistry } from './registry.js';
import { ProcessHookRunner } from './runner.js';
import type {
  HookDescriptor,
  HookPhase,
  HookPipeline,
  HookResult,
  HookRunner,
  HookSummary,
} from './types.js';
import type { Logger } from '../logging/logger.js';
import { HookFailureError, toError } from '../errors.js';

export interface HookExecutorOptions {
  registry: HookRegistry;
  logger: Logger;
  timeoutMs: number;
  /** Passed to every hook process. */
  env?: Record<string, string>;
  runner?: HookRunner;
}

export function formatSummary(summary: HookSummary): string {
  return `${summary.succeeded}/${summary.total} succeeded`;
}

function abortedResult(hook: HookDescriptor): HookResult {
  return {
    hook,
    outcome: 'aborted',
    exitCode: null,
    durationMs: 0,
    stderrTail: '',
    error: new HookFailureError(hook.name, `Hook "${hook.name}" cancelled`),
  };
}

export class HookExecutor implements HookPipeline {
  private readonly registry: HookRegistry;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly env: Record<string, string>;
  private readonly runner: HookRunner;

  constructor(options: HookExecutorOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
    this.env = options.env ?? {};
    this.runner = options.runner ?? new ProcessHookRunner();
  }

  async run(phase: HookPhase, signal?: AbortSignal): Promise<HookSummary> {
    let hooks: HookDescriptor[];
    try {
      hooks = await this.registry.list(phase);
    } catch (err) {
      this.logger.error(`Cannot list ${phase} hooks: ${toError(err).message}`);
      hooks = [];
    }

    const results: HookResult[] = [];
    for (const hook of hooks) {
      const outcome = signal?.aborted
        ? abortedResult(hook)
        : await this.runner.run(hook, { timeoutMs: this.timeoutMs, env: this.env, signal });
      results.push(outcome);
      this.report(outcome);
    }

    const succeeded = results.filter((r) => r.outcome === 'success').length;
    const summary: HookSummary = {
      phase,
      succeeded,
      failed: results.length - succeeded,
      total: results.length,
      results,
    };

    if (summary.total > 0) {
      const line = `${phase} hooks: ${formatSummary(summary)}`;
      if (summary.failed > 0) {
        this.logger.warn(line);
      } else {
        this.logger.info(line);
      }
    }
    return summary;
  }

  private report(result: HookResult): void {
    if (result.outcome === 'success') {
      this.logger.debug(`${result.hook.name} ok (${result.durationMs}ms)`);
      return;
    }
    const message = result.error?.message ?? `Hook "${result.hook.name}" failed`;
    this.logger.warn(result.stderrTail ? `${message}: ${result.stderrTail}` : message);
  }
}
