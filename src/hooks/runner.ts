/**
 * Spawns one hook executable with the phase name as its only argument.
 *
 * A hook is done when its own process exits. Applications it starts in the
 * background keep running and may hold the stderr pipe open, so the pipe is
 * drained briefly and then dropped. The hook runs in its own process group:
 * a hook that is still running at its timeout gets SIGTERM for the group,
 * then SIGKILL after a short grace.
 *
 * @module hooks/runner
 */

import { spawn } from 'node:child_process';
import { access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import type { HookDescriptor, HookOutcome, HookResult, HookRunOptions, HookRunner } from './types.js';
import { HookFailureError, errnoCode } from '../errors.js';

const KILL_GRACE_MS = 2000;
const STDERR_DRAIN_MS = 100;
const STDERR_TAIL_LINES = 5;

function tail(text: string): string {
  return text.trimEnd().split('\n').slice(-STDERR_TAIL_LINES).join('\n');
}

function describeFailure(hook: HookDescriptor, outcome: HookOutcome, exitCode: number | null, timeoutMs: number): string {
  switch (outcome) {
    case 'missing':
      return `Hook "${hook.name}" not found at ${hook.path}`;
    case 'not-executable':
      return `Hook "${hook.name}" is not executable: ${hook.path}`;
    case 'timeout':
      return `Hook "${hook.name}" timed out after ${timeoutMs}ms`;
    case 'aborted':
      return `Hook "${hook.name}" cancelled`;
    case 'spawn-error':
      return `Hook "${hook.name}" could not be started`;
    default:
      return `Hook "${hook.name}" exited with code ${exitCode ?? 'unknown'}`;
  }
}

function result(
  hook: HookDescriptor,
  outcome: HookOutcome,
  exitCode: number | null,
  startTime: number,
  stderr: string,
  timeoutMs: number,
): HookResult {
  const base: HookResult = {
    hook,
    outcome,
    exitCode,
    durationMs: Date.now() - startTime,
    stderrTail: tail(stderr),
  };
  if (outcome === 'success') return base;
  return { ...base, error: new HookFailureError(hook.name, describeFailure(hook, outcome, exitCode, timeoutMs)) };
}

/** Classify why a hook cannot be run, or null when it can. */
async function checkRunnable(path: string): Promise<'missing' | 'not-executable' | null> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return 'not-executable';
    await access(path, constants.X_OK);
    return null;
  } catch (err) {
    return errnoCode(err) === 'ENOENT' ? 'missing' : 'not-executable';
  }
}

export class ProcessHookRunner implements HookRunner {
  async run(hook: HookDescriptor, options: HookRunOptions): Promise<HookResult> {
    const startTime = Date.now();
    const { timeoutMs, signal } = options;

    if (signal?.aborted) {
      return result(hook, 'aborted', null, startTime, '', timeoutMs);
    }

    const problem = await checkRunnable(hook.path);
    if (problem) {
      return result(hook, problem, null, startTime, '', timeoutMs);
    }

    return new Promise<HookResult>((resolve) => {
      const child = spawn(hook.path, [hook.phase], {
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'ignore', 'pipe'],
        detached: true,
      });

      let stderr = '';
      let stopReason: 'timeout' | 'aborted' | null = null;
      let exited = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;
      let drainTimer: NodeJS.Timeout | undefined;

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      const terminate = (reason: 'timeout' | 'aborted'): void => {
        if (stopReason || exited) return;
        stopReason = reason;
        signalGroup(child.pid, 'SIGTERM');
        killTimer = setTimeout(() => {
          if (!exited) signalGroup(child.pid, 'SIGKILL');
        }, KILL_GRACE_MS);
      };

      const timer = setTimeout(() => terminate('timeout'), timeoutMs);
      const onAbort = (): void => terminate('aborted');
      signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (outcome: HookOutcome, code: number | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        clearTimeout(drainTimer);
        signal?.removeEventListener('abort', onAbort);
        child.stderr.destroy();
        resolve(result(hook, outcome, code, startTime, stderr, timeoutMs));
      };

      child.on('exit', (code: number | null) => {
        exited = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        const outcome: HookOutcome = stopReason ?? (code === 0 ? 'success' : 'failed');
        // Background children may keep the pipe open; take what has arrived.
        if (child.stderr.closed) {
          finish(outcome, code);
          return;
        }
        drainTimer = setTimeout(() => finish(outcome, code), STDERR_DRAIN_MS);
        child.stderr.once('close', () => finish(outcome, code));
      });

      child.on('error', (err: Error) => {
        stderr += err.message;
        finish('spawn-error', null);
      });
    });
  }
}

/** Signal the hook's process group, falling back to the process itself. */
function signalGroup(pid: number | undefined, sig: NodeJS.Signals): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, sig);
  } catch {
    try {
      process.kill(pid, sig);
    } catch {
      // already exited
    }
  }
}
