/**
 * CLI command: `layout-keeper daemon <start|stop|status|restart|run>`
 *
 * `start`, `stop` and `restart` manage a detached background process
 * through the pid file; `run` is that process. `status` combines the pid
 * file with the status document the running daemon rewrites every cycle.
 *
 * Exit codes:
 * - 0: success (`status` always)
 * - 1: the daemon could not be started or is already running
 *
 * @module cli/commands/daemon
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import type { DaemonState } from '../../daemon/control.js';
import { isProcessAlive } from '../../daemon/pid-file.js';
import { toError } from '../../errors.js';
import { hasFlag, positionals } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper daemon <command> [options]

Commands:
  start            Start the background daemon
  stop             Stop the background daemon
  status           Show daemon state, watches and last auto-save
  restart          Stop, then start the daemon
  run              Run the daemon in the foreground

Options:
  --force          start: stop a running daemon first
  --json           status: output as JSON
  --help, -h       Show this help message
`;

export interface DaemonCommandOptions {
  /** Stops `daemon run` in addition to SIGTERM/SIGINT. */
  signal?: AbortSignal;
}

export async function daemonCommand(
  args: string[],
  runtime: Runtime,
  options: DaemonCommandOptions = {},
): Promise<number> {
  const [subcommand] = positionals(args);

  if (hasFlag(args, '--help', '-h') || subcommand === undefined) {
    console.log(HELP_TEXT);
    return 0;
  }

  switch (subcommand) {
    case 'start':
      return start(runtime, hasFlag(args, '--force'));
    case 'stop':
      return stop(runtime);
    case 'restart':
      return restart(runtime);
    case 'status':
      return status(runtime, hasFlag(args, '--json'));
    case 'run':
      return run(runtime, options.signal);
    default:
      p.log.error(`Unknown daemon command: ${subcommand}`);
      console.log(HELP_TEXT);
      return 1;
  }
}

// ============================================================================
// Control
// ============================================================================

async function start(runtime: Runtime, force: boolean): Promise<number> {
  try {
    const pid = await runtime.controller.start({ force });
    p.log.success(`Daemon started (PID ${pid})`);
    return 0;
  } catch (err) {
    p.log.error(toError(err).message);
    return 1;
  }
}

async function stop(runtime: Runtime): Promise<number> {
  const result = await runtime.controller.stop();
  if (!result.wasRunning) {
    p.log.info('Daemon is not running');
    return 0;
  }
  const how = result.forced ? ' (killed after grace period)' : '';
  p.log.success(`Daemon stopped (PID ${result.pid})${how}`);
  return 0;
}

async function restart(runtime: Runtime): Promise<number> {
  try {
    const pid = await runtime.controller.restart();
    p.log.success(`Daemon restarted (PID ${pid})`);
    return 0;
  } catch (err) {
    p.log.error(toError(err).message);
    return 1;
  }
}

// ============================================================================
// Status
// ============================================================================

function displayState(state: DaemonState): void {
  p.intro(pc.bgCyan(pc.black(' Daemon ')));

  if (!state.running) {
    p.log.info(state.stale ? 'Not running (removed process left a stale pid file)' : 'Not running');
  } else {
    p.log.success(`Running (PID ${state.pid})`);
  }

  const status = state.status;
  if (status && state.running) {
    p.log.message(`Started ${status.startedAt}, ${status.cycles} cycle(s), ${status.environments} environment(s)`);
    if (status.lastScanAt) p.log.message(`Last scan: ${status.lastScanAt}`);

    for (const watch of status.watches) {
      const mark = watch.state === 'WATCHING' ? pc.green('*') : pc.yellow('-');
      const restarts = watch.restarts > 0 ? pc.dim(` restarted ${watch.restarts}x`) : '';
      p.log.message(`  ${mark} ${watch.directory} ${pc.dim(`(${watch.origin}, ${watch.state})`)}${restarts}`);
    }
    for (const dir of status.skipped) {
      p.log.message(`  ${pc.yellow('!')} ${dir} ${pc.dim('(skipped: watch limit)')}`);
    }
    for (const dir of status.missing) {
      p.log.message(`  ${pc.yellow('!')} ${dir} ${pc.dim('(missing)')}`);
    }
    if (status.droppedEvents > 0) {
      p.log.warn(`${status.droppedEvents} event(s) dropped while the queue was full`);
    }
  }

  const last = status?.lastAutoSave;
  if (last) {
    const line = `Last auto-save: ${last.at} after ${last.changeType}: ${last.details}`;
    if (last.outcome === 'saved') {
      p.log.message(line);
    } else {
      p.log.warn(`${line} failed${last.error ? `: ${last.error}` : ''}`);
    }
  }
  p.outro('');
}

async function status(runtime: Runtime, jsonMode: boolean): Promise<number> {
  let state: DaemonState;
  try {
    state = await runtime.controller.state();
  } catch (err) {
    runtime.logger.warn(`Cannot read daemon state: ${toError(err).message}`);
    state = { running: false, pid: null, stale: false, status: null };
  }

  if (jsonMode) {
    console.log(JSON.stringify(state, null, 2));
  } else {
    displayState(state);
  }
  return 0;
}

// ============================================================================
// Foreground process
// ============================================================================

async function run(runtime: Runtime, external?: AbortSignal): Promise<number> {
  const { pidFile } = runtime;
  const holder = await pidFile.read();
  if (holder !== null && holder !== process.pid && isProcessAlive(holder)) {
    p.log.error(`Daemon already running (PID ${holder})`);
    return 1;
  }
  await pidFile.write(process.pid);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    runtime.logger.info(`Received ${signal}; shutting down`);
    controller.abort();
  };
  const onExternalAbort = (): void => controller.abort();
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
  if (external?.aborted) controller.abort();
  external?.addEventListener('abort', onExternalAbort, { once: true });

  try {
    await runtime.createDaemon().run(controller.signal);
    return 0;
  } finally {
    process.off('SIGTERM', onSignal);
    process.off('SIGINT', onSignal);
    external?.removeEventListener('abort', onExternalAbort);
    await pidFile.release(process.pid);
  }
}
