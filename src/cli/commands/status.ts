/**
 * CLI command: `layout-keeper status`
 *
 * Shows the stored snapshot, the registered hooks per phase and the
 * daemon state. Always exits 0 so it is safe to call from status bars.
 *
 * @module cli/commands/status
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import { HOOK_PHASES } from '../../hooks/types.js';
import type { HookPhase } from '../../hooks/types.js';
import type { SnapshotStatus } from '../../session/types.js';
import type { DaemonState } from '../../daemon/control.js';
import { toError } from '../../errors.js';
import { hasFlag } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper status [options]

Show the last saved session, registered hooks and daemon state.

Options:
  --json           Output as JSON
  --help, -h       Show this help message
`;

export interface StatusReport {
  session: SnapshotStatus | null;
  sessionError: string | null;
  hooks: Record<HookPhase, number>;
  daemon: {
    running: boolean;
    pid: number | null;
    stale: boolean;
    lastScanAt: string | null;
    watching: number;
  };
}

async function sessionStatus(runtime: Runtime): Promise<{ session: SnapshotStatus | null; error: string | null }> {
  try {
    return { session: await runtime.store.status(), error: null };
  } catch (err) {
    return { session: null, error: toError(err).message };
  }
}

async function hookCounts(runtime: Runtime): Promise<Record<HookPhase, number>> {
  const counts: Record<HookPhase, number> = { 'pre-save': 0, 'post-restore': 0 };
  for (const phase of HOOK_PHASES) {
    try {
      counts[phase] = (await runtime.hooks.list(phase)).length;
    } catch (err) {
      runtime.logger.warn(`Cannot list ${phase} hooks: ${toError(err).message}`);
    }
  }
  return counts;
}

async function daemonState(runtime: Runtime): Promise<DaemonState> {
  try {
    return await runtime.controller.state();
  } catch (err) {
    runtime.logger.warn(`Cannot read daemon state: ${toError(err).message}`);
    return { running: false, pid: null, stale: false, status: null };
  }
}

export async function collectStatus(runtime: Runtime): Promise<StatusReport> {
  const { session, error } = await sessionStatus(runtime);
  const hooks = await hookCounts(runtime);
  const daemon = await daemonState(runtime);
  const running = daemon.running && daemon.status?.state === 'running';

  return {
    session,
    sessionError: error,
    hooks,
    daemon: {
      running: daemon.running,
      pid: daemon.pid,
      stale: daemon.stale,
      lastScanAt: running ? daemon.status?.lastScanAt ?? null : null,
      watching: running ? daemon.status?.watches.filter((w) => w.state === 'WATCHING').length ?? 0 : 0,
    },
  };
}

function displayStatus(report: StatusReport): void {
  p.intro(pc.bgCyan(pc.black(' layout-keeper ')));

  if (report.session) {
    const s = report.session;
    p.log.info(`Last save: ${s.timestamp} (${s.reason})`);
    p.log.message(
      `  ${s.monitors} monitor(s), ${s.workspaces} workspace(s), ${s.windows} window(s), ${s.applications} application(s)`,
    );
  } else if (report.sessionError) {
    p.log.warn(`Saved session unreadable: ${report.sessionError}`);
  } else {
    p.log.info('No saved session');
  }

  p.log.message(`Hooks: ${report.hooks['pre-save']} pre-save, ${report.hooks['post-restore']} post-restore`);

  const { daemon } = report;
  if (daemon.running) {
    const scan = daemon.lastScanAt ? `, last scan ${daemon.lastScanAt}` : '';
    p.log.success(`Daemon running (PID ${daemon.pid}), ${daemon.watching} watch(es)${scan}`);
  } else {
    p.log.message(pc.dim(daemon.stale ? 'Daemon not running (stale pid file)' : 'Daemon not running'));
  }
  p.outro('');
}

/**
 * @returns always 0
 */
export async function statusCommand(args: string[], runtime: Runtime): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const report = await collectStatus(runtime);
  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    displayStatus(report);
  }
  return 0;
}
