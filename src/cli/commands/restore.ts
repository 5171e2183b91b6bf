/**
 * CLI command: `layout-keeper restore`
 *
 * Replays the stored snapshot: waits for the compositor, recreates
 * workspaces, relaunches applications, places windows and runs the
 * post-restore hooks. Missing windows are a warning, not a failure.
 *
 * Exit codes:
 * - 0: restore ran to completion (possibly with warnings)
 * - 1: no snapshot, compositor never became ready, or interrupted
 *
 * @module cli/commands/restore
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import type { RestoreReport } from '../../session/restorer.js';
import { formatSummary } from '../../hooks/executor.js';
import { isAbortError, toError } from '../../errors.js';
import { hasFlag } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper restore [options]

Restore the last saved session.

Options:
  --json           Output the restore report as JSON
  --help, -h       Show this help message
`;

export interface RestoreCommandOptions {
  signal?: AbortSignal;
}

export function restoreReportJson(report: RestoreReport): Record<string, unknown> {
  return {
    restored: true,
    snapshotTimestamp: report.snapshotTimestamp,
    environmentsMissing: report.environments?.missing ?? [],
    workspacesCreated: report.workspacesCreated,
    launched: report.launches.filter((l) => l.status === 'launched').map((l) => l.app.class),
    skipped: report.launches.filter((l) => l.status === 'skipped').map((l) => l.app.class),
    failed: report.launches.filter((l) => l.status === 'failed').map((l) => l.app.class),
    alreadyRunning: report.alreadyRunning,
    windowsExpected: report.windowsExpected,
    windowsPresent: report.windowsPresent,
    windowsPlaced: report.windowsPlaced,
    hooks: { succeeded: report.hooks.succeeded, failed: report.hooks.failed, total: report.hooks.total },
    warnings: report.warnings,
    mismatch: report.mismatch !== null,
  };
}

function displayReport(report: RestoreReport): void {
  p.intro(pc.bgCyan(pc.black(' Session Restore ')));
  p.log.message(`Snapshot: ${report.snapshotTimestamp}`);

  const missing = report.environments?.missing ?? [];
  if (missing.length > 0) {
    p.log.warn(`Missing environments: ${missing.join(', ')}`);
  }

  if (report.workspacesCreated.length > 0) {
    p.log.message(`Workspaces created: ${report.workspacesCreated.join(', ')}`);
  }
  for (const launch of report.launches) {
    const mark = launch.status === 'launched' ? pc.green('+') : pc.red('x');
    p.log.message(`  ${mark} ${launch.app.class} (${launch.status})`);
  }
  if (report.alreadyRunning.length > 0) {
    p.log.message(pc.dim(`Already running: ${report.alreadyRunning.join(', ')}`));
  }
  if (report.hooks.total > 0) {
    p.log.message(`Post-restore hooks: ${formatSummary(report.hooks)}`);
  }

  const windows = `${report.windowsPresent}/${report.windowsExpected} windows present`;
  if (report.mismatch) {
    p.log.warn(`Restored with warnings: ${windows}`);
  } else {
    p.log.success(`Session restored: ${windows}`);
  }
  p.outro(report.warnings.length > 0 ? pc.yellow(`${report.warnings.length} warning(s)`) : pc.green('Done'));
}

export async function restoreCommand(
  args: string[],
  runtime: Runtime,
  options: RestoreCommandOptions = {},
): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const jsonMode = hasFlag(args, '--json');

  try {
    const report = await runtime.restorer.restore(options.signal);
    if (jsonMode) {
      console.log(JSON.stringify(restoreReportJson(report), null, 2));
    } else {
      displayReport(report);
    }
    return 0;
  } catch (err) {
    const message = isAbortError(err) ? 'Restore interrupted' : toError(err).message;
    if (jsonMode) {
      console.log(JSON.stringify({ restored: false, error: message }, null, 2));
    } else {
      p.log.error(message);
    }
    return 1;
  }
}
