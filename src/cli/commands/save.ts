/**
 * CLI command: `layout-keeper save`
 *
 * Captures the live compositor session into the snapshot store, then runs
 * the pre-save hooks. Manual saves share the single-flight path with the
 * daemon's automatic saves.
 *
 * Exit codes:
 * - 0: snapshot written (hook failures are reported, not fatal)
 * - 1: capture failed or another save held the lock too long
 *
 * @module cli/commands/save
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import { formatSummary } from '../../hooks/executor.js';
import { toError } from '../../errors.js';
import { hasFlag, optionValue } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper save [options]

Capture the current window layout and running applications.

Options:
  --reason=<text>  Reason recorded in the snapshot (default: manual)
  --json           Output the result as JSON
  --help, -h       Show this help message
`;

export async function saveCommand(args: string[], runtime: Runtime): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const jsonMode = hasFlag(args, '--json');
  const reason = optionValue(args, 'reason') ?? 'manual';

  try {
    const { snapshot, hooks } = await runtime.saves.save(reason);

    if (jsonMode) {
      console.log(JSON.stringify({
        saved: true,
        timestamp: snapshot.timestamp,
        reason: snapshot.reason,
        monitors: snapshot.monitors.length,
        workspaces: snapshot.workspaces.length,
        windows: snapshot.windows.length,
        applications: snapshot.applications.length,
        hooks: { succeeded: hooks.succeeded, failed: hooks.failed, total: hooks.total },
      }, null, 2));
      return 0;
    }

    p.log.success(
      `Session saved: ${snapshot.windows.length} window(s) on ${snapshot.workspaces.length} workspace(s), ` +
        `${snapshot.applications.length} application(s)`,
    );
    if (hooks.total > 0) {
      const line = `Pre-save hooks: ${formatSummary(hooks)}`;
      if (hooks.failed > 0) {
        p.log.warn(line);
        for (const result of hooks.results) {
          if (result.outcome !== 'success') {
            p.log.message(`  ${pc.red('x')} ${result.hook.name}: ${result.outcome}`);
          }
        }
      } else {
        p.log.info(line);
      }
    }
    return 0;
  } catch (err) {
    const message = toError(err).message;
    if (jsonMode) {
      console.log(JSON.stringify({ saved: false, error: message }, null, 2));
    } else {
      p.log.error(message);
    }
    return 1;
  }
}
