/**
 * CLI command: `layout-keeper changes`
 *
 * Prints recent entries of the change log, newest last.
 *
 * @module cli/commands/changes
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import { ChangeTypeSchema } from '../../changes/types.js';
import type { ChangeLogQuery } from '../../changes/change-log.js';
import { hasFlag, optionValue } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper changes [options]

Show classified changes recorded by the daemon.

Options:
  --since=<iso>    Only changes at or after this time
  --type=<type>    Only one change type (e.g. environment_created)
  --limit=<n>      Newest n entries (default: 20)
  --json           Output as JSON
  --help, -h       Show this help message
`;

const DEFAULT_LIMIT = 20;

export async function changesCommand(args: string[], runtime: Runtime): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (!runtime.changeLog) {
    p.log.info('Change log is disabled (logging.change_log)');
    return 0;
  }

  const query: ChangeLogQuery = { limit: DEFAULT_LIMIT };

  const since = optionValue(args, 'since');
  if (since !== undefined) {
    if (Number.isNaN(Date.parse(since))) {
      p.log.error(`Invalid --since time: ${since}`);
      return 1;
    }
    query.since = new Date(since).toISOString();
  }

  const type = optionValue(args, 'type');
  if (type !== undefined) {
    const parsed = ChangeTypeSchema.safeParse(type);
    if (!parsed.success) {
      p.log.error(`Unknown change type: ${type}`);
      return 1;
    }
    query.changeType = parsed.data;
  }

  const limit = optionValue(args, 'limit');
  if (limit !== undefined) {
    const n = Number.parseInt(limit, 10);
    if (!Number.isInteger(n) || n < 1) {
      p.log.error(`Invalid --limit: ${limit}`);
      return 1;
    }
    query.limit = n;
  }

  const entries = await runtime.changeLog.entries(query);

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(entries, null, 2));
    return 0;
  }

  if (entries.length === 0) {
    p.log.info('No changes recorded');
    return 0;
  }
  for (const entry of entries) {
    p.log.message(
      `${pc.dim(entry.time)} ${pc.cyan(entry.changeType)} ${entry.path} ${pc.dim(`(impact ${entry.score}, ${entry.source})`)}`,
    );
  }
  return 0;
}
