/**
 * CLI command: `layout-keeper clean`
 *
 * Deletes the stored snapshot and all hook-owned application data after
 * a confirmation prompt (skipped with `--yes`).
 *
 * @module cli/commands/clean
 */

import * as p from '@clack/prompts';
import type { Runtime } from '../../index.js';
import { hasFlag } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper clean [options]

Remove the saved session and its application data.

Options:
  --yes, -y        Do not ask for confirmation
  --help, -h       Show this help message
`;

export async function cleanCommand(args: string[], runtime: Runtime): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (!(await runtime.store.exists())) {
    p.log.info('No saved session to remove');
    return 0;
  }

  if (!hasFlag(args, '--yes', '-y')) {
    const confirmed = await p.confirm({
      message: `Remove the saved session in ${runtime.store.directory}?`,
      initialValue: false,
    });
    if (p.isCancel(confirmed) || !confirmed) {
      p.cancel('Nothing removed');
      return 0;
    }
  }

  await runtime.store.clear();
  p.log.success('Saved session removed');
  return 0;
}
