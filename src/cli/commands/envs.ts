/**
 * CLI command: `layout-keeper envs`
 *
 * Runs every enabled environment detector once and lists what it found,
 * without touching the stored baseline.
 *
 * @module cli/commands/envs
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import { environmentId } from '../../environments/types.js';
import { sortEnvironments } from '../../environments/differ.js';
import { hasFlag } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper envs [options]

List detected development environments.

Options:
  --json           Output as JSON
  --help, -h       Show this help message
`;

export async function envsCommand(args: string[], runtime: Runtime): Promise<number> {
  if (hasFlag(args, '--help', '-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const { detections, failures } = await runtime.tracker.detectAll();
  const environments = sortEnvironments(detections.flatMap((d) => d.environments));

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify({ environments, failures }, null, 2));
    return 0;
  }

  if (environments.length === 0) {
    p.log.info('No environments found');
  }
  for (const env of environments) {
    const active = env.status === 'active' ? pc.green(' (active)') : '';
    p.log.message(`${pc.bold(environmentId(env))}${active} ${pc.dim(env.path)}`);
  }
  for (const failure of failures) {
    const line = `${failure.type}: ${failure.message}`;
    if (failure.missing) {
      p.log.message(pc.dim(`${line} (skipped)`));
    } else {
      p.log.warn(line);
    }
  }
  return 0;
}
