/**
 * CLI command: `layout-keeper hooks list [phase]`
 *
 * Lists registered hooks in the order they run.
 *
 * @module cli/commands/hooks
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import type { Runtime } from '../../index.js';
import { HOOK_PHASES } from '../../hooks/types.js';
import type { HookDescriptor, HookPhase } from '../../hooks/types.js';
import { hasFlag, positionals } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper hooks list [phase] [options]

List hooks in run order. Phase is pre-save or post-restore (default: both).

Options:
  --json           Output as JSON
  --help, -h       Show this help message
`;

function isPhase(value: string): value is HookPhase {
  return HOOK_PHASES.some((phase) => phase === value);
}

export async function hooksCommand(args: string[], runtime: Runtime): Promise<number> {
  const [subcommand, phaseArg] = positionals(args);

  if (hasFlag(args, '--help', '-h') || subcommand === undefined) {
    console.log(HELP_TEXT);
    return 0;
  }
  if (subcommand !== 'list') {
    p.log.error(`Unknown hooks command: ${subcommand}`);
    return 1;
  }

  let phases: readonly HookPhase[] = HOOK_PHASES;
  if (phaseArg !== undefined) {
    if (!isPhase(phaseArg)) {
      p.log.error(`Unknown phase "${phaseArg}"; expected ${HOOK_PHASES.join(' or ')}`);
      return 1;
    }
    phases = [phaseArg];
  }

  const listed: HookDescriptor[] = [];
  for (const phase of phases) {
    listed.push(...(await runtime.hooks.list(phase)));
  }

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(listed, null, 2));
    return 0;
  }

  for (const phase of phases) {
    const hooks = listed.filter((h) => h.phase === phase);
    p.log.step(`${phase} (${hooks.length})`);
    if (hooks.length === 0) {
      p.log.message(pc.dim(`  none; add executables to ${runtime.hooks.phaseDir(phase)}`));
    }
    for (const hook of hooks) {
      p.log.message(`  ${hook.position + 1}. ${pc.bold(hook.name)} ${pc.dim(`[${hook.source}] ${hook.path}`)}`);
    }
  }
  return 0;
}
