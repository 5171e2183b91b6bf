#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { z } from 'zod';
import { cliPaths, hasFlag, withRuntime } from './cli/context.js';
import { saveCommand } from './cli/commands/save.js';
import { restoreCommand } from './cli/commands/restore.js';
import { statusCommand } from './cli/commands/status.js';
import { cleanCommand } from './cli/commands/clean.js';
import { daemonCommand } from './cli/commands/daemon.js';
import { configCommand } from './cli/commands/config.js';
import { hooksCommand } from './cli/commands/hooks.js';
import { changesCommand } from './cli/commands/changes.js';
import { envsCommand } from './cli/commands/envs.js';
import { toError } from './errors.js';

const PackageSchema = z.object({ version: z.string() }).passthrough();

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg = PackageSchema.parse(require('../package.json'));

  console.log(`layout-keeper  v${pkg.version}`);
  console.log(`Node.js        ${process.version}`);
  console.log(`Platform       ${process.platform} ${process.arch}`);
}

function showHelp(): void {
  console.log(`
layout-keeper - Save and restore compositor sessions, auto-save on environment changes

Usage:
  layout-keeper <command> [options]

Commands:
  save              Capture the current session
  restore           Restore the last saved session
  status, st        Show the saved session, hooks and daemon state
  clean             Remove the saved session (--yes to skip confirmation)
  daemon            start | stop | status | restart [--force] | run
  config            show | validate | init
  hooks             list [pre-save|post-restore]
  changes           Show recorded environment changes
  envs              List detected development environments

Options:
  --verbose         Log debug output to stderr
  --version, -V     Show version information
  --help, -h        Show this help message

Files:
  Everything lives under $LAYOUT_KEEPER_HOME (default ~/.config/layout-keeper):
  config.json, session/, hooks/<phase>/, state/ and logs/.
`);
}

/** Abort on the first Ctrl-C so long restores stop cleanly. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  return controller.signal;
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);
  const verbose = hasFlag(args, '--verbose');

  if (command === '--version' || command === '-V') {
    printVersion();
    return 0;
  }
  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    showHelp();
    return 0;
  }

  switch (command) {
    case 'save':
      return withRuntime({ verbose }, (runtime) => saveCommand(rest, runtime));

    case 'restore':
      return withRuntime({ verbose }, (runtime) => restoreCommand(rest, runtime, { signal: interruptSignal() }));

    case 'status':
    case 'st':
      try {
        return await withRuntime({ verbose }, (runtime) => statusCommand(rest, runtime));
      } catch (err) {
        p.log.warn(`Status unavailable: ${toError(err).message}`);
        return 0;
      }

    case 'clean':
      return withRuntime({ verbose }, (runtime) => cleanCommand(rest, runtime));

    case 'daemon': {
      const daemon = rest.includes('run');
      return withRuntime({ verbose, daemon, overrides: { cliPath: process.argv[1] } }, (runtime) =>
        daemonCommand(rest, runtime),
      );
    }

    case 'config':
      return configCommand(rest, cliPaths());

    case 'hooks':
      return withRuntime({ verbose }, (runtime) => hooksCommand(rest, runtime));

    case 'changes':
      return withRuntime({ verbose }, (runtime) => changesCommand(rest, runtime));

    case 'envs':
      return withRuntime({ verbose }, (runtime) => envsCommand(rest, runtime));

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      return 1;
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    p.log.error(toError(err).message);
    process.exit(1);
  },
);
