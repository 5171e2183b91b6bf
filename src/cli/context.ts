/**
 * Builds the runtime a CLI command works against: home directory, config
 * (with its fallback warnings) and logger.
 *
 * @module cli/context
 */

import { resolveHome, resolvePaths } from '../config/paths.js';
import type { AppPaths } from '../config/paths.js';
import { loadConfig } from '../config/reader.js';
import { createLogger } from '../logging/logger.js';
import type { LogLevel, RootLogger } from '../logging/logger.js';
import { createRuntime } from '../index.js';
import type { Runtime, RuntimeOptions } from '../index.js';

export interface CliRuntimeOptions {
  /** The long-running daemon logs at the configured level and to its log file. */
  daemon?: boolean;
  /** Interactive commands log warnings only unless verbose. */
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
  overrides?: Omit<RuntimeOptions, 'paths' | 'config' | 'logger'>;
}

export interface CliRuntime {
  runtime: Runtime;
  logger: RootLogger;
}

export function cliPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
  return resolvePaths(resolveHome(env));
}

export async function loadCliRuntime(options: CliRuntimeOptions = {}): Promise<CliRuntime> {
  const env = options.env ?? process.env;
  const paths = cliPaths(env);
  const { config, errors } = await loadConfig(paths.configFile);

  let level: LogLevel = config.logging.level;
  if (!options.daemon) {
    level = options.verbose ? 'debug' : 'warn';
  }
  const logger = createLogger({
    tag: options.daemon ? 'daemon' : 'layout-keeper',
    level,
    filePath: options.daemon && config.logging.file ? paths.daemonLog : undefined,
  });

  for (const error of errors) {
    logger.warn(`Config: ${error.message}`);
  }

  const runtime = createRuntime({ ...options.overrides, paths, config, logger, env });
  return { runtime, logger };
}

/** Run `fn` against a fresh runtime, flushing the log file afterwards. */
export async function withRuntime(
  options: CliRuntimeOptions,
  fn: (runtime: Runtime) => Promise<number>,
): Promise<number> {
  const { runtime, logger } = await loadCliRuntime(options);
  try {
    return await fn(runtime);
  } finally {
    await logger.flush();
  }
}

/** True when any of the given flags is present. */
export function hasFlag(args: readonly string[], ...flags: string[]): boolean {
  return flags.some((flag) => args.includes(flag));
}

/** Value of a `--name=value` option. */
export function optionValue(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

/** Arguments that are not flags. */
export function positionals(args: readonly string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}
