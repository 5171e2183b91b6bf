/**
 * CLI command: `layout-keeper config <show|validate|init>`
 *
 * - `show` prints the effective configuration, after defaults and
 *   per-field fallbacks, and lists every setting that fell back.
 * - `validate` checks the file strictly, without fallback.
 * - `init` writes the defaults when no config file exists.
 *
 * Exit codes:
 * - 0: ok
 * - 1: `validate` found errors, or the file could not be read
 *
 * @module cli/commands/config
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readFile } from 'node:fs/promises';
import type { AppPaths } from '../../config/paths.js';
import { loadConfig, validateConfig, writeDefaultConfig } from '../../config/reader.js';
import { errnoCode, toError } from '../../errors.js';
import { hasFlag, positionals } from '../context.js';

const HELP_TEXT = `
Usage: layout-keeper config <command> [options]

Commands:
  show             Print the effective configuration
  validate         Check the config file without falling back to defaults
  init             Write a config file with every default

Options:
  --json           validate: output the result as JSON
  --help, -h       Show this help message
`;

export async function configCommand(args: string[], paths: AppPaths): Promise<number> {
  const [subcommand] = positionals(args);

  if (hasFlag(args, '--help', '-h') || subcommand === undefined) {
    console.log(HELP_TEXT);
    return 0;
  }

  switch (subcommand) {
    case 'show':
      return show(paths);
    case 'validate':
      return validate(paths, hasFlag(args, '--json'));
    case 'init':
      return init(paths);
    default:
      p.log.error(`Unknown config command: ${subcommand}`);
      console.log(HELP_TEXT);
      return 1;
  }
}

async function show(paths: AppPaths): Promise<number> {
  try {
    const { config, errors, fromFile } = await loadConfig(paths.configFile);
    for (const error of errors) {
      p.log.warn(error.message);
    }
    if (!fromFile) {
      p.log.info(`No config file at ${paths.configFile}; showing defaults`);
    }
    console.log(JSON.stringify(config, null, 2));
    return 0;
  } catch (err) {
    p.log.error(`Could not read config: ${toError(err).message}`);
    return 1;
  }
}

interface ValidationOutput {
  valid: boolean;
  errors: string[];
  message?: string;
}

function report(output: ValidationOutput, jsonMode: boolean, configPath: string): void {
  if (jsonMode) {
    console.log(JSON.stringify(output, null, 2));
    return;
  }
  if (output.message && output.valid) {
    p.log.info(output.message);
  } else if (output.message) {
    p.log.error(output.message);
  }
  if (output.errors.length > 0) {
    p.log.error(`Errors (${output.errors.length}) in ${configPath}:`);
    for (const error of output.errors) {
      p.log.message(`  ${pc.red('x')} ${error}`);
    }
  } else if (output.valid && !output.message) {
    p.log.success(`${configPath} is valid`);
  }
}

async function validate(paths: AppPaths, jsonMode: boolean): Promise<number> {
  const configPath = paths.configFile;

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      report({ valid: true, errors: [], message: `No config file at ${configPath}. Using defaults.` }, jsonMode, configPath);
      return 0;
    }
    report({ valid: false, errors: [], message: `Could not read config: ${toError(err).message}` }, jsonMode, configPath);
    return 1;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    report({ valid: false, errors: [], message: 'Invalid JSON in config file' }, jsonMode, configPath);
    return 1;
  }

  const result = validateConfig(raw);
  if (result.valid) {
    report({ valid: true, errors: [] }, jsonMode, configPath);
    return 0;
  }
  report({ valid: false, errors: result.errors }, jsonMode, configPath);
  return 1;
}

async function init(paths: AppPaths): Promise<number> {
  try {
    if (await writeDefaultConfig(paths.configFile)) {
      p.log.success(`Wrote default config to ${paths.configFile}`);
    } else {
      p.log.info(`Config already exists at ${paths.configFile}; left unchanged`);
    }
    return 0;
  } catch (err) {
    p.log.error(`Could not write config: ${toError(err).message}`);
    return 1;
  }
}
