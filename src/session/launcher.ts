/**
 * Application relaunch through the compositor's `exec` dispatcher, so the
 * new process lands on its recorded workspace without stealing focus.
 *
 * @module session/launcher
 */

import { access } from 'node:fs/promises';
import { constants } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { CompositorClient } from '../compositor/client.js';
import type { Logger } from '../logging/logger.js';
import type { Application } from './types.js';
import { DependencyMissingError } from '../errors.js';

/** Resolves whether an executable can be found. */
export type CommandLocator = (executable: string) => Promise<boolean>;

export type LaunchResult =
  | { status: 'launched'; app: Application }
  | { status: 'skipped'; app: Application; error: DependencyMissingError }
  | { status: 'failed'; app: Application; error: Error };

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/** Split a command line into words, honouring quotes and backslash escapes. */
function splitWords(command: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: string | null = null;
  let escaped = false;

  for (const ch of command) {
    if (escaped) {
      current += ch;
      escaped = false;
    } else if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
    } else if (ch === '\\') {
      escaped = true;
      inWord = true;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }
  if (inWord) words.push(current);
  return words;
}

/**
 * Executable named by a shell command line: the first word that is not a
 * `NAME=value` environment assignment.
 */
export function executableOf(command: string): string {
  return splitWords(command).find((w) => !ENV_ASSIGNMENT.test(w)) ?? '';
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function createPathLocator(env: NodeJS.ProcessEnv = process.env): CommandLocator {
  return async (executable) => {
    if (executable === '') return false;
    if (executable.includes('/')) return isExecutable(executable);

    const dirs = (env.PATH ?? '').split(delimiter).filter((d) => d !== '');
    for (const dir of dirs) {
      if (await isExecutable(join(dir, executable))) return true;
    }
    return false;
  };
}

export class AppLauncher {
  constructor(
    private readonly compositor: CompositorClient,
    private readonly locate: CommandLocator,
    private readonly logger: Logger,
  ) {}

  async launch(app: Application): Promise<LaunchResult> {
    const executable = executableOf(app.command);
    if (!(await this.locate(executable))) {
      const error = new DependencyMissingError(
        executable,
        `Cannot relaunch ${app.class}: "${executable}" is not on PATH`,
      );
      this.logger.warn(error.message);
      return { status: 'skipped', app, error };
    }

    const result = await this.compositor.dispatch({
      type: 'exec',
      command: app.command,
      workspace: app.workspaceId > 0 ? app.workspaceId : undefined,
    });
    if (!result.ok) {
      this.logger.warn(`Launching ${app.class} failed: ${result.error.message}`);
      return { status: 'failed', app, error: result.error };
    }

    this.logger.info(`Launched ${app.class} on workspace ${app.workspaceId}`);
    return { status: 'launched', app };
  }
}
