/**
 * Launch command for a window's owning process.
 *
 * Read from `/proc/<pid>/cmdline` (NUL-separated argv) and rendered as a
 * shell command line. When the process is gone or unreadable the window
 * class, lower-cased, is used instead.
 *
 * @module session/process-command
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

export type CommandResolver = (pid: number, windowClass: string) => Promise<string>;

const SAFE_ARG = /^[\w@%+=:,./-]+$/;

export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function fallbackCommand(windowClass: string): string {
  return windowClass.toLowerCase();
}

export function createCommandResolver(procRoot = '/proc'): CommandResolver {
  return async (pid, windowClass) => {
    if (pid <= 0) return fallbackCommand(windowClass);
    try {
      const raw = await readFile(join(procRoot, String(pid), 'cmdline'), 'utf-8');
      const argv = raw.split('\0').filter((part) => part !== '');
      if (argv.length === 0) return fallbackCommand(windowClass);
      return argv.map(shellQuote).join(' ');
    } catch {
      return fallbackCommand(windowClass);
    }
  };
}
