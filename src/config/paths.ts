/**
 * Filesystem layout under the layout-keeper home directory.
 *
 * Home is `$LAYOUT_KEEPER_HOME` when set, otherwise
 * `~/.config/layout-keeper`. Every other path derives from it so tests can
 * point the whole tree at a temp directory.
 *
 * @module config/paths
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export interface AppPaths {
  home: string;
  configFile: string;
  /** Current session snapshot directory. */
  sessionDir: string;
  /** Cross-process save lock. */
  saveLock: string;
  hooksDir: string;
  stateDir: string;
  baselineFile: string;
  daemonPidFile: string;
  daemonStatusFile: string;
  logsDir: string;
  daemonLog: string;
  changeLog: string;
}

export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LAYOUT_KEEPER_HOME;
  if (override && override.trim() !== '') {
    return override;
  }
  return join(homedir(), '.config', 'layout-keeper');
}

export function resolvePaths(home: string = resolveHome()): AppPaths {
  const stateDir = join(home, 'state');
  const logsDir = join(home, 'logs');
  return {
    home,
    configFile: join(home, 'config.json'),
    sessionDir: join(home, 'session'),
    saveLock: join(home, 'session.lock'),
    hooksDir: join(home, 'hooks'),
    stateDir,
    baselineFile: join(stateDir, 'environment-baseline.json'),
    daemonPidFile: join(stateDir, 'daemon.pid'),
    daemonStatusFile: join(stateDir, 'daemon-status.json'),
    logsDir,
    daemonLog: join(logsDir, 'daemon.log'),
    changeLog: join(logsDir, 'changes.jsonl'),
  };
}
