/**
 * Starting, stopping and inspecting the background daemon from the CLI.
 *
 * `start` spawns a detached `daemon run` child and records its pid;
 * `stop` sends SIGTERM, waits out a grace period and then SIGKILLs.
 *
 * @module daemon/control
 */

import { spawn } from 'node:child_process';
import type { Logger } from '../logging/logger.js';
import type { Sleep } from '../session/retry.js';
import { sleep as defaultSleep } from '../session/retry.js';
import { isProcessAlive } from './pid-file.js';
import type { PidFile } from './pid-file.js';
import type { DaemonStatus, DaemonStatusStore } from './status-store.js';
import { DaemonControlError, errnoCode } from '../errors.js';

/** Spawns the detached daemon and resolves with its pid. */
export type DaemonSpawner = () => Promise<number>;

export type SignalSender = (pid: number, signal: NodeJS.Signals) => void;

export interface DaemonState {
  running: boolean;
  pid: number | null;
  /** A pid file was found whose process is gone. */
  stale: boolean;
  status: DaemonStatus | null;
}

export interface StopResult {
  wasRunning: boolean;
  pid: number | null;
  forced: boolean;
}

export interface DaemonControllerOptions {
  pidFile: PidFile;
  statusStore: DaemonStatusStore;
  logger: Logger;
  spawnDaemon: DaemonSpawner;
  isAlive?: (pid: number) => boolean;
  sendSignal?: SignalSender;
  sleep?: Sleep;
  graceMs?: number;
  pollMs?: number;
}

const DEFAULT_GRACE_MS = 10_000;
const DEFAULT_POLL_MS = 100;

/**
 * Spawner that re-runs this CLI as `daemon run`, detached from the
 * terminal with its output discarded (the daemon logs to its own file).
 */
export function createDaemonSpawner(cliPath: string, execArgv: readonly string[] = process.execArgv): DaemonSpawner {
  return () =>
    new Promise<number>((resolve, reject) => {
      const child = spawn(process.execPath, [...execArgv, cliPath, 'daemon', 'run'], {
        detached: true,
        stdio: 'ignore',
        env: process.env,
      });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        if (child.pid === undefined) {
          reject(new DaemonControlError('Daemon process started without a pid'));
          return;
        }
        resolve(child.pid);
      });
    });
}

function sendSignal(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(pid, signal);
  } catch (err) {
    // Already gone
    if (errnoCode(err) !== 'ESRCH') throw err;
  }
}

export class DaemonController {
  private readonly pidFile: PidFile;
  private readonly statusStore: DaemonStatusStore;
  private readonly logger: Logger;
  private readonly spawnDaemon: DaemonSpawner;
  private readonly isAlive: (pid: number) => boolean;
  private readonly sendSignal: SignalSender;
  private readonly sleep: Sleep;
  private readonly graceMs: number;
  private readonly pollMs: number;

  constructor(options: DaemonControllerOptions) {
    this.pidFile = options.pidFile;
    this.statusStore = options.statusStore;
    this.logger = options.logger;
    this.spawnDaemon = options.spawnDaemon;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.sendSignal = options.sendSignal ?? sendSignal;
    this.sleep = options.sleep ?? defaultSleep;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
  }

  async state(): Promise<DaemonState> {
    const pid = await this.pidFile.read();
    const running = pid !== null && this.isAlive(pid);
    return {
      running,
      pid: running ? pid : null,
      stale: pid !== null && !running,
      status: await this.statusStore.read(),
    };
  }

  /** Start the daemon. With `force`, a running daemon is stopped first. */
  async start(options: { force?: boolean } = {}): Promise<number> {
    const current = await this.state();
    if (current.running && current.pid !== null) {
      if (!options.force) {
        throw new DaemonControlError(`Daemon already running (PID ${current.pid}); use --force to restart it`);
      }
      await this.stop();
    } else if (current.stale) {
      this.logger.debug('Removing stale daemon pid file');
      await this.pidFile.remove();
    }

    const pid = await this.spawnDaemon();
    await this.pidFile.write(pid);
    this.logger.info(`Daemon started (PID ${pid})`);
    return pid;
  }

  async stop(): Promise<StopResult> {
    const pid = await this.pidFile.read();
    if (pid === null || !this.isAlive(pid)) {
      await this.pidFile.remove();
      return { wasRunning: false, pid, forced: false };
    }

    this.sendSignal(pid, 'SIGTERM');
    let forced = false;
    if (!(await this.waitForExit(pid))) {
      this.logger.warn(`Daemon (PID ${pid}) did not exit within ${this.graceMs}ms; sending SIGKILL`);
      this.sendSignal(pid, 'SIGKILL');
      forced = true;
      await this.waitForExit(pid);
    }

    await this.pidFile.release(pid);
    this.logger.info(`Daemon stopped (PID ${pid})`);
    return { wasRunning: true, pid, forced };
  }

  async restart(): Promise<number> {
    await this.stop();
    return this.start();
  }

  private async waitForExit(pid: number): Promise<boolean> {
    for (let waited = 0; waited < this.graceMs; waited += this.pollMs) {
      if (!this.isAlive(pid)) return true;
      await this.sleep(this.pollMs);
    }
    return !this.isAlive(pid);
  }
}
