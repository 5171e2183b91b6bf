/**
 * Daemon pid file and process liveness.
 *
 * @module daemon/pid-file
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { errnoCode } from '../errors.js';

/** True when a process with `pid` exists (EPERM means it exists but is not ours). */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

export class PidFile {
  constructor(readonly path: string) {}

  /** The recorded pid, or null when there is no usable pid file. */
  async read(): Promise<number | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  }

  async write(pid: number): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${pid}\n`, 'utf-8');
  }

  async remove(): Promise<void> {
    await rm(this.path, { force: true });
  }

  /** Remove the file only if it still names `pid`. */
  async release(pid: number): Promise<void> {
    if ((await this.read()) === pid) {
      await this.remove();
    }
  }
}
