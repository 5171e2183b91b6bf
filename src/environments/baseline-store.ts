/**
 * Persistence for the environment baseline. The daemon is the only writer.
 *
 * @module environments/baseline-store
 */

import { readJson, writeJsonAtomic } from '../storage/atomic-json.js';
import { BaselineSchema } from './types.js';
import type { Baseline } from './types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

export class BaselineStore {
  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** The stored baseline, or null when none exists or it is unreadable. */
  async load(): Promise<Baseline | null> {
    const result = await readJson(this.path, BaselineSchema);
    switch (result.status) {
      case 'ok':
        return result.value;
      case 'missing':
        return null;
      case 'invalid':
        this.logger.warn(`Ignoring unreadable baseline ${this.path}: ${result.reason}`);
        return null;
    }
  }

  async replace(baseline: Baseline): Promise<void> {
    await writeJsonAtomic(this.path, baseline);
  }
}
