/**
 * Directories the daemon should watch, in priority order: conda and mamba
 * `envs` directories, venv roots, the pyenv `versions` directory, then
 * configured extras. Directories that do not exist are reported separately.
 *
 * @module daemon/watch-targets
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { DetectionResult, EnvironmentType } from '../environments/types.js';

export type WatchOrigin = EnvironmentType | 'configured';

export interface WatchTarget {
  directory: string;
  origin: WatchOrigin;
}

export interface WatchTargetPlan {
  targets: WatchTarget[];
  /** Candidate directories that do not exist (or are not directories). */
  missing: string[];
}

const ORIGIN_ORDER: readonly EnvironmentType[] = ['conda', 'mamba', 'venv', 'pyenv'];

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function planWatchTargets(
  detections: readonly DetectionResult[],
  additionalDirs: readonly string[],
): Promise<WatchTargetPlan> {
  const candidates: WatchTarget[] = [];
  for (const origin of ORIGIN_ORDER) {
    for (const detection of detections) {
      if (detection.type !== origin) continue;
      for (const dir of detection.watchDirs) {
        candidates.push({ directory: resolve(dir), origin });
      }
    }
  }
  for (const dir of additionalDirs) {
    candidates.push({ directory: resolve(dir), origin: 'configured' });
  }

  const seen = new Set<string>();
  const targets: WatchTarget[] = [];
  const missing: string[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.directory)) continue;
    seen.add(candidate.directory);

    if (await isDirectory(candidate.directory)) {
      targets.push(candidate);
    } else {
      missing.push(candidate.directory);
    }
  }
  return { targets, missing };
}
