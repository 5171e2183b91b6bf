/**
 * Checks the environments recorded with a saved session against the ones
 * detected now.
 *
 * A recorded environment is missing when its manager was detected and no
 * longer lists it. When the manager itself could not be detected, its
 * recorded environments are unverified rather than missing, and so are
 * those of a manager whose detection is turned off.
 *
 * @module environments/validation
 */

import type { BaselineTracker, DetectorFailure } from './tracker.js';
import type { DetectionResult, EnvironmentDescriptor, EnvironmentType } from './types.js';
import { environmentId } from './types.js';
import { sortEnvironments } from './differ.js';

/** The part of {@link BaselineTracker} that saves and restores use. */
export type EnvironmentSource = Pick<BaselineTracker, 'detectAll'>;

export interface UnverifiedEnvironments {
  type: EnvironmentType;
  ids: string[];
  reason: string;
}

export interface EnvironmentCheck {
  /** Recorded environments found again. */
  present: string[];
  /** Recorded environments whose manager no longer lists them. */
  missing: string[];
  unverified: UnverifiedEnvironments[];
}

export function checkEnvironments(
  recorded: readonly EnvironmentDescriptor[],
  detections: readonly DetectionResult[],
  failures: readonly DetectorFailure[],
): EnvironmentCheck {
  const live = new Set(detections.flatMap((d) => d.environments.map(environmentId)));
  const detected = new Set(detections.map((d) => d.type));
  const failed = new Map(failures.map((f) => [f.type, f.message]));
  const reasonFor = (type: EnvironmentType): string | null =>
    failed.get(type) ?? (detected.has(type) ? null : `${type} detection is disabled`);

  const check: EnvironmentCheck = { present: [], missing: [], unverified: [] };
  const unverified = new Map<EnvironmentType, string[]>();

  const seen = new Set<string>();
  for (const environment of sortEnvironments(recorded)) {
    const id = environmentId(environment);
    if (seen.has(id)) continue;
    seen.add(id);

    if (reasonFor(environment.type) !== null) {
      unverified.set(environment.type, [...(unverified.get(environment.type) ?? []), id]);
    } else if (live.has(id)) {
      check.present.push(id);
    } else {
      check.missing.push(id);
    }
  }

  for (const [type, ids] of unverified) {
    check.unverified.push({ type, ids, reason: reasonFor(type) ?? '' });
  }
  return check;
}
