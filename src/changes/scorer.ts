/**
 * Impact scoring for classified changes.
 *
 * @module changes/scorer
 */

import type { ChangeType } from './types.js';

export const BASE_SCORES: Readonly<Record<ChangeType, number>> = {
  environment_created: 3,
  environment_deleted: 3,
  dependency_file_modified: 2,
  environment_binary_modified: 1,
  file_created: 0,
  file_deleted: 0,
  file_modified: 0,
  unknown: 0,
};

/** Paths owned by an environment manager weigh one point more. */
const MANAGER_NAMESPACE = /conda|mamba|pyenv/;

export function scoreChange(changeType: ChangeType, path: string): number {
  const base = BASE_SCORES[changeType];
  return MANAGER_NAMESPACE.test(path) ? base + 1 : base;
}
