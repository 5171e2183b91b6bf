/**
 * Pure path/kind → change type classification. The first matching rule wins.
 *
 * @module changes/classifier
 */

import { basename } from 'node:path';
import type { ChangeEvent, ChangeType, ClassifiedChange, RawChangeKind } from './types.js';
import { scoreChange } from './scorer.js';

/** Segments that sit directly above an environment root. */
const ENVIRONMENT_ROOT_SEGMENT = /(^|\/)(envs|versions)\//;

const BINARY_SEGMENT = /(^|\/)(bin|Scripts)\//;

export const DEPENDENCY_MANIFESTS: ReadonlySet<string> = new Set([
  'requirements.txt',
  'environment.yml',
  'environment.yaml',
  'pyproject.toml',
  'Pipfile',
  'Pipfile.lock',
  'poetry.lock',
  'setup.py',
  'setup.cfg',
]);

export function classify(path: string, kind: RawChangeKind): ChangeType {
  const normalized = path.replace(/\\/g, '/');

  if (ENVIRONMENT_ROOT_SEGMENT.test(normalized)) {
    if (kind === 'create') return 'environment_created';
    if (kind === 'delete') return 'environment_deleted';
  }

  if (DEPENDENCY_MANIFESTS.has(basename(normalized))) {
    return 'dependency_file_modified';
  }

  if (kind === 'modify' && BINARY_SEGMENT.test(normalized)) {
    return 'environment_binary_modified';
  }

  switch (kind) {
    case 'create':
      return 'file_created';
    case 'delete':
      return 'file_deleted';
    case 'modify':
      return 'file_modified';
    default:
      return 'unknown';
  }
}

/** Classify and score a watch event. */
export function classifyEvent(event: ChangeEvent): ClassifiedChange {
  const changeType = classify(event.path, event.kind);
  return {
    ...event,
    changeType,
    score: scoreChange(changeType, event.path),
    source: 'watch',
  };
}
