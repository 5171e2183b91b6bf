/**
 * Change classification, scoring and the change log.
 *
 * @module changes
 */

export {
  RawChangeKindSchema,
  ChangeTypeSchema,
  ClassifiedChangeSchema,
  changeLabel,
} from './types.js';
export type {
  RawChangeKind,
  ChangeType,
  ChangeEvent,
  ClassifiedChange,
} from './types.js';
export { classify, classifyEvent, DEPENDENCY_MANIFESTS } from './classifier.js';
export { scoreChange, BASE_SCORES } from './scorer.js';
export { ChangeLog } from './change-log.js';
export type { ChangeLogQuery } from './change-log.js';
