/**
 * Filesystem change events and their semantic classification.
 *
 * @module changes/types
 */

import { z } from 'zod';

export const RawChangeKindSchema = z.enum(['create', 'delete', 'modify', 'move']);

export const ChangeTypeSchema = z.enum([
  'environment_created',
  'environment_deleted',
  'dependency_file_modified',
  'environment_binary_modified',
  'file_created',
  'file_deleted',
  'file_modified',
  'unknown',
]);

export type RawChangeKind = z.infer<typeof RawChangeKindSchema>;
export type ChangeType = z.infer<typeof ChangeTypeSchema>;

/** One raw event forwarded by a watch worker. */
export interface ChangeEvent {
  path: string;
  kind: RawChangeKind;
  /** ISO timestamp of when the event was observed. */
  time: string;
}

export const ClassifiedChangeSchema = z.object({
  path: z.string(),
  kind: RawChangeKindSchema,
  time: z.string(),
  changeType: ChangeTypeSchema,
  score: z.number().int(),
  /** Where the change came from: a watched directory or the baseline diff. */
  source: z.enum(['watch', 'baseline']),
}).passthrough();

export type ClassifiedChange = z.infer<typeof ClassifiedChangeSchema>;

/** `"<changeType>:<path>"`, as shown in logs and notifications. */
export function changeLabel(change: Pick<ClassifiedChange, 'changeType' | 'path'>): string {
  return `${change.changeType}:${change.path}`;
}
