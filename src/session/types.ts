/**
 * Session snapshot model.
 *
 * A snapshot is immutable once written. Every window references a
 * workspace recorded in the same snapshot; the schema rejects documents
 * that break this.
 *
 * @module session/types
 */

import { z } from 'zod';
import { MonitorSchema, WindowSchema, WorkspaceSchema } from '../compositor/types.js';
import { EnvironmentDescriptorSchema } from '../environments/types.js';
import type { HookSummary } from '../hooks/types.js';

export const SNAPSHOT_VERSION = 1;

export const ApplicationSchema = z.object({
  /** Window class of the process, e.g. `firefox`. */
  class: z.string().min(1),
  /** Shell command used to relaunch it. */
  command: z.string().min(1),
  workspaceId: z.number().int(),
  /** Title of the first window seen for this application. */
  title: z.string().default(''),
});

export const SnapshotManifestSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  timestamp: z.string().datetime(),
  /** Free-form origin of the save, e.g. `manual` or `auto: <change>`. */
  reason: z.string().default('manual'),
}).passthrough();

export const SessionSnapshotSchema = z
  .object({
    timestamp: z.string().datetime(),
    reason: z.string().default('manual'),
    monitors: z.array(MonitorSchema),
    workspaces: z.array(WorkspaceSchema),
    windows: z.array(WindowSchema),
    activeWorkspace: z.number().int(),
    applications: z.array(ApplicationSchema),
    /** Environments detected at save time; absent when none were recorded. */
    environments: z.array(EnvironmentDescriptorSchema).optional(),
  })
  .superRefine((snapshot, ctx) => {
    const workspaceIds = new Set(snapshot.workspaces.map((w) => w.id));
    snapshot.windows.forEach((window, index) => {
      if (!workspaceIds.has(window.workspaceId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['windows', index, 'workspaceId'],
          message: `Window ${window.address} references unknown workspace ${window.workspaceId}`,
        });
      }
    });
  });

export type Application = z.infer<typeof ApplicationSchema>;
export type SnapshotManifest = z.infer<typeof SnapshotManifestSchema>;
export type SessionSnapshot = z.infer<typeof SessionSnapshotSchema>;

export interface SaveResult {
  snapshot: SessionSnapshot;
  /** Summary of the pre-save hook phase that followed the write. */
  hooks: HookSummary;
}

export interface SnapshotStatus {
  timestamp: string;
  reason: string;
  monitors: number;
  workspaces: number;
  windows: number;
  applications: number;
}
