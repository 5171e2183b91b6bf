/**
 * Compositor-neutral descriptors for monitors, workspaces and windows.
 *
 * These are the shapes stored in a session snapshot. The IPC client maps
 * the compositor's own payloads onto them.
 *
 * @module compositor/types
 */

import { z } from 'zod';

export const MonitorSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().default(''),
  width: z.number().int(),
  height: z.number().int(),
  x: z.number().int(),
  y: z.number().int(),
  scale: z.number().default(1),
  refreshRate: z.number().default(60),
  activeWorkspaceId: z.number().int(),
  focused: z.boolean().default(false),
});

export const WorkspaceSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  /** Name of the monitor the workspace lives on. */
  monitor: z.string(),
  windows: z.number().int().default(0),
});

export const WindowSchema = z.object({
  /** Compositor address, e.g. `0x55d1c2a0`. Stable for the window's lifetime. */
  address: z.string().min(1),
  class: z.string(),
  title: z.string(),
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
  workspaceId: z.number().int(),
  pid: z.number().int(),
  floating: z.boolean().default(false),
  fullscreen: z.boolean().default(false),
  pinned: z.boolean().default(false),
});

export type Monitor = z.infer<typeof MonitorSchema>;
export type Workspace = z.infer<typeof WorkspaceSchema>;
export type Window = z.infer<typeof WindowSchema>;

// ============================================================================
// Dispatch commands
// ============================================================================

export type DispatchCommand =
  | { type: 'switch-workspace'; workspace: number }
  | { type: 'rename-workspace'; workspace: number; name: string }
  | { type: 'focus-window'; address: string }
  | { type: 'move-to-workspace'; address: string; workspace: number }
  | { type: 'move-window'; address: string; x: number; y: number }
  | { type: 'resize-window'; address: string; width: number; height: number }
  | { type: 'toggle-floating'; address: string }
  /** Acts on the focused window. */
  | { type: 'fullscreen' }
  | { type: 'pin'; address: string }
  | { type: 'exec'; command: string; workspace?: number };

export type DispatchResult =
  | { ok: true }
  | { ok: false; error: Error };
