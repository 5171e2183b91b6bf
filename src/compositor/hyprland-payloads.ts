/**
 * Zod schemas for Hyprland's `j/` JSON replies, each mapped onto the
 * compositor-neutral descriptors. Unknown fields pass through untouched so
 * newer compositor releases do not break parsing.
 *
 * @module compositor/hyprland-payloads
 */

import { z } from 'zod';
import type { Monitor, Window, Workspace } from './types.js';

const WorkspaceRefSchema = z.object({
  id: z.number().int(),
  name: z.string(),
}).passthrough();

export const HyprMonitorSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string().optional(),
  width: z.number().int(),
  height: z.number().int(),
  x: z.number().int(),
  y: z.number().int(),
  scale: z.number().optional(),
  refreshRate: z.number().optional(),
  activeWorkspace: WorkspaceRefSchema,
  focused: z.boolean().optional(),
}).passthrough();

export const HyprWorkspaceSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  monitor: z.string(),
  windows: z.number().int().optional(),
}).passthrough();

/** Older releases report `fullscreen` as a boolean, newer ones as a mode number. */
const FullscreenSchema = z
  .union([z.boolean(), z.number()])
  .transform((value) => (typeof value === 'number' ? value > 0 : value));

export const HyprClientSchema = z.object({
  address: z.string().min(1),
  mapped: z.boolean().optional(),
  at: z.tuple([z.number(), z.number()]),
  size: z.tuple([z.number(), z.number()]),
  workspace: WorkspaceRefSchema,
  floating: z.boolean().optional(),
  class: z.string(),
  title: z.string(),
  pid: z.number().int(),
  pinned: z.boolean().optional(),
  fullscreen: FullscreenSchema.optional(),
}).passthrough();

export type HyprMonitor = z.infer<typeof HyprMonitorSchema>;
export type HyprWorkspace = z.infer<typeof HyprWorkspaceSchema>;
export type HyprClient = z.infer<typeof HyprClientSchema>;

export function toMonitor(raw: HyprMonitor): Monitor {
  return {
    id: raw.id,
    name: raw.name,
    description: raw.description ?? '',
    width: raw.width,
    height: raw.height,
    x: raw.x,
    y: raw.y,
    scale: raw.scale ?? 1,
    refreshRate: raw.refreshRate ?? 60,
    activeWorkspaceId: raw.activeWorkspace.id,
    focused: raw.focused ?? false,
  };
}

export function toWorkspace(raw: HyprWorkspace): Workspace {
  return {
    id: raw.id,
    name: raw.name,
    monitor: raw.monitor,
    windows: raw.windows ?? 0,
  };
}

export function toWindow(raw: HyprClient): Window {
  return {
    address: raw.address,
    class: raw.class,
    title: raw.title,
    x: Math.round(raw.at[0]),
    y: Math.round(raw.at[1]),
    width: Math.round(raw.size[0]),
    height: Math.round(raw.size[1]),
    workspaceId: raw.workspace.id,
    pid: raw.pid,
    floating: raw.floating ?? false,
    fullscreen: raw.fullscreen ?? false,
    pinned: raw.pinned ?? false,
  };
}

/**
 * Hyprland lists unmapped helper surfaces (empty class, address but no
 * on-screen window) among its clients; those are not part of a layout.
 */
export function isLayoutWindow(raw: HyprClient): boolean {
  return raw.mapped !== false && raw.class !== '';
}
