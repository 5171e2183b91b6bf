/**
 * Compositor state client: typed queries and dispatches.
 *
 * @module compositor
 */

export { MonitorSchema, WorkspaceSchema, WindowSchema } from './types.js';
export type {
  Monitor,
  Workspace,
  Window,
  DispatchCommand,
  DispatchResult,
} from './types.js';
export type { CompositorClient } from './client.js';
export { formatDispatch } from './dispatch.js';
export { HyprlandIpcClient, socketCandidates } from './ipc-client.js';
export type { IpcClientOptions } from './ipc-client.js';
