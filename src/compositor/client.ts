import type { DispatchCommand, DispatchResult, Monitor, Window, Workspace } from './types.js';

/**
 * Typed access to the running compositor.
 *
 * Queries reject with `CompositorUnreachableError` when the compositor
 * cannot be reached. `dispatch` never rejects; it reports failure in its
 * result. Implementations do not retry.
 */
export interface CompositorClient {
  listMonitors(): Promise<Monitor[]>;
  listWorkspaces(): Promise<Workspace[]>;
  listWindows(): Promise<Window[]>;
  /** Id of the focused workspace. */
  activeWorkspace(): Promise<number>;
  dispatch(command: DispatchCommand): Promise<DispatchResult>;
}
