/**
 * In-memory compositor for tests. Applies dispatches to its own state so
 * capture/restore round trips can be asserted without a running session.
 */

import type { CompositorClient } from '../client.js';
import type { DispatchCommand, DispatchResult, Monitor, Window, Workspace } from '../types.js';
import { CompositorUnreachableError } from '../../errors.js';

export type FakeQuery = 'monitors' | 'workspaces' | 'windows' | 'active';

export interface FakeCompositorState {
  monitors?: Monitor[];
  workspaces?: Workspace[];
  windows?: Window[];
  active?: number;
}

export function makeMonitor(overrides: Partial<Monitor> = {}): Monitor {
  return {
    id: 0,
    name: 'DP-1',
    description: '',
    width: 2560,
    height: 1440,
    x: 0,
    y: 0,
    scale: 1,
    refreshRate: 60,
    activeWorkspaceId: 1,
    focused: true,
    ...overrides,
  };
}

export function makeWorkspace(id: number, overrides: Partial<Workspace> = {}): Workspace {
  return { id, name: String(id), monitor: 'DP-1', windows: 0, ...overrides };
}

export function makeWindow(overrides: Partial<Window> = {}): Window {
  return {
    address: '0x1',
    class: 'kitty',
    title: 'kitty',
    x: 0,
    y: 0,
    width: 800,
    height: 600,
    workspaceId: 1,
    pid: 100,
    floating: false,
    fullscreen: false,
    pinned: false,
    ...overrides,
  };
}

export class FakeCompositor implements CompositorClient {
  monitors: Monitor[];
  workspaces: Workspace[];
  windows: Window[];
  active: number;

  readonly dispatched: DispatchCommand[] = [];
  /** Every query rejects and every dispatch fails. */
  unreachable = false;
  /** Individual queries that reject as unreachable. */
  readonly failing = new Set<FakeQuery>();
  /** Number of upcoming `activeWorkspace` calls that reject before it answers. */
  unreadyCalls = 0;
  /** Called for `exec`; a returned window is added as if the app had started. */
  onExec: (command: string, workspace: number | undefined) => Window | null = () => null;

  private nextAddress = 0x1000;

  constructor(state: FakeCompositorState = {}) {
    this.monitors = state.monitors ?? [makeMonitor()];
    this.workspaces = state.workspaces ?? [makeWorkspace(1)];
    this.windows = state.windows ?? [];
    this.active = state.active ?? 1;
  }

  /** Fresh address for a window created by a test. */
  allocateAddress(): string {
    this.nextAddress += 1;
    return `0x${this.nextAddress.toString(16)}`;
  }

  async listMonitors(): Promise<Monitor[]> {
    this.check('monitors');
    return this.monitors.map((m) => ({ ...m }));
  }

  async listWorkspaces(): Promise<Workspace[]> {
    this.check('workspaces');
    return this.workspaces.map((w) => ({
      ...w,
      windows: this.windows.filter((win) => win.workspaceId === w.id).length,
    }));
  }

  async listWindows(): Promise<Window[]> {
    this.check('windows');
    return this.windows.map((w) => ({ ...w }));
  }

  async activeWorkspace(): Promise<number> {
    if (this.unreadyCalls > 0) {
      this.unreadyCalls -= 1;
      throw new CompositorUnreachableError('fake compositor not ready');
    }
    this.check('active');
    return this.active;
  }

  async dispatch(command: DispatchCommand): Promise<DispatchResult> {
    this.dispatched.push(command);
    if (this.unreachable) {
      return { ok: false, error: new CompositorUnreachableError('fake compositor unreachable') };
    }
    this.apply(command);
    return { ok: true };
  }

  private check(query: FakeQuery): void {
    if (this.unreachable || this.failing.has(query)) {
      throw new CompositorUnreachableError(`fake ${query} query failed`);
    }
  }

  private ensureWorkspace(id: number): void {
    if (!this.workspaces.some((w) => w.id === id)) {
      this.workspaces.push(makeWorkspace(id));
    }
  }

  private window(address: string): Window | undefined {
    return this.windows.find((w) => w.address === address);
  }

  private apply(command: DispatchCommand): void {
    switch (command.type) {
      case 'switch-workspace':
        this.ensureWorkspace(command.workspace);
        this.active = command.workspace;
        break;
      case 'rename-workspace': {
        const ws = this.workspaces.find((w) => w.id === command.workspace);
        if (ws) ws.name = command.name;
        break;
      }
      case 'move-to-workspace': {
        const win = this.window(command.address);
        if (win) {
          this.ensureWorkspace(command.workspace);
          win.workspaceId = command.workspace;
        }
        break;
      }
      case 'move-window': {
        const win = this.window(command.address);
        if (win) {
          win.x = command.x;
          win.y = command.y;
        }
        break;
      }
      case 'resize-window': {
        const win = this.window(command.address);
        if (win) {
          win.width = command.width;
          win.height = command.height;
        }
        break;
      }
      case 'toggle-floating': {
        const win = this.window(command.address);
        if (win) win.floating = !win.floating;
        break;
      }
      case 'pin': {
        const win = this.window(command.address);
        if (win) win.pinned = !win.pinned;
        break;
      }
      case 'exec': {
        if (command.workspace !== undefined) this.ensureWorkspace(command.workspace);
        const created = this.onExec(command.command, command.workspace);
        if (created) this.windows.push(created);
        break;
      }
      case 'focus-window':
      case 'fullscreen':
        break;
    }
  }
}
