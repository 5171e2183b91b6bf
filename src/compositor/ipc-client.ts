/**
 * Hyprland IPC client over the compositor's UNIX request socket.
 *
 * Each request opens a fresh connection, writes one command and reads the
 * reply until the compositor closes the stream. Queries use the `j/`
 * prefix for JSON replies; dispatches are answered with `ok`.
 *
 * @module compositor/ipc-client
 */

import { createConnection } from 'node:net';
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ZodTypeAny } from 'zod';
import type { CompositorClient } from './client.js';
import type { DispatchCommand, DispatchResult, Monitor, Window, Workspace } from './types.js';
import { formatDispatch } from './dispatch.js';
import {
  HyprClientSchema,
  HyprMonitorSchema,
  HyprWorkspaceSchema,
  isLayoutWindow,
  toMonitor,
  toWindow,
  toWorkspace,
} from './hyprland-payloads.js';
import { CompositorCommandError, CompositorUnreachableError, toError } from '../errors.js';

const DEFAULT_TIMEOUT_MS = 5000;

const ActiveWorkspaceSchema = z.object({ id: z.number().int() }).passthrough();

export interface IpcClientOptions {
  /** Explicit socket path; skips signature-based discovery. */
  socketPath?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Candidate request-socket paths for the running Hyprland instance,
 * most likely first. Empty when no instance signature is set.
 */
export function socketCandidates(env: NodeJS.ProcessEnv): string[] {
  const signature = env.HYPRLAND_INSTANCE_SIGNATURE;
  if (!signature) return [];

  const candidates: string[] = [];
  if (env.XDG_RUNTIME_DIR) {
    candidates.push(join(env.XDG_RUNTIME_DIR, 'hypr', signature, '.socket.sock'));
  }
  candidates.push(join('/tmp', 'hypr', signature, '.socket.sock'));
  return candidates;
}

export class HyprlandIpcClient implements CompositorClient {
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private resolvedPath: string | null;

  constructor(options: IpcClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.env = options.env ?? process.env;
    this.resolvedPath = options.socketPath ?? null;
  }

  async listMonitors(): Promise<Monitor[]> {
    const raw = await this.query('monitors', z.array(HyprMonitorSchema));
    return raw.map(toMonitor);
  }

  async listWorkspaces(): Promise<Workspace[]> {
    const raw = await this.query('workspaces', z.array(HyprWorkspaceSchema));
    return raw.map(toWorkspace);
  }

  async listWindows(): Promise<Window[]> {
    const raw = await this.query('clients', z.array(HyprClientSchema));
    return raw.filter(isLayoutWindow).map(toWindow);
  }

  async activeWorkspace(): Promise<number> {
    const raw = await this.query('activeworkspace', ActiveWorkspaceSchema);
    return raw.id;
  }

  async dispatch(command: DispatchCommand): Promise<DispatchResult> {
    const body = formatDispatch(command);
    try {
      const reply = (await this.request(`dispatch ${body}`)).trim();
      if (reply !== 'ok') {
        return { ok: false, error: new CompositorCommandError(body, reply) };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  private async query<S extends ZodTypeAny>(command: string, schema: S): Promise<z.output<S>> {
    const reply = await this.request(`j/${command}`);

    let parsed: unknown;
    try {
      parsed = JSON.parse(reply);
    } catch (err) {
      throw new CompositorUnreachableError(
        `Compositor returned non-JSON reply to "${command}"`,
        toError(err),
      );
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new CompositorUnreachableError(
        `Unexpected "${command}" reply: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`,
      );
    }
    return result.data;
  }

  private async socketPath(): Promise<string> {
    if (this.resolvedPath) return this.resolvedPath;

    const candidates = socketCandidates(this.env);
    if (candidates.length === 0) {
      throw new CompositorUnreachableError(
        'HYPRLAND_INSTANCE_SIGNATURE is not set; is the compositor running?',
      );
    }

    for (const candidate of candidates) {
      try {
        await access(candidate);
        this.resolvedPath = candidate;
        return candidate;
      } catch {
        // try the next location
      }
    }
    throw new CompositorUnreachableError(
      `No compositor socket found (tried ${candidates.join(', ')})`,
    );
  }

  private async request(body: string): Promise<string> {
    const path = await this.socketPath();

    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const socket = createConnection(path);
      socket.setTimeout(this.timeoutMs);

      socket.on('connect', () => {
        socket.write(body);
      });
      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      socket.on('end', () => {
        resolve(Buffer.concat(chunks).toString('utf-8'));
      });
      socket.on('timeout', () => {
        socket.destroy();
        reject(new CompositorUnreachableError(
          `Compositor did not answer "${body}" within ${this.timeoutMs}ms`,
        ));
      });
      socket.on('error', (err) => {
        reject(new CompositorUnreachableError(
          `Cannot reach compositor at ${path}: ${err.message}`,
          err,
        ));
      });
    });
  }
}
