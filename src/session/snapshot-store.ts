/**
 * On-disk session snapshot store.
 *
 * Layout of the session directory:
 *
 *   snapshot.json           version, timestamp, reason
 *   monitors.json
 *   workspaces.json
 *   windows.json
 *   active-workspace.json   { "id": <workspace id> }
 *   applications.json
 *   environments.json       optional; environments detected at save time
 *   apps/<application>/     owned by that application's hooks
 *
 * A new snapshot is built completely in a hidden staging directory next to
 * the session directory and then swapped in with two renames. A failed
 * write removes the staging directory and leaves the stored snapshot as
 * it was.
 *
 * @module session/snapshot-store
 */

import { access, mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { z } from 'zod';
import type { ZodTypeAny } from 'zod';
import {
  ApplicationSchema,
  SNAPSHOT_VERSION,
  SessionSnapshotSchema,
  SnapshotManifestSchema,
} from './types.js';
import type { Application, SessionSnapshot, SnapshotManifest, SnapshotStatus } from './types.js';
import { MonitorSchema, WindowSchema, WorkspaceSchema } from '../compositor/types.js';
import { EnvironmentDescriptorSchema } from '../environments/types.js';
import { readJson } from '../storage/atomic-json.js';
import { CaptureFailureError, SnapshotMissingError, errnoCode } from '../errors.js';

const ActiveWorkspaceFileSchema = z.object({ id: z.number().int() });

const FILES = {
  manifest: 'snapshot.json',
  monitors: 'monitors.json',
  workspaces: 'workspaces.json',
  windows: 'windows.json',
  activeWorkspace: 'active-workspace.json',
  applications: 'applications.json',
  environments: 'environments.json',
} as const;

/** Directory name used for an application's hook-owned data. */
export function appDirName(appClass: string): string {
  const cleaned = appClass.toLowerCase().replace(/[^a-z0-9._-]+/g, '_').replace(/^[._]+/, '');
  return cleaned || 'unknown';
}

async function writeDoc(dir: string, file: string, value: unknown): Promise<void> {
  await writeFile(join(dir, file), JSON.stringify(value, null, 2) + '\n', 'utf-8');
}

export class SnapshotStore {
  private readonly parentDir: string;
  private readonly baseName: string;

  constructor(private readonly sessionDir: string) {
    this.parentDir = dirname(sessionDir);
    this.baseName = basename(sessionDir);
  }

  get directory(): string {
    return this.sessionDir;
  }

  get appsDir(): string {
    return join(this.sessionDir, 'apps');
  }

  appDir(appClass: string): string {
    return join(this.appsDir, appDirName(appClass));
  }

  // ==========================================================================
  // Write
  // ==========================================================================

  /**
   * Replace the stored snapshot. Rejects with {@link CaptureFailureError}
   * when the snapshot is inconsistent; I/O errors propagate as they are.
   */
  async write(snapshot: SessionSnapshot): Promise<void> {
    const checked = SessionSnapshotSchema.safeParse(snapshot);
    if (!checked.success) {
      const issue = checked.error.issues[0];
      throw new CaptureFailureError(`Snapshot rejected: ${issue?.message ?? 'invalid snapshot'}`);
    }
    const valid = checked.data;

    await mkdir(this.parentDir, { recursive: true });
    await this.removeLeftovers();

    const staging = join(this.parentDir, `.${this.baseName}.staging-${process.pid}-${Date.now()}`);
    try {
      await mkdir(staging);
      const manifest: SnapshotManifest = {
        version: SNAPSHOT_VERSION,
        timestamp: valid.timestamp,
        reason: valid.reason,
      };
      await writeDoc(staging, FILES.manifest, manifest);
      await writeDoc(staging, FILES.monitors, valid.monitors);
      await writeDoc(staging, FILES.workspaces, valid.workspaces);
      await writeDoc(staging, FILES.windows, valid.windows);
      await writeDoc(staging, FILES.activeWorkspace, { id: valid.activeWorkspace });
      await writeDoc(staging, FILES.applications, valid.applications);
      if (valid.environments !== undefined) {
        await writeDoc(staging, FILES.environments, valid.environments);
      }

      await mkdir(join(staging, 'apps'));
      for (const name of new Set(valid.applications.map((a) => appDirName(a.class)))) {
        await mkdir(join(staging, 'apps', name));
      }
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      throw err;
    }

    await this.swapIn(staging);
  }

  private async swapIn(staging: string): Promise<void> {
    const retired = join(this.parentDir, `.${this.baseName}.retired-${process.pid}-${Date.now()}`);

    let hadPrevious = true;
    try {
      await rename(this.sessionDir, retired);
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        await rm(staging, { recursive: true, force: true });
        throw err;
      }
      hadPrevious = false;
    }

    try {
      await rename(staging, this.sessionDir);
    } catch (err) {
      if (hadPrevious) {
        await rename(retired, this.sessionDir);
      }
      await rm(staging, { recursive: true, force: true });
      throw err;
    }

    if (hadPrevious) {
      await rm(retired, { recursive: true, force: true });
    }
  }

  /** Remove staging or retired directories left by an interrupted write. */
  private async removeLeftovers(): Promise<void> {
    const prefixes = [`.${this.baseName}.staging-`, `.${this.baseName}.retired-`];
    const names = await readdir(this.parentDir);
    for (const name of names) {
      if (prefixes.some((p) => name.startsWith(p))) {
        await rm(join(this.parentDir, name), { recursive: true, force: true });
      }
    }
  }

  // ==========================================================================
  // Read
  // ==========================================================================

  async exists(): Promise<boolean> {
    try {
      await access(join(this.sessionDir, FILES.manifest));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load the stored snapshot. Rejects with {@link SnapshotMissingError}
   * when nothing is stored or a facet is unreadable.
   */
  async read(): Promise<SessionSnapshot> {
    const manifest = await this.readFacet(FILES.manifest, SnapshotManifestSchema);
    const monitors = await this.readFacet(FILES.monitors, z.array(MonitorSchema));
    const workspaces = await this.readFacet(FILES.workspaces, z.array(WorkspaceSchema));
    const windows = await this.readFacet(FILES.windows, z.array(WindowSchema));
    const active = await this.readFacet(FILES.activeWorkspace, ActiveWorkspaceFileSchema);
    const applications: Application[] = await this.readFacet(
      FILES.applications,
      z.array(ApplicationSchema),
    );
    const environments = await this.readFacet(
      FILES.environments,
      z.array(EnvironmentDescriptorSchema),
      { optional: true },
    );

    const result = SessionSnapshotSchema.safeParse({
      timestamp: manifest.timestamp,
      reason: manifest.reason,
      monitors,
      workspaces,
      windows,
      activeWorkspace: active.id,
      applications,
      environments,
    });
    if (!result.success) {
      throw new SnapshotMissingError(
        `Saved session is inconsistent: ${result.error.issues[0]?.message ?? 'invalid'}`,
      );
    }
    return result.data;
  }

  /** Summary of the stored snapshot, or null when none is stored. */
  async status(): Promise<SnapshotStatus | null> {
    if (!(await this.exists())) return null;
    const snapshot = await this.read();
    return {
      timestamp: snapshot.timestamp,
      reason: snapshot.reason,
      monitors: snapshot.monitors.length,
      workspaces: snapshot.workspaces.length,
      windows: snapshot.windows.length,
      applications: snapshot.applications.length,
    };
  }

  /**
   * Delete the stored snapshot and any hook data.
   *
   * @returns whether a snapshot existed
   */
  async clear(): Promise<boolean> {
    const existed = await this.exists();
    await rm(this.sessionDir, { recursive: true, force: true });
    return existed;
  }

  private async readFacet<S extends ZodTypeAny>(file: string, schema: S): Promise<z.output<S>>;
  private async readFacet<S extends ZodTypeAny>(
    file: string,
    schema: S,
    options: { optional: true },
  ): Promise<z.output<S> | undefined>;
  private async readFacet<S extends ZodTypeAny>(
    file: string,
    schema: S,
    options: { optional?: boolean } = {},
  ): Promise<z.output<S> | undefined> {
    const path = join(this.sessionDir, file);
    const result = await readJson(path, schema);
    switch (result.status) {
      case 'ok':
        return result.value;
      case 'missing':
        if (options.optional) return undefined;
        throw new SnapshotMissingError(
          file === FILES.manifest
            ? `No saved session in ${this.sessionDir}`
            : `Saved session is incomplete: ${file} is missing`,
        );
      case 'invalid':
        throw new SnapshotMissingError(`Saved session is unreadable: ${file}: ${result.reason}`);
    }
  }
}
