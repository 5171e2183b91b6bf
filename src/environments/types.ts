/**
 * Development environment inventory types.
 *
 * @module environments/types
 */

import { z } from 'zod';

export const EnvironmentTypeSchema = z.enum(['conda', 'mamba', 'venv', 'pyenv']);

export const EnvironmentStatusSchema = z.enum(['active', 'available']);

export const EnvironmentDescriptorSchema = z.object({
  type: EnvironmentTypeSchema,
  name: z.string().min(1),
  path: z.string().default(''),
  status: EnvironmentStatusSchema,
}).passthrough();

/** Persisted inventory. Always replaced whole, never patched. */
export const BaselineSchema = z.object({
  timestamp: z.string(),
  environments: z.array(EnvironmentDescriptorSchema),
}).passthrough();

export type EnvironmentType = z.infer<typeof EnvironmentTypeSchema>;
export type EnvironmentStatus = z.infer<typeof EnvironmentStatusSchema>;
export type EnvironmentDescriptor = z.infer<typeof EnvironmentDescriptorSchema>;
export type Baseline = z.infer<typeof BaselineSchema>;

export interface DetectionResult {
  type: EnvironmentType;
  environments: EnvironmentDescriptor[];
  /** Directories whose contents change when environments are added or removed. */
  watchDirs: string[];
}

/**
 * Lists the environments of one manager. Rejects with
 * `DependencyMissingError` when the manager is not installed.
 */
export interface EnvironmentDetector {
  readonly type: EnvironmentType;
  detect(signal?: AbortSignal): Promise<DetectionResult>;
}

/** `"type:name"`, the identity used when diffing inventories. */
export function environmentId(env: Pick<EnvironmentDescriptor, 'type' | 'name'>): string {
  return `${env.type}:${env.name}`;
}
