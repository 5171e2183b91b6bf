/**
 * Set difference between two environment inventories.
 *
 * @module environments/differ
 */

import { environmentId } from './types.js';
import type { EnvironmentDescriptor } from './types.js';

export interface InventoryDiff {
  /** Sorted `"type:name"` ids present now but not before. */
  added: string[];
  /** Sorted `"type:name"` ids present before but not now. */
  removed: string[];
}

export function inventoryIds(environments: readonly EnvironmentDescriptor[]): string[] {
  return [...new Set(environments.map(environmentId))].sort();
}

export function diffInventories(
  previous: readonly EnvironmentDescriptor[],
  current: readonly EnvironmentDescriptor[],
): InventoryDiff {
  const before = new Set(inventoryIds(previous));
  const now = new Set(inventoryIds(current));
  return {
    added: [...now].filter((id) => !before.has(id)),
    removed: [...before].filter((id) => !now.has(id)),
  };
}

function compare(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Stable order for persisting: by type, then name, then path. */
export function sortEnvironments(environments: readonly EnvironmentDescriptor[]): EnvironmentDescriptor[] {
  return [...environments].sort((a, b) =>
    compare(a.type, b.type) || compare(a.name, b.name) || compare(a.path, b.path),
  );
}
