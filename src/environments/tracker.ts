/**
 * Baseline tracker: one scan cycle runs
 * CAPTURE_CURRENT → COMPARE → EMIT_CHANGES → REPLACE_BASELINE.
 *
 * The first cycle (no readable baseline) only establishes the baseline.
 * A detector that fails keeps its previously recorded environments, so a
 * transient tool failure never reads as every environment being deleted.
 *
 * @module environments/tracker
 */

import type { Logger } from '../logging/logger.js';
import type { ClassifiedChange } from '../changes/types.js';
import { changeLabel } from '../changes/types.js';
import { scoreChange } from '../changes/scorer.js';
import type { BaselineStore } from './baseline-store.js';
import { diffInventories, sortEnvironments } from './differ.js';
import type {
  Baseline,
  DetectionResult,
  EnvironmentDescriptor,
  EnvironmentDetector,
  EnvironmentType,
} from './types.js';
import { DependencyMissingError, isAbortError, toError } from '../errors.js';

export interface DetectorFailure {
  type: EnvironmentType;
  missing: boolean;
  message: string;
}

export interface ScanResult {
  /** True when there was no previous baseline to compare against. */
  firstRun: boolean;
  baseline: Baseline;
  changes: ClassifiedChange[];
  detections: DetectionResult[];
  failures: DetectorFailure[];
}

export interface ScanOptions {
  signal?: AbortSignal;
  /** Receives each change in order before the baseline is replaced. */
  emit?: (change: ClassifiedChange) => Promise<void>;
}

export interface BaselineTrackerOptions {
  detectors: readonly EnvironmentDetector[];
  store: BaselineStore;
  logger: Logger;
  now?: () => Date;
}

export class BaselineTracker {
  private readonly detectors: readonly EnvironmentDetector[];
  private readonly store: BaselineStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: BaselineTrackerOptions) {
    this.detectors = options.detectors;
    this.store = options.store;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /** Detect without comparing or persisting anything. */
  async detectAll(signal?: AbortSignal): Promise<{ detections: DetectionResult[]; failures: DetectorFailure[] }> {
    const detections: DetectionResult[] = [];
    const failures: DetectorFailure[] = [];

    for (const detector of this.detectors) {
      signal?.throwIfAborted();
      try {
        detections.push(await detector.detect(signal));
      } catch (err) {
        if (isAbortError(err)) throw err;
        const error = toError(err);
        const missing = error instanceof DependencyMissingError;
        if (missing) {
          this.logger.debug(`Skipping ${detector.type}: ${error.message}`);
        } else {
          this.logger.warn(`${detector.type} detection failed: ${error.message}`);
        }
        failures.push({ type: detector.type, missing, message: error.message });
      }
    }
    return { detections, failures };
  }

  async scan(options: ScanOptions = {}): Promise<ScanResult> {
    const { signal, emit } = options;
    // Capture current
    const previous = await this.store.load();
    const { detections, failures } = await this.detectAll(signal);

    const current: EnvironmentDescriptor[] = detections.flatMap((d) => d.environments);
    if (previous) {
      const failed = new Set(failures.map((f) => f.type));
      current.push(...previous.environments.filter((e) => failed.has(e.type)));
    }

    // Compare
    const time = this.now().toISOString();
    const changes: ClassifiedChange[] = [];
    if (previous) {
      const { added, removed } = diffInventories(previous.environments, current);
      for (const id of added) changes.push(baselineChange(id, 'create', time));
      for (const id of removed) changes.push(baselineChange(id, 'delete', time));
    }

    // Emit changes
    for (const change of changes) {
      signal?.throwIfAborted();
      this.logger.info(`Environment change ${changeLabel(change)} (impact ${change.score})`);
      if (emit) await emit(change);
    }

    // Replace baseline
    const baseline: Baseline = { timestamp: time, environments: sortEnvironments(current) };
    await this.store.replace(baseline);

    if (!previous) {
      this.logger.info(`Established environment baseline with ${current.length} environment(s)`);
    }
    return { firstRun: previous === null, baseline, changes, detections, failures };
  }
}

function baselineChange(id: string, kind: 'create' | 'delete', time: string): ClassifiedChange {
  const changeType = kind === 'create' ? 'environment_created' : 'environment_deleted';
  return {
    path: id,
    kind,
    time,
    changeType,
    score: scoreChange(changeType, id),
    source: 'baseline',
  };
}
