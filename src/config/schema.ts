/**
 * Zod schema for the layout-keeper configuration.
 *
 * Every field has a `.default()` so that `ConfigSchema.parse({})` returns
 * a complete config. Users provide a partial `config.json` (or none) and
 * get sensible behavior for everything they leave out.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Daemon
// ============================================================================

const DaemonSchema = z.object({
  /** Seconds between daemon wake-ups (health check + baseline scan). */
  scan_interval_seconds: z.number().int().min(5).max(86_400).default(60),
  /** Upper bound on simultaneously WATCHING directories. */
  max_watches: z.number().int().min(1).max(100).default(10),
  /** Capacity of the change-event channel between watches and classifier. */
  event_queue_size: z.number().int().min(1).max(10_000).default(256),
  /** Watch subdirectories too. */
  recursive: z.boolean().default(true),
});

// ============================================================================
// Auto-save and notifications
// ============================================================================

const AutoSaveSchema = z.object({
  enabled: z.boolean().default(true),
  /** Minimum impact score that triggers a save (inclusive). */
  impact_threshold: z.number().int().min(0).max(100).default(3),
});

export const UrgencySchema = z.enum(['low', 'normal', 'critical']);

const NotificationsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Urgency for routine notifications; failures are always critical. */
  urgency: UrgencySchema.default('normal'),
});

// ============================================================================
// Environments
// ============================================================================

const EnvironmentsSchema = z.object({
  conda: z.boolean().default(true),
  mamba: z.boolean().default(true),
  venv: z.boolean().default(true),
  pyenv: z.boolean().default(true),
  /** Extra roots scanned for virtual environments. */
  venv_dirs: z.array(z.string().min(1)).default([]),
  /** Directories watched in addition to the detected environment roots. */
  additional_watch_dirs: z.array(z.string().min(1)).default([]),
});

// ============================================================================
// Hooks
// ============================================================================

export const HookPhaseSchema = z.enum(['pre-save', 'post-restore']);

const HookEntrySchema = z.object({
  name: z.string().min(1),
  phase: HookPhaseSchema,
  path: z.string().min(1),
});

const HooksSchema = z.object({
  timeout_seconds: z.number().int().min(1).max(3600).default(30),
  /** Declared hooks run before directory-discovered ones, in this order. */
  entries: z.array(HookEntrySchema).default([]),
});

// ============================================================================
// Restore
// ============================================================================

const RestoreSchema = z.object({
  readiness_attempts: z.number().int().min(1).max(600).default(30),
  readiness_initial_delay_ms: z.number().int().min(0).max(60_000).default(500),
  readiness_max_delay_ms: z.number().int().min(0).max(60_000).default(5000),
  /** Pause between application launches. */
  launch_delay_ms: z.number().int().min(0).max(60_000).default(2000),
  window_poll_attempts: z.number().int().min(1).max(600).default(30),
  window_poll_interval_ms: z.number().int().min(0).max(60_000).default(1000),
});

// ============================================================================
// Logging
// ============================================================================

const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Mirror log lines into <home>/logs/. */
  file: z.boolean().default(true),
  /** Append every classified change to <home>/logs/changes.jsonl. */
  change_log: z.boolean().default(true),
});

// ============================================================================
// Composite
// ============================================================================

export const ConfigSchema = z.object({
  daemon: DaemonSchema.default(() => DaemonSchema.parse({})),
  auto_save: AutoSaveSchema.default(() => AutoSaveSchema.parse({})),
  notifications: NotificationsSchema.default(() => NotificationsSchema.parse({})),
  environments: EnvironmentsSchema.default(() => EnvironmentsSchema.parse({})),
  hooks: HooksSchema.default(() => HooksSchema.parse({})),
  restore: RestoreSchema.default(() => RestoreSchema.parse({})),
  logging: LoggingSchema.default(() => LoggingSchema.parse({})),
});

export type Config = z.infer<typeof ConfigSchema>;
export type HookPhase = z.infer<typeof HookPhaseSchema>;
export type Urgency = z.infer<typeof UrgencySchema>;
export type HookEntry = z.infer<typeof HookEntrySchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
