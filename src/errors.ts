/**
 * Error taxonomy for layout-keeper.
 *
 * Every error raised by the orchestrator or the daemon derives from
 * {@link LayoutKeeperError} and carries a `code` discriminant so callers
 * can branch without `instanceof` chains. None of these is fatal to the
 * daemon process; see the individual classes for how each is handled.
 *
 * @module errors
 */

export type ErrorCode =
  | 'CONFIGURATION'
  | 'DEPENDENCY_MISSING'
  | 'COMPOSITOR_UNREACHABLE'
  | 'COMPOSITOR_COMMAND'
  | 'CAPTURE_FAILURE'
  | 'SAVE_IN_PROGRESS'
  | 'SNAPSHOT_MISSING'
  | 'HOOK_FAILURE'
  | 'WATCH_FAILURE'
  | 'RESTORE_MISMATCH'
  | 'DAEMON_CONTROL';

/** Base class for all layout-keeper errors. */
export class LayoutKeeperError extends Error {
  override name = 'LayoutKeeperError';
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, cause?: Error) {
    super(message);
    this.code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/** An invalid setting. The offending value falls back to its default. */
export class ConfigurationError extends LayoutKeeperError {
  override name = 'ConfigurationError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super('CONFIGURATION', message);
  }
}

/** A required external tool is absent; the dependent feature is skipped. */
export class DependencyMissingError extends LayoutKeeperError {
  override name = 'DependencyMissingError' as const;

  constructor(public readonly dependency: string, message?: string) {
    super('DEPENDENCY_MISSING', message ?? `Required tool not found: ${dependency}`);
  }
}

/** The compositor IPC socket could not be reached or answered garbage. */
export class CompositorUnreachableError extends LayoutKeeperError {
  override name = 'CompositorUnreachableError' as const;

  constructor(message: string, cause?: Error) {
    super('COMPOSITOR_UNREACHABLE', message, cause);
  }
}

/** The compositor answered a dispatch with something other than `ok`. */
export class CompositorCommandError extends LayoutKeeperError {
  override name = 'CompositorCommandError' as const;

  constructor(
    public readonly command: string,
    public readonly reply: string,
  ) {
    super('COMPOSITOR_COMMAND', `Compositor rejected "${command}": ${reply}`);
  }
}

/** A save was aborted; the previously stored snapshot is still valid. */
export class CaptureFailureError extends LayoutKeeperError {
  override name = 'CaptureFailureError' as const;

  constructor(message: string, cause?: Error) {
    super('CAPTURE_FAILURE', message, cause);
  }
}

/** Another process holds the snapshot store lock past the wait bound. */
export class SaveInProgressError extends LayoutKeeperError {
  override name = 'SaveInProgressError' as const;

  constructor(message: string) {
    super('SAVE_IN_PROGRESS', message);
  }
}

/** No snapshot has been stored yet, or the stored one is unreadable. */
export class SnapshotMissingError extends LayoutKeeperError {
  override name = 'SnapshotMissingError' as const;

  constructor(message: string, cause?: Error) {
    super('SNAPSHOT_MISSING', message, cause);
  }
}

/** A hook exited non-zero, timed out, or could not be started. */
export class HookFailureError extends LayoutKeeperError {
  override name = 'HookFailureError' as const;

  constructor(
    public readonly hookName: string,
    message: string,
  ) {
    super('HOOK_FAILURE', message);
  }
}

/** A watch worker died; the health check returns its watch to STOPPED. */
export class WatchFailureError extends LayoutKeeperError {
  override name = 'WatchFailureError' as const;

  constructor(
    public readonly directory: string,
    message: string,
    cause?: Error,
  ) {
    super('WATCH_FAILURE', message, cause);
  }
}

/** Fewer windows are present after a restore than the snapshot recorded. */
export class RestoreMismatch extends LayoutKeeperError {
  override name = 'RestoreMismatch' as const;

  constructor(
    public readonly expected: number,
    public readonly present: number,
  ) {
    super(
      'RESTORE_MISMATCH',
      `Restored ${present} of ${expected} windows`,
    );
  }
}

/** `daemon start` on a running daemon without `--force`, or a daemon that would not start. */
export class DaemonControlError extends LayoutKeeperError {
  override name = 'DaemonControlError' as const;

  constructor(message: string) {
    super('DAEMON_CONTROL', message);
  }
}

/** Normalize a caught value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** True when `err` is the rejection produced by an aborted AbortSignal. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/** Read the errno code off a Node system error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
