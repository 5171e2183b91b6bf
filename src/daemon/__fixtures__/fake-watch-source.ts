/**
 * In-process stand-in for the platform directory watcher.
 */

import { BoundedChannel } from '../channel.js';
import type { RawWatchEvent, WatchSource, WatchSourceOptions } from '../watch-manager.js';

export class FakeWatchStream implements AsyncIterable<RawWatchEvent> {
  private readonly queue = new BoundedChannel<RawWatchEvent>(1000);
  private error: Error | null = null;

  constructor(
    readonly directory: string,
    readonly options: WatchSourceOptions,
  ) {}

  get aborted(): boolean {
    return this.options.signal.aborted;
  }

  emit(eventType: RawWatchEvent['eventType'], filename: string | null): void {
    this.queue.offer({ eventType, filename });
  }

  /** End the stream as if the watcher had gone away. */
  end(): void {
    this.queue.close();
  }

  crash(error: Error): void {
    this.error = error;
    this.queue.close();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawWatchEvent> {
    for (;;) {
      const next = await this.queue.receive(this.options.signal);
      if (next === undefined) {
        if (this.error) throw this.error;
        return;
      }
      yield next;
    }
  }
}

export class FakeWatchSource {
  readonly opened: FakeWatchStream[] = [];
  /** Directories whose watch cannot even be opened. */
  readonly refused = new Set<string>();

  readonly source: WatchSource = (directory, options) => {
    if (this.refused.has(directory)) {
      throw Object.assign(new Error(`ENOSPC: no watches left for ${directory}`), { code: 'ENOSPC' });
    }
    const stream = new FakeWatchStream(directory, options);
    this.opened.push(stream);
    return stream;
  };

  /** Most recently opened stream for `directory`. */
  latest(directory: string): FakeWatchStream {
    const stream = this.opened.filter((s) => s.directory === directory).at(-1);
    if (!stream) throw new Error(`No watch opened for ${directory}`);
    return stream;
  }
}

/** Resolve after pending microtasks and one macrotask have run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/** Poll `condition` until it holds, failing after `timeoutMs`. */
export async function waitFor(condition: () => Promise<boolean> | boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
