/**
 * Runtime wired to in-process fakes under a temp home, for CLI tests.
 */

import { createRuntime } from '../../index.js';
import type { Runtime, RuntimeOptions } from '../../index.js';
import { resolvePaths } from '../../config/paths.js';
import { DEFAULT_CONFIG } from '../../config/schema.js';
import type { Config } from '../../config/schema.js';
import { silentLogger } from '../../logging/logger.js';
import { NullNotifier } from '../../notify/notifier.js';
import { FakeCompositor } from '../../compositor/__fixtures__/fake-compositor.js';
import { FakeWatchSource } from '../../daemon/__fixtures__/fake-watch-source.js';
import type { CommandRunner } from '../../environments/detectors.js';

export const missingTool: CommandRunner = async (file) => {
  throw Object.assign(new Error(`spawn ${file} ENOENT`), { code: 'ENOENT' });
};

export interface TestRuntimeOptions {
  compositor?: FakeCompositor;
  configure?: (config: Config) => void;
  run?: CommandRunner;
  overrides?: Partial<Omit<RuntimeOptions, 'paths' | 'config'>>;
}

export interface TestRuntime {
  runtime: Runtime;
  compositor: FakeCompositor;
  watchSource: FakeWatchSource;
  spawned: number[];
}

export function testRuntime(home: string, options: TestRuntimeOptions = {}): TestRuntime {
  const config = structuredClone(DEFAULT_CONFIG);
  config.notifications.enabled = false;
  config.restore.readiness_attempts = 2;
  config.restore.window_poll_attempts = 1;
  options.configure?.(config);

  const compositor = options.compositor ?? new FakeCompositor();
  const watchSource = new FakeWatchSource();
  const spawned: number[] = [];

  const runtime = createRuntime({
    paths: resolvePaths(home),
    config,
    logger: silentLogger,
    env: { HOME: home },
    compositor,
    resolveCommand: async (_pid, windowClass) => windowClass.toLowerCase(),
    locateCommand: async () => true,
    detectorDeps: { run: options.run ?? missingTool, env: {}, home },
    notifier: new NullNotifier(),
    watchSource: watchSource.source,
    spawnDaemon: async () => {
      // A pid no live process has
      const pid = 999_990 + spawned.length;
      spawned.push(pid);
      return pid;
    },
    sleep: async () => {},
    ...options.overrides,
  });

  return { runtime, compositor, watchSource, spawned };
}
