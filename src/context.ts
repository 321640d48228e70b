import { StorageClient } from './client.js';
import { isDebugEnabled, loadConfig, type BenchConfig } from './config.js';
import { ProcessRunner, type CommandRunner } from './shell.js';
import { GsutilStorage } from './storage.js';
import type { OutputOptions } from './types.js';

export type GlobalOptions = OutputOptions & {
  config?: string;
  debug?: boolean;
};

/** Collaborators a command may take from its caller instead of building its own. */
export interface CommandDeps {
  runner?: CommandRunner;
}

export interface Runtime {
  config: BenchConfig;
  debug: boolean;
  runner: CommandRunner;
  client: StorageClient;
  storage: GsutilStorage;
}

export function createRuntime(opts: GlobalOptions, deps: CommandDeps = {}): Runtime {
  const config = loadConfig(opts.config);
  const debug = isDebugEnabled(opts.debug);
  const runner = deps.runner ?? new ProcessRunner(debug);
  return {
    config,
    debug,
    runner,
    client: new StorageClient({ timeoutMs: config.fetchTimeoutMs, debug }),
    storage: new GsutilStorage(runner, debug),
  };
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
