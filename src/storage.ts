import chalk from 'chalk';
import type { CommandRunner } from './shell.js';
import { formatDatePath, type BenchDate } from './dates.js';

export interface CopyOptions {
  recursive?: boolean;
  /** gsutil -m */
  parallel?: boolean;
}

export function gsUri(bucket: string, path: string): string {
  return `gs://${bucket}/${path}`;
}

/** bazel/2019/08/01 */
export function datedSubdir(project: string, date: BenchDate): string {
  return `${project}/${formatDatePath(date)}`;
}

/** Object storage operations through the gsutil CLI. */
export class GsutilStorage {
  constructor(private runner: CommandRunner, private debug = false) {}

  static copyArgs(source: string, destination: string, options: CopyOptions = {}): string[] {
    const args: string[] = [];
    if (options.parallel) args.push('-m');
    args.push('cp');
    if (options.recursive) args.push('-r');
    args.push(source, destination);
    return args;
  }

  async copy(source: string, destination: string, options: CopyOptions = {}): Promise<void> {
    await this.runner.run('gsutil', GsutilStorage.copyArgs(source, destination, options));
    if (this.debug) {
      console.error(chalk.dim(`  copied ${source} → ${destination}`));
    }
  }
}
