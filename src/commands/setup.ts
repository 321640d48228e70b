import { Command } from 'commander';
import { mkdir } from 'fs/promises';
import chalk from 'chalk';
import { createRuntime, type CommandDeps, type GlobalOptions } from '../context.js';

type SetupOptions = GlobalOptions & {
  platform?: string;
  source?: string;
};

export function register(program: Command, deps: CommandDeps = {}): void {
  program
    .command('setup')
    .description('Copy the binaries to benchmark onto this agent')
    .option('--platform <platform>', 'Platform of this agent')
    .option('--source <uri>', 'Storage URI of the binaries (default: from config)')
    .action(async function (this: Command) {
      const opts = this.optsWithGlobals<SetupOptions>();
      const runtime = createRuntime(opts, deps);
      const source = opts.source || runtime.config.binariesSource;
      const target = runtime.config.binariesDirectory;

      console.error(chalk.dim(`Fetching binaries${opts.platform ? ` for ${opts.platform}` : ''} from ${source}`));
      await mkdir(target, { recursive: true });
      await runtime.storage.copy(source, `${target}/`, { parallel: true, recursive: true });
      console.error(chalk.green(`Binaries copied to ${target}`));
    });
}
