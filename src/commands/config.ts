import { Command } from 'commander';
import { getConfigPath, loadConfig } from '../config.js';
import type { GlobalOptions } from '../context.js';
import { detectFormat, outputSingle } from '../output.js';

export function register(program: Command): void {
  const cmd = program
    .command('config')
    .description('Inspect CLI configuration');

  cmd
    .command('show')
    .description('Print the resolved configuration')
    .action(function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions>();
      const config = loadConfig(opts.config);
      const format = detectFormat(opts);
      outputSingle(
        {
          ...config,
          projects: config.projects.map((project) => project.storageSubdir),
          platforms: Object.keys(config.platforms),
        },
        { format, idField: 'reportsDirectory' }
      );
    });

  cmd
    .command('path')
    .description('Print config file location')
    .action(function (this: Command) {
      console.log(getConfigPath(this.optsWithGlobals<GlobalOptions>().config));
    });
}
