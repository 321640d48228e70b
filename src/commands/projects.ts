import { Command } from 'commander';
import { createRuntime, type CommandDeps, type GlobalOptions } from '../context.js';
import { detectFormat, outputList } from '../output.js';
import { enumeratePlatforms } from '../pipeline.js';

export function register(program: Command, deps: CommandDeps = {}): void {
  program
    .command('projects')
    .description('List configured projects and the platforms they are benchmarked on')
    .option('--all', 'Include inactive projects')
    .action(async function (this: Command) {
      const opts = this.optsWithGlobals<GlobalOptions & { all?: boolean }>();
      const { config } = createRuntime(opts, deps);

      const rows = config.projects
        .filter((project) => opts.all || project.active)
        .map((project) => ({
          project: project.storageSubdir,
          name: project.name,
          active: project.active,
          command: project.command,
          platforms: enumeratePlatforms(project, config.platformAllowlist),
        }));

      outputList(rows, { format: detectFormat(opts), idField: 'project' });
    });
}
