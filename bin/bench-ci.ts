#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { BenchError } from '../src/errors.js';

import { register as registerReport } from '../src/commands/report.js';
import { register as registerPipeline } from '../src/commands/pipeline.js';
import { register as registerSetup } from '../src/commands/setup.js';
import { register as registerProjects } from '../src/commands/projects.js';
import { register as registerConfig } from '../src/commands/config.js';

function loadCliVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    const packageJson: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
    if (
      typeof packageJson === 'object' && packageJson !== null &&
      'version' in packageJson && typeof packageJson.version === 'string' && packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
  } catch {
    // Fall through to static default.
  }
  return '0.1.0';
}

// Global error handler
function handleError(err: unknown): never {
  const jsonMode = program.opts().json || !process.stdout.isTTY;

  if (err instanceof BenchError) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: err.type, message: err.message }));
    } else {
      console.error(err.display());
    }
    process.exit(err.exitCode);
  }
  if (err instanceof Error) {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: err.message }));
    } else {
      console.error(chalk.red(`Error: ${err.message}`));
      if (process.env.BENCH_DEBUG || program.opts().debug) {
        console.error(err.stack);
      }
    }
  } else {
    if (jsonMode) {
      console.error(JSON.stringify({ error: true, type: 'unknown_error', message: 'An unexpected error occurred' }));
    } else {
      console.error(chalk.red('An unexpected error occurred'));
    }
  }
  process.exit(1);
}

program
  .name('bench-ci')
  .version(loadCliVersion())
  .description('Benchmark CI pipeline generator and daily report builder.')
  .option('--config <path>', 'Config file (default: config/default.json)')
  .option('--json', 'Force JSON output')
  .option('--table', 'Force table output')
  .option('--csv', 'Force CSV output')
  .option('-q, --quiet', 'Only output identifiers')
  .option('--no-color', 'Disable colors')
  .option('--debug', 'Print requests and external commands to stderr');

if (process.argv.includes('--no-color')) {
  process.env.NO_COLOR = '1';
}

registerReport(program);
registerPipeline(program);
registerSetup(program);
registerProjects(program);
registerConfig(program);

program.parseAsync(process.argv).catch(handleError);

process.on('uncaughtException', handleError);
process.on('unhandledRejection', handleError);
