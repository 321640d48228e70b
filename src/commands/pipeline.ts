import { Command } from 'commander';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { serializePipeline, uploadPipeline } from '../buildkite.js';
import { resolveStorageBucket } from '../config.js';
import { createRuntime, type CommandDeps, type GlobalOptions } from '../context.js';
import { resolveDate } from '../dates.js';
import { CommandError, ConfigError } from '../errors.js';
import { buildPipelinePlan, type ProjectPlan } from '../pipeline.js';
import type { GsutilStorage } from '../storage.js';

type PipelineCommandOptions = GlobalOptions & {
  date?: string;
  bucket?: string;
  binaries?: string;
  benchOptions: string;
  reportName: string;
  updateLatest?: boolean;
  dryRun?: boolean;
};

export function parseBinaries(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((binary) => binary.trim())
    .filter((binary) => binary.length > 0);
}

/**
 * Writes a project's METADATA to a scratch file and copies it to the bucket.
 * A failed copy is reported but does not stop the pipeline.
 */
export async function publishMetadata(plan: ProjectPlan, storage: GsutilStorage, scratchDir: string): Promise<boolean> {
  const localPath = join(scratchDir, `${plan.project.storageSubdir}-metadata`);
  await writeFile(localPath, JSON.stringify(plan.metadata), 'utf-8');
  try {
    await storage.copy(localPath, plan.metadataDestination);
  } catch (err) {
    if (!(err instanceof CommandError)) throw err;
    console.error(chalk.yellow(`Warning: could not upload METADATA for ${plan.project.storageSubdir}: ${err.message}`));
    return false;
  }
  console.error(chalk.green(`Uploaded ${plan.project.storageSubdir}'s METADATA to ${plan.metadataDestination}.`));
  return true;
}

export function register(program: Command, deps: CommandDeps = {}): void {
  program
    .command('pipeline')
    .description('Emit the benchmark pipeline steps and upload them to the CI agent')
    .option('--date <date>', 'Date of the commits, YYYY-MM-DD (default: today)')
    .option('--bucket <bucket>', 'Bucket that receives results, METADATA and reports')
    .option('--binaries <names>', 'Comma-separated binary names to benchmark')
    .option('--bench-options <options>', 'Extra options passed to the benchmark tool', '')
    .option('--report-name <name>', 'File name of the generated report, without .html', 'report')
    .option('--update-latest', 'Also copy the report to <project>/report_latest.html')
    .option('--dry-run', 'Print the pipeline without uploading anything')
    .action(async function (this: Command) {
      const opts = this.optsWithGlobals<PipelineCommandOptions>();
      const runtime = createRuntime(opts, deps);

      const bucket = resolveStorageBucket(opts.bucket);
      if (!bucket) {
        throw new ConfigError('No bucket configured. Pass --bucket or set BENCH_STORAGE_BUCKET');
      }
      const binaries = parseBinaries(opts.binaries);
      if (binaries.length === 0) {
        throw new ConfigError('At least one binary is required (--binaries=a,b)');
      }

      const plan = buildPipelinePlan(runtime.config, {
        date: resolveDate(opts.date),
        bucket,
        binaries,
        benchOptions: opts.benchOptions,
        reportName: opts.reportName,
        updateLatest: Boolean(opts.updateLatest),
      });

      console.log(serializePipeline(plan.pipeline));
      if (opts.dryRun) return;

      const scratchDir = await mkdtemp(join(tmpdir(), 'bench-ci-'));
      try {
        for (const project of plan.projects) {
          await publishMetadata(project, runtime.storage, scratchDir);
        }
      } finally {
        await rm(scratchDir, { recursive: true, force: true });
      }
      await uploadPipeline(runtime.runner, plan.pipeline);
      console.error(chalk.green(`Uploaded ${plan.pipeline.steps.length} pipeline step(s).`));
    });
}
