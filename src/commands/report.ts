import { Command, Option } from 'commander';
import chalk from 'chalk';
import { resolveStorageBucket, type BenchConfig } from '../config.js';
import { collect, createRuntime, type CommandDeps, type GlobalOptions } from '../context.js';
import { resolveDate, type BenchDate } from '../dates.js';
import { BenchError, ConfigError, errorMessage, ReportFailuresError } from '../errors.js';
import { generateReportForDate, type ReportDeps, type ReportResult } from '../generate.js';
import { detectFormat, outputList } from '../output.js';

type ReportOptions = GlobalOptions & {
  date?: string;
  project: string[];
  storageBucket?: string;
  storage_bucket?: string;
  reportName?: string;
  report_name?: string;
  upload: boolean;
};

export interface ReportBatch {
  projects: string[];
  date: BenchDate;
  bucket: string;
  reportName: string;
  upload: boolean;
}

export type ReportOutcome =
  | { project: string; ok: true; result: ReportResult }
  | { project: string; ok: false; error: unknown };

/** One report per project; a failing project does not stop the others. */
export async function runReports(batch: ReportBatch, config: BenchConfig, deps: ReportDeps): Promise<ReportOutcome[]> {
  const outcomes: ReportOutcome[] = [];
  for (const project of batch.projects) {
    try {
      const result = await generateReportForDate(
        { project, date: batch.date, bucket: batch.bucket, reportName: batch.reportName, upload: batch.upload },
        config,
        deps
      );
      outcomes.push({ project, ok: true, result });
    } catch (error) {
      outcomes.push({ project, ok: false, error });
    }
  }
  return outcomes;
}

function describeFailure(project: string, error: unknown): string {
  const detail = error instanceof BenchError ? error.display() : chalk.red(`Error: ${errorMessage(error)}`);
  return `${chalk.bold(`[${project}]`)}\n${detail}`;
}

export function register(program: Command, deps: CommandDeps = {}): void {
  program
    .command('report')
    .description('Generate the daily HTML report for one or more projects')
    .option('--date <date>', 'Date of the runs, YYYY-MM-DD (default: today)')
    .option('--project <label>', 'Project storage label (repeatable)', collect, [])
    .option('--storage-bucket <bucket>', 'Bucket holding the results; also the upload destination')
    .addOption(new Option('--storage_bucket <bucket>').hideHelp())
    .option('--report-name <name>', 'File name of the uploaded report, without .html')
    .addOption(new Option('--report_name <name>').hideHelp())
    .option('--no-upload', 'Write the report locally only')
    .action(async function (this: Command) {
      const opts = this.optsWithGlobals<ReportOptions>();
      const runtime = createRuntime(opts, deps);
      const format = detectFormat(opts);

      if (opts.project.length === 0) {
        throw new ConfigError('At least one --project is required');
      }
      const bucket = resolveStorageBucket(opts.storageBucket ?? opts.storage_bucket);
      if (!bucket) {
        throw new ConfigError('No storage bucket configured. Pass --storage-bucket or set BENCH_STORAGE_BUCKET');
      }

      const outcomes = await runReports(
        {
          projects: opts.project,
          date: resolveDate(opts.date),
          bucket,
          reportName: opts.reportName ?? opts.report_name ?? 'report',
          upload: opts.upload,
        },
        runtime.config,
        runtime
      );

      const failed: string[] = [];
      for (const outcome of outcomes) {
        if (outcome.ok) {
          const where = outcome.result.uploadedTo ?? outcome.result.path;
          console.error(chalk.green(`✓ ${outcome.project}: ${where}`));
        } else {
          failed.push(outcome.project);
          console.error(describeFailure(outcome.project, outcome.error));
        }
      }

      outputList(
        outcomes.map((outcome) => outcome.ok
          ? {
            project: outcome.project,
            status: 'ok',
            platforms: outcome.result.platforms,
            path: outcome.result.path,
            uploaded_to: outcome.result.uploadedTo ?? '',
          }
          : { project: outcome.project, status: 'failed', error: errorMessage(outcome.error) }),
        { format, columns: ['project', 'status', 'platforms', 'path', 'uploaded_to'], idField: 'project' }
      );

      if (failed.length > 0) {
        throw new ReportFailuresError(failed);
      }
    });
}
