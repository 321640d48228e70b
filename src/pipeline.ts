import { storageUrl } from './client.js';
import type { BenchConfig, ProjectDefinition } from './config.js';
import { formatIsoDate, type BenchDate } from './dates.js';
import { commandStep, type CommandStep, type Pipeline, type PipelineStep } from './buildkite.js';
import { buildMetadata, type BenchMetadata } from './metadata.js';
import { datedSubdir, GsutilStorage, gsUri } from './storage.js';
import { formatCommand } from './shell.js';

export interface PipelineOptions {
  date: BenchDate;
  bucket: string;
  /** Binary names as stored in the binaries bucket. */
  binaries: string[];
  benchOptions: string;
  reportName: string;
  updateLatest: boolean;
}

export interface ProjectPlan {
  project: ProjectDefinition;
  platforms: string[];
  metadata: BenchMetadata;
  metadataDestination: string;
}

export interface PipelinePlan {
  pipeline: Pipeline;
  projects: ProjectPlan[];
}

/** Platforms the project runs on, filtered by the allowlist, first occurrence kept. */
export function enumeratePlatforms(project: ProjectDefinition, allowlist?: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const platform of project.platforms) {
    if (allowlist && !allowlist.includes(platform)) continue;
    seen.add(platform);
  }
  return [...seen];
}

/** A local mirror of the repository when one is configured, else the repository URL. */
export function resolveSourcePath(repository: string, mirrors: Record<string, string>): string {
  return mirrors[repository] ?? repository;
}

function platformQueue(config: BenchConfig, platform: string): string {
  return config.platforms[platform]?.queue ?? 'default';
}

function platformLabel(config: BenchConfig, platform: string): string {
  return config.platforms[platform]?.emoji || platform;
}

export function benchmarkCommand(
  config: BenchConfig,
  project: ProjectDefinition,
  platform: string,
  options: Pick<PipelineOptions, 'binaries' | 'benchOptions'>
): string {
  const binaryPaths = options.binaries.map((binary) => `~/${binary}`);
  return [
    config.benchmarkCommand,
    `--bazel_binaries=${binaryPaths.join(',')}`,
    `--bazel_source=${resolveSourcePath(config.benchmarkRepository, config.mirrors)}`,
    `--project_source=${resolveSourcePath(project.gitRepository, config.mirrors)}`,
    `--platform=${platform}`,
    '--collect_memory',
    `--data_directory=${config.dataDirectory}`,
    `--csv_file_name=${config.resultFileName}`,
    '--collect_json_profile',
    '--aggregate_json_profiles',
    options.benchOptions,
    '--',
    project.command,
  ]
    .filter((part) => part.length > 0)
    .join(' ');
}

/** Sets up the agent, benchmarks every binary and uploads the raw results. */
export function benchmarkStep(
  config: BenchConfig,
  project: ProjectDefinition,
  platform: string,
  options: PipelineOptions
): CommandStep {
  const resultsDestination = gsUri(options.bucket, `${datedSubdir(project.storageSubdir, options.date)}/${platform}/`);
  const commands = [
    `${config.cliCommand} setup --platform=${platform} --source=${config.binariesSource}`,
    benchmarkCommand(config, project, platform, options),
    formatCommand(
      'gsutil',
      GsutilStorage.copyArgs(`${config.dataDirectory}/*`, resultsDestination, { parallel: true, recursive: true })
    ),
  ];
  return commandStep(
    `${platformLabel(config, platform)} Running benchmark on project: ${project.name}`,
    commands,
    platformQueue(config, platform)
  );
}

export function reportStep(
  config: BenchConfig,
  project: ProjectDefinition,
  options: PipelineOptions
): CommandStep {
  const isoDate = formatIsoDate(options.date);
  const commands = [
    [
      config.cliCommand,
      'report',
      `--date=${isoDate}`,
      `--project=${project.storageSubdir}`,
      `--storage-bucket=${options.bucket}`,
      `--report-name=${options.reportName}`,
    ].join(' '),
  ];

  // Storage has no symlinks, so "latest" is a copy at a fixed path.
  if (options.updateLatest) {
    const dated = gsUri(options.bucket, `${datedSubdir(project.storageSubdir, options.date)}/${options.reportName}.html`);
    const latest = gsUri(options.bucket, `${project.storageSubdir}/report_latest.html`);
    commands.push(formatCommand('gsutil', GsutilStorage.copyArgs(dated, latest)));
  }

  return commandStep(
    `Generating report on ${isoDate} for project: ${project.storageSubdir}.`,
    commands,
    platformQueue(config, config.reportPlatform)
  );
}

export function buildPipelinePlan(config: BenchConfig, options: PipelineOptions): PipelinePlan {
  const steps: PipelineStep[] = [];
  const projects: ProjectPlan[] = [];

  for (const project of config.projects) {
    if (!project.active) continue;

    const platforms = enumeratePlatforms(project, config.platformAllowlist);
    for (const platform of platforms) {
      steps.push(benchmarkStep(config, project, platform, options));
    }

    const subdir = datedSubdir(project.storageSubdir, options.date);
    projects.push({
      project,
      platforms,
      metadata: buildMetadata({
        projectLabel: project.storageSubdir,
        projectSource: project.gitRepository,
        command: project.command,
        dataRoot: storageUrl(config.storageHost, options.bucket, subdir),
        platforms,
        binaries: options.binaries,
        resultFileName: config.resultFileName,
        profilesFileName: config.profilesFileName,
      }),
      metadataDestination: gsUri(options.bucket, `${subdir}/METADATA`),
    });

    // The report only runs once every benchmark step above has passed.
    steps.push('wait');
    steps.push(reportStep(config, project, options));
  }

  return { pipeline: { steps }, projects };
}
