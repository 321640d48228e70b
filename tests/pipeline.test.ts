import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import test from 'node:test';
import { register as registerPipeline, parseBinaries } from '../src/commands/pipeline.ts';
import { resolveConfig } from '../src/config.ts';
import {
  benchmarkCommand,
  benchmarkStep,
  buildPipelinePlan,
  enumeratePlatforms,
  reportStep,
  resolveSourcePath,
  type PipelineOptions,
} from '../src/pipeline.ts';
import { createProgram, FakeRunner, runCli, writeTempConfig } from './cli-test-helpers.ts';

const CONFIG_FILE = {
  projects: [
    {
      name: 'Demo',
      storageSubdir: 'demo',
      gitRepository: 'https://example.com/demo.git',
      command: 'build //...',
      platforms: ['ubuntu1804', 'macos', 'windows', 'macos'],
    },
    {
      name: 'Retired',
      storageSubdir: 'retired',
      gitRepository: 'https://example.com/retired.git',
      command: 'build //...',
      active: false,
      platforms: ['ubuntu1804'],
    },
  ],
  platforms: {
    ubuntu1804: { emoji: ':ubuntu:', queue: 'linux' },
    macos: { emoji: ':darwin:', queue: 'mac' },
  },
  platformAllowlist: ['ubuntu1804', 'macos'],
  reportPlatform: 'ubuntu1804',
  benchmarkRepository: 'https://example.com/tool.git',
  dataDirectory: '/tmp/out',
};

const OPTIONS: PipelineOptions = {
  date: { year: 2019, month: 8, day: 1 },
  bucket: 'results',
  binaries: ['bin-a', 'bin-b'],
  benchOptions: '',
  reportName: 'report',
  updateLatest: false,
};

const config = resolveConfig(CONFIG_FILE, {});
const demo = config.projects[0];

test('enumeratePlatforms filters by the allowlist and drops duplicates', () => {
  assert.deepEqual(enumeratePlatforms(demo, config.platformAllowlist), ['ubuntu1804', 'macos']);
  assert.deepEqual(enumeratePlatforms(demo), ['ubuntu1804', 'macos', 'windows']);
});

test('resolveSourcePath prefers a configured mirror', () => {
  const mirrors = { 'https://example.com/demo.git': '/var/lib/gitmirrors/demo' };
  assert.equal(resolveSourcePath('https://example.com/demo.git', mirrors), '/var/lib/gitmirrors/demo');
  assert.equal(resolveSourcePath('https://example.com/other.git', mirrors), 'https://example.com/other.git');
});

test('benchmarkCommand passes binaries, sources and output settings to the tool', () => {
  assert.equal(
    benchmarkCommand(config, demo, 'macos', { binaries: ['bin-a', 'bin-b'], benchOptions: '' }),
    'bazel run benchmark -- --bazel_binaries=~/bin-a,~/bin-b --bazel_source=https://example.com/tool.git ' +
      '--project_source=https://example.com/demo.git --platform=macos --collect_memory --data_directory=/tmp/out ' +
      '--csv_file_name=perf_data.csv --collect_json_profile --aggregate_json_profiles -- build //...',
  );
});

test('benchmarkCommand appends extra options before the project command', () => {
  const command = benchmarkCommand(config, demo, 'macos', { binaries: ['bin-a'], benchOptions: '--runs=5' });
  assert.ok(command.endsWith('--aggregate_json_profiles --runs=5 -- build //...'));
});

test('benchmarkStep sets up, benchmarks and uploads results for one platform', () => {
  const step = benchmarkStep(config, demo, 'macos', OPTIONS);
  assert.equal(step.label, ':darwin: Running benchmark on project: Demo');
  assert.deepEqual(step.agents, { queue: 'mac' });
  assert.equal(step.commands.length, 3);
  assert.equal(step.commands[0], 'bench-ci setup --platform=macos --source=gs://perf.bazel.build/bazelbins/*');
  assert.equal(step.commands[2], 'gsutil -m cp -r /tmp/out/* gs://results/demo/2019/08/01/macos/');
});

test('reportStep runs the report on the report platform', () => {
  const step = reportStep(config, demo, OPTIONS);
  assert.equal(step.label, 'Generating report on 2019-08-01 for project: demo.');
  assert.deepEqual(step.agents, { queue: 'linux' });
  assert.deepEqual(step.commands, [
    'bench-ci report --date=2019-08-01 --project=demo --storage-bucket=results --report-name=report',
  ]);
});

test('reportStep copies the report to the latest path when asked', () => {
  const step = reportStep(config, demo, { ...OPTIONS, updateLatest: true });
  assert.equal(step.commands[1], 'gsutil cp gs://results/demo/2019/08/01/report.html gs://results/demo/report_latest.html');
});

test('buildPipelinePlan orders benchmark steps, a wait barrier, then the report', () => {
  const plan = buildPipelinePlan(config, OPTIONS);
  const labels = plan.pipeline.steps.map((step) => (step === 'wait' ? 'wait' : step.label));

  assert.deepEqual(labels, [
    ':ubuntu: Running benchmark on project: Demo',
    ':darwin: Running benchmark on project: Demo',
    'wait',
    'Generating report on 2019-08-01 for project: demo.',
  ]);
  assert.deepEqual(plan.projects.map((p) => p.project.storageSubdir), ['demo']);
});

test('buildPipelinePlan describes where each platform uploads its results', () => {
  const [plan] = buildPipelinePlan(config, OPTIONS).projects;
  assert.equal(plan.metadataDestination, 'gs://results/demo/2019/08/01/METADATA');
  assert.deepEqual(plan.metadata, {
    name: 'demo',
    project_source: 'https://example.com/demo.git',
    command: 'build //...',
    data_root: 'https://results.storage.googleapis.com/demo/2019/08/01',
    binaries: ['bin-a', 'bin-b'],
    platforms: [
      { platform: 'ubuntu1804', perf_data: 'ubuntu1804/perf_data.csv', aggr_json_profiles: 'ubuntu1804/aggr_json_profiles.csv' },
      { platform: 'macos', perf_data: 'macos/perf_data.csv', aggr_json_profiles: 'macos/aggr_json_profiles.csv' },
    ],
  });
});

test('parseBinaries splits a comma-separated list', () => {
  assert.deepEqual(parseBinaries(' bin-a, bin-b ,,'), ['bin-a', 'bin-b']);
  assert.deepEqual(parseBinaries(undefined), []);
});

test('pipeline --dry-run prints the pipeline and runs nothing', async () => {
  const { path } = writeTempConfig(CONFIG_FILE);
  const runner = new FakeRunner();
  const program = createProgram([(p) => registerPipeline(p, { runner })]);

  const { stdout } = await runCli(program, [
    '--config', path, 'pipeline', '--date=2019-08-01', '--bucket=results', '--binaries=bin-a', '--dry-run',
  ]);

  assert.equal(runner.calls.length, 0);
  const pipeline = JSON.parse(stdout[0]);
  assert.equal(pipeline.steps.length, 4);
  assert.equal(pipeline.steps[2], 'wait');
});

test('pipeline uploads METADATA and then the pipeline', async () => {
  const { path } = writeTempConfig(CONFIG_FILE);
  const runner = new FakeRunner();
  const program = createProgram([(p) => registerPipeline(p, { runner })]);

  await runCli(program, ['--config', path, 'pipeline', '--date=2019-08-01', '--bucket=results', '--binaries=bin-a']);

  assert.deepEqual(runner.calls.map((c) => c.command), ['gsutil', 'buildkite-agent']);
  assert.equal(runner.calls[0].args[0], 'cp');
  assert.ok(runner.calls[0].args[1].endsWith('demo-metadata'));
  assert.equal(runner.calls[0].args[2], 'gs://results/demo/2019/08/01/METADATA');
  assert.deepEqual(runner.calls[1].args, ['pipeline', 'upload']);
});

test('pipeline removes its METADATA scratch directory after uploading', async () => {
  const { path } = writeTempConfig(CONFIG_FILE);
  const runner = new FakeRunner((call) => call.command === 'gsutil');
  const program = createProgram([(p) => registerPipeline(p, { runner })]);

  await runCli(program, ['--config', path, 'pipeline', '--date=2019-08-01', '--bucket=results', '--binaries=bin-a']);

  const scratchDir = dirname(runner.calls[0].args[1]);
  assert.ok(scratchDir.includes('bench-ci-'));
  assert.equal(existsSync(scratchDir), false);
});

test('pipeline still uploads the steps when METADATA upload fails', async () => {
  const { path } = writeTempConfig(CONFIG_FILE);
  const runner = new FakeRunner((call) => call.command === 'gsutil');
  const program = createProgram([(p) => registerPipeline(p, { runner })]);

  const { stderr } = await runCli(program, [
    '--config', path, 'pipeline', '--date=2019-08-01', '--bucket=results', '--binaries=bin-a',
  ]);

  assert.deepEqual(runner.calls.map((c) => c.command), ['gsutil', 'buildkite-agent']);
  assert.ok(stderr.some((line) => line.includes('could not upload METADATA for demo')));
});
