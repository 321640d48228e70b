import assert from 'node:assert/strict';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import test from 'node:test';
import { datedSubdir, GsutilStorage, gsUri } from '../src/storage.ts';
import { register as registerSetup } from '../src/commands/setup.ts';
import { CommandError } from '../src/errors.ts';
import { createProgram, FakeRunner, runCli, writeTempConfig } from './cli-test-helpers.ts';

test('datedSubdir nests the day under the project label', () => {
  assert.equal(datedSubdir('bazel', { year: 2019, month: 8, day: 1 }), 'bazel/2019/08/01');
  assert.equal(gsUri('results', 'bazel/2019/08/01/METADATA'), 'gs://results/bazel/2019/08/01/METADATA');
});

test('copyArgs places -m before cp and -r after it', () => {
  assert.deepEqual(GsutilStorage.copyArgs('a', 'gs://b/c'), ['cp', 'a', 'gs://b/c']);
  assert.deepEqual(
    GsutilStorage.copyArgs('/out/*', 'gs://b/c/', { parallel: true, recursive: true }),
    ['-m', 'cp', '-r', '/out/*', 'gs://b/c/'],
  );
});

test('copy runs gsutil with the copy arguments', async () => {
  const runner = new FakeRunner();
  await new GsutilStorage(runner).copy('/tmp/report.html', 'gs://results/demo/report.html');
  assert.deepEqual(runner.calls, [
    { command: 'gsutil', args: ['cp', '/tmp/report.html', 'gs://results/demo/report.html'], input: undefined },
  ]);
});

test('copy propagates a failing gsutil', async () => {
  const runner = new FakeRunner(() => true);
  await assert.rejects(new GsutilStorage(runner).copy('a', 'gs://b/c'), CommandError);
});

test('setup copies the binaries into the configured directory', async () => {
  const { dir, path } = writeTempConfig();
  const binaries = join(dir, 'bin');
  writeFileSync(path, JSON.stringify({ binariesDirectory: binaries }));
  const runner = new FakeRunner();
  const program = createProgram([(p) => registerSetup(p, { runner })]);

  await runCli(program, ['--config', path, 'setup', '--platform=ubuntu1804', '--source=gs://results/bins/*']);

  assert.equal(existsSync(binaries), true);
  assert.deepEqual(runner.calls.map((c) => c.args), [['-m', 'cp', '-r', 'gs://results/bins/*', `${binaries}/`]]);
});
