import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { homedir, tmpdir } from 'os';
import { fileURLToPath } from 'url';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors.js';

dotenv.config();

const PACKAGE_ROOT = join(dirname(fileURLToPath(import.meta.url)), '..');
const DEFAULT_CONFIG_FILE = join(PACKAGE_ROOT, 'config', 'default.json');

export const DEFAULT_PHASES = [
  'Launch Blaze',
  'Initialize command',
  'Load packages',
  'Analyze dependencies',
  'Analyze licenses',
  'Prepare for build',
  'Build artifacts',
  'Complete build',
] as const;

const projectSchema = z.object({
  name: z.string().trim().min(1),
  storageSubdir: z.string().trim().min(1),
  gitRepository: z.string().trim().min(1),
  command: z.string().trim().min(1),
  active: z.boolean().default(true),
  platforms: z.array(z.string().trim().min(1)).default([]),
});

const platformSchema = z.object({
  emoji: z.string().default(''),
  queue: z.string().trim().min(1).optional(),
});

const configFileSchema = z.object({
  phases: z.array(z.string().min(1)).min(1).default([...DEFAULT_PHASES]),
  projects: z.array(projectSchema).default([]),
  platforms: z.record(platformSchema).default({}),
  platformAllowlist: z.array(z.string()).optional(),
  reportPlatform: z.string().default('ubuntu1804'),
  benchmarkRepository: z.string().default('https://github.com/bazelbuild/bazel.git'),
  binariesSource: z.string().default('gs://perf.bazel.build/bazelbins/*'),
  mirrors: z.record(z.string()).default({}),
  cliCommand: z.string().default('bench-ci'),
  benchmarkCommand: z.string().default('bazel run benchmark --'),
  resultFileName: z.string().default('perf_data.csv'),
  profilesFileName: z.string().default('aggr_json_profiles.csv'),
  storageHost: z.string().default('storage.googleapis.com'),
  fetchTimeoutMs: z.coerce.number().int().positive().default(30_000),
  reportsDirectory: z.string().default(join(tmpdir(), '.bench-ci', 'reports')),
  dataDirectory: z.string().default(join(tmpdir(), '.bench-ci', 'out')),
  binariesDirectory: z.string().default(join(homedir(), '.bench-ci', 'bin')),
});

export type ProjectDefinition = z.infer<typeof projectSchema>;
export type PlatformDefinition = z.infer<typeof platformSchema>;
export type BenchConfig = z.infer<typeof configFileSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validates a raw config document and applies environment overrides.
 * Environment wins over the file:
 * 1. BENCH_REPORTS_DIR
 * 2. BENCH_FETCH_TIMEOUT_MS
 */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): BenchConfig {
  const overrides: Record<string, unknown> = {};
  if (env.BENCH_REPORTS_DIR) overrides.reportsDirectory = env.BENCH_REPORTS_DIR;
  if (env.BENCH_FETCH_TIMEOUT_MS) overrides.fetchTimeoutMs = env.BENCH_FETCH_TIMEOUT_MS;

  const base = typeof raw === 'object' && raw !== null ? raw : {};
  const parsed = configFileSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatZodIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Resolution order for the config file:
 * 1. --config flag (passed as argument)
 * 2. BENCH_CONFIG environment variable
 * 3. config/default.json shipped with the package
 */
export function getConfigPath(flagValue?: string): string {
  return flagValue || process.env.BENCH_CONFIG || DEFAULT_CONFIG_FILE;
}

export function loadConfig(flagValue?: string): BenchConfig {
  const path = getConfigPath(flagValue);
  if (!existsSync(path)) {
    if (path === DEFAULT_CONFIG_FILE) return resolveConfig({});
    throw new ConfigError(`Config file not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveConfig(raw);
}

export function resolveStorageBucket(flagValue?: string): string {
  return flagValue || process.env.BENCH_STORAGE_BUCKET || '';
}

export function isDebugEnabled(flagValue?: boolean): boolean {
  return Boolean(flagValue || process.env.BENCH_DEBUG);
}
