import chalk from 'chalk';

export abstract class BenchError extends Error {
  abstract readonly type: string;
  abstract get exitCode(): number;

  display(): string {
    return chalk.red(`Error: ${this.message}`);
  }
}

export class ConfigError extends BenchError {
  readonly type = 'config_error';

  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }

  display(): string {
    return [
      chalk.red(`Error: ${this.message}`),
      ...this.issues.map((issue) => chalk.dim(`  ${issue}`)),
    ].join('\n');
  }

  get exitCode(): number { return 2; }
}

/** Network failure, timeout, non-2xx response or a document that does not parse. */
export class DataFetchError extends BenchError {
  readonly type = 'data_fetch_error';

  constructor(
    public url: string,
    public detail: string,
    public statusCode?: number
  ) {
    super(`Failed to fetch ${url}: ${detail}`);
    this.name = 'DataFetchError';
  }

  display(): string {
    return [
      chalk.red(`Error: ${this.detail}${this.statusCode ? ` (${this.statusCode})` : ''}`),
      chalk.dim(`  URL: ${this.url}`),
    ].join('\n');
  }

  get exitCode(): number { return 3; }
}

export class DataIntegrityError extends BenchError {
  readonly type = 'data_integrity_error';

  constructor(message: string, public runId?: string) {
    super(message);
    this.name = 'DataIntegrityError';
  }

  display(): string {
    const lines = [chalk.red(`Error: ${this.message}`)];
    if (this.runId) lines.push(chalk.dim(`  Run: ${this.runId}`));
    return lines.join('\n');
  }

  get exitCode(): number { return 4; }
}

export class RenderError extends BenchError {
  readonly type = 'render_error';

  constructor(public path: string, detail: string) {
    super(`Could not write report to ${path}: ${detail}`);
    this.name = 'RenderError';
  }

  get exitCode(): number { return 5; }
}

export class CommandError extends BenchError {
  readonly type = 'command_error';

  constructor(
    public command: string,
    public code: number | null,
    public stderr: string
  ) {
    super(`Command failed${code === null ? '' : ` with exit code ${code}`}: ${command}`);
    this.name = 'CommandError';
  }

  display(): string {
    const lines = [chalk.red(`Error: ${this.message}`)];
    const tail = this.stderr.trim();
    if (tail) lines.push(chalk.dim(`  ${tail.split('\n').slice(-5).join('\n  ')}`));
    return lines.join('\n');
  }

  get exitCode(): number { return 6; }
}

export class ReportFailuresError extends BenchError {
  readonly type = 'report_failures';

  constructor(public projects: string[]) {
    super(`Report generation failed for ${projects.length} project(s): ${projects.join(', ')}`);
    this.name = 'ReportFailuresError';
  }

  get exitCode(): number { return 1; }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
