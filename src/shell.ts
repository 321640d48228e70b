import { spawn } from 'child_process';
import chalk from 'chalk';
import { CommandError } from './errors.js';

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<string>;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

/** Runs external programs (gsutil, buildkite-agent) as child processes. */
export class ProcessRunner implements CommandRunner {
  constructor(private debug = false) {}

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<string> {
    const display = formatCommand(command, args);
    if (this.debug) {
      console.error(chalk.dim(`$ ${display}`));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      });
      let stdout = '';
      let stderr = '';
      child.stdout?.on('data', (chunk: Buffer) => { stdout += chunk.toString('utf-8'); });
      child.stderr?.on('data', (chunk: Buffer) => { stderr += chunk.toString('utf-8'); });
      child.on('error', (err) => reject(new CommandError(display, null, err.message)));
      child.on('close', (code) => {
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new CommandError(display, code, stderr));
        }
      });
      if (options.input !== undefined && child.stdin) {
        // A child that exits before draining stdin closes the pipe; 'close' reports its exit code.
        child.stdin.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code !== 'EPIPE') reject(new CommandError(display, null, err.message));
        });
        child.stdin.end(options.input);
      }
    });
  }
}
