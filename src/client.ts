import chalk from 'chalk';
import { DataFetchError, errorMessage } from './errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface StorageClientOptions {
  timeoutMs?: number;
  debug?: boolean;
}

/** Read-only HTTP access to benchmark results published in a storage bucket. */
export class StorageClient {
  private timeoutMs: number;
  private debug: boolean;

  constructor(options: StorageClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.debug ?? false;
  }

  async getText(url: string): Promise<string> {
    if (this.debug) {
      console.error(chalk.dim(`→ GET ${url}`));
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      let response: Response;
      try {
        response = await fetch(url, { method: 'GET', signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new DataFetchError(url, `Request timed out after ${this.timeoutMs}ms`);
        }
        throw new DataFetchError(url, errorMessage(err));
      }

      if (this.debug) {
        console.error(chalk.dim(`← ${response.status} ${response.statusText}`));
      }

      if (!response.ok) {
        throw new DataFetchError(url, response.statusText || 'Request failed', response.status);
      }

      try {
        return await response.text();
      } catch (err) {
        if (controller.signal.aborted) {
          throw new DataFetchError(url, `Request timed out after ${this.timeoutMs}ms`);
        }
        throw new DataFetchError(url, errorMessage(err));
      }
    } finally {
      clearTimeout(timer);
    }
  }

  async getJson(url: string): Promise<unknown> {
    const text = await this.getText(url);
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new DataFetchError(url, `Malformed JSON: ${errorMessage(err)}`);
    }
  }
}

export function storageUrl(host: string, bucket: string, path: string): string {
  return `https://${bucket}.${host}/${path}`;
}
