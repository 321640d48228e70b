import chalk from 'chalk';
import Table from 'cli-table3';
import type { OutputOptions } from './types.js';

export type OutputFormat = 'json' | 'table' | 'csv' | 'quiet';

export type OutputRow = Record<string, unknown>;

export function detectFormat(opts: OutputOptions): OutputFormat {
  if (opts.quiet) return 'quiet';
  if (opts.json) return 'json';
  if (opts.csv) return 'csv';
  if (opts.table) return 'table';
  return process.stdout.isTTY ? 'table' : 'json';
}

export function displayValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map(displayValue).join(', ');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function csvCell(value: unknown): string {
  const v = displayValue(value);
  return v.includes(',') || v.includes('"') || v.includes('\n') ? `"${v.replace(/"/g, '""')}"` : v;
}

export function outputList(items: OutputRow[], opts: {
  format: OutputFormat;
  columns?: string[];
  idField?: string;
}): void {
  const format = opts.format;
  const idField = opts.idField || 'id';

  if (format === 'quiet') {
    for (const item of items) {
      const id = displayValue(item[idField]);
      if (id) console.log(id);
    }
    return;
  }

  if (format === 'json') {
    console.log(JSON.stringify(items, null, 2));
    return;
  }

  if (items.length === 0) {
    if (format === 'table') console.log(chalk.dim('No results.'));
    return;
  }

  const columns = opts.columns || Object.keys(items[0]).slice(0, 8);

  if (format === 'csv') {
    console.log(columns.join(','));
    for (const row of items) {
      console.log(columns.map(c => csvCell(row[c])).join(','));
    }
    return;
  }

  // table
  const table = new Table({
    head: columns.map(c => chalk.cyan(c)),
    style: { head: [], border: [] },
    wordWrap: true,
  });
  for (const row of items) {
    table.push(columns.map(c => {
      const v = displayValue(row[c]);
      return v.length > 60 ? v.slice(0, 57) + '...' : v;
    }));
  }
  console.log(table.toString());
}

export function outputSingle(item: OutputRow, opts: {
  format: OutputFormat;
  idField?: string;
}): void {
  if (opts.format === 'quiet') {
    console.log(displayValue(item[opts.idField || 'id']));
    return;
  }
  if (opts.format === 'json') {
    console.log(JSON.stringify(item, null, 2));
    return;
  }
  if (opts.format === 'csv') {
    const keys = Object.keys(item);
    console.log(keys.join(','));
    console.log(keys.map(k => csvCell(item[k])).join(','));
    return;
  }
  // table format: key-value pairs
  const table = new Table({ style: { head: [], border: [] } });
  for (const [key, value] of Object.entries(item)) {
    const display = displayValue(value);
    table.push({ [chalk.cyan(key)]: display.length > 80 ? display.slice(0, 77) + '...' : display });
  }
  console.log(table.toString());
}
