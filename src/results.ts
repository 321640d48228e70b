import { CsvSyntaxError, missingColumns, parseCsv, type CsvRecord, type CsvTable } from './csv.js';
import { DataFetchError, DataIntegrityError } from './errors.js';
import type { PhaseSample, RunRecord } from './types.js';

export const PERF_COLUMNS = ['bazel_commit', 'wall', 'memory'] as const;
export const PROFILE_COLUMNS = ['bazel_source', 'name', 'dur'] as const;

function readTable(text: string, url: string, required: readonly string[]): CsvTable {
  let table: CsvTable;
  try {
    table = parseCsv(text);
  } catch (err) {
    if (err instanceof CsvSyntaxError) {
      throw new DataFetchError(url, `Malformed CSV: ${err.message}`);
    }
    throw err;
  }
  const missing = missingColumns(table, required);
  if (missing.length > 0) {
    throw new DataFetchError(url, `Malformed CSV: missing column(s) ${missing.join(', ')}`);
  }
  return table;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function readNumber(record: CsvRecord, column: string, url: string, row: number): number {
  const raw = record[column].trim();
  const value = Number(raw);
  if (!DECIMAL.test(raw) || !Number.isFinite(value)) {
    throw new DataFetchError(url, `Malformed CSV: "${raw}" in column ${column} of row ${row} is not a number`);
  }
  return value;
}

function readReading(record: CsvRecord, column: string, url: string, row: number): number {
  const value = readNumber(record, column, url, row);
  if (value < 0) {
    throw new DataIntegrityError(`Negative ${column} reading ${value}`, record.bazel_commit);
  }
  return value;
}

export function parseRunRecords(text: string, url: string): RunRecord[] {
  const { records } = readTable(text, url, PERF_COLUMNS);
  return records.map((record, index) => ({
    runId: record.bazel_commit,
    wall: readReading(record, 'wall', url, index + 1),
    memory: readReading(record, 'memory', url, index + 1),
  }));
}

export function parsePhaseSamples(text: string, url: string): PhaseSample[] {
  const { records } = readTable(text, url, PROFILE_COLUMNS);
  return records.map((record, index) => ({
    runId: record.bazel_source,
    phase: record.name,
    duration: readNumber(record, 'dur', url, index + 1),
  }));
}
