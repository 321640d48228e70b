import type { AggregatedRun, RunRecord } from './types.js';

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('median of an empty collection');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

interface Readings {
  wall: number[];
  memory: number[];
}

/**
 * Collapses repeated readings per run into medians. Output order is the order
 * in which each run identifier first appears, which is the chart's x-axis.
 */
export function aggregateReadings(records: Iterable<RunRecord>): AggregatedRun[] {
  const byRun = new Map<string, Readings>();
  for (const record of records) {
    let readings = byRun.get(record.runId);
    if (!readings) {
      readings = { wall: [], memory: [] };
      byRun.set(record.runId, readings);
    }
    readings.wall.push(record.wall);
    readings.memory.push(record.memory);
  }

  return [...byRun].map(([runId, readings]) => ({
    runId,
    medianWall: median(readings.wall),
    medianMemory: median(readings.memory),
  }));
}
