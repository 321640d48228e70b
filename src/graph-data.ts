import { DataIntegrityError } from './errors.js';
import { expandProportions } from './phases.js';
import type { AggregatedRun, GraphData, PhaseProportionMap, TableRow } from './types.js';

export const RUN_COLUMN = 'Run';
export const MEMORY_COLUMN = 'Memory (MB)';

export function buildGraphData(
  runs: readonly AggregatedRun[],
  proportions: PhaseProportionMap,
  phases: readonly string[]
): GraphData {
  const wallRows: TableRow[] = [];
  const memoryRows: TableRow[] = [];

  for (const run of runs) {
    const shares = proportions.get(run.runId);
    if (!shares) {
      throw new DataIntegrityError('No phase profile found for run', run.runId);
    }
    const breakdown = expandProportions(shares, phases).map((share) => run.medianWall * share);
    wallRows.push([run.runId, ...breakdown]);
    memoryRows.push([run.runId, run.medianMemory]);
  }

  return {
    wall: { columns: [RUN_COLUMN, ...phases], rows: wallRows },
    memory: { columns: [RUN_COLUMN, MEMORY_COLUMN], rows: memoryRows },
  };
}
