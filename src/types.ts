/** One benchmarking invocation as reported by the benchmark tool. */
export interface RunRecord {
  runId: string;
  /** seconds */
  wall: number;
  /** MB */
  memory: number;
}

export interface PhaseSample {
  runId: string;
  phase: string;
  /** seconds */
  duration: number;
}

/** Run identifier → phase name → fraction of that run's total phase time. */
export type PhaseProportionMap = Map<string, ReadonlyMap<string, number>>;

export interface AggregatedRun {
  runId: string;
  medianWall: number;
  medianMemory: number;
}

export type TableRow = [string, ...number[]];

export interface GraphTable {
  columns: string[];
  rows: TableRow[];
}

export interface GraphData {
  wall: GraphTable;
  memory: GraphTable;
}

export type OutputOptions = {
  json?: boolean;
  table?: boolean;
  csv?: boolean;
  quiet?: boolean;
};
