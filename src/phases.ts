import { DataIntegrityError } from './errors.js';
import type { PhaseProportionMap, PhaseSample } from './types.js';

/**
 * Groups phase samples by run and turns each run's durations into fractions
 * of the run's total. Repeated samples of one phase are summed first.
 */
export function computePhaseProportions(samples: Iterable<PhaseSample>): PhaseProportionMap {
  const durationsByRun = new Map<string, Map<string, number>>();

  for (const sample of samples) {
    if (sample.duration < 0) {
      throw new DataIntegrityError(
        `Negative duration ${sample.duration} for phase "${sample.phase}"`,
        sample.runId
      );
    }
    let phases = durationsByRun.get(sample.runId);
    if (!phases) {
      phases = new Map();
      durationsByRun.set(sample.runId, phases);
    }
    phases.set(sample.phase, (phases.get(sample.phase) ?? 0) + sample.duration);
  }

  const proportions: PhaseProportionMap = new Map();
  for (const [runId, phases] of durationsByRun) {
    let total = 0;
    for (const duration of phases.values()) total += duration;
    if (!(total > 0)) {
      throw new DataIntegrityError('Phase durations sum to zero', runId);
    }

    const shares = new Map<string, number>();
    for (const [phase, duration] of phases) {
      shares.set(phase, duration / total);
    }
    proportions.set(runId, shares);
  }
  return proportions;
}

/** Expands one run's proportions against the phase vocabulary; absent phases are 0. */
export function expandProportions(
  shares: ReadonlyMap<string, number>,
  phases: readonly string[]
): number[] {
  return phases.map((phase) => shares.get(phase) ?? 0);
}
