import {
  DEFAULT_COST_MODEL,
  type CostModel,
  type RunRecord,
  type TestResult,
} from '@flakelens/shared';

import { toOutcome } from './flakiness.js';

/**
 * Linear, hand-checkable cost model: every flip is charged one re-run of the
 * run it landed in, scaled by the re-run multiplier. Amounts stay exact;
 * rounding to cents happens where they are rendered.
 */
export class CostAttributor {
  private readonly model: CostModel;

  constructor(model: Partial<CostModel> = {}) {
    this.model = { ...DEFAULT_COST_MODEL, ...model };
  }

  public get costModel(): CostModel {
    return this.model;
  }

  /**
   * Cost for a sorted observation sequence, honouring per-run rate overrides
   */
  public attribute(
    observations: readonly TestResult[],
    runs: ReadonlyMap<string, RunRecord> = new Map()
  ): number {
    // flips counted per rate; with one rate the cost is flips x rate x multiplier
    const flipsByRate = new Map<number, number>();
    let previous: ReturnType<typeof toOutcome> = null;

    for (const result of observations) {
      const outcome = toOutcome(result.status);
      if (outcome === null) continue;
      if (previous !== null && outcome !== previous) {
        const rate = runs.get(result.runId)?.costPerRunUsd ?? this.model.costPerRunUsd;
        flipsByRate.set(rate, (flipsByRate.get(rate) ?? 0) + 1);
      }
      previous = outcome;
    }

    let total = 0;
    for (const [rate, flips] of flipsByRate) {
      total += flips * rate * this.model.rerunMultiplier;
    }
    return total;
  }
}
