// ============================================
// CAPITOL - Public Opinion Tracker
// ============================================
// (region, issue) -> approval in [OPINION.MIN, OPINION.MAX]. Effects add
// clamped deltas; decay pulls every entry toward the baseline once per turn.

import {
  ISSUES,
  NATIONAL_REGION,
  type EffectVector,
  type Issue,
  type Legislature,
  type Presidency,
  type RegionId,
} from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import { SimulationFault } from '../plugins/error-handler.plugin.js';
import { clamp } from '../utils/math.js';

export type OpinionTable = Record<RegionId, Record<Issue, number>>;

export function neutralOpinion(baseline: number): Record<Issue, number> {
  return {
    economy: baseline,
    healthcare: baseline,
    security: baseline,
    environment: baseline,
    education: baseline,
  };
}

export class PublicOpinionTracker {
  constructor(
    private readonly table: OpinionTable,
    private readonly rules: SimulationRules['OPINION']
  ) {}

  get(region: RegionId, issue: Issue): number {
    return this.row(region)[issue];
  }

  /**
   * Add the opinion part of an effect vector to one region. With `issue`
   * given, only that issue's delta is applied.
   */
  apply(effects: Pick<EffectVector, 'opinion'>, region: RegionId, issue?: Issue): void {
    const row = this.row(region);
    const issues = issue ? [issue] : ISSUES;
    for (const key of issues) {
      const delta = effects.opinion[key];
      if (delta === undefined || delta === 0) continue;
      const bounded = clamp(delta, -this.rules.MAX_DELTA, this.rules.MAX_DELTA);
      row[key] = clamp(row[key] + bounded, this.rules.MIN, this.rules.MAX);
    }
  }

  /**
   * Move every entry DECAY_RATE of the way back to baseline. The new table is
   * computed in full before any row is replaced.
   */
  decayStep(): void {
    const { BASELINE, DECAY_RATE, MIN, MAX } = this.rules;
    const next: OpinionTable = {};
    for (const region of Object.keys(this.table)) {
      const row = this.table[region];
      const decayed = neutralOpinion(BASELINE);
      for (const issue of ISSUES) {
        decayed[issue] = clamp(row[issue] + (BASELINE - row[issue]) * DECAY_RATE, MIN, MAX);
      }
      next[region] = decayed;
    }
    for (const region of Object.keys(next)) {
      this.table[region] = next[region];
    }
  }

  /** Opinion as a state's electorate sees it: national mood blended with local */
  regional(stateId: RegionId | null): Record<Issue, number> {
    const national = this.row(NATIONAL_REGION);
    if (!stateId) return { ...national };
    const local = this.row(stateId);
    const w = this.rules.NATIONAL_WEIGHT;
    const blended = neutralOpinion(this.rules.BASELINE);
    for (const issue of ISSUES) {
      blended[issue] = w * national[issue] + (1 - w) * local[issue];
    }
    return blended;
  }

  /** Entries outside the declared bounds, as "region.issue" strings */
  outOfBounds(): string[] {
    const bad: string[] = [];
    for (const [region, row] of Object.entries(this.table)) {
      for (const issue of ISSUES) {
        const v = row[issue];
        if (!Number.isFinite(v) || v < this.rules.MIN || v > this.rules.MAX) {
          bad.push(`${region}.${issue}`);
        }
      }
    }
    return bad;
  }

  private row(region: RegionId): Record<Issue, number> {
    const row = this.table[region];
    if (!row) {
      throw new SimulationFault(`Unknown opinion region '${region}'`, { entityId: region });
    }
    return row;
  }
}

/**
 * Monthly pull of presidential and congressional approval toward their
 * baselines, APPROVAL_REVERSION of the remaining distance.
 */
export function revertApprovals(president: Presidency, legislature: Legislature, rules: SimulationRules['OPINION']): void {
  const { PRESIDENT_APPROVAL_BASELINE, CONGRESS_APPROVAL_BASELINE, APPROVAL_REVERSION } = rules;
  president.approval = clamp(president.approval + (PRESIDENT_APPROVAL_BASELINE - president.approval) * APPROVAL_REVERSION, 0, 100);
  legislature.approval = clamp(legislature.approval + (CONGRESS_APPROVAL_BASELINE - legislature.approval) * APPROVAL_REVERSION, 0, 100);
}
