// ============================================
// CAPITOL - Public Opinion Tracker Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { PublicOpinionTracker, neutralOpinion, revertApprovals, type OpinionTable } from '../src/simulation/opinion.tracker.js';
import { resolveRules } from '../src/config/rules.js';
import { RandomStream } from '../src/simulation/random.js';
import { SimulationFault } from '../src/plugins/error-handler.plugin.js';
import { ISSUES, type Issue, type Legislature, type Presidency } from '../src/models/types.js';

const rules = resolveRules();

describe('PublicOpinionTracker', () => {
  let table: OpinionTable;
  let tracker: PublicOpinionTracker;

  beforeEach(() => {
    table = { national: neutralOpinion(0), AA: neutralOpinion(0) };
    tracker = new PublicOpinionTracker(table, rules.OPINION);
  });

  it('should add deltas to one region only', () => {
    tracker.apply({ opinion: { healthcare: 0.2 } }, 'AA');

    expect(tracker.get('AA', 'healthcare')).toBe(0.2);
    expect(tracker.get('national', 'healthcare')).toBe(0);
  });

  it('should limit a single delta to MAX_DELTA', () => {
    tracker.apply({ opinion: { economy: 0.8 } }, 'national');
    expect(tracker.get('national', 'economy')).toBe(0.5);
  });

  it('should clamp to the upper bound', () => {
    for (let i = 0; i < 3; i++) {
      tracker.apply({ opinion: { security: 0.5 } }, 'national');
    }
    expect(tracker.get('national', 'security')).toBe(1);
  });

  it('should apply only the named issue when one is given', () => {
    tracker.apply({ opinion: { economy: 0.1, education: 0.1 } }, 'national', 'education');

    expect(tracker.get('national', 'education')).toBe(0.1);
    expect(tracker.get('national', 'economy')).toBe(0);
  });

  it('should decay every entry toward the baseline', () => {
    tracker.apply({ opinion: { environment: 0.5 } }, 'AA');
    tracker.apply({ opinion: { environment: -0.4 } }, 'national');
    tracker.decayStep();

    expect(tracker.get('AA', 'environment')).toBeCloseTo(0.475, 12);
    expect(tracker.get('national', 'environment')).toBeCloseTo(-0.38, 12);
  });

  it('should blend national and state opinion for an electorate', () => {
    tracker.apply({ opinion: { economy: 0.4 } }, 'national');
    expect(tracker.regional('AA').economy).toBeCloseTo(0.2, 12);
    expect(tracker.regional(null).economy).toBe(0.4);
  });

  it('should report entries outside the bounds', () => {
    table.national.economy = 1.5;
    expect(tracker.outOfBounds()).toEqual(['national.economy']);
  });

  it('should stay inside the bounds over random runs of effects and decay', () => {
    const regions = ['national', 'AA'];
    for (let seed = 1; seed <= 20; seed++) {
      const rng = new RandomStream('opinion-walk', seed, 0);
      const walk = new PublicOpinionTracker({ national: neutralOpinion(0), AA: neutralOpinion(0) }, rules.OPINION);

      for (let step = 0; step < 150; step++) {
        if (rng.chance(0.2)) {
          walk.decayStep();
        } else {
          const opinion: Partial<Record<Issue, number>> = {};
          opinion[rng.pick(ISSUES)] = rng.range(-2, 2);
          walk.apply({ opinion }, rng.pick(regions));
        }
        expect(walk.outOfBounds()).toEqual([]);
      }
    }
  });

  it('should fault on an unknown region', () => {
    expect(() => tracker.apply({ opinion: { economy: 0.1 } }, 'ZZ')).toThrow(SimulationFault);
  });
});

describe('revertApprovals', () => {
  it('should pull both approvals a twentieth of the way to their baselines', () => {
    const president: Presidency = { partyId: 'blue', approval: 60 };
    const legislature: Legislature = { houseSize: 6, senateSize: 6, houseControl: 'blue', senateControl: 'red', approval: 30 };

    revertApprovals(president, legislature, rules.OPINION);

    expect(president.approval).toBeCloseTo(59.5, 12);
    expect(legislature.approval).toBeCloseTo(30.5, 12);
  });

  it('should leave approvals at their baselines alone', () => {
    const president: Presidency = { partyId: 'blue', approval: 50 };
    const legislature: Legislature = { houseSize: 6, senateSize: 6, houseControl: null, senateControl: null, approval: 40 };

    revertApprovals(president, legislature, rules.OPINION);

    expect(president.approval).toBe(50);
    expect(legislature.approval).toBe(40);
  });
});
