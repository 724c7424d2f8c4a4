// ============================================
// CAPITOL - Scenario Factory Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { createInitialState, leanFor } from '../src/simulation/scenario.js';
import { resolveRules } from '../src/config/rules.js';
import { getDefaultCatalog } from '../src/config/catalog.js';
import { ConfigurationFault } from '../src/plugins/error-handler.plugin.js';
import { invariantIssues } from '../src/simulation/invariants.js';
import { TEST_RULES, testCatalog } from './fixtures.js';

const rules = resolveRules(TEST_RULES);

describe('createInitialState', () => {
  const state = createInitialState(testCatalog(), rules, { seed: 1 });
  const incumbents = (stateId: string) => state.states.find(s => s.id === stateId)?.districts.map(d => d.incumbent);

  it('should hand each party its House split by district lean', () => {
    expect(incumbents('AA')).toEqual(['blue', 'blue', 'blue']);
    expect(incumbents('BB')).toEqual(['red', 'red']);
    expect(incumbents('CC')).toEqual(['red']);
  });

  it('should assign Senate seats and classes', () => {
    const seats = state.states.flatMap(s => s.senateSeats.map(seat => [seat.id, seat.seatClass, seat.incumbent]));
    expect(seats).toEqual([
      ['AA-S1', 0, 'blue'],
      ['AA-S2', 1, 'blue'],
      ['BB-S2', 1, 'red'],
      ['BB-S3', 2, 'red'],
      ['CC-S3', 2, 'red'],
      ['CC-S1', 0, 'blue'],
    ]);
  });

  it('should count seats and settle control', () => {
    expect(state.parties.map(p => [p.id, p.seats])).toEqual([
      ['blue', { house: 3, senate: 3 }],
      ['red', { house: 3, senate: 3 }],
    ]);
    // An even split goes to the first party id
    expect(state.legislature.houseControl).toBe('blue');
    expect(state.legislature.senateControl).toBe('blue');
  });

  it('should give each state a governor from its leaning party', () => {
    expect(state.states.map(s => s.governorParty)).toEqual(['blue', 'red', 'blue']);
  });

  it('should schedule the next election of every kind', () => {
    expect(state.elections.map(e => [e.id, e.status])).toEqual([
      ['house-2026-11', 'pending'],
      ['senate-2026-11', 'pending'],
      ['presidential-2028-11', 'pending'],
    ]);
    expect(state.elections[1].seats).toEqual(['BB-S3', 'CC-S3']);
  });

  it('should start with neutral opinion everywhere', () => {
    expect(Object.keys(state.opinion).sort()).toEqual(['AA', 'BB', 'CC', 'national']);
    expect(state.opinion.CC).toEqual({ economy: 0, healthcare: 0, security: 0, environment: 0, education: 0 });
  });

  it('should start balanced at the state level', () => {
    const alpha = state.states[0];
    expect(alpha.budget.revenue).toBeCloseTo(18, 9);
    expect(alpha.budget.spending).toBe(alpha.budget.revenue);
  });

  it('should start approvals at their baselines and seat the court with the president', () => {
    expect(state.president).toEqual({ partyId: 'blue', approval: 50 });
    expect(state.legislature.approval).toBe(40);
    expect(state.court).toEqual({ lean: 'blue' });
    expect(state.log).toEqual([]);
  });

  it('should satisfy every invariant', () => {
    expect(invariantIssues(state, rules)).toEqual([]);
  });

  it('should be reproducible from the seed', () => {
    const again = createInitialState(testCatalog(), rules, { seed: 1 });
    expect(again).toEqual(state);
  });

  it('should reject an impossible start month', () => {
    expect(() => createInitialState(testCatalog(), rules, { seed: 1, start: { year: 2025, month: 13 } })).toThrow(ConfigurationFault);
  });
});

describe('default scenario', () => {
  const defaults = resolveRules();
  const state = createInitialState(getDefaultCatalog(), defaults, { seed: 42 });

  it('should fill both chambers', () => {
    expect(state.states.flatMap(s => s.districts)).toHaveLength(435);
    expect(state.parties.map(p => [p.id, p.seats])).toEqual([
      ['democrat', { house: 213, senate: 47 }],
      ['republican', { house: 222, senate: 53 }],
    ]);
    expect(state.president).toEqual({ partyId: 'republican', approval: 50 });
    expect(state.legislature.approval).toBe(30);
    expect(state.court.lean).toBe('republican');
  });

  it('should split the Senate into classes of 33, 34 and 33', () => {
    const seats = state.states.flatMap(s => s.senateSeats);
    const perClass = [0, 1, 2].map(c => seats.filter(seat => seat.seatClass === c).length);
    expect(perClass).toEqual([33, 34, 33]);
  });
});

describe('leanFor', () => {
  it('should mirror the lean for the second party', () => {
    expect(leanFor(0.3, [
      { id: 'x', name: 'X', platform: { economy: 0, healthcare: 0, security: 0, environment: 0, education: 0 }, treasury: 0, approval: 50 },
      { id: 'y', name: 'Y', platform: { economy: 0, healthcare: 0, security: 0, environment: 0, education: 0 }, treasury: 0, approval: 50 },
    ])).toEqual({ x: 0.3, y: -0.3 });
  });
});
