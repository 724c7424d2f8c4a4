// ============================================
// CAPITOL - Election Scheduler Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { ElectionScheduler, controlOf, electionId, recountSeats } from '../src/simulation/election.scheduler.js';
import { TurnEngine } from '../src/simulation/engine.js';
import { createInitialState } from '../src/simulation/scenario.js';
import { RandomStreams } from '../src/simulation/random.js';
import { resolveRules } from '../src/config/rules.js';
import { parseCatalog } from '../src/config/catalog.js';
import type { SimulationState } from '../src/models/types.js';
import { SimulationFault } from '../src/plugins/error-handler.plugin.js';
import { TEST_RULES, testCatalog } from './fixtures.js';

const scheduler = new ElectionScheduler(resolveRules());

describe('ElectionScheduler calendar', () => {
  it('should hold House and Senate elections every even November', () => {
    expect(scheduler.isDue('house', { year: 2026, month: 11 })).toBe(true);
    expect(scheduler.isDue('senate', { year: 2026, month: 11 })).toBe(true);
    expect(scheduler.isDue('house', { year: 2025, month: 11 })).toBe(false);
    expect(scheduler.isDue('house', { year: 2026, month: 10 })).toBe(false);
  });

  it('should hold presidential elections every fourth November', () => {
    expect(scheduler.isDue('presidential', { year: 2028, month: 11 })).toBe(true);
    expect(scheduler.isDue('presidential', { year: 2026, month: 11 })).toBe(false);
  });

  it('should find the next election date', () => {
    expect(scheduler.nextDate('house', { year: 2025, month: 1 })).toEqual({ year: 2026, month: 11 });
    expect(scheduler.nextDate('house', { year: 2026, month: 11 })).toEqual({ year: 2026, month: 11 });
    expect(scheduler.nextDate('house', { year: 2026, month: 12 })).toEqual({ year: 2028, month: 11 });
    expect(scheduler.nextDate('presidential', { year: 2025, month: 1 })).toEqual({ year: 2028, month: 11 });
  });

  it('should rotate the Senate classes', () => {
    expect([2026, 2028, 2030, 2032].map(y => scheduler.senateClass(y))).toEqual([2, 0, 1, 2]);
  });

  it('should name elections by kind and month', () => {
    expect(electionId('senate', { year: 2030, month: 11 })).toBe('senate-2030-11');
  });
});

describe('controlOf', () => {
  it('should give control to the largest party', () => {
    expect(controlOf({ blue: 2, red: 4 }, 'blue')).toBe('red');
  });

  it('should keep a tied previous holder', () => {
    expect(controlOf({ blue: 3, red: 3 }, 'red')).toBe('red');
    expect(controlOf({ blue: 3, red: 3 }, null)).toBe('blue');
  });
});

describe('recountSeats', () => {
  it('should fault when a chamber does not add up', () => {
    const rules = resolveRules(TEST_RULES);
    const state = createInitialState(testCatalog(), rules, { seed: 1 });
    state.states[0].districts[0].incumbent = null;

    expect(() => recountSeats(state)).toThrow(SimulationFault);
  });
});

describe('ElectionScheduler with the default scenario', () => {
  const engine = new TurnEngine({ seed: 42 });
  const report = engine.advance(24);
  const state = engine.getState();

  it('should resolve exactly one House election in two years', () => {
    expect(report.electionsResolved.map(e => e.id)).toEqual(['house-2026-11', 'senate-2026-11']);
    expect(report.electionsResolved[0].results).toHaveLength(435);
  });

  it('should contest one Senate class', () => {
    expect(report.electionsResolved[1].results).toHaveLength(33);
  });

  it('should keep both chambers at their fixed size', () => {
    expect(state.parties.reduce((acc, p) => acc + p.seats.house, 0)).toBe(435);
    expect(state.parties.reduce((acc, p) => acc + p.seats.senate, 0)).toBe(100);
  });

  it('should put the next cycle on the calendar', () => {
    const pending = state.elections.filter(e => e.status === 'pending').map(e => e.id);
    expect(pending).toEqual(['presidential-2028-11', 'house-2028-11', 'senate-2028-11']);
  });
});

describe('campaign reset', () => {
  it('should clear district spend once the House election is over', () => {
    const engine = new TurnEngine({ seed: 42 });
    const report = engine.advance(23);
    const state = engine.getState();

    expect(report.to).toEqual({ year: 2026, month: 12 });
    expect(state.states.flatMap(s => s.districts).every(d => Object.keys(d.campaign).length === 0)).toBe(true);
  });
});

describe('ElectionScheduler in a small world', () => {
  const engine = new TurnEngine({
    catalog: testCatalog(),
    rules: { ...TEST_RULES, VOTER: { NOISE: 0 } },
    seed: 5,
  });
  const report = engine.advance(47);
  const state = engine.getState();

  it('should run the 2026 and 2028 cycles in order', () => {
    expect(report.electionsResolved.map(e => e.id)).toEqual([
      'house-2026-11',
      'senate-2026-11',
      'house-2028-11',
      'senate-2028-11',
      'presidential-2028-11',
    ]);
    expect(report.to).toEqual({ year: 2028, month: 12 });
  });

  it('should follow the partisan lean of safe seats', () => {
    const house = report.electionsResolved[0];
    const winners = Object.fromEntries(house.results.map(r => [r.seatId, r.winner]));
    expect([winners['AA-01'], winners['AA-02'], winners['AA-03']]).toEqual(['blue', 'blue', 'blue']);
    expect([winners['BB-01'], winners['BB-02']]).toEqual(['red', 'red']);
  });

  it('should contest the class-2 Senate seats in 2026 and keep the incumbents', () => {
    const senate = report.electionsResolved[1];
    expect(senate.results.map(r => [r.seatId, r.previous, r.winner])).toEqual([
      ['BB-S3', 'red', 'red'],
      ['CC-S3', 'red', 'red'],
    ]);
  });

  it('should award electoral votes by state', () => {
    const presidential = report.electionsResolved[4];
    expect(presidential.seatTotals).toEqual({ blue: 8, red: 4 });
    expect(presidential.winner).toBe('blue');
    expect(state.president.partyId).toBe('blue');
  });

  it('should log the presidential result on election day', () => {
    expect(state.log.find(e => e.message.startsWith('Presidential'))).toEqual({
      turn: 46,
      date: { year: 2028, month: 11 },
      message: 'Presidential election: blue (blue 8, red 4)',
    });
  });

  it('should keep per-seat results only for the most recent elections', () => {
    const withResults = state.elections.filter(e => e.results.length > 0).map(e => e.id);
    expect(withResults).toEqual(['presidential-2028-11', 'house-2028-11', 'senate-2028-11']);

    const house2026 = state.elections.find(e => e.id === 'house-2026-11');
    expect(house2026?.status).toBe('resolved');
    expect(house2026?.seatTotals).toEqual(report.electionsResolved[0].seatTotals);
    expect(report.electionsResolved[0].results).toHaveLength(6);
  });
});

describe('ElectionScheduler tie breaking', () => {
  const flat = { economy: 0.3, healthcare: 0.3, security: 0.3, environment: 0.3, education: 0.3 };
  const rules = resolveRules({ CHAMBERS: { HOUSE_SIZE: 2, SENATE_SIZE: 2 }, VOTER: { NOISE: 0 } });

  // One neutral state, two parties with the same platform and a calm economy
  function evenWorld(president: string, senateControl: string | null): SimulationState {
    const catalog = parseCatalog({
      scenario: {
        startYear: 2027,
        startMonth: 1,
        president,
        houseSplit: { A: 1, B: 1 },
        senateSplit: { A: 1, B: 1 },
        economy: { growth: 0.02, unemployment: 5.5, inflation: 2.5 },
        budget: { revenue: 100, spending: 100, taxRate: 0.2 },
      },
      states: {
        states: [{ id: 'XX', name: 'Even', population: 500000, districts: 2, lean: 0, gdp: 50, unemployment: 5.5, inflation: 2.5 }],
      },
      parties: { parties: [{ id: 'A', name: 'A Party', platform: flat }, { id: 'B', name: 'B Party', platform: flat }] },
      events: { events: [] },
      policies: { policies: [] },
    });
    const state = createInitialState(catalog, rules, { seed: 1 });
    state.clock = { year: 2028, month: 11 };
    state.elections = state.elections.filter(e => e.kind === 'senate');
    state.states[0].senateSeats[0].incumbent = null;
    state.legislature.senateControl = senateControl;
    return state;
  }

  it('should give an open seat with equal shares to the first party id', () => {
    const state = evenWorld('A', null);
    const resolved = new ElectionScheduler(rules).runDue(state, new RandomStreams(state.rng));

    expect(resolved.map(e => e.id)).toEqual(['senate-2028-11']);
    expect(resolved[0].results).toEqual([
      { seatId: 'XX-S1', previous: null, winner: 'A', shares: { A: 0.5, B: 0.5 }, tieBroken: true },
    ]);
    expect(resolved[0].seatTotals).toEqual({ A: 1, B: 1 });
    expect(resolved[0].winner).toBe('A');
    expect(state.legislature.senateControl).toBe('A');
  });

  it('should keep a tied chamber with its previous majority', () => {
    const state = evenWorld('A', 'B');
    const resolved = new ElectionScheduler(rules).runDue(state, new RandomStreams(state.rng));

    expect(resolved[0].seatTotals).toEqual({ A: 1, B: 1 });
    expect(resolved[0].winner).toBe('B');
    expect(state.president.approval).toBe(50);
  });

  it('should move presidential approval with a Senate flip', () => {
    const gained = evenWorld('A', null);
    new ElectionScheduler(rules).runDue(gained, new RandomStreams(gained.rng));
    expect(gained.president.approval).toBe(50.5);
    expect(gained.legislature.approval).toBe(40);

    const lost = evenWorld('B', null);
    new ElectionScheduler(rules).runDue(lost, new RandomStreams(lost.rng));
    expect(lost.legislature.senateControl).toBe('A');
    expect(lost.president.approval).toBe(49.5);
  });
});
