// ============================================
// CAPITOL - AI Decision Engine Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { TurnEngine } from '../src/simulation/engine.js';
import { AIDecisionEngine, PartyActor, StateActor, chooseIntent, meetsRequirements } from '../src/simulation/ai.engine.js';
import { RandomStream, RandomStreams } from '../src/simulation/random.js';
import { createInitialState } from '../src/simulation/scenario.js';
import { resolveRules } from '../src/config/rules.js';
import type { Intent } from '../src/models/types.js';
import { TEST_RULES, testCatalog } from './fixtures.js';

const rules = resolveRules({ ...TEST_RULES, AI: { ENABLED: true, EXPLORATION_RATE: 0 } });
const catalog = testCatalog();

function initialState() {
  return createInitialState(catalog, rules, { seed: 1 });
}

describe('chooseIntent', () => {
  const idle: Intent = { kind: 'idle', actor: { kind: 'party', id: 'blue' }, score: 0 };
  const campaign: Intent = {
    kind: 'campaign',
    actor: { kind: 'party', id: 'blue' },
    partyId: 'blue',
    stateId: 'CC',
    districtId: null,
    amount: 5,
    score: 0.4,
  };

  it('should take the highest score', () => {
    expect(chooseIntent([idle, campaign], new RandomStream('t', 1, 0), 0)).toBe(campaign);
  });

  it('should always draw the exploration roll', () => {
    const stream = new RandomStream('t', 1, 0);
    chooseIntent([idle, campaign], stream, 0);
    expect(stream.draws).toBe(1);
  });

  it('should refuse an empty option list', () => {
    expect(() => chooseIntent([], new RandomStream('t', 1, 0), 0)).toThrow(RangeError);
  });
});

describe('meetsRequirements', () => {
  const template = catalog.policies[0];
  const conditions = { growth: 0.02, unemployment: 5, inflation: 2.5, deficit: 10 };

  it('should accept a template without requirements', () => {
    expect(meetsRequirements(template, conditions)).toBe(true);
  });

  it('should check every bound', () => {
    expect(meetsRequirements({ ...template, requirements: { minUnemployment: 6 } }, conditions)).toBe(false);
    expect(meetsRequirements({ ...template, requirements: { minDeficit: 10 } }, conditions)).toBe(true);
    expect(meetsRequirements({ ...template, requirements: { maxGrowth: 0.01 } }, conditions)).toBe(false);
  });
});

describe('StateActor', () => {
  it('should cut spending when the deficit runs past tolerance', () => {
    const state = initialState();
    state.states[0].budget = { revenue: 20, spending: 45, taxRate: 0.2 };

    const intent = new StateActor('AA', rules, catalog.policies).decide(state, new RandomStream('actor:state:AA', 1, 0));
    expect(intent).toEqual({
      kind: 'adjust_budget',
      actor: { kind: 'state', id: 'AA' },
      stateId: 'AA',
      delta: -12.5,
      score: 2,
    });
  });

  it('should propose its own state policy otherwise', () => {
    const state = initialState();
    state.states[0].budget = { revenue: 60, spending: 60, taxRate: 0.2 };

    const intent = new StateActor('AA', rules, catalog.policies).decide(state, new RandomStream('actor:state:AA', 1, 0));
    expect(intent.kind).toBe('propose');
    if (intent.kind === 'propose') {
      expect(intent.policy).toMatchObject({ key: 'aa_schools', level: 'state', stateId: 'AA' });
    }
  });

  it('should not repeat a policy that is still pending', () => {
    const state = initialState();
    state.states[0].budget = { revenue: 60, spending: 60, taxRate: 0.2 };
    state.policies.push({
      id: 'pol-1',
      key: 'aa_schools',
      title: 'Alpha School Grants',
      sponsor: { kind: 'state', id: 'AA' },
      sponsorParty: 'blue',
      level: 'state',
      stateId: 'AA',
      issue: 'education',
      cost: 1,
      effects: { growth: 0, unemployment: 0, inflation: 0, budget: 0, opinion: { education: 0.1 } },
      status: 'voting',
      proposedTurn: 0,
      votingTurn: 0,
      resolvedTurn: null,
      tally: null,
    });

    const intent = new StateActor('AA', rules, catalog.policies).decide(state, new RandomStream('actor:state:AA', 1, 0));
    expect(intent.kind).toBe('idle');
  });
});

describe('PartyActor', () => {
  it('should propose a federal policy far from an election', () => {
    const intent = new PartyActor('blue', rules, catalog.policies).decide(initialState(), new RandomStream('actor:party:blue', 1, 0));
    expect(intent.kind).toBe('propose');
    if (intent.kind === 'propose') {
      expect(intent.policy.key).toBe('relief');
      // 0.05 * 0.5 headroom + 0.5 * 0.2 alignment - 0.002 * 10 cost
      expect(intent.score).toBeCloseTo(0.105, 12);
    }
  });

  it('should campaign in the swing state just before an election', () => {
    const state = initialState();
    state.clock = { year: 2026, month: 10 };

    const intent = new PartyActor('blue', rules, catalog.policies).decide(state, new RandomStream('actor:party:blue', 1, 0));
    expect(intent).toMatchObject({ kind: 'campaign', partyId: 'blue', stateId: 'CC', districtId: 'CC-01', amount: 5 });
    expect(intent.score).toBeCloseTo(0.55, 12);
  });

  it('should skip campaigning without the funds', () => {
    const state = initialState();
    state.clock = { year: 2026, month: 10 };
    state.parties[0].treasury = 4;

    const intent = new PartyActor('blue', rules, catalog.policies).decide(state, new RandomStream('actor:party:blue', 1, 0));
    expect(intent.kind).toBe('propose');
  });
});

describe('AIDecisionEngine', () => {
  it('should build one actor per party and per state', () => {
    const ai = new AIDecisionEngine(rules, catalog.policies);
    expect(ai.actorsFor(initialState()).map(a => `${a.ref.kind}:${a.ref.id}`)).toEqual([
      'party:blue',
      'party:red',
      'state:AA',
      'state:BB',
      'state:CC',
    ]);
  });

  it('should return intents in actor order whatever order actors are asked in', () => {
    const ai = new AIDecisionEngine(rules, catalog.policies);
    const state = initialState();
    const forward = ai.collect(state, new RandomStreams({ seed: 1, counters: {} }), ai.actorsFor(state));
    const backward = ai.collect(state, new RandomStreams({ seed: 1, counters: {} }), ai.actorsFor(state).reverse());
    expect(backward).toEqual(forward);
    expect(forward.map(i => i.actor.id)).toEqual(['blue', 'red', 'AA', 'BB', 'CC']);
  });

  it('should return nothing when disabled', () => {
    const disabled = resolveRules(TEST_RULES);
    const ai = new AIDecisionEngine(disabled, catalog.policies);
    const state = initialState();
    expect(ai.collect(state, new RandomStreams({ seed: 1, counters: {} }), ai.actorsFor(state))).toEqual([]);
  });

  it('should reach the same state whatever order actors are asked in', () => {
    const forward = new TurnEngine({ seed: 9 });
    const backward = new TurnEngine({ seed: 9, actors: s => new AIDecisionEngine(forward.rules, forward.catalog.policies).actorsFor(s).reverse() });

    forward.advance(12);
    backward.advance(12);
    expect(backward.serialize()).toBe(forward.serialize());
  });
});
