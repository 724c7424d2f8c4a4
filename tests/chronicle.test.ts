// ============================================
// CAPITOL - Simulation Log Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { appendLog, logTail } from '../src/simulation/chronicle.js';
import { createInitialState } from '../src/simulation/scenario.js';
import { resolveRules } from '../src/config/rules.js';
import type { SimulationState } from '../src/models/types.js';
import { TEST_RULES, testCatalog } from './fixtures.js';

describe('appendLog', () => {
  let state: SimulationState;

  beforeEach(() => {
    state = createInitialState(testCatalog(), resolveRules(TEST_RULES), { seed: 1 });
  });

  it('should stamp entries with the turn and date', () => {
    state.turn = 4;
    state.clock = { year: 2025, month: 5 };
    appendLog(state, 'Policy passed: Clinic Grants', 10);

    expect(state.log).toEqual([{ turn: 4, date: { year: 2025, month: 5 }, message: 'Policy passed: Clinic Grants' }]);
  });

  it('should drop the oldest entries past the limit', () => {
    for (const message of ['one', 'two', 'three', 'four']) appendLog(state, message, 3);
    expect(state.log.map(e => e.message)).toEqual(['two', 'three', 'four']);
  });

  it('should not share the clock object', () => {
    appendLog(state, 'one', 3);
    state.clock.month = 9;
    expect(state.log[0].date.month).toBe(1);
  });
});

describe('logTail', () => {
  const log = ['a', 'b', 'c'].map((message, turn) => ({ turn, date: { year: 2025, month: turn + 1 }, message }));

  it('should return the most recent entries in order', () => {
    expect(logTail(log, 2).map(e => e.message)).toEqual(['b', 'c']);
    expect(logTail(log, 10)).toHaveLength(3);
  });

  it('should return nothing for a non-positive count', () => {
    expect(logTail(log, 0)).toEqual([]);
  });
});
