// ============================================
// CAPITOL - Turn Engine Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { PHASES, TurnEngine, type PhaseEvent } from '../src/simulation/engine.js';
import type { Actor } from '../src/simulation/ai.engine.js';
import { InvalidIntervention, SimulationFault, ValidationError } from '../src/plugins/error-handler.plugin.js';
import type { TurnSummary } from '../src/models/types.js';
import { TEST_RULES, testCatalog } from './fixtures.js';

function newEngine(seed = 5): TurnEngine {
  return new TurnEngine({ catalog: testCatalog(), rules: TEST_RULES, seed });
}

describe('TurnEngine.advance', () => {
  it('should leave the state untouched for zero months', () => {
    const engine = newEngine();
    const before = engine.serialize();
    const report = engine.advance(0);

    expect(report.stepsCompleted).toBe(0);
    expect(report.turns).toEqual([]);
    expect(report.from).toEqual({ year: 2025, month: 1 });
    expect(report.to).toEqual({ year: 2025, month: 1 });
    expect(engine.serialize()).toBe(before);
  });

  it('should reject negative and fractional month counts', () => {
    const engine = newEngine();
    expect(() => engine.advance(-1)).toThrow(ValidationError);
    expect(() => engine.advance(1.5)).toThrow(ValidationError);
    expect(engine.turn).toBe(0);
  });

  it('should move the clock one month per step', () => {
    const engine = newEngine();
    const report = engine.advance(14);

    expect(report.stepsCompleted).toBe(14);
    expect(report.to).toEqual({ year: 2026, month: 3 });
    expect(report.turns.map(t => t.turn)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
    expect(report.turns[12].date).toEqual({ year: 2026, month: 1 });
    expect(engine.turn).toBe(14);
    expect(engine.clock).toEqual({ year: 2026, month: 3 });
  });

  it('should be reproducible for the same seed', () => {
    const a = newEngine(21);
    const b = newEngine(21);
    a.advance(30);
    b.advance(30);
    expect(a.serialize()).toBe(b.serialize());
  });

  it('should drift differently for another seed', () => {
    const a = newEngine(21);
    const b = newEngine(22);
    a.advance(3);
    b.advance(3);
    expect(a.getState().economy).not.toEqual(b.getState().economy);
  });

  it('should treat advance(n) then advance(0) like advance(n)', () => {
    const a = newEngine();
    const b = newEngine();
    a.advance(4);
    b.advance(4);
    b.advance(0);
    expect(b.serialize()).toBe(a.serialize());
  });

  it('should split a run without changing where it ends', () => {
    const a = newEngine();
    const b = newEngine();
    a.advance(6);
    b.advance(2);
    b.advance(4);
    expect(b.serialize()).toBe(a.serialize());
  });

  it('should raise party treasuries by fundraising each month', () => {
    const engine = newEngine();
    engine.advance(1);
    expect(engine.getState().parties.map(p => p.treasury)).toEqual([102, 102]);
  });
});

describe('TurnEngine fault handling', () => {
  const rules = { ...TEST_RULES, AI: { ENABLED: true } };
  const failing: Actor = {
    ref: { kind: 'party', id: 'blue' },
    decide() {
      throw new Error('actor crashed');
    },
  };

  it('should keep the last completed step when a turn fails', () => {
    const engine = new TurnEngine({
      catalog: testCatalog(),
      rules,
      seed: 5,
      actors: snapshot => (snapshot.turn === 2 ? [failing] : []),
    });

    let fault: unknown;
    try {
      engine.advance(5);
    } catch (error) {
      fault = error;
    }

    expect(fault).toBeInstanceOf(SimulationFault);
    if (fault instanceof SimulationFault) {
      expect(fault.message).toBe('actor crashed');
      expect(fault.context).toEqual({ turn: 2, cause: 'Error' });
      expect(fault.report?.stepsCompleted).toBe(2);
      expect(fault.report?.to).toEqual({ year: 2025, month: 3 });
    }
    expect(engine.turn).toBe(2);
    expect(engine.clock).toEqual({ year: 2025, month: 3 });
    expect(engine.isAdvancing).toBe(false);

    const reference = new TurnEngine({ catalog: testCatalog(), rules, seed: 5, actors: () => [] });
    reference.advance(2);
    expect(engine.serialize()).toBe(reference.serialize());
  });

  it('should count a turn that committed before its listener failed', () => {
    const engine = newEngine();
    engine.on('turn', (summary: TurnSummary) => {
      if (summary.turn === 1) throw new Error('listener crashed');
    });

    let fault: unknown;
    try {
      engine.advance(5);
    } catch (error) {
      fault = error;
    }

    expect(fault).toBeInstanceOf(SimulationFault);
    if (fault instanceof SimulationFault) {
      expect(fault.message).toBe('listener crashed');
      expect(fault.context).toEqual({ turn: 1, listener: 'turn', cause: 'Error' });
      expect(fault.report?.stepsCompleted).toBe(2);
      expect(fault.report?.turns.map(t => t.turn)).toEqual([0, 1]);
      expect(fault.report?.to).toEqual({ year: 2025, month: 3 });
    }
    expect(engine.turn).toBe(2);
    expect(engine.isAdvancing).toBe(false);
  });
});

describe('TurnEngine events', () => {
  it('should announce every phase in order', () => {
    const engine = newEngine();
    const phases: PhaseEvent[] = [];
    engine.on('phase', (event: PhaseEvent) => phases.push(event));
    engine.advance(1);

    expect(phases.map(p => p.phase)).toEqual([...PHASES]);
    expect(phases.every(p => p.turn === 0)).toBe(true);
  });

  it('should emit a summary per committed turn', () => {
    const engine = newEngine();
    const turns: number[] = [];
    engine.on('turn', (summary: TurnSummary) => turns.push(summary.turn));
    engine.advance(3);
    expect(turns).toEqual([0, 1, 2]);
  });

  it('should refuse interventions while a turn is running', () => {
    const engine = newEngine();
    let rejected: unknown;
    engine.on('phase', (event: PhaseEvent) => {
      if (event.phase !== 'legislation') return;
      try {
        engine.triggerEvent('townhall');
      } catch (error) {
        rejected = error;
      }
    });

    engine.advance(1);
    expect(rejected).toBeInstanceOf(InvalidIntervention);
    expect(engine.getState().events.queued).toEqual([]);
    expect(engine.isAdvancing).toBe(false);
  });
});

describe('TurnEngine.getState', () => {
  it('should hand out copies', () => {
    const engine = newEngine();
    const state = engine.getState();
    state.parties[0].treasury = 0;
    expect(engine.getState().parties[0].treasury).toBe(100);
  });
});
