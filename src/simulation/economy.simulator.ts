// ============================================
// CAPITOL - Economy Simulator
// ============================================

import type { Budget, EffectVector, MacroEconomy, SimulationState, StateEconomy, UsState } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import type { RandomStreams } from './random.js';
import { economySignal } from './voter.model.js';
import { clamp } from '../utils/math.js';

type EconomyRules = SimulationRules['ECONOMY'];

/**
 * Add an effect's macro deltas to the national economy, clamped to the
 * configured ranges.
 */
export function applyMacroEffects(economy: MacroEconomy, effects: EffectVector, rules: EconomyRules): void {
  economy.growth = clamp(economy.growth + effects.growth, rules.GROWTH_RANGE.MIN, rules.GROWTH_RANGE.MAX);
  economy.unemployment = clamp(economy.unemployment + effects.unemployment, rules.UNEMPLOYMENT_RANGE.MIN, rules.UNEMPLOYMENT_RANGE.MAX);
  economy.inflation = clamp(economy.inflation + effects.inflation, rules.INFLATION_RANGE.MIN, rules.INFLATION_RANGE.MAX);
}

/** Local version: growth is booked as a one-off change in GDP */
export function applyStateEffects(economy: StateEconomy, effects: EffectVector, rules: EconomyRules): void {
  economy.gdp = Math.max(0, economy.gdp * (1 + effects.growth));
  economy.unemployment = clamp(economy.unemployment + effects.unemployment, rules.UNEMPLOYMENT_RANGE.MIN, rules.UNEMPLOYMENT_RANGE.MAX);
  economy.inflation = clamp(economy.inflation + effects.inflation, rules.INFLATION_RANGE.MIN, rules.INFLATION_RANGE.MAX);
}

export function deficit(budget: Budget): number {
  return budget.spending - budget.revenue;
}

export class EconomySimulator {
  constructor(private readonly rules: SimulationRules) {}

  /**
   * One month of drift. National drift draws first, then one stream per
   * state, then fundraising and party approval drift (no draws).
   */
  simulate(state: SimulationState, streams: RandomStreams): void {
    this.simulateNational(state, streams);
    for (const usState of state.states) {
      this.simulateState(state, usState, streams);
    }
    this.simulateFederalBudget(state);
    this.simulateFundraising(state);
    this.simulatePartyApproval(state);
  }

  private simulateNational(state: SimulationState, streams: RandomStreams): void {
    const r = this.rules.ECONOMY;
    const rng = streams.stream('economy', state.turn, 'national');
    const economy = state.economy;

    economy.growth = clamp(
      economy.growth + rng.range(-r.GROWTH_DRIFT, r.GROWTH_DRIFT),
      r.GROWTH_RANGE.MIN,
      r.GROWTH_RANGE.MAX
    );
    economy.inflation = clamp(
      economy.inflation + rng.range(-r.INFLATION_DRIFT, r.INFLATION_DRIFT),
      r.INFLATION_RANGE.MIN,
      r.INFLATION_RANGE.MAX
    );
    economy.unemployment = clamp(
      economy.unemployment
        + (r.NATURAL_UNEMPLOYMENT - economy.unemployment) * r.UNEMPLOYMENT_REVERSION
        + rng.range(-r.UNEMPLOYMENT_DRIFT, r.UNEMPLOYMENT_DRIFT),
      r.UNEMPLOYMENT_RANGE.MIN,
      r.UNEMPLOYMENT_RANGE.MAX
    );
  }

  private simulateState(state: SimulationState, usState: UsState, streams: RandomStreams): void {
    const r = this.rules.ECONOMY;
    const rng = streams.stream('economy', state.turn, usState.id);
    const local = usState.economy;
    const national = state.economy;

    const annualGrowth = national.growth + rng.range(-r.STATE_GROWTH_NOISE, r.STATE_GROWTH_NOISE);
    local.gdp = Math.max(0, local.gdp * (1 + annualGrowth / r.MONTHS_PER_YEAR));

    local.unemployment = clamp(
      local.unemployment
        + (national.unemployment - local.unemployment) * r.STATE_REVERSION
        + rng.range(-r.UNEMPLOYMENT_DRIFT, r.UNEMPLOYMENT_DRIFT),
      r.UNEMPLOYMENT_RANGE.MIN,
      r.UNEMPLOYMENT_RANGE.MAX
    );
    local.inflation = clamp(
      local.inflation + (national.inflation - local.inflation) * r.STATE_REVERSION,
      r.INFLATION_RANGE.MIN,
      r.INFLATION_RANGE.MAX
    );

    const budget = usState.budget;
    budget.revenue = budget.taxRate * local.gdp;
    budget.spending = Math.max(
      0,
      budget.spending
        + (budget.revenue - budget.spending) * r.STATE_SPENDING_REVERSION
        + budget.revenue * rng.range(-r.STATE_SPENDING_NOISE, r.STATE_SPENDING_NOISE)
    );
  }

  private simulateFederalBudget(state: SimulationState): void {
    const totalGdp = state.states.reduce((acc, s) => acc + s.economy.gdp, 0);
    state.budget.revenue = state.budget.taxRate * totalGdp;
  }

  /**
   * The president's party rises and falls with the economic mood; the
   * opposition moves the other way and gains on a federal deficit.
   */
  private simulatePartyApproval(state: SimulationState): void {
    const r = this.rules.ECONOMY;
    const mood = economySignal(state.economy, r.NATURAL_UNEMPLOYMENT);
    const deficitRatio = Math.max(0, deficit(state.budget)) / Math.max(1, state.budget.revenue);
    for (const party of state.parties) {
      const delta = party.id === state.president.partyId
        ? r.PARTY_DRIFT_WEIGHT * mood
        : -r.PARTY_DRIFT_WEIGHT * mood + r.DEFICIT_DRIFT_WEIGHT * deficitRatio;
      party.approval = clamp(party.approval + delta, 0, 100);
    }
  }

  private simulateFundraising(state: SimulationState): void {
    const perTurn = this.rules.ECONOMY.FUNDRAISING_PER_TURN;
    for (const party of state.parties) {
      party.treasury += perTurn * (party.approval / 50);
    }
  }
}
