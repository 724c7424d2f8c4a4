// ============================================
// CAPITOL - Simulation Rules & Tunables
// ============================================

import { z } from 'zod';
import { ConfigurationFault } from '../plugins/error-handler.plugin.js';

// ============================================
// Chambers
// ============================================
export const CHAMBERS = {
  HOUSE_SIZE: 435,
  SENATE_SIZE: 100,
  SENATE_SEATS_PER_STATE: 2,
  SENATE_CLASSES: 3,
};

// ============================================
// Elections
// ============================================
export const ELECTIONS = {
  ELECTION_MONTH: 11, // November
  HOUSE_CYCLE_YEARS: 2,
  SENATE_CYCLE_YEARS: 2, // one class every cycle, each class every 6 years
  PRESIDENTIAL_CYCLE_YEARS: 4,
  ELECTORAL_VOTES_PER_STATE_BONUS: 2, // senators' share of the electoral college
  CONTROL_FLIP_APPROVAL: 1, // approval moved when a chamber or the presidency changes hands
  HOUSE_FLIP_PRESIDENT_APPROVAL: 1,  // presidential approval won or lost with the House
  HOUSE_FLIP_CONGRESS_APPROVAL: 0.5,
  SENATE_FLIP_PRESIDENT_APPROVAL: 0.5,
  RESULT_HISTORY: 3, // resolved elections that keep their per-seat results
};

// ============================================
// Public Opinion
// ============================================
export const OPINION = {
  MIN: -1,
  MAX: 1,
  BASELINE: 0,
  DECAY_RATE: 0.05, // fraction toward baseline per month
  MAX_DELTA: 0.5,   // largest single change one effect may apply
  NATIONAL_WEIGHT: 0.5, // share of national opinion in a state's electorate
  PRESIDENT_APPROVAL_BASELINE: 50,
  CONGRESS_APPROVAL_BASELINE: 40,
  APPROVAL_REVERSION: 0.05, // fraction toward the approval baselines per month
};

// ============================================
// Legislature
// ============================================
export const LEGISLATURE = {
  MAJORITY_THRESHOLD: 0.5,
  SUPERMAJORITY_THRESHOLD: 2 / 3,
  ALIGNMENT_WEIGHT: 0.5,
  SPONSOR_BONUS: 0.25,
  COURT_RISK: 0.05, // yes-share lost when the court leans against the sponsor
  COURT_INFLATION_THRESHOLD: 0.7,
  ENACTMENT_APPROVAL: 1, // presidential approval gained when the president's party passes a bill
};

// ============================================
// Voter Model
// ============================================
export const VOTER = {
  BASE_SCORE: 1,
  LEAN_WEIGHT: 0.5,
  OPINION_WEIGHT: 0.3,
  INCUMBENCY_BONUS: 0.05,
  CAMPAIGN_WEIGHT: 0.1,
  CAMPAIGN_SCALE: 10,   // spend that yields a full campaign effect
  ECONOMY_WEIGHT: 0.05, // president's party is judged on the economy
  APPROVAL_WEIGHT: 0.1,  // and on approval of the office it holds
  NOISE: 0.03,
  MIN_SCORE: 0.01,
};

// ============================================
// Events
// ============================================
export const EVENTS = {
  RANDOM_CHANCE: 0.35,
  MAX_RANDOM_PER_TURN: 1,
  DEFAULT_COOLDOWN_TURNS: 6,
  RECENT_HISTORY: 12,
  PARTY_BENEFIT_APPROVAL: 1,
};

// ============================================
// AI Decisions
// ============================================
export const AI = {
  ENABLED: true,
  EXPLORATION_RATE: 0.1,
  OPINION_WEIGHT: 1,
  ALIGNMENT_WEIGHT: 0.5,
  COST_WEIGHT: 0.002,
  CAMPAIGN_WEIGHT: 0.6,
  CAMPAIGN_AMOUNT: 5,
  CAMPAIGN_HORIZON_MONTHS: 12,
  BUDGET_WEIGHT: 2,
  DEFICIT_TOLERANCE: 5, // billions a state may run before cutting
  BUDGET_CUT_SHARE: 0.5,
  POLICY_COOLDOWN_TURNS: 12,
};

// ============================================
// Economy
// ============================================
export const ECONOMY = {
  GROWTH_DRIFT: 0.002,
  INFLATION_DRIFT: 0.05,
  UNEMPLOYMENT_DRIFT: 0.05,
  GROWTH_RANGE: { MIN: -0.05, MAX: 0.06 },
  INFLATION_RANGE: { MIN: 0, MAX: 10 },
  UNEMPLOYMENT_RANGE: { MIN: 2.5, MAX: 20 },
  NATURAL_UNEMPLOYMENT: 5.5,
  UNEMPLOYMENT_REVERSION: 0.02, // monthly pull toward the natural rate
  STATE_REVERSION: 0.1,         // monthly pull of state rates toward national
  STATE_GROWTH_NOISE: 0.01,
  STATE_SPENDING_REVERSION: 0.2,
  STATE_SPENDING_NOISE: 0.03,
  FUNDRAISING_PER_TURN: 2, // treasury gained per month at 50% approval
  PARTY_DRIFT_WEIGHT: 0.2,  // monthly party approval moved by the economic mood
  DEFICIT_DRIFT_WEIGHT: 0.5, // opposition approval gained per unit of deficit ratio
  MONTHS_PER_YEAR: 12,
};

// ============================================
// Simulation Log
// ============================================
export const LOG = {
  MAX_ENTRIES: 120,
  TAIL: 10, // entries shown in the overview
};

export const SIMULATION_RULES = {
  CHAMBERS,
  ELECTIONS,
  OPINION,
  LEGISLATURE,
  VOTER,
  EVENTS,
  AI,
  ECONOMY,
  LOG,
};

export type SimulationRules = typeof SIMULATION_RULES;

export type RuleOverrides = {
  [K in keyof SimulationRules]?: Partial<SimulationRules[K]>;
};

// ============================================
// Validation
// ============================================

const fraction = z.number().min(0).max(1);
const nonNegative = z.number().min(0);
const positiveInt = z.number().int().positive();
const range = z.object({ MIN: z.number(), MAX: z.number() }).refine(r => r.MIN <= r.MAX, 'MIN must not exceed MAX');

const rulesSchema = z.object({
  CHAMBERS: z.object({
    HOUSE_SIZE: positiveInt,
    SENATE_SIZE: positiveInt,
    SENATE_SEATS_PER_STATE: positiveInt,
    SENATE_CLASSES: positiveInt,
  }),
  ELECTIONS: z.object({
    ELECTION_MONTH: z.number().int().min(1).max(12),
    HOUSE_CYCLE_YEARS: positiveInt,
    SENATE_CYCLE_YEARS: positiveInt,
    PRESIDENTIAL_CYCLE_YEARS: positiveInt,
    ELECTORAL_VOTES_PER_STATE_BONUS: z.number().int().min(0),
    CONTROL_FLIP_APPROVAL: nonNegative,
    HOUSE_FLIP_PRESIDENT_APPROVAL: nonNegative,
    HOUSE_FLIP_CONGRESS_APPROVAL: nonNegative,
    SENATE_FLIP_PRESIDENT_APPROVAL: nonNegative,
    RESULT_HISTORY: z.number().int().min(0),
  }),
  OPINION: z.object({
    MIN: z.number(),
    MAX: z.number(),
    BASELINE: z.number(),
    DECAY_RATE: fraction,
    MAX_DELTA: nonNegative,
    NATIONAL_WEIGHT: fraction,
    PRESIDENT_APPROVAL_BASELINE: z.number().min(0).max(100),
    CONGRESS_APPROVAL_BASELINE: z.number().min(0).max(100),
    APPROVAL_REVERSION: fraction,
  }).refine(o => o.MIN < o.MAX && o.BASELINE >= o.MIN && o.BASELINE <= o.MAX, 'BASELINE must lie within MIN..MAX'),
  LEGISLATURE: z.object({
    MAJORITY_THRESHOLD: fraction,
    SUPERMAJORITY_THRESHOLD: fraction,
    ALIGNMENT_WEIGHT: nonNegative,
    SPONSOR_BONUS: nonNegative,
    COURT_RISK: fraction,
    COURT_INFLATION_THRESHOLD: z.number(),
    ENACTMENT_APPROVAL: nonNegative,
  }).refine(l => l.SUPERMAJORITY_THRESHOLD >= l.MAJORITY_THRESHOLD, 'SUPERMAJORITY_THRESHOLD must be at least MAJORITY_THRESHOLD'),
  VOTER: z.object({
    BASE_SCORE: z.number().positive(),
    LEAN_WEIGHT: nonNegative,
    OPINION_WEIGHT: nonNegative,
    INCUMBENCY_BONUS: nonNegative,
    CAMPAIGN_WEIGHT: nonNegative,
    CAMPAIGN_SCALE: z.number().positive(),
    ECONOMY_WEIGHT: nonNegative,
    APPROVAL_WEIGHT: nonNegative,
    NOISE: nonNegative,
    MIN_SCORE: z.number().positive(),
  }),
  EVENTS: z.object({
    RANDOM_CHANCE: fraction,
    MAX_RANDOM_PER_TURN: z.number().int().min(0),
    DEFAULT_COOLDOWN_TURNS: z.number().int().min(0),
    RECENT_HISTORY: z.number().int().min(0),
    PARTY_BENEFIT_APPROVAL: nonNegative,
  }),
  AI: z.object({
    ENABLED: z.boolean(),
    EXPLORATION_RATE: fraction,
    OPINION_WEIGHT: nonNegative,
    ALIGNMENT_WEIGHT: nonNegative,
    COST_WEIGHT: nonNegative,
    CAMPAIGN_WEIGHT: nonNegative,
    CAMPAIGN_AMOUNT: z.number().positive(),
    CAMPAIGN_HORIZON_MONTHS: positiveInt,
    BUDGET_WEIGHT: nonNegative,
    DEFICIT_TOLERANCE: nonNegative,
    BUDGET_CUT_SHARE: fraction,
    POLICY_COOLDOWN_TURNS: z.number().int().min(0),
  }),
  ECONOMY: z.object({
    GROWTH_DRIFT: nonNegative,
    INFLATION_DRIFT: nonNegative,
    UNEMPLOYMENT_DRIFT: nonNegative,
    GROWTH_RANGE: range,
    INFLATION_RANGE: range,
    UNEMPLOYMENT_RANGE: range,
    NATURAL_UNEMPLOYMENT: nonNegative,
    UNEMPLOYMENT_REVERSION: fraction,
    STATE_REVERSION: fraction,
    STATE_GROWTH_NOISE: nonNegative,
    STATE_SPENDING_REVERSION: fraction,
    STATE_SPENDING_NOISE: nonNegative,
    FUNDRAISING_PER_TURN: nonNegative,
    PARTY_DRIFT_WEIGHT: nonNegative,
    DEFICIT_DRIFT_WEIGHT: nonNegative,
    MONTHS_PER_YEAR: positiveInt,
  }),
  LOG: z.object({
    MAX_ENTRIES: z.number().int().min(0),
    TAIL: z.number().int().min(0),
  }),
});

/**
 * Merge overrides onto the default rules and validate the result.
 * Throws ConfigurationFault listing every offending field.
 */
export function resolveRules(overrides: RuleOverrides = {}): SimulationRules {
  const merged: SimulationRules = {
    CHAMBERS: { ...CHAMBERS, ...overrides.CHAMBERS },
    ELECTIONS: { ...ELECTIONS, ...overrides.ELECTIONS },
    OPINION: { ...OPINION, ...overrides.OPINION },
    LEGISLATURE: { ...LEGISLATURE, ...overrides.LEGISLATURE },
    VOTER: { ...VOTER, ...overrides.VOTER },
    EVENTS: { ...EVENTS, ...overrides.EVENTS },
    AI: { ...AI, ...overrides.AI },
    ECONOMY: { ...ECONOMY, ...overrides.ECONOMY },
    LOG: { ...LOG, ...overrides.LOG },
  };

  const result = rulesSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationFault(
      'Invalid simulation rules',
      result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }

  return merged;
}
