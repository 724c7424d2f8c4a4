// ============================================
// CAPITOL - Scenario Factory
// ============================================
// Builds the initial SimulationState from the catalog: states, districts and
// Senate seats, with the House and Senate split the scenario asks for.

import type {
  District,
  PartyId,
  PoliticalParty,
  SenateSeat,
  SimDate,
  SimulationState,
  UsState,
} from '../models/types.js';
import { NATIONAL_REGION } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import type { Catalog } from '../config/catalog.js';
import type { PartyDefinition, StateDefinition } from '../schemas/catalog.schema.js';
import { ConfigurationFault } from '../plugins/error-handler.plugin.js';
import { neutralOpinion } from './opinion.tracker.js';
import { RandomStreams } from './random.js';
import { ElectionScheduler, controlOf, recountSeats, seatTotals } from './election.scheduler.js';
import { clamp, compareIds } from '../utils/math.js';

const DISTRICT_LEAN_SPREAD = 0.2;

export interface ScenarioOptions {
  seed: number;
  start?: SimDate;
}

/**
 * Per-party lean from a state's scalar lean: the first party gets it as is,
 * the second its mirror, any other party starts even.
 */
export function leanFor(lean: number, parties: readonly PartyDefinition[]): Record<PartyId, number> {
  const result: Record<PartyId, number> = {};
  parties.forEach((party, index) => {
    result[party.id] = index === 0 ? lean : index === 1 ? -lean : 0;
  });
  return result;
}

/**
 * Check the catalog against the chamber sizes in the rules. Every issue is
 * collected before throwing.
 */
export function validateScenario(catalog: Catalog, rules: SimulationRules): void {
  const issues: string[] = [];
  const { HOUSE_SIZE, SENATE_SIZE, SENATE_SEATS_PER_STATE, SENATE_CLASSES } = rules.CHAMBERS;

  if (catalog.parties.length === 0) issues.push('scenario defines no parties');

  const districts = catalog.states.reduce((acc, s) => acc + s.districts, 0);
  if (districts !== HOUSE_SIZE) {
    issues.push(`states define ${districts} districts, House size is ${HOUSE_SIZE}`);
  }
  const senateSeats = catalog.states.length * SENATE_SEATS_PER_STATE;
  if (senateSeats !== SENATE_SIZE) {
    issues.push(`${catalog.states.length} states x ${SENATE_SEATS_PER_STATE} seats is ${senateSeats}, Senate size is ${SENATE_SIZE}`);
  }
  if (SENATE_SEATS_PER_STATE > SENATE_CLASSES) {
    issues.push(`a state cannot hold ${SENATE_SEATS_PER_STATE} seats across ${SENATE_CLASSES} classes`);
  }

  const houseSplit = Object.values(catalog.scenario.houseSplit).reduce((a, b) => a + b, 0);
  if (houseSplit !== HOUSE_SIZE) issues.push(`House split sums to ${houseSplit}, expected ${HOUSE_SIZE}`);
  const senateSplit = Object.values(catalog.scenario.senateSplit).reduce((a, b) => a + b, 0);
  if (senateSplit !== SENATE_SIZE) issues.push(`Senate split sums to ${senateSplit}, expected ${SENATE_SIZE}`);

  for (const [id, count] of [...Object.entries(catalog.scenario.houseSplit), ...Object.entries(catalog.scenario.senateSplit)]) {
    if (!Number.isInteger(count) || count < 0) issues.push(`seat count for '${id}' must be a non-negative integer`);
  }

  if (issues.length > 0) {
    throw new ConfigurationFault('Invalid scenario', issues);
  }
}

/**
 * Hand out seats greedily: each party, in split order, takes the remaining
 * seats that lean its way the most (ties by id).
 */
function assignSeats<T extends { id: string; incumbent: PartyId | null }>(
  seats: T[],
  split: Record<PartyId, number>,
  leanOf: (seat: T, partyId: PartyId) => number
): void {
  const open = new Set(seats.map(s => s.id));
  for (const [partyId, count] of Object.entries(split)) {
    const ranked = seats
      .filter(s => open.has(s.id))
      .sort((a, b) => leanOf(b, partyId) - leanOf(a, partyId) || compareIds(a.id, b.id))
      .slice(0, count);
    for (const seat of ranked) {
      seat.incumbent = partyId;
      open.delete(seat.id);
    }
  }
}

function buildState(def: StateDefinition, index: number, parties: readonly PartyDefinition[], rules: SimulationRules, streams: RandomStreams): UsState {
  const lean = leanFor(def.lean, parties);
  const variation = streams.stream('scenario', 0, def.id);

  const districts: District[] = [];
  for (let n = 1; n <= def.districts; n++) {
    const offset = variation.range(-DISTRICT_LEAN_SPREAD, DISTRICT_LEAN_SPREAD);
    districts.push({
      id: `${def.id}-${String(n).padStart(2, '0')}`,
      stateId: def.id,
      lean: leanFor(clamp(def.lean + offset, -1, 1), parties),
      incumbent: null,
      voteShares: {},
      campaign: {},
    });
  }

  const senateSeats: SenateSeat[] = [];
  for (let n = 0; n < rules.CHAMBERS.SENATE_SEATS_PER_STATE; n++) {
    const seatClass = (index + n) % rules.CHAMBERS.SENATE_CLASSES;
    senateSeats.push({ id: `${def.id}-S${seatClass + 1}`, stateId: def.id, seatClass, incumbent: null });
  }

  const ranked = [...parties].sort((a, b) => (lean[b.id] ?? 0) - (lean[a.id] ?? 0) || compareIds(a.id, b.id));
  const revenue = def.taxRate * def.gdp;

  return {
    id: def.id,
    name: def.name,
    population: def.population,
    lean,
    governorParty: ranked[0].id,
    economy: { gdp: def.gdp, unemployment: def.unemployment, inflation: def.inflation },
    budget: { revenue, spending: revenue, taxRate: def.taxRate },
    districts,
    senateSeats,
    campaign: {},
    enactedPolicies: [],
  };
}

export function createInitialState(catalog: Catalog, rules: SimulationRules, options: ScenarioOptions): SimulationState {
  validateScenario(catalog, rules);

  const scenario = catalog.scenario;
  const clock = options.start ?? { year: scenario.startYear, month: scenario.startMonth };
  if (!Number.isInteger(clock.year) || !Number.isInteger(clock.month) || clock.month < 1 || clock.month > 12) {
    throw new ConfigurationFault('Invalid start date', [`${clock.year}-${clock.month}`]);
  }

  const rng = { seed: options.seed, counters: {} };
  const streams = new RandomStreams(rng);
  const states = catalog.states.map((def, index) => buildState(def, index, catalog.parties, rules, streams));

  const districtLean = new Map<string, Record<PartyId, number>>();
  for (const s of states) for (const d of s.districts) districtLean.set(d.id, d.lean);
  const stateLean = new Map(states.map(s => [s.id, s.lean]));

  assignSeats(
    states.flatMap(s => s.districts),
    scenario.houseSplit,
    (seat, partyId) => districtLean.get(seat.id)?.[partyId] ?? 0
  );
  assignSeats(
    states.flatMap(s => s.senateSeats),
    scenario.senateSplit,
    (seat, partyId) => stateLean.get(seat.stateId)?.[partyId] ?? 0
  );

  const parties: PoliticalParty[] = catalog.parties.map(def => ({
    id: def.id,
    name: def.name,
    platform: { ...def.platform },
    treasury: def.treasury,
    approval: def.approval,
    seats: { house: 0, senate: 0 },
  }));

  const opinion: SimulationState['opinion'] = { [NATIONAL_REGION]: neutralOpinion(rules.OPINION.BASELINE) };
  for (const s of states) opinion[s.id] = neutralOpinion(rules.OPINION.BASELINE);

  const state: SimulationState = {
    version: 1,
    clock: { year: clock.year, month: clock.month },
    turn: 0,
    rng,
    economy: { ...scenario.economy },
    budget: { ...scenario.budget },
    president: {
      partyId: scenario.president,
      approval: scenario.presidentApproval ?? rules.OPINION.PRESIDENT_APPROVAL_BASELINE,
    },
    legislature: {
      houseSize: rules.CHAMBERS.HOUSE_SIZE,
      senateSize: rules.CHAMBERS.SENATE_SIZE,
      houseControl: null,
      senateControl: null,
      approval: scenario.congressApproval ?? rules.OPINION.CONGRESS_APPROVAL_BASELINE,
    },
    court: { lean: scenario.courtLean ?? scenario.president },
    parties,
    states,
    opinion,
    policies: [],
    elections: [],
    events: { cooldowns: {}, retired: [], pending: [], queued: [], recent: [], manualSeq: 0 },
    log: [],
    nextPolicySeq: 1,
  };

  recountSeats(state);
  state.legislature.houseControl = controlOf(seatTotals(parties, 'house'), null);
  state.legislature.senateControl = controlOf(seatTotals(parties, 'senate'), null);
  new ElectionScheduler(rules).schedule(state);
  streams.commit();

  return state;
}
