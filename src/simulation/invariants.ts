// ============================================
// CAPITOL - State Invariants
// ============================================

import { NATIONAL_REGION, type SimulationState } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import { PublicOpinionTracker } from './opinion.tracker.js';

/**
 * Every invariant violation in a state, as readable strings. Used after each
 * step and when loading a snapshot.
 */
export function invariantIssues(state: SimulationState, rules: SimulationRules): string[] {
  const issues: string[] = [];
  const partyIds = new Set(state.parties.map(p => p.id));

  if (state.clock.month < 1 || state.clock.month > 12 || !Number.isInteger(state.clock.month)) {
    issues.push(`clock month ${state.clock.month} is not a calendar month`);
  }
  if (!partyIds.has(state.president.partyId)) {
    issues.push(`president belongs to unknown party '${state.president.partyId}'`);
  }

  let districts = 0;
  let senateSeats = 0;
  const house: Record<string, number> = {};
  const senate: Record<string, number> = {};
  for (const usState of state.states) {
    for (const district of usState.districts) {
      districts++;
      if (district.incumbent === null) {
        issues.push(`district ${district.id} has no incumbent`);
      } else if (!partyIds.has(district.incumbent)) {
        issues.push(`district ${district.id} is held by unknown party '${district.incumbent}'`);
      } else {
        house[district.incumbent] = (house[district.incumbent] ?? 0) + 1;
      }
    }
    for (const seat of usState.senateSeats) {
      senateSeats++;
      if (seat.incumbent === null) {
        issues.push(`senate seat ${seat.id} has no incumbent`);
      } else if (!partyIds.has(seat.incumbent)) {
        issues.push(`senate seat ${seat.id} is held by unknown party '${seat.incumbent}'`);
      } else {
        senate[seat.incumbent] = (senate[seat.incumbent] ?? 0) + 1;
      }
    }
  }

  if (districts !== state.legislature.houseSize) {
    issues.push(`${districts} districts for a House of ${state.legislature.houseSize}`);
  }
  if (senateSeats !== state.legislature.senateSize) {
    issues.push(`${senateSeats} senate seats for a Senate of ${state.legislature.senateSize}`);
  }
  for (const party of state.parties) {
    if (party.seats.house !== (house[party.id] ?? 0)) {
      issues.push(`party ${party.id} reports ${party.seats.house} House seats but holds ${house[party.id] ?? 0}`);
    }
    if (party.seats.senate !== (senate[party.id] ?? 0)) {
      issues.push(`party ${party.id} reports ${party.seats.senate} Senate seats but holds ${senate[party.id] ?? 0}`);
    }
  }

  for (const region of [NATIONAL_REGION, ...state.states.map(s => s.id)]) {
    if (state.opinion[region] === undefined) issues.push(`opinion table has no row for '${region}'`);
  }
  const tracker = new PublicOpinionTracker(state.opinion, rules.OPINION);
  for (const entry of tracker.outOfBounds()) {
    issues.push(`opinion ${entry} is out of bounds`);
  }

  for (const policy of state.policies) {
    if ((policy.status === 'enacted' || policy.status === 'rejected') && policy.votingTurn === null) {
      issues.push(`policy ${policy.id} was resolved without a vote`);
    }
  }

  issues.push(...referenceIssues(state, rules));
  return issues;
}

function duplicated(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) repeated.add(id);
    seen.add(id);
  }
  return [...repeated];
}

/**
 * Cross-references between slices: unique ids, and every party, state and
 * Senate class a record points at exists.
 */
function referenceIssues(state: SimulationState, rules: SimulationRules): string[] {
  const issues: string[] = [];
  const partyIds = new Set(state.parties.map(p => p.id));
  const stateIds = new Set(state.states.map(s => s.id));
  const classes = rules.CHAMBERS.SENATE_CLASSES;

  const idLists: Array<[string, string[]]> = [
    ['party', state.parties.map(p => p.id)],
    ['state', state.states.map(s => s.id)],
    ['district', state.states.flatMap(s => s.districts.map(d => d.id))],
    ['senate seat', state.states.flatMap(s => s.senateSeats.map(seat => seat.id))],
  ];
  for (const [label, ids] of idLists) {
    for (const id of duplicated(ids)) issues.push(`${label} id '${id}' is used more than once`);
  }

  for (const usState of state.states) {
    if (!partyIds.has(usState.governorParty)) {
      issues.push(`state ${usState.id} is governed by unknown party '${usState.governorParty}'`);
    }
    for (const district of usState.districts) {
      if (district.stateId !== usState.id) {
        issues.push(`district ${district.id} names state '${district.stateId}' but sits in ${usState.id}`);
      }
    }
    for (const seat of usState.senateSeats) {
      if (seat.stateId !== usState.id) {
        issues.push(`senate seat ${seat.id} names state '${seat.stateId}' but sits in ${usState.id}`);
      }
      if (seat.seatClass >= classes) {
        issues.push(`senate seat ${seat.id} is in class ${seat.seatClass} of ${classes}`);
      }
    }
  }

  const { houseControl, senateControl } = state.legislature;
  if (houseControl !== null && !partyIds.has(houseControl)) {
    issues.push(`House control belongs to unknown party '${houseControl}'`);
  }
  if (senateControl !== null && !partyIds.has(senateControl)) {
    issues.push(`Senate control belongs to unknown party '${senateControl}'`);
  }
  if (!partyIds.has(state.court.lean)) {
    issues.push(`court leans to unknown party '${state.court.lean}'`);
  }

  for (const policy of state.policies) {
    if (!partyIds.has(policy.sponsorParty)) {
      issues.push(`policy ${policy.id} is sponsored by unknown party '${policy.sponsorParty}'`);
    }
    if (policy.level === 'federal' && policy.stateId !== null) {
      issues.push(`federal policy ${policy.id} targets state '${policy.stateId}'`);
    } else if (policy.level === 'state' && policy.stateId === null) {
      issues.push(`state policy ${policy.id} names no state`);
    } else if (policy.stateId !== null && !stateIds.has(policy.stateId)) {
      issues.push(`policy ${policy.id} targets unknown state '${policy.stateId}'`);
    }
    if (policy.status === 'voting' && policy.votingTurn === null) {
      issues.push(`policy ${policy.id} is voting without a voting turn`);
    }
  }

  return issues;
}
