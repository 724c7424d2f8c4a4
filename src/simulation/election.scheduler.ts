// ============================================
// CAPITOL - Election Scheduler
// ============================================
// House: all districts every even November. Senate: one of three classes
// every even November. Presidential: every fourth November, decided by an
// electoral college of districts + 2 per state.

import type {
  Chamber,
  Election,
  ElectionKind,
  PartyId,
  PoliticalParty,
  SeatResult,
  SimDate,
  SimulationState,
  UsState,
} from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import { SimulationFault } from '../plugins/error-handler.plugin.js';
import { PublicOpinionTracker } from './opinion.tracker.js';
import type { RandomStreams } from './random.js';
import { VoterModel, economySignal, pickWinner, type Candidate, type Electorate } from './voter.model.js';
import { appendLog } from './chronicle.js';
import { clamp, compareIds } from '../utils/math.js';
import { moduleLogger } from '../utils/logger.js';
import { formatDate, nextMonth } from '../utils/calendar.js';

const log = moduleLogger('elections');

const KIND_ORDER: readonly ElectionKind[] = ['house', 'senate', 'presidential'];

export function electionId(kind: ElectionKind, date: SimDate): string {
  return `${kind}-${formatDate(date)}`;
}

/**
 * Party holding the most seats. A tie keeps the previous holder when it is
 * among the tied, otherwise the first party id wins.
 */
export function controlOf(totals: Record<PartyId, number>, previous: PartyId | null): PartyId | null {
  const ids = Object.keys(totals).sort(compareIds);
  if (ids.length === 0) return null;
  const best = Math.max(...ids.map(id => totals[id]));
  const tied = ids.filter(id => totals[id] === best);
  if (previous !== null && tied.includes(previous)) return previous;
  return tied[0];
}

/**
 * Recompute every party's seat counts from the district and Senate seat
 * tables and verify both chambers add up to their fixed size.
 */
export function recountSeats(state: SimulationState): void {
  const house: Record<PartyId, number> = {};
  const senate: Record<PartyId, number> = {};
  for (const party of state.parties) {
    house[party.id] = 0;
    senate[party.id] = 0;
  }

  for (const usState of state.states) {
    for (const district of usState.districts) {
      if (district.incumbent === null) continue;
      if (house[district.incumbent] === undefined) {
        throw new SimulationFault(`District held by unknown party '${district.incumbent}'`, { turn: state.turn, entityId: district.id });
      }
      house[district.incumbent]++;
    }
    for (const seat of usState.senateSeats) {
      if (seat.incumbent === null) continue;
      if (senate[seat.incumbent] === undefined) {
        throw new SimulationFault(`Senate seat held by unknown party '${seat.incumbent}'`, { turn: state.turn, entityId: seat.id });
      }
      senate[seat.incumbent]++;
    }
  }

  for (const party of state.parties) {
    party.seats = { house: house[party.id], senate: senate[party.id] };
  }

  const houseTotal = state.parties.reduce((acc, p) => acc + p.seats.house, 0);
  const senateTotal = state.parties.reduce((acc, p) => acc + p.seats.senate, 0);
  if (houseTotal !== state.legislature.houseSize) {
    throw new SimulationFault(`House seats sum to ${houseTotal}, expected ${state.legislature.houseSize}`, { turn: state.turn, entityId: 'house' });
  }
  if (senateTotal !== state.legislature.senateSize) {
    throw new SimulationFault(`Senate seats sum to ${senateTotal}, expected ${state.legislature.senateSize}`, { turn: state.turn, entityId: 'senate' });
  }
}

function formatTotals(totals: Record<PartyId, number>): string {
  return Object.keys(totals).sort(compareIds).map(id => `${id} ${totals[id]}`).join(', ');
}

export function seatTotals(parties: readonly PoliticalParty[], chamber: Chamber): Record<PartyId, number> {
  const totals: Record<PartyId, number> = {};
  for (const party of parties) totals[party.id] = party.seats[chamber];
  return totals;
}

export class ElectionScheduler {
  private readonly voter: VoterModel;

  constructor(private readonly rules: SimulationRules) {
    this.voter = new VoterModel(rules.VOTER);
  }

  isDue(kind: ElectionKind, date: SimDate): boolean {
    const { ELECTION_MONTH, HOUSE_CYCLE_YEARS, SENATE_CYCLE_YEARS, PRESIDENTIAL_CYCLE_YEARS } = this.rules.ELECTIONS;
    if (date.month !== ELECTION_MONTH) return false;
    switch (kind) {
      case 'house':
        return date.year % HOUSE_CYCLE_YEARS === 0;
      case 'senate':
        return date.year % SENATE_CYCLE_YEARS === 0;
      case 'presidential':
        return date.year % PRESIDENTIAL_CYCLE_YEARS === 0;
    }
  }

  /** First election date of this kind on or after `from` */
  nextDate(kind: ElectionKind, from: SimDate): SimDate {
    const month = this.rules.ELECTIONS.ELECTION_MONTH;
    let year = from.month <= month ? from.year : from.year + 1;
    while (!this.isDue(kind, { year, month })) year++;
    return { year, month };
  }

  /** Senate class contested in a given year */
  senateClass(year: number): number {
    return Math.floor(year / this.rules.ELECTIONS.SENATE_CYCLE_YEARS) % this.rules.CHAMBERS.SENATE_CLASSES;
  }

  /**
   * Make sure the next election of every kind, on or after `from`, is on the
   * calendar as pending.
   */
  schedule(state: SimulationState, from: SimDate = state.clock): void {
    for (const kind of KIND_ORDER) {
      const date = this.nextDate(kind, from);
      const id = electionId(kind, date);
      if (state.elections.some(e => e.id === id)) continue;
      state.elections.push({
        id,
        kind,
        scheduled: date,
        seats: this.seatsFor(state, kind, date.year),
        status: 'pending',
        results: [],
        seatTotals: {},
        winner: null,
      });
    }
  }

  /**
   * Resolve every pending election scheduled for the current month, in
   * house, senate, presidential order. Campaign spend is reset once all of
   * them are done. Returns copies of the resolved elections; in the state,
   * only the RESULT_HISTORY most recent resolved elections keep per-seat
   * results.
   */
  runDue(state: SimulationState, streams: RandomStreams): Election[] {
    const due = state.elections
      .filter(e => e.status === 'pending' && e.scheduled.year === state.clock.year && e.scheduled.month === state.clock.month)
      .sort((a, b) => KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind));

    if (due.length === 0) return [];
    if (state.parties.length === 0) {
      throw new SimulationFault('No eligible candidates: the scenario has no parties', { turn: state.turn, entityId: due[0].id });
    }

    const tracker = new PublicOpinionTracker(state.opinion, this.rules.OPINION);
    const contestedStates = new Set<string>();
    let districtsContested = false;

    for (const election of due) {
      election.status = 'in_progress';
      switch (election.kind) {
        case 'house':
          this.runHouse(state, election, tracker, streams);
          districtsContested = true;
          break;
        case 'senate':
          this.runSenate(state, election, tracker, streams, contestedStates);
          break;
        case 'presidential':
          this.runPresidential(state, election, tracker, streams, contestedStates);
          break;
      }
      election.status = 'resolved';
      log.info({ election: election.id, winner: election.winner, seats: election.seatTotals }, 'Election resolved');
    }

    for (const usState of state.states) {
      if (districtsContested) {
        for (const district of usState.districts) district.campaign = {};
      }
      if (contestedStates.has(usState.id)) usState.campaign = {};
    }

    this.schedule(state, nextMonth(state.clock));
    const resolved = structuredClone(due);
    this.pruneResults(state);
    return resolved;
  }

  private pruneResults(state: SimulationState): void {
    const resolved = state.elections.filter(e => e.status === 'resolved');
    const keep = this.rules.ELECTIONS.RESULT_HISTORY;
    for (const election of resolved.slice(0, Math.max(0, resolved.length - keep))) {
      election.results = [];
    }
  }

  private runHouse(state: SimulationState, election: Election, tracker: PublicOpinionTracker, streams: RandomStreams): void {
    const seats = new Set(election.seats);
    for (const usState of state.states) {
      const opinion = tracker.regional(usState.id);
      for (const district of usState.districts) {
        if (!seats.has(district.id)) continue;
        const shares = this.voter.voteShares(
          { opinion, lean: district.lean },
          this.candidates(state, usState, district.incumbent, district.campaign, 'house'),
          streams.stream('election', state.turn, `${election.id}:${district.id}`)
        );
        const outcome = pickWinner(shares, district.incumbent);
        election.results.push({ seatId: district.id, previous: district.incumbent, winner: outcome.winner, shares, tieBroken: outcome.tieBroken });
        district.incumbent = outcome.winner;
        district.voteShares = shares;
      }
    }

    recountSeats(state);
    election.seatTotals = seatTotals(state.parties, 'house');
    const previous = state.legislature.houseControl;
    state.legislature.houseControl = controlOf(election.seatTotals, previous);
    election.winner = state.legislature.houseControl;
    this.rewardFlip(state, previous, election.winner);
    if (previous !== election.winner) {
      const { HOUSE_FLIP_PRESIDENT_APPROVAL, HOUSE_FLIP_CONGRESS_APPROVAL } = this.rules.ELECTIONS;
      const sign = election.winner === state.president.partyId ? 1 : -1;
      this.moveApproval(state, sign * HOUSE_FLIP_PRESIDENT_APPROVAL, sign * HOUSE_FLIP_CONGRESS_APPROVAL);
    }
    appendLog(state, `House elections: ${formatTotals(election.seatTotals)}`, this.rules.LOG.MAX_ENTRIES);
  }

  private runSenate(
    state: SimulationState,
    election: Election,
    tracker: PublicOpinionTracker,
    streams: RandomStreams,
    contested: Set<string>
  ): void {
    const seats = new Set(election.seats);
    for (const usState of state.states) {
      const electorate: Electorate = { opinion: tracker.regional(usState.id), lean: usState.lean };
      for (const seat of usState.senateSeats) {
        if (!seats.has(seat.id)) continue;
        const shares = this.voter.voteShares(
          electorate,
          this.candidates(state, usState, seat.incumbent, usState.campaign, 'senate'),
          streams.stream('election', state.turn, `${election.id}:${seat.id}`)
        );
        const outcome = pickWinner(shares, seat.incumbent);
        election.results.push({ seatId: seat.id, previous: seat.incumbent, winner: outcome.winner, shares, tieBroken: outcome.tieBroken });
        seat.incumbent = outcome.winner;
        contested.add(usState.id);
      }
    }

    recountSeats(state);
    election.seatTotals = seatTotals(state.parties, 'senate');
    const previous = state.legislature.senateControl;
    state.legislature.senateControl = controlOf(election.seatTotals, previous);
    election.winner = state.legislature.senateControl;
    this.rewardFlip(state, previous, election.winner);
    if (previous !== election.winner) {
      const sign = election.winner === state.president.partyId ? 1 : -1;
      this.moveApproval(state, sign * this.rules.ELECTIONS.SENATE_FLIP_PRESIDENT_APPROVAL, 0);
    }
    appendLog(state, `Senate elections: ${formatTotals(election.seatTotals)}`, this.rules.LOG.MAX_ENTRIES);
  }

  private runPresidential(
    state: SimulationState,
    election: Election,
    tracker: PublicOpinionTracker,
    streams: RandomStreams,
    contested: Set<string>
  ): void {
    const incumbent = state.president.partyId;
    const electoralVotes: Record<PartyId, number> = {};
    for (const party of state.parties) electoralVotes[party.id] = 0;

    for (const usState of state.states) {
      if (!election.seats.includes(usState.id)) continue;
      const shares = this.voter.voteShares(
        { opinion: tracker.regional(usState.id), lean: usState.lean },
        this.candidates(state, usState, incumbent, usState.campaign, null),
        streams.stream('election', state.turn, `${election.id}:${usState.id}`)
      );
      const outcome = pickWinner(shares, incumbent);
      const result: SeatResult = { seatId: usState.id, previous: incumbent, winner: outcome.winner, shares, tieBroken: outcome.tieBroken };
      election.results.push(result);
      contested.add(usState.id);
      electoralVotes[outcome.winner] += usState.districts.length + this.rules.ELECTIONS.ELECTORAL_VOTES_PER_STATE_BONUS;
    }

    election.seatTotals = electoralVotes;
    const winner = controlOf(electoralVotes, incumbent);
    if (winner === null) {
      throw new SimulationFault('Presidential election produced no winner', { turn: state.turn, entityId: election.id });
    }
    election.winner = winner;
    state.president.partyId = winner;
    this.rewardFlip(state, incumbent, winner);
    appendLog(state, `Presidential election: ${winner} (${formatTotals(electoralVotes)})`, this.rules.LOG.MAX_ENTRIES);
  }

  /**
   * Slate for one race. The president's party carries the economy and
   * presidential approval; in congressional races the chamber majority also
   * carries congressional approval.
   */
  private candidates(
    state: SimulationState,
    usState: UsState,
    incumbent: PartyId | null,
    campaign: Record<PartyId, number>,
    chamber: Chamber | null
  ): Candidate[] {
    const natural = this.rules.ECONOMY.NATURAL_UNEMPLOYMENT;
    const signal = economySignal(state.economy, natural);
    const regional = economySignal(
      { growth: state.economy.growth, unemployment: usState.economy.unemployment, inflation: usState.economy.inflation },
      natural
    );
    // Voters judge the White House on a blend of national and local conditions
    const mood = (signal + regional) / 2;
    const { ECONOMY_WEIGHT, APPROVAL_WEIGHT } = this.rules.VOTER;
    const { PRESIDENT_APPROVAL_BASELINE, CONGRESS_APPROVAL_BASELINE } = this.rules.OPINION;
    const presidential = APPROVAL_WEIGHT * (state.president.approval - PRESIDENT_APPROVAL_BASELINE) / 50;
    const congressional = APPROVAL_WEIGHT * (state.legislature.approval - CONGRESS_APPROVAL_BASELINE) / 50;
    const majority = chamber === 'house'
      ? state.legislature.houseControl
      : chamber === 'senate' ? state.legislature.senateControl : null;

    return state.parties.map(party => {
      const isPresident = party.id === state.president.partyId;
      return {
        partyId: party.id,
        platform: party.platform,
        incumbent: incumbent === party.id,
        campaign: campaign[party.id] ?? 0,
        economyBonus: isPresident ? ECONOMY_WEIGHT * mood : 0,
        approvalBonus: (isPresident ? presidential : 0) + (party.id === majority ? congressional : 0),
      };
    });
  }

  private moveApproval(state: SimulationState, president: number, congress: number): void {
    state.president.approval = clamp(state.president.approval + president, 0, 100);
    state.legislature.approval = clamp(state.legislature.approval + congress, 0, 100);
  }

  private rewardFlip(state: SimulationState, previous: PartyId | null, winner: PartyId | null): void {
    if (previous === winner) return;
    const delta = this.rules.ELECTIONS.CONTROL_FLIP_APPROVAL;
    for (const party of state.parties) {
      if (party.id === winner) party.approval = clamp(party.approval + delta, 0, 100);
      if (party.id === previous) party.approval = clamp(party.approval - delta, 0, 100);
    }
  }

  private seatsFor(state: SimulationState, kind: ElectionKind, year: number): string[] {
    switch (kind) {
      case 'house':
        return state.states.flatMap(s => s.districts.map(d => d.id));
      case 'senate': {
        const seatClass = this.senateClass(year);
        return state.states.flatMap(s => s.senateSeats.filter(seat => seat.seatClass === seatClass).map(seat => seat.id));
      }
      case 'presidential':
        return state.states.map(s => s.id);
    }
  }
}
