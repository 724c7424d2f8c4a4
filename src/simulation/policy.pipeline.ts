// ============================================
// CAPITOL - Policy Pipeline
// ============================================
// Proposed -> Voting -> Enacted | Rejected. A policy spends at least one full
// turn in Voting before it is tallied, and enacted effects land exactly once.

import type {
  ActorRef,
  ChamberVote,
  EffectVector,
  FaultRecord,
  Intent,
  Issue,
  PartyId,
  Policy,
  PolicyDraft,
  PolicyOutcome,
  PolicyTally,
  RegionId,
  SimulationState,
  UsState,
  VotingBody,
} from '../models/types.js';
import { ISSUES, NATIONAL_REGION } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import { InvalidIntervention, SimulationFault } from '../plugins/error-handler.plugin.js';
import { applyMacroEffects, applyStateEffects } from './economy.simulator.js';
import { appendLog } from './chronicle.js';
import { clamp, compareIds } from '../utils/math.js';
import { moduleLogger } from '../utils/logger.js';

const log = moduleLogger('policy');

/** Opinion deltas waiting for the opinion phase */
export interface OpinionDelta {
  region: RegionId;
  effects: Pick<EffectVector, 'opinion'>;
  source: string;
}

export interface LegislationResult {
  enacted: PolicyOutcome[];
  rejected: PolicyOutcome[];
  opened: string[];
  opinion: OpinionDelta[];
}

export interface IntentResult {
  proposed: string[];
  faults: FaultRecord[];
}

/**
 * Platform alignment with a policy's opinion effects, -1..1. Policies with no
 * opinion effect are neutral.
 */
export function alignment(platform: Record<Issue, number>, effects: Pick<EffectVector, 'opinion'>): number {
  let dot = 0;
  let magnitude = 0;
  for (const issue of ISSUES) {
    const delta = effects.opinion[issue] ?? 0;
    dot += platform[issue] * delta;
    magnitude += Math.abs(delta);
  }
  return magnitude === 0 ? 0 : dot / magnitude;
}

export function actorKey(actor: ActorRef): string {
  return `${actor.kind}:${actor.id}`;
}

function outcomeOf(policy: Policy): PolicyOutcome {
  return { policyId: policy.id, title: policy.title, status: policy.status, tally: structuredClone(policy.tally) };
}

export class PolicyPipeline {
  constructor(private readonly rules: SimulationRules) {}

  /**
   * Validate a draft and register it as Proposed. The sponsor's party is the
   * party itself, or a state's governing party.
   */
  propose(state: SimulationState, actor: ActorRef, draft: PolicyDraft): Policy {
    const sponsorParty = this.sponsorParty(state, actor);
    const stateId = draft.stateId ?? null;

    if (draft.level === 'state') {
      if (stateId === null) {
        throw new InvalidIntervention('State policies need a stateId', { actor: actorKey(actor) });
      }
      if (!state.states.some(s => s.id === stateId)) {
        throw new InvalidIntervention(`Unknown state '${stateId}'`, { actor: actorKey(actor), entityId: stateId });
      }
      if (actor.kind === 'state' && actor.id !== stateId) {
        throw new InvalidIntervention(`State '${actor.id}' cannot legislate for '${stateId}'`, { actor: actorKey(actor), entityId: stateId });
      }
    } else if (stateId !== null) {
      throw new InvalidIntervention('Federal policies cannot target a single state', { actor: actorKey(actor), entityId: stateId });
    }
    if (!Number.isFinite(draft.cost)) {
      throw new InvalidIntervention('Policy cost must be a finite number', { actor: actorKey(actor) });
    }

    const policy: Policy = {
      id: `pol-${state.nextPolicySeq}`,
      key: draft.key ?? null,
      title: draft.title,
      sponsor: { kind: actor.kind, id: actor.id },
      sponsorParty,
      level: draft.level,
      stateId,
      issue: draft.issue,
      cost: draft.cost,
      effects: {
        growth: draft.effects.growth,
        unemployment: draft.effects.unemployment,
        inflation: draft.effects.inflation,
        budget: draft.effects.budget,
        opinion: { ...draft.effects.opinion },
      },
      status: 'proposed',
      proposedTurn: state.turn,
      votingTurn: null,
      resolvedTurn: null,
      tally: null,
    };

    state.nextPolicySeq++;
    state.policies.push(policy);
    log.debug({ policy: policy.id, sponsor: actorKey(actor), title: policy.title }, 'Policy proposed');
    return policy;
  }

  /**
   * Legislative stage of a turn: tally everything that has sat in Voting for
   * a full turn, then open voting on the proposals that existed when the turn
   * began. Proposals made during this turn wait for the next one.
   */
  advance(state: SimulationState, openable: ReadonlySet<string>): LegislationResult {
    const result: LegislationResult = { enacted: [], rejected: [], opened: [], opinion: [] };

    for (const policy of state.policies) {
      if (policy.status !== 'voting' || policy.votingTurn === null || policy.votingTurn >= state.turn) continue;
      policy.tally = this.tally(state, policy);
      policy.resolvedTurn = state.turn;
      if (this.passes(policy.tally)) {
        policy.status = 'enacted';
        this.enact(state, policy, result.opinion);
        result.enacted.push(outcomeOf(policy));
        this.logOutcome(state, policy, 'passed');
        log.info({ policy: policy.id, title: policy.title }, 'Policy enacted');
      } else {
        policy.status = 'rejected';
        result.rejected.push(outcomeOf(policy));
        this.logOutcome(state, policy, 'failed');
        log.info({ policy: policy.id, title: policy.title }, 'Policy rejected');
      }
    }

    for (const policy of state.policies) {
      if (policy.status !== 'proposed' || !openable.has(policy.id)) continue;
      policy.status = 'voting';
      policy.votingTurn = state.turn;
      result.opened.push(policy.id);
    }

    return result;
  }

  /**
   * Apply actor intents in canonical actor order. Intents that cannot be
   * carried out are recorded as faults and skipped.
   */
  applyIntents(state: SimulationState, intents: readonly Intent[]): IntentResult {
    const result: IntentResult = { proposed: [], faults: [] };
    const ordered = [...intents].sort((a, b) => compareIds(actorKey(a.actor), actorKey(b.actor)));

    for (const intent of ordered) {
      switch (intent.kind) {
        case 'propose': {
          try {
            result.proposed.push(this.propose(state, intent.actor, intent.policy).id);
          } catch (error) {
            if (!(error instanceof InvalidIntervention)) throw error;
            result.faults.push({ code: error.code, message: error.message, turn: state.turn, actor: actorKey(intent.actor) });
          }
          break;
        }
        case 'campaign':
          this.applyCampaign(state, intent, result.faults);
          break;
        case 'adjust_budget': {
          const usState = state.states.find(s => s.id === intent.stateId);
          if (!usState) {
            result.faults.push({ code: 'UNKNOWN_STATE', message: `Unknown state '${intent.stateId}'`, turn: state.turn, actor: actorKey(intent.actor), entityId: intent.stateId });
            break;
          }
          usState.budget.spending = Math.max(0, usState.budget.spending + intent.delta);
          break;
        }
        case 'idle':
          break;
      }
    }

    return result;
  }

  tally(state: SimulationState, policy: Policy): PolicyTally {
    const { MAJORITY_THRESHOLD, SUPERMAJORITY_THRESHOLD } = this.rules.LEGISLATURE;

    if (policy.level === 'state') {
      const usState = this.stateOf(state, policy);
      const delegation = this.delegation(usState);
      return {
        votes: [this.chamberVote(state, policy, 'state_legislature', delegation, usState.districts.length, MAJORITY_THRESHOLD, 0)],
        courtRisk: 0,
        vetoed: false,
        overridden: false,
      };
    }

    const courtRisk = this.courtRisk(state, policy);
    const house = this.chamberSeats(state, 'house');
    const senate = this.chamberSeats(state, 'senate');
    const votes: ChamberVote[] = [
      this.chamberVote(state, policy, 'house', house, state.legislature.houseSize, MAJORITY_THRESHOLD, courtRisk),
      this.chamberVote(state, policy, 'senate', senate, state.legislature.senateSize, MAJORITY_THRESHOLD, courtRisk),
    ];
    if (!votes.every(v => v.passed)) {
      return { votes, courtRisk, vetoed: false, overridden: false };
    }

    const president = state.parties.find(p => p.id === state.president.partyId);
    const vetoed = president !== undefined
      && president.id !== policy.sponsorParty
      && alignment(president.platform, policy.effects) < 0;
    if (!vetoed) {
      return { votes, courtRisk, vetoed: false, overridden: false };
    }

    const overrides = [
      this.chamberVote(state, policy, 'house', house, state.legislature.houseSize, SUPERMAJORITY_THRESHOLD, courtRisk),
      this.chamberVote(state, policy, 'senate', senate, state.legislature.senateSize, SUPERMAJORITY_THRESHOLD, courtRisk),
    ];
    return { votes: [...votes, ...overrides], courtRisk, vetoed: true, overridden: overrides.every(v => v.passed) };
  }

  /**
   * Share of every bloc's support lost when a strongly inflationary federal
   * bill faces a court that leans away from its sponsor.
   */
  courtRisk(state: SimulationState, policy: Policy): number {
    const { COURT_RISK, COURT_INFLATION_THRESHOLD } = this.rules.LEGISLATURE;
    if (policy.level !== 'federal') return 0;
    if (policy.effects.inflation <= COURT_INFLATION_THRESHOLD) return 0;
    return state.court.lean === policy.sponsorParty ? 0 : COURT_RISK;
  }

  private passes(tally: PolicyTally): boolean {
    if (tally.vetoed) return tally.overridden;
    return tally.votes.every(v => v.passed);
  }

  /** Party bloc yes-fraction for a policy */
  yesFraction(platform: Record<Issue, number>, partyId: PartyId, policy: Policy, courtRisk = 0): number {
    const { ALIGNMENT_WEIGHT, SPONSOR_BONUS } = this.rules.LEGISLATURE;
    const bonus = partyId === policy.sponsorParty ? SPONSOR_BONUS : 0;
    return clamp(0.5 + ALIGNMENT_WEIGHT * alignment(platform, policy.effects) + bonus - courtRisk, 0, 1);
  }

  private chamberVote(
    state: SimulationState,
    policy: Policy,
    body: VotingBody,
    seats: Record<PartyId, number>,
    size: number,
    threshold: number,
    courtRisk: number
  ): ChamberVote {
    let yes = 0;
    for (const party of state.parties) {
      yes += (seats[party.id] ?? 0) * this.yesFraction(party.platform, party.id, policy, courtRisk);
    }
    const share = size > 0 ? yes / size : 0;
    // Ties go to the status quo
    return { body, yes, size, share, threshold, passed: share > threshold };
  }

  private chamberSeats(state: SimulationState, chamber: 'house' | 'senate'): Record<PartyId, number> {
    const seats: Record<PartyId, number> = {};
    for (const party of state.parties) seats[party.id] = party.seats[chamber];
    return seats;
  }

  /** A state's legislature is modeled by its congressional delegation */
  private delegation(usState: UsState): Record<PartyId, number> {
    const seats: Record<PartyId, number> = {};
    for (const district of usState.districts) {
      if (district.incumbent === null) continue;
      seats[district.incumbent] = (seats[district.incumbent] ?? 0) + 1;
    }
    return seats;
  }

  private enact(state: SimulationState, policy: Policy, opinion: OpinionDelta[]): void {
    const spend = policy.cost + policy.effects.budget;
    if (policy.level === 'state') {
      const usState = this.stateOf(state, policy);
      applyStateEffects(usState.economy, policy.effects, this.rules.ECONOMY);
      usState.budget.spending = Math.max(0, usState.budget.spending + spend);
      usState.enactedPolicies.push(policy.id);
      opinion.push({ region: usState.id, effects: policy.effects, source: policy.id });
      return;
    }
    applyMacroEffects(state.economy, policy.effects, this.rules.ECONOMY);
    state.budget.spending = Math.max(0, state.budget.spending + spend);
    opinion.push({ region: NATIONAL_REGION, effects: policy.effects, source: policy.id });
    if (policy.sponsorParty === state.president.partyId) {
      state.president.approval = clamp(state.president.approval + this.rules.LEGISLATURE.ENACTMENT_APPROVAL, 0, 100);
    }
  }

  private logOutcome(state: SimulationState, policy: Policy, outcome: 'passed' | 'failed'): void {
    const scope = policy.level === 'state' ? `${this.stateOf(state, policy).name} policy` : 'Policy';
    appendLog(state, `${scope} ${outcome}: ${policy.title}`, this.rules.LOG.MAX_ENTRIES);
  }

  private applyCampaign(state: SimulationState, intent: Extract<Intent, { kind: 'campaign' }>, faults: FaultRecord[]): void {
    const actor = actorKey(intent.actor);
    const party = state.parties.find(p => p.id === intent.partyId);
    const usState = state.states.find(s => s.id === intent.stateId);
    if (!party || !usState) {
      faults.push({ code: 'UNKNOWN_TARGET', message: 'Campaign targets an unknown party or state', turn: state.turn, actor, entityId: intent.stateId });
      return;
    }
    if (intent.amount <= 0 || party.treasury < intent.amount) {
      faults.push({
        code: 'INSUFFICIENT_TREASURY',
        message: `Party '${party.id}' cannot spend ${intent.amount} (treasury ${party.treasury})`,
        turn: state.turn,
        actor,
        entityId: party.id,
      });
      return;
    }

    party.treasury -= intent.amount;
    usState.campaign[party.id] = (usState.campaign[party.id] ?? 0) + intent.amount;
    if (intent.districtId !== null) {
      const district = usState.districts.find(d => d.id === intent.districtId);
      if (district) {
        district.campaign[party.id] = (district.campaign[party.id] ?? 0) + intent.amount;
      }
    }
  }

  private sponsorParty(state: SimulationState, actor: ActorRef): PartyId {
    if (actor.kind === 'party') {
      if (!state.parties.some(p => p.id === actor.id)) {
        throw new InvalidIntervention(`Unknown party '${actor.id}'`, { actor: actorKey(actor), entityId: actor.id });
      }
      return actor.id;
    }
    const usState = state.states.find(s => s.id === actor.id);
    if (!usState) {
      throw new InvalidIntervention(`Unknown state '${actor.id}'`, { actor: actorKey(actor), entityId: actor.id });
    }
    return usState.governorParty;
  }

  private stateOf(state: SimulationState, policy: Policy): UsState {
    const usState = state.states.find(s => s.id === policy.stateId);
    if (!usState) {
      throw new SimulationFault(`Policy targets unknown state '${policy.stateId ?? ''}'`, { turn: state.turn, entityId: policy.id });
    }
    return usState;
  }
}
