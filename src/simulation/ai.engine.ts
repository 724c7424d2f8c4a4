// ============================================
// CAPITOL - AI Decision Engine
// ============================================
// Every actor reads the same frozen snapshot and draws only from its own
// stream, so the order actors are asked in cannot change what they decide.

import type {
  ActorRef,
  Intent,
  Issue,
  PolicyDraft,
  SimDate,
  SimulationState,
  UsState,
} from '../models/types.js';
import { ISSUES, NATIONAL_REGION } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import type { PolicyTemplate } from '../schemas/catalog.schema.js';
import { SimulationFault } from '../plugins/error-handler.plugin.js';
import { actorStreamKey, type RandomStream, type RandomStreams } from './random.js';
import { actorKey, alignment } from './policy.pipeline.js';
import { deficit } from './economy.simulator.js';
import { clamp, compareIds } from '../utils/math.js';
import { monthsBetween } from '../utils/calendar.js';

export interface Actor {
  readonly ref: ActorRef;
  decide(snapshot: Readonly<SimulationState>, stream: RandomStream): Intent;
}

interface Conditions {
  growth: number;
  unemployment: number;
  inflation: number;
  deficit: number;
}

export function templateToDraft(template: PolicyTemplate, stateId: string | null = null): PolicyDraft {
  return {
    key: template.key,
    title: template.title,
    level: template.level,
    stateId,
    issue: template.issue,
    cost: template.cost,
    effects: {
      growth: template.effects.growth,
      unemployment: template.effects.unemployment,
      inflation: template.effects.inflation,
      budget: template.effects.budget,
      opinion: { ...template.effects.opinion },
    },
  };
}

export function meetsRequirements(template: PolicyTemplate, conditions: Conditions): boolean {
  const req = template.requirements;
  if (req.minUnemployment !== undefined && conditions.unemployment < req.minUnemployment) return false;
  if (req.minInflation !== undefined && conditions.inflation < req.minInflation) return false;
  if (req.minDeficit !== undefined && conditions.deficit < req.minDeficit) return false;
  if (req.maxGrowth !== undefined && conditions.growth > req.maxGrowth) return false;
  return true;
}

/**
 * Highest score wins. Exact ties, and an exploration roll, are settled by
 * the actor's own stream. The exploration roll is always drawn first.
 */
export function chooseIntent(candidates: readonly Intent[], stream: RandomStream, explorationRate: number): Intent {
  if (candidates.length === 0) {
    throw new RangeError('An actor must always have at least one option');
  }
  if (stream.chance(explorationRate)) {
    return stream.pick(candidates);
  }
  const best = Math.max(...candidates.map(c => c.score));
  const tied = candidates.filter(c => c.score === best);
  return tied.length === 1 ? tied[0] : stream.pick(tied);
}

/** Months until the next federal election month, counting this one */
function monthsToElection(clock: SimDate, rules: SimulationRules): number {
  const month = rules.ELECTIONS.ELECTION_MONTH;
  let year = clock.month <= month ? clock.year : clock.year + 1;
  while (year % rules.ELECTIONS.HOUSE_CYCLE_YEARS !== 0) year++;
  return monthsBetween(clock, { year, month });
}

abstract class BaseActor implements Actor {
  abstract readonly ref: ActorRef;

  constructor(
    protected readonly rules: SimulationRules,
    protected readonly templates: readonly PolicyTemplate[]
  ) {}

  abstract decide(snapshot: Readonly<SimulationState>, stream: RandomStream): Intent;

  /**
   * Expected opinion gain: each delta is weighted by the headroom left on
   * that issue in the region the policy reaches.
   */
  protected opinionGain(opinion: Record<Issue, number>, template: PolicyTemplate): number {
    const { MIN, MAX } = this.rules.OPINION;
    let gain = 0;
    for (const issue of ISSUES) {
      const delta = template.effects.opinion[issue] ?? 0;
      const headroom = delta >= 0 ? MAX - opinion[issue] : opinion[issue] - MIN;
      gain += delta * (headroom / (MAX - MIN));
    }
    return gain;
  }

  protected proposalScore(platform: Record<Issue, number>, opinion: Record<Issue, number>, template: PolicyTemplate): number {
    const ai = this.rules.AI;
    return ai.OPINION_WEIGHT * this.opinionGain(opinion, template)
      + ai.ALIGNMENT_WEIGHT * alignment(platform, template.effects)
      - ai.COST_WEIGHT * template.cost;
  }

  /** Template still pending, or resolved too recently, for this sponsor scope */
  protected onCooldown(snapshot: Readonly<SimulationState>, template: PolicyTemplate, stateId: string | null): boolean {
    const window = this.rules.AI.POLICY_COOLDOWN_TURNS;
    return snapshot.policies.some(p =>
      p.key === template.key
      && p.stateId === stateId
      && (p.status === 'proposed'
        || p.status === 'voting'
        || (p.resolvedTurn !== null && snapshot.turn - p.resolvedTurn < window))
    );
  }
}

export class PartyActor extends BaseActor {
  readonly ref: ActorRef;

  constructor(partyId: string, rules: SimulationRules, templates: readonly PolicyTemplate[]) {
    super(rules, templates);
    this.ref = { kind: 'party', id: partyId };
  }

  decide(snapshot: Readonly<SimulationState>, stream: RandomStream): Intent {
    const party = snapshot.parties.find(p => p.id === this.ref.id);
    if (!party) {
      throw new SimulationFault(`Actor for unknown party '${this.ref.id}'`, { turn: snapshot.turn, actor: actorKey(this.ref) });
    }

    const candidates: Intent[] = [{ kind: 'idle', actor: this.ref, score: 0 }];
    const national = snapshot.opinion[NATIONAL_REGION];
    const conditions: Conditions = { ...snapshot.economy, deficit: deficit(snapshot.budget) };

    for (const template of this.templates) {
      if (template.level !== 'federal') continue;
      if (!meetsRequirements(template, conditions) || this.onCooldown(snapshot, template, null)) continue;
      candidates.push({
        kind: 'propose',
        actor: this.ref,
        policy: templateToDraft(template),
        score: this.proposalScore(party.platform, national, template),
      });
    }

    const amount = this.rules.AI.CAMPAIGN_AMOUNT;
    const target = this.swingState(snapshot, party.id);
    if (target && party.treasury >= amount) {
      const horizon = this.rules.AI.CAMPAIGN_HORIZON_MONTHS;
      const urgency = clamp(1 - monthsToElection(snapshot.clock, this.rules) / horizon, 0, 1);
      candidates.push({
        kind: 'campaign',
        actor: this.ref,
        partyId: party.id,
        stateId: target.id,
        districtId: this.swingDistrict(target, party.id),
        amount,
        score: this.rules.AI.CAMPAIGN_WEIGHT * urgency,
      });
    }

    return chooseIntent(candidates, stream, this.rules.AI.EXPLORATION_RATE);
  }

  /** State whose lean is closest to even for this party */
  private swingState(snapshot: Readonly<SimulationState>, partyId: string): UsState | null {
    let best: UsState | null = null;
    for (const usState of [...snapshot.states].sort((a, b) => compareIds(a.id, b.id))) {
      const margin = Math.abs(usState.lean[partyId] ?? 0);
      if (best === null || margin < Math.abs(best.lean[partyId] ?? 0)) best = usState;
    }
    return best;
  }

  private swingDistrict(usState: UsState, partyId: string): string | null {
    let best: { id: string; margin: number } | null = null;
    for (const district of [...usState.districts].sort((a, b) => compareIds(a.id, b.id))) {
      const margin = Math.abs(district.lean[partyId] ?? 0);
      if (best === null || margin < best.margin) best = { id: district.id, margin };
    }
    return best ? best.id : null;
  }
}

export class StateActor extends BaseActor {
  readonly ref: ActorRef;

  constructor(stateId: string, rules: SimulationRules, templates: readonly PolicyTemplate[]) {
    super(rules, templates);
    this.ref = { kind: 'state', id: stateId };
  }

  decide(snapshot: Readonly<SimulationState>, stream: RandomStream): Intent {
    const usState = snapshot.states.find(s => s.id === this.ref.id);
    if (!usState) {
      throw new SimulationFault(`Actor for unknown state '${this.ref.id}'`, { turn: snapshot.turn, actor: actorKey(this.ref) });
    }
    const governor = snapshot.parties.find(p => p.id === usState.governorParty);
    const opinion = snapshot.opinion[usState.id] ?? snapshot.opinion[NATIONAL_REGION];

    const candidates: Intent[] = [{ kind: 'idle', actor: this.ref, score: 0 }];
    const stateDeficit = deficit(usState.budget);
    const conditions: Conditions = {
      growth: snapshot.economy.growth,
      unemployment: usState.economy.unemployment,
      inflation: usState.economy.inflation,
      deficit: stateDeficit,
    };

    if (governor) {
      for (const template of this.templates) {
        if (template.level !== 'state') continue;
        if (!meetsRequirements(template, conditions) || this.onCooldown(snapshot, template, usState.id)) continue;
        candidates.push({
          kind: 'propose',
          actor: this.ref,
          policy: templateToDraft(template, usState.id),
          score: this.proposalScore(governor.platform, opinion, template),
        });
      }
    }

    const { DEFICIT_TOLERANCE, BUDGET_CUT_SHARE, BUDGET_WEIGHT } = this.rules.AI;
    if (stateDeficit > DEFICIT_TOLERANCE) {
      const overshoot = DEFICIT_TOLERANCE > 0 ? (stateDeficit - DEFICIT_TOLERANCE) / DEFICIT_TOLERANCE : 1;
      candidates.push({
        kind: 'adjust_budget',
        actor: this.ref,
        stateId: usState.id,
        delta: -stateDeficit * BUDGET_CUT_SHARE,
        score: BUDGET_WEIGHT * Math.min(1, overshoot),
      });
    }

    return chooseIntent(candidates, stream, this.rules.AI.EXPLORATION_RATE);
  }
}

export class AIDecisionEngine {
  constructor(
    private readonly rules: SimulationRules,
    private readonly templates: readonly PolicyTemplate[]
  ) {}

  /** One actor per party and per state */
  actorsFor(state: Readonly<SimulationState>): Actor[] {
    return [
      ...state.parties.map(p => new PartyActor(p.id, this.rules, this.templates)),
      ...state.states.map(s => new StateActor(s.id, this.rules, this.templates)),
    ];
  }

  /**
   * Ask every actor for one intent against the frozen snapshot. Results come
   * back in canonical actor order whatever order `actors` is in.
   */
  collect(snapshot: Readonly<SimulationState>, streams: RandomStreams, actors: readonly Actor[]): Intent[] {
    if (!this.rules.AI.ENABLED) return [];
    const intents: Intent[] = [];
    for (const actor of actors) {
      const stream = streams.stream(actorStreamKey(actor.ref.kind, actor.ref.id), snapshot.turn);
      intents.push(actor.decide(snapshot, stream));
    }
    return intents.sort((a, b) => compareIds(actorKey(a.actor), actorKey(b.actor)));
  }
}
