// ============================================
// CAPITOL - Event Manager
// ============================================

import type {
  EffectVector,
  FiredEvent,
  QueuedTrigger,
  RegionId,
  SimulationState,
} from '../models/types.js';
import { NATIONAL_REGION } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import type { EventDefinition, EventTrigger } from '../schemas/catalog.schema.js';
import { InvalidIntervention, NotFoundError, SimulationFault } from '../plugins/error-handler.plugin.js';
import type { RandomStreams } from './random.js';
import type { OpinionDelta } from './policy.pipeline.js';
import { applyMacroEffects, applyStateEffects, deficit } from './economy.simulator.js';
import { appendLog } from './chronicle.js';
import { clamp, compareIds } from '../utils/math.js';
import { moduleLogger } from '../utils/logger.js';

const log = moduleLogger('events');

export interface EventPhaseResult {
  fired: FiredEvent[];
  opinion: OpinionDelta[];
  /** Catalog policy keys the president's party should propose */
  proposals: string[];
}

export interface ManualEffect {
  description: string;
  effects: EffectVector;
  regions?: RegionId[];
}

function within(value: number, trigger: { below?: number; above?: number }): boolean {
  if (trigger.below === undefined && trigger.above === undefined) return false;
  if (trigger.below !== undefined && !(value < trigger.below)) return false;
  if (trigger.above !== undefined && !(value > trigger.above)) return false;
  return true;
}

/**
 * Whether a conditional or calendar trigger holds. Reads only the
 * pre-event snapshot, so evaluation order never matters.
 */
export function triggerHolds(trigger: EventTrigger, snapshot: Readonly<SimulationState>): boolean {
  switch (trigger.type) {
    case 'random':
    case 'manual':
      return false;
    case 'calendar':
      return snapshot.clock.month === trigger.month && snapshot.clock.year % trigger.everyYears === 0;
    case 'budget_deficit':
      return deficit(snapshot.budget) > trigger.above;
    case 'opinion': {
      const row = snapshot.opinion[trigger.region];
      return row !== undefined && within(row[trigger.issue], trigger);
    }
    case 'economy':
      return within(snapshot.economy[trigger.metric], trigger);
  }
}

export class EventManager {
  private readonly catalog: Map<string, EventDefinition>;

  constructor(
    private readonly rules: SimulationRules,
    events: readonly EventDefinition[]
  ) {
    this.catalog = new Map([...events].sort((a, b) => compareIds(a.key, b.key)).map(e => [e.key, e]));
  }

  /**
   * Queue a manual trigger for the next turn's event phase. Catalog events
   * fire even when cooling down or retired.
   */
  queue(state: SimulationState, input: string | ManualEffect): QueuedTrigger {
    if (typeof input === 'string') {
      if (!this.catalog.has(input)) {
        throw new NotFoundError('Event', input);
      }
      const trigger: QueuedTrigger = { kind: 'catalog', eventKey: input };
      state.events.queued.push(trigger);
      return trigger;
    }

    const regions = input.regions && input.regions.length > 0 ? input.regions : [NATIONAL_REGION];
    for (const region of regions) {
      if (state.opinion[region] === undefined) {
        throw new InvalidIntervention(`Unknown region '${region}'`, { entityId: region });
      }
    }
    state.events.manualSeq++;
    const trigger: QueuedTrigger = {
      kind: 'effect',
      key: `manual-${state.events.manualSeq}`,
      description: input.description,
      effects: {
        growth: input.effects.growth,
        unemployment: input.effects.unemployment,
        inflation: input.effects.inflation,
        budget: input.effects.budget,
        opinion: { ...input.effects.opinion },
      },
      regions: [...regions],
    };
    state.events.queued.push(trigger);
    return trigger;
  }

  /**
   * Event phase of one turn: cooldowns tick, then manual triggers, due
   * chained events, conditional and calendar triggers, and finally at most
   * MAX_RANDOM_PER_TURN random events.
   */
  resolve(state: SimulationState, snapshot: Readonly<SimulationState>, streams: RandomStreams): EventPhaseResult {
    const result: EventPhaseResult = { fired: [], opinion: [], proposals: [] };
    const turn = state.turn;
    const firedKeys = new Set<string>();

    this.tickCooldowns(state);

    const queued = state.events.queued;
    state.events.queued = [];
    for (const trigger of queued) {
      if (trigger.kind === 'effect') {
        this.applyEffects(state, trigger.effects, trigger.regions, trigger.key, result);
        result.fired.push({ key: trigger.key, description: trigger.description, source: 'manual', regions: trigger.regions });
        this.remember(state, trigger.key);
        appendLog(state, `Event: ${trigger.description}`, this.rules.LOG.MAX_ENTRIES);
        continue;
      }
      this.fire(state, this.definition(trigger.eventKey, turn), 'manual', streams, result);
      firedKeys.add(trigger.eventKey);
    }

    const due = state.events.pending
      .filter(p => p.dueTurn <= turn)
      .sort((a, b) => a.dueTurn - b.dueTurn || compareIds(a.eventKey, b.eventKey));
    state.events.pending = state.events.pending.filter(p => p.dueTurn > turn);
    for (const chained of due) {
      this.fire(state, this.definition(chained.eventKey, turn), 'chained', streams, result);
      firedKeys.add(chained.eventKey);
    }

    for (const def of this.catalog.values()) {
      if (def.trigger.type === 'random' || def.trigger.type === 'manual') continue;
      if (!this.available(state, def) || firedKeys.has(def.key)) continue;
      if (!triggerHolds(def.trigger, snapshot)) continue;
      this.fire(state, def, 'conditional', streams, result);
      firedKeys.add(def.key);
    }

    const rng = streams.stream('events', turn, 'random');
    for (let i = 0; i < this.rules.EVENTS.MAX_RANDOM_PER_TURN; i++) {
      if (!rng.chance(this.rules.EVENTS.RANDOM_CHANCE)) break;
      const candidates = [...this.catalog.values()]
        .filter(def => def.trigger.type === 'random' && !firedKeys.has(def.key) && this.available(state, def))
        .map(def => ({ item: def, weight: def.weight }));
      const picked = rng.weighted(candidates);
      if (!picked) break;
      this.fire(state, picked, 'random', streams, result);
      firedKeys.add(picked.key);
    }

    return result;
  }

  private tickCooldowns(state: SimulationState): void {
    const next: Record<string, number> = {};
    for (const key of Object.keys(state.events.cooldowns).sort(compareIds)) {
      const remaining = state.events.cooldowns[key] - 1;
      if (remaining > 0) next[key] = remaining;
    }
    state.events.cooldowns = next;
  }

  private available(state: Readonly<SimulationState>, def: EventDefinition): boolean {
    return !state.events.retired.includes(def.key) && state.events.cooldowns[def.key] === undefined;
  }

  private definition(key: string, turn: number): EventDefinition {
    const def = this.catalog.get(key);
    if (!def) {
      throw new SimulationFault(`Unknown event '${key}'`, { turn, entityId: key });
    }
    return def;
  }

  private fire(
    state: SimulationState,
    def: EventDefinition,
    source: FiredEvent['source'],
    streams: RandomStreams,
    result: EventPhaseResult
  ): void {
    this.applyEffects(state, def.effects, def.regions, def.key, result);

    if (def.partyBenefit !== null) {
      const party = state.parties.find(p => p.id === def.partyBenefit);
      if (party) {
        party.approval = clamp(party.approval + this.rules.EVENTS.PARTY_BENEFIT_APPROVAL, 0, 100);
      }
    }

    state.president.approval = clamp(state.president.approval + def.approval.president, 0, 100);
    state.legislature.approval = clamp(state.legislature.approval + def.approval.congress, 0, 100);

    if (def.recurring) {
      const cooldown = def.cooldownTurns ?? this.rules.EVENTS.DEFAULT_COOLDOWN_TURNS;
      if (cooldown > 0) state.events.cooldowns[def.key] = cooldown;
    } else if (!state.events.retired.includes(def.key)) {
      state.events.retired.push(def.key);
    }

    if (def.consequences.length > 0) {
      const rng = streams.stream('events', state.turn, `consequence:${def.key}`);
      for (const consequence of def.consequences) {
        if (!rng.chance(consequence.probability)) continue;
        if (consequence.type === 'chain_event') {
          state.events.pending.push({ eventKey: consequence.eventKey, dueTurn: state.turn + consequence.delayTurns });
        } else {
          result.proposals.push(consequence.policyKey);
        }
      }
    }

    this.remember(state, def.key);
    appendLog(state, `Event: ${def.description}`, this.rules.LOG.MAX_ENTRIES);
    result.fired.push({ key: def.key, description: def.description, source, regions: [...def.regions] });
    log.info({ event: def.key, source, turn: state.turn }, 'Event fired');
  }

  /**
   * Economy and budget deltas land now; opinion deltas are queued per region
   * for the opinion phase.
   */
  private applyEffects(state: SimulationState, effects: EffectVector, regions: readonly RegionId[], source: string, result: EventPhaseResult): void {
    applyMacroEffects(state.economy, effects, this.rules.ECONOMY);
    state.budget.spending = Math.max(0, state.budget.spending + effects.budget);

    for (const region of regions) {
      if (region !== NATIONAL_REGION) {
        const usState = state.states.find(s => s.id === region);
        if (!usState) {
          throw new SimulationFault(`Event '${source}' targets unknown region '${region}'`, { turn: state.turn, entityId: region });
        }
        applyStateEffects(usState.economy, effects, this.rules.ECONOMY);
      }
      result.opinion.push({ region, effects: { opinion: { ...effects.opinion } }, source });
    }
  }

  private remember(state: SimulationState, key: string): void {
    state.events.recent.push(key);
    const limit = this.rules.EVENTS.RECENT_HISTORY;
    if (state.events.recent.length > limit) {
      state.events.recent.splice(0, state.events.recent.length - limit);
    }
  }
}
