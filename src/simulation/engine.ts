// ============================================
// CAPITOL - Turn Engine
// ============================================

import { EventEmitter } from 'events';
import type {
  ActorRef,
  Policy,
  PolicyDraft,
  QueuedTrigger,
  SimDate,
  SimulationState,
  TurnReport,
  TurnSummary,
} from '../models/types.js';
import { resolveRules, type RuleOverrides, type SimulationRules } from '../config/rules.js';
import { getDefaultCatalog, type Catalog } from '../config/catalog.js';
import type { PolicyTemplate } from '../schemas/catalog.schema.js';
import {
  InvalidIntervention,
  LoadError,
  NotFoundError,
  SimulationFault,
  ValidationError,
} from '../plugins/error-handler.plugin.js';
import { RandomStreams } from './random.js';
import { PublicOpinionTracker, revertApprovals } from './opinion.tracker.js';
import { PolicyPipeline } from './policy.pipeline.js';
import { ElectionScheduler } from './election.scheduler.js';
import { EventManager, type ManualEffect } from './event.manager.js';
import { AIDecisionEngine, templateToDraft, type Actor } from './ai.engine.js';
import { EconomySimulator } from './economy.simulator.js';
import { createInitialState } from './scenario.js';
import { invariantIssues } from './invariants.js';
import { parseSnapshot, serializeState } from './snapshot.js';
import { nextMonth } from '../utils/calendar.js';
import { moduleLogger } from '../utils/logger.js';

const log = moduleLogger('engine');

// ============================================
// Phases
// ============================================

export type Phase = 'snapshot' | 'events' | 'decisions' | 'legislation' | 'opinion' | 'elections' | 'economy' | 'clock';

export const PHASES: readonly Phase[] = [
  'snapshot',
  'events',
  'decisions',
  'legislation',
  'opinion',
  'elections',
  'economy',
  'clock',
];

export interface PhaseEvent {
  turn: number;
  phase: Phase;
}

export interface TurnEngineOptions {
  seed?: number;
  start?: SimDate;
  rules?: RuleOverrides;
  catalog?: Catalog;
  /** Resume from a snapshot instead of building the scenario */
  snapshot?: unknown;
  /** Override the actor roster, e.g. to check that order does not matter */
  actors?: (snapshot: Readonly<SimulationState>) => Actor[];
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

function emptyReport(from: SimDate): TurnReport {
  return {
    from: { ...from },
    to: { ...from },
    stepsCompleted: 0,
    turns: [],
    electionsResolved: [],
    policiesProposed: [],
    policiesOpened: [],
    policiesEnacted: [],
    policiesRejected: [],
    eventsFired: [],
    faults: [],
  };
}

function record(report: TurnReport, summary: TurnSummary): void {
  report.stepsCompleted++;
  report.turns.push(summary);
  report.electionsResolved.push(...summary.electionsResolved);
  report.policiesProposed.push(...summary.policiesProposed);
  report.policiesOpened.push(...summary.policiesOpened);
  report.policiesEnacted.push(...summary.policiesEnacted);
  report.policiesRejected.push(...summary.policiesRejected);
  report.eventsFired.push(...summary.eventsFired);
  report.faults.push(...summary.faults);
}

// ============================================
// Turn Engine
// ============================================

/**
 * Owns one SimulationState and advances it a month at a time. Each step runs
 * on a working copy and is committed only once every phase has completed.
 *
 * Emits `phase` (PhaseEvent) as each phase starts and `turn` (TurnSummary)
 * after a step is committed and counted in the report.
 */
export class TurnEngine extends EventEmitter {
  readonly rules: SimulationRules;
  readonly catalog: Catalog;

  private state: SimulationState;
  private advancing = false;

  private readonly pipeline: PolicyPipeline;
  private readonly elections: ElectionScheduler;
  private readonly events: EventManager;
  private readonly ai: AIDecisionEngine;
  private readonly economy: EconomySimulator;
  private readonly templates: Map<string, PolicyTemplate>;
  private readonly actorFactory: (snapshot: Readonly<SimulationState>) => Actor[];

  constructor(options: TurnEngineOptions = {}) {
    super();
    this.rules = resolveRules(options.rules);
    this.catalog = options.catalog ?? getDefaultCatalog();

    this.pipeline = new PolicyPipeline(this.rules);
    this.elections = new ElectionScheduler(this.rules);
    this.events = new EventManager(this.rules, this.catalog.events);
    this.ai = new AIDecisionEngine(this.rules, this.catalog.policies);
    this.economy = new EconomySimulator(this.rules);
    this.templates = new Map(this.catalog.policies.map(p => [p.key, p]));
    this.actorFactory = options.actors ?? (snapshot => this.ai.actorsFor(snapshot));

    this.state = options.snapshot !== undefined
      ? this.validateLoaded(parseSnapshot(options.snapshot, this.rules))
      : createInitialState(this.catalog, this.rules, { seed: options.seed ?? 0, start: options.start });
  }

  get clock(): SimDate {
    return { ...this.state.clock };
  }

  get turn(): number {
    return this.state.turn;
  }

  get seed(): number {
    return this.state.rng.seed;
  }

  get isAdvancing(): boolean {
    return this.advancing;
  }

  /** Deep copy of the committed state */
  getState(): SimulationState {
    return structuredClone(this.state);
  }

  // ============================================
  // Advance API
  // ============================================

  /**
   * Run exactly `months` steps. On a fault the state stays at the last
   * completed step and the thrown SimulationFault carries the partial report,
   * which always counts every committed step.
   */
  advance(months: number): TurnReport {
    if (!Number.isInteger(months) || months < 0) {
      throw new ValidationError('months must be a non-negative integer', { months });
    }
    this.assertIdle('advance');

    const report = emptyReport(this.state.clock);
    this.advancing = true;
    try {
      for (let i = 0; i < months; i++) {
        let summary: TurnSummary;
        try {
          summary = this.step();
        } catch (error) {
          throw this.fault(error, report, { turn: this.state.turn });
        }
        record(report, summary);

        try {
          this.emit('turn', summary);
        } catch (error) {
          throw this.fault(error, report, { turn: summary.turn, listener: 'turn' });
        }
      }
    } finally {
      this.advancing = false;
    }

    report.to = { ...this.state.clock };
    return report;
  }

  private fault(error: unknown, report: TurnReport, context: { turn: number; listener?: string }): SimulationFault {
    const fault = error instanceof SimulationFault
      ? error
      : new SimulationFault(error instanceof Error ? error.message : String(error), {
        ...context,
        cause: error instanceof Error ? error.name : typeof error,
      });
    report.to = { ...this.state.clock };
    fault.report = report;
    log.error({ turn: this.state.turn, context: fault.context, stepsCompleted: report.stepsCompleted }, fault.message);
    return fault;
  }

  private step(): TurnSummary {
    const working = structuredClone(this.state);
    const turn = working.turn;
    const streams = new RandomStreams(working.rng);
    const summary: TurnSummary = {
      turn,
      date: { ...working.clock },
      eventsFired: [],
      intents: [],
      policiesProposed: [],
      policiesOpened: [],
      policiesEnacted: [],
      policiesRejected: [],
      electionsResolved: [],
      faults: [],
    };

    this.enter(turn, 'snapshot');
    const snapshot = deepFreeze(structuredClone(this.state));
    const openable = new Set(snapshot.policies.filter(p => p.status === 'proposed').map(p => p.id));

    this.enter(turn, 'events');
    const fired = this.events.resolve(working, snapshot, streams);
    summary.eventsFired = fired.fired;
    const president: ActorRef = { kind: 'party', id: working.president.partyId };
    for (const key of fired.proposals) {
      try {
        summary.policiesProposed.push(this.pipeline.propose(working, president, templateToDraft(this.template(key))).id);
      } catch (error) {
        if (!(error instanceof InvalidIntervention) && !(error instanceof NotFoundError)) throw error;
        summary.faults.push({ code: error.code, message: error.message, turn, actor: `party:${president.id}`, entityId: key });
      }
    }

    this.enter(turn, 'decisions');
    summary.intents = this.ai.collect(snapshot, streams, this.actorFactory(snapshot));

    this.enter(turn, 'legislation');
    const legislation = this.pipeline.advance(working, openable);
    const applied = this.pipeline.applyIntents(working, summary.intents);
    summary.policiesOpened = legislation.opened;
    summary.policiesEnacted = legislation.enacted;
    summary.policiesRejected = legislation.rejected;
    summary.policiesProposed.push(...applied.proposed);
    summary.faults.push(...applied.faults);

    this.enter(turn, 'opinion');
    const tracker = new PublicOpinionTracker(working.opinion, this.rules.OPINION);
    for (const delta of [...fired.opinion, ...legislation.opinion]) {
      tracker.apply(delta.effects, delta.region);
    }
    tracker.decayStep();
    revertApprovals(working.president, working.legislature, this.rules.OPINION);

    this.enter(turn, 'elections');
    this.elections.schedule(working);
    summary.electionsResolved = this.elections.runDue(working, streams);

    this.enter(turn, 'economy');
    this.economy.simulate(working, streams);

    this.enter(turn, 'clock');
    working.clock = nextMonth(working.clock);
    working.turn = turn + 1;
    streams.commit();

    const issues = invariantIssues(working, this.rules);
    if (issues.length > 0) {
      throw new SimulationFault(`Invariant violated during turn ${turn}`, { turn, issues });
    }

    this.state = working;
    log.debug({
      turn,
      events: summary.eventsFired.length,
      enacted: summary.policiesEnacted.length,
      elections: summary.electionsResolved.map(e => e.id),
    }, 'Turn committed');
    return summary;
  }

  private enter(turn: number, phase: Phase): void {
    const event: PhaseEvent = { turn, phase };
    this.emit('phase', event);
  }

  // ============================================
  // Manual interventions
  // ============================================

  proposePolicy(actor: ActorRef, draft: PolicyDraft): Policy {
    this.assertIdle('proposePolicy');
    return structuredClone(this.pipeline.propose(this.state, actor, draft));
  }

  /** Draft for a catalog policy template */
  templateDraft(key: string, stateId: string | null = null): PolicyDraft {
    return templateToDraft(this.template(key), stateId);
  }

  /**
   * Queue an event for the next step: a catalog key, or an ad hoc effect.
   */
  triggerEvent(input: string | ManualEffect): QueuedTrigger {
    this.assertIdle('triggerEvent');
    return structuredClone(this.events.queue(this.state, input));
  }

  // ============================================
  // Persistence
  // ============================================

  /** The persisted snapshot: canonical JSON of the committed state */
  serialize(): string {
    return serializeState(this.state);
  }

  /**
   * Replace the whole state with a validated snapshot. On LoadError nothing
   * changes.
   */
  load(input: unknown): void {
    this.assertIdle('load');
    this.state = this.validateLoaded(parseSnapshot(input, this.rules));
    log.info({ turn: this.state.turn, clock: this.state.clock }, 'Snapshot loaded');
  }

  private validateLoaded(state: SimulationState): SimulationState {
    const known = new Set(this.catalog.events.map(e => e.key));
    const issues: string[] = [];
    for (const pending of state.events.pending) {
      if (!known.has(pending.eventKey)) issues.push(`pending event '${pending.eventKey}' is not in the catalog`);
    }
    for (const queued of state.events.queued) {
      if (queued.kind === 'catalog' && !known.has(queued.eventKey)) {
        issues.push(`queued event '${queued.eventKey}' is not in the catalog`);
      }
    }
    if (issues.length > 0) {
      throw new LoadError('Snapshot references unknown events', issues);
    }
    return state;
  }

  private template(key: string): PolicyTemplate {
    const template = this.templates.get(key);
    if (!template) {
      throw new NotFoundError('Policy template', key);
    }
    return template;
  }

  private assertIdle(operation: string): void {
    if (this.advancing) {
      throw new InvalidIntervention(`${operation} is not allowed while a turn is being advanced`, { turn: this.state.turn });
    }
  }
}
