// ============================================
// CAPITOL - Simulation Service
// ============================================

import { SnapshotRepository, type SaveRecord, type SaveSummary } from '../repositories/index.js';
import { NotFoundError } from '../plugins/error-handler.plugin.js';
import type { TurnEngine } from '../simulation/engine.js';
import { logTail } from '../simulation/chronicle.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type {
  Budget,
  Election,
  Issue,
  Legislature,
  LogEntry,
  MacroEconomy,
  Policy,
  PolicyStatus,
  QueuedTrigger,
  SimDate,
  TurnReport,
} from '../models/types.js';
import type { ProposePolicyInput, TriggerEventInput } from '../schemas/simulation.schema.js';

export interface PartyStanding {
  id: string;
  name: string;
  approval: number;
  treasury: number;
  seats: { house: number; senate: number };
  governors: number;
}

export interface SimulationOverview {
  clock: SimDate;
  turn: number;
  seed: number;
  president: string;
  presidentApproval: number;
  legislature: Legislature;
  courtLean: string;
  parties: PartyStanding[];
  economy: MacroEconomy;
  budget: Budget;
  nationalOpinion: Record<Issue, number>;
  upcomingElections: Pick<Election, 'id' | 'kind' | 'scheduled'>[];
  recentLog: LogEntry[];
}

function summarize(record: SaveRecord): SaveSummary {
  return {
    id: record.id,
    name: record.name,
    seed: record.seed,
    clock: record.clock,
    turn: record.turn,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}

export class SimulationService {
  private saveRepo: SnapshotRepository;

  constructor(readonly engine: TurnEngine, db: DrizzleDb) {
    this.saveRepo = new SnapshotRepository(db);
  }

  getOverview(): SimulationOverview {
    const state = this.engine.getState();
    return {
      clock: state.clock,
      turn: state.turn,
      seed: state.rng.seed,
      president: state.president.partyId,
      presidentApproval: state.president.approval,
      legislature: state.legislature,
      courtLean: state.court.lean,
      parties: state.parties.map(p => ({
        id: p.id,
        name: p.name,
        approval: p.approval,
        treasury: p.treasury,
        seats: { house: p.seats.house, senate: p.seats.senate },
        governors: state.states.filter(s => s.governorParty === p.id).length,
      })),
      economy: state.economy,
      budget: state.budget,
      nationalOpinion: state.opinion.national,
      upcomingElections: state.elections
        .filter(e => e.status === 'pending')
        .map(e => ({ id: e.id, kind: e.kind, scheduled: e.scheduled })),
      recentLog: logTail(state.log, this.engine.rules.LOG.TAIL),
    };
  }

  getSnapshot(): string {
    return this.engine.serialize();
  }

  advance(months: number): TurnReport {
    return this.engine.advance(months);
  }

  proposePolicy(input: ProposePolicyInput): Policy {
    const draft = 'policy' in input
      ? input.policy
      : this.engine.templateDraft(input.templateKey, input.stateId);
    return this.engine.proposePolicy(input.actor, draft);
  }

  listPolicies(status?: PolicyStatus): Policy[] {
    const policies = this.engine.getState().policies;
    return status ? policies.filter(p => p.status === status) : policies;
  }

  triggerEvent(input: TriggerEventInput): QueuedTrigger {
    if ('eventKey' in input) {
      return this.engine.triggerEvent(input.eventKey);
    }
    return this.engine.triggerEvent({
      description: input.description,
      effects: input.effects,
      regions: input.regions,
    });
  }

  // === Saves ===

  async listSaves(): Promise<SaveSummary[]> {
    return this.saveRepo.listSaves();
  }

  async save(name: string): Promise<SaveSummary> {
    const record = await this.saveRepo.saveSnapshot({
      name,
      seed: this.engine.seed,
      clock: this.engine.clock,
      turn: this.engine.turn,
      payload: this.engine.serialize(),
    });
    return summarize(record);
  }

  async load(name: string): Promise<SaveSummary> {
    const record = await this.requireSave(name);
    this.engine.load(record.payload);
    return summarize(record);
  }

  async deleteSave(name: string): Promise<void> {
    const deleted = await this.saveRepo.deleteByName(name);
    if (!deleted) {
      throw new NotFoundError('Save', name);
    }
  }

  private async requireSave(name: string): Promise<SaveRecord> {
    const record = await this.saveRepo.findByName(name);
    if (!record) {
      throw new NotFoundError('Save', name);
    }
    return record;
  }
}
