// ============================================
// CAPITOL - Snapshot Repository
// ============================================

import { asc, eq } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { saves, type SaveRow } from '../db/schema/saves.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { SimDate } from '../models/types.js';

export interface SaveSummary {
  id: string;
  name: string;
  seed: number;
  clock: SimDate;
  turn: number;
  createdAt: string;
  updatedAt: string;
}

export interface SaveRecord extends SaveSummary {
  payload: string;
}

export interface SaveInput {
  name: string;
  seed: number;
  clock: SimDate;
  turn: number;
  payload: string;
}

function toSummary(row: SaveRow): SaveSummary {
  return {
    id: row.id,
    name: row.name,
    seed: row.seed,
    clock: { year: row.year, month: row.month },
    turn: row.turn,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function toRecord(row: SaveRow): SaveRecord {
  return { ...toSummary(row), payload: row.payload };
}

export class SnapshotRepository extends BaseRepository<typeof saves> {
  constructor(db: DrizzleDb) {
    super(db, saves);
  }

  /** Insert, or overwrite the save with the same name */
  async saveSnapshot(input: SaveInput): Promise<SaveRecord> {
    const now = this.now();
    const results = await this.db
      .insert(saves)
      .values({
        id: this.generateId(),
        name: input.name,
        seed: input.seed,
        year: input.clock.year,
        month: input.clock.month,
        turn: input.turn,
        payload: input.payload,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: saves.name,
        set: {
          seed: input.seed,
          year: input.clock.year,
          month: input.clock.month,
          turn: input.turn,
          payload: input.payload,
          updatedAt: now,
        },
      })
      .returning();
    return toRecord(results[0]);
  }

  async findByName(name: string): Promise<SaveRecord | null> {
    const results = await this.db
      .select()
      .from(saves)
      .where(eq(saves.name, name))
      .limit(1);
    return results[0] ? toRecord(results[0]) : null;
  }

  async listSaves(): Promise<SaveSummary[]> {
    const results = await this.db
      .select()
      .from(saves)
      .orderBy(asc(saves.name));
    return results.map(toSummary);
  }

  async deleteByName(name: string): Promise<boolean> {
    const results = await this.db
      .delete(saves)
      .where(eq(saves.name, name))
      .returning({ id: saves.id });
    return results.length > 0;
  }
}
