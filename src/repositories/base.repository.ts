// ============================================
// CAPITOL - Base Repository
// ============================================

import { randomUUID } from 'crypto';
import { sql } from 'drizzle-orm';
import type { SQLiteTable } from 'drizzle-orm/sqlite-core';
import type { DrizzleDb } from '../db/drizzle.js';

export abstract class BaseRepository<TTable extends SQLiteTable> {
  constructor(
    protected db: DrizzleDb,
    protected table: TTable
  ) {}

  async count(): Promise<number> {
    const rows = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(this.table);
    return rows[0]?.count ?? 0;
  }

  protected generateId(): string {
    return randomUUID();
  }

  protected now(): Date {
    return new Date();
  }
}
