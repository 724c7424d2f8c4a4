// ============================================
// CAPITOL - Saved Simulation Schema
// ============================================

import { sqliteTable, text, integer, index, unique } from 'drizzle-orm/sqlite-core';

// Named snapshots of a running simulation
export const saves = sqliteTable('saves', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  seed: integer('seed').notNull(),
  year: integer('year').notNull(),
  month: integer('month').notNull(),
  turn: integer('turn').notNull(),
  payload: text('payload').notNull(), // canonical snapshot JSON
  createdAt: integer('created_at', { mode: 'timestamp' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull(),
}, (table) => [
  unique('unique_save_name').on(table.name),
  index('idx_saves_updated_at').on(table.updatedAt),
]);

// Type exports
export type SaveRow = typeof saves.$inferSelect;
