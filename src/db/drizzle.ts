// ============================================
// CAPITOL - Drizzle Instance
// ============================================

import { openDatabase, closeDatabase, getDbPath } from '../config/database.js';
import type { DrizzleDb, DatabaseConnection } from '../config/database.js';

export { openDatabase, closeDatabase, getDbPath };
export type { DrizzleDb, DatabaseConnection };

// Re-export schema for convenience
export * as schema from './schema/index.js';
