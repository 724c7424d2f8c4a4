// ============================================
// CAPITOL - Repositories Barrel Export
// ============================================

export { BaseRepository } from './base.repository.js';
export { SnapshotRepository, type SaveSummary, type SaveRecord, type SaveInput } from './snapshot.repository.js';
