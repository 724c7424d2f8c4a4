// ============================================
// CAPITOL - Schemas Barrel Export
// ============================================

export * from './catalog.schema.js';
export * from './snapshot.schema.js';
export * from './simulation.schema.js';
