// ============================================
// CAPITOL - Database Schema Barrel Export
// ============================================

export * from './saves.js';
