// ============================================
// CAPITOL - Services Barrel Export
// ============================================

export { SimulationService, type SimulationOverview, type PartyStanding } from './simulation.service.js';
