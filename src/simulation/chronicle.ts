// ============================================
// CAPITOL - Simulation Log
// ============================================
// A bounded, dated record of what happened, carried in the snapshot.

import type { LogEntry, SimulationState } from '../models/types.js';

/** Append a message stamped with the current turn and date; the oldest entries fall off past `limit` */
export function appendLog(state: SimulationState, message: string, limit: number): void {
  state.log.push({ turn: state.turn, date: { ...state.clock }, message });
  if (state.log.length > limit) {
    state.log.splice(0, state.log.length - limit);
  }
}

export function logTail(log: readonly LogEntry[], count: number): LogEntry[] {
  if (count <= 0) return [];
  return log.slice(-count).map(entry => ({ ...entry, date: { ...entry.date } }));
}
