// ============================================
// CAPITOL - Snapshot Codec
// ============================================
// Snapshots are canonical JSON (object keys sorted at every level), so two
// runs with the same seed and the same calls serialize byte for byte alike.

import type { SimulationState } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import { snapshotSchema } from '../schemas/snapshot.schema.js';
import { LoadError } from '../plugins/error-handler.plugin.js';
import { invariantIssues } from './invariants.js';
import { compareIds } from '../utils/math.js';

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function canonical(value: unknown): Json {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Cannot serialize non-finite number ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) return value.map(canonical);
  if (typeof value === 'object') {
    const out: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort(compareIds)) {
      const field: unknown = Reflect.get(value, key);
      if (field === undefined) continue;
      out[key] = canonical(field);
    }
    return out;
  }
  throw new TypeError(`Cannot serialize a value of type ${typeof value}`);
}

export function serializeState(state: SimulationState): string {
  return JSON.stringify(canonical(state));
}

/**
 * Parse and validate a snapshot. Accepts the JSON text or an already parsed
 * document. Throws LoadError listing every problem found.
 */
export function parseSnapshot(input: unknown, rules: SimulationRules): SimulationState {
  let document: unknown = input;
  if (typeof input === 'string') {
    try {
      document = JSON.parse(input);
    } catch (error) {
      throw new LoadError('Snapshot is not valid JSON', [error instanceof Error ? error.message : String(error)]);
    }
  }

  const result = snapshotSchema.safeParse(document);
  if (!result.success) {
    throw new LoadError(
      'Snapshot does not match the expected shape',
      result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }

  const state: SimulationState = result.data;
  const issues = invariantIssues(state, rules);
  if (issues.length > 0) {
    throw new LoadError('Snapshot violates simulation invariants', issues);
  }
  return state;
}
