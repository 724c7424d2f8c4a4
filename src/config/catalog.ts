// ============================================
// CAPITOL - Catalog Loader
// ============================================

import { readFileSync } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { env } from './env.js';
import { ConfigurationFault } from '../plugins/error-handler.plugin.js';
import {
  statesFileSchema,
  partiesFileSchema,
  eventsFileSchema,
  policiesFileSchema,
  scenarioDefinitionSchema,
  type StateDefinition,
  type PartyDefinition,
  type EventDefinition,
  type PolicyTemplate,
  type ScenarioDefinition,
} from '../schemas/catalog.schema.js';

export interface Catalog {
  scenario: ScenarioDefinition;
  states: StateDefinition[];
  parties: PartyDefinition[];
  events: EventDefinition[];
  policies: PolicyTemplate[];
}

export interface RawCatalog {
  scenario: unknown;
  states: unknown;
  parties: unknown;
  events: unknown;
  policies: unknown;
}

export function resolveDataDir(dir: string = env.DATA_DIR): string {
  return path.resolve(process.cwd(), dir);
}

function parseSection<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, file: string, issues: string[]): T | null {
  const result = schema.safeParse(input);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${file}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return null;
  }
  return result.data;
}

function duplicates(keys: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const key of keys) {
    if (seen.has(key)) dupes.add(key);
    seen.add(key);
  }
  return [...dupes];
}

/**
 * Validate raw catalog documents. Cross references (chained event keys,
 * proposed policy keys, party ids in splits) are checked here so a bad data
 * directory fails before any turn runs.
 */
export function parseCatalog(raw: RawCatalog): Catalog {
  const issues: string[] = [];

  const scenario = parseSection(scenarioDefinitionSchema, raw.scenario, 'scenario.json', issues);
  const states = parseSection(statesFileSchema, raw.states, 'states.json', issues);
  const parties = parseSection(partiesFileSchema, raw.parties, 'parties.json', issues);
  const events = parseSection(eventsFileSchema, raw.events, 'events.json', issues);
  const policies = parseSection(policiesFileSchema, raw.policies, 'policies.json', issues);

  if (!scenario || !states || !parties || !events || !policies) {
    throw new ConfigurationFault('Invalid catalog data', issues);
  }

  for (const id of duplicates(states.states.map(s => s.id))) issues.push(`states.json: duplicate state id '${id}'`);
  for (const id of duplicates(parties.parties.map(p => p.id))) issues.push(`parties.json: duplicate party id '${id}'`);
  for (const key of duplicates(events.events.map(e => e.key))) issues.push(`events.json: duplicate event key '${key}'`);
  for (const key of duplicates(policies.policies.map(p => p.key))) issues.push(`policies.json: duplicate policy key '${key}'`);

  const eventKeys = new Set(events.events.map(e => e.key));
  const policyKeys = new Set(policies.policies.map(p => p.key));
  const federalKeys = new Set(policies.policies.filter(p => p.level === 'federal').map(p => p.key));
  const partyIds = new Set(parties.parties.map(p => p.id));
  const regions = new Set(['national', ...states.states.map(s => s.id)]);

  for (const event of events.events) {
    for (const c of event.consequences) {
      if (c.type === 'chain_event' && !eventKeys.has(c.eventKey)) {
        issues.push(`events.json: '${event.key}' chains unknown event '${c.eventKey}'`);
      }
      if (c.type === 'policy_proposal' && !policyKeys.has(c.policyKey)) {
        issues.push(`events.json: '${event.key}' proposes unknown policy '${c.policyKey}'`);
      } else if (c.type === 'policy_proposal' && !federalKeys.has(c.policyKey)) {
        issues.push(`events.json: '${event.key}' proposes state-level policy '${c.policyKey}'`);
      }
    }
    for (const region of event.regions) {
      if (!regions.has(region)) issues.push(`events.json: '${event.key}' targets unknown region '${region}'`);
    }
    if (event.partyBenefit !== null && !partyIds.has(event.partyBenefit)) {
      issues.push(`events.json: '${event.key}' benefits unknown party '${event.partyBenefit}'`);
    }
  }

  if (!partyIds.has(scenario.president)) {
    issues.push(`scenario.json: president party '${scenario.president}' is not defined`);
  }
  if (scenario.courtLean !== undefined && !partyIds.has(scenario.courtLean)) {
    issues.push(`scenario.json: court lean '${scenario.courtLean}' is not a defined party`);
  }
  for (const split of [scenario.houseSplit, scenario.senateSplit]) {
    for (const id of Object.keys(split)) {
      if (!partyIds.has(id)) issues.push(`scenario.json: seat split names unknown party '${id}'`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationFault('Invalid catalog data', issues);
  }

  return {
    scenario,
    states: states.states,
    parties: parties.parties,
    events: events.events,
    policies: policies.policies,
  };
}

function readJson(dir: string, file: string): unknown {
  const fullPath = path.join(dir, file);
  try {
    return JSON.parse(readFileSync(fullPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationFault(`Cannot read catalog file ${file}`, [`${fullPath}: ${reason}`]);
  }
}

export function loadCatalog(dir: string = resolveDataDir()): Catalog {
  return parseCatalog({
    scenario: readJson(dir, 'scenario.json'),
    states: readJson(dir, 'states.json'),
    parties: readJson(dir, 'parties.json'),
    events: readJson(dir, 'events.json'),
    policies: readJson(dir, 'policies.json'),
  });
}

let defaultCatalog: Catalog | null = null;

export function getDefaultCatalog(): Catalog {
  if (!defaultCatalog) {
    defaultCatalog = loadCatalog();
  }
  return defaultCatalog;
}
