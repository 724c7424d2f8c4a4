// ============================================
// CAPITOL - Test Fixtures
// ============================================
// A three-state world: AA leans blue, BB leans red, CC sits in the middle.
// Six House districts and six Senate seats keep the numbers traceable.

import { parseCatalog, type Catalog, type RawCatalog } from '../src/config/catalog.js';
import type { RuleOverrides } from '../src/config/rules.js';
import type { EffectVector } from '../src/models/types.js';

export const TEST_RULES: RuleOverrides = {
  CHAMBERS: { HOUSE_SIZE: 6, SENATE_SIZE: 6 },
  AI: { ENABLED: false },
  EVENTS: { RANDOM_CHANCE: 0 },
};

export function effects(partial: Partial<EffectVector> = {}): EffectVector {
  return { growth: 0, unemployment: 0, inflation: 0, budget: 0, opinion: {}, ...partial };
}

export interface TestCatalogOptions {
  president?: string;
  courtLean?: string;
}

export function rawTestCatalog(options: TestCatalogOptions = {}): RawCatalog {
  return {
    scenario: {
      startYear: 2025,
      startMonth: 1,
      president: options.president ?? 'blue',
      ...(options.courtLean ? { courtLean: options.courtLean } : {}),
      houseSplit: { blue: 3, red: 3 },
      senateSplit: { blue: 3, red: 3 },
      economy: { growth: 0.02, unemployment: 5, inflation: 2.5 },
      budget: { revenue: 100, spending: 110, taxRate: 0.2 },
    },
    states: {
      states: [
        { id: 'AA', name: 'Alpha', population: 3000000, districts: 3, lean: 0.6, gdp: 300, unemployment: 4, inflation: 2.5 },
        { id: 'BB', name: 'Beta', population: 2000000, districts: 2, lean: -0.6, gdp: 200, unemployment: 6, inflation: 2.5 },
        { id: 'CC', name: 'Gamma', population: 1000000, districts: 1, lean: 0, gdp: 100, unemployment: 5, inflation: 2.5 },
      ],
    },
    parties: {
      parties: [
        { id: 'blue', name: 'Blue Party', platform: { economy: 0.2, healthcare: 0.8, security: -0.2, environment: 0.6, education: 0.5 } },
        { id: 'red', name: 'Red Party', platform: { economy: 0.8, healthcare: -0.4, security: 0.8, environment: -0.5, education: 0.1 } },
      ],
    },
    events: {
      events: [
        {
          key: 'townhall',
          name: 'Town Hall',
          description: 'A televised town hall on schools',
          trigger: { type: 'manual' },
          effects: { opinion: { education: 0.1 } },
        },
        {
          key: 'strike',
          name: 'Strike',
          description: 'Dock workers walk out',
          trigger: { type: 'random' },
          effects: { opinion: { economy: -0.1 } },
          consequences: [{ type: 'chain_event', eventKey: 'strike_followup', delayTurns: 2 }],
        },
        {
          key: 'strike_followup',
          name: 'Strike Talks Collapse',
          description: 'Negotiations break down',
          trigger: { type: 'manual' },
          effects: { opinion: { economy: -0.05 } },
        },
        {
          key: 'spring_fair',
          name: 'Spring Fair',
          description: 'Alpha holds its health fair',
          recurring: true,
          cooldownTurns: 11,
          trigger: { type: 'calendar', month: 4 },
          effects: { opinion: { healthcare: 0.02 } },
          regions: ['AA'],
        },
        {
          key: 'flood',
          name: 'Flood',
          description: 'The river breaks its banks',
          trigger: { type: 'manual' },
          effects: { opinion: { economy: -0.02 } },
          consequences: [{ type: 'policy_proposal', policyKey: 'relief' }],
        },
      ],
    },
    policies: {
      policies: [
        {
          key: 'relief',
          title: 'Flood Relief',
          description: 'Emergency aid for flooded towns',
          level: 'federal',
          issue: 'economy',
          cost: 10,
          effects: { opinion: { economy: 0.05 } },
        },
        {
          key: 'aa_schools',
          title: 'Alpha School Grants',
          description: 'Grants for Alpha classrooms',
          level: 'state',
          issue: 'education',
          cost: 1,
          effects: { opinion: { education: 0.1 } },
        },
      ],
    },
  };
}

export function testCatalog(options: TestCatalogOptions = {}, overrides: Partial<RawCatalog> = {}): Catalog {
  return parseCatalog({ ...rawTestCatalog(options), ...overrides });
}
