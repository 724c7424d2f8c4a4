// ============================================
// CAPITOL - Catalog Schemas (data/*.json)
// ============================================

import { z } from 'zod';
import { ISSUES } from '../models/types.js';

export const issueSchema = z.enum(['economy', 'healthcare', 'security', 'environment', 'education']);

// Compile-time check that the schema and the domain list agree
const _issuesMatch: readonly z.infer<typeof issueSchema>[] = ISSUES;
void _issuesMatch;

export const stanceSchema = z.number().min(-1).max(1);

export const platformSchema = z.object({
  economy: stanceSchema,
  healthcare: stanceSchema,
  security: stanceSchema,
  environment: stanceSchema,
  education: stanceSchema,
});

export const effectVectorSchema = z.object({
  growth: z.number().default(0),
  unemployment: z.number().default(0),
  inflation: z.number().default(0),
  budget: z.number().default(0),
  opinion: z.record(issueSchema, z.number()).default({}),
});

// === States ===
export const stateDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  population: z.number().int().positive(),
  districts: z.number().int().positive(),
  lean: z.number().min(-1).max(1), // + favours the scenario's first party
  gdp: z.number().positive(),
  unemployment: z.number().min(0),
  inflation: z.number().min(0),
  taxRate: z.number().min(0).max(1).default(0.06),
});

// === Parties ===
export const partyDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  platform: platformSchema,
  treasury: z.number().min(0).default(100),
  approval: z.number().min(0).max(100).default(50),
});

// === Scenario ===
export const scenarioDefinitionSchema = z.object({
  startYear: z.number().int(),
  startMonth: z.number().int().min(1).max(12),
  president: z.string().min(1),
  // Missing approvals start at the rule baselines; the court leans to the president by default
  presidentApproval: z.number().min(0).max(100).optional(),
  congressApproval: z.number().min(0).max(100).optional(),
  courtLean: z.string().min(1).optional(),
  houseSplit: z.record(z.string(), z.number()),
  senateSplit: z.record(z.string(), z.number()),
  economy: z.object({
    growth: z.number(),
    unemployment: z.number(),
    inflation: z.number(),
  }),
  budget: z.object({
    revenue: z.number(),
    spending: z.number(),
    taxRate: z.number().min(0).max(1),
  }),
});

// === Events ===
const thresholdFields = {
  below: z.number().optional(),
  above: z.number().optional(),
};

export const eventTriggerSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('random') }),
  z.object({ type: z.literal('manual') }),
  z.object({
    type: z.literal('calendar'),
    month: z.number().int().min(1).max(12),
    everyYears: z.number().int().positive().default(1),
  }),
  z.object({ type: z.literal('budget_deficit'), above: z.number() }),
  z.object({
    type: z.literal('opinion'),
    region: z.string().default('national'),
    issue: issueSchema,
    ...thresholdFields,
  }),
  z.object({
    type: z.literal('economy'),
    metric: z.enum(['growth', 'unemployment', 'inflation']),
    ...thresholdFields,
  }),
]);

export const eventConsequenceSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chain_event'),
    eventKey: z.string().min(1),
    delayTurns: z.number().int().min(1),
    probability: z.number().min(0).max(1).default(1),
  }),
  z.object({
    type: z.literal('policy_proposal'),
    policyKey: z.string().min(1),
    probability: z.number().min(0).max(1).default(1),
  }),
]);

export const eventDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  weight: z.number().min(0).default(1),
  recurring: z.boolean().default(false),
  cooldownTurns: z.number().int().min(0).optional(), // EVENTS.DEFAULT_COOLDOWN_TURNS when missing
  trigger: eventTriggerSchema,
  effects: effectVectorSchema,
  regions: z.array(z.string().min(1)).min(1).default(['national']),
  partyBenefit: z.string().nullable().default(null),
  approval: z.object({
    president: z.number().default(0),
    congress: z.number().default(0),
  }).default({}),
  consequences: z.array(eventConsequenceSchema).default([]),
});

// === Policies ===
export const policyTemplateSchema = z.object({
  key: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  level: z.enum(['federal', 'state']),
  issue: issueSchema,
  cost: z.number(),
  effects: effectVectorSchema,
  requirements: z.object({
    minUnemployment: z.number().optional(),
    minInflation: z.number().optional(),
    minDeficit: z.number().optional(),
    maxGrowth: z.number().optional(),
  }).default({}),
});

export const statesFileSchema = z.object({ states: z.array(stateDefinitionSchema).min(1) });
export const partiesFileSchema = z.object({ parties: z.array(partyDefinitionSchema).min(1) });
export const eventsFileSchema = z.object({ events: z.array(eventDefinitionSchema) });
export const policiesFileSchema = z.object({ policies: z.array(policyTemplateSchema) });

// Type exports
export type StateDefinition = z.infer<typeof stateDefinitionSchema>;
export type PartyDefinition = z.infer<typeof partyDefinitionSchema>;
export type ScenarioDefinition = z.infer<typeof scenarioDefinitionSchema>;
export type EventTrigger = z.infer<typeof eventTriggerSchema>;
export type EventDefinition = z.infer<typeof eventDefinitionSchema>;
export type PolicyTemplate = z.infer<typeof policyTemplateSchema>;
