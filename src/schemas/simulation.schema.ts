// ============================================
// CAPITOL - Simulation API Schemas
// ============================================

import { z } from 'zod';
import { effectVectorSchema, issueSchema } from './catalog.schema.js';

// Longest single advance accepted over HTTP (100 years)
export const MAX_ADVANCE_MONTHS = 1200;

export const actorRefSchema = z.object({
  kind: z.enum(['party', 'state']),
  id: z.string().min(1),
});

// Advance schema
export const advanceSchema = z.object({
  months: z.number().int().min(0).max(MAX_ADVANCE_MONTHS),
});

// Ad hoc policy
export const policyDraftSchema = z.object({
  key: z.string().min(1).nullable().optional(),
  title: z.string().min(1).max(200),
  level: z.enum(['federal', 'state']),
  stateId: z.string().min(1).nullable().optional(),
  issue: issueSchema,
  cost: z.number(),
  effects: effectVectorSchema.default({}),
});

// Propose either an ad hoc draft or a catalog template
export const proposePolicySchema = z.union([
  z.object({
    actor: actorRefSchema,
    policy: policyDraftSchema,
  }),
  z.object({
    actor: actorRefSchema,
    templateKey: z.string().min(1),
    stateId: z.string().min(1).nullable().default(null),
  }),
]);

export const policiesQuerySchema = z.object({
  status: z.enum(['proposed', 'voting', 'enacted', 'rejected']).optional(),
});

// Trigger a catalog event or an ad hoc effect
export const triggerEventSchema = z.union([
  z.object({
    eventKey: z.string().min(1),
  }),
  z.object({
    description: z.string().min(1).max(500),
    effects: effectVectorSchema,
    regions: z.array(z.string().min(1)).min(1).optional(),
  }),
]);

const saveNameSchema = z.string().min(1).max(64).regex(/^[A-Za-z0-9_.-]+$/, 'Use letters, digits, dot, dash or underscore');

export const saveBodySchema = z.object({
  name: saveNameSchema,
});

export const saveParamSchema = z.object({
  name: saveNameSchema,
});

// Type exports
export type ProposePolicyInput = z.infer<typeof proposePolicySchema>;
export type TriggerEventInput = z.infer<typeof triggerEventSchema>;
