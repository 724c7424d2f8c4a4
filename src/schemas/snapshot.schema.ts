// ============================================
// CAPITOL - Persisted Snapshot Schema
// ============================================

import { z } from 'zod';
import { effectVectorSchema, issueSchema, platformSchema } from './catalog.schema.js';

const partyMap = z.record(z.string(), z.number());
const simDateSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
});
const actorRefSchema = z.object({
  kind: z.enum(['party', 'state']),
  id: z.string().min(1),
});
// Bounds are checked against the active rules, not here
const opinionRowSchema = z.object({
  economy: z.number(),
  healthcare: z.number(),
  security: z.number(),
  environment: z.number(),
  education: z.number(),
});
const approvalSchema = z.number().min(0).max(100);
const budgetSchema = z.object({
  revenue: z.number(),
  spending: z.number(),
  taxRate: z.number(),
});

const districtSchema = z.object({
  id: z.string(),
  stateId: z.string(),
  lean: partyMap,
  incumbent: z.string().nullable(),
  voteShares: partyMap,
  campaign: partyMap,
});

const senateSeatSchema = z.object({
  id: z.string(),
  stateId: z.string(),
  seatClass: z.number().int().min(0),
  incumbent: z.string().nullable(),
});

const usStateSchema = z.object({
  id: z.string(),
  name: z.string(),
  population: z.number(),
  lean: partyMap,
  governorParty: z.string(),
  economy: z.object({ gdp: z.number(), unemployment: z.number(), inflation: z.number() }),
  budget: budgetSchema,
  districts: z.array(districtSchema),
  senateSeats: z.array(senateSeatSchema),
  campaign: partyMap,
  enactedPolicies: z.array(z.string()),
});

const partySchema = z.object({
  id: z.string(),
  name: z.string(),
  platform: platformSchema,
  treasury: z.number(),
  approval: approvalSchema,
  seats: z.object({ house: z.number().int().min(0), senate: z.number().int().min(0) }),
});

const chamberVoteSchema = z.object({
  body: z.enum(['house', 'senate', 'state_legislature']),
  yes: z.number(),
  size: z.number(),
  share: z.number(),
  threshold: z.number(),
  passed: z.boolean(),
});

const policySchema = z.object({
  id: z.string(),
  key: z.string().nullable(),
  title: z.string(),
  sponsor: actorRefSchema,
  sponsorParty: z.string(),
  level: z.enum(['federal', 'state']),
  stateId: z.string().nullable(),
  issue: issueSchema,
  cost: z.number(),
  effects: effectVectorSchema,
  status: z.enum(['proposed', 'voting', 'enacted', 'rejected']),
  proposedTurn: z.number().int(),
  votingTurn: z.number().int().nullable(),
  resolvedTurn: z.number().int().nullable(),
  tally: z.object({
    votes: z.array(chamberVoteSchema),
    courtRisk: z.number(),
    vetoed: z.boolean(),
    overridden: z.boolean(),
  }).nullable(),
});

const electionSchema = z.object({
  id: z.string(),
  kind: z.enum(['house', 'senate', 'presidential']),
  scheduled: simDateSchema,
  seats: z.array(z.string()),
  status: z.enum(['pending', 'in_progress', 'resolved']),
  results: z.array(z.object({
    seatId: z.string(),
    previous: z.string().nullable(),
    winner: z.string(),
    shares: partyMap,
    tieBroken: z.boolean(),
  })),
  seatTotals: partyMap,
  winner: z.string().nullable(),
});

const queuedTriggerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('catalog'), eventKey: z.string() }),
  z.object({
    kind: z.literal('effect'),
    key: z.string(),
    description: z.string(),
    effects: effectVectorSchema,
    regions: z.array(z.string()),
  }),
]);

export const snapshotSchema = z.object({
  version: z.literal(1),
  clock: simDateSchema,
  turn: z.number().int().min(0),
  rng: z.object({
    seed: z.number().int(),
    counters: z.record(z.string(), z.number().int().min(0)),
  }),
  economy: z.object({ growth: z.number(), unemployment: z.number(), inflation: z.number() }),
  budget: budgetSchema,
  president: z.object({ partyId: z.string(), approval: approvalSchema }),
  legislature: z.object({
    houseSize: z.number().int().positive(),
    senateSize: z.number().int().positive(),
    houseControl: z.string().nullable(),
    senateControl: z.string().nullable(),
    approval: approvalSchema,
  }),
  court: z.object({ lean: z.string() }),
  parties: z.array(partySchema),
  states: z.array(usStateSchema),
  opinion: z.record(z.string(), opinionRowSchema),
  policies: z.array(policySchema),
  elections: z.array(electionSchema),
  events: z.object({
    cooldowns: z.record(z.string(), z.number().int()),
    retired: z.array(z.string()),
    pending: z.array(z.object({ eventKey: z.string(), dueTurn: z.number().int() })),
    queued: z.array(queuedTriggerSchema),
    recent: z.array(z.string()),
    manualSeq: z.number().int().min(0),
  }),
  log: z.array(z.object({
    turn: z.number().int().min(0),
    date: simDateSchema,
    message: z.string(),
  })),
  nextPolicySeq: z.number().int().positive(),
});
