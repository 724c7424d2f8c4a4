// ============================================
// CAPITOL - Core Type Definitions
// ============================================

// === Calendar ===
export interface SimDate {
  year: number;
  month: number; // 1-12
}

// === Identifiers ===
export type PartyId = string;
export type StateId = string;
export type Issue = 'economy' | 'healthcare' | 'security' | 'environment' | 'education';
export const ISSUES: readonly Issue[] = ['economy', 'healthcare', 'security', 'environment', 'education'];

/** Opinion regions: the nation as a whole plus one per state id */
export const NATIONAL_REGION = 'national';
export type RegionId = string;

export type Chamber = 'house' | 'senate';

// === Effects ===
export interface EffectVector {
  growth: number;        // percentage points of annual growth (0.01 = 1pp)
  unemployment: number;  // percentage points
  inflation: number;     // percentage points
  budget: number;        // billions of spending (negative = savings)
  opinion: Partial<Record<Issue, number>>;
}

// === Economy ===
export interface MacroEconomy {
  growth: number;
  unemployment: number;
  inflation: number;
}

export interface Budget {
  revenue: number;   // billions
  spending: number;  // billions
  taxRate: number;   // effective rate over GDP
}

// === Parties ===
export interface PoliticalParty {
  id: PartyId;
  name: string;
  platform: Record<Issue, number>; // stance per issue, -1..1
  treasury: number;
  approval: number; // national approval 0-100
  seats: Record<Chamber, number>;
}

// === Geography ===
export interface District {
  id: string;
  stateId: StateId;
  lean: Record<PartyId, number>;
  incumbent: PartyId | null;
  voteShares: Record<PartyId, number>; // result of the last House election
  campaign: Record<PartyId, number>;
}

export interface SenateSeat {
  id: string;
  stateId: StateId;
  seatClass: number; // 0..2
  incumbent: PartyId | null;
}

export interface StateEconomy {
  gdp: number; // billions
  unemployment: number;
  inflation: number;
}

export interface UsState {
  id: StateId;
  name: string;
  population: number;
  lean: Record<PartyId, number>;
  governorParty: PartyId;
  economy: StateEconomy;
  budget: Budget;
  districts: District[];
  senateSeats: SenateSeat[];
  campaign: Record<PartyId, number>; // statewide spend, used by Senate and presidential races
  enactedPolicies: string[];
}

// === Actors & intents ===
export type ActorKind = 'party' | 'state';

export interface ActorRef {
  kind: ActorKind;
  id: string;
}

export type PolicyLevel = 'federal' | 'state';

export interface PolicyDraft {
  key?: string | null;
  title: string;
  level: PolicyLevel;
  stateId?: StateId | null;
  issue: Issue;
  cost: number;
  effects: EffectVector;
}

export type Intent =
  | { kind: 'propose'; actor: ActorRef; policy: PolicyDraft; score: number }
  | { kind: 'campaign'; actor: ActorRef; partyId: PartyId; stateId: StateId; districtId: string | null; amount: number; score: number }
  | { kind: 'adjust_budget'; actor: ActorRef; stateId: StateId; delta: number; score: number }
  | { kind: 'idle'; actor: ActorRef; score: number };

// === Policies ===
export type PolicyStatus = 'proposed' | 'voting' | 'enacted' | 'rejected';

export type VotingBody = Chamber | 'state_legislature';

export interface ChamberVote {
  body: VotingBody;
  yes: number;
  size: number;
  share: number;
  threshold: number;
  passed: boolean;
}

export interface PolicyTally {
  votes: ChamberVote[];
  courtRisk: number; // yes-share lost to expected judicial review
  vetoed: boolean;
  overridden: boolean;
}

export interface Policy {
  id: string;
  key: string | null;
  title: string;
  sponsor: ActorRef;
  sponsorParty: PartyId;
  level: PolicyLevel;
  stateId: StateId | null;
  issue: Issue;
  cost: number;
  effects: EffectVector;
  status: PolicyStatus;
  proposedTurn: number;
  votingTurn: number | null;
  resolvedTurn: number | null;
  tally: PolicyTally | null;
}

// === Elections ===
export type ElectionKind = 'house' | 'senate' | 'presidential';
export type ElectionStatus = 'pending' | 'in_progress' | 'resolved';

export interface SeatResult {
  seatId: string;
  previous: PartyId | null;
  winner: PartyId;
  shares: Record<PartyId, number>;
  tieBroken: boolean;
}

export interface Election {
  id: string;
  kind: ElectionKind;
  scheduled: SimDate;
  seats: string[];
  status: ElectionStatus;
  results: SeatResult[];
  seatTotals: Record<PartyId, number>;
  winner: PartyId | null; // chamber majority or presidency
}

// === Events ===
export interface ChainedEvent {
  eventKey: string;
  dueTurn: number;
}

export type QueuedTrigger =
  | { kind: 'catalog'; eventKey: string }
  | { kind: 'effect'; key: string; description: string; effects: EffectVector; regions: RegionId[] };

export interface EventState {
  cooldowns: Record<string, number>;
  retired: string[];
  pending: ChainedEvent[];
  queued: QueuedTrigger[];
  recent: string[];
  manualSeq: number;
}

// === Randomness ===
export interface RngState {
  seed: number;
  counters: Record<string, number>; // stream key -> draws consumed
}

// === Log ===
export interface LogEntry {
  turn: number;
  date: SimDate;
  message: string;
}

// === Aggregate root ===
export interface Presidency {
  partyId: PartyId;
  approval: number; // 0-100
}

export interface Legislature {
  houseSize: number;
  senateSize: number;
  houseControl: PartyId | null;
  senateControl: PartyId | null;
  approval: number; // congressional approval, 0-100
}

export interface SupremeCourt {
  lean: PartyId;
}

export interface SimulationState {
  version: 1;
  clock: SimDate;
  turn: number;
  rng: RngState;
  economy: MacroEconomy;
  budget: Budget;
  president: Presidency;
  legislature: Legislature;
  court: SupremeCourt;
  parties: PoliticalParty[];
  states: UsState[];
  opinion: Record<RegionId, Record<Issue, number>>;
  policies: Policy[];
  elections: Election[];
  events: EventState;
  log: LogEntry[];
  nextPolicySeq: number;
}

// === Reporting ===
export interface FaultRecord {
  code: string;
  message: string;
  turn: number;
  actor?: string;
  entityId?: string;
}

export interface FiredEvent {
  key: string;
  description: string;
  source: 'manual' | 'chained' | 'conditional' | 'random';
  regions: RegionId[];
}

export interface PolicyOutcome {
  policyId: string;
  title: string;
  status: PolicyStatus;
  tally: PolicyTally | null;
}

export interface TurnSummary {
  turn: number;
  date: SimDate;
  eventsFired: FiredEvent[];
  intents: Intent[];
  policiesProposed: string[];
  policiesOpened: string[];
  policiesEnacted: PolicyOutcome[];
  policiesRejected: PolicyOutcome[];
  electionsResolved: Election[];
  faults: FaultRecord[];
}

export interface TurnReport {
  from: SimDate;
  to: SimDate;
  stepsCompleted: number;
  turns: TurnSummary[];
  electionsResolved: Election[];
  policiesProposed: string[];
  policiesOpened: string[];
  policiesEnacted: PolicyOutcome[];
  policiesRejected: PolicyOutcome[];
  eventsFired: FiredEvent[];
  faults: FaultRecord[];
}
