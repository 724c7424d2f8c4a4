// ============================================
// CAPITOL - Voter Model
// ============================================
// Turns an electorate (opinion + partisan lean) and a slate of candidates
// into vote shares, and picks a plurality winner with a fixed tie-break.

import { ISSUES, type Issue, type MacroEconomy, type PartyId } from '../models/types.js';
import type { SimulationRules } from '../config/rules.js';
import type { RandomStream } from './random.js';
import { clamp, compareIds } from '../utils/math.js';

export interface Candidate {
  partyId: PartyId;
  platform: Record<Issue, number>;
  incumbent: boolean;
  campaign: number;
  economyBonus: number;
  approvalBonus: number;
}

export interface Electorate {
  opinion: Record<Issue, number>;
  lean: Record<PartyId, number>;
}

export interface SeatOutcome {
  winner: PartyId;
  tieBroken: boolean;
}

/**
 * How well a platform matches the public mood, -1..1.
 */
export function platformFit(platform: Record<Issue, number>, opinion: Record<Issue, number>): number {
  let total = 0;
  for (const issue of ISSUES) {
    total += platform[issue] * opinion[issue];
  }
  return total / ISSUES.length;
}

/**
 * Economic mood, -1 (bad) .. 1 (good). Growth above 2%, low unemployment and
 * inflation near 2.5% read as good times for the party holding the White House.
 */
export function economySignal(economy: MacroEconomy, naturalUnemployment: number): number {
  const growth = (economy.growth - 0.02) * 50;
  const jobs = (economy.unemployment - naturalUnemployment) * 0.2;
  const prices = Math.abs(economy.inflation - 2.5) * 0.2;
  return clamp(growth - jobs - prices, -1, 1);
}

export class VoterModel {
  constructor(private readonly rules: SimulationRules['VOTER']) {}

  /**
   * Vote share per candidate party. Shares sum to 1. Noise, when a stream is
   * given, is drawn in party-id order.
   */
  voteShares(electorate: Electorate, candidates: readonly Candidate[], noise?: RandomStream): Record<PartyId, number> {
    const ordered = [...candidates].sort((a, b) => compareIds(a.partyId, b.partyId));
    const scores: Array<[PartyId, number]> = [];

    for (const c of ordered) {
      let score = this.rules.BASE_SCORE;
      score += this.rules.LEAN_WEIGHT * (electorate.lean[c.partyId] ?? 0);
      score += this.rules.OPINION_WEIGHT * platformFit(c.platform, electorate.opinion);
      // Vacant seats carry no incumbency bonus for anyone
      if (c.incumbent) score += this.rules.INCUMBENCY_BONUS;
      score += this.rules.CAMPAIGN_WEIGHT * Math.min(1, Math.max(0, c.campaign) / this.rules.CAMPAIGN_SCALE);
      score += c.economyBonus;
      score += c.approvalBonus;
      if (noise && this.rules.NOISE > 0) {
        score += noise.range(-this.rules.NOISE, this.rules.NOISE);
      }
      scores.push([c.partyId, Math.max(this.rules.MIN_SCORE, score)]);
    }

    const total = scores.reduce((acc, [, s]) => acc + s, 0);
    const shares: Record<PartyId, number> = {};
    for (const [partyId, score] of scores) {
      shares[partyId] = score / total;
    }
    return shares;
  }
}

/**
 * Plurality winner. An exact tie goes to the incumbent party when it is among
 * the tied, otherwise to the lexicographically first party id.
 */
export function pickWinner(shares: Record<PartyId, number>, incumbent: PartyId | null): SeatOutcome {
  const ids = Object.keys(shares).sort(compareIds);
  if (ids.length === 0) {
    throw new RangeError('No candidates to pick a winner from');
  }

  const best = Math.max(...ids.map(id => shares[id]));
  const tied = ids.filter(id => shares[id] === best);

  if (tied.length === 1) {
    return { winner: tied[0], tieBroken: false };
  }
  if (incumbent !== null && tied.includes(incumbent)) {
    return { winner: incumbent, tieBroken: true };
  }
  return { winner: tied[0], tieBroken: true };
}
