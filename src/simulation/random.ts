// ============================================
// CAPITOL - Seeded Random Streams
// ============================================
// Every consumer draws from its own stream, derived by hashing
// (seed, namespace, turn, label). Streams never share state, so the order in
// which actors or seats are visited cannot change any outcome.

import type { RngState } from '../models/types.js';

function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6D2B79F5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export class RandomStream {
  private readonly next01: () => number;
  private drawn = 0;

  constructor(readonly key: string, seed: number, turn: number, label: string = '') {
    this.next01 = mulberry32(fnv1a32(`${seed}|${key}|${turn}|${label}`));
  }

  get draws(): number {
    return this.drawn;
  }

  next(): number {
    this.drawn++;
    return this.next01();
  }

  range(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  int(min: number, max: number): number {
    const a = Math.ceil(min);
    const b = Math.floor(max);
    return a + Math.floor(this.next() * (b - a + 1));
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError(`Cannot pick from an empty list (stream ${this.key})`);
    }
    return items[Math.min(items.length - 1, Math.floor(this.next() * items.length))];
  }

  /** Weighted pick; entries with non-positive weight are never chosen */
  weighted<T>(entries: ReadonlyArray<{ item: T; weight: number }>): T | null {
    const total = entries.reduce((sum, e) => sum + Math.max(0, e.weight), 0);
    if (total <= 0) return null;
    const roll = this.next() * total;
    let acc = 0;
    for (const entry of entries) {
      if (entry.weight <= 0) continue;
      acc += entry.weight;
      if (roll < acc) return entry.item;
    }
    return entries.filter(e => e.weight > 0).slice(-1)[0].item;
  }
}

/**
 * Stream factory bound to one simulation's RNG state. Draw counts are folded
 * back into `rng.counters` on `commit`, which is what the snapshot persists.
 */
export class RandomStreams {
  private readonly open: RandomStream[] = [];

  constructor(private readonly rng: RngState) {}

  get seed(): number {
    return this.rng.seed;
  }

  stream(key: string, turn: number, label: string = ''): RandomStream {
    const stream = new RandomStream(key, this.rng.seed, turn, label);
    this.open.push(stream);
    return stream;
  }

  commit(): void {
    const counters = { ...this.rng.counters };
    for (const stream of this.open) {
      if (stream.draws === 0) continue;
      counters[stream.key] = (counters[stream.key] ?? 0) + stream.draws;
    }
    this.open.length = 0;
    // Sorted keys keep the serialized snapshot independent of visiting order
    this.rng.counters = Object.fromEntries(
      Object.keys(counters).sort().map(key => [key, counters[key]])
    );
  }
}

export function actorStreamKey(kind: string, id: string): string {
  return `actor:${kind}:${id}`;
}
