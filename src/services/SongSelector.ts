import type { Candidate, RandomSource, SelectionMode } from '../types/index.js';

export const DEFAULT_TOP_N = 5;

export interface RankedCandidate {
  candidate: Candidate;
  playCount: number;
}

// Play count descending, then most recent first
export function rankCandidates(candidates: Candidate[], playCounts: Record<string, number>): RankedCandidate[] {
  return candidates
    .map((candidate) => ({ candidate, playCount: playCounts[candidate.trackId] ?? 0 }))
    .sort((a, b) => {
      if (b.playCount !== a.playCount) return b.playCount - a.playCount;
      if (a.candidate.lastSeenAt === b.candidate.lastSeenAt) return 0;
      return a.candidate.lastSeenAt < b.candidate.lastSeenAt ? 1 : -1;
    });
}

export function selectionWeight(playCount: number, mode: SelectionMode): number {
  const base = Math.max(1, playCount);
  return mode === 'strongly_weighted_random' ? base * base : base;
}

// Index drawn with probability proportional to its weight
export function weightedIndex(weights: number[], random: RandomSource): number {
  const total = weights.reduce((sum, w) => sum + w, 0);
  let r = random() * total;
  for (let i = 0; i < weights.length; i++) {
    r -= weights[i] ?? 0;
    if (r < 0) return i;
  }
  return weights.length - 1;
}

/**
 * Picks among ranked candidates. `most_played` always takes the top entry;
 * the random modes draw from the top N, weighted by play count
 * (`weighted_random`) or by its square (`strongly_weighted_random`).
 * The random source is the only non-deterministic input.
 */
export class SongSelector {
  private readonly random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  selectFrom(
    candidates: Candidate[],
    playCounts: Record<string, number>,
    mode: SelectionMode,
    topN = DEFAULT_TOP_N,
  ): RankedCandidate | null {
    const ranked = rankCandidates(candidates, playCounts);
    const first = ranked[0];
    if (!first) return null;
    if (mode === 'most_played') return first;

    const top = ranked.slice(0, Math.max(1, topN));
    if (top.length === 1) return first;

    const weights = top.map((r) => selectionWeight(r.playCount, mode));
    return top[weightedIndex(weights, this.random)] ?? first;
  }

  // Uniform pick, used for the library fallback where there are no play counts
  pickUniform<T>(items: T[]): T | null {
    if (items.length === 0) return null;
    const idx = Math.min(items.length - 1, Math.floor(this.random() * items.length));
    return items[idx] ?? null;
  }
}
