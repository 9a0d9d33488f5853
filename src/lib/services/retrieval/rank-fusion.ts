// RECIPROCAL RANK FUSION
//
// Each ranked list contributes 1/(rank + k) to every item it contains,
// rank being 1-based. Scores add up across lists by identity key.
// k defaults to 60.

import type { RankedList, RetrievedItem } from '@/lib/core/types';
import { identityKey } from './identity';

export const DEFAULT_RRF_K = 60;

export interface FusedItem<T extends RetrievedItem> {
  key: string;
  item: T;
  score: number;
}

/**
 * Fuse ranked lists into one list ordered by descending RRF score.
 * The first payload seen for a key is kept. Ties keep first-seen order.
 */
export function fuseWithScores<T extends RetrievedItem>(
  lists: readonly RankedList<T>[],
  k: number = DEFAULT_RRF_K
): FusedItem<T>[] {
  const fused = new Map<string, FusedItem<T>>();

  for (const list of lists) {
    list.forEach((item, index) => {
      const key = identityKey(item);
      const contribution = 1 / (index + 1 + k);
      const existing = fused.get(key);
      if (existing) {
        existing.score += contribution;
      } else {
        fused.set(key, { key, item, score: contribution });
      }
    });
  }

  // Array.prototype.sort is stable, so Map insertion order breaks ties
  return Array.from(fused.values()).sort((a, b) => b.score - a.score);
}

export function reciprocalRankFusion<T extends RetrievedItem>(
  lists: readonly RankedList<T>[],
  k: number = DEFAULT_RRF_K
): T[] {
  return fuseWithScores(lists, k).map((f) => f.item);
}
