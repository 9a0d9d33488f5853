import type { RetrievedItem } from '@/lib/core/types';
import { identityKey } from './identity';

/**
 * Keep the first item per identity key, in input order.
 * Idempotent: deduplicating an already deduplicated list returns the same items.
 */
export function deduplicateItems<T extends RetrievedItem>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];

  for (const item of items) {
    const key = identityKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }

  return out;
}
