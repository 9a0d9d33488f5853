// TWO-TIER RETRIEVER
//
// Every variant is searched against both tiers at once; fusion waits for all
// of them. A failing call is logged and contributes an empty list, so one
// broken tier never takes the other down with it.

import type { SearchTier } from '@/lib/core/interfaces';
import type { ExcerptItem, MetadataFilter, RankedList, ResultLimits, SummaryItem } from '@/lib/core/types';
import type { RAGLogger } from '../rag-logger';
import { toErrorMessage } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';

export interface SearchTiers {
  excerpts: SearchTier<ExcerptItem>;
  summaries: SearchTier<SummaryItem>;
}

export interface TwoTierOptions {
  limits: ResultLimits;
  filter?: MetadataFilter;
  searchExcerpts?: boolean;
  searchSummaries?: boolean;
}

export interface TwoTierResult {
  /** One list per variant, in variant order; empty when the tier is disabled */
  excerptLists: RankedList<ExcerptItem>[];
  summaryLists: RankedList<SummaryItem>[];
  failedCalls: number;
}

export async function retrieveTwoTier(
  variants: readonly string[],
  tiers: SearchTiers,
  options: TwoTierOptions,
  log?: RAGLogger
): Promise<TwoTierResult> {
  let failedCalls = 0;

  const safeSearch = async <T extends ExcerptItem | SummaryItem>(
    tier: SearchTier<T>,
    variant: string,
    limit: number
  ): Promise<T[]> => {
    try {
      const hits = await tier.search(variant, limit, options.filter);
      debug.search.log(`${tier.kind} "${variant.substring(0, 40)}" → ${hits.length}`);
      return hits;
    } catch (error) {
      failedCalls += 1;
      const message = toErrorMessage(error);
      if (log) {
        log.warn('RETRIEVE', { tier: tier.kind, decision: 'empty list', error: message });
      } else {
        console.warn(`[Retrieve] ${tier.kind} search failed for "${variant}": ${message}`);
      }
      return [];
    }
  };

  const searchExcerpts = options.searchExcerpts ?? true;
  const searchSummaries = options.searchSummaries ?? true;

  const [excerptLists, summaryLists] = await Promise.all([
    Promise.all(
      searchExcerpts ? variants.map((v) => safeSearch(tiers.excerpts, v, options.limits.excerpts)) : []
    ),
    Promise.all(
      searchSummaries ? variants.map((v) => safeSearch(tiers.summaries, v, options.limits.summaries)) : []
    ),
  ]);

  return { excerptLists, summaryLists, failedCalls };
}
