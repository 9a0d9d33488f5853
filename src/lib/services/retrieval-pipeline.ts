// RETRIEVAL PIPELINE
//
// Steps for one question:
// 1. ANALYZE  → Query type/complexity/scope decide limits and optional steps
// 2. EXPAND   → Alternate phrasings (original always first)
// 3. RETRIEVE → Every variant against both tiers, concurrently
// 4. FUSE     → RRF across variants (skipped for a single variant)
// 5. DEDUP    → One item per identity key
// 6. RERANK   → Utility model orders each tier, capped
//
// Caller options win over the query analysis; config flags can switch
// optional steps off globally.

import type {
  ExcerptItem,
  MetadataFilter,
  QueryCharacteristics,
  RankedList,
  ResultLimits,
  RetrievedItem,
  SearchStrategy,
  SummaryItem,
} from '@/lib/core/types';
import { configService } from './config';
import type { FilterLogic } from './config';
import type { RAGLogger } from './rag-logger';
import type { ModelContext } from './usage-tracker';
import { analyzeQuery, adaptiveResultLimits, selectSearchStrategy, wordCountLimits } from './retrieval/query-analysis';
import { buildMetadataFilter, renderFilterExpression } from './retrieval/metadata-filter';
import { expandQuery } from './retrieval/query-expander';
import { retrieveTwoTier } from './retrieval/two-tier-retriever';
import type { SearchTiers } from './retrieval/two-tier-retriever';
import { DEFAULT_RRF_K, fuseWithScores } from './retrieval/rank-fusion';
import { deduplicateItems } from './retrieval/deduplicate';
import { DEFAULT_PREVIEW_CHARS, rerankByRelevance } from './retrieval/reranker';
import { debug } from '@/lib/utils/debug';

export interface RetrievalConfig {
  enableQueryExpansion: boolean;
  enableReranking: boolean;
  enableDeduplication: boolean;
  /** Query-analysis limits when on, word-count limits when off */
  enableAdaptiveLimits: boolean;
  /** Cap after reranking; 0 or unset means each tier's own limit */
  rerankTopK?: number;
  rrfK: number;
  rerankPreviewChars: number;
  filterLogic: FilterLogic;
}

export interface RetrieveOptions {
  /** Explicit limits; missing fields come from the heuristic */
  limits?: Partial<ResultLimits>;
  filter?: MetadataFilter;
  /** Build a filter from organization/topic hints in the query */
  useHintFilters?: boolean;
  expandQuery?: boolean;
  rerank?: boolean;
  deduplicate?: boolean;
  searchExcerpts?: boolean;
  searchSummaries?: boolean;
}

export interface RetrievalResult {
  variants: string[];
  characteristics: QueryCharacteristics;
  strategy: SearchStrategy;
  limits: ResultLimits;
  filter?: MetadataFilter;
  excerpts: ExcerptItem[];
  summaries: SummaryItem[];
  optimizationsApplied: string[];
  stats: {
    excerptsRetrieved: number;
    summariesRetrieved: number;
    failedCalls: number;
    rerankFellBack: boolean;
  };
}

function getDefaultRetrievalConfig(): RetrievalConfig {
  const retrieval = configService.getRetrievalConfig();
  return {
    enableQueryExpansion: retrieval.enableQueryExpansion,
    enableReranking: retrieval.enableReranking,
    enableDeduplication: retrieval.enableDeduplication,
    enableAdaptiveLimits: retrieval.enableAdaptiveLimits,
    rerankTopK: retrieval.rerankTopK,
    rrfK: retrieval.rrfK,
    rerankPreviewChars: configService.getSynthesisConfig().rerankPreviewChars,
    filterLogic: retrieval.filterLogic,
  };
}

const countItems = (lists: readonly RankedList<RetrievedItem>[]) => lists.reduce((n, l) => n + l.length, 0);

export class RetrievalPipeline {
  private config: RetrievalConfig;

  constructor(
    private readonly tiers: SearchTiers,
    config: Partial<RetrievalConfig> = {}
  ) {
    this.config = { ...getDefaultRetrievalConfig(), ...config };
  }

  /**
   * Run every retrieval step for one question. Degraded steps (expansion,
   * a tier call, reranking) are logged and never throw.
   */
  async execute(
    query: string,
    ctx: ModelContext,
    options: RetrieveOptions = {},
    log?: RAGLogger
  ): Promise<RetrievalResult> {
    const characteristics = analyzeQuery(query);
    const strategy = selectSearchStrategy(characteristics);
    log?.info('ANALYZE', {
      type: characteristics.queryType,
      complexity: characteristics.complexity,
      scope: characteristics.scope,
      decision: strategy.reason,
    });

    const useExpansion = options.expandQuery ?? (this.config.enableQueryExpansion && strategy.useQueryExpansion);
    const useRerank = options.rerank ?? (this.config.enableReranking && strategy.useReranking);
    const useDedup = options.deduplicate ?? (this.config.enableDeduplication && strategy.useDeduplication);
    const searchExcerpts = options.searchExcerpts ?? strategy.searchExcerpts;
    const searchSummaries = options.searchSummaries ?? strategy.searchSummaries;

    const heuristic = this.config.enableAdaptiveLimits
      ? adaptiveResultLimits(characteristics)
      : wordCountLimits(query);
    const limits: ResultLimits = { ...heuristic, ...options.limits };

    const filter =
      options.filter ??
      (options.useHintFilters ? buildMetadataFilter(characteristics, this.config.filterLogic) : undefined);
    if (filter) {
      log?.info('RETRIEVE', { filter: renderFilterExpression(filter) });
    }

    // Step 1: Variants
    const variants = useExpansion ? await expandQuery(query, ctx, log) : [query];
    log?.expand(variants);

    // Step 2: Both tiers, every variant
    const retrieved = await retrieveTwoTier(
      variants,
      this.tiers,
      { limits, filter, searchExcerpts, searchSummaries },
      log
    );
    const excerptsRetrieved = countItems(retrieved.excerptLists);
    const summariesRetrieved = countItems(retrieved.summaryLists);
    const calls = variants.length * (Number(searchExcerpts) + Number(searchSummaries));
    log?.retrieve(excerptsRetrieved, summariesRetrieved, calls);

    // Step 3: Fuse + dedup per tier
    let excerpts = this.combine('excerpts', retrieved.excerptLists, useDedup, log);
    let summaries = this.combine('summaries', retrieved.summaryLists, useDedup, log);
    log?.debugItems('FUSE', 'excerpts', excerpts);
    log?.debugItems('FUSE', 'summaries', summaries);

    // Step 4: Rerank, or just cap to the limits
    let rerankFellBack = false;
    if (useRerank) {
      const previewChars = this.config.rerankPreviewChars || DEFAULT_PREVIEW_CHARS;
      const [rankedExcerpts, rankedSummaries] = await Promise.all([
        rerankByRelevance(query, excerpts, ctx, { topK: this.config.rerankTopK || limits.excerpts, previewChars }),
        rerankByRelevance(query, summaries, ctx, { topK: this.config.rerankTopK || limits.summaries, previewChars }),
      ]);
      rerankFellBack = rankedExcerpts.fellBack || rankedSummaries.fellBack;
      log?.rerank(
        excerpts.length + summaries.length,
        rankedExcerpts.items.length + rankedSummaries.items.length,
        rerankFellBack
      );
      if (rerankFellBack) log?.warn('RERANK', { decision: 'pre-rerank order' });
      excerpts = rankedExcerpts.items;
      summaries = rankedSummaries.items;
    } else {
      excerpts = excerpts.slice(0, limits.excerpts);
      summaries = summaries.slice(0, limits.summaries);
    }

    const optimizationsApplied: string[] = [];
    if (useExpansion) optimizationsApplied.push('query_expansion');
    if (variants.length > 1) optimizationsApplied.push('rank_fusion');
    if (useDedup) optimizationsApplied.push('deduplication');
    if (useRerank) optimizationsApplied.push('reranking');
    if (this.config.enableAdaptiveLimits) optimizationsApplied.push('adaptive_limits');
    if (filter) optimizationsApplied.push('metadata_filter');

    return {
      variants,
      characteristics,
      strategy,
      limits,
      filter,
      excerpts,
      summaries,
      optimizationsApplied,
      stats: { excerptsRetrieved, summariesRetrieved, failedCalls: retrieved.failedCalls, rerankFellBack },
    };
  }

  /**
   * One list per variant in, one ordered list out. RRF runs only when
   * there is more than one variant list.
   */
  private combine<T extends RetrievedItem>(
    tier: string,
    lists: readonly RankedList<T>[],
    useDedup: boolean,
    log?: RAGLogger
  ): T[] {
    let items: T[];
    if (lists.length > 1) {
      const fused = fuseWithScores(lists, this.config.rrfK || DEFAULT_RRF_K);
      debug.fuse.log(tier, fused.slice(0, 5).map((f) => `${f.key}=${f.score.toFixed(4)}`));
      log?.info('FUSE', { tier, input: countItems(lists), output: fused.length });
      items = fused.map((f) => f.item);
    } else {
      items = lists[0] ? [...lists[0]] : [];
    }

    if (!useDedup) return items;
    const deduped = deduplicateItems(items);
    log?.dedup(tier, items.length, deduped.length);
    return deduped;
  }

  updateConfig(config: Partial<RetrievalConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): RetrievalConfig {
    return { ...this.config };
  }
}
