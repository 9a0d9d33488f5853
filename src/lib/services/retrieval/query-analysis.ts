// QUERY ANALYSIS
//
// WHY: A one-word definition lookup and a multi-part comparison need different
//      result counts and different amounts of query rewriting.
// HOW: Keyword rules classify type, complexity and scope; the classification
//      drives per-tier limits and which optional steps run.
//
// Also extracts organization/topic hints; metadata-filter.ts turns them into a filter.

import queryHints from '@/lib/config/query-hints.json';
import {
  BROAD_SCOPE_KEYWORDS,
  COMPLEXITY_KEYWORDS,
  MEDIUM_QUERY_WORDS,
  NARROW_SCOPE_KEYWORDS,
  QUERY_TYPE_RULES,
  SHORT_QUERY_WORDS,
} from '@/lib/config/patterns';
import type {
  FilterHints,
  QueryCharacteristics,
  QueryComplexity,
  QueryScope,
  QueryType,
  ResultLimits,
  SearchStrategy,
} from '@/lib/core/types';
import { containsAnyKeyword, countWords } from '@/lib/utils/normalize';

interface HintRule {
  keywords: string[];
  value: string;
}

const ORGANIZATION_HINTS: readonly HintRule[] = queryHints.organizations;
const TOPIC_HINTS: readonly HintRule[] = queryHints.topics;

const MAX_EXCERPTS = 20;
const MAX_SUMMARIES = 10;

/** Base limits per query type before complexity and scope adjustments */
const BASE_LIMITS: Record<QueryType, ResultLimits> = {
  factual: { excerpts: 5, summaries: 2 },
  procedural: { excerpts: 12, summaries: 3 },
  comparative: { excerpts: 8, summaries: 6 },
  analytical: { excerpts: 15, summaries: 7 },
  exploratory: { excerpts: 10, summaries: 5 },
};

function firstHint(query: string, rules: readonly HintRule[]): string | undefined {
  return rules.find((rule) => containsAnyKeyword(query, rule.keywords))?.value;
}

function detectQueryType(query: string): QueryType {
  return QUERY_TYPE_RULES.find((rule) => containsAnyKeyword(query, rule.keywords))?.type ?? 'factual';
}

function detectComplexity(query: string, wordCount: number): QueryComplexity {
  if (wordCount < SHORT_QUERY_WORDS) return 'simple';
  if (wordCount > MEDIUM_QUERY_WORDS || containsAnyKeyword(query, COMPLEXITY_KEYWORDS)) return 'complex';
  return 'moderate';
}

function detectScope(query: string): QueryScope {
  if (containsAnyKeyword(query, NARROW_SCOPE_KEYWORDS)) return 'narrow';
  if (containsAnyKeyword(query, BROAD_SCOPE_KEYWORDS)) return 'broad';
  return 'medium';
}

export function analyzeQuery(query: string): QueryCharacteristics {
  const wordCount = countWords(query);
  const filterHints: FilterHints = {};

  const organization = firstHint(query, ORGANIZATION_HINTS);
  if (organization) filterHints.organization = organization;
  const topic = firstHint(query, TOPIC_HINTS);
  if (topic) filterHints.topic = topic;

  return {
    queryType: detectQueryType(query),
    complexity: detectComplexity(query, wordCount),
    scope: detectScope(query),
    wordCount,
    filterHints,
  };
}

/**
 * Limits from word count alone.
 * < 5 words → 5 excerpts / 3 summaries, < 15 → 10/5, otherwise 15/7.
 */
export function wordCountLimits(query: string): ResultLimits {
  const words = countWords(query);
  if (words < SHORT_QUERY_WORDS) return { excerpts: 5, summaries: 3 };
  if (words < MEDIUM_QUERY_WORDS) return { excerpts: 10, summaries: 5 };
  return { excerpts: 15, summaries: 7 };
}

/**
 * Limits from the full query characteristics. Integer truncation after each
 * multiplier; simple and narrow never go below 3 excerpts / 2 summaries;
 * the result is capped at 20 / 10.
 */
export function adaptiveResultLimits(characteristics: QueryCharacteristics): ResultLimits {
  let { excerpts, summaries } = BASE_LIMITS[characteristics.queryType];

  if (characteristics.complexity === 'simple') {
    excerpts = Math.max(3, Math.trunc(excerpts * 0.6));
    summaries = Math.max(2, Math.trunc(summaries * 0.6));
  } else if (characteristics.complexity === 'complex') {
    excerpts = Math.trunc(excerpts * 1.5);
    summaries = Math.trunc(summaries * 1.4);
  }

  if (characteristics.scope === 'narrow') {
    excerpts = Math.max(3, Math.trunc(excerpts * 0.7));
    summaries = Math.max(2, Math.trunc(summaries * 0.7));
  } else if (characteristics.scope === 'broad') {
    excerpts = Math.trunc(excerpts * 1.3);
    summaries = Math.trunc(summaries * 1.3);
  }

  return {
    excerpts: Math.min(excerpts, MAX_EXCERPTS),
    summaries: Math.min(summaries, MAX_SUMMARIES),
  };
}

/**
 * Which optional steps to run. Expansion runs for complex or open-ended
 * questions and never for simple factual lookups.
 */
export function selectSearchStrategy(characteristics: QueryCharacteristics): SearchStrategy {
  const { queryType, complexity } = characteristics;
  const openEnded = queryType === 'analytical' || queryType === 'exploratory' || queryType === 'comparative';
  const useQueryExpansion = complexity === 'complex' || openEnded;

  const reasons = [`type=${queryType}`, `complexity=${complexity}`];
  if (!useQueryExpansion) reasons.push('no expansion');

  return {
    useQueryExpansion,
    useReranking: true,
    useDeduplication: true,
    searchSummaries: true,
    searchExcerpts: true,
    reason: reasons.join(', '),
  };
}
