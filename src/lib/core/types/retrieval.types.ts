// RETRIEVAL TYPES
//
// Items flow through the pipeline as one tagged union:
// 1. SearchTier returns ExcerptItem[] or SummaryItem[] (one RankedList per variant)
// 2. Fusion and dedup keep payloads as-is, only order and membership change
// 3. Budgeting slices prefixes off the final per-tier lists

/** Where inside a source an excerpt comes from. Documents carry pages, media carries seconds. */
export interface LocationAnchor {
  page?: number;
  startSec?: number;
  endSec?: number;
}

interface RetrievedItemBase {
  /** Index object id, used as identity when nothing better exists */
  id: string;
  sourceId?: string;
  title?: string;
  filename?: string;
  /** Tier-native relevance score; fusion does not overwrite it */
  score?: number;
  metadata: Record<string, unknown>;
}

export interface ExcerptItem extends RetrievedItemBase {
  kind: 'excerpt';
  content: string;
  location: LocationAnchor;
}

export interface SummaryItem extends RetrievedItemBase {
  kind: 'summary';
  summaryText: string;
  author?: string;
  organization?: string;
  date?: string;
  tags: string[];
}

export type RetrievedItem = ExcerptItem | SummaryItem;

export type RetrievedKind = RetrievedItem['kind'];

/** Ordered result of one variant against one tier. Index 0 is rank 1. */
export type RankedList<T extends RetrievedItem = RetrievedItem> = readonly T[];

/** Per-tier result counts requested from the search tiers */
export interface ResultLimits {
  excerpts: number;
  summaries: number;
}

export interface EmbeddingResult {
  embedding: number[];
  tokenCount?: number;
}

export interface EmbeddingOptions {
  model?: string;
}

// ============================================
// METADATA FILTERS
// ============================================

export type FilterField = 'organization' | 'tags' | 'sourceId' | 'author';

export interface FilterClause {
  field: FilterField;
  /** `equals` for scalar fields, `any` for list fields such as tags */
  op: 'equals' | 'any';
  value: string;
}

/**
 * Clauses combined by `logic`. With AND, clauses on the same field are OR-ed
 * first and the field groups are AND-ed.
 */
export interface MetadataFilter {
  logic: 'AND' | 'OR';
  clauses: FilterClause[];
}

// ============================================
// QUERY ANALYSIS
// ============================================

export type QueryType = 'factual' | 'comparative' | 'procedural' | 'analytical' | 'exploratory';
export type QueryComplexity = 'simple' | 'moderate' | 'complex';
export type QueryScope = 'narrow' | 'medium' | 'broad';

export interface FilterHints {
  organization?: string;
  topic?: string;
}

export interface QueryCharacteristics {
  queryType: QueryType;
  complexity: QueryComplexity;
  scope: QueryScope;
  wordCount: number;
  filterHints: FilterHints;
}

export interface SearchStrategy {
  useQueryExpansion: boolean;
  useReranking: boolean;
  useDeduplication: boolean;
  searchSummaries: boolean;
  searchExcerpts: boolean;
  reason: string;
}
