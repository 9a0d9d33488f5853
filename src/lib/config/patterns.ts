/**
 * Query Pattern Configuration
 *
 * Keyword lists for query analysis. Matching is whole-word and case-insensitive
 * (see keywordPattern in utils/normalize.ts).
 *
 * Organization and topic hints live in query-hints.json, format rules in
 * format-rules.json.
 */

import type { QueryType } from '@/lib/core/types';

// ============================================
// QUERY TYPE DETECTION
// ============================================

/**
 * Checked in order, first match wins. No match means "factual".
 */
export const QUERY_TYPE_RULES: ReadonlyArray<{ type: QueryType; keywords: readonly string[] }> = [
  { type: 'factual', keywords: ['what is', 'define', 'definition', 'meaning of'] },
  { type: 'comparative', keywords: ['compare', 'difference', 'differences', 'versus', 'vs', 'contrast'] },
  { type: 'procedural', keywords: ['how to', 'steps', 'process', 'procedure', 'protocol'] },
  { type: 'analytical', keywords: ['analyze', 'analyse', 'analysis', 'evaluate', 'assess', 'examine'] },
  { type: 'exploratory', keywords: ['overview', 'about', 'tell me about', 'explain', 'describe'] },
];

// ============================================
// COMPLEXITY & SCOPE
// ============================================

/** Any of these makes a query "complex" regardless of length */
export const COMPLEXITY_KEYWORDS = ['comprehensive', 'detailed', 'thorough', 'in-depth'];

export const NARROW_SCOPE_KEYWORDS = ['specific', 'particular', 'exact', 'precise'];

export const BROAD_SCOPE_KEYWORDS = ['all', 'every', 'comprehensive', 'complete', 'entire', 'global'];

/** Word-count thresholds shared by complexity and the word-count limit heuristic */
export const SHORT_QUERY_WORDS = 5;
export const MEDIUM_QUERY_WORDS = 15;
