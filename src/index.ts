/**
 * Public surface: the service, its building blocks and their types.
 */

export { RagService, createRagService } from './lib/services/rag-service';
export type { AnswerRequest, RagServiceDeps } from './lib/services/rag-service';
export { RetrievalPipeline } from './lib/services/retrieval-pipeline';
export type { RetrievalConfig, RetrieveOptions, RetrievalResult } from './lib/services/retrieval-pipeline';
export { configService, ConfigService } from './lib/services/config';
export type { AppConfig } from './lib/services/config';
export { RAGLogger, SLOW_STAGE_MS } from './lib/services/rag-logger';
export { UsageTracker, UsageScope, InMemoryUsageSink, summarizeUsage } from './lib/services/usage-tracker';
export type { ModelContext } from './lib/services/usage-tracker';
export { ChatCompletionsProvider } from './lib/services/chat-completions';
export { QueryEmbedder } from './lib/services/embedders/query-embedder';
export { WeaviateExcerptTier, WeaviateSummaryTier } from './lib/services/search-tiers';

// Retrieval steps
export { analyzeQuery, adaptiveResultLimits, selectSearchStrategy, wordCountLimits } from './lib/services/retrieval/query-analysis';
export { buildMetadataFilter, renderFilterExpression } from './lib/services/retrieval/metadata-filter';
export { expandQuery } from './lib/services/retrieval/query-expander';
export { retrieveTwoTier } from './lib/services/retrieval/two-tier-retriever';
export type { SearchTiers } from './lib/services/retrieval/two-tier-retriever';
export { deduplicateItems } from './lib/services/retrieval/deduplicate';
export { identityKey } from './lib/services/retrieval/identity';
export { fuseWithScores, reciprocalRankFusion } from './lib/services/retrieval/rank-fusion';
export { rerankByRelevance } from './lib/services/retrieval/reranker';

// Synthesis steps
export { budgetContext } from './lib/services/synthesis/context-budget';
export { classifyFormat } from './lib/services/synthesis/format-classifier';
export { buildSynthesisPrompt } from './lib/services/synthesis/prompt-builder';
export { AnswerGenerator, advanceGeneration } from './lib/services/synthesis/answer-generator';
export { classifyModelError } from './lib/services/synthesis/error-classifier';
export { citationQualityScore, extractCitations, replacePlaceholderLabels, stripCitationsBlock } from './lib/services/synthesis/citations';
export { buildSourceRecords, filterCitedSources } from './lib/services/synthesis/source-attribution';
export { generateFollowUpQuestions } from './lib/services/synthesis/follow-up';

// Stores
export { MongoManifestLookup, ManifestCache } from './lib/mongodb/manifest-store';
export { MongoUsageSink } from './lib/mongodb/usage-sink';
export { MongoConversationHistory } from './lib/mongodb/conversation-history';

export { formatPageRange, formatTimestamp } from './lib/utils/format';
export * from './lib/utils/errors';
export { ModelErrorClass } from './lib/core/types';
export type * from './lib/core/types';
export type * from './lib/core/interfaces';
