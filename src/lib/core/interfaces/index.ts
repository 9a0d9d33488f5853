export type { Embedder } from './embedder.interface';
export type { GenerateOptions, GenerateResult, LLMProvider } from './llm-provider.interface';
export type { SearchTier } from './search-tier.interface';
export type { ManifestLookup } from './manifest.interface';
export type { UsageSink } from './usage-sink.interface';
export type { ConversationHistoryProvider } from './history.interface';
