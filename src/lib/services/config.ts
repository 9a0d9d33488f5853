/**
 * Centralized configuration service.
 * Eliminates scattered process.env calls and validates required variables.
 */

import dotenv from 'dotenv';
import { ConfigurationError } from '@/lib/utils/errors';

dotenv.config();

/**
 * Extract database name from MongoDB URI.
 * Works with both local and cloud URIs, replica sets, and multi-host formats.
 */
export function getDbNameFromUri(uri: string): string | null {
  const m = uri.match(/^mongodb(\+srv)?:\/\/[^/]+\/([^?\s]+)(\?.*)?$/i);
  if (!m) return null;

  const rawPath = m[2].replace(/\/+$/, '');
  const firstSeg = rawPath.split('/')[0];
  try {
    return decodeURIComponent(firstSeg || '') || null;
  } catch {
    // Malformed percent-encoding: treat the segment as absent
    return null;
  }
}

function parseList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

export type FilterLogic = 'AND' | 'OR';

export interface AppConfig {
  weaviate: {
    host: string;
    apiKey: string;
    port: number;
    scheme: 'http' | 'https';
    isCloud: boolean;
    excerptCollection: string;
    summaryCollection: string;
    alpha: number;
  };
  embedding: {
    apiUrl: string;
    apiKey: string;
    model: string;
  };
  llm: {
    apiUrl: string;
    apiKey: string;
    model: string;
    /** Cheaper model for expansion, reranking and follow-ups */
    utilityModel: string;
    /** Primary first, then fallbacks. Frozen, never mutated after load. */
    candidateModels: readonly string[];
  };
  mongodb: {
    uri: string;
    dbName: string;
    manifestCollection: string;
    usageCollection: string;
    messagesCollection: string;
  };
  retrieval: {
    enableQueryExpansion: boolean;
    enableReranking: boolean;
    enableDeduplication: boolean;
    enableAdaptiveLimits: boolean;
    /** Cap after reranking; each tier's own limit when unset */
    rerankTopK?: number;
    rrfK: number;
    filterLogic: FilterLogic;
  };
  synthesis: {
    maxContextTokens: number;
    overheadTokens: number;
    summaryShare: number;
    minSummaryTokens: number;
    minExcerptTokens: number;
    rerankPreviewChars: number;
    historyTurns: number;
    maxCitationLength: number;
    followUpCount: number;
  };
  storage: {
    sourceBucket: string;
    sourcePrefix: string;
  };
}

class ConfigService {
  private static instance: ConfigService;
  private config: AppConfig | null = null;

  private constructor() {}

  static getInstance(): ConfigService {
    if (!ConfigService.instance) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  getConfig(): AppConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  /** Drop the cached config so the next read sees the current environment. */
  reset(): void {
    this.config = null;
  }

  private loadConfig(): AppConfig {
    const env = process.env;
    const llmKey = env.LLM_API_KEY || '';
    const primary = env.LLM_MODEL || 'primary-large';
    const fallbacks = parseList(env.LLM_FALLBACK_MODELS || 'fallback-medium,fallback-small');
    const candidates = Array.from(new Set([primary, ...fallbacks]));

    return {
      weaviate: {
        host: env.WEAVIATE_HOST || 'localhost',
        apiKey: env.WEAVIATE_API_KEY || '',
        port: parseNumber(env.WEAVIATE_PORT, 8080),
        scheme: env.WEAVIATE_SCHEME === 'https' ? 'https' : 'http',
        isCloud: parseFlag(env.WEAVIATE_CLOUD, false),
        excerptCollection: env.WEAVIATE_EXCERPT_COLLECTION || 'DocumentChunks',
        summaryCollection: env.WEAVIATE_SUMMARY_COLLECTION || 'DocumentSummaries',
        alpha: parseNumber(env.WEAVIATE_ALPHA, 0.5),
      },
      embedding: {
        apiUrl: env.EMBEDDING_API_URL || 'http://localhost:8000/api/embed',
        apiKey: env.EMBEDDING_API_KEY || llmKey,
        model: env.EMBEDDING_MODEL || 'embed-default',
      },
      llm: {
        apiUrl: env.LLM_API_URL || 'http://localhost:8000',
        apiKey: llmKey,
        model: primary,
        utilityModel: env.LLM_UTILITY_MODEL || candidates[candidates.length - 1],
        candidateModels: Object.freeze(candidates),
      },
      mongodb: {
        uri: env.MONGODB_URI || 'mongodb://localhost:27017',
        dbName: env.MONGODB_DB_NAME || getDbNameFromUri(env.MONGODB_URI || '') || 'cited_answers',
        manifestCollection: env.MONGODB_MANIFEST_COLLECTION || 'sources',
        usageCollection: env.MONGODB_USAGE_COLLECTION || 'llm_calls',
        messagesCollection: env.MONGODB_MESSAGES_COLLECTION || 'messages',
      },
      // ============================================
      // RETRIEVAL PIPELINE CONFIG
      // ============================================
      retrieval: {
        enableQueryExpansion: parseFlag(env.ENABLE_QUERY_EXPANSION, true),
        enableReranking: parseFlag(env.ENABLE_RERANKING, true),
        enableDeduplication: parseFlag(env.ENABLE_DEDUPLICATION, true),
        enableAdaptiveLimits: parseFlag(env.ENABLE_ADAPTIVE_LIMITS, true),
        rerankTopK: env.RERANK_TOP_K ? parseNumber(env.RERANK_TOP_K, 10) : undefined,
        rrfK: parseNumber(env.RRF_K, 60),
        filterLogic: env.FILTER_LOGIC === 'AND' ? 'AND' : 'OR',
      },
      // ============================================
      // SYNTHESIS CONFIG
      // Token estimate is chars/4; 2000 reserved for instructions
      // ============================================
      synthesis: {
        maxContextTokens: parseNumber(env.MAX_CONTEXT_TOKENS, 24000),
        overheadTokens: 2000,
        summaryShare: 0.2,
        minSummaryTokens: 100,
        minExcerptTokens: 200,
        rerankPreviewChars: 300,
        historyTurns: parseNumber(env.HISTORY_TURNS, 6),
        maxCitationLength: 200,
        followUpCount: 3,
      },
      storage: {
        sourceBucket: env.SOURCE_BUCKET || '',
        sourcePrefix: env.SOURCE_PREFIX || '',
      },
    };
  }

  /**
   * Throw if the values a live pipeline needs are missing.
   * Unit tests never call this; only the factory wiring real adapters does.
   */
  requireConfig(): AppConfig {
    const config = this.getConfig();
    const missing: string[] = [];
    if (!config.llm.apiKey) missing.push('LLM_API_KEY');
    if (!config.llm.apiUrl) missing.push('LLM_API_URL');
    if (config.llm.candidateModels.length === 0) missing.push('LLM_MODEL');
    if (!config.mongodb.uri) missing.push('MONGODB_URI');
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
    }
    return config;
  }

  /**
   * Get a specific config section
   */
  getWeaviateConfig() {
    return this.getConfig().weaviate;
  }

  getEmbeddingConfig() {
    return this.getConfig().embedding;
  }

  getLLMConfig() {
    return this.getConfig().llm;
  }

  getMongoDBConfig() {
    return this.getConfig().mongodb;
  }

  getRetrievalConfig() {
    return this.getConfig().retrieval;
  }

  getSynthesisConfig() {
    return this.getConfig().synthesis;
  }

  getStorageConfig() {
    return this.getConfig().storage;
  }
}

// Export singleton instance
export const configService = ConfigService.getInstance();

// Also export the class for testing purposes
export { ConfigService };
