import axios from 'axios';
import type { Embedder } from '@/lib/core/interfaces';
import type { EmbeddingResult, EmbeddingOptions } from '@/lib/core/types';
import { ExternalServiceError } from '@/lib/utils/errors';
import { configService } from '../config';

// Longest text the embedding endpoint accepts
const MAX_EMBED_CHARS = 8000;

export interface QueryEmbedderConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
}

function readEmbedding(data: unknown): number[] | null {
  if (typeof data !== 'object' || data === null || !('embeddings' in data)) return null;
  const { embeddings } = data;
  if (!Array.isArray(embeddings)) return null;

  // Some deployments wrap a single vector in an outer array
  const vector: unknown = Array.isArray(embeddings[0]) ? embeddings[0] : embeddings;
  if (!Array.isArray(vector) || !vector.every((v): v is number => typeof v === 'number')) return null;
  return vector;
}

/**
 * Embeds query variants for the vector half of hybrid search.
 */
export class QueryEmbedder implements Embedder {
  constructor(private readonly config: QueryEmbedderConfig = configService.getEmbeddingConfig()) {}

  async embed(text: string, options?: EmbeddingOptions): Promise<EmbeddingResult> {
    let processedText = text;
    if (text.length > MAX_EMBED_CHARS) {
      console.warn(`[Embedder] Text too long (${text.length} chars), truncating to ${MAX_EMBED_CHARS}`);
      processedText = text.slice(0, MAX_EMBED_CHARS);
    }

    try {
      const response = await axios.post(
        this.config.apiUrl,
        {
          model: options?.model || this.config.model,
          prompt: processedText,
        },
        {
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          timeout: 30000,
        }
      );

      const embedding = readEmbedding(response.data);
      if (!embedding) {
        throw new ExternalServiceError('embedding', 'Invalid embedding response format');
      }
      return { embedding };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        console.error(`[Embedder] API Error:`, {
          status: error.response?.status,
          statusText: error.response?.statusText,
          sentLength: processedText.length,
        });
        throw new ExternalServiceError('embedding', error.message, error.response?.status);
      }
      throw error;
    }
  }

  getName(): string {
    return 'QueryEmbedder';
  }
}
