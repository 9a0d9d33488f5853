import type { EmbeddingResult, EmbeddingOptions } from '../types';

export interface Embedder {
  /**
   * Generate embedding for a single text
   */
  embed(text: string, options?: EmbeddingOptions): Promise<EmbeddingResult>;

  /**
   * Embedder name
   */
  getName(): string;
}
