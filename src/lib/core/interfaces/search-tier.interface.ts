import type { MetadataFilter, RetrievedItem } from '../types';

/**
 * One of the two parallel indexes: excerpts (passages with location anchors)
 * or summaries (one per source document).
 */
export interface SearchTier<T extends RetrievedItem> {
  readonly kind: T['kind'];
  search(query: string, limit: number, filter?: MetadataFilter): Promise<T[]>;
}
