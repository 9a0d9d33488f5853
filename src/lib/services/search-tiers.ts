// SEARCH TIERS
//
// Weaviate-backed implementations of the two tiers. Each search embeds the
// variant, runs a hybrid query against its collection and maps the raw
// objects onto ExcerptItem / SummaryItem.

import type { Embedder, SearchTier } from '@/lib/core/interfaces';
import type { ExcerptItem, MetadataFilter, SummaryItem } from '@/lib/core/types';
import { configService } from './config';
import { toWeaviateWhere, weaviateClient } from './weaviate-client';
import type { HybridSearchParams, WeaviateHit } from './weaviate-client';

const EXCERPT_FIELDS = 'content sourceId title filename pageNumber startSec endSec sourceUri organization tags';
const SUMMARY_FIELDS = 'summaryText sourceId title filename author organization date tags sourceUri';

// BM25 on the body text, title boosted lower than the body
const EXCERPT_BM25 = ['content^2', 'title'];
const SUMMARY_BM25 = ['summaryText^2', 'title'];

type HybridSearch = (params: HybridSearchParams) => Promise<WeaviateHit[]>;

function str(props: Record<string, unknown>, key: string): string | undefined {
  const value = props[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function num(props: Record<string, unknown>, key: string): number | undefined {
  const value = props[key];
  if (value === null || value === undefined || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function strList(props: Record<string, unknown>, key: string): string[] {
  const value = props[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Properties not promoted to item fields stay available as metadata */
function metadataOf(props: Record<string, unknown>, promoted: readonly string[]): Record<string, unknown> {
  return Object.fromEntries(Object.entries(props).filter(([key]) => !promoted.includes(key)));
}

export function toExcerptItem(hit: WeaviateHit): ExcerptItem {
  const p = hit.properties;
  return {
    kind: 'excerpt',
    id: hit.id,
    sourceId: str(p, 'sourceId'),
    title: str(p, 'title'),
    filename: str(p, 'filename'),
    score: hit.score,
    metadata: metadataOf(p, ['content', 'sourceId', 'title', 'filename', 'pageNumber', 'startSec', 'endSec']),
    content: str(p, 'content') ?? '',
    location: {
      page: num(p, 'pageNumber'),
      startSec: num(p, 'startSec'),
      endSec: num(p, 'endSec'),
    },
  };
}

export function toSummaryItem(hit: WeaviateHit): SummaryItem {
  const p = hit.properties;
  return {
    kind: 'summary',
    id: hit.id,
    sourceId: str(p, 'sourceId'),
    title: str(p, 'title'),
    filename: str(p, 'filename'),
    score: hit.score,
    metadata: metadataOf(p, ['summaryText', 'sourceId', 'title', 'filename', 'author', 'organization', 'date', 'tags']),
    summaryText: str(p, 'summaryText') ?? '',
    author: str(p, 'author'),
    organization: str(p, 'organization'),
    date: str(p, 'date'),
    tags: strList(p, 'tags'),
  };
}

abstract class WeaviateTier<T extends ExcerptItem | SummaryItem> implements SearchTier<T> {
  abstract readonly kind: T['kind'];

  protected constructor(
    private readonly embedder: Embedder,
    private readonly className: string,
    private readonly fields: string,
    private readonly bm25: string[],
    private readonly runSearch: HybridSearch
  ) {}

  protected abstract toItem(hit: WeaviateHit): T;

  async search(query: string, limit: number, filter?: MetadataFilter): Promise<T[]> {
    if (limit <= 0) return [];

    const { embedding } = await this.embedder.embed(query);
    const hits = await this.runSearch({
      className: this.className,
      query,
      vector: embedding,
      limit,
      fields: this.fields,
      properties: this.bm25,
      where: filter ? toWeaviateWhere(filter) : undefined,
    });
    return hits.map((hit) => this.toItem(hit));
  }
}

export class WeaviateExcerptTier extends WeaviateTier<ExcerptItem> {
  readonly kind = 'excerpt';

  constructor(
    embedder: Embedder,
    className: string = configService.getWeaviateConfig().excerptCollection,
    search: HybridSearch = weaviateClient.searchHybrid
  ) {
    super(embedder, className, EXCERPT_FIELDS, EXCERPT_BM25, search);
  }

  protected toItem(hit: WeaviateHit): ExcerptItem {
    return toExcerptItem(hit);
  }
}

export class WeaviateSummaryTier extends WeaviateTier<SummaryItem> {
  readonly kind = 'summary';

  constructor(
    embedder: Embedder,
    className: string = configService.getWeaviateConfig().summaryCollection,
    search: HybridSearch = weaviateClient.searchHybrid
  ) {
    super(embedder, className, SUMMARY_FIELDS, SUMMARY_BM25, search);
  }

  protected toItem(hit: WeaviateHit): SummaryItem {
    return toSummaryItem(hit);
  }
}
