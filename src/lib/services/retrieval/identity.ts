import type { RetrievedItem } from '@/lib/core/types';

/**
 * Identity key used by dedup and fusion.
 *
 * Excerpts: `sourceId:page:startSec` (missing parts left empty) when the
 * source id and at least one location field are present.
 * Summaries: the source id.
 * Anything else falls back to the index object id.
 *
 * @example identityKey(excerpt with sourceId "doc1", page 3) => "excerpt:doc1:3:"
 */
export function identityKey(item: RetrievedItem): string {
  if (!item.sourceId) return `id:${item.id}`;

  if (item.kind === 'summary') return `summary:${item.sourceId}`;

  const { page, startSec } = item.location;
  if (page === undefined && startSec === undefined) return `id:${item.id}`;

  return `excerpt:${item.sourceId}:${page ?? ''}:${startSec ?? ''}`;
}
