import type { ExcerptItem, SummaryItem } from '@/lib/core/types';

export function excerpt(
  id: string,
  overrides: Partial<Omit<ExcerptItem, 'kind' | 'id'>> = {}
): ExcerptItem {
  return {
    kind: 'excerpt',
    id,
    sourceId: overrides.sourceId,
    title: overrides.title,
    filename: overrides.filename,
    score: overrides.score,
    metadata: overrides.metadata ?? {},
    content: overrides.content ?? `Content of ${id}`,
    location: overrides.location ?? {},
  };
}

export function summary(
  id: string,
  overrides: Partial<Omit<SummaryItem, 'kind' | 'id'>> = {}
): SummaryItem {
  return {
    kind: 'summary',
    id,
    sourceId: overrides.sourceId,
    title: overrides.title,
    filename: overrides.filename,
    score: overrides.score,
    metadata: overrides.metadata ?? {},
    summaryText: overrides.summaryText ?? `Summary of ${id}`,
    author: overrides.author,
    organization: overrides.organization,
    date: overrides.date,
    tags: overrides.tags ?? [],
  };
}
