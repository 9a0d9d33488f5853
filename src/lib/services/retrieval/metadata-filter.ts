// METADATA FILTERS
//
// Filters built from query hints (or passed by the caller) restrict both
// tiers. The same filter renders as a readable expression for logs and is
// translated for the index by weaviate-client.ts.

import type { FilterClause, MetadataFilter, QueryCharacteristics } from '@/lib/core/types';

/**
 * Turn filter hints into a filter. Returns undefined when there are no hints.
 */
export function buildMetadataFilter(
  characteristics: QueryCharacteristics,
  logic: MetadataFilter['logic'] = 'OR'
): MetadataFilter | undefined {
  const clauses: FilterClause[] = [];
  const { organization, topic } = characteristics.filterHints;

  if (organization) clauses.push({ field: 'organization', op: 'equals', value: organization });
  if (topic) clauses.push({ field: 'tags', op: 'any', value: topic });

  return clauses.length > 0 ? { logic, clauses } : undefined;
}

function renderClause(clause: FilterClause): string {
  const value = JSON.stringify(clause.value);
  return clause.op === 'any' ? `${clause.field}: ANY(${value})` : `${clause.field}: ${value}`;
}

/**
 * Clauses grouped by field, in first-seen field order.
 */
export function groupClausesByField(filter: MetadataFilter): FilterClause[][] {
  const groups = new Map<string, FilterClause[]>();
  for (const clause of filter.clauses) {
    const group = groups.get(clause.field) ?? [];
    group.push(clause);
    groups.set(clause.field, group);
  }
  return Array.from(groups.values());
}

/**
 * Human-readable filter expression for logs.
 *
 * @example 'organization: "FATF" OR tags: ANY("sanctions")'
 */
export function renderFilterExpression(filter: MetadataFilter): string {
  if (filter.logic === 'OR') {
    return filter.clauses.map(renderClause).join(' OR ');
  }

  return groupClausesByField(filter)
    .map((group) => {
      const inner = group.map(renderClause).join(' OR ');
      return group.length > 1 && filter.clauses.length > group.length ? `(${inner})` : inner;
    })
    .join(' AND ');
}
