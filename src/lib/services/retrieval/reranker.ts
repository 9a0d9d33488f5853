// LLM RERANKER
//
// WHY: Hybrid search scores are not comparable across variants and tiers.
// HOW: Show the utility model a numbered preview of each item and ask for the
//      indices in relevance order.
// RULE: Every input item survives (unmentioned ones keep their relative order
//       at the end) before the cap applies. Failure → input order, capped.

import type { RetrievedItem } from '@/lib/core/types';
import type { ModelContext } from '../usage-tracker';
import { toErrorMessage } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';

export const DEFAULT_PREVIEW_CHARS = 300;

export interface RerankOutcome<T extends RetrievedItem> {
  items: T[];
  /** True when the model call failed and input order was kept */
  fellBack: boolean;
}

function previewText(item: RetrievedItem, maxChars: number): string {
  const text = item.kind === 'excerpt' ? item.content : item.summaryText;
  return text.substring(0, maxChars);
}

export function buildRerankPrompt(query: string, items: readonly RetrievedItem[], previewChars: number): string {
  const snippets = items.map((item, i) => `[${i}] ${previewText(item, previewChars)}`);

  return `Given this query: "${query}"

Rate the relevance of each document snippet from 0-10 (10 = most relevant).
Return ONLY the indices in order of relevance (most relevant first), comma-separated.

Snippets:
${snippets.join('\n')}

Order (indices only, comma-separated):`;
}

/**
 * Indices in the order the model gave them, in range and without repeats,
 * followed by every index it left out.
 *
 * @example parseRerankOrder("2, 0, 2, 9", 3) => [2, 0, 1]
 */
export function parseRerankOrder(reply: string, count: number): number[] {
  const order: number[] = [];
  for (const token of reply.match(/\d+/g) ?? []) {
    const idx = Number.parseInt(token, 10);
    if (idx >= 0 && idx < count && !order.includes(idx)) {
      order.push(idx);
    }
  }
  for (let i = 0; i < count; i++) {
    if (!order.includes(i)) order.push(i);
  }
  return order;
}

// A missing or non-positive topK means no cap
function cap<T>(items: T[], topK?: number): T[] {
  return topK !== undefined && topK > 0 ? items.slice(0, topK) : items;
}

export async function rerankByRelevance<T extends RetrievedItem>(
  query: string,
  items: readonly T[],
  ctx: ModelContext,
  options: { topK?: number; previewChars?: number } = {}
): Promise<RerankOutcome<T>> {
  if (items.length < 2) {
    return { items: cap([...items], options.topK), fellBack: false };
  }

  const prompt = buildRerankPrompt(query, items, options.previewChars ?? DEFAULT_PREVIEW_CHARS);

  try {
    const { result } = await ctx.usage.generate(ctx.llm, prompt, {
      operation: 'rerank',
      options: { model: ctx.model, temperature: 0.1, maxTokens: 100 },
    });
    const order = parseRerankOrder(result.content.trim(), items.length);
    debug.rerank.log('Order', order.join(','));
    return { items: cap(order.map((i) => items[i]), options.topK), fellBack: false };
  } catch (error) {
    console.warn(`[Rerank] Reranking failed: ${toErrorMessage(error)}. Keeping original order.`);
    return { items: cap([...items], options.topK), fellBack: true };
  }
}
