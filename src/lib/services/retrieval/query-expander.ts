// QUERY EXPANDER
//
// WHY: A single phrasing misses passages that use the long form of an
//      abbreviation or a synonym.
// HOW: Ask the utility model for 2-3 alternates, one per line.
// RULE: The original query is always variant 0. Failure → [original].

import type { RAGLogger } from '../rag-logger';
import type { ModelContext } from '../usage-tracker';
import { toErrorMessage } from '@/lib/utils/errors';
import { normalizeForMatch, stripListMarker } from '@/lib/utils/normalize';
import { debug } from '@/lib/utils/debug';

const MAX_VARIANTS = 3;

export function buildExpansionPrompt(query: string): string {
  return `Given this user query about financial crime, money laundering, terrorism financing or related compliance topics,
generate 2-3 alternative phrasings that would help retrieve relevant information.
Focus on:
- Expanding abbreviations (AML, CTF, FATF, etc.)
- Adding synonyms
- Rephrasing with domain terminology

Original query: ${query}

Return ONLY the alternative queries, one per line, without numbering or explanation.`;
}

/**
 * Parse the model reply into variants. Markup is stripped, blank lines and
 * repeats of the original (case-insensitive) dropped, at most three kept.
 */
export function parseExpansion(query: string, reply: string): string[] {
  const seen = new Set([normalizeForMatch(query)]);
  const variants: string[] = [];

  for (const line of reply.split('\n')) {
    const text = stripListMarker(line);
    const key = normalizeForMatch(text);
    if (!text || seen.has(key)) continue;
    seen.add(key);
    variants.push(text);
    if (variants.length === MAX_VARIANTS) break;
  }

  return [query, ...variants];
}

/**
 * Original query followed by model-generated alternates. Never throws.
 */
export async function expandQuery(query: string, ctx: ModelContext, log?: RAGLogger): Promise<string[]> {
  try {
    const { result } = await ctx.usage.generate(ctx.llm, buildExpansionPrompt(query), {
      operation: 'query_expansion',
      options: { model: ctx.model, temperature: 0.3, maxTokens: 200 },
    });
    const variants = parseExpansion(query, result.content);
    debug.expand.log(`Generated ${variants.length - 1} variations`, variants);
    return variants;
  } catch (error) {
    log?.warn('EXPAND', { decision: 'original only', error: toErrorMessage(error) });
    if (!log) console.warn(`[Expand] Query expansion failed: ${toErrorMessage(error)}. Using original query only.`);
    return [query];
  }
}
