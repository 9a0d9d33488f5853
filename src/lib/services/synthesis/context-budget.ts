// CONTEXT BUDGET
//
// Fits the ranked summaries and excerpts into the model's context window.
// Tokens are estimated as chars/4. A fixed overhead is reserved for the
// instructions; the rest is split between summaries (20%) and excerpts (80%).
//
// RULE: Items are taken in rank order. The first item that does not fit is
// cut down to the space left (only if enough is left to be useful) and
// everything after it is dropped. Output lists are prefixes of the input.

import type { ExcerptItem, SummaryItem } from '@/lib/core/types';
import { estimateTokens } from '@/lib/utils/format';
import { debug } from '@/lib/utils/debug';

export interface ContextBudgetOptions {
  maxContextTokens: number;
  overheadTokens: number;
  /** Fraction of the available tokens given to summaries */
  summaryShare: number;
  /** A cut summary must keep more than this many tokens */
  minSummaryTokens: number;
  minExcerptTokens: number;
}

export const DEFAULT_BUDGET: ContextBudgetOptions = {
  maxContextTokens: 24000,
  overheadTokens: 2000,
  summaryShare: 0.2,
  minSummaryTokens: 100,
  minExcerptTokens: 200,
};

export interface BudgetedContext {
  summaries: SummaryItem[];
  excerpts: ExcerptItem[];
  summaryTokens: number;
  excerptTokens: number;
  availableTokens: number;
  /** True when at least one item was cut or dropped */
  truncated: boolean;
}

interface FitResult<T> {
  items: T[];
  used: number;
  truncated: boolean;
}

function fitToBudget<T>(
  items: readonly T[],
  budget: number,
  minUseful: number,
  textOf: (item: T) => string,
  withText: (item: T, text: string) => T
): FitResult<T> {
  const kept: T[] = [];
  let used = 0;

  for (const item of items) {
    const text = textOf(item);
    const tokens = estimateTokens(text);

    if (used + tokens <= budget) {
      kept.push(item);
      used += tokens;
      continue;
    }

    const remaining = budget - used;
    if (remaining > minUseful) {
      kept.push(withText(item, `${text.substring(0, remaining * 4)}...`));
      used += remaining;
    }
    return { items: kept, used, truncated: true };
  }

  return { items: kept, used, truncated: false };
}

export function budgetContext(
  summaries: readonly SummaryItem[],
  excerpts: readonly ExcerptItem[],
  options: ContextBudgetOptions = DEFAULT_BUDGET
): BudgetedContext {
  const availableTokens = Math.max(0, options.maxContextTokens - options.overheadTokens);
  const summaryBudget = Math.floor(availableTokens * options.summaryShare);
  const excerptBudget = Math.floor(availableTokens * (1 - options.summaryShare));

  const s = fitToBudget(
    summaries,
    summaryBudget,
    options.minSummaryTokens,
    (item) => item.summaryText,
    (item, summaryText) => ({ ...item, summaryText })
  );
  const e = fitToBudget(
    excerpts,
    excerptBudget,
    options.minExcerptTokens,
    (item) => item.content,
    (item, content) => ({ ...item, content })
  );

  debug.context.log(
    `${s.items.length}/${summaries.length} summaries, ${e.items.length}/${excerpts.length} excerpts, ` +
      `~${s.used + e.used}/${availableTokens} tokens`
  );

  return {
    summaries: s.items,
    excerpts: e.items,
    summaryTokens: s.used,
    excerptTokens: e.used,
    availableTokens,
    truncated: s.truncated || e.truncated,
  };
}
