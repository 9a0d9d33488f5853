// FOLLOW-UP QUESTIONS
//
// Asks the utility model for questions the user might ask next.
// Failure → [] (logged). Never throws.

import type { ModelContext } from '../usage-tracker';
import { toErrorMessage } from '@/lib/utils/errors';
import { normalizeForMatch, stripListMarker } from '@/lib/utils/normalize';
import { truncateText } from '@/lib/utils/format';

const ANSWER_PREVIEW_CHARS = 2000;

export function buildFollowUpPrompt(query: string, answer: string, count: number): string {
  return `Based on this Q&A exchange, generate ${count} relevant follow-up questions:

Question: ${query}
Answer: ${truncateText(answer, ANSWER_PREVIEW_CHARS)}

Generate ${count} natural follow-up questions that would help the user explore this topic further.
Return only the questions, one per line.`;
}

/** Non-empty, de-duplicated lines with list markup stripped, at most `count`. */
export function parseFollowUps(reply: string, query: string, count: number): string[] {
  const seen = new Set([normalizeForMatch(query)]);
  const questions: string[] = [];

  for (const line of reply.split('\n')) {
    const text = stripListMarker(line);
    const key = normalizeForMatch(text);
    if (!text || seen.has(key)) continue;
    seen.add(key);
    questions.push(text);
    if (questions.length === count) break;
  }

  return questions;
}

export async function generateFollowUpQuestions(
  query: string,
  answer: string,
  ctx: ModelContext,
  count: number = 3
): Promise<string[]> {
  if (count <= 0) return [];

  try {
    const { result } = await ctx.usage.generate(ctx.llm, buildFollowUpPrompt(query, answer, count), {
      operation: 'follow_up_questions',
      options: { model: ctx.model, temperature: 0.5, maxTokens: 300 },
    });
    return parseFollowUps(result.content, query, count);
  } catch (error) {
    console.warn(`[FollowUp] Follow-up generation failed: ${toErrorMessage(error)}`);
    return [];
  }
}
