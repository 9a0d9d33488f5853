// ================================
// SYNTHESIS PROMPT
// ================================
//
// Sections, in order: domain context, prior conversation (optional), response
// format, citation requirements, the question, summaries, excerpts, output
// format. Deterministic: the same inputs always give the same prompt.

import domainContext from '@/lib/config/domain-context.json';
import type { ConversationTurn, ExcerptItem, FormatDecision, SummaryItem } from '@/lib/core/types';
import { formatTimestamp } from '@/lib/utils/format';
import { formatInstruction, minimumCitations } from './format-classifier';
import type { PlaceholderLabels } from './citations';

export const CITATIONS_MARKER = '---CITATIONS---';

const RULE = '='.repeat(80);

const ROLE_LABELS: Record<ConversationTurn['role'], string> = {
  user: 'User',
  assistant: 'Assistant',
  system: 'System',
};

export interface SynthesisPromptInput {
  query: string;
  summaries: readonly SummaryItem[];
  excerpts: readonly ExcerptItem[];
  format: FormatDecision;
  /** Oldest first */
  history?: readonly ConversationTurn[];
  /** Only the last N turns of history are included */
  historyTurns?: number;
  /**
   * Resolved titles from source attribution, so the headers match what
   * `Document N` / `Chunk N` are later rewritten to
   */
  labels?: PlaceholderLabels;
}

function domainBlock(): string[] {
  return [
    domainContext.assistantRole,
    domainContext.mission,
    '',
    'DOMAIN CONTEXT:',
    ...domainContext.glossary.map((g) => `- ${g.term} = ${g.expansion}`),
    '',
  ];
}

function historyBlock(history: readonly ConversationTurn[], turns: number): string[] {
  const recent = turns > 0 ? history.slice(-turns) : [];
  if (recent.length === 0) return [];

  return [
    'CONVERSATION HISTORY:',
    ...recent.map((turn) => `${ROLE_LABELS[turn.role]}: ${turn.content}`),
    '',
  ];
}

function formatBlock(format: FormatDecision): string[] {
  return ['RESPONSE FORMAT:', formatInstruction(format.formatType), `Prose style: ${format.proseStyle}`, ''];
}

function citationBlock(minCitations: number): string[] {
  return [
    'CITATION REQUIREMENTS:',
    '1. You MUST cite sources for ALL factual claims',
    '2. Use format: [Document Title, Page X] or [Document Title] for summaries',
    `3. Include AT LEAST ${minCitations} explicit citations throughout your answer`,
    '4. Place citations immediately after the relevant claim',
    `5. End with '${CITATIONS_MARKER}' section listing all cited sources`,
    '',
  ];
}

function summaryHeader(summary: SummaryItem): string | undefined {
  const parts: string[] = [];
  if (summary.author) parts.push(`Author: ${summary.author}`);
  if (summary.organization) parts.push(`Org: ${summary.organization}`);
  if (summary.date) parts.push(`Date: ${summary.date}`);
  return parts.length > 0 ? parts.join(' | ') : undefined;
}

/**
 * `filename | Page 3`, or `filename | Time: 01:05-02:10` for media.
 * Page wins when both anchors are present.
 */
export function excerptLocation(excerpt: ExcerptItem): string | undefined {
  const parts: string[] = [];
  if (excerpt.filename) parts.push(excerpt.filename);

  const { page, startSec, endSec } = excerpt.location;
  if (page !== undefined) {
    parts.push(`Page ${page}`);
  } else if (startSec !== undefined) {
    parts.push(`Time: ${formatTimestamp(startSec)}-${formatTimestamp(endSec ?? startSec)}`);
  }

  return parts.length > 0 ? parts.join(' | ') : undefined;
}

function summariesBlock(summaries: readonly SummaryItem[], titles: readonly string[] = []): string[] {
  const lines = [RULE, 'DOCUMENT SUMMARIES:', RULE];
  if (summaries.length === 0) {
    lines.push('(No document summaries available)');
    return lines;
  }

  summaries.forEach((summary, i) => {
    lines.push('', `[Document ${i + 1}] ${titles[i] ?? summary.title ?? 'Unknown'}`);
    const header = summaryHeader(summary);
    if (header) lines.push(header);
    lines.push('', summary.summaryText);
  });
  return lines;
}

function excerptsBlock(excerpts: readonly ExcerptItem[], titles: readonly string[] = []): string[] {
  const lines = ['', RULE, 'DETAILED CONTENT CHUNKS:', RULE];
  if (excerpts.length === 0) {
    lines.push('(No detailed chunks available)');
    return lines;
  }

  excerpts.forEach((excerpt, i) => {
    lines.push('', `[Chunk ${i + 1}] ${titles[i] ?? excerpt.title ?? 'Unknown'}`);
    const location = excerptLocation(excerpt);
    if (location) lines.push(location);
    lines.push('', excerpt.content);
  });
  return lines;
}

function outputBlock(minCitations: number): string[] {
  return [
    '',
    RULE,
    'REQUIRED OUTPUT FORMAT:',
    RULE,
    '1. Answer with inline citations [Document Title, Page X]',
    `2. Include AT LEAST ${minCitations} citations`,
    '3. End with:',
    CITATIONS_MARKER,
    'CITED: [List each source cited, format: Title (Page X) or (Summary)]',
    '',
  ];
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): string {
  const minCitations = minimumCitations(input.format.lengthClass);

  return [
    ...domainBlock(),
    ...historyBlock(input.history ?? [], input.historyTurns ?? 6),
    ...formatBlock(input.format),
    ...citationBlock(minCitations),
    `USER QUESTION: ${input.query}`,
    '',
    ...summariesBlock(input.summaries, input.labels?.documents),
    ...excerptsBlock(input.excerpts, input.labels?.chunks),
    ...outputBlock(minCitations),
  ].join('\n');
}
