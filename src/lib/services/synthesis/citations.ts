// ================================
// CITATIONS
// ================================
//
// The model is told to cite by title but often echoes the prompt's
// positional labels ("[Document 2]", "[Chunk 5, Page 3]"). Labels are
// rewritten to titles first, then every bracketed reference is collected.

import { CITATIONS_MARKER } from './prompt-builder';

export const MAX_CITATION_LENGTH = 200;

const PLACEHOLDER_PATTERN = /\b(Document|Chunk)\s+(\d+)\b/g;
const BRACKET_PATTERN = /\[([^[\]]+)\]/g;

export interface PlaceholderLabels {
  /** Title of the Nth summary in the prompt, at index N-1 */
  documents: readonly string[];
  /** Title of the Nth excerpt in the prompt, at index N-1 */
  chunks: readonly string[];
}

/**
 * Replace `Document N` / `Chunk N` with the matching title.
 * N is 1-based; labels with no matching item stay as written.
 *
 * @example replacePlaceholderLabels("[Document 1, Page 3]", { documents: ["AML Handbook"], chunks: [] })
 *   => "[AML Handbook, Page 3]"
 */
export function replacePlaceholderLabels(text: string, labels: PlaceholderLabels): string {
  return text.replace(PLACEHOLDER_PATTERN, (match, kind: string, n: string) => {
    const list = kind === 'Document' ? labels.documents : labels.chunks;
    const title = list[Number.parseInt(n, 10) - 1];
    return title ?? match;
  });
}

/**
 * Unique bracketed references in first-seen order. Empty brackets and
 * anything of `maxLength` characters or more are skipped.
 */
export function extractCitations(text: string, maxLength: number = MAX_CITATION_LENGTH): string[] {
  const seen = new Set<string>();
  const citations: string[] = [];

  for (const match of text.matchAll(BRACKET_PATTERN)) {
    const inner = match[1].trim();
    if (inner === '' || inner.length >= maxLength) continue;
    if (seen.has(match[0])) continue;
    seen.add(match[0]);
    citations.push(match[0]);
  }

  return citations;
}

/** Answer text without the trailing citations block. */
export function stripCitationsBlock(text: string): string {
  const idx = text.indexOf(CITATIONS_MARKER);
  return idx === -1 ? text.trim() : text.substring(0, idx).trim();
}

function citedTitle(citation: string): string {
  return citation.replace(/^\[|\]$/g, '').split(/[,(]/)[0].trim().toLowerCase();
}

/**
 * Citation quality in 0..1. Half the score is the citation count against
 * `minRequired`; the other half is the number of distinct cited titles
 * against 60% of the count.
 *
 * @example citationQualityScore(["[AML Handbook, Page 3]", "[FATF Guidance]"], 2) => 1
 */
export function citationQualityScore(citations: readonly string[], minRequired: number): number {
  if (citations.length === 0) return 0;

  const countScore = Math.min(citations.length / Math.max(minRequired, 1), 1) * 0.5;
  const titles = new Set(citations.map(citedTitle));
  const diversityScore = Math.min(titles.size / Math.max(citations.length * 0.6, 1), 1) * 0.5;

  return countScore + diversityScore;
}
