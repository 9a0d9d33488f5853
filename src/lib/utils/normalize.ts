/**
 * TEXT NORMALIZATION UTILITIES
 *
 * Shared by query analysis, format classification, expansion and citation parsing.
 */

/**
 * Lowercase and collapse whitespace.
 *
 * @example normalizeForMatch("  What IS\n AML? ") => "what is aml?"
 */
export function normalizeForMatch(text: string): string {
  return (text ?? "").toLowerCase().replace(/\s+/g, " ").trim();
}

/** Escape a literal for use inside a RegExp source. */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Word-boundary, case-insensitive pattern for a keyword phrase.
 * Inner whitespace matches any run of whitespace, so "how to" matches "how  to".
 *
 * @example keywordPattern("brief").test("briefing") => false
 */
export function keywordPattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join("\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "iu");
}

/** True when any of the phrases occurs as whole words in `text`. */
export function containsAnyKeyword(text: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => keywordPattern(p).test(text));
}

export function countWords(text: string): number {
  const trimmed = (text ?? "").trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Strip list numbering, bullets, quotes and markdown emphasis from a model-produced line.
 *
 * @example stripListMarker('2. **"KYC rules"**') => "KYC rules"
 */
export function stripListMarker(line: string): string {
  return line
    .trim()
    .replace(/^(?:\d+[.)]|[-*•])\s+/, "")
    .replace(/^\*\*(.*)\*\*$/, "$1")
    .replace(/^["'“](.*)["'”]$/, "$1")
    .trim();
}
