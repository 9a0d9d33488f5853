/**
 * Seconds to `MM:SS`, or `HH:MM:SS` once the value reaches an hour.
 *
 * @example formatTimestamp(75) => "01:15"
 * @example formatTimestamp(3725) => "01:02:05"
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const pad = (n: number) => String(n).padStart(2, '0');

  return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(secs)}` : `${pad(minutes)}:${pad(secs)}`;
}

/**
 * Collapse page numbers into ranges. Input order and duplicates do not matter.
 *
 * @example formatPageRange([1, 2, 3, 5, 6, 10]) => "1-3, 5-6, 10"
 */
export function formatPageRange(pages: readonly number[]): string {
  const sorted = Array.from(new Set(pages)).sort((a, b) => a - b);
  if (sorted.length === 0) return '';

  const ranges: string[] = [];
  let start = sorted[0];
  let prev = sorted[0];

  for (const page of sorted.slice(1)) {
    if (page === prev + 1) {
      prev = page;
      continue;
    }
    ranges.push(start === prev ? `${start}` : `${start}-${prev}`);
    start = page;
    prev = page;
  }
  ranges.push(start === prev ? `${start}` : `${start}-${prev}`);

  return ranges.join(', ');
}

/** Estimated token count: one token per four characters. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/** Cut to `maxChars`, appending "..." only when something was cut. */
export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.substring(0, maxChars)}...` : text;
}
