// SOURCE ATTRIBUTION
//
// Builds one SourceRecord per source id from the items placed in the prompt,
// plus the positional labels ([Document N] / [Chunk N]) used to rewrite
// citations. Records are request-scoped: built here, finalized once, returned.
//
// Title precedence: item title → manifest title → filename → source id → label.
// URL precedence:   manifest uri → item metadata uri → gs://bucket/prefix+filename.

import type { ManifestLookup } from '@/lib/core/interfaces';
import type { ExcerptItem, ManifestEntry, RetrievedItem, SourceRecord, SummaryItem } from '@/lib/core/types';
import { formatPageRange } from '@/lib/utils/format';
import { debug } from '@/lib/utils/debug';
import type { PlaceholderLabels } from './citations';

const GCS_BROWSER_BASE = 'https://storage.cloud.google.com/';

export interface StorageLocation {
  sourceBucket: string;
  sourcePrefix: string;
}

export interface SourceAttribution {
  sources: SourceRecord[];
  labels: PlaceholderLabels;
}

/**
 * Browser URL for a gs:// object; other URIs are returned as they are.
 *
 * @example toAuthorizedUrl("gs://docs/reports/AML guide.pdf")
 *   => "https://storage.cloud.google.com/docs/reports/AML%20guide.pdf"
 */
export function toAuthorizedUrl(uri: string | undefined): string | undefined {
  if (!uri) return undefined;
  if (!uri.startsWith('gs://')) return uri;

  const [bucket, ...path] = uri.slice('gs://'.length).split('/');
  if (!bucket) return undefined;
  return GCS_BROWSER_BASE + [bucket, ...path.map(encodeURIComponent)].join('/');
}

function metadataUri(item: RetrievedItem): string | undefined {
  for (const key of ['source_uri', 'sourceUri']) {
    const value = item.metadata[key];
    if (typeof value === 'string' && value.trim() !== '') return value;
  }
  return undefined;
}

export function resolveSourceUri(
  item: RetrievedItem,
  manifest: ManifestEntry | null,
  storage?: StorageLocation
): string | undefined {
  const fromManifest = manifest?.sourceUri ?? metadataUri(item);
  if (fromManifest) return fromManifest;

  const filename = item.filename ?? manifest?.filename;
  if (storage?.sourceBucket && filename) {
    return `gs://${storage.sourceBucket}/${storage.sourcePrefix}${filename}`;
  }
  return undefined;
}

function resolveTitle(item: RetrievedItem, manifest: ManifestEntry | null, label: string): string {
  return item.title || manifest?.title || item.filename || item.sourceId || label;
}

async function prefetchManifest(
  items: readonly RetrievedItem[],
  lookup?: ManifestLookup
): Promise<Map<string, ManifestEntry | null>> {
  const ids = Array.from(new Set(items.flatMap((item) => (item.sourceId ? [item.sourceId] : []))));
  const entries = await Promise.all(ids.map(async (id) => [id, lookup ? await lookup.getSource(id) : null] as const));
  return new Map(entries);
}

function newRecord(
  item: RetrievedItem,
  sourceId: string,
  title: string,
  manifest: ManifestEntry | null,
  storage?: StorageLocation
): SourceRecord {
  const sourceUri = resolveSourceUri(item, manifest, storage);
  return {
    sourceId,
    title,
    filename: item.filename ?? manifest?.filename ?? sourceId,
    sourceUri,
    authorizedUrl: toAuthorizedUrl(sourceUri),
    type: item.kind,
    pages: [],
    timestamps: [],
  };
}

function addLocation(record: SourceRecord, excerpt: ExcerptItem): void {
  const { page, startSec, endSec } = excerpt.location;
  if (page !== undefined && !record.pages.includes(page)) {
    record.pages.push(page);
  }
  if (startSec !== undefined) {
    const end = endSec ?? startSec;
    if (!record.timestamps.some((t) => t.start === startSec && t.end === end)) {
      record.timestamps.push({ start: startSec, end });
    }
  }
}

function finalize(record: SourceRecord): SourceRecord {
  const pages = [...record.pages].sort((a, b) => a - b);
  return pages.length > 0 ? { ...record, pages, pageRange: formatPageRange(pages) } : { ...record, pages };
}

/**
 * Walk summaries then excerpts in prompt order. Manifest entries are fetched
 * once per source id, concurrently, before the walk.
 */
export async function buildSourceRecords(
  summaries: readonly SummaryItem[],
  excerpts: readonly ExcerptItem[],
  options: { manifest?: ManifestLookup; storage?: StorageLocation } = {}
): Promise<SourceAttribution> {
  const manifest = await prefetchManifest([...summaries, ...excerpts], options.manifest);
  const entryFor = (item: RetrievedItem) => (item.sourceId ? manifest.get(item.sourceId) ?? null : null);

  const records = new Map<string, SourceRecord>();
  const documents: string[] = [];
  const chunks: string[] = [];

  summaries.forEach((summary, i) => {
    const entry = entryFor(summary);
    const title = resolveTitle(summary, entry, `Document ${i + 1}`);
    documents.push(title);

    if (summary.sourceId && !records.has(summary.sourceId)) {
      records.set(summary.sourceId, newRecord(summary, summary.sourceId, title, entry, options.storage));
    }
  });

  excerpts.forEach((excerpt, i) => {
    const entry = entryFor(excerpt);
    const title = resolveTitle(excerpt, entry, `Chunk ${i + 1}`);
    chunks.push(title);

    if (!excerpt.sourceId) return;

    let record = records.get(excerpt.sourceId);
    if (!record) {
      record = newRecord(excerpt, excerpt.sourceId, title, entry, options.storage);
      records.set(excerpt.sourceId, record);
    } else if (!record.authorizedUrl) {
      const uri = resolveSourceUri(excerpt, entry, options.storage);
      record.sourceUri = record.sourceUri ?? uri;
      record.authorizedUrl = toAuthorizedUrl(uri);
    }
    addLocation(record, excerpt);
  });

  const sources = Array.from(records.values()).map(finalize);
  debug.citation.log(`${sources.length} sources from ${summaries.length} summaries + ${excerpts.length} excerpts`);

  return { sources, labels: { documents, chunks } };
}

/**
 * Sources whose title or source id appears (case-insensitive) anywhere in
 * the citation text.
 */
export function filterCitedSources(sources: readonly SourceRecord[], citations: readonly string[]): SourceRecord[] {
  const haystack = citations.join(' ').toLowerCase();
  if (haystack === '') return [];

  return sources.filter((source) => {
    const title = source.title.toLowerCase();
    return (title !== '' && haystack.includes(title)) || haystack.includes(source.sourceId.toLowerCase());
  });
}
