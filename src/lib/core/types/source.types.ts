import type { FormatDecision, UsageSummary } from './generation.types';
import type { MetadataFilter } from './retrieval.types';

export interface TimeRange {
  start: number;
  end: number;
}

/** Per-source attribution assembled while walking the context items */
export interface SourceRecord {
  sourceId: string;
  title: string;
  filename?: string;
  sourceUri?: string;
  authorizedUrl?: string;
  type: 'summary' | 'excerpt';
  pages: number[];
  timestamps: TimeRange[];
  /** Set once pages are finalized, e.g. "1-3, 5" */
  pageRange?: string;
}

/** Entry from the document manifest, keyed by source id */
export interface ManifestEntry {
  sourceId: string;
  title?: string;
  filename?: string;
  sourceUri?: string;
  mimeType?: string;
}

/** Request timings and citation quality, reported with every answer */
export interface AnswerMetrics {
  /** Milliseconds per timed stage, keyed by log stage (RETRIEVE, GENERATE, FOLLOWUP) */
  stageLatencyMs: Record<string, number>;
  totalLatencyMs: number;
  /** 0..1: half citation count against the format minimum, half source diversity */
  citationQuality: number;
}

export interface RagAnswer {
  query: string;
  /** Answer with the trailing citations block removed */
  answer: string;
  fullAnswer: string;
  citations: string[];
  /** Sources referenced by at least one citation */
  sources: SourceRecord[];
  /** Every source that was placed in the context */
  allSources: SourceRecord[];
  followUpQuestions: string[];
  modelUsed: string;
  temperature: number;
  formatDecision: FormatDecision;
  expandedQueries: string[];
  filter?: MetadataFilter;
  numSummariesUsed: number;
  numExcerptsUsed: number;
  usage?: UsageSummary;
  optimizationsApplied: string[];
  metrics: AnswerMetrics;
  traceId: string;
}
