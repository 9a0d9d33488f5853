/**
 * RAG Pipeline Logger
 *
 * Structured logging for answer requests. One instance per request, so
 * concurrent requests never share a trace.
 *
 * STAGES (canonical order):
 *   QUERY → ANALYZE → EXPAND → RETRIEVE → DEDUP → FUSE → RERANK → CONTEXT
 *   → FORMAT → GENERATE → CITE → FOLLOWUP → RESPOND
 *
 * LOG LEVELS:
 *   INFO  = Stage summaries
 *   DEBUG = Per-item details (gated by DEBUG_RAG)
 *   WARN  = Degraded path taken (empty tier, rerank fallback, model fallback),
 *           or a timed stage slower than the threshold
 *   ERROR = Non-throttling model failure or exhausted chain
 */

import crypto from 'crypto';
import type { RetrievedItem } from '@/lib/core/types';

export type RAGStage =
  | 'QUERY'
  | 'ANALYZE'
  | 'EXPAND'
  | 'RETRIEVE'
  | 'DEDUP'
  | 'FUSE'
  | 'RERANK'
  | 'CONTEXT'
  | 'FORMAT'
  | 'GENERATE'
  | 'CITE'
  | 'FOLLOWUP'
  | 'RESPOND'
  | 'SUMMARY';

export type LogLevel = 'INFO' | 'DEBUG' | 'WARN' | 'ERROR';

export interface StageData {
  input?: number | string;
  output?: number | string;
  removed?: number;
  budget?: string;
  decision?: string;
  [key: string]: unknown;
}

interface TraceStages {
  expand?: { variants: number };
  retrieve?: { excerpts: number; summaries: number };
  rerank?: { input: number; output: number; fellBack: boolean };
  context?: { summaries: number; excerpts: number; tokens: number };
  format?: { type: string };
  generate?: { model: string; attempts: number; latencyMs: number };
  cite?: { citations: number; sources: number };
}

export type StageLatencies = Partial<Record<RAGStage, number>>;

export interface TraceSummary {
  traceId: string;
  query: string;
  stages: TraceStages;
  stageLatencyMs: StageLatencies;
  status: 'ok' | 'degraded' | 'error';
  totalLatencyMs: number;
}

const RESERVED_KEYS = ['input', 'output', 'removed', 'budget', 'decision'];

/** Stages slower than this are logged at WARN */
export const SLOW_STAGE_MS = 5000;

class RAGLogger {
  private traceId: string = '';
  private startTime: number = 0;
  private debugEnabled: boolean = false;
  private query: string = '';
  private stages: TraceStages = {};
  private status: TraceSummary['status'] = 'ok';
  private latencies: StageLatencies = {};

  constructor(private readonly slowStageMs: number = SLOW_STAGE_MS) {}

  /**
   * Start a new trace for a request.
   * Call this at the beginning of each request.
   */
  startTrace(query: string): string {
    this.traceId = crypto.randomUUID().slice(0, 8);
    this.startTime = Date.now();
    this.debugEnabled = process.env.DEBUG_RAG === 'true';
    this.query = query.substring(0, 50);
    this.stages = {};
    this.status = 'ok';
    this.latencies = {};

    this.info('QUERY', { query: query.length > 80 ? query.substring(0, 80) + '...' : query });
    return this.traceId;
  }

  info(stage: RAGStage, data?: StageData): void {
    this.log('INFO', stage, data);
  }

  /**
   * Log at DEBUG level (gated by DEBUG_RAG)
   */
  debug(stage: RAGStage, data?: StageData): void {
    if (this.debugEnabled) {
      this.log('DEBUG', stage, data);
    }
  }

  /**
   * Log at WARN level and mark the request as degraded
   */
  warn(stage: RAGStage, data?: StageData): void {
    this.log('WARN', stage, data);
    if (this.status === 'ok') this.status = 'degraded';
  }

  error(stage: RAGStage, data?: StageData): void {
    this.log('ERROR', stage, data);
    this.status = 'error';
  }

  /**
   * Format one compact line: in/out/removed/budget/decision first, then extras.
   */
  formatLine(stage: RAGStage, data?: StageData): string {
    const prefix = `[RAG:${this.traceId}][${stage}]`;
    if (!data) return prefix;

    const parts: string[] = [];

    if (data.input !== undefined) parts.push(`in=${data.input}`);
    if (data.output !== undefined) parts.push(`out=${data.output}`);
    if (data.removed !== undefined) parts.push(`-${data.removed}`);
    if (data.budget !== undefined) parts.push(`budget=${data.budget}`);
    if (data.decision !== undefined) parts.push(`→ ${data.decision}`);

    for (const [key, value] of Object.entries(data)) {
      if (RESERVED_KEYS.includes(key)) continue;
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        parts.push(`${key}=${value}`);
      }
    }

    return parts.length > 0 ? `${prefix} ${parts.join(' ')}` : prefix;
  }

  private log(level: LogLevel, stage: RAGStage, data?: StageData): void {
    const line = this.formatLine(stage, data);

    if (level === 'WARN') {
      console.warn(line);
    } else if (level === 'ERROR') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  // ============================================
  // STAGE TIMING
  // ============================================

  /**
   * Run `fn` and record its wall-clock time under `stage`, also when it throws.
   * A slow stage is printed at WARN without changing the trace status.
   */
  async timed<T>(stage: RAGStage, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    try {
      return await fn();
    } finally {
      this.recordLatency(stage, Date.now() - started);
    }
  }

  recordLatency(stage: RAGStage, ms: number): void {
    this.latencies[stage] = (this.latencies[stage] ?? 0) + ms;
    if (ms > this.slowStageMs) {
      console.warn(this.formatLine(stage, { decision: 'slow stage', latencyMs: ms, thresholdMs: this.slowStageMs }));
    } else {
      this.debug(stage, { latencyMs: ms });
    }
  }

  // ============================================
  // STAGE-SPECIFIC HELPERS
  // ============================================

  expand(variants: string[]): void {
    this.info('EXPAND', { output: variants.length });
    variants.forEach((v, i) => this.debug('EXPAND', { variant: i, text: v.substring(0, 80) }));
    this.stages.expand = { variants: variants.length };
  }

  retrieve(excerpts: number, summaries: number, calls: number): void {
    this.info('RETRIEVE', { excerpts, summaries, calls });
    this.stages.retrieve = { excerpts, summaries };
  }

  dedup(tier: string, input: number, output: number): void {
    this.info('DEDUP', { tier, input, output, removed: input - output });
  }

  rerank(input: number, output: number, fellBack: boolean): void {
    this.info('RERANK', {
      input,
      output,
      decision: fellBack ? 'fallback order' : 'model order',
    });
    this.stages.rerank = { input, output, fellBack };
  }

  context(summaries: number, excerpts: number, tokens: number, budgetMax: number): void {
    this.info('CONTEXT', { summaries, excerpts, budget: `${tokens}/${budgetMax}` });
    this.stages.context = { summaries, excerpts, tokens };
  }

  format(type: string, length: string, structure: string): void {
    this.info('FORMAT', { type, length, structure });
    this.stages.format = { type };
  }

  generate(model: string, attempts: number, latencyMs: number): void {
    this.info('GENERATE', { model, attempts, latencyMs: `${latencyMs}ms` });
    this.stages.generate = { model, attempts, latencyMs };
  }

  cite(citations: number, sources: number, cited: number): void {
    this.info('CITE', { citations, sources, cited });
    this.stages.cite = { citations, sources: cited };
  }

  /**
   * Debug helper: one line per item (only when DEBUG_RAG=true)
   */
  debugItems(stage: RAGStage, label: string, items: readonly RetrievedItem[]): void {
    if (!this.debugEnabled) return;

    console.log(`[RAG:${this.traceId}][${stage}] ${label}: ${items.length} items`);
    items.forEach((item, i) => {
      const text = item.kind === 'excerpt' ? item.content : item.summaryText;
      const score = item.score !== undefined ? item.score.toFixed(3) : '-';
      const preview = text.substring(0, 80).replace(/\n/g, ' ');
      console.log(`  [${i}] ${item.kind} ${item.sourceId ?? item.id} | score=${score} | "${preview}..."`);
    });
  }

  /**
   * End the trace with a summary line.
   * Call this at the end of each request.
   */
  endTrace(): TraceSummary {
    const totalLatencyMs = Date.now() - this.startTime;
    const s = this.stages;
    const parts: string[] = [];

    if (s.expand) parts.push(`variants=${s.expand.variants}`);
    if (s.retrieve) parts.push(`retrieve=${s.retrieve.excerpts}+${s.retrieve.summaries}`);
    if (s.rerank) parts.push(`rerank=${s.rerank.output}`);
    if (s.context) parts.push(`context=${s.context.summaries}+${s.context.excerpts}`);
    if (s.context) parts.push(`tokens=${s.context.tokens}`);
    if (s.generate) parts.push(`model=${s.generate.model}`);
    if (s.cite) parts.push(`citations=${s.cite.citations}`);
    parts.push(`latency=${totalLatencyMs}ms`);

    console.log(`[RAG:${this.traceId}][SUMMARY] ${parts.join(' | ')} → ${this.status}`);

    return {
      traceId: this.traceId,
      query: this.query,
      stages: s,
      stageLatencyMs: { ...this.latencies },
      status: this.status,
      totalLatencyMs,
    };
  }

  getTraceId(): string {
    return this.traceId;
  }
}

export { RAGLogger };
