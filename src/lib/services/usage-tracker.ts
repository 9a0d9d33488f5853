// USAGE TRACKER
//
// Records every model call (expansion, rerank, answer, follow-ups) as one
// GenerationAttempt. One tracker is created at startup and injected; each
// request works through a UsageScope that stamps user/session ids and keeps
// the request's own attempts for the response.
//
// Sink writes run in the background. flush() waits for them, close() flushes
// and then closes the sink. A failed write is logged and never reaches the caller.

import { v4 as uuidv4 } from 'uuid';
import type { GenerateOptions, GenerateResult, LLMProvider, UsageSink } from '@/lib/core/interfaces';
import type { GenerationAttempt, UsageSummary } from '@/lib/core/types';
import { toErrorMessage } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';
import { classifyModelError } from './synthesis/error-classifier';

export type AttemptInput = Omit<GenerationAttempt, 'id' | 'timestamp' | 'provider'> & { provider?: string };

export interface ScopeIds {
  userId?: string;
  sessionId?: string;
}

/** In-process sink. Useful for tests and for running without a database. */
export class InMemoryUsageSink implements UsageSink {
  readonly records: GenerationAttempt[] = [];
  closed = false;

  async append(record: GenerationAttempt): Promise<void> {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class UsageTracker {
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly sink: UsageSink,
    private readonly defaultProvider: string = 'chat-completions'
  ) {}

  /**
   * Build a record and hand it to the sink. Returns the record immediately.
   */
  record(input: AttemptInput): GenerationAttempt {
    const record: GenerationAttempt = {
      ...input,
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      provider: input.provider ?? this.defaultProvider,
    };

    if (this.closed) {
      console.warn(`[Usage] Tracker closed, record ${record.id} (${record.operation}) not persisted`);
      return record;
    }

    const write: Promise<void> = this.sink
      .append(record)
      .then(() => debug.usage.log(`${record.operation} ${record.model} ${record.status}`))
      .catch((error: unknown) => {
        console.error(`[Usage] Failed to persist record ${record.id}: ${toErrorMessage(error)}`);
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);

    return record;
  }

  scope(ids: ScopeIds = {}): UsageScope {
    return new UsageScope(this, ids);
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  /** Wait for every write issued so far. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  /** Flush, then close the sink. Later records are logged and dropped. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.flush();
    if (this.sink.close) {
      await this.sink.close();
    }
  }
}

/** What a pipeline step needs to make a tracked model call */
export interface ModelContext {
  llm: LLMProvider;
  usage: UsageScope;
  model: string;
}

export interface TrackedCall {
  operation: string;
  options: GenerateOptions;
}

/**
 * Per-request view of the tracker.
 */
export class UsageScope {
  readonly attempts: GenerationAttempt[] = [];

  constructor(
    private readonly tracker: UsageTracker,
    private readonly ids: ScopeIds
  ) {}

  record(input: AttemptInput): GenerationAttempt {
    const attempt = this.tracker.record({ ...this.ids, ...input });
    this.attempts.push(attempt);
    return attempt;
  }

  /**
   * Run one provider call and record it. Errors are recorded with their
   * classification and rethrown unchanged.
   */
  async generate(
    llm: LLMProvider,
    prompt: string,
    call: TrackedCall
  ): Promise<{ result: GenerateResult; attempt: GenerationAttempt }> {
    const model = call.options.model ?? llm.getModel();
    const started = Date.now();

    try {
      const result = await llm.generate(prompt, { ...call.options, model });
      const usage = result.tokenUsage;
      const attempt = this.record({
        operation: call.operation,
        provider: llm.getName(),
        model,
        inputTokens: usage?.prompt ?? 0,
        outputTokens: usage?.completion ?? 0,
        totalTokens: usage?.total ?? 0,
        latencyMs: Date.now() - started,
        status: 'success',
        temperature: call.options.temperature,
        maxTokens: call.options.maxTokens,
      });
      return { result, attempt };
    } catch (error) {
      this.record({
        operation: call.operation,
        provider: llm.getName(),
        model,
        inputTokens: 0,
        outputTokens: 0,
        totalTokens: 0,
        latencyMs: Date.now() - started,
        status: 'error',
        errorMessage: toErrorMessage(error).substring(0, 500),
        errorClass: classifyModelError(error),
        temperature: call.options.temperature,
        maxTokens: call.options.maxTokens,
      });
      throw error;
    }
  }

  summary(): UsageSummary {
    return summarizeUsage(this.attempts);
  }
}

/** Aggregate token and latency totals, overall and per model. */
export function summarizeUsage(records: readonly GenerationAttempt[]): UsageSummary {
  const summary: UsageSummary = {
    calls: 0,
    failures: 0,
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    latencyMs: 0,
    byModel: {},
  };

  for (const r of records) {
    const failed = r.status === 'error' ? 1 : 0;
    summary.calls += 1;
    summary.failures += failed;
    summary.inputTokens += r.inputTokens;
    summary.outputTokens += r.outputTokens;
    summary.totalTokens += r.totalTokens;
    summary.latencyMs += r.latencyMs;

    const m = summary.byModel[r.model] ?? { calls: 0, failures: 0, totalTokens: 0 };
    m.calls += 1;
    m.failures += failed;
    m.totalTokens += r.totalTokens;
    summary.byModel[r.model] = m;
  }

  return summary;
}
