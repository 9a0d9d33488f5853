import { describe, it, expect, vi, afterEach } from 'vitest';
import { InMemoryUsageSink, UsageTracker, summarizeUsage } from './usage-tracker';
import type { LLMProvider, UsageSink } from '@/lib/core/interfaces';
import { ModelErrorClass } from '@/lib/core/types';
import type { GenerationAttempt } from '@/lib/core/types';
import { RateLimitError } from '@/lib/utils/errors';

function fakeLLM(impl: LLMProvider['generate']): LLMProvider {
  return {
    generate: vi.fn(impl),
    getName: () => 'fake-llm',
    getModel: () => 'primary-large',
  };
}

describe('UsageTracker', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records a successful call with token usage and scope ids', async () => {
    const sink = new InMemoryUsageSink();
    const tracker = new UsageTracker(sink);
    const scope = tracker.scope({ userId: 'user-1', sessionId: 'session-1' });
    const llm = fakeLLM(async () => ({
      content: 'answer',
      tokenUsage: { prompt: 100, completion: 20, total: 120 },
    }));

    const { result, attempt } = await scope.generate(llm, 'prompt', {
      operation: 'answer',
      options: { model: 'fallback-medium', temperature: 0.2, maxTokens: 512 },
    });
    await tracker.flush();

    expect(result.content).toBe('answer');
    expect(attempt).toMatchObject({
      operation: 'answer',
      provider: 'fake-llm',
      model: 'fallback-medium',
      inputTokens: 100,
      outputTokens: 20,
      totalTokens: 120,
      status: 'success',
      userId: 'user-1',
      sessionId: 'session-1',
      temperature: 0.2,
      maxTokens: 512,
    });
    expect(sink.records).toEqual([attempt]);
    expect(scope.attempts).toEqual([attempt]);
  });

  it('records a failed call with its classification and rethrows', async () => {
    const sink = new InMemoryUsageSink();
    const tracker = new UsageTracker(sink);
    const scope = tracker.scope();
    const llm = fakeLLM(async () => {
      throw new RateLimitError('primary-large (HTTP 429): slow down');
    });

    await expect(scope.generate(llm, 'prompt', { operation: 'answer', options: {} })).rejects.toBeInstanceOf(
      RateLimitError
    );
    await tracker.flush();

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({
      model: 'primary-large',
      status: 'error',
      errorClass: ModelErrorClass.RateLimited,
      errorMessage: 'primary-large (HTTP 429): slow down',
      totalTokens: 0,
    });
  });

  it('logs sink failures without propagating them', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failingSink: UsageSink = { append: async () => Promise.reject(new Error('disk full')) };
    const tracker = new UsageTracker(failingSink);

    const record = tracker.record({
      operation: 'rerank',
      model: 'fallback-small',
      inputTokens: 1,
      outputTokens: 1,
      totalTokens: 2,
      latencyMs: 5,
      status: 'success',
    });
    await tracker.flush();

    expect(record.operation).toBe('rerank');
    expect(tracker.pendingWrites).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith(`[Usage] Failed to persist record ${record.id}: disk full`);
  });

  it('flushes pending writes and closes the sink on close', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const written: GenerationAttempt[] = [];
    const sink: UsageSink = {
      append: async (r) => {
        await gate;
        written.push(r);
      },
      close: vi.fn(async () => {}),
    };
    const tracker = new UsageTracker(sink);

    tracker.record({
      operation: 'expand',
      model: 'fallback-small',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      latencyMs: 1,
      status: 'success',
    });
    expect(tracker.pendingWrites).toBe(1);

    const closing = tracker.close();
    release();
    await closing;

    expect(written).toHaveLength(1);
    expect(sink.close).toHaveBeenCalledTimes(1);
    expect(tracker.pendingWrites).toBe(0);
  });

  it('drops records after close', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sink = new InMemoryUsageSink();
    const tracker = new UsageTracker(sink);
    await tracker.close();

    tracker.record({
      operation: 'answer',
      model: 'primary-large',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      latencyMs: 0,
      status: 'success',
    });
    await tracker.flush();

    expect(sink.closed).toBe(true);
    expect(sink.records).toHaveLength(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});

describe('summarizeUsage', () => {
  it('totals calls, failures and tokens per model', () => {
    const base = {
      id: 'x',
      timestamp: '2026-01-01T00:00:00.000Z',
      operation: 'answer',
      provider: 'fake-llm',
      outputTokens: 0,
    };
    const records: GenerationAttempt[] = [
      { ...base, model: 'a', inputTokens: 10, totalTokens: 10, latencyMs: 5, status: 'error' },
      { ...base, model: 'b', inputTokens: 30, totalTokens: 40, latencyMs: 7, status: 'success' },
      { ...base, model: 'b', inputTokens: 5, totalTokens: 6, latencyMs: 1, status: 'success' },
    ];

    expect(summarizeUsage(records)).toEqual({
      calls: 3,
      failures: 1,
      inputTokens: 45,
      outputTokens: 0,
      totalTokens: 56,
      latencyMs: 13,
      byModel: {
        a: { calls: 1, failures: 1, totalTokens: 10 },
        b: { calls: 2, failures: 0, totalTokens: 46 },
      },
    });
  });
});
