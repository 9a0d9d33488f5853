import { describe, it, expect, vi, afterEach } from 'vitest';
import { RAGLogger } from './rag-logger';

describe('RAGLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    vi.useRealTimers();
  });

  it('formats reserved keys first, then primitive extras', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new RAGLogger();
    const traceId = log.startTrace('what is kyc');

    expect(traceId).toHaveLength(8);
    expect(log.formatLine('DEDUP', { tier: 'excerpt', input: 4, output: 3, removed: 1 })).toBe(
      `[RAG:${traceId}][DEDUP] in=4 out=3 -1 tier=excerpt`
    );
    expect(log.formatLine('RETRIEVE', { decision: 'empty list', items: [1, 2] })).toBe(
      `[RAG:${traceId}][RETRIEVE] → empty list`
    );
    expect(log.formatLine('RESPOND')).toBe(`[RAG:${traceId}][RESPOND]`);
  });

  it('only prints debug lines when DEBUG_RAG is true', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('DEBUG_RAG', 'false');
    const quiet = new RAGLogger();
    quiet.startTrace('q');
    quiet.debug('EXPAND', { variant: 0 });
    expect(logSpy).toHaveBeenCalledTimes(1);

    vi.stubEnv('DEBUG_RAG', 'true');
    const verbose = new RAGLogger();
    const traceId = verbose.startTrace('q');
    verbose.debug('EXPAND', { variant: 0 });
    expect(logSpy).toHaveBeenLastCalledWith(`[RAG:${traceId}][EXPAND] variant=0`);
  });

  it('summarizes stages and status at the end of a trace', () => {
    vi.useFakeTimers();
    vi.setSystemTime(1000);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const log = new RAGLogger();
    const traceId = log.startTrace('what is kyc');
    log.retrieve(4, 2, 2);
    log.warn('RERANK', { decision: 'fallback order' });
    log.generate('primary-large', 1, 10);
    vi.setSystemTime(1250);

    const summary = log.endTrace();

    expect(logSpy).toHaveBeenLastCalledWith(
      `[RAG:${traceId}][SUMMARY] retrieve=4+2 | model=primary-large | latency=250ms → degraded`
    );
    expect(summary).toEqual({
      traceId,
      query: 'what is kyc',
      stages: {
        retrieve: { excerpts: 4, summaries: 2 },
        generate: { model: 'primary-large', attempts: 1, latencyMs: 10 },
      },
      stageLatencyMs: {},
      status: 'degraded',
      totalLatencyMs: 250,
    });
  });

  it('marks the trace as error once an error is logged', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new RAGLogger();
    const traceId = log.startTrace('q');

    log.error('GENERATE', { decision: 'all models failed' });

    expect(errorSpy).toHaveBeenCalledWith(`[RAG:${traceId}][GENERATE] → all models failed`);
    expect(log.endTrace().status).toBe('error');
  });

  it('times stages and records them even when they throw', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(1000);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new RAGLogger();
    log.startTrace('q');

    const value = await log.timed('GENERATE', async () => {
      vi.setSystemTime(1040);
      return 'ok';
    });
    await expect(
      log.timed('FOLLOWUP', async () => {
        vi.setSystemTime(1050);
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(value).toBe('ok');
    expect(log.endTrace().stageLatencyMs).toEqual({ GENERATE: 40, FOLLOWUP: 10 });
  });

  it('warns about slow stages without degrading the trace', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new RAGLogger(100);
    const traceId = log.startTrace('q');

    log.recordLatency('RETRIEVE', 150);
    log.recordLatency('RETRIEVE', 20);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(`[RAG:${traceId}][RETRIEVE] → slow stage latencyMs=150 thresholdMs=100`);
    const summary = log.endTrace();
    expect(summary.stageLatencyMs).toEqual({ RETRIEVE: 170 });
    expect(summary.status).toBe('ok');
  });
});
