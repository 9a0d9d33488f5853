import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AnswerGenerator,
  FALLBACK_MODEL_NAME,
  advanceGeneration,
  cannedAnswer,
  initialGenerationState,
} from './answer-generator';
import { classifyFormat } from './format-classifier';
import { ModelErrorClass } from '@/lib/core/types';
import { ExternalServiceError, RateLimitError } from '@/lib/utils/errors';
import { fakeLLM } from '@/test-utils/llm';
import { InMemoryUsageSink, UsageTracker } from '../usage-tracker';

const CANDIDATES = ['primary-large', 'fallback-medium', 'fallback-small'];
const format = classifyFormat('What is AML?');

function setup(impl: Parameters<typeof fakeLLM>[0]) {
  const { llm, generate } = fakeLLM(impl);
  const sink = new InMemoryUsageSink();
  const tracker = new UsageTracker(sink);
  const usage = tracker.scope({ sessionId: 'session-1' });
  const generator = new AnswerGenerator(llm, CANDIDATES);
  const run = () =>
    generator.generate({ prompt: 'prompt', query: 'What is AML?', format, usage, summaryCount: 2, excerptCount: 4 });
  return { generate, sink, tracker, usage, run };
}

describe('advanceGeneration', () => {
  it('starts at the first candidate, or exhausted with none', () => {
    expect(initialGenerationState(3)).toEqual({ status: 'attempting', index: 0 });
    expect(initialGenerationState(0)).toEqual({ status: 'exhausted' });
  });

  it('moves to the next candidate on failure and exhausts after the last', () => {
    const fail = { ok: false, errorClass: ModelErrorClass.RateLimited } as const;
    expect(advanceGeneration({ status: 'attempting', index: 0 }, fail, 2)).toEqual({ status: 'attempting', index: 1 });
    expect(advanceGeneration({ status: 'attempting', index: 1 }, fail, 2)).toEqual({ status: 'exhausted' });
  });

  it('succeeds with the reply text and leaves terminal states alone', () => {
    const success = advanceGeneration({ status: 'attempting', index: 1 }, { ok: true, text: 'hi' }, 3);
    expect(success).toEqual({ status: 'succeeded', index: 1, text: 'hi' });
    expect(advanceGeneration(success, { ok: true, text: 'other' }, 3)).toBe(success);
  });
});

describe('AnswerGenerator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first successful reply', async () => {
    const { generate, run } = setup(async () => ({ content: 'AML is ...' }));

    const outcome = await run();

    expect(outcome).toMatchObject({ text: 'AML is ...', modelUsed: 'primary-large', fellBack: false });
    expect(outcome.temperature).toBe(format.temperature);
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith('prompt', {
      model: 'primary-large',
      temperature: format.temperature,
      maxTokens: format.maxOutputTokens,
    });
  });

  it('falls through rate limits at WARN and other errors at ERROR', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { generate, run, tracker, sink } = setup(async (_prompt, options) => {
      if (options?.model === 'primary-large') throw new RateLimitError('HTTP 429');
      if (options?.model === 'fallback-medium') throw new ExternalServiceError('llm', 'bad gateway', 502);
      return { content: 'from small' };
    });

    const outcome = await run();
    await tracker.flush();

    expect(outcome.modelUsed).toBe('fallback-small');
    expect(outcome.attempts.map((a) => [a.model, a.status, a.errorClass])).toEqual([
      ['primary-large', 'error', ModelErrorClass.RateLimited],
      ['fallback-medium', 'error', ModelErrorClass.Other],
      ['fallback-small', 'success', undefined],
    ]);
    expect(sink.records).toHaveLength(3);
    expect(generate).toHaveBeenCalledTimes(3);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('returns the canned answer when every candidate fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { run } = setup(async () => {
      throw new RateLimitError('quota exceeded');
    });

    const outcome = await run();

    expect(outcome.modelUsed).toBe(FALLBACK_MODEL_NAME);
    expect(outcome.fellBack).toBe(true);
    expect(outcome.text).toBe(cannedAnswer('What is AML?', 2, 4));
    expect(outcome.text).toContain('2 relevant document summaries and 4 relevant excerpts');
    expect(outcome.attempts).toHaveLength(3);
    expect(outcome.attempts.every((a) => a.errorClass === ModelErrorClass.QuotaExceeded)).toBe(true);
  });

  it('freezes its candidate list', () => {
    const source = ['a', 'b'];
    const generator = new AnswerGenerator(fakeLLM(async () => ({ content: '' })).llm, source);
    source.push('c');

    expect(generator.getCandidates()).toEqual(['a', 'b']);
    expect(Object.isFrozen(generator.getCandidates())).toBe(true);
  });
});
