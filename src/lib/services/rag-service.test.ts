import { describe, it, expect, vi, afterEach } from 'vitest';
import { RagService } from './rag-service';
import type { RagServiceDeps } from './rag-service';
import { RetrievalPipeline } from './retrieval-pipeline';
import { AnswerGenerator, cannedAnswer } from './synthesis/answer-generator';
import { InMemoryUsageSink, UsageTracker } from './usage-tracker';
import type { ConversationHistoryProvider, ManifestLookup, SearchTier } from '@/lib/core/interfaces';
import type { ExcerptItem, SummaryItem } from '@/lib/core/types';
import { RateLimitError } from '@/lib/utils/errors';
import { excerpt, summary } from '@/test-utils/fixtures';
import { fakeLLM } from '@/test-utils/llm';
import type { GenerateImpl } from '@/test-utils/llm';

const SYNTHESIS = {
  maxContextTokens: 24000,
  overheadTokens: 2000,
  summaryShare: 0.2,
  minSummaryTokens: 100,
  minExcerptTokens: 200,
  rerankPreviewChars: 300,
  historyTurns: 6,
  maxCitationLength: 200,
  followUpCount: 3,
};

const ANSWER = 'AML means anti-money laundering [Document 1, Page 3].\n\n---CITATIONS---\nCITED: AML Handbook (Page 3)';

// Follow-up prompts are told to "generate N relevant follow-up questions"
function scripted(answer: GenerateImpl): GenerateImpl {
  return async (prompt, options) =>
    prompt.includes('relevant follow-up questions') ? { content: 'What is CDD?' } : answer(prompt, options);
}

interface TierItems {
  excerpts?: ExcerptItem[];
  summaries?: SummaryItem[];
}

function setup(impl: GenerateImpl, extra: Partial<RagServiceDeps> = {}, items: TierItems = {}) {
  const excerpts: SearchTier<ExcerptItem> = {
    kind: 'excerpt',
    search: async () =>
      items.excerpts ?? [
      excerpt('e1', {
        sourceId: 'doc1',
        title: 'AML Handbook',
        filename: 'aml.pdf',
        location: { page: 3 },
        content: 'Anti-money laundering (AML) covers ...',
      }),
      ],
  };
  const summaries: SearchTier<SummaryItem> = {
    kind: 'summary',
    search: async () =>
      items.summaries ?? [summary('s1', { sourceId: 'doc1', title: 'AML Handbook', summaryText: 'Handbook on AML.' })],
  };
  const { llm, generate } = fakeLLM(scripted(impl));
  const sink = new InMemoryUsageSink();
  const retrieval = new RetrievalPipeline(
    { excerpts, summaries },
    {
      enableQueryExpansion: true,
      enableReranking: true,
      enableDeduplication: true,
      enableAdaptiveLimits: true,
      rrfK: 60,
      rerankPreviewChars: 300,
      filterLogic: 'OR',
    }
  );
  const service = new RagService({
    llm,
    retrieval,
    generator: new AnswerGenerator(llm, ['primary-large', 'fallback-medium']),
    tracker: new UsageTracker(sink),
    utilityModel: 'fallback-medium',
    synthesis: SYNTHESIS,
    ...extra,
  });
  return { service, generate, sink, retrieval };
}

describe('RagService.answerQuery', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers with normalized citations and the cited source', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { service } = setup(async () => ({ content: ANSWER }));

    const result = await service.answerQuery({ query: 'What is AML?' });

    expect(result.answer).toBe('AML means anti-money laundering [AML Handbook, Page 3].');
    expect(result.fullAnswer).toBe(
      'AML means anti-money laundering [AML Handbook, Page 3].\n\n---CITATIONS---\nCITED: AML Handbook (Page 3)'
    );
    expect(result.citations).toEqual(['[AML Handbook, Page 3]']);
    expect(result.sources).toHaveLength(1);
    expect(result.sources[0]).toMatchObject({ sourceId: 'doc1', title: 'AML Handbook', pages: [3], pageRange: '3' });
    expect(result.modelUsed).toBe('primary-large');
    expect(result.formatDecision.formatType).toBe('factual_answer');
    expect(result.expandedQueries).toEqual(['What is AML?']);
    expect(result.numSummariesUsed).toBe(1);
    expect(result.numExcerptsUsed).toBe(1);
    expect(result.followUpQuestions).toEqual(['What is CDD?']);
    expect(result.usage).toMatchObject({ calls: 2, failures: 0 });
    expect(result.traceId).toHaveLength(8);
    // one citation against a minimum of 3 (medium), from one source
    expect(result.metrics.citationQuality).toBeCloseTo(0.6667, 4);
    expect(Object.keys(result.metrics.stageLatencyMs)).toEqual(['RETRIEVE', 'GENERATE', 'FOLLOWUP']);
  });

  it('returns the canned answer without calling a model for an empty query', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { service, generate } = setup(async () => ({ content: ANSWER }));

    const result = await service.answerQuery({ query: '   ' });

    expect(generate).not.toHaveBeenCalled();
    expect(result.modelUsed).toBe('fallback-none');
    expect(result.answer).toBe(cannedAnswer('   ', 0, 0));
    expect(result.metrics).toMatchObject({ citationQuality: 0, stageLatencyMs: {} });
    expect(errorSpy).toHaveBeenCalledWith(
      `[RAG:${result.traceId}][RESPOND] → canned answer error=Query must not be empty`
    );
  });

  it('returns the canned answer when every model fails', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { service, sink } = setup(async () => {
      throw new RateLimitError('HTTP 429');
    });

    const result = await service.answerQuery({ query: 'What is AML?', userId: 'user-1' });

    expect(result.modelUsed).toBe('fallback-none');
    expect(result.answer).toBe(cannedAnswer('What is AML?', 1, 1));
    expect(result.citations).toEqual([]);
    expect(result.sources).toEqual([]);
    expect(result.allSources.map((s) => s.sourceId)).toEqual(['doc1']);
    expect(result.followUpQuestions).toEqual([]);
    expect(result.usage).toMatchObject({ calls: 2, failures: 2 });
    await service.answerQuery({ query: 'What is AML?' });
    expect(sink.records.filter((r) => r.userId === 'user-1')).toHaveLength(2);
  });

  it('puts recent conversation turns into the prompt', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const getHistory = vi.fn(async () => [
      { role: 'user' as const, content: 'What is CDD?' },
      { role: 'assistant' as const, content: 'Customer due diligence.' },
    ]);
    const history: ConversationHistoryProvider = { getHistory };
    const { service, generate } = setup(async () => ({ content: ANSWER }), { history });

    const result = await service.answerQuery({ query: 'What is AML?', sessionId: 'session-1', includeFollowUps: false });

    expect(getHistory).toHaveBeenCalledWith('session-1', 6);
    expect(generate.mock.calls[0][0]).toContain('CONVERSATION HISTORY:\nUser: What is CDD?\nAssistant: Customer due diligence.');
    expect(result.optimizationsApplied).toContain('conversation_history');
    expect(result.followUpQuestions).toEqual([]);
  });

  it('answers without history when the history store fails', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const history: ConversationHistoryProvider = {
      getHistory: async () => {
        throw new Error('mongo down');
      },
    };
    const { service } = setup(async () => ({ content: ANSWER }), { history });

    const result = await service.answerQuery({ query: 'What is AML?', sessionId: 'session-1' });

    expect(result.modelUsed).toBe('primary-large');
    expect(result.optimizationsApplied).not.toContain('conversation_history');
  });

  it('uses the same resolved title in the prompt and in rewritten citations', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const manifest: ManifestLookup = {
      getSource: async (sourceId) => ({ sourceId, title: 'AML Handbook 2024' }),
    };
    const { service, generate } = setup(
      async () => ({ content: 'AML is defined in [Document 1].' }),
      { manifest },
      {
        summaries: [summary('s1', { sourceId: 'doc9', summaryText: 'Handbook on AML.' })],
        excerpts: [excerpt('e1', { sourceId: 'doc9', filename: 'aml-2024.pdf', location: { page: 3 } })],
      }
    );

    const result = await service.answerQuery({ query: 'What is AML?', includeFollowUps: false });

    const prompt = generate.mock.calls[0][0];
    expect(prompt).toContain('[Document 1] AML Handbook 2024\n');
    expect(prompt).toContain('[Chunk 1] AML Handbook 2024\naml-2024.pdf | Page 3');
    expect(result.answer).toBe('AML is defined in [AML Handbook 2024].');
    expect(result.sources.map((src) => src.sourceId)).toEqual(['doc9']);
  });

  it('never throws, even when a stage fails unexpectedly', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { service, retrieval } = setup(async () => ({ content: ANSWER }));
    vi.spyOn(retrieval, 'execute').mockRejectedValue(new Error('boom'));

    const result = await service.answerQuery({ query: 'What is AML?' });

    expect(result.modelUsed).toBe('fallback-none');
    expect(result.answer).toBe(cannedAnswer('What is AML?', 0, 0));
    expect(result.expandedQueries).toEqual(['What is AML?']);
  });
});
