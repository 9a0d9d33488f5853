// RAG SERVICE
//
// One call per question: retrieve → budget → attribute → prompt → generate → cite.
// answerQuery() never throws; every degraded path still returns a complete
// RagAnswer. Only createRagService() can throw, when configuration is missing.

import type { ConversationHistoryProvider, LLMProvider, ManifestLookup } from '@/lib/core/interfaces';
import type { AnswerMetrics, ConversationTurn, RagAnswer } from '@/lib/core/types';
import { configService } from './config';
import type { AppConfig } from './config';
import { RAGLogger } from './rag-logger';
import type { TraceSummary } from './rag-logger';
import { RetrievalPipeline } from './retrieval-pipeline';
import type { RetrieveOptions } from './retrieval-pipeline';
import type { SearchTiers } from './retrieval/two-tier-retriever';
import { UsageTracker } from './usage-tracker';
import type { ModelContext, UsageScope } from './usage-tracker';
import { ChatCompletionsProvider } from './chat-completions';
import { QueryEmbedder } from './embedders/query-embedder';
import { WeaviateExcerptTier, WeaviateSummaryTier } from './search-tiers';
import { classifyFormat, minimumCitations } from './synthesis/format-classifier';
import { budgetContext } from './synthesis/context-budget';
import { buildSynthesisPrompt } from './synthesis/prompt-builder';
import { AnswerGenerator, FALLBACK_MODEL_NAME, cannedAnswer } from './synthesis/answer-generator';
import {
  citationQualityScore,
  extractCitations,
  replacePlaceholderLabels,
  stripCitationsBlock,
} from './synthesis/citations';
import { buildSourceRecords, filterCitedSources } from './synthesis/source-attribution';
import type { StorageLocation } from './synthesis/source-attribution';
import { generateFollowUpQuestions } from './synthesis/follow-up';
import { ManifestCache, MongoManifestLookup } from '@/lib/mongodb/manifest-store';
import { MongoUsageSink } from '@/lib/mongodb/usage-sink';
import { MongoConversationHistory } from '@/lib/mongodb/conversation-history';
import { closeDatabase } from '@/lib/mongodb/client';
import { assertValid, toErrorMessage } from '@/lib/utils/errors';

export interface AnswerRequest {
  query: string;
  userId?: string;
  sessionId?: string;
  retrieval?: RetrieveOptions;
  /** Defaults to true */
  includeFollowUps?: boolean;
}

export interface RagServiceDeps {
  llm: LLMProvider;
  retrieval: RetrievalPipeline;
  generator: AnswerGenerator;
  tracker: UsageTracker;
  /** Model for expansion, reranking and follow-ups */
  utilityModel: string;
  manifest?: ManifestLookup;
  history?: ConversationHistoryProvider;
  storage?: StorageLocation;
  synthesis: AppConfig['synthesis'];
}

function toMetrics(trace: TraceSummary, citationQuality: number): AnswerMetrics {
  return {
    stageLatencyMs: { ...trace.stageLatencyMs },
    totalLatencyMs: trace.totalLatencyMs,
    citationQuality,
  };
}

export class RagService {
  constructor(private readonly deps: RagServiceDeps) {}

  async answerQuery(request: AnswerRequest): Promise<RagAnswer> {
    const log = new RAGLogger();
    const traceId = log.startTrace(request.query);
    const usage = this.deps.tracker.scope({ userId: request.userId, sessionId: request.sessionId });

    try {
      return await this.run(request, log, usage, traceId);
    } catch (error) {
      // Stages degrade on their own; this only catches the unexpected
      log.error('RESPOND', { decision: 'canned answer', error: toErrorMessage(error) });
      const format = classifyFormat(request.query);
      const text = cannedAnswer(request.query, 0, 0);
      const trace = log.endTrace();
      return {
        query: request.query,
        answer: text,
        fullAnswer: text,
        citations: [],
        sources: [],
        allSources: [],
        followUpQuestions: [],
        modelUsed: FALLBACK_MODEL_NAME,
        temperature: format.temperature,
        formatDecision: format,
        expandedQueries: [request.query],
        numSummariesUsed: 0,
        numExcerptsUsed: 0,
        usage: usage.summary(),
        optimizationsApplied: [],
        metrics: toMetrics(trace, 0),
        traceId,
      };
    }
  }

  private async run(request: AnswerRequest, log: RAGLogger, usage: UsageScope, traceId: string): Promise<RagAnswer> {
    const { query } = request;
    assertValid(query.trim() !== '', 'Query must not be empty');
    const { synthesis } = this.deps;
    const utility: ModelContext = { llm: this.deps.llm, usage, model: this.deps.utilityModel };

    const [retrieved, history] = await Promise.all([
      log.timed('RETRIEVE', () => this.deps.retrieval.execute(query, utility, request.retrieval, log)),
      this.loadHistory(request.sessionId, log),
    ]);

    const format = classifyFormat(query);
    log.format(format.formatType, format.lengthClass, format.structure);

    const context = budgetContext(retrieved.summaries, retrieved.excerpts, synthesis);
    log.context(
      context.summaries.length,
      context.excerpts.length,
      context.summaryTokens + context.excerptTokens,
      context.availableTokens
    );

    // Attribution first: its resolved titles head the prompt sections and
    // replace the positional labels in the answer
    const attribution = await buildSourceRecords(context.summaries, context.excerpts, {
      manifest: this.deps.manifest ? new ManifestCache(this.deps.manifest) : undefined,
      storage: this.deps.storage,
    });

    const prompt = buildSynthesisPrompt({
      query,
      summaries: context.summaries,
      excerpts: context.excerpts,
      format,
      history,
      historyTurns: synthesis.historyTurns,
      labels: attribution.labels,
    });

    const outcome = await log.timed('GENERATE', () =>
      this.deps.generator.generate({
        prompt,
        query,
        format,
        usage,
        summaryCount: context.summaries.length,
        excerptCount: context.excerpts.length,
        log,
      })
    );

    const fullAnswer = replacePlaceholderLabels(outcome.text, attribution.labels);
    const answer = stripCitationsBlock(fullAnswer);
    const citations = extractCitations(fullAnswer, synthesis.maxCitationLength);
    const sources = filterCitedSources(attribution.sources, citations);
    const citationQuality = citationQualityScore(citations, minimumCitations(format.lengthClass));
    log.cite(citations.length, attribution.sources.length, sources.length);

    const wantFollowUps = (request.includeFollowUps ?? true) && !outcome.fellBack;
    const followUpQuestions = wantFollowUps
      ? await log.timed('FOLLOWUP', () =>
          generateFollowUpQuestions(query, answer, utility, synthesis.followUpCount)
        )
      : [];

    const optimizationsApplied = [...retrieved.optimizationsApplied];
    if (context.truncated) optimizationsApplied.push('context_truncation');
    if (history.length > 0) optimizationsApplied.push('conversation_history');

    log.info('RESPOND', { citations: citations.length, sources: sources.length, followUps: followUpQuestions.length });
    const trace = log.endTrace();

    return {
      query,
      answer,
      fullAnswer,
      citations,
      sources,
      allSources: attribution.sources,
      followUpQuestions,
      modelUsed: outcome.modelUsed,
      temperature: outcome.temperature,
      formatDecision: format,
      expandedQueries: retrieved.variants,
      filter: retrieved.filter,
      numSummariesUsed: context.summaries.length,
      numExcerptsUsed: context.excerpts.length,
      usage: usage.summary(),
      optimizationsApplied,
      metrics: toMetrics(trace, citationQuality),
      traceId,
    };
  }

  private async loadHistory(sessionId: string | undefined, log: RAGLogger): Promise<ConversationTurn[]> {
    if (!sessionId || !this.deps.history) return [];
    try {
      return await this.deps.history.getHistory(sessionId, this.deps.synthesis.historyTurns);
    } catch (error) {
      log.warn('QUERY', { decision: 'no history', error: toErrorMessage(error) });
      return [];
    }
  }

  /** Flush pending usage records, then release the usage sink and database. */
  async close(): Promise<void> {
    await this.deps.tracker.close();
    await closeDatabase();
  }
}

/**
 * Wire the production adapters from the environment.
 * Throws ConfigurationError when required variables are missing.
 */
export function createRagService(tiers?: SearchTiers): RagService {
  const config = configService.requireConfig();

  const llm = new ChatCompletionsProvider({
    apiUrl: config.llm.apiUrl,
    apiKey: config.llm.apiKey,
    model: config.llm.model,
  });
  const embedder = new QueryEmbedder(config.embedding);
  const searchTiers: SearchTiers = tiers ?? {
    excerpts: new WeaviateExcerptTier(embedder, config.weaviate.excerptCollection),
    summaries: new WeaviateSummaryTier(embedder, config.weaviate.summaryCollection),
  };

  return new RagService({
    llm,
    retrieval: new RetrievalPipeline(searchTiers),
    generator: new AnswerGenerator(llm, config.llm.candidateModels),
    tracker: new UsageTracker(new MongoUsageSink(), llm.getName()),
    utilityModel: config.llm.utilityModel,
    manifest: new MongoManifestLookup(),
    history: new MongoConversationHistory(),
    storage: config.storage,
    synthesis: config.synthesis,
  });
}
