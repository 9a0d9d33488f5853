// ANSWER GENERATOR
//
// Walks the candidate models in order until one answers.
//
//   attempting(i) ── success ──────────→ succeeded(i)
//        │
//        └── failure ── i+1 < n ──→ attempting(i+1)
//                    └─ otherwise ─→ exhausted
//
// Every failure advances; the class only decides the log level
// (throttling/quota → WARN, anything else → ERROR). Exhaustion yields a
// canned answer with modelUsed "fallback-none". generate() never throws.

import type { LLMProvider } from '@/lib/core/interfaces';
import type { FormatDecision, GenerationOutcome, ModelErrorClass } from '@/lib/core/types';
import type { RAGLogger } from '../rag-logger';
import type { UsageScope } from '../usage-tracker';
import { configService } from '../config';
import { toErrorMessage } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';
import { classifyModelError, isCapacityError } from './error-classifier';

export const FALLBACK_MODEL_NAME = 'fallback-none';

export type GenerationState =
  | { status: 'attempting'; index: number }
  | { status: 'succeeded'; index: number; text: string }
  | { status: 'exhausted' };

export type AttemptResult =
  | { ok: true; text: string }
  | { ok: false; errorClass: ModelErrorClass };

export function initialGenerationState(candidateCount: number): GenerationState {
  return candidateCount > 0 ? { status: 'attempting', index: 0 } : { status: 'exhausted' };
}

/**
 * Next state after one attempt. Terminal states are returned unchanged.
 */
export function advanceGeneration(
  state: GenerationState,
  result: AttemptResult,
  candidateCount: number
): GenerationState {
  if (state.status !== 'attempting') return state;
  if (result.ok) return { status: 'succeeded', index: state.index, text: result.text };

  const next = state.index + 1;
  return next < candidateCount ? { status: 'attempting', index: next } : { status: 'exhausted' };
}

export function cannedAnswer(query: string, summaryCount: number, excerptCount: number): string {
  return (
    `I apologize, but I'm currently experiencing high demand. ` +
    `However, I found ${summaryCount} relevant document summaries and ${excerptCount} relevant excerpts ` +
    `with information about: ${query}\n\nPlease try again in a few moments.`
  );
}

export interface GenerateAnswerInput {
  prompt: string;
  query: string;
  format: FormatDecision;
  usage: UsageScope;
  summaryCount: number;
  excerptCount: number;
  log?: RAGLogger;
}

export class AnswerGenerator {
  private readonly candidates: readonly string[];

  constructor(
    private readonly llm: LLMProvider,
    candidates: readonly string[] = configService.getLLMConfig().candidateModels
  ) {
    this.candidates = Object.freeze([...candidates]);
  }

  getCandidates(): readonly string[] {
    return this.candidates;
  }

  async generate(input: GenerateAnswerInput): Promise<GenerationOutcome> {
    const { format, usage, log } = input;
    const firstAttempt = usage.attempts.length;
    const started = Date.now();
    let state = initialGenerationState(this.candidates.length);

    while (state.status === 'attempting') {
      const model = this.candidates[state.index];
      debug.generate.log(`Attempting model: ${model}`);

      let result: AttemptResult;
      try {
        const { result: reply } = await usage.generate(this.llm, input.prompt, {
          operation: 'answer',
          options: { model, temperature: format.temperature, maxTokens: format.maxOutputTokens },
        });
        result = { ok: true, text: reply.content };
      } catch (error) {
        const errorClass = classifyModelError(error);
        this.reportFailure(model, errorClass, toErrorMessage(error), log);
        result = { ok: false, errorClass };
      }

      state = advanceGeneration(state, result, this.candidates.length);
    }

    const attempts = usage.attempts.slice(firstAttempt);

    if (state.status === 'succeeded') {
      const modelUsed = this.candidates[state.index];
      log?.generate(modelUsed, attempts.length, Date.now() - started);
      return { text: state.text, modelUsed, temperature: format.temperature, attempts, fellBack: false };
    }

    if (log) {
      log.error('GENERATE', { decision: 'canned answer', attempts: attempts.length });
    } else {
      console.error(`[Generate] All ${this.candidates.length} models failed, returning canned answer`);
    }
    return {
      text: cannedAnswer(input.query, input.summaryCount, input.excerptCount),
      modelUsed: FALLBACK_MODEL_NAME,
      temperature: format.temperature,
      attempts,
      fellBack: true,
    };
  }

  private reportFailure(model: string, errorClass: ModelErrorClass, message: string, log?: RAGLogger): void {
    const data = { model, errorClass, error: message.substring(0, 200), decision: 'next candidate' };
    if (isCapacityError(errorClass)) {
      if (log) log.warn('GENERATE', data);
      else console.warn(`[Generate] Model ${model} unavailable (${errorClass}): ${message}`);
    } else {
      if (log) log.error('GENERATE', data);
      else console.error(`[Generate] Model ${model} failed: ${message}`);
    }
  }
}
