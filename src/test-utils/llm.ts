import { vi } from 'vitest';
import type { GenerateOptions, GenerateResult, LLMProvider } from '@/lib/core/interfaces';
import { InMemoryUsageSink, UsageTracker } from '@/lib/services/usage-tracker';
import type { ModelContext } from '@/lib/services/usage-tracker';

export type GenerateImpl = (prompt: string, options?: GenerateOptions) => Promise<GenerateResult>;

export function fakeLLM(impl: GenerateImpl, name = 'fake-llm') {
  const generate = vi.fn(impl);
  const llm: LLMProvider = {
    generate,
    getName: () => name,
    getModel: () => 'primary-large',
  };
  return { llm, generate };
}

/** Reply with fixed text and a small usage block. */
export function replyWith(content: string): GenerateImpl {
  return async () => ({ content, tokenUsage: { prompt: 10, completion: 5, total: 15 } });
}

export function failWith(error: Error): GenerateImpl {
  return async () => {
    throw error;
  };
}

export function fakeModelContext(impl: GenerateImpl, model = 'fallback-small') {
  const { llm, generate } = fakeLLM(impl);
  const sink = new InMemoryUsageSink();
  const tracker = new UsageTracker(sink);
  const ctx: ModelContext = { llm, usage: tracker.scope({ userId: 'user-1' }), model };
  return { ctx, generate, sink, tracker };
}
