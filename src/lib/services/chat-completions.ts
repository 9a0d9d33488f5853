// CHAT COMPLETIONS PROVIDER
//
// LLM client for any OpenAI-compatible /v1/chat/completions endpoint.
// Used for: 1) Query expansion, 2) Reranking, 3) Answer generation, 4) Follow-ups
//
// Throttling (HTTP 429) and exhausted quota surface as RateLimitError so the
// answer generator can move to the next model. Everything else is
// ExternalServiceError carrying the HTTP status.

import type { GenerateOptions, GenerateResult, LLMProvider } from '@/lib/core/interfaces';
import { ExternalServiceError, RateLimitError } from '@/lib/utils/errors';
import { debug } from '@/lib/utils/debug';

const QUOTA_PATTERN = /quota|insufficient_quota|billing/i;

interface ChatCompletionBody {
  content: string;
  model?: string;
  usage?: { prompt: number; completion: number; total: number };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/**
 * Pull the first choice's text and the usage block out of a response body.
 * Returns null when the body does not have the expected shape.
 */
export function parseChatCompletion(data: unknown): ChatCompletionBody | null {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) return null;

  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message) || typeof first.message.content !== 'string') {
    return null;
  }

  const body: ChatCompletionBody = { content: first.message.content };
  if (typeof data.model === 'string') body.model = data.model;

  if (isRecord(data.usage)) {
    const prompt = numberOr(data.usage.prompt_tokens, 0);
    const completion = numberOr(data.usage.completion_tokens, 0);
    body.usage = {
      prompt,
      completion,
      total: numberOr(data.usage.total_tokens, prompt + completion),
    };
  }

  return body;
}

/** Remove reasoning traces some models emit before the answer. */
export function stripReasoning(text: string): string {
  return text
    .replace(/<think>[\s\S]*?<\/think>/g, '')
    .replace(/^Thought:.*(\n|$)/gim, '')
    .trim();
}

export interface ChatCompletionsConfig {
  apiUrl: string;
  apiKey: string;
  model: string;
  /** Provider label written to the usage log */
  name?: string;
}

export class ChatCompletionsProvider implements LLMProvider {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private name: string;

  constructor(config: ChatCompletionsConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.name = config.name ?? 'chat-completions';
    // Remove trailing slash to prevent double slash in URL
    this.baseUrl = config.apiUrl.endsWith('/') ? config.apiUrl.slice(0, -1) : config.apiUrl;
  }

  getName(): string {
    return this.name;
  }

  getModel(): string {
    return this.model;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerateResult> {
    const model = options.model ?? this.model;
    const messages = [
      ...(options.systemPrompt ? [{ role: 'system', content: options.systemPrompt }] : []),
      { role: 'user', content: prompt },
    ];

    const payload = {
      model,
      messages,
      max_tokens: options.maxTokens ?? 1000,
      temperature: options.temperature ?? 0.2,
      top_p: options.topP ?? 0.95,
    };

    debug.generate.log(`POST ${this.baseUrl}/v1/chat/completions`, { model, promptChars: prompt.length });

    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const errorText = (await response.text()).substring(0, 200);
      if (response.status === 429 || QUOTA_PATTERN.test(errorText)) {
        throw new RateLimitError(`${model} (HTTP ${response.status}): ${errorText}`);
      }
      throw new ExternalServiceError(this.name, `${model} (HTTP ${response.status}): ${errorText}`, response.status);
    }

    const data: unknown = await response.json();
    const parsed = parseChatCompletion(data);
    if (!parsed) {
      throw new ExternalServiceError(this.name, `${model}: malformed completion response`);
    }

    return {
      content: stripReasoning(parsed.content),
      model: parsed.model ?? model,
      tokenUsage: parsed.usage,
    };
  }
}
