export interface GenerateOptions {
  /** Overrides the provider's default model for this call */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  topP?: number;
}

export interface GenerateResult {
  content: string;
  model?: string;
  tokenUsage?: {
    prompt: number;
    completion: number;
    total: number;
  };
}

export interface LLMProvider {
  /**
   * Generate text completion.
   * Throttling and exhausted quota surface as RateLimitError.
   */
  generate(prompt: string, options?: GenerateOptions): Promise<GenerateResult>;

  /**
   * Provider name
   */
  getName(): string;

  /**
   * Default model name
   */
  getModel(): string;
}
