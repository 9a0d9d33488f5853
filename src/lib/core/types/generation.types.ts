export type FormatType =
  | 'brief_summary'
  | 'social_media'
  | 'blog_post'
  | 'newsletter'
  | 'outline'
  | 'protocol'
  | 'comprehensive_analysis'
  | 'report'
  | 'factual_answer'
  | 'general_answer';

export type LengthClass = 'brief' | 'medium' | 'long' | 'comprehensive';

export type StructureStyle =
  | 'bullet_points'
  | 'single_paragraph'
  | 'paragraphs'
  | 'sections'
  | 'numbered_steps'
  | 'hierarchical';

export interface FormatDecision {
  formatType: FormatType;
  lengthClass: LengthClass;
  structure: StructureStyle;
  temperature: number;
  maxOutputTokens: number;
  proseStyle: string;
}

export type ChatRole = 'user' | 'assistant' | 'system';

export interface ConversationTurn {
  role: ChatRole;
  content: string;
}

/** Closed classification of a failed model call */
export enum ModelErrorClass {
  RateLimited = 'rate_limited',
  QuotaExceeded = 'quota_exceeded',
  Other = 'other',
}

export type AttemptStatus = 'success' | 'error';

/** One model call, as written to the usage log */
export interface GenerationAttempt {
  id: string;
  timestamp: string;
  /** Pipeline step that made the call, e.g. "answer" or "rerank" */
  operation: string;
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  latencyMs: number;
  status: AttemptStatus;
  errorMessage?: string;
  errorClass?: ModelErrorClass;
  userId?: string;
  sessionId?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface UsageSummary {
  calls: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  latencyMs: number;
  byModel: Record<string, { calls: number; failures: number; totalTokens: number }>;
}

export interface GenerationOutcome {
  text: string;
  /** Model that produced `text`, or "fallback-none" when every candidate failed */
  modelUsed: string;
  temperature: number;
  attempts: GenerationAttempt[];
  fellBack: boolean;
}
