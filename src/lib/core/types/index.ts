export type * from './retrieval.types';
export type * from './source.types';
export type {
  FormatType,
  LengthClass,
  StructureStyle,
  FormatDecision,
  ChatRole,
  ConversationTurn,
  AttemptStatus,
  GenerationAttempt,
  UsageSummary,
  GenerationOutcome,
} from './generation.types';
export { ModelErrorClass } from './generation.types';
