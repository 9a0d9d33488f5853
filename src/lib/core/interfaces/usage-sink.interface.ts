import type { GenerationAttempt } from '../types';

/** Append-only destination for model call records */
export interface UsageSink {
  append(record: GenerationAttempt): Promise<void>;
  close?(): Promise<void>;
}
