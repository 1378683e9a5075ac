// src/ai/types.ts
import type { AIProvider } from '../config';

export type ProviderId = AIProvider;

export interface ModelInvocationOptions {
  /** Which provider to route to; defaults to AI_PROVIDER. */
  provider?: ProviderId;
  /** Concrete model id (e.g. 'anthropic/claude-3.5-sonnet' on OpenRouter). */
  model?: string;
  /** Determinism hint; only OpenAI-compatible endpoints honour it. */
  seed?: string | number;
}

/** Label used in metrics and logs for one kind of model call. */
export type AiAction = 'propose_edits' | 'analyze_consistency';
