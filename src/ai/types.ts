// src/ai/types.ts
import type { AIProvider } from '../config';

export type ProviderId = AIProvider;

export interface ModelInvocationOptions {
  /** Which provider to route to ('openai', 'anthropic' or the 'dev' stub). */
  provider?: ProviderId;
  /** Concrete model id (e.g., 'gpt-4o-mini'). */
  model?: string;
  /** Determinism hint; widen to string | number for parity across providers. */
  seed?: string | number;
}
