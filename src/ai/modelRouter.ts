/* src/ai/modelRouter.ts
   Provider-agnostic "compose text" with provider/model/seed overrides.
   The 'dev' provider is a deterministic echo so nothing leaves the process
   unless a real provider is configured.
*/
import { config } from '../config';
import type { ProviderId, ModelInvocationOptions } from './types';

export type ProviderName = ProviderId;

export interface ComposeOptions extends ModelInvocationOptions {
  systemPrompt?: string;
  maxTokens?: number;
}

export interface ComposeResult {
  text: string;
  provider: ProviderName;
  model: string;
  raw?: unknown;
}

/* ------------------------------ helpers ------------------------------ */

function normalizeSeedNumber(seed?: string | number): number | undefined {
  if (seed == null) return undefined;
  const n = typeof seed === 'number' ? seed : Number(String(seed).trim());
  return Number.isFinite(n) ? Math.floor(n) : undefined;
}

/** Anthropic returns content blocks; keep the text ones. */
function anthropicBlocksToText(content: ReadonlyArray<{ type: string; text?: string }>): string {
  const out: string[] = [];
  for (const part of content) {
    if (part.type === 'text' && typeof part.text === 'string') {
      const t = part.text.trim();
      if (t) out.push(t);
    }
  }
  return out.join('\n\n').trim();
}

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical text generation entry.
 */
export async function composeText(
  prompt: string,
  opts: ComposeOptions = {}
): Promise<ComposeResult> {
  const provider: ProviderName = opts.provider ?? config.ai.provider;

  if (provider === 'dev') {
    const model = opts.model || 'dev-stub-1';
    const text = `Draft:\n${prompt}\n\n[dev stub; deterministic]`;
    return { text, provider, model };
  }

  if (provider === 'openai') {
    const { default: OpenAI } = await import('openai');
    const client = new OpenAI({ apiKey: config.ai.openaiKey });
    const model = opts.model || config.ai.model.openai;

    const resp = await client.chat.completions.create({
      model,
      messages: [
        ...(opts.systemPrompt ? [{ role: 'system' as const, content: opts.systemPrompt }] : []),
        { role: 'user' as const, content: prompt },
      ],
      max_tokens: opts.maxTokens ?? 600,
      seed: normalizeSeedNumber(opts.seed),
    });

    const text = (resp.choices[0]?.message?.content ?? '').trim();
    return { text, provider, model, raw: resp };
  }

  if (provider === 'anthropic') {
    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    const client = new Anthropic({ apiKey: config.ai.anthropicKey });
    const model = opts.model || config.ai.model.anthropic;

    const resp = await client.messages.create({
      model,
      max_tokens: opts.maxTokens ?? 600,
      system: opts.systemPrompt || undefined,
      messages: [{ role: 'user', content: [{ type: 'text', text: prompt }] }],
    });

    const text = anthropicBlocksToText(resp.content);
    return { text, provider, model, raw: resp };
  }

  throw new Error(`Unsupported AI provider: ${String(provider)}`);
}
