// src/extraction/inference.ts
// Model-backed semantic inference for the Type Classifier.
// The model is asked for a JSON object naming one slot type and a confidence.

import { composeText, type ComposeOptions } from '../ai/modelRouter';
import { createLogger } from '../observability/logger';
import { SLOT_TYPES, isSlotType } from './types';
import type { ContextWindow, InferenceAdvice, SemanticInference } from './types';

const log = createLogger('extraction/inference');

const SYSTEM_PROMPT = [
  'You classify placeholders in legal documents.',
  `Reply with a single JSON object with the keys "type" (one of: ${SLOT_TYPES.join(', ')})`,
  'and "confidence" (a number between 0 and 1). No other text.',
].join(' ');

function buildInferencePrompt(spanText: string, context: ContextWindow): string {
  return [
    `Placeholder: ${spanText}`,
    `Text before: ${context.before}`,
    `Text after: ${context.after}`,
  ].join('\n');
}

function stripCodeFences(s: string): string {
  let out = s.trim();
  if (out.startsWith('```')) {
    const firstNl = out.indexOf('\n');
    if (firstNl !== -1) out = out.slice(firstNl + 1);
    const lastFence = out.lastIndexOf('```');
    if (lastFence !== -1) out = out.slice(0, lastFence);
    out = out.trim();
  }
  return out;
}

function parseJsonLoose(raw: string): unknown {
  const text = stripCodeFences(raw);
  try {
    return JSON.parse(text);
  } catch {
    const match = text.match(/\{[\s\S]*\}/);
    if (!match) return null;
    try {
      return JSON.parse(match[0]);
    } catch {
      return null;
    }
  }
}

/**
 * Read { type, confidence } out of a model reply.
 * Anything else (prose, unknown type, missing confidence) yields null.
 */
export function parseInferenceReply(raw: string): InferenceAdvice | null {
  const json = parseJsonLoose(raw);
  if (!json || typeof json !== 'object') return null;

  const type: unknown = Reflect.get(json, 'type');
  const confidence: unknown = Reflect.get(json, 'confidence');
  if (!isSlotType(type)) return null;
  if (typeof confidence !== 'number' || !Number.isFinite(confidence)) return null;

  return { type, confidence: Math.min(1, Math.max(0, confidence)) };
}

/**
 * SemanticInference that routes through composeText.
 * Provider errors propagate; the classifier absorbs them.
 */
export function createModelInference(opts: ComposeOptions = {}): SemanticInference {
  return async (spanText, context) => {
    const result = await composeText(buildInferencePrompt(spanText, context), {
      ...opts,
      systemPrompt: SYSTEM_PROMPT,
      maxTokens: opts.maxTokens ?? 60,
    });

    // the dev stub only echoes its prompt
    if (result.provider === 'dev') return null;

    const advice = parseInferenceReply(result.text);
    if (!advice) {
      log.debug({ provider: result.provider, model: result.model }, 'unusable inference reply');
    }
    return advice;
  };
}
