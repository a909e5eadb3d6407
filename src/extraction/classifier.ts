// src/extraction/classifier.ts
// Type Classifier: assigns a SlotType and a user-facing prompt to a span.
//
// Heuristics first (token words, then nearby context words, then free_text).
// An optional semantic-inference collaborator may override a non-token
// decision when it answers confidently within the timeout.

import type { Logger } from 'pino';
import keywordData from './keywords.json';
import { ClassifierUnavailableError } from '../errors';
import { createLogger } from '../observability/logger';
import { recordInference } from '../observability/metrics';
import { withTimeout } from '../utils/withTimeout';
import { isSlotType } from './types';
import type {
  CandidateSpan,
  Classification,
  ContextWindow,
  SemanticInference,
  SlotType,
} from './types';

/* ============= Keywords ============= */

export type KeywordType = Exclude<SlotType, 'free_text'>;
export type KeywordTable = Record<KeywordType, readonly string[]>;

/** First matching type wins when one word set hits several lists */
export const TYPE_CHECK_ORDER: readonly KeywordType[] = [
  'email',
  'phone',
  'date',
  'duration',
  'percentage',
  'monetary_amount',
  'address',
  'organization_name',
  'person_name',
  'number',
];

function loadKeywords(data: Record<string, unknown>): KeywordTable {
  const read = (type: KeywordType): readonly string[] => {
    const list = data[type];
    if (!Array.isArray(list)) return [];
    return list.filter((w): w is string => typeof w === 'string').map((w) => w.toLowerCase());
  };
  return {
    email: read('email'),
    phone: read('phone'),
    date: read('date'),
    duration: read('duration'),
    percentage: read('percentage'),
    monetary_amount: read('monetary_amount'),
    address: read('address'),
    organization_name: read('organization_name'),
    person_name: read('person_name'),
    number: read('number'),
  };
}

export const DEFAULT_KEYWORDS: KeywordTable = loadKeywords(keywordData);

/* ============= Words ============= */

/**
 * Lower-cased words of a label or context string. "#" counts as a word.
 * "clientName2" -> ["client", "name", "2"], "E-mail" -> ["e", "mail"],
 * "Invoice #" -> ["invoice", "#"]
 */
export function wordsOf(text: string): string[] {
  return text
    .replace(/(\p{Ll})(\p{Lu})/gu, '$1 $2')
    .replace(/(\p{L})(\p{N})/gu, '$1 $2')
    .replace(/(\p{N})(\p{L})/gu, '$1 $2')
    .replace(/#/g, ' # ')
    .toLowerCase()
    .split(/[^\p{L}\p{N}#]+/u)
    .filter(Boolean);
}

function typeOfWords(words: readonly string[], keywords: KeywordTable): KeywordType | null {
  if (words.length === 0) return null;
  for (const type of TYPE_CHECK_ORDER) {
    if (words.some((w) => keywords[type].includes(w))) return type;
  }
  return null;
}

/* ============= Heuristics ============= */

export interface HeuristicOptions {
  /** Words searched on each side of the span */
  contextWords?: number;
  keywords?: KeywordTable;
}

export interface SpanHints {
  /** Cleaned label; derived from spanText when omitted */
  label?: string | null;
  typeHint?: SlotType | null;
}

const DEFAULT_CONTEXT_WORDS = 6;

/** Label of a raw token when the caller did not supply one */
function labelFromToken(spanText: string): string | null {
  const cleaned = spanText
    .replace(/^[[{]+|[\]}]+$/g, '')
    .replace(/[_＿‗]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return /\p{L}/u.test(cleaned) ? cleaned : null;
}

function contextType(
  context: ContextWindow,
  keywords: KeywordTable,
  maxWords: number
): KeywordType | null {
  const left = wordsOf(context.before).reverse().slice(0, maxWords);
  const right = wordsOf(context.after).slice(0, maxWords);

  for (let d = 0; d < maxWords; d++) {
    if (d < left.length) {
      const hit = typeOfWords([left[d]], keywords);
      if (hit) return hit;
    }
    if (d < right.length) {
      const hit = typeOfWords([right[d]], keywords);
      if (hit) return hit;
    }
  }
  return null;
}

/**
 * Synchronous, deterministic classification.
 */
export function classifyHeuristic(
  spanText: string,
  context: ContextWindow,
  hints: SpanHints = {},
  options: HeuristicOptions = {}
): Classification {
  const keywords = options.keywords ?? DEFAULT_KEYWORDS;
  const label = hints.label !== undefined ? hints.label : labelFromToken(spanText);

  if (hints.typeHint) {
    return { type: hints.typeHint, prompt: buildPrompt(hints.typeHint, label, context), source: 'token' };
  }

  // "[#]" has no label but still names its type
  const fromToken = typeOfWords(wordsOf(label ?? spanText), keywords);
  if (fromToken) {
    return { type: fromToken, prompt: buildPrompt(fromToken, label, context), source: 'token' };
  }

  const fromContext = contextType(context, keywords, options.contextWords ?? DEFAULT_CONTEXT_WORDS);
  if (fromContext) {
    return { type: fromContext, prompt: buildPrompt(fromContext, label, context), source: 'context' };
  }

  return { type: 'free_text', prompt: buildPrompt('free_text', label, context), source: 'fallback' };
}

/* ============= Prompts ============= */

const PROMPT_PARTS: Record<SlotType, { what: string; example?: string }> = {
  person_name: { what: 'the full name' },
  organization_name: { what: 'the legal name of the organization' },
  date: { what: 'the date', example: 'March 1, 2024' },
  monetary_amount: { what: 'the amount', example: '$1,500.00' },
  address: { what: 'the full address' },
  duration: { what: 'the duration', example: '30 days' },
  free_text: { what: 'the text' },
  email: { what: 'the email address' },
  phone: { what: 'the phone number' },
  percentage: { what: 'the percentage', example: '5%' },
  number: { what: 'the number', example: '100' },
};

const SNIPPET_WORDS = 5;

function tailWords(text: string, n: number): string {
  const words = text.split(/\s+/).filter(Boolean).slice(-n);
  if (words.length === 0) return '';
  return words.join(' ') + (/\s$/.test(text) ? ' ' : '');
}

function headWords(text: string, n: number): string {
  const words = text.split(/\s+/).filter(Boolean).slice(0, n);
  if (words.length === 0) return '';
  return (/^\s/.test(text) ? ' ' : '') + words.join(' ');
}

/** "...dated ____." with the span shown as a short blank */
export function contextSnippet(context: ContextWindow): string {
  return `${tailWords(context.before, SNIPPET_WORDS)}____${headWords(context.after, SNIPPET_WORDS)}`;
}

/**
 * Deterministic prompt for a slot.
 * Labelled slots name their label; unlabelled blanks quote their surroundings.
 */
export function buildPrompt(type: SlotType, label: string | null, context: ContextWindow): string {
  const { what, example } = PROMPT_PARTS[type];
  const target = label ? `"${label}"` : 'the blank below';
  const hint = example ? ` (for example, ${example})` : '';
  const question = `Please provide ${what} for ${target}${hint}.`;
  return label ? question : `${question}\n> ${contextSnippet(context)}`;
}

/* ============= Classifier ============= */

export interface TypeClassifierOptions extends HeuristicOptions {
  inference?: SemanticInference | null;
  timeoutMs?: number;
  minConfidence?: number;
  logger?: Logger;
}

type ClassifierInput = Pick<CandidateSpan, 'rawToken' | 'label' | 'typeHint'>;

/**
 * Heuristics plus optional advisory inference.
 * Inference failures never escape: they are logged and the heuristic
 * answer stands.
 */
export class TypeClassifier {
  private readonly inference: SemanticInference | null;
  private readonly timeoutMs: number;
  private readonly minConfidence: number;
  private readonly heuristics: HeuristicOptions;
  private readonly log: Logger;

  constructor(options: TypeClassifierOptions = {}) {
    this.inference = options.inference ?? null;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.minConfidence = options.minConfidence ?? 0.75;
    this.heuristics = { contextWords: options.contextWords, keywords: options.keywords };
    this.log = options.logger ?? createLogger('extraction/classifier');
  }

  classifySync(span: ClassifierInput, context: ContextWindow): Classification {
    return classifyHeuristic(
      span.rawToken,
      context,
      { label: span.label, typeHint: span.typeHint },
      this.heuristics
    );
  }

  async classify(span: ClassifierInput, context: ContextWindow): Promise<Classification> {
    const heuristic = this.classifySync(span, context);
    if (!this.inference || heuristic.source === 'token') return heuristic;

    try {
      const advice = await this.infer(this.inference, span.rawToken, context);
      if (!advice || advice.confidence < this.minConfidence) {
        recordInference('ignored');
        return heuristic;
      }
      recordInference('used');
      return {
        type: advice.type,
        prompt: buildPrompt(advice.type, span.label, context),
        source: 'inference',
      };
    } catch (err) {
      if (!(err instanceof ClassifierUnavailableError)) throw err;
      recordInference('unavailable');
      this.log.warn({ reason: err.reason, rawToken: span.rawToken }, 'semantic inference unavailable');
      return heuristic;
    }
  }

  private async infer(
    inference: SemanticInference,
    spanText: string,
    context: ContextWindow
  ): Promise<Awaited<ReturnType<SemanticInference>>> {
    let pending: ReturnType<SemanticInference>;
    try {
      pending = inference(spanText, context);
    } catch (err) {
      throw new ClassifierUnavailableError('error', err);
    }
    const guarded = pending.catch((err: unknown) => {
      throw new ClassifierUnavailableError('error', err);
    });
    const advice = await withTimeout(guarded, this.timeoutMs, () => {
      throw new ClassifierUnavailableError('timeout');
    });
    if (advice === null) return null;
    if (!isSlotType(advice.type) || !Number.isFinite(advice.confidence)) {
      throw new ClassifierUnavailableError('malformed');
    }
    return advice;
  }
}
