// src/extraction/types.ts
// Placeholder extraction: slot, span and classification types

/* ============= Slot Types ============= */

export type SlotType =
  | 'person_name'
  | 'organization_name'
  | 'date'
  | 'monetary_amount'
  | 'address'
  | 'duration'
  | 'free_text'
  | 'email'
  | 'phone'
  | 'percentage'
  | 'number';

export const SLOT_TYPES: readonly SlotType[] = [
  'person_name',
  'organization_name',
  'date',
  'monetary_amount',
  'address',
  'duration',
  'free_text',
  'email',
  'phone',
  'percentage',
  'number',
];

export function isSlotType(value: unknown): value is SlotType {
  return typeof value === 'string' && SLOT_TYPES.some((t) => t === value);
}

export type SlotStatus = 'pending' | 'filled' | 'skipped';

export function isSlotStatus(value: unknown): value is SlotStatus {
  return value === 'pending' || value === 'filled' || value === 'skipped';
}

/** Status a slot can be moved to once the user has dealt with it */
export type ResolvedStatus = Exclude<SlotStatus, 'pending'>;

/** Which scanner rule produced a span */
export type SpanKind = 'bracket' | 'brace' | 'blank' | 'idiom';

export function isSpanKind(value: unknown): value is SpanKind {
  return value === 'bracket' || value === 'brace' || value === 'blank' || value === 'idiom';
}

/** Where an inferred type came from */
export type TypeSource = 'token' | 'context' | 'inference' | 'fallback';

export function isTypeSource(value: unknown): value is TypeSource {
  return value === 'token' || value === 'context' || value === 'inference' || value === 'fallback';
}

/* ============= Spans ============= */

/** Half-open [start, end) character range into the original text */
export interface Span {
  start: number;
  end: number;
}

export interface CandidateSpan extends Span {
  rawToken: string;
  kind: SpanKind;
  /** Cleaned inner text of a bracket/brace token; null when uninformative */
  label: string | null;
  /** Type suggested by an idiom rule */
  typeHint: SlotType | null;
}

/* ============= Classification ============= */

export interface ContextWindow {
  before: string;
  after: string;
}

export interface Classification {
  type: SlotType;
  prompt: string;
  source: TypeSource;
}

/** Advisory answer of the semantic-inference collaborator */
export interface InferenceAdvice {
  type: SlotType;
  confidence: number;
}

/**
 * Optional semantic-inference capability.
 * May resolve null, reject or hang; the classifier copes with all three.
 */
export type SemanticInference = (
  spanText: string,
  context: ContextWindow
) => Promise<InferenceAdvice | null>;

/* ============= Slot ============= */

export interface Slot {
  /** Sequential per document, starting at 0 in document order */
  id: number;
  span: Span;
  rawToken: string;
  kind: SpanKind;
  label: string | null;
  inferredType: SlotType;
  typeSource: TypeSource;
  prompt: string;
  value: string | null;
  status: SlotStatus;
  /** Earlier slot carrying the same label; resolved together with it */
  aliasOf: number | null;
}

/** Immutable original text plus the slots extracted from it */
export interface DocumentSnapshot {
  text: string;
  slots: readonly Slot[];
}

export interface Progress {
  filled: number;
  skipped: number;
  total: number;
  /** (filled + skipped) / total */
  ratio: number;
}
