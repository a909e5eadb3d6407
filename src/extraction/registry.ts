// src/extraction/registry.ts
// Slot Registry: the ordered, typed slot list of one document.
//
// Slots are built in document order with ids 0..n-1 and only change through
// update(). A bracket/brace slot repeating an earlier label is an alias of it
// and is resolved together with it.

import { NotFoundError } from '../errors';
import { scan, type ScanOptions } from './scanner';
import { classifyHeuristic, type HeuristicOptions, type TypeClassifier } from './classifier';
import type {
  CandidateSpan,
  Classification,
  ContextWindow,
  DocumentSnapshot,
  Progress,
  ResolvedStatus,
  Slot,
  Span,
} from './types';

export interface BuildOptions extends ScanOptions, HeuristicOptions {
  /** Characters of surrounding text handed to the classifier, per side */
  contextChars?: number;
  /** Link repeated bracket/brace labels (default true) */
  dedupeLabels?: boolean;
}

const DEFAULT_CONTEXT_CHARS = 60;

export function contextWindow(text: string, span: Span, chars = DEFAULT_CONTEXT_CHARS): ContextWindow {
  return {
    before: text.slice(Math.max(0, span.start - chars), span.start),
    after: text.slice(span.end, span.end + chars),
  };
}

function normalizeLabel(label: string): string {
  return label.replace(/\s+/g, ' ').trim().toLowerCase();
}

/** Key linking repeated labels, or null when the candidate never aliases */
function aliasKey(candidate: CandidateSpan, dedupeLabels: boolean): string | null {
  const named = candidate.kind === 'bracket' || candidate.kind === 'brace';
  return dedupeLabels && named && candidate.label ? normalizeLabel(candidate.label) : null;
}

/** `classifications[id]` may be null for a repeated label; it is never read */
function toSlots(
  candidates: readonly CandidateSpan[],
  classifications: readonly (Classification | null)[],
  dedupeLabels: boolean
): Slot[] {
  const canonicalByLabel = new Map<string, Slot>();
  const slots: Slot[] = [];

  candidates.forEach((candidate, id) => {
    const key = aliasKey(candidate, dedupeLabels);
    const canonical = key !== null ? canonicalByLabel.get(key) : undefined;
    const classification = canonical
      ? { type: canonical.inferredType, source: canonical.typeSource, prompt: canonical.prompt }
      : classifications[id];
    if (!classification) throw new Error(`slot ${id} was not classified`);

    const slot: Slot = {
      id,
      span: { start: candidate.start, end: candidate.end },
      rawToken: candidate.rawToken,
      kind: candidate.kind,
      label: candidate.label,
      inferredType: classification.type,
      typeSource: classification.source,
      prompt: classification.prompt,
      value: null,
      status: 'pending',
      aliasOf: canonical ? canonical.id : null,
    };
    if (key !== null && !canonical) canonicalByLabel.set(key, slot);
    slots.push(slot);
  });

  return slots;
}

/** Scanner + heuristic classifier, synchronous and deterministic */
export function buildSlots(text: string, options: BuildOptions = {}): Slot[] {
  const candidates = [...scan(text, options)];
  const classifications = candidates.map((c) =>
    classifyHeuristic(
      c.rawToken,
      contextWindow(text, c, options.contextChars),
      { label: c.label, typeHint: c.typeHint },
      options
    )
  );
  return toSlots(candidates, classifications, options.dedupeLabels ?? true);
}

function copySlot(slot: Slot): Slot {
  return { ...slot, span: { ...slot.span } };
}

export class SlotRegistry {
  private readonly slots: Slot[];

  private constructor(slots: Slot[]) {
    this.slots = slots;
  }

  static build(text: string, options: BuildOptions = {}): SlotRegistry {
    return new SlotRegistry(buildSlots(text, options));
  }

  /**
   * Like build(), but classification may consult semantic inference.
   * Candidates are classified one at a time in document order; a repeated
   * label takes its first occurrence's type and is not classified again.
   */
  static async extract(
    text: string,
    classifier: TypeClassifier,
    options: Omit<BuildOptions, keyof HeuristicOptions> = {}
  ): Promise<SlotRegistry> {
    const dedupeLabels = options.dedupeLabels ?? true;
    const candidates = [...scan(text, options)];
    const classifications: (Classification | null)[] = [];
    const seen = new Set<string>();
    for (const candidate of candidates) {
      const key = aliasKey(candidate, dedupeLabels);
      if (key !== null && seen.has(key)) {
        classifications.push(null);
        continue;
      }
      if (key !== null) seen.add(key);
      classifications.push(
        await classifier.classify(candidate, contextWindow(text, candidate, options.contextChars))
      );
    }
    return new SlotRegistry(toSlots(candidates, classifications, dedupeLabels));
  }

  /** Rehydrate from persisted slots; ids must already be 0..n-1 */
  static fromSlots(slots: readonly Slot[]): SlotRegistry {
    return new SlotRegistry([...slots].sort((a, b) => a.id - b.id).map(copySlot));
  }

  get size(): number {
    return this.slots.length;
  }

  get(id: number): Slot {
    return copySlot(this.find(id));
  }

  /**
   * Resolve a slot. Skipping stores a null value. The same value and status
   * are applied to every alias of the slot. Returns the updated slot.
   */
  update(id: number, value: string | null, status: ResolvedStatus = 'filled'): Slot {
    const slot = this.find(id);
    const stored = status === 'skipped' ? null : value;

    for (const target of this.slots) {
      if (target.id === slot.id || target.aliasOf === slot.id) {
        target.value = stored;
        target.status = status;
      }
    }
    return copySlot(slot);
  }

  /** Lowest-id pending slot */
  nextPending(): Slot | null {
    const slot = this.slots.find((s) => s.status === 'pending');
    return slot ? copySlot(slot) : null;
  }

  list(): Slot[] {
    return this.slots.map(copySlot);
  }

  /** Ids touched by an update of `id`, i.e. the slot and its aliases */
  affectedBy(id: number): number[] {
    return this.slots.filter((s) => s.id === id || s.aliasOf === id).map((s) => s.id);
  }

  progress(): Progress {
    let filled = 0;
    let skipped = 0;
    for (const slot of this.slots) {
      if (slot.status === 'filled') filled++;
      else if (slot.status === 'skipped') skipped++;
    }
    const total = this.slots.length;
    return { filled, skipped, total, ratio: total === 0 ? 0 : (filled + skipped) / total };
  }

  snapshot(text: string): DocumentSnapshot {
    return { text, slots: this.list() };
  }

  private find(id: number): Slot {
    const slot = this.slots.find((s) => s.id === id);
    if (!slot) throw new NotFoundError('slot', id);
    return slot;
  }
}
