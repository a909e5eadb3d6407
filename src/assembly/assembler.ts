// src/assembly/assembler.ts
// Document Assembler: substitutes slot values back into the original text.
//
// Pure function - the snapshot is never mutated. Spans are replaced in
// descending start order so earlier offsets stay valid.

import { IncompleteDocumentError } from '../errors';
import type { DocumentSnapshot, Slot } from '../extraction/types';

export interface AssemblyPolicy {
  /** Skipped slots keep their raw token instead of failing assembly */
  allowSkipped: boolean;
}

export const DEFAULT_POLICY: AssemblyPolicy = { allowSkipped: true };

function checkSpans(text: string, slots: readonly Slot[]): void {
  let previousEnd = 0;
  for (const slot of slots) {
    const { start, end } = slot.span;
    if (start < previousEnd || end < start || end > text.length) {
      throw new Error(`slot ${slot.id} has an invalid span [${start}, ${end})`);
    }
    if (text.slice(start, end) !== slot.rawToken) {
      throw new Error(`slot ${slot.id} no longer matches its token ${JSON.stringify(slot.rawToken)}`);
    }
    previousEnd = end;
  }
}

/**
 * Fill every slot of the snapshot.
 * Throws IncompleteDocumentError while a slot is pending (or skipped, when
 * the policy does not allow skipped slots).
 */
export function assemble(
  snapshot: DocumentSnapshot,
  policy: AssemblyPolicy = DEFAULT_POLICY
): string {
  const slots = [...snapshot.slots].sort((a, b) => a.span.start - b.span.start);

  const pending = slots.filter((s) => s.status === 'pending').map((s) => s.id);
  const skipped = policy.allowSkipped
    ? []
    : slots.filter((s) => s.status === 'skipped').map((s) => s.id);
  if (pending.length > 0 || skipped.length > 0) {
    throw new IncompleteDocumentError(pending, skipped);
  }

  checkSpans(snapshot.text, slots);

  let out = snapshot.text;
  for (let i = slots.length - 1; i >= 0; i--) {
    const slot = slots[i];
    const replacement = slot.status === 'filled' && slot.value !== null ? slot.value : slot.rawToken;
    out = out.slice(0, slot.span.start) + replacement + out.slice(slot.span.end);
  }
  return out;
}
