// src/conversation/messages.ts
// Assistant message texts. Prompts themselves come from the classifier.

import type { Slot } from '../extraction/types';

export function acknowledgeFill(slot: Slot, value: string): string {
  return `Thanks. ${nameOf(slot)} is set to ${value}.`;
}

function nameOf(slot: Slot): string {
  return slot.label ? `"${slot.label}"` : 'that blank';
}

/** `keptInDocument` is false when skipped slots block assembly */
export function acknowledgeSkip(slot: Slot, keptInDocument: boolean): string {
  if (keptInDocument) return `Skipped ${nameOf(slot)}; it will stay as it is in the document.`;
  return `Skipped ${nameOf(slot)}; the document cannot be downloaded while it is left blank.`;
}

export function alreadyResolvedMessage(slot: Slot): string {
  const name = nameOf(slot);
  return `${name.charAt(0).toUpperCase()}${name.slice(1)} was already answered in another session.`;
}

export function rejectionMessage(reason: string, prompt: string): string {
  return `Sorry, that didn't work: ${reason}.\n${prompt}`;
}

/** `blockedSkips` counts skipped slots that keep the document from assembling */
export function completionMessage(total: number, blockedSkips = 0): string {
  if (total === 0) return 'This document has no placeholders to fill. It is ready to download.';
  if (blockedSkips > 0) {
    return `All done, but ${blockedSkips} skipped placeholder(s) must be filled before the document can be downloaded.`;
  }
  return 'All done! Every placeholder has been handled and your document is ready to download.';
}
