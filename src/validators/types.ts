// src/validators/types.ts
// Validator Set: shared types

import type { SlotType } from '../extraction/types';

/** A rejection is a value, not an error: the conversation turns it into a reply */
export type ValidationResult =
  | { ok: true; value: string }
  | { ok: false; reason: string };

export type SlotValidator = (raw: string) => ValidationResult;

export type ValidatorTable = Record<SlotType, SlotValidator>;

export const accept = (value: string): ValidationResult => ({ ok: true, value });
export const reject = (reason: string): ValidationResult => ({ ok: false, reason });
