// src/validators/text.ts
// Validator Set: address, duration and free text only need to be present

import { accept, reject, type ValidationResult } from './types';

export function validateText(raw: string): ValidationResult {
  const value = raw.trim();
  return value ? accept(value) : reject('a value is required');
}
