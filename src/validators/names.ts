// src/validators/names.ts
// Validator Set: person and organization names

import { accept, reject, type ValidationResult } from './types';

export function validateName(raw: string): ValidationResult {
  const value = raw.replace(/\s+/g, ' ').trim();
  if (!value) return reject('a name is required');
  if (!/\p{L}/u.test(value)) return reject('a name cannot be only numbers');
  return accept(value);
}
