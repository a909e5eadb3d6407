// src/validators/percentage.ts
// Validator Set: percentages between 0 and 100

import { accept, reject, type ValidationResult } from './types';

export function validatePercentage(raw: string): ValidationResult {
  const s = raw
    .trim()
    .replace(/\s*(?:%|per\s*cent)$/i, '')
    .trim();

  if (!/^\d+(?:\.\d+)?$|^\.\d+$/.test(s)) return reject('percentage must be a number');

  const n = Number(s);
  if (n > 100) return reject('percentage must be between 0 and 100');
  return accept(`${n}%`);
}
