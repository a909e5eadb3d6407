// src/validators/number.ts
// Validator Set: plain numbers (counts, quantities, reference numbers)

import { accept, reject, type ValidationResult } from './types';

const NUMBER_PATTERN = /^([-+]?)((?:\d{1,3}(?:,\d{3})+|\d+)?)(\.\d+)?$/;

/** "1,000" -> "1000", "+007.50" -> "7.50", ".5" -> "0.5" */
export function validateNumber(raw: string): ValidationResult {
  const m = NUMBER_PATTERN.exec(raw.trim());
  if (!m || (!m[2] && !m[3])) return reject('value must be a number');

  const [, sign, intPart, fraction = ''] = m;
  const digits = intPart.replace(/,/g, '').replace(/^0+(?=\d)/, '') || '0';
  const value = `${digits}${fraction}`;
  const negative = sign === '-' && /[1-9]/.test(value);
  return accept(negative ? `-${value}` : value);
}
