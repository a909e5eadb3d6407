// src/validators/amount.ts
// Validator Set: monetary amounts
//
// Rounds with decimal string arithmetic (half up), never through floats.
// A currency symbol or ISO code typed by the user is kept on the value.

import { accept, reject, type SlotValidator } from './types';

const SYMBOL_PREFIX = /^([$€£¥])\s*/;
const SYMBOL_SUFFIX = /\s*([$€£¥])$/;
const CODES = 'USD|EUR|GBP|CAD|AUD|JPY|CHF|INR';
const CODE_PREFIX = new RegExp(`^(${CODES})(?![A-Za-z])\\s*`, 'i');
const CODE_SUFFIX = new RegExp(`\\s*(?<![A-Za-z])(${CODES})$`, 'i');
const WORD_SUFFIX = /\s*(?<![A-Za-z])(?:dollars?|euros?|pounds?)$/i;
const NUMBER_PATTERN = /^(?:\d{1,3}(?:,\d{3})+|\d+)?(?:\.\d+)?$/;

interface AmountParts {
  body: string;
  symbol: string | null;
  code: string | null;
  negative: boolean;
}

/**
 * Peel sign, currency symbol, code and unit word off the edges of the input.
 * Whatever is left has to be a single number; inner spaces stay and fail it.
 */
function splitAmount(raw: string): AmountParts {
  const parts: AmountParts = { body: raw.trim(), symbol: null, code: null, negative: false };

  const unwrapSign = () => {
    if (/^\(.*\)$/.test(parts.body)) {
      parts.negative = true;
      parts.body = parts.body.slice(1, -1).trim();
    }
    if (parts.body.startsWith('-')) {
      parts.negative = true;
      parts.body = parts.body.slice(1).trimStart();
    }
  };

  const take = (pattern: RegExp): string | null => {
    const m = pattern.exec(parts.body);
    if (!m) return null;
    parts.body = parts.body.slice(0, m.index) + parts.body.slice(m.index + m[0].length);
    return m[1] ?? m[0];
  };

  unwrapSign();
  parts.symbol = take(SYMBOL_PREFIX);
  if (!parts.symbol) parts.code = take(CODE_PREFIX);
  unwrapSign();

  take(WORD_SUFFIX);
  if (!parts.code) parts.code = take(CODE_SUFFIX);
  if (!parts.symbol && !parts.code) parts.symbol = take(SYMBOL_SUFFIX);
  unwrapSign();

  parts.code = parts.code?.toUpperCase() ?? null;
  return parts;
}

function groupThousands(intPart: string): string {
  return intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/** Round a non-negative decimal string to `precision` places, half up */
export function roundDecimal(intPart: string, fracPart: string, precision: number): string {
  const kept = fracPart.slice(0, precision).padEnd(precision, '0');
  const roundUp = fracPart.length > precision && fracPart[precision] >= '5';

  let scaled = BigInt(`${intPart || '0'}${kept}`);
  if (roundUp) scaled += 1n;

  const digits = scaled.toString().padStart(precision + 1, '0');
  if (precision === 0) return groupThousands(digits);
  return `${groupThousands(digits.slice(0, -precision))}.${digits.slice(-precision)}`;
}

export function createAmountValidator(precision = 2): SlotValidator {
  return (raw) => {
    const { body: s, symbol, code, negative } = splitAmount(raw);

    if (!s || s === '.' || !NUMBER_PATTERN.test(s)) return reject('amount must be a number');
    if (negative && /[1-9]/.test(s)) return reject('amount cannot be negative');

    const [intPart, fracPart = ''] = s.replace(/,/g, '').split('.');
    const amount = roundDecimal(intPart.replace(/^0+(?=\d)/, ''), fracPart, precision);

    if (symbol) return accept(`${symbol}${amount}`);
    if (code) return accept(`${code} ${amount}`);
    return accept(amount);
  };
}
