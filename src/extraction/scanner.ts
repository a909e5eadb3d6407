// src/extraction/scanner.ts
// Pattern Scanner: finds candidate placeholder spans in raw document text.
//
// Rules in priority order: bracket tokens, brace tokens, blank runs, idioms.
// At the leftmost position where any rule matches, the longest match wins and
// ties go to the higher-priority rule. Consumed characters are never rescanned.

import type { CandidateSpan, SlotType, SpanKind } from './types';

/* ============= Rules ============= */

/** A configurable regular-language idiom, e.g. "$______" */
export interface IdiomRule {
  name: string;
  pattern: RegExp | string;
  /** Extra flags when pattern is a string */
  flags?: string;
  typeHint?: SlotType;
}

export interface ScanOptions {
  idioms?: readonly IdiomRule[];
}

interface ScanRule {
  kind: SpanKind;
  pattern: RegExp;
  typeHint: SlotType | null;
}

const BLANK_CHARS = '_＿‗';

const BRACKET_PATTERN = /\[(?=[^[\]\n]*[^\s[\]])[^[\]\n]+\]/g;
const BRACE_PATTERN = /\{\{(?=[^{}\n]*[^\s{}])[^{}\n]+\}\}|\{(?=[^{}\n]*[^\s{}])[^{}\n]+\}/g;
const BLANK_PATTERN = new RegExp(`[${BLANK_CHARS}]{3,}`, 'g');

export const DEFAULT_IDIOMS: readonly IdiomRule[] = [
  {
    name: 'currency-blank',
    pattern: `[$€£]\\s?[${BLANK_CHARS}]{3,}`,
    typeHint: 'monetary_amount',
  },
  {
    name: 'percentage-blank',
    pattern: `[${BLANK_CHARS}]{2,}\\s?(?:%|percent\\b)`,
    flags: 'i',
    typeHint: 'percentage',
  },
  {
    name: 'day-of-formula',
    pattern: `\\bthis\\s+[${BLANK_CHARS}]{2,}\\s+day\\s+of\\s+[${BLANK_CHARS}]{3,}(?:,?\\s+(?:19|20)?[${BLANK_CHARS}]{2,})?`,
    flags: 'i',
    typeHint: 'date',
  },
];

function globalCopy(pattern: RegExp | string, extraFlags = ''): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const base = typeof pattern === 'string' ? extraFlags : pattern.flags;
  const flags = base.includes('g') ? base : `${base}g`;
  return new RegExp(source, flags.replace('y', ''));
}

/** Fresh RegExp objects per scan so no lastIndex state leaks between scans */
function compileRules(options: ScanOptions): ScanRule[] {
  const idioms = options.idioms ?? DEFAULT_IDIOMS;
  return [
    { kind: 'bracket', pattern: globalCopy(BRACKET_PATTERN), typeHint: null },
    { kind: 'brace', pattern: globalCopy(BRACE_PATTERN), typeHint: null },
    { kind: 'blank', pattern: globalCopy(BLANK_PATTERN), typeHint: null },
    ...idioms.map((idiom): ScanRule => ({
      kind: 'idiom',
      pattern: globalCopy(idiom.pattern, idiom.flags),
      typeHint: idiom.typeHint ?? null,
    })),
  ];
}

/* ============= Labels ============= */

const BLANK_RUN = new RegExp(`[${BLANK_CHARS}]+`, 'g');

/**
 * Human label of a bracket/brace token: "[Company  Name]" -> "Company Name",
 * "{{ client_name }}" -> "client name". Tokens without letters or digits
 * ("[____]", "[•]") have no label.
 */
export function labelOf(rawToken: string, kind: SpanKind): string | null {
  if (kind !== 'bracket' && kind !== 'brace') return null;
  const inner = rawToken.replace(/^[[{]+|[\]}]+$/g, '');
  const cleaned = inner.replace(BLANK_RUN, ' ').replace(/\s+/g, ' ').trim();
  return /[\p{L}\p{N}]/u.test(cleaned) ? cleaned : null;
}

/* ============= Scanner ============= */

/** Leftmost non-empty match of pattern at or after `from` */
function findFrom(pattern: RegExp, text: string, from: number): RegExpExecArray | null {
  pattern.lastIndex = from;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    if (match[0].length > 0) return match;
    // zero-width match: step past it
    pattern.lastIndex = match.index + 1;
  }
  return null;
}

function* scanText(text: string, rules: ScanRule[]): Generator<CandidateSpan> {
  // undefined = not searched yet, null = rule exhausted
  const pending: Array<RegExpExecArray | null | undefined> = rules.map(() => undefined);
  let pos = 0;

  while (pos < text.length) {
    let bestRule = -1;
    let best: RegExpExecArray | null = null;

    for (let i = 0; i < rules.length; i++) {
      let match = pending[i];
      if (match === undefined || (match !== null && match.index < pos)) {
        match = findFrom(rules[i].pattern, text, pos);
        pending[i] = match;
      }
      if (match === null) continue;

      if (
        best === null ||
        match.index < best.index ||
        (match.index === best.index && match[0].length > best[0].length)
      ) {
        best = match;
        bestRule = i;
      }
    }

    if (best === null) return;

    const rule = rules[bestRule];
    const rawToken = best[0];
    yield {
      start: best.index,
      end: best.index + rawToken.length,
      rawToken,
      kind: rule.kind,
      label: labelOf(rawToken, rule.kind),
      typeHint: rule.typeHint,
    };
    pos = best.index + rawToken.length;
  }
}

/**
 * Scan text for placeholder candidates.
 *
 * The result is lazy and restartable: each iteration runs a fresh scan, so a
 * document can be rescanned after edits without reusing any scanner state.
 */
export function scan(text: string, options: ScanOptions = {}): Iterable<CandidateSpan> {
  return {
    [Symbol.iterator]: () => scanText(text, compileRules(options)),
  };
}
