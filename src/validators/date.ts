// src/validators/date.ts
// Validator Set: calendar dates
//
// Pure function - no clock access. Accepted formats are configurable;
// the normalized value is always ISO YYYY-MM-DD.

import { accept, reject, type SlotValidator } from './types';

export type DateFormat = 'iso' | 'us' | 'us-dash' | 'month-name' | 'day-month-name';

export const DATE_FORMATS: readonly DateFormat[] = [
  'iso',
  'us',
  'us-dash',
  'month-name',
  'day-month-name',
];

export function isDateFormat(value: string): value is DateFormat {
  return DATE_FORMATS.some((f) => f === value);
}

/* ============= Month Names ============= */

const MONTHS: ReadonlyMap<string, number> = new Map(
  [
    ['january', 'jan'],
    ['february', 'feb'],
    ['march', 'mar'],
    ['april', 'apr'],
    ['may', 'may'],
    ['june', 'jun'],
    ['july', 'jul'],
    ['august', 'aug'],
    ['september', 'sep'],
    ['october', 'oct'],
    ['november', 'nov'],
    ['december', 'dec'],
  ].flatMap(([full, short], i): Array<[string, number]> => [
    [full, i + 1],
    [short, i + 1],
  ])
).set('sept', 9);

/* ============= Parsers ============= */

interface DateParts {
  year: number;
  month: number;
  day: number;
}

/** undefined = format does not apply, null = right shape but unknown month name */
type Parser = (input: string) => DateParts | null | undefined;

const ORDINAL = '(?:st|nd|rd|th)?';

function numeric(pattern: RegExp, order: [number, number, number]): Parser {
  return (input) => {
    const m = pattern.exec(input);
    if (!m) return undefined;
    const [y, mo, d] = order;
    return { year: Number(m[y]), month: Number(m[mo]), day: Number(m[d]) };
  };
}

function named(pattern: RegExp, groups: { month: number; day: number; year: number }): Parser {
  return (input) => {
    const m = pattern.exec(input);
    if (!m) return undefined;
    const month = MONTHS.get(m[groups.month].toLowerCase());
    if (month === undefined) return null;
    return { year: Number(m[groups.year]), month, day: Number(m[groups.day]) };
  };
}

const PARSERS: Record<DateFormat, Parser> = {
  iso: numeric(/^(\d{4})-(\d{1,2})-(\d{1,2})$/, [1, 2, 3]),
  us: numeric(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, [3, 1, 2]),
  'us-dash': numeric(/^(\d{1,2})-(\d{1,2})-(\d{4})$/, [3, 1, 2]),
  'month-name': named(new RegExp(`^([a-z]+)\\.?\\s+(\\d{1,2})${ORDINAL},?\\s+(\\d{4})$`, 'i'), {
    month: 1,
    day: 2,
    year: 3,
  }),
  'day-month-name': named(
    new RegExp(`^(\\d{1,2})${ORDINAL}\\s+(?:of\\s+)?([a-z]+)\\.?,?\\s+(\\d{4})$`, 'i'),
    { day: 1, month: 2, year: 3 }
  ),
};

/* ============= Calendar ============= */

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isRealDate({ year, month, day }: DateParts): boolean {
  return year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function toIso({ year, month, day }: DateParts): string {
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/* ============= Validator ============= */

export function createDateValidator(formats: readonly DateFormat[] = DATE_FORMATS): SlotValidator {
  return (raw) => {
    const input = raw.replace(/\s+/g, ' ').trim();
    let impossible = false;

    for (const format of formats) {
      const parts = PARSERS[format](input);
      if (!parts) continue;
      if (isRealDate(parts)) return accept(toIso(parts));
      impossible = true;
    }

    return reject(impossible ? 'impossible calendar date' : 'unparsable date');
  };
}
