/**
 * Date Range Resolver
 *
 * Resolves the requested statement period from natural-language date
 * expressions. Stages are tried in priority order and the first one that
 * matches wins; inside a stage the earliest occurrence in the text wins.
 *
 *   a. "as on / as of / as at <date>"
 *   b. "from <date> to <date>", or "from <date>" up to the processing date;
 *      either end may be a month and year
 *   c. fiscal years (April 1 to March 31)
 *   d. relative periods ("last 3 months", "previous quarter", "ytd")
 *   e. bare dates, else the months named with a year
 *   f. typo-corrected retry of c and d
 *   g. the default range
 */

import fuzzball from 'fuzzball';
import {
  endOfMonth,
  endOfQuarter,
  endOfYear,
  format,
  isAfter,
  isExists,
  startOfDay,
  startOfMonth,
  startOfQuarter,
  startOfYear,
  subDays,
  subMonths,
  subQuarters,
  subWeeks,
  subYears,
} from 'date-fns';
import { CalendarDate, DateProvenance, DateRange } from './types';

export interface DateResolutionOptions {
  /** Processing date; relative expressions are anchored to it */
  now: Date;
  /** Start of the default range */
  defaultFromDate: CalendarDate;
  /** Minimum fuzzball ratio for a typo correction, 0-100 */
  fuzzyMatchThreshold: number;
}

interface Interval {
  from: Date;
  to: Date;
}

interface Resolution extends Interval {
  provenance: DateProvenance;
  matchedText: string;
}

interface DateRule {
  pattern: RegExp;
  provenance: DateProvenance;
  resolve: (match: RegExpMatchArray, today: Date) => Interval | null;
}

const CALENDAR_FORMAT = 'yyyy-MM-dd';
const MIN_YEAR = 1990;
const MAX_YEAR = 2050;
const FISCAL_YEAR_START_MONTH = 3; // April, zero-based

export const FUZZY_TARGET_KEYWORDS = [
  'current',
  'previous',
  'last',
  'this',
  'next',
  'year',
  'month',
  'quarter',
  'fy',
] as const;

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

// ============================================================================
// Date tokens
// ============================================================================

const MONTH = 'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';
const ORDINAL = '(?:st|nd|rd|th)?';
const ISO_DATE = '\\d{4}-\\d{1,2}-\\d{1,2}';
const NUMERIC_DATE = '\\d{1,2}[/.-]\\d{1,2}[/.-](?:\\d{4}|\\d{2})';
const DAY_MONTH_YEAR = `\\d{1,2}${ORDINAL}[\\s-]*(?:of\\s+)?(?:${MONTH})(?:,?[\\s-]*(?:\\d{4}|\\d{2}))?`;
const MONTH_DAY_YEAR = `(?:${MONTH})\\s+\\d{1,2}${ORDINAL}(?:,?\\s*\\d{4})?`;

/** One date expression, without capturing groups */
const DATE = `\\b(?:${ISO_DATE}|${NUMERIC_DATE}|${DAY_MONTH_YEAR}|${MONTH_DAY_YEAR})\\b`;

const MONTH_YEAR_DATE = `(?:${MONTH})(?:,?\\s+|-)\\d{4}`;

/** A range endpoint: a full date, or a month and year */
const ENDPOINT = `\\b(?:${ISO_DATE}|${NUMERIC_DATE}|${DAY_MONTH_YEAR}|${MONTH_DAY_YEAR}|${MONTH_YEAR_DATE})\\b`;

const ISO_PARTS = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const NUMERIC_PARTS = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})$/;
const DMY_PARTS = /^(\d{1,2})(?:st|nd|rd|th)?[\s-]*(?:of\s+)?([a-z]+)(?:,?[\s-]*(\d{4}|\d{2}))?$/;
const MDY_PARTS = /^([a-z]+)\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s*(\d{4}))?$/;
const MONTH_YEAR_PARTS = /^([a-z]+)(?:,?\s+|-)(\d{4})$/;

const FY = '(?:fy|financial\\s+year|fiscal\\s+year)';
const FY_YEAR_SEPARATOR = "\\s*'?";

export function toCalendarDate(date: Date): CalendarDate {
  return format(date, CALENDAR_FORMAT);
}

/**
 * True for a `yyyy-MM-dd` string naming a real date
 */
export function isCalendarDate(value: string): boolean {
  const parts = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!parts) {
    return false;
  }
  return isExists(Number(parts[1]), Number(parts[2]) - 1, Number(parts[3]));
}

function expandYear(raw: string): number {
  const year = Number(raw);
  if (raw.length === 2) {
    return year <= 50 ? 2000 + year : 1900 + year;
  }
  return year;
}

function inYearRange(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

function buildDate(year: number, month: number, day: number): Date | null {
  if (!inYearRange(year) || !isExists(year, month - 1, day)) {
    return null;
  }
  return new Date(year, month - 1, day);
}

/**
 * Day and month without a year: this year, or last year when that
 * would put the date after the processing date.
 */
function buildPartialDate(month: number, day: number, today: Date): Date | null {
  const thisYear = buildDate(today.getFullYear(), month, day);
  if (thisYear && !isAfter(thisYear, today)) {
    return thisYear;
  }
  return buildDate(today.getFullYear() - 1, month, day);
}

function monthNumber(word: string): number | null {
  return MONTHS[word] ?? null;
}

/**
 * Parse one date expression matched by DATE. Numeric dates are day-first.
 */
export function parseDateToken(token: string, today: Date): Date | null {
  const value = token.trim().toLowerCase();

  let parts = ISO_PARTS.exec(value);
  if (parts) {
    return buildDate(Number(parts[1]), Number(parts[2]), Number(parts[3]));
  }

  parts = NUMERIC_PARTS.exec(value);
  if (parts) {
    return buildDate(expandYear(parts[3]), Number(parts[2]), Number(parts[1]));
  }

  parts = DMY_PARTS.exec(value);
  if (parts) {
    const month = monthNumber(parts[2]);
    if (month === null) {
      return null;
    }
    const day = Number(parts[1]);
    return parts[3] === undefined ? buildPartialDate(month, day, today) : buildDate(expandYear(parts[3]), month, day);
  }

  parts = MDY_PARTS.exec(value);
  if (parts) {
    const month = monthNumber(parts[1]);
    if (month === null) {
      return null;
    }
    const day = Number(parts[2]);
    return parts[3] === undefined ? buildPartialDate(month, day, today) : buildDate(Number(parts[3]), month, day);
  }

  return null;
}

function ordered(a: Date, b: Date): Interval {
  return isAfter(a, b) ? { from: b, to: a } : { from: a, to: b };
}

function wholeMonth(year: number, month: number): Interval | null {
  const first = buildDate(year, month, 1);
  return first ? { from: first, to: startOfDay(endOfMonth(first)) } : null;
}

/**
 * The days one range endpoint covers: a single day for a full date, the
 * whole month for a month and year.
 */
function parseEndpoint(token: string, today: Date): Interval | null {
  const date = parseDateToken(token, today);
  if (date) {
    return { from: date, to: date };
  }
  const parts = MONTH_YEAR_PARTS.exec(token.trim().toLowerCase());
  const month = parts ? monthNumber(parts[1]) : null;
  return parts && month !== null ? wholeMonth(Number(parts[2]), month) : null;
}

/** Smallest interval covering all of the given ones */
function span(intervals: readonly Interval[]): Interval {
  return intervals.reduce((acc, interval) => ({
    from: isAfter(acc.from, interval.from) ? interval.from : acc.from,
    to: isAfter(interval.to, acc.to) ? interval.to : acc.to,
  }));
}

// ============================================================================
// Period helpers
// ============================================================================

function fiscalYear(startYear: number): Interval | null {
  if (!inYearRange(startYear) || !inYearRange(startYear + 1)) {
    return null;
  }
  return {
    from: new Date(startYear, FISCAL_YEAR_START_MONTH, 1),
    to: new Date(startYear + 1, FISCAL_YEAR_START_MONTH - 1, 31),
  };
}

function currentFiscalStartYear(today: Date): number {
  return today.getMonth() >= FISCAL_YEAR_START_MONTH ? today.getFullYear() : today.getFullYear() - 1;
}

type Period = 'month' | 'quarter' | 'year';

function asPeriod(word: string): Period | null {
  if (word === 'month' || word === 'quarter' || word === 'year') {
    return word;
  }
  return null;
}

function periodStart(period: Period, date: Date): Date {
  switch (period) {
    case 'month':
      return startOfMonth(date);
    case 'quarter':
      return startOfQuarter(date);
    case 'year':
      return startOfYear(date);
  }
}

function previousPeriod(period: Period, today: Date): Interval {
  switch (period) {
    case 'month': {
      const anchor = subMonths(today, 1);
      return { from: startOfMonth(anchor), to: startOfDay(endOfMonth(anchor)) };
    }
    case 'quarter': {
      const anchor = subQuarters(today, 1);
      return { from: startOfQuarter(anchor), to: startOfDay(endOfQuarter(anchor)) };
    }
    case 'year': {
      const anchor = subYears(today, 1);
      return { from: startOfYear(anchor), to: startOfDay(endOfYear(anchor)) };
    }
  }
}

function subtractUnits(unit: string, amount: number, today: Date): Date | null {
  if (unit.startsWith('day')) return subDays(today, amount);
  if (unit.startsWith('week')) return subWeeks(today, amount);
  if (unit.startsWith('month')) return subMonths(today, amount);
  if (unit.startsWith('quarter')) return subQuarters(today, amount);
  if (unit.startsWith('year')) return subYears(today, amount);
  return null;
}

// ============================================================================
// Stage rules
// ============================================================================

const AS_ON_RULES: readonly DateRule[] = [
  {
    pattern: new RegExp(`\\bas\\s+(?:on|of|at)\\s+(${DATE})`, 'g'),
    provenance: 'explicit-single',
    resolve: (match, today) => {
      const date = parseDateToken(match[1], today);
      return date ? { from: date, to: date } : null;
    },
  },
];

const FROM_TO_RULES: readonly DateRule[] = [
  {
    pattern: new RegExp(
      `\\b(?:from|between)\\s+(${ENDPOINT})\\s*(?:to|till|until|through|and|-)\\s*(${ENDPOINT})`,
      'g'
    ),
    provenance: 'explicit-range',
    resolve: (match, today) => {
      const start = parseEndpoint(match[1], today);
      const end = parseEndpoint(match[2], today);
      return start && end ? span([start, end]) : null;
    },
  },
  {
    pattern: new RegExp(`\\bfrom\\s+(${ENDPOINT})`, 'g'),
    provenance: 'explicit-range',
    resolve: (match, today) => {
      const start = parseEndpoint(match[1], today);
      return start ? ordered(start.from, today) : null;
    },
  },
];

const FISCAL_YEAR_RULES: readonly DateRule[] = [
  {
    // FY23-24, FY 2023-24, FY2023-2024, financial year 2023-24
    pattern: new RegExp(`\\b${FY}${FY_YEAR_SEPARATOR}(\\d{4}|\\d{2})\\s*[-/]\\s*(\\d{4}|\\d{2})\\b`, 'g'),
    provenance: 'fiscal-year',
    resolve: (match) => fiscalYear(expandYear(match[1])),
  },
  {
    // FY24: the fiscal year ending in March 2024
    pattern: new RegExp(`\\b${FY}${FY_YEAR_SEPARATOR}(\\d{4}|\\d{2})\\b`, 'g'),
    provenance: 'fiscal-year',
    resolve: (match) => fiscalYear(expandYear(match[1]) - 1),
  },
  {
    pattern: new RegExp(`\\b(?:current|this)\\s+${FY}\\b`, 'g'),
    provenance: 'fiscal-year',
    resolve: (_match, today) => fiscalYear(currentFiscalStartYear(today)),
  },
  {
    pattern: new RegExp(`\\b(?:last|previous)\\s+${FY}\\b`, 'g'),
    provenance: 'fiscal-year',
    resolve: (_match, today) => fiscalYear(currentFiscalStartYear(today) - 1),
  },
  {
    pattern: new RegExp(`\\bnext\\s+${FY}\\b`, 'g'),
    provenance: 'fiscal-year',
    resolve: (_match, today) => fiscalYear(currentFiscalStartYear(today) + 1),
  },
];

const RELATIVE_RULES: readonly DateRule[] = [
  {
    pattern: /\b(?:last|past)\s+(\d{1,4})\s+(days?|weeks?|months?|quarters?|years?)\b/g,
    provenance: 'relative',
    resolve: (match, today) => {
      const start = subtractUnits(match[2], Number(match[1]), today);
      return start ? { from: start, to: today } : null;
    },
  },
  {
    pattern: /\b(?:last|previous)\s+(month|quarter|year)\b/g,
    provenance: 'relative',
    resolve: (match, today) => {
      const period = asPeriod(match[1]);
      return period ? previousPeriod(period, today) : null;
    },
  },
  {
    pattern: /\b(?:this|current)\s+(month|quarter|year)\b/g,
    provenance: 'relative',
    resolve: (match, today) => {
      const period = asPeriod(match[1]);
      return period ? { from: periodStart(period, today), to: today } : null;
    },
  },
  {
    pattern: /\b(?:(y|m|q)td|(year|month|quarter)\s+to\s+date)\b/g,
    provenance: 'relative',
    resolve: (match, today) => {
      const abbreviations: Record<string, Period> = { y: 'year', m: 'month', q: 'quarter' };
      const period = match[1] !== undefined ? abbreviations[match[1]] : asPeriod(match[2] ?? '');
      return period ? { from: periodStart(period, today), to: today } : null;
    },
  },
  {
    pattern: /\byesterday\b/g,
    provenance: 'relative',
    resolve: (_match, today) => {
      const yesterday = subDays(today, 1);
      return { from: yesterday, to: yesterday };
    },
  },
  {
    pattern: /\btoday\b/g,
    provenance: 'relative',
    resolve: (_match, today) => ({ from: today, to: today }),
  },
];

const DATE_TOKEN = new RegExp(DATE, 'g');
const MONTH_YEAR = new RegExp(`\\b(${MONTH})(?:,?\\s+|-)(\\d{4})\\b`, 'g');

/**
 * Earliest match across the rules; ties go to the rule listed first
 */
function applyRules(text: string, rules: readonly DateRule[], today: Date): Resolution | null {
  let best: Resolution | null = null;
  let bestIndex = Number.POSITIVE_INFINITY;

  for (const rule of rules) {
    for (const match of text.matchAll(rule.pattern)) {
      const index = match.index ?? 0;
      if (index >= bestIndex) {
        break;
      }
      const interval = rule.resolve(match, today);
      if (interval) {
        best = { ...interval, provenance: rule.provenance, matchedText: match[0] };
        bestIndex = index;
        break;
      }
    }
  }

  return best;
}

function resolveBareDates(text: string, today: Date): Resolution | null {
  const dates: Array<{ date: Date; text: string; start: number; end: number }> = [];
  for (const match of text.matchAll(DATE_TOKEN)) {
    const date = parseDateToken(match[0], today);
    const start = match.index ?? 0;
    if (date) {
      dates.push({ date, text: match[0], start, end: start + match[0].length });
    }
  }

  if (dates.length >= 2) {
    const sorted = [...dates].sort((a, b) => a.date.getTime() - b.date.getTime());
    return {
      from: sorted[0].date,
      to: sorted[sorted.length - 1].date,
      provenance: 'explicit-range',
      matchedText: text.slice(dates[0].start, dates[dates.length - 1].end),
    };
  }

  if (dates.length === 1) {
    return { from: dates[0].date, to: dates[0].date, provenance: 'explicit-single', matchedText: dates[0].text };
  }

  const months: Array<{ interval: Interval; start: number; end: number }> = [];
  for (const match of text.matchAll(MONTH_YEAR)) {
    const month = monthNumber(match[1]);
    const interval = month === null ? null : wholeMonth(Number(match[2]), month);
    const start = match.index ?? 0;
    if (interval) {
      months.push({ interval, start, end: start + match[0].length });
    }
  }

  if (months.length === 0) {
    return null;
  }

  return {
    ...span(months.map((m) => m.interval)),
    provenance: 'explicit-range',
    matchedText: text.slice(months[0].start, months[months.length - 1].end),
  };
}

/**
 * Replace words within the similarity threshold of a period keyword
 */
export function correctPeriodTypos(text: string, threshold: number): string {
  return text
    .split(/(\s+)/)
    .map((word) => {
      if (!/^[a-z]{3,}$/.test(word)) {
        return word;
      }
      let bestKeyword: string | null = null;
      let bestScore = 0;
      for (const keyword of FUZZY_TARGET_KEYWORDS) {
        const score = fuzzball.ratio(word, keyword);
        if (score >= threshold && score > bestScore) {
          bestKeyword = keyword;
          bestScore = score;
        }
      }
      return bestKeyword ?? word;
    })
    .join('');
}

function toDateRange(resolution: Resolution, fuzzyCorrected: boolean): DateRange {
  const { from, to } = ordered(resolution.from, resolution.to);
  return Object.freeze({
    from: toCalendarDate(from),
    to: toCalendarDate(to),
    provenance: resolution.provenance,
    matchedText: resolution.matchedText,
    fuzzyCorrected,
  });
}

/**
 * The range used when the text names no period: the configured start
 * date up to the day before processing.
 */
export function defaultDateRange(options: Pick<DateResolutionOptions, 'now' | 'defaultFromDate'>): DateRange {
  const yesterday = toCalendarDate(subDays(startOfDay(options.now), 1));
  const from = options.defaultFromDate <= yesterday ? options.defaultFromDate : yesterday;
  return Object.freeze({ from, to: yesterday, provenance: 'default', fuzzyCorrected: false });
}

/**
 * Resolve the requested date range from normalized text. Never throws;
 * text without a usable period yields the default range.
 */
export function resolveDateRange(text: string, options: DateResolutionOptions): DateRange {
  const today = startOfDay(options.now);

  const exact =
    applyRules(text, AS_ON_RULES, today) ??
    applyRules(text, FROM_TO_RULES, today) ??
    applyRules(text, FISCAL_YEAR_RULES, today) ??
    applyRules(text, RELATIVE_RULES, today) ??
    resolveBareDates(text, today);

  if (exact) {
    return toDateRange(exact, false);
  }

  const corrected = correctPeriodTypos(text, options.fuzzyMatchThreshold);
  if (corrected !== text) {
    const fuzzy = applyRules(corrected, FISCAL_YEAR_RULES, today) ?? applyRules(corrected, RELATIVE_RULES, today);
    if (fuzzy) {
      return toDateRange(fuzzy, true);
    }
  }

  return defaultDateRange(options);
}
