/**
 * Identifier Extractor
 * Finds PAN numbers, DI codes, account codes and AIF folios in normalized text
 */

import type { IdentifierPatternConfig } from '../config/extraction';
import { IDENTIFIER_KINDS, IdentifierKind, IdentifierSet } from './types';

interface CompiledPattern {
  config: IdentifierPatternConfig;
  priority: number;
  search: RegExp;
  anchored: RegExp;
  exclude: ReadonlySet<string>;
}

interface Candidate {
  kind: IdentifierKind;
  value: string;
  start: number;
  end: number;
  priority: number;
}

const MIN_DATE_YEAR = 1990;
const MAX_DATE_YEAR = 2050;

const compiledCache = new WeakMap<readonly IdentifierPatternConfig[], CompiledPattern[]>();

function compile(patterns: readonly IdentifierPatternConfig[]): CompiledPattern[] {
  const cached = compiledCache.get(patterns);
  if (cached) {
    return cached;
  }

  const compiled = patterns.map((config, priority) => ({
    config,
    priority,
    search: new RegExp(`\\b(?:${config.pattern})\\b`, 'gi'),
    anchored: new RegExp(`^(?:${config.pattern})$`),
    exclude: new Set(config.exclude),
  }));
  compiledCache.set(patterns, compiled);
  return compiled;
}

function isDayMonth(day: number, month: number): boolean {
  return day >= 1 && day <= 31 && month >= 1 && month <= 12;
}

function isPlausibleYear(year: number): boolean {
  return year >= MIN_DATE_YEAR && year <= MAX_DATE_YEAR;
}

/**
 * True for 8-digit strings shaped like DDMMYYYY or YYYYMMDD
 */
export function isDateLike(value: string): boolean {
  if (!/^\d{8}$/.test(value)) {
    return false;
  }

  const ddmmyyyy =
    isDayMonth(Number(value.slice(0, 2)), Number(value.slice(2, 4))) && isPlausibleYear(Number(value.slice(4)));
  const yyyymmdd =
    isPlausibleYear(Number(value.slice(0, 4))) && isDayMonth(Number(value.slice(6)), Number(value.slice(4, 6)));

  return ddmmyyyy || yyyymmdd;
}

function accept(candidate: string, pattern: CompiledPattern): string | null {
  const value = candidate.toUpperCase();
  if (!pattern.anchored.test(value)) {
    return null;
  }
  if (pattern.exclude.has(value)) {
    return null;
  }
  if (pattern.config.rejectDateLike && isDateLike(value)) {
    return null;
  }
  return value;
}

/**
 * Canonicalize a value proposed by another source. Returns the uppercase
 * value when it satisfies the kind's pattern and filters, otherwise null.
 */
export function validateIdentifier(
  kind: IdentifierKind,
  value: string,
  patterns: readonly IdentifierPatternConfig[]
): string | null {
  const pattern = compile(patterns).find((p) => p.config.kind === kind);
  if (!pattern) {
    return null;
  }
  return accept(value.trim(), pattern);
}

export function emptyIdentifierSet(): IdentifierSet {
  return Object.freeze({
    pan: Object.freeze([]),
    di_code: Object.freeze([]),
    account_code: Object.freeze([]),
    aif_folio: Object.freeze([]),
  });
}

export function buildIdentifierSet(values: Partial<Record<IdentifierKind, readonly string[]>>): IdentifierSet {
  const frozen = (kind: IdentifierKind): readonly string[] => Object.freeze([...new Set(values[kind] ?? [])]);
  return Object.freeze({
    pan: frozen('pan'),
    di_code: frozen('di_code'),
    account_code: frozen('account_code'),
    aif_folio: frozen('aif_folio'),
  });
}

export function countIdentifiers(identifiers: IdentifierSet): number {
  return IDENTIFIER_KINDS.reduce((total, kind) => total + identifiers[kind].length, 0);
}

export function hasAnyIdentifier(identifiers: IdentifierSet): boolean {
  return countIdentifiers(identifiers) > 0;
}

/**
 * Extract every identifier from the text.
 *
 * Candidates from all kinds compete for text spans: longer spans first,
 * then kinds in configuration order. A candidate overlapping an accepted
 * span is dropped.
 */
export function extractIdentifiers(text: string, patterns: readonly IdentifierPatternConfig[]): IdentifierSet {
  if (!text) {
    return emptyIdentifierSet();
  }

  const candidates: Candidate[] = [];

  for (const pattern of compile(patterns)) {
    pattern.search.lastIndex = 0;
    for (const match of text.matchAll(pattern.search)) {
      const value = accept(match[0], pattern);
      if (value === null || match.index === undefined) {
        continue;
      }
      candidates.push({
        kind: pattern.config.kind,
        value,
        start: match.index,
        end: match.index + match[0].length,
        priority: pattern.priority,
      });
    }
  }

  candidates.sort((a, b) => b.end - b.start - (a.end - a.start) || a.priority - b.priority || a.start - b.start);

  const accepted: Candidate[] = [];
  for (const candidate of candidates) {
    const overlaps = accepted.some((other) => candidate.start < other.end && other.start < candidate.end);
    if (!overlaps) {
      accepted.push(candidate);
    }
  }

  accepted.sort((a, b) => a.start - b.start);

  const byKind: Partial<Record<IdentifierKind, string[]>> = {};
  for (const candidate of accepted) {
    const list = byKind[candidate.kind] ?? [];
    list.push(candidate.value);
    byKind[candidate.kind] = list;
  }

  return buildIdentifierSet(byKind);
}
