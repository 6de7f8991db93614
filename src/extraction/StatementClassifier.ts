/**
 * Rule-based Statement Classifier
 * Scores statement categories and types by weighted keyword matching
 */

import type { KeywordConfig, StatementTypeConfig } from '../config/extraction';
import { StatementCategoryMatch, StatementSelection, StatementTypeMatch } from './types';

const MAX_WEIGHT = 1;
const WEIGHT_PRECISION = 1e4;

const keywordPatterns = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive matcher for a keyword or phrase
 */
function keywordPattern(keyword: string): RegExp {
  let pattern = keywordPatterns.get(keyword);
  if (!pattern) {
    const body = keyword.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
    pattern = new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'i');
    keywordPatterns.set(keyword, pattern);
  }
  return pattern;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return keywordPattern(keyword).test(text);
}

/**
 * Add to a weight, capping at 1.0
 */
export function accumulateWeight(current: number, increment: number): number {
  const next = Math.min(MAX_WEIGHT, current + increment);
  return Math.round(next * WEIGHT_PRECISION) / WEIGHT_PRECISION;
}

function scoreType(text: string, typeConfig: StatementTypeConfig, secondaryFactor: number): StatementTypeMatch {
  const hits: Array<{ keyword: string; increment: number }> = [];

  for (const keyword of new Set(typeConfig.primary)) {
    if (containsKeyword(text, keyword)) {
      hits.push({ keyword, increment: typeConfig.weight });
    }
  }
  for (const keyword of new Set(typeConfig.secondary)) {
    if (containsKeyword(text, keyword)) {
      hits.push({ keyword, increment: typeConfig.weight * secondaryFactor });
    }
  }

  const weight = hits.reduce((total, hit) => accumulateWeight(total, hit.increment), 0);

  return {
    type: typeConfig.type,
    weight,
    matchedKeywords: hits.map((hit) => hit.keyword),
  };
}

/**
 * Categories selected wholesale by a bulk phrase, with the phrases that hit
 */
function bulkSelections(text: string, config: KeywordConfig): Map<string, string[]> {
  const selected = new Map<string, string[]>();

  for (const bulk of config.bulkRequests) {
    const phrases = bulk.phrases.filter((phrase) => containsKeyword(text, phrase));
    if (phrases.length === 0) {
      continue;
    }
    for (const category of bulk.categories) {
      selected.set(category, [...(selected.get(category) ?? []), ...phrases]);
    }
  }

  return selected;
}

/**
 * Classify requested statements. Output follows configuration order and
 * only carries types whose weight exceeds the configured minimum.
 */
export function classifyStatements(text: string, config: KeywordConfig): StatementSelection {
  if (!text) {
    return Object.freeze({ categories: Object.freeze([]) });
  }

  const bulk = bulkSelections(text, config);
  const categories: StatementCategoryMatch[] = [];

  for (const categoryConfig of config.categories) {
    const bulkPhrases = bulk.get(categoryConfig.category);

    const types = categoryConfig.types
      .map((typeConfig): StatementTypeMatch =>
        bulkPhrases
          ? { type: typeConfig.type, weight: MAX_WEIGHT, matchedKeywords: bulkPhrases }
          : scoreType(text, typeConfig, config.secondaryWeightFactor)
      )
      .filter((match) => match.weight > config.minTypeWeight)
      .map((match) => Object.freeze({ ...match, matchedKeywords: Object.freeze([...match.matchedKeywords]) }));

    if (types.length > 0) {
      categories.push(
        Object.freeze({
          category: categoryConfig.category,
          weight: Math.max(...types.map((t) => t.weight)),
          types: Object.freeze(types),
        })
      );
    }
  }

  return Object.freeze({ categories: Object.freeze(categories) });
}

/**
 * Highest type weight in the selection, 0 when nothing matched
 */
export function maxTypeWeight(selection: StatementSelection): number {
  return selection.categories.reduce(
    (max, category) => category.types.reduce((inner, type) => Math.max(inner, type.weight), max),
    0
  );
}
