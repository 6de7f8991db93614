/**
 * Text Normalizer
 * Builds the single lower-cased analysis string from an email's subject and body
 */

import { NormalizedText } from './types';

export interface NormalizationOptions {
  unicode_normalization?: 'NFC' | 'NFKC' | 'none';
  subject_marker?: string;
  body_marker?: string;
}

// Control characters (excluding tab, newline, carriage return)
const CONTROL_CHARS_PATTERN = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g;
// Zero-width characters that survive Unicode normalization
const ZERO_WIDTH_PATTERN = /[\u200B-\u200D\uFEFF]/g;

export class TextNormalizer {
  private options: Required<NormalizationOptions>;

  constructor(options: NormalizationOptions = {}) {
    this.options = {
      unicode_normalization: options.unicode_normalization || 'NFKC',
      subject_marker: options.subject_marker || 'subject:',
      body_marker: options.body_marker || 'body:',
    };
  }

  /**
   * Normalize subject and body into one analysis string.
   * Blank input on both sides yields an empty NormalizedText.
   */
  normalize(subject?: string | null, body?: string | null): NormalizedText {
    const cleanSubject = this.clean(subject ?? '');
    const cleanBody = this.clean(body ?? '');

    if (cleanSubject.length === 0 && cleanBody.length === 0) {
      return Object.freeze({ text: '', isEmpty: true });
    }

    const text = `${this.options.subject_marker} ${cleanSubject} ${this.options.body_marker} ${cleanBody}`
      .replace(/\s+/g, ' ')
      .trim();

    return Object.freeze({ text, isEmpty: false });
  }

  /**
   * Clean one fragment: Unicode form, control characters, case and whitespace
   */
  clean(fragment: string): string {
    let cleaned = fragment;

    if (this.options.unicode_normalization !== 'none') {
      cleaned = cleaned.normalize(this.options.unicode_normalization);
    }

    return cleaned
      .replace(CONTROL_CHARS_PATTERN, ' ')
      .replace(ZERO_WIDTH_PATTERN, '')
      .toLowerCase()
      .replace(/\s+/g, ' ')
      .trim();
  }
}

const defaultNormalizer = new TextNormalizer();

/**
 * Normalize with default options
 */
export function normalizeEmailText(subject?: string | null, body?: string | null): NormalizedText {
  return defaultNormalizer.normalize(subject, body);
}

export default TextNormalizer;
