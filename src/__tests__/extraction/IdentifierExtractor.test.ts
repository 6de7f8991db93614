/**
 * Unit Tests for IdentifierExtractor
 */

import type { IdentifierPatternConfig } from '../../config/extraction';
import {
  countIdentifiers,
  extractIdentifiers,
  hasAnyIdentifier,
  isDateLike,
  validateIdentifier,
} from '../../extraction/IdentifierExtractor';
import { shippedConfig } from '../helpers/testConfig';

describe('IdentifierExtractor', () => {
  const patterns = shippedConfig().identifiers;

  describe('extractIdentifiers', () => {
    it('should extract PAN and DI code from a statement request', () => {
      const text =
        'subject: pms statement request body: send me portfolio statement as on 15-mar-2024 for pan abcde1234f and di d0131848';

      const result = extractIdentifiers(text, patterns);

      expect(result).toEqual({
        pan: ['ABCDE1234F'],
        di_code: ['D0131848'],
        account_code: [],
        aif_folio: [],
      });
    });

    it('should always return every identifier kind', () => {
      const result = extractIdentifiers('', patterns);

      expect(Object.keys(result).sort()).toEqual(['account_code', 'aif_folio', 'di_code', 'pan']);
      expect(countIdentifiers(result)).toBe(0);
      expect(hasAnyIdentifier(result)).toBe(false);
    });

    it('should keep order of first appearance and remove duplicates', () => {
      const text = 'pan abcde1234f, pan fghij5678k and again abcde1234f';

      const result = extractIdentifiers(text, patterns);

      expect(result.pan).toEqual(['ABCDE1234F', 'FGHIJ5678K']);
    });

    it('should extract AIF folios starting with 5-9 only', () => {
      const result = extractIdentifiers('folio 5123456789 and 4123456789', patterns);

      expect(result.aif_folio).toEqual(['5123456789']);
      expect(result.account_code).toEqual([]);
    });

    it('should reject date-shaped account codes', () => {
      const result = extractIdentifiers('accounts 15032024, 12345678 and 20240315', patterns);

      expect(result.account_code).toEqual(['12345678']);
    });

    it('should not match identifiers inside longer tokens', () => {
      const result = extractIdentifiers('ref xabcde1234f 123456789', patterns);

      expect(result.pan).toEqual([]);
      expect(result.account_code).toEqual([]);
    });

    it('should require a digit in DI codes', () => {
      const result = extractIdentifiers('dividend details for december and d12ab345', patterns);

      expect(result.di_code).toEqual(['D12AB345']);
    });

    it('should apply per-kind exclusions', () => {
      const custom: IdentifierPatternConfig[] = [
        { kind: 'di_code', pattern: 'D[0-9A-Z]{7}', exclude: ['DIVIDEND'], rejectDateLike: false },
      ];

      const result = extractIdentifiers('dividend d1234567', custom);

      expect(result.di_code).toEqual(['D1234567']);
    });

    it('should give overlapping spans to the longer candidate', () => {
      const custom: IdentifierPatternConfig[] = [
        { kind: 'account_code', pattern: '[0-9]{8}', exclude: [], rejectDateLike: false },
        { kind: 'aif_folio', pattern: '[0-9]{8}-[0-9]{2}', exclude: [], rejectDateLike: false },
      ];

      const result = extractIdentifiers('folio 12345678-90', custom);

      expect(result.aif_folio).toEqual(['12345678-90']);
      expect(result.account_code).toEqual([]);
    });

    it('should break equal-length overlaps by configuration order', () => {
      const custom: IdentifierPatternConfig[] = [
        { kind: 'account_code', pattern: '[0-9]{8}', exclude: [], rejectDateLike: false },
        { kind: 'aif_folio', pattern: '[0-9]{8}', exclude: [], rejectDateLike: false },
      ];

      const result = extractIdentifiers('ref 12345678', custom);

      expect(result.account_code).toEqual(['12345678']);
      expect(result.aif_folio).toEqual([]);
    });

    it('should return frozen lists', () => {
      const result = extractIdentifiers('pan abcde1234f', patterns);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.pan)).toBe(true);
    });
  });

  describe('validateIdentifier', () => {
    it('should uppercase and accept values matching the anchored pattern', () => {
      expect(validateIdentifier('pan', ' abcde1234f ', patterns)).toBe('ABCDE1234F');
      expect(validateIdentifier('aif_folio', '9876543210', patterns)).toBe('9876543210');
    });

    it('should reject values that do not match exactly', () => {
      expect(validateIdentifier('pan', 'ABCDE1234', patterns)).toBeNull();
      expect(validateIdentifier('di_code', 'D01318489', patterns)).toBeNull();
      expect(validateIdentifier('account_code', '15032024', patterns)).toBeNull();
    });
  });

  describe('isDateLike', () => {
    it('should detect DDMMYYYY and YYYYMMDD shapes', () => {
      expect(isDateLike('15032024')).toBe(true);
      expect(isDateLike('20240315')).toBe(true);
      expect(isDateLike('31121999')).toBe(true);
    });

    it('should ignore values outside the plausible year range', () => {
      expect(isDateLike('15031890')).toBe(false);
      expect(isDateLike('12345678')).toBe(false);
      expect(isDateLike('2024031')).toBe(false);
    });
  });
});
