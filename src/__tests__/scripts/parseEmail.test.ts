/**
 * Tests for the parse-email command line script
 */

import path from 'path';
import { main, parseArgs, splitEmailFile } from '../../scripts/parseEmail';
import { CONFIG_DIR } from '../helpers/testConfig';

describe('parse-email script', () => {
  describe('parseArgs', () => {
    it('should read every flag', () => {
      expect(parseArgs(['--subject', 'S', '--body', 'B', '--rules-only', '--config', 'cfg'])).toEqual({
        subject: 'S',
        body: 'B',
        rulesOnly: true,
        configDir: 'cfg',
      });
    });

    it('should ignore a flag missing its value', () => {
      expect(parseArgs(['--file'])).toEqual({});
    });
  });

  describe('splitEmailFile', () => {
    it('should take a leading Subject line as the subject', () => {
      expect(splitEmailFile('Subject: PMS Request\r\nBody line 1\r\nline 2\n')).toEqual({
        subject: 'PMS Request',
        body: 'Body line 1\nline 2',
      });
    });

    it('should treat the whole file as body otherwise', () => {
      expect(splitEmailFile('\n  send holdings  \n')).toEqual({ subject: '', body: 'send holdings' });
    });
  });

  describe('main', () => {
    let writeSpy: jest.SpyInstance;

    beforeEach(() => {
      writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      writeSpy.mockRestore();
    });

    it('should print the serialized result', async () => {
      const result = await main({
        subject: 'PMS Statement Request',
        body: 'Send me portfolio statement as on 15-Mar-2024 for PAN ABCDE1234F',
        rulesOnly: true,
        configDir: CONFIG_DIR,
      });

      expect(result.pan_numbers).toEqual(['ABCDE1234F']);
      expect(result.from_date).toBe('2024-03-15');
      expect(writeSpy).toHaveBeenCalledWith(`${JSON.stringify(result, null, 2)}\n`);
    });

    it('should fail on an empty email', async () => {
      await expect(main({ subject: '', body: '', rulesOnly: true, configDir: CONFIG_DIR })).rejects.toMatchObject({
        code: 'INPUT_001',
      });
    });

    it('should fail on a missing config directory', async () => {
      await expect(
        main({ body: 'holdings', rulesOnly: true, configDir: path.join(CONFIG_DIR, 'missing') })
      ).rejects.toMatchObject({ code: 'CONFIG_001' });
    });
  });
});
