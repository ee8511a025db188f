/**
 * Tests for parseCheckArgs function
 */

import { describe, it, expect } from 'vitest';
import { parseCheckArgs } from '../../src/cli-check.js';

describe('parseCheckArgs', () => {
  describe('help and version modes', () => {
    it('returns help mode when --help flag present', () => {
      expect(parseCheckArgs(['--help'])).toEqual({ mode: 'help' });
    });

    it('returns help mode when -h flag present with other args', () => {
      expect(parseCheckArgs(['file.cc', '-h', '--bogus'])).toEqual({
        mode: 'help',
      });
    });

    it('returns version mode when --version flag present', () => {
      expect(parseCheckArgs(['--version'])).toEqual({ mode: 'version' });
    });

    it('returns version mode when -v flag present', () => {
      expect(parseCheckArgs(['-v'])).toEqual({ mode: 'version' });
    });
  });

  describe('error cases', () => {
    it('throws error for unknown flag', () => {
      expect(() => parseCheckArgs(['--unknown', 'file.cc'])).toThrow(
        'Unknown option: --unknown'
      );
    });

    it('throws error when file argument missing', () => {
      expect(() => parseCheckArgs(['--verbose'])).toThrow(
        'Missing file argument'
      );
    });

    it('throws error when --format has no value', () => {
      expect(() => parseCheckArgs(['file.cc', '--format'])).toThrow(
        '--format requires argument: text or json'
      );
    });

    it('throws error when --format value is another flag', () => {
      expect(() =>
        parseCheckArgs(['file.cc', '--format', '--verbose'])
      ).toThrow('--format requires argument: text or json');
    });

    it('throws error when --format value is invalid', () => {
      expect(() => parseCheckArgs(['file.cc', '--format', 'xml'])).toThrow(
        'Invalid format: xml. Expected text or json'
      );
    });

    it('throws error when --min-confidence is out of range', () => {
      expect(() =>
        parseCheckArgs(['file.cc', '--min-confidence', '9'])
      ).toThrow('Invalid confidence: 9. Expected an integer from 1 to 5');
    });

    it('throws error when --min-confidence is not an integer', () => {
      expect(() =>
        parseCheckArgs(['file.cc', '--min-confidence', '2.5'])
      ).toThrow('Invalid confidence: 2.5. Expected an integer from 1 to 5');
    });
  });

  describe('check mode parsing', () => {
    it('parses a single file with defaults', () => {
      expect(parseCheckArgs(['test.cc'])).toEqual({
        mode: 'check',
        files: ['test.cc'],
        verbose: false,
        format: 'text',
        minConfidence: null,
      });
    });

    it('collects several files', () => {
      const result = parseCheckArgs(['a.cc', 'b.h', 'c.cpp']);
      expect(result).toMatchObject({ files: ['a.cc', 'b.h', 'c.cpp'] });
    });

    it('parses every option around the files', () => {
      expect(
        parseCheckArgs([
          '--format',
          'json',
          'a.cc',
          '--min-confidence',
          '4',
          '--verbose',
          'b.cc',
        ])
      ).toEqual({
        mode: 'check',
        files: ['a.cc', 'b.cc'],
        verbose: true,
        format: 'json',
        minConfidence: 4,
      });
    });
  });
});
