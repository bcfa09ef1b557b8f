/**
 * Tests for the CSV codec
 */

import { encodeField, encodeRow, parseCsv } from './csv';

describe('CSV codec', () => {
  describe('encoding', () => {
    it('should leave plain fields untouched', () => {
      expect(encodeField('router-01')).toBe('router-01');
    });

    it('should quote fields containing separators and quotes', () => {
      expect(encodeField('core, rack 2')).toBe('"core, rack 2"');
      expect(encodeField('say "hi"')).toBe('"say ""hi"""');
      expect(encodeField('two\nlines')).toBe('"two\nlines"');
    });

    it('should terminate rows with a newline', () => {
      expect(encodeRow(['a', '', 'c,d'])).toBe('a,,"c,d"\n');
    });
  });

  describe('parseCsv', () => {
    it('should split rows and fields', () => {
      expect(parseCsv('a,b\nc,d\n')).toEqual([['a', 'b'], ['c', 'd']]);
    });

    it('should accept CRLF line endings', () => {
      expect(parseCsv('a,b\r\nc,d\r\n')).toEqual([['a', 'b'], ['c', 'd']]);
    });

    it('should unescape quoted fields', () => {
      expect(parseCsv('"x, y","say ""hi"""\n')).toEqual([['x, y', 'say "hi"']]);
    });

    it('should keep newlines inside quoted fields', () => {
      expect(parseCsv('"line1\nline2",z\n')).toEqual([['line1\nline2', 'z']]);
    });

    it('should drop blank lines but keep rows of empty fields', () => {
      expect(parseCsv('a\n\nb\n,\n')).toEqual([['a'], ['b'], ['', '']]);
    });

    it('should keep a final row without a terminator', () => {
      expect(parseCsv('a,b')).toEqual([['a', 'b']]);
    });

    it('should run an unterminated quote to the end of input', () => {
      expect(parseCsv('a,"bc')).toEqual([['a', 'bc']]);
    });

    it('should round-trip encoded rows', () => {
      const fields = ['2024-03-01T10:00:00.000Z', 'edge "A", west', ''];
      expect(parseCsv(encodeRow(fields))).toEqual([fields]);
    });
  });
});
