/**
 * Markup Tests
 */

import { escapeMarkup, parseMarkup, serializeMarkup, stripMarkup } from './markup';

describe('markup', () => {
  describe('parseMarkup', () => {
    it('should lift a styled run into a span', () => {
      expect(parseMarkup('{RED}TCP{RESET} port')).toEqual({
        text: 'TCP port',
        spans: [{ start: 0, end: 3, style: 'RED' }],
      });
    });

    it('should close an open span at the next style marker', () => {
      expect(parseMarkup('{RED}a{BLUE}b').spans).toEqual([
        { start: 0, end: 1, style: 'RED' },
        { start: 1, end: 2, style: 'BLUE' },
      ]);
    });

    it('should turn BACKSLASH into a literal backslash', () => {
      expect(parseMarkup('C:{BACKSLASH}temp')).toEqual({ text: 'C:\\temp', spans: [] });
    });

    it('should leave lowercase braces alone', () => {
      expect(parseMarkup('set {x} = 1')).toEqual({ text: 'set {x} = 1', spans: [] });
    });

    it('should keep unknown uppercase tokens as text', () => {
      expect(parseMarkup('What does {HOME} expand to?')).toEqual({ text: 'What does {HOME} expand to?', spans: [] });
      expect(parseMarkup('{ID}')).toEqual({ text: '{ID}', spans: [] });
    });

    it('should read an escaped marker as literal text', () => {
      expect(parseMarkup('{LBRACE}RED} alert')).toEqual({ text: '{RED} alert', spans: [] });
    });

    it('should drop empty spans', () => {
      expect(parseMarkup('{RED}{RESET}plain').spans).toEqual([]);
    });
  });

  describe('serializeMarkup', () => {
    it('should re-insert markers around each span', () => {
      const spans = [{ start: 4, end: 7, style: 'BOLD' }];
      expect(serializeMarkup('The UDP way', spans)).toBe('The {BOLD}UDP{RESET} way');
    });

    it('should return plain text without spans', () => {
      expect(serializeMarkup('plain')).toBe('plain');
    });

    it('should reproduce text that parseMarkup read', () => {
      const raw = 'Port {GREEN}22{RESET} is {YELLOW}SSH{RESET}';
      const { text, spans } = parseMarkup(raw);
      expect(serializeMarkup(text, spans)).toBe(raw);
    });
  });

  describe('escapeMarkup', () => {
    it('should escape known markers and leave other braces alone', () => {
      expect(escapeMarkup('{RED} and {HOME}')).toBe('{LBRACE}RED} and {HOME}');
      expect(escapeMarkup('{LBRACE}')).toBe('{LBRACE}LBRACE}');
    });

    it('should read back as the original text', () => {
      for (const text of ['{RED}x{RESET}', 'C:{BACKSLASH}temp', '{LBRACE}', 'use {ID} here']) {
        expect(parseMarkup(serializeMarkup(text))).toEqual({ text, spans: [] });
      }
    });

    it('should escape inside a styled span', () => {
      const spans = [{ start: 0, end: 5, style: 'BOLD' }];
      expect(serializeMarkup('{RED}', spans)).toBe('{BOLD}{LBRACE}RED}{RESET}');
      expect(parseMarkup('{BOLD}{LBRACE}RED}{RESET}')).toEqual({ text: '{RED}', spans });
    });
  });

  describe('stripMarkup', () => {
    it('should return the plain text', () => {
      expect(stripMarkup('{RED}Đúng{RESET}')).toBe('Đúng');
    });
  });
});
