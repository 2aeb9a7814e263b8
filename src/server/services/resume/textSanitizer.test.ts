import { describe, expect, it } from 'vitest';
import { sanitizeForStandardFonts } from './textSanitizer.js';

describe('sanitizeForStandardFonts', () => {
  it('keeps Latin-1 accents and WinAnsi punctuation', () => {
    const text = 'Formação — São Paulo • “Ótimo” €10';

    expect(sanitizeForStandardFonts(text)).toBe(text);
  });

  it('maps look-alike characters to ASCII', () => {
    expect(sanitizeForStandardFonts('2019\u20112021 |\tSQL')).toBe('2019-2021 |    SQL');
  });

  it('drops invisible and unencodable characters', () => {
    expect(sanitizeForStandardFonts('\uFEFFAna\u200B Lima \u2713\u0007')).toBe('Ana Lima ');
  });

  it('keeps line breaks', () => {
    expect(sanitizeForStandardFonts('a\r\nb\nc')).toBe('a\r\nb\nc');
  });
});
