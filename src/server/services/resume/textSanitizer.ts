/**
 * The standard PDF fonts (Helvetica family) only cover WinAnsi. Characters outside it
 * are mapped to ASCII look-alikes where one exists and dropped otherwise.
 */

const REPLACEMENTS: ReadonlyMap<string, string> = new Map([
  ['\u2010', '-'], // hyphen
  ['\u2011', '-'], // non-breaking hyphen
  ['\u2012', '-'], // figure dash
  ['\u2015', '-'], // horizontal bar
  ['\u2212', '-'], // minus sign
  ['\u2500', '-'], // box drawing horizontal
  ['\u25AA', '-'], // black small square
  ['\u25BA', '-'], // black right-pointing pointer
  ['\u25CF', '-'], // black circle
  ['\u00AD', '-'], // soft hyphen
  ['\u00A0', ' '], // non-breaking space
  ['\u2007', ' '], // figure space
  ['\u202F', ' '], // narrow no-break space
  ['\t', '    '],
  ['\u200B', ''], // zero-width space
  ['\u200C', ''],
  ['\u200D', ''],
  ['\uFEFF', ''], // BOM
]);

// WinAnsi code points above Latin-1 (0x80-0x9F block)
const WIN_ANSI_EXTRAS = new Set(
  '€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ'.split('')
);

function isEncodable(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  if (code === 0x0a || code === 0x0d) return true;
  if (code < 0x20 || (code >= 0x7f && code < 0xa0)) return false;
  return code <= 0xff || WIN_ANSI_EXTRAS.has(char);
}

export function sanitizeForStandardFonts(text: string): string {
  let result = '';
  for (const char of text) {
    const replacement = REPLACEMENTS.get(char);
    if (replacement !== undefined) {
      result += replacement;
    } else if (isEncodable(char)) {
      result += char;
    }
  }
  return result;
}
