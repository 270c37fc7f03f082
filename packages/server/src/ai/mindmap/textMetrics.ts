// ─── Text width estimation & wrapping ───────────────────────────────
//
// Heuristic proxy for proportional-font rendering: no glyph metrics are
// available server-side, so every character is either "wide" (code point
// above 127, e.g. CJK) or "narrow" (ASCII). The factors must stay fixed;
// box sizes in existing diagrams depend on them.

import { NARROW_GLYPH_FACTOR, WIDE_GLYPH_FACTOR } from '@mindroom/shared';

/** C0 control characters that XML 1.0 does not allow (tab, LF and CR are). */
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

/** Remove characters that cannot appear in an XML document. */
export function stripControlChars(text: string): string {
  return text.replace(XML_INVALID_CHARS, '');
}

/** Estimated rendered width of `text` at `fontSize`, in SVG user units. */
export function measureTextWidth(text: string, fontSize: number): number {
  let wide = 0;
  let narrow = 0;
  for (const ch of text) {
    if ((ch.codePointAt(0) ?? 0) > 127) {
      wide++;
    } else {
      narrow++;
    }
  }
  return wide * fontSize * WIDE_GLYPH_FACTOR + narrow * fontSize * NARROW_GLYPH_FACTOR;
}

/**
 * Greedily pack the words of `text` into lines no wider than `maxWidth`.
 *
 * Text that already fits is returned as a single line, untouched. A word
 * wider than `maxWidth` on its own still gets its own line. When no line
 * can be produced at all (whitespace-only input) the original text comes
 * back as the only line.
 */
export function wrapText(text: string, maxWidth: number, fontSize: number): string[] {
  if (measureTextWidth(text, fontSize) <= maxWidth) {
    return [text];
  }

  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (measureTextWidth(candidate, fontSize) <= maxWidth) {
      current = candidate;
    } else {
      if (current) lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);

  return lines.length > 0 ? lines : [text];
}

/** Width of the widest line, or `0` for no lines. */
export function widestLine(lines: readonly string[], fontSize: number): number {
  return lines.reduce((max, line) => Math.max(max, measureTextWidth(line, fontSize)), 0);
}
