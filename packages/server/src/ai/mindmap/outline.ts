// ─── Markdown outline extraction ────────────────────────────────────
//
// Best-effort: only `#` headings and `-` bullets carry structure. Every
// other line (prose, numbered lists, tables) is classified as `ignored`
// and dropped on purpose. Nothing in here throws on malformed input.

import type { OutlineNode } from '@mindroom/shared';

/** Classification of one trimmed, non-blank source line. */
export type OutlineLine =
  | { kind: 'heading'; level: number; title: string }
  | { kind: 'item'; title: string }
  | { kind: 'ignored'; text: string };

const FENCE = '```';

/** Classify a single trimmed line. */
export function classifyLine(line: string): OutlineLine {
  if (line.startsWith('#')) {
    const level = line.length - line.replace(/^#+/, '').length;
    return { kind: 'heading', level, title: line.replace(/^[# ]+/, '').trim() };
  }
  if (line.startsWith('-')) {
    return { kind: 'item', title: line.replace(/^[- ]+/, '').trim() };
  }
  return { kind: 'ignored', text: line };
}

/**
 * Convert Markdown-like text into an ordered list of outline nodes.
 *
 * Blank lines are skipped; headings keep their `#` depth as `level`,
 * bullets get level `0`.
 *
 * @example
 * parseOutline('# A\n## B\n- c');
 * // → [{ level: 1, title: 'A', kind: 'heading' },
 * //    { level: 2, title: 'B', kind: 'heading' },
 * //    { level: 0, title: 'c', kind: 'item' }]
 */
export function parseOutline(markdown: string): OutlineNode[] {
  const nodes: OutlineNode[] = [];

  for (const rawLine of markdown.trim().split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const classified = classifyLine(line);
    switch (classified.kind) {
      case 'heading':
        nodes.push(Object.freeze({ level: classified.level, title: classified.title, kind: 'heading' as const }));
        break;
      case 'item':
        nodes.push(Object.freeze({ level: 0, title: classified.title, kind: 'item' as const }));
        break;
      case 'ignored':
        break;
    }
  }

  return nodes;
}

/**
 * Remove a Markdown code fence wrapped around a model response.
 *
 * When the trimmed text opens with ```` ``` ```` and spans more than two
 * lines, the first and last lines are dropped. The closing line is not
 * checked; shorter input is returned trimmed but otherwise untouched.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith(FENCE)) return trimmed;

  const lines = trimmed.split('\n');
  return lines.length > 2 ? lines.slice(1, -1).join('\n') : trimmed;
}
