import { describe, it, expect } from 'vitest';
import { classifyLine, parseOutline, stripCodeFence } from './outline.js';

describe('classifyLine', () => {
  it('counts heading depth', () => {
    expect(classifyLine('### Deep')).toEqual({ kind: 'heading', level: 3, title: 'Deep' });
  });

  it('strips every leading # and space from the title', () => {
    expect(classifyLine('## # Odd')).toEqual({ kind: 'heading', level: 2, title: 'Odd' });
  });

  it('treats a heading without a space as a heading', () => {
    expect(classifyLine('#Tight')).toEqual({ kind: 'heading', level: 1, title: 'Tight' });
  });

  it('strips leading dashes and spaces from items', () => {
    expect(classifyLine('-- nested item')).toEqual({ kind: 'item', title: 'nested item' });
  });

  it('ignores prose, numbered lists and star bullets', () => {
    expect(classifyLine('Some prose').kind).toBe('ignored');
    expect(classifyLine('1. first').kind).toBe('ignored');
    expect(classifyLine('* star').kind).toBe('ignored');
  });
});

describe('parseOutline', () => {
  it('extracts headings and items in document order', () => {
    expect(parseOutline('# A\n## B\n- c')).toEqual([
      { level: 1, title: 'A', kind: 'heading' },
      { level: 2, title: 'B', kind: 'heading' },
      { level: 0, title: 'c', kind: 'item' },
    ]);
  });

  it('skips blank and unrecognised lines and trims indentation', () => {
    const markdown = '\n\n  # Title  \n\nIntro paragraph\n   - point one\n\n| a | b |\n';
    expect(parseOutline(markdown)).toEqual([
      { level: 1, title: 'Title', kind: 'heading' },
      { level: 0, title: 'point one', kind: 'item' },
    ]);
  });

  it('returns no nodes for empty or structureless input', () => {
    expect(parseOutline('')).toEqual([]);
    expect(parseOutline('just some text\nand more')).toEqual([]);
  });

  it('returns frozen nodes', () => {
    const [node] = parseOutline('# Frozen');
    expect(Object.isFrozen(node)).toBe(true);
  });

  it('handles CRLF line endings', () => {
    expect(parseOutline('# A\r\n- b\r\n')).toEqual([
      { level: 1, title: 'A', kind: 'heading' },
      { level: 0, title: 'b', kind: 'item' },
    ]);
  });
});

describe('stripCodeFence', () => {
  it('removes a fence around the outline', () => {
    expect(stripCodeFence('```markdown\n# A\n- b\n```')).toBe('# A\n- b');
  });

  it('trims surrounding whitespace first', () => {
    expect(stripCodeFence('\n  ```\n# A\n```  \n')).toBe('# A');
  });

  it('leaves unfenced text untouched apart from trimming', () => {
    expect(stripCodeFence('  # A\n- b  ')).toBe('# A\n- b');
  });

  it('keeps a fence that spans two lines or fewer', () => {
    expect(stripCodeFence('```\n# A')).toBe('```\n# A');
  });

  it('drops the last line even when it is not a closing fence', () => {
    expect(stripCodeFence('```\n# A\n- b')).toBe('# A');
  });
});
