// ─── Mind-map SVG renderer ──────────────────────────────────────────
//
// Turns a laid-out topic into a self-contained SVG document. Draw order
// is root, then each branch (connectors, box, label) followed by its
// items, so later elements paint over earlier ones. The output holds no
// timestamps or generated ids: the same topics always give the same bytes.

import type { MindmapColorName, MindmapTopic } from '@mindroom/shared';
import { MINDMAP_COLORS, MINDMAP_LAYOUT } from '@mindroom/shared';
import type { BranchLayout, ItemLayout, MindmapLayout, Point, RootLayout } from './layout.js';
import { computeMindmapLayout } from './layout.js';
import { selectRootTopic } from './tree.js';
import { stripControlChars } from './textMetrics.js';

export type MindmapPalette = Record<MindmapColorName, string>;

/**
 * Escape text for use inside SVG element content or attribute values.
 * Characters XML cannot carry at all are removed.
 */
export function escapeXml(text: string): string {
  return stripControlChars(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Print a coordinate rounded to two decimals, without trailing zeros. */
export function fmt(n: number): string {
  return String(Math.round(n * 100) / 100);
}

function pt(p: Point): string {
  return `${fmt(p.x)} ${fmt(p.y)}`;
}

function header(layout: MindmapLayout, colors: MindmapPalette): string {
  const { ROOT, BRANCH, ITEM } = MINDMAP_LAYOUT;
  const w = fmt(layout.width);
  const h = fmt(layout.height);
  return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="${w}" height="${h}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <linearGradient id="mainGrad" x1="0%" y1="0%" x2="100%" y2="0%">
      <stop offset="0%" style="stop-color:${colors.main};stop-opacity:1" />
      <stop offset="100%" style="stop-color:${colors.level1};stop-opacity:1" />
    </linearGradient>
    <linearGradient id="branchGrad" x1="0%" y1="0%" x2="100%" y2="0%">
      <stop offset="0%" style="stop-color:${colors.level1};stop-opacity:1" />
      <stop offset="100%" style="stop-color:${colors.level2};stop-opacity:1" />
    </linearGradient>
    <filter id="shadow" x="-20%" y="-20%" width="140%" height="140%">
      <feDropShadow dx="2" dy="2" stdDeviation="3" flood-opacity="0.3"/>
    </filter>
  </defs>
  <style>
    .main-title { font-family: 'Arial', sans-serif; font-size: ${String(ROOT.FONT_SIZE)}px; font-weight: bold; fill: white; }
    .branch-title { font-family: 'Arial', sans-serif; font-size: ${String(BRANCH.FONT_SIZE)}px; font-weight: 600; fill: white; }
    .item-text { font-family: 'Arial', sans-serif; font-size: ${String(ITEM.FONT_SIZE)}px; fill: ${colors.text}; }
    .connector { stroke: ${colors.line}; stroke-width: 2; fill: none; }
  </style>
  <rect width="${w}" height="${h}" fill="${colors.background}"/>
`;
}

function renderRoot(root: RootLayout): string[] {
  const { box } = root;
  const out = [
    `  <rect x="${fmt(box.x)}" y="${fmt(box.y)}" width="${fmt(box.width)}" height="${fmt(box.height)}" fill="url(#mainGrad)" rx="${String(MINDMAP_LAYOUT.ROOT.CORNER_RADIUS)}" filter="url(#shadow)"/>`,
  ];
  for (const [i, line] of box.lines.entries()) {
    const at = root.text[i] ?? root.center;
    out.push(`  <text x="${fmt(at.x)}" y="${fmt(at.y)}" text-anchor="middle" class="main-title">${escapeXml(line)}</text>`);
  }
  return out;
}

function renderItem(item: ItemLayout, colors: MindmapPalette): string[] {
  const { box, connector } = item;
  const out = [
    `  <line x1="${fmt(connector.from.x)}" y1="${fmt(connector.from.y)}" x2="${fmt(connector.to.x)}" y2="${fmt(connector.to.y)}" class="connector" stroke-width="1"/>`,
    `  <rect x="${fmt(box.x)}" y="${fmt(box.y)}" width="${fmt(box.width)}" height="${fmt(box.height)}" fill="${colors.level3}" stroke="${colors.level2}" stroke-width="1" rx="${String(MINDMAP_LAYOUT.ITEM.CORNER_RADIUS)}" opacity="0.9"/>`,
  ];
  for (const [i, line] of box.lines.entries()) {
    const at = item.text[i] ?? item.center;
    out.push(`  <text x="${fmt(at.x)}" y="${fmt(at.y)}" class="item-text">${escapeXml(line)}</text>`);
  }
  return out;
}

function renderBranch(branch: BranchLayout, colors: MindmapPalette): string[] {
  const { box, connector } = branch;
  const out = [
    `  <path d="M ${pt(connector.from)} Q ${pt(connector.control)} ${pt(connector.elbow)}" class="connector"/>`,
    `  <line x1="${fmt(connector.elbow.x)}" y1="${fmt(connector.elbow.y)}" x2="${fmt(connector.to.x)}" y2="${fmt(connector.to.y)}" class="connector"/>`,
    `  <rect x="${fmt(box.x)}" y="${fmt(box.y)}" width="${fmt(box.width)}" height="${fmt(box.height)}" fill="url(#branchGrad)" rx="${String(MINDMAP_LAYOUT.BRANCH.CORNER_RADIUS)}" filter="url(#shadow)"/>`,
  ];
  for (const [i, line] of box.lines.entries()) {
    const at = branch.text[i] ?? branch.center;
    out.push(`  <text x="${fmt(at.x)}" y="${fmt(at.y)}" text-anchor="middle" class="branch-title">${escapeXml(line)}</text>`);
  }
  for (const item of branch.items) {
    out.push(...renderItem(item, colors));
  }
  return out;
}

/** Render an already computed layout. */
export function renderLayoutSvg(layout: MindmapLayout, colors: MindmapPalette = MINDMAP_COLORS): string {
  const body: string[] = [...renderRoot(layout.root)];
  for (const branch of layout.branches) {
    body.push(...renderBranch(branch, colors));
  }
  return `${header(layout, colors)}${body.join('\n')}\n</svg>\n`;
}

/**
 * Render the first topic as an SVG mind map.
 *
 * An empty topic list is not an error: the built-in demonstration topic
 * is drawn instead.
 */
export function renderMindmapSvg(
  topics: readonly MindmapTopic[],
  colors: MindmapPalette = MINDMAP_COLORS,
): string {
  return renderLayoutSvg(computeMindmapLayout(selectRootTopic(topics)), colors);
}
