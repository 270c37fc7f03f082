// ─── Mind-map layout (left-to-right fan) ────────────────────────────
//
// Single deterministic pass over one topic:
//
//   1. **Root**: centered on (ROOT.CENTER_X, CANVAS_HEIGHT / 2).
//   2. **Branches**: one column right of the root, fanned vertically
//      around the root's center at a fixed spacing.
//   3. **Items**: a second column right of each branch, at most
//      ITEM.MAX_PER_BRANCH of them, in a window centered on the branch.
//
// Box extents are halved with integer division; text is wrapped before
// measuring.

import type { MindmapTopic } from '@mindroom/shared';
import { MINDMAP_LAYOUT } from '@mindroom/shared';
import { stripControlChars, widestLine, wrapText } from './textMetrics.js';

export interface Point {
  x: number;
  y: number;
}

/** Rectangle for one node; `x`/`y` is the top-left corner. */
export interface LayoutBox {
  x: number;
  y: number;
  width: number;
  height: number;
  lines: string[];
}

interface NodeLayout {
  box: LayoutBox;
  center: Point;
  /** Baseline position of each entry in `box.lines`. */
  text: Point[];
}

export type RootLayout = NodeLayout;

export interface ItemLayout extends NodeLayout {
  connector: { from: Point; to: Point };
}

/**
 * A subtopic box. Its connector is a quadratic curve from the root's right
 * edge to `elbow`, then a straight segment into the box at `to`.
 */
export interface BranchLayout extends NodeLayout {
  connector: { from: Point; control: Point; elbow: Point; to: Point };
  items: ItemLayout[];
}

export interface MindmapLayout {
  width: number;
  height: number;
  root: RootLayout;
  branches: BranchLayout[];
}

interface BoxMetrics {
  MAX_TEXT_WIDTH: number;
  FONT_SIZE: number;
  MIN_WIDTH: number;
  PADDING_X: number;
  MIN_HEIGHT: number;
  LINE_HEIGHT: number;
  PADDING_Y: number;
  BASELINE_OFFSET: number;
}

const half = (n: number): number => Math.floor(n / 2);

/**
 * Wrap `title` and size a box around it from the level's metrics. Control
 * characters are dropped first so the measured text is the drawn text.
 */
function measureBox(title: string, m: BoxMetrics): { lines: string[]; width: number; height: number } {
  const lines = wrapText(stripControlChars(title), m.MAX_TEXT_WIDTH, m.FONT_SIZE);
  return {
    lines,
    width: Math.max(m.MIN_WIDTH, widestLine(lines, m.FONT_SIZE) + m.PADDING_X),
    height: Math.max(m.MIN_HEIGHT, lines.length * m.LINE_HEIGHT + m.PADDING_Y),
  };
}

/** Baselines for `count` lines vertically centered on `centerY`. */
function lineBaselines(x: number, centerY: number, count: number, m: BoxMetrics): Point[] {
  const top = centerY - (count - 1) * (m.LINE_HEIGHT / 2);
  return Array.from({ length: count }, (_, i) => ({
    x,
    y: top + i * m.LINE_HEIGHT + m.BASELINE_OFFSET,
  }));
}

/**
 * Vertical spacing between branch centers, or `0` when there are none.
 */
export function branchSpacing(count: number): number {
  if (count <= 0) return 0;
  const { CANVAS_HEIGHT, BRANCH } = MINDMAP_LAYOUT;
  return Math.min(BRANCH.MAX_SPACING, Math.floor((CANVAS_HEIGHT - BRANCH.VERTICAL_MARGIN) / count));
}

function layoutItems(branchRight: number, branchY: number, items: readonly string[]): ItemLayout[] {
  const { ITEM } = MINDMAP_LAYOUT;
  const startX = branchRight + ITEM.GAP_X;

  return items.slice(0, ITEM.MAX_PER_BRANCH).map((title, index) => {
    const itemY = branchY + (index - ITEM.CENTER_SLOT) * ITEM.SPACING;
    const { lines, width, height } = measureBox(title, ITEM);
    return {
      box: { x: startX, y: itemY - half(height), width, height, lines },
      center: { x: startX + half(width), y: itemY },
      text: lineBaselines(startX + ITEM.TEXT_INSET, itemY, lines.length, ITEM),
      connector: { from: { x: branchRight, y: branchY }, to: { x: startX, y: itemY } },
    };
  });
}

/**
 * Compute every box, text baseline and connector for `topic`.
 *
 * Loose items (bullets before the first subtopic) are not drawn.
 */
export function computeMindmapLayout(topic: Readonly<MindmapTopic>): MindmapLayout {
  const { CANVAS_WIDTH, CANVAS_HEIGHT, ROOT, BRANCH } = MINDMAP_LAYOUT;

  // ── Root ───────────────────────────────────────────────────────
  const rootX = ROOT.CENTER_X;
  const rootY = half(CANVAS_HEIGHT);
  const rootBox = measureBox(topic.title, ROOT);
  const root: RootLayout = {
    box: {
      x: rootX - half(rootBox.width),
      y: rootY - half(rootBox.height),
      width: rootBox.width,
      height: rootBox.height,
      lines: rootBox.lines,
    },
    center: { x: rootX, y: rootY },
    text: lineBaselines(rootX, rootY, rootBox.lines.length, ROOT),
  };

  // ── Branches ───────────────────────────────────────────────────
  const rootRight = rootX + half(rootBox.width);
  const branchX = rootRight + BRANCH.GAP_X;
  const elbowX = branchX - BRANCH.ELBOW_OFFSET;
  const count = topic.subtopics.length;
  const spacing = branchSpacing(count);
  const firstY = rootY - half((count - 1) * spacing);

  const branches = topic.subtopics.map((subtopic, index): BranchLayout => {
    const branchY = firstY + index * spacing;
    const { lines, width, height } = measureBox(subtopic.title, BRANCH);
    return {
      box: { x: branchX, y: branchY - half(height), width, height, lines },
      center: { x: branchX + half(width), y: branchY },
      text: lineBaselines(branchX + half(width), branchY, lines.length, BRANCH),
      connector: {
        from: { x: rootRight, y: rootY },
        control: { x: elbowX, y: rootY },
        elbow: { x: elbowX, y: branchY },
        to: { x: branchX, y: branchY },
      },
      items: layoutItems(branchX + width, branchY, subtopic.items),
    };
  });

  return { width: CANVAS_WIDTH, height: CANVAS_HEIGHT, root, branches };
}
