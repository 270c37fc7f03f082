// ─── Outline → topic tree ───────────────────────────────────────────
//
// A single left-to-right fold over the outline. The only state is the
// current topic; new items always go to its most recent subtopic.

import type { MindmapSubtopic, MindmapTopic, OutlineNode } from '@mindroom/shared';

/**
 * Shown when the outline contains no level-1 heading at all, so the
 * renderer always has something to draw.
 */
export const DEFAULT_MINDMAP_TOPIC: Readonly<MindmapTopic> = Object.freeze({
  title: 'The Future of AI',
  subtopics: [
    {
      title: 'Technology',
      items: ['Machine learning advances', 'Deep learning breakthroughs', 'Natural language processing'],
    },
    {
      title: 'Applications',
      items: ['Medical diagnosis', 'Smart transportation', 'Financial technology'],
    },
  ],
  looseItems: [],
});

/**
 * Fold outline nodes into level-1 topics.
 *
 * - Level 1 heading: opens a new topic.
 * - Level 2 heading: appends a subtopic to the current topic.
 * - Item: goes to the current topic's last subtopic, or to its
 *   `looseItems` before any subtopic exists.
 *
 * Level-2 headings and items seen before the first topic are dropped, as
 * are headings deeper than level 2.
 */
export function buildTopicTree(nodes: readonly OutlineNode[]): MindmapTopic[] {
  const topics: MindmapTopic[] = [];
  let currentTopic: MindmapTopic | null = null;

  for (const node of nodes) {
    if (node.kind === 'heading') {
      if (node.level === 1) {
        currentTopic = { title: node.title, subtopics: [], looseItems: [] };
        topics.push(currentTopic);
      } else if (node.level === 2 && currentTopic) {
        currentTopic.subtopics.push({ title: node.title, items: [] });
      }
      continue;
    }

    if (!currentTopic) continue;
    const lastSubtopic: MindmapSubtopic | undefined = currentTopic.subtopics.at(-1);
    if (lastSubtopic) {
      lastSubtopic.items.push(node.title);
    } else {
      currentTopic.looseItems.push(node.title);
    }
  }

  return topics;
}

/**
 * Pick the topic to render: the first one wins. Additional level-1
 * topics are parsed but not drawn.
 */
export function selectRootTopic(topics: readonly MindmapTopic[]): Readonly<MindmapTopic> {
  return topics[0] ?? DEFAULT_MINDMAP_TOPIC;
}
