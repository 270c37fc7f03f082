// ─── Discussion room records ─────────────────────────────────────────
//
// Typed records at the boundary between the room store and the mind-map
// pipeline. The store assembles them; the pipeline only reads them.

/** Thumbs-up / thumbs-down vote on a comment. */
export type VoteKind = 'good' | 'bad';

/** Aggregated votes for one comment. */
export interface VoteTally {
  good: number;
  bad: number;
}

/** A participant's comment under a discussion topic. */
export interface DiscussionComment {
  /** UUID v4. */
  id: string;
  /** Display name chosen by the participant. */
  nickname: string;
  content: string;
  votes: VoteTally;
  /** Unix epoch milliseconds. */
  createdAt: number;
}

/** A topic opened by the host inside a room. Comments are in posting order. */
export interface DiscussionTopic {
  id: string;
  name: string;
  comments: DiscussionComment[];
  createdAt: number;
}

/**
 * A live discussion room, keyed by its short code.
 *
 * @property workspaceSlug - AI workspace created for this room on first use,
 *   or `null` until then.
 */
export interface Room {
  code: string;
  title: string;
  workspaceSlug: string | null;
  topics: DiscussionTopic[];
  createdAt: number;
}

/** Room fields without the nested discussion, as returned on creation. */
export type RoomSummary = Omit<Room, 'topics'>;

// ─── Mind-map pipeline ───────────────────────────────────────────────

/** Kind of a node extracted from mind-map Markdown. */
export type OutlineNodeKind = 'heading' | 'item';

/**
 * One heading or bullet extracted from the outline, in document order.
 *
 * @property level - Heading depth (`#` count), or `0` for a bullet item.
 */
export interface OutlineNode {
  readonly level: number;
  readonly title: string;
  readonly kind: OutlineNodeKind;
}

/** Level-2 heading with the bullets that follow it. */
export interface MindmapSubtopic {
  title: string;
  items: string[];
}

/**
 * Level-1 heading: the root of a rendered mind map.
 *
 * @property looseItems - Bullets that appeared before the first subtopic.
 */
export interface MindmapTopic {
  title: string;
  subtopics: MindmapSubtopic[];
  looseItems: string[];
}

/** Where the Markdown behind a generated mind map came from. */
export type MindmapSource = 'room' | 'custom' | 'file' | 'default';

/** Body of a mind-map generation request. */
export interface MindmapRequest {
  roomCode?: string;
  customContent?: string;
}

/** Raw AI interaction for a room, exposed for inspection. */
export interface MindmapPreview {
  roomCode: string;
  roomTitle: string;
  markdown: string;
  promptUsed: string;
}
