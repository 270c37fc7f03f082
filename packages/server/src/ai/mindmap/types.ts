// ─── Mind-map pipeline contracts ────────────────────────────────────

import type { MindmapSource, Room } from '@mindroom/shared';
import type { AIClient } from '../client.js';

/**
 * Read access to discussion rooms, plus the one write the pipeline makes:
 * caching the AI workspace slug on first use.
 */
export interface RoomRepository {
  getRoom(code: string): Room | null;
  setWorkspaceSlug(code: string, slug: string): void;
}

/** A rendered mind map, ready for the HTTP layer to stream. */
export interface MindmapArtifact {
  svg: string;
  /** Suggested download name, `mindmap_YYYYMMDD_HHMMSS.svg`. */
  filename: string;
  contentType: 'image/svg+xml';
  source: MindmapSource;
  /** Markdown the diagram was drawn from. */
  markdown: string;
}

export interface MindmapServiceDeps {
  rooms: RoomRepository;
  ai: AIClient;
  /** Files tried, in order, when the request names neither a room nor content. */
  fallbackPaths?: readonly string[];
  /** Language the model is asked to answer in. */
  promptLanguage?: string;
  /** Clock used for the artifact filename. */
  now?: () => Date;
}
