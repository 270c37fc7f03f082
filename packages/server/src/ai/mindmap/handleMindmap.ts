// ─── Mind-map request orchestration ─────────────────────────────────
//
// Picks the Markdown source, then runs parse → tree → layout → SVG.
//
// Source precedence: room code > custom content > fallback file >
// built-in example. Two empty states are kept apart on purpose:
//   - the outline has no headings or bullets → bad input (400);
//   - the outline has no level-1 heading     → renderer draws the
//                                               demonstration topic.

import { access, readFile } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import type { MindmapPreview, MindmapRequest, MindmapSource, Room } from '@mindroom/shared';
import { MINDMAP_CONTENT_TYPE, errorData, logger, normalizeRoomCode } from '@mindroom/shared';
import { MindmapError, errorMessage } from '../../errors.js';
import { parseOutline, stripCodeFence } from './outline.js';
import { buildMindmapPrompt } from './prompt.js';
import { renderMindmapSvg } from './renderer.js';
import { buildTopicTree } from './tree.js';
import type { MindmapArtifact, MindmapServiceDeps } from './types.js';

const log = logger('mindmap');

/** Looked up relative to the working directory when no paths are configured. */
export const DEFAULT_FALLBACK_PATHS: readonly string[] = [
  'frontend/public/AIresult.txt',
  '../frontend/public/AIresult.txt',
];

/** Drawn when the request names no room, carries no content and no fallback file exists. */
export const DEFAULT_MINDMAP_MARKDOWN = `# AI Mind Map Example
## AI Applications
- Machine learning
- Deep learning
- Natural language processing
## Technology Trends
- Neural networks
- Large language models
- Computer vision`;

/** Title used for the one-line fallback outline when a room has none. */
export const FALLBACK_SUMMARY_TITLE = 'Discussion summary';

export interface MindmapService {
  generate(request: MindmapRequest): Promise<MindmapArtifact>;
  preview(roomCode: string): Promise<MindmapPreview>;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `mindmap_YYYYMMDD_HHMMSS.svg` in the server's local time. */
export function mindmapFilename(date: Date): string {
  const day = `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `mindmap_${day}_${time}.svg`;
}

/** Content of the first readable file among `paths`, or `null`. */
export async function readFallbackFile(
  paths: readonly string[],
): Promise<{ path: string; content: string } | null> {
  for (const candidate of paths) {
    const resolved = path.resolve(candidate);
    try {
      await access(resolved, fsConstants.R_OK);
    } catch {
      log.debug('fallback file not readable', { path: resolved });
      continue;
    }
    return { path: resolved, content: await readFile(resolved, 'utf8') };
  }
  return null;
}

/**
 * Build the mind-map service over its collaborators.
 *
 * @example
 * const mindmaps = createMindmapService({ rooms, ai });
 * const artifact = await mindmaps.generate({ roomCode: 'K7QX2M' });
 */
export function createMindmapService(deps: MindmapServiceDeps): MindmapService {
  const { rooms, ai, fallbackPaths = DEFAULT_FALLBACK_PATHS, promptLanguage } = deps;
  const now = deps.now ?? ((): Date => new Date());

  function requireRoom(code: string): Room {
    const room = rooms.getRoom(code);
    if (!room) {
      throw new MindmapError('not_found', `Room not found: ${code}`);
    }
    return room;
  }

  function requirePrompt(room: Room): string {
    const prompt = buildMindmapPrompt(room, { language: promptLanguage });
    if (!prompt.trim()) {
      throw new MindmapError('bad_input', 'Could not build a mind-map prompt for this room');
    }
    return prompt;
  }

  /** Cached slug, or a freshly ensured workspace written back to the room. */
  async function resolveWorkspace(room: Room): Promise<string> {
    if (room.workspaceSlug) return room.workspaceSlug;

    log.info('room has no workspace yet, creating one', { roomCode: room.code });
    const slug = await ai.ensureWorkspace(room.code, room.title.trim() || `Room ${room.code}`);
    rooms.setWorkspaceSlug(room.code, slug);
    return slug;
  }

  async function requestMarkdown(room: Room, prompt: string): Promise<string> {
    const slug = await resolveWorkspace(room);
    log.info('requesting mind-map outline', { roomCode: room.code, workspace: slug, promptLength: prompt.length });
    const markdown = stripCodeFence(await ai.complete(prompt, slug, 'mindmap'));
    log.debug('outline received', { roomCode: room.code, length: markdown.length });
    return markdown;
  }

  async function markdownFromRoom(roomCode: string): Promise<string> {
    const room = requireRoom(roomCode);
    const prompt = requirePrompt(room);
    try {
      return await requestMarkdown(room, prompt);
    } catch (err: unknown) {
      log.warn('AI generation failed, falling back to the room title', {
        roomCode,
        ...errorData(err),
      });
      return `# ${room.title.trim() || FALLBACK_SUMMARY_TITLE}`;
    }
  }

  async function resolveSource(request: MindmapRequest): Promise<{ markdown: string; source: MindmapSource }> {
    const roomCode = normalizeRoomCode(request.roomCode ?? '');
    if (roomCode) {
      return { markdown: await markdownFromRoom(roomCode), source: 'room' };
    }
    if (request.customContent) {
      return { markdown: request.customContent, source: 'custom' };
    }
    const file = await readFallbackFile(fallbackPaths);
    if (file) {
      log.info('using fallback file', { path: file.path });
      return { markdown: file.content, source: 'file' };
    }
    return { markdown: DEFAULT_MINDMAP_MARKDOWN, source: 'default' };
  }

  return {
    async generate(request: MindmapRequest): Promise<MindmapArtifact> {
      try {
        const { markdown, source } = await resolveSource(request);

        const nodes = parseOutline(markdown);
        if (nodes.length === 0) {
          throw new MindmapError('bad_input', 'Could not parse the mind-map Markdown');
        }

        const topics = buildTopicTree(nodes);
        const svg = renderMindmapSvg(topics);
        log.info('mind map rendered', { source, nodes: nodes.length, topics: topics.length, bytes: svg.length });

        return {
          svg,
          filename: mindmapFilename(now()),
          contentType: MINDMAP_CONTENT_TYPE,
          source,
          markdown,
        };
      } catch (err: unknown) {
        if (err instanceof MindmapError) throw err;
        log.error('mind map generation failed', errorData(err));
        throw new MindmapError('internal', `Mindmap generation failed: ${errorMessage(err)}`, { cause: err });
      }
    },

    async preview(roomCode: string): Promise<MindmapPreview> {
      const code = normalizeRoomCode(roomCode);
      if (!code) {
        throw new MindmapError('bad_input', 'roomCode is required');
      }
      const room = requireRoom(code);
      const prompt = requirePrompt(room);

      let markdown: string;
      try {
        markdown = await requestMarkdown(room, prompt);
      } catch (err: unknown) {
        log.error('mind map preview failed', { roomCode: code, ...errorData(err) });
        throw new MindmapError('internal', `Preview failed: ${errorMessage(err)}`, { cause: err });
      }

      return { roomCode: room.code, roomTitle: room.title, markdown, promptUsed: prompt };
    },
  };
}
