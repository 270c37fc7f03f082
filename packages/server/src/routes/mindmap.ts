import { writeFile, unlink } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Router } from 'express';
import type { Response } from 'express';
import {
  MINDMAP_PREVIEW_SCHEMA,
  MINDMAP_REQUEST_SCHEMA,
  errorData,
  generateId,
  logger,
} from '@mindroom/shared';
import type { MindmapRequest } from '@mindroom/shared';
import type { MindmapService } from '../ai/mindmap/handleMindmap.js';
import { MindmapError, errorMessage } from '../errors.js';
import { validateBody } from '../middleware/validateBody.js';

const log = logger('routes');

/** Map a pipeline failure onto its HTTP status and a `{ error }` body. */
function sendError(res: Response, err: unknown): void {
  if (err instanceof MindmapError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  log.error('unexpected mind-map route error', errorData(err));
  res.status(500).json({ error: 'Internal server error' });
}

function readRequest(body: unknown): MindmapRequest {
  const request: MindmapRequest = {};
  if (typeof body !== 'object' || body === null) return request;
  if ('roomCode' in body && typeof body.roomCode === 'string') request.roomCode = body.roomCode;
  if ('customContent' in body && typeof body.customContent === 'string') {
    request.customContent = body.customContent;
  }
  return request;
}

export interface MindmapRouterOptions {
  /** Directory for staged downloads; defaults to `os.tmpdir()`. */
  tmpDir?: string;
}

/**
 * Stage the SVG in a temp file and hand it to `res.download()`, which sets
 * the attachment disposition and the SVG content type from the `.svg`
 * name. The file is removed once the response ends.
 *
 * @throws {MindmapError} `internal` when the temp file cannot be written.
 */
async function sendSvgDownload(res: Response, tmpDir: string, svg: string, filename: string): Promise<void> {
  const tmpFile = path.join(tmpDir, `mindmap-${generateId()}.svg`);
  try {
    await writeFile(tmpFile, svg, 'utf8');
  } catch (err: unknown) {
    log.error('could not stage mind map download', { path: tmpFile, ...errorData(err) });
    throw new MindmapError('internal', `Mindmap generation failed: ${errorMessage(err)}`, { cause: err });
  }

  res.download(tmpFile, filename, (err) => {
    if (err) log.error('mind map download failed', { filename, ...errorData(err) });
    unlink(tmpFile).catch((unlinkErr: unknown) => {
      log.warn('could not remove temp file', { path: tmpFile, ...errorData(unlinkErr) });
    });
  });
}

/**
 * Router for `/api/mindmap`.
 *
 * @example
 * app.use('/api/mindmap', createRateLimiter(), createMindmapRouter(mindmaps));
 */
export function createMindmapRouter(mindmaps: MindmapService, options: MindmapRouterOptions = {}): Router {
  const tmpDir = options.tmpDir ?? os.tmpdir();
  const router = Router();

  // POST /api/mindmap/generate — render an SVG mind map as a download
  router.post('/generate', validateBody(MINDMAP_REQUEST_SCHEMA), (req, res) => {
    const request = readRequest(req.body);
    void (async () => {
      try {
        const artifact = await mindmaps.generate(request);
        await sendSvgDownload(res, tmpDir, artifact.svg, artifact.filename);
      } catch (err: unknown) {
        sendError(res, err);
      }
    })();
  });

  // POST /api/mindmap/preview — prompt and raw Markdown for a room
  router.post('/preview', validateBody(MINDMAP_PREVIEW_SCHEMA), (req, res) => {
    const { roomCode = '' } = readRequest(req.body);
    void (async () => {
      try {
        res.json(await mindmaps.preview(roomCode));
      } catch (err: unknown) {
        sendError(res, err);
      }
    })();
  });

  return router;
}
