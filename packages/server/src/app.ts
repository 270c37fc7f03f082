import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type BetterSqlite3 from 'better-sqlite3';
import type { MindmapService } from './ai/mindmap/handleMindmap.js';
import { errorMessage } from './errors.js';
import { createRateLimiter } from './middleware/rateLimit.js';
import { createMindmapRouter } from './routes/mindmap.js';
import { createRoomRouter } from './routes/rooms.js';

export interface AppOptions {
  db: BetterSqlite3.Database;
  mindmaps: MindmapService;
  corsOrigin: string;
  rateLimitPerMinute?: number;
}

/** Assemble the Express app; `index.ts` only adds `listen()` and shutdown. */
export function createApp(options: AppOptions): express.Express {
  const { db, mindmaps, corsOrigin, rateLimitPerMinute } = options;
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: corsOrigin,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '100kb' }));

  app.get('/api/health', (_req, res) => {
    const checks: { sqlite: string } = { sqlite: 'ok' };

    // Verify SQLite is readable
    try {
      db.prepare('SELECT count(*) AS cnt FROM rooms').get();
    } catch (err: unknown) {
      checks.sqlite = errorMessage(err);
    }

    const healthy = checks.sqlite === 'ok';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'unhealthy',
      checks,
    });
  });

  app.use('/api/mindmap', createRateLimiter(rateLimitPerMinute), createMindmapRouter(mindmaps));
  app.use('/api/rooms', createRoomRouter(db));

  return app;
}
