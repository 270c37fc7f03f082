import 'dotenv/config';
import { createServer } from 'node:http';
import Anthropic from '@anthropic-ai/sdk';
import { wrapAnthropic } from 'langsmith/wrappers/anthropic';
import { errorData, logger } from '@mindroom/shared';
import { loadConfig } from './config.js';
import { setupDatabase, createRoomRepository, createWorkspaceStore } from './db/database.js';
import { AnthropicAIClient, withTracing } from './ai/client.js';
import { createMindmapService } from './ai/mindmap/handleMindmap.js';
import { createApp } from './app.js';

const log = logger('server');
const config = loadConfig();

// Initialize SQLite database for rooms and AI workspaces
const db = setupDatabase(config.dbPath);

const anthropic = wrapAnthropic(new Anthropic());
const ai = withTracing(
  new AnthropicAIClient({
    messages: anthropic.messages,
    workspaces: createWorkspaceStore(db),
    model: config.anthropicModel,
    maxTokens: config.anthropicMaxTokens,
  }),
);

const mindmaps = createMindmapService({
  rooms: createRoomRepository(db),
  ai,
  fallbackPaths: config.fallbackPaths,
  promptLanguage: config.promptLanguage,
});

const app = createApp({
  db,
  mindmaps,
  corsOrigin: config.corsOrigin,
  rateLimitPerMinute: config.rateLimitPerMinute,
});

const httpServer = createServer(app);

httpServer.listen(config.port, () => {
  log.info('HTTP server running', { port: config.port });
});

// ── Graceful shutdown ────────────────────────────────────────────────
let shuttingDown = false;

/**
 * Stop accepting connections, let in-flight requests finish, then close
 * SQLite and exit. Only the first signal counts; a 10-second timer forces
 * the exit if a step hangs.
 */
function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('shutting down', { signal });

  httpServer.close((err) => {
    if (err) log.error('HTTP server close error', errorData(err));
    else log.info('HTTP server closed');
    db.close();
    log.info('database closed');
    process.exit(err ? 1 : 0);
  });

  // Hard exit if graceful shutdown takes too long
  setTimeout(() => {
    log.error('forced exit after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
