import path from 'node:path';
import { MINDMAP_RATE_LIMIT_PER_MINUTE } from '@mindroom/shared';
import { DEFAULT_FALLBACK_PATHS } from './ai/mindmap/handleMindmap.js';
import { DEFAULT_PROMPT_LANGUAGE } from './ai/mindmap/prompt.js';

/** Runtime settings, read once at startup from the environment. */
export interface ServerConfig {
  port: number;
  corsOrigin: string;
  dbPath: string;
  anthropicModel: string;
  anthropicMaxTokens: number;
  fallbackPaths: string[];
  promptLanguage: string;
  rateLimitPerMinute: number;
}

/** Parse a positive integer, falling back to `fallback` on anything else. */
function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function nonEmpty(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function pathList(value: string | undefined, fallback: readonly string[]): string[] {
  const entries = (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : [...fallback];
}

/**
 * Build the server configuration.
 *
 * `dotenv/config` is imported by the entry point before this runs, so a
 * local `.env` file is already merged into `env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: positiveInt(env['PORT'], 3001),
    corsOrigin: nonEmpty(env['CORS_ORIGIN'], 'http://localhost:5173'),
    dbPath: nonEmpty(env['DB_PATH'], path.join(process.cwd(), 'mindroom.sqlite')),
    anthropicModel: nonEmpty(env['ANTHROPIC_MODEL'], 'claude-haiku-4-5-20251001'),
    anthropicMaxTokens: positiveInt(env['ANTHROPIC_MAX_TOKENS'], 2048),
    fallbackPaths: pathList(env['MINDMAP_FALLBACK_PATHS'], DEFAULT_FALLBACK_PATHS),
    promptLanguage: nonEmpty(env['MINDMAP_LANGUAGE'], DEFAULT_PROMPT_LANGUAGE),
    rateLimitPerMinute: positiveInt(env['MINDMAP_RATE_LIMIT_PER_MINUTE'], MINDMAP_RATE_LIMIT_PER_MINUTE),
  };
}
