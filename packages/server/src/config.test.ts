import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      corsOrigin: 'http://localhost:5173',
      dbPath: path.join(process.cwd(), 'mindroom.sqlite'),
      anthropicModel: 'claude-haiku-4-5-20251001',
      anthropicMaxTokens: 2048,
      fallbackPaths: ['frontend/public/AIresult.txt', '../frontend/public/AIresult.txt'],
      promptLanguage: 'English',
      rateLimitPerMinute: 10,
    });
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      CORS_ORIGIN: 'https://rooms.example.test',
      DB_PATH: '/tmp/rooms.sqlite',
      ANTHROPIC_MODEL: 'test-model',
      ANTHROPIC_MAX_TOKENS: '1024',
      MINDMAP_FALLBACK_PATHS: ' a.txt , ,b.txt ',
      MINDMAP_LANGUAGE: 'Japanese',
      MINDMAP_RATE_LIMIT_PER_MINUTE: '3',
    });
    expect(config).toEqual({
      port: 8080,
      corsOrigin: 'https://rooms.example.test',
      dbPath: '/tmp/rooms.sqlite',
      anthropicModel: 'test-model',
      anthropicMaxTokens: 1024,
      fallbackPaths: ['a.txt', 'b.txt'],
      promptLanguage: 'Japanese',
      rateLimitPerMinute: 3,
    });
  });

  it('falls back on invalid numbers', () => {
    const config = loadConfig({ PORT: 'abc', ANTHROPIC_MAX_TOKENS: '-5', MINDMAP_RATE_LIMIT_PER_MINUTE: '0' });
    expect(config.port).toBe(3001);
    expect(config.anthropicMaxTokens).toBe(2048);
    expect(config.rateLimitPerMinute).toBe(10);
  });

  it('treats blank strings as unset', () => {
    const config = loadConfig({ MINDMAP_LANGUAGE: '  ', MINDMAP_FALLBACK_PATHS: ' , ' });
    expect(config.promptLanguage).toBe('English');
    expect(config.fallbackPaths).toEqual(['frontend/public/AIresult.txt', '../frontend/public/AIresult.txt']);
  });
});
