import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createRateLimiter } from './rateLimit.js';

describe('createRateLimiter', () => {
  it('answers 429 once the per-minute budget is spent', async () => {
    const app = express();
    app.use(createRateLimiter(2));
    app.get('/ping', (_req, res) => {
      res.json({ pong: true });
    });

    expect((await request(app).get('/ping')).status).toBe(200);
    expect((await request(app).get('/ping')).status).toBe(200);

    const limited = await request(app).get('/ping');
    expect(limited.status).toBe(429);
    expect(limited.body).toEqual({ error: 'Too many requests, please try again later' });
  });
});
