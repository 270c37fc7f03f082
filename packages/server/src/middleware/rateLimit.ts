import rateLimit from 'express-rate-limit';
import { MINDMAP_RATE_LIMIT_PER_MINUTE } from '@mindroom/shared';

/**
 * Create an `express-rate-limit` middleware for the mind-map endpoints,
 * which each cost an AI completion.
 *
 * Limits each IP address to `perMinute` requests per 60-second window and
 * answers `429 Too Many Requests` with a JSON error body beyond that.
 *
 * @example
 * app.use('/api/mindmap', createRateLimiter(config.rateLimitPerMinute), createMindmapRouter(service));
 */
export function createRateLimiter(
  perMinute: number = MINDMAP_RATE_LIMIT_PER_MINUTE,
): ReturnType<typeof rateLimit> {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}
