/**
 * API Middleware Tests
 *
 * Rate limiting, request logging and the global error handler, each
 * mounted on a small Hono app.
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { AppError, errorHandler, formatResponseTime, loggerMiddleware, rateLimiter } from '../../src/api/middleware';
import { StorageError, TurnCancelledError } from '../../src/core/errors';
import { coachingErrorSchema, errorEnvelopeSchema, getJsonResponse } from '../helpers';

describe('rateLimiter', () => {
  it('answers 429 once a client exceeds its window', async () => {
    const app = new Hono();
    app.use('*', rateLimiter({ windowMs: 60_000, maxRequests: 2 }));
    app.get('/ping', (c) => c.text('pong'));

    const headers = { 'x-forwarded-for': '203.0.113.5, 10.0.0.1' };
    const first = await app.request('/ping', { headers });
    const second = await app.request('/ping', { headers });
    const third = await app.request('/ping', { headers });
    const otherClient = await app.request('/ping', { headers: { 'x-forwarded-for': '203.0.113.9' } });

    expect(first.status).toBe(200);
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect(second.status).toBe(200);
    expect(third.status).toBe(429);
    expect((await getJsonResponse(third, errorEnvelopeSchema)).error.code).toBe('RATE_LIMITED');
    expect(otherClient.status).toBe(200);
  });

  it('does not count skipped requests', async () => {
    const app = new Hono();
    app.use('*', rateLimiter({ windowMs: 60_000, maxRequests: 1, skip: (c) => c.req.path === '/free' }));
    app.get('/free', (c) => c.text('ok'));
    app.get('/paid', (c) => c.text('ok'));

    await app.request('/free');
    await app.request('/free');

    expect((await app.request('/paid')).status).toBe(200);
  });
});

describe('loggerMiddleware', () => {
  it('logs method, path, status and duration', async () => {
    const lines: string[] = [];
    const app = new Hono();
    app.use('*', loggerMiddleware({ colorize: false, log: (line) => lines.push(line) }));
    app.get('/ping', (c) => c.text('pong'));
    app.get('/health', (c) => c.text('ok'));

    await app.request('/ping');
    await app.request('/health');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] GET \/ping 200 - \d+ms$/);
  });

  it('formats long durations in seconds', () => {
    expect(formatResponseTime(250)).toBe('250ms');
    expect(formatResponseTime(1500)).toBe('1.50s');
  });
});

describe('errorHandler', () => {
  function appThrowing(error: unknown): Hono {
    const app = new Hono();
    app.onError(errorHandler());
    app.get('/fail', () => {
      throw error;
    });
    return app;
  }

  it('answers 499 for a cancelled turn', async () => {
    const response = await appThrowing(
      new TurnCancelledError({ stage: 'inference', conversationId: 'conv_gone' })
    ).request('/fail');
    const json = await getJsonResponse(response, coachingErrorSchema);

    expect(response.status).toBe(499);
    expect(json.error.code).toBe('TURN_CANCELLED');
    expect(json.error.details).toEqual({ stage: 'inference', retryable: false, conversationId: 'conv_gone' });
  });

  it('answers 500 with the storage stage when conversation state cannot be stored', async () => {
    const response = await appThrowing(
      new StorageError('Could not load conv_io: SQLITE_IOERR: disk I/O error', {
        stage: 'storage',
        conversationId: 'conv_io',
      })
    ).request('/fail');
    const json = await getJsonResponse(response, coachingErrorSchema);

    expect(response.status).toBe(500);
    expect(json.error.code).toBe('STORAGE_ERROR');
    expect(json.error.message).toBe('Could not load conv_io: SQLITE_IOERR: disk I/O error');
    expect(json.error.details).toEqual({ stage: 'storage', retryable: false, conversationId: 'conv_io' });
  });

  it('uses the status and code of an AppError', async () => {
    const response = await appThrowing(new AppError('NOT_FOUND', 'Nothing here', 404)).request('/fail');
    const json = await getJsonResponse(response, errorEnvelopeSchema);

    expect(response.status).toBe(404);
    expect(json.error).toEqual({ code: 'NOT_FOUND', message: 'Nothing here' });
  });

  it('reports unexpected errors as INTERNAL_ERROR', async () => {
    const response = await appThrowing(new Error('disk full')).request('/fail');
    const json = await getJsonResponse(response, errorEnvelopeSchema);

    expect(response.status).toBe(500);
    expect(json.error.code).toBe('INTERNAL_ERROR');
    expect(json.error.message).toBe('disk full');
  });
});
