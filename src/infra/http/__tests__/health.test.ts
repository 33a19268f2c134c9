import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createHealthRoutes, withTimeout } from '../routes/health.js';

describe('GET /health', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function appWith(probe: () => Promise<unknown>, timeoutMs: number): express.Application {
    const app = express();
    app.use(createHealthRoutes({ env: 'test', probe, timeoutMs }));
    return app;
  }

  it('should answer 503 when the probe never settles', async () => {
    const app = appWith(() => new Promise<never>(() => undefined), 50);

    const started = Date.now();
    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ code: 'STORE_UNAVAILABLE', message: 'Database unavailable' });
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('should answer 200 when the probe beats the timeout', async () => {
    const response = await request(appWith(() => Promise.resolve(), 1000)).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
  });
});

describe('withTimeout', () => {
  it('should reject with "timeout" once the limit passes', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10)).rejects.toThrow('timeout');
  });

  it('should pass through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });
});
