import { Router } from 'express';

export interface HealthRouteOptions {
  env: string;
  /** Round-trip to the store, e.g. `SELECT 1`. */
  probe: () => Promise<unknown>;
  timeoutMs?: number;
}

/**
 * Helper to add timeout to a promise.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * @openapi
 * /health:
 *   get:
 *     tags: [Health]
 *     summary: Liveness plus a database round-trip
 *     responses:
 *       200:
 *         description: Database reachable
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createHealthRoutes(options: HealthRouteOptions) {
  const router = Router();

  router.get('/health', (_req, res, next) => {
    withTimeout(options.probe(), options.timeoutMs ?? 2000)
      .then(() => {
        res.status(200).json({
          status: 'ok',
          env: options.env,
          timestamp: new Date().toISOString(),
        });
      })
      .catch((error: unknown) => {
        console.error('[http] Health probe failed:', error);
        res.status(503).json({
          code: 'STORE_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  return router;
}
