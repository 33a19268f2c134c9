import { Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { createPasswordRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { toIdentityView, toIssuedCredentialView } from '../presenters.js';
import { expiresAtSchema, nameSchema } from './schemas.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register an identity and receive its first API key
 *     description: The key's secret appears in this response only.
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: Identity created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 identity: { $ref: '#/components/schemas/Identity' }
 *                 apiKey: { $ref: '#/components/schemas/IssuedApiKey' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange email and password for a new API key
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *               keyName: { type: string }
 *               expiresAt: { type: string, format: date-time, nullable: true, description: 'Must be in the future' }
 *     responses:
 *       201:
 *         description: Key issued
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 identity: { $ref: '#/components/schemas/Identity' }
 *                 apiKey: { $ref: '#/components/schemas/IssuedApiKey' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       429:
 *         description: Rate limited
 */

const registerBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(8),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  keyName: nameSchema.optional(),
  expiresAt: expiresAtSchema,
});

export interface AuthRouteDependencies {
  register: RegisterUseCase;
  login: LoginUseCase;
}

export function createAuthRoutes(deps: AuthRouteDependencies) {
  const router = Router();
  const passwordRateLimiter = createPasswordRateLimiter();

  router.post(
    '/register',
    passwordRateLimiter,
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await deps.register.execute(body);
      res.status(201).json({
        identity: toIdentityView(result.identity),
        apiKey: toIssuedCredentialView(result.apiKey),
      });
    })
  );

  router.post(
    '/login',
    passwordRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await deps.login.execute(body);
      res.status(201).json({
        identity: toIdentityView(result.identity),
        apiKey: toIssuedCredentialView(result.apiKey),
      });
    })
  );

  return router;
}
