import { Router } from 'express';
import { z } from 'zod';
import { CredentialManagement } from '../../../application/auth/credentials.js';
import { IssueCredentialUseCase } from '../../../application/auth/issueCredential.js';
import { requireIdentity } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { toCredentialView, toIdentityView, toIssuedCredentialView } from '../presenters.js';
import { expiresAtSchema, idParamsSchema, nameSchema } from './schemas.js';

/**
 * @openapi
 * /api/me:
 *   get:
 *     tags: [Identity]
 *     summary: The identity the presented API key belongs to
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Identity' }
 *       401:
 *         description: Missing, invalid or expired key
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Identity]
 *     summary: Delete the identity with its keys, projects, flows and runs
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       204: { description: Deleted }
 *
 * /api/keys:
 *   get:
 *     tags: [API Keys]
 *     summary: List the caller's API keys (metadata only)
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/ApiKey' }
 *   post:
 *     tags: [API Keys]
 *     summary: Issue a new API key
 *     description: The secret is returned once and cannot be retrieved later.
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name]
 *             properties:
 *               name: { type: string, maxLength: 200 }
 *               expiresAt: { type: string, format: date-time, nullable: true, description: 'Must be in the future' }
 *     responses:
 *       201:
 *         description: Issued
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/IssuedApiKey' }
 *
 * /api/keys/{id}:
 *   delete:
 *     tags: [API Keys]
 *     summary: Revoke one of the caller's API keys
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       204: { description: Revoked }
 *       404:
 *         description: Not found or access denied
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const issueKeyBodySchema = z.object({
  name: nameSchema,
  expiresAt: expiresAtSchema,
});

export interface IdentityRouteDependencies {
  credentials: CredentialManagement;
  issueCredential: IssueCredentialUseCase;
}

/**
 * Routes about the caller itself. Mount behind apiKeyAuth.
 */
export function createIdentityRoutes(deps: IdentityRouteDependencies) {
  const router = Router();

  router.get('/me', (req, res) => {
    res.json(toIdentityView(requireIdentity(req)));
  });

  router.delete(
    '/me',
    asyncHandler(async (req, res) => {
      await deps.credentials.deleteIdentity(requireIdentity(req).id);
      res.status(204).end();
    })
  );

  router.get(
    '/keys',
    asyncHandler(async (req, res) => {
      const keys = await deps.credentials.list(requireIdentity(req).id);
      res.json(keys.map(toCredentialView));
    })
  );

  router.post(
    '/keys',
    validate({ body: issueKeyBodySchema }),
    asyncHandler(async (req, res) => {
      const body = issueKeyBodySchema.parse(req.body);
      const issued = await deps.issueCredential.execute({
        identityId: requireIdentity(req).id,
        name: body.name,
        expiresAt: body.expiresAt,
      });
      res.status(201).json(toIssuedCredentialView(issued));
    })
  );

  router.delete(
    '/keys/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deps.credentials.revoke(id, requireIdentity(req).id);
      res.status(204).end();
    })
  );

  return router;
}
