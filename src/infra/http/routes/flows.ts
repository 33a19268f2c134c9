import { Router } from 'express';
import { z } from 'zod';
import { CreateProjectUseCase } from '../../../application/flows/createProject.js';
import { CreateFlowUseCase } from '../../../application/flows/createFlow.js';
import { RunFlowUseCase } from '../../../application/flows/runFlow.js';
import { DeleteResourcesUseCase } from '../../../application/flows/deleteResources.js';
import { ResourceQueries } from '../../../application/flows/queries.js';
import { requireIdentity } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { idParamsSchema, idSchema, nameSchema } from './schemas.js';

/**
 * @openapi
 * /api/projects:
 *   post:
 *     tags: [Projects]
 *     summary: Create a project
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name]
 *             properties:
 *               name: { type: string, minLength: 1, maxLength: 200 }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Project' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Projects]
 *     summary: List the caller's projects
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Project' }
 *
 * /api/projects/{id}:
 *   get:
 *     tags: [Projects]
 *     summary: Get a project
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Project' }
 *       404:
 *         description: Not found or access denied
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Projects]
 *     summary: Delete a project with its flows and runs
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: Not found or access denied
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/projects/{id}/flows:
 *   get:
 *     tags: [Flows]
 *     summary: List the flows of a project
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Flow' }
 *
 * /api/flows:
 *   post:
 *     tags: [Flows]
 *     summary: Create a flow in one of the caller's projects
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [projectId, name]
 *             properties:
 *               projectId: { type: integer, minimum: 1, maximum: 2147483647 }
 *               name: { type: string, minLength: 1, maxLength: 200 }
 *               description: { type: string, nullable: true }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Flow' }
 *       404:
 *         description: Project not found or access denied
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/flows/{id}:
 *   get:
 *     tags: [Flows]
 *     summary: Get a flow
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Flow' }
 *   delete:
 *     tags: [Flows]
 *     summary: Delete a flow with its runs
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       204: { description: Deleted }
 *
 * /api/flows/{id}/run:
 *   post:
 *     tags: [Runs]
 *     summary: Record a new run of a flow
 *     description: Creates a pending run record. Nothing is executed.
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       201:
 *         description: Run created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/FlowRun' }
 *       404:
 *         description: Flow not found or access denied
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/flows/{id}/runs:
 *   get:
 *     tags: [Runs]
 *     summary: List the runs of a flow
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/FlowRun' }
 *
 * /api/runs/{id}:
 *   get:
 *     tags: [Runs]
 *     summary: Get a run
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: path, name: id, required: true, schema: { type: integer } }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/FlowRun' }
 */

const createProjectBodySchema = z.object({
  name: nameSchema,
});

const createFlowBodySchema = z.object({
  projectId: idSchema,
  name: nameSchema,
  description: z.string().nullable().optional(),
});

export interface FlowRouteDependencies {
  createProject: CreateProjectUseCase;
  createFlow: CreateFlowUseCase;
  runFlow: RunFlowUseCase;
  deleteResources: DeleteResourcesUseCase;
  queries: ResourceQueries;
}

/**
 * Project, flow and run routes. Mount behind apiKeyAuth.
 */
export function createFlowRoutes(deps: FlowRouteDependencies) {
  const router = Router();
  const withId = validate({ params: idParamsSchema });

  // Projects
  router.post(
    '/projects',
    validate({ body: createProjectBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createProjectBodySchema.parse(req.body);
      const project = await deps.createProject.execute({
        identityId: requireIdentity(req).id,
        name: body.name,
      });
      res.status(201).json(project);
    })
  );

  router.get(
    '/projects',
    asyncHandler(async (req, res) => {
      res.json(await deps.queries.listProjects(requireIdentity(req).id));
    })
  );

  router.get(
    '/projects/:id',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.queries.getProject(id, requireIdentity(req).id));
    })
  );

  router.delete(
    '/projects/:id',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deps.deleteResources.deleteProject(id, requireIdentity(req).id);
      res.status(204).end();
    })
  );

  router.get(
    '/projects/:id/flows',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.queries.listFlows(id, requireIdentity(req).id));
    })
  );

  // Flows
  router.post(
    '/flows',
    validate({ body: createFlowBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createFlowBodySchema.parse(req.body);
      const flow = await deps.createFlow.execute({
        identityId: requireIdentity(req).id,
        projectId: body.projectId,
        name: body.name,
        description: body.description,
      });
      res.status(201).json(flow);
    })
  );

  router.get(
    '/flows/:id',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.queries.getFlow(id, requireIdentity(req).id));
    })
  );

  router.delete(
    '/flows/:id',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deps.deleteResources.deleteFlow(id, requireIdentity(req).id);
      res.status(204).end();
    })
  );

  // Runs
  router.post(
    '/flows/:id/run',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const run = await deps.runFlow.execute({ identityId: requireIdentity(req).id, flowId: id });
      res.status(201).json(run);
    })
  );

  router.get(
    '/flows/:id/runs',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.queries.listRuns(id, requireIdentity(req).id));
    })
  );

  router.get(
    '/runs/:id',
    withId,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.queries.getRun(id, requireIdentity(req).id));
    })
  );

  return router;
}
