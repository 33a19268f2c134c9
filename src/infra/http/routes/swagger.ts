import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildSwaggerSpec } from '../swagger.js';

export function createSwaggerRoutes() {
  const router = Router();
  const spec = buildSwaggerSpec();

  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
