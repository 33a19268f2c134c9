import express from 'express';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import { Clock, Repositories, systemClock } from '../../application/ports.js';
import { VerifyCredentialUseCase } from '../../application/auth/verifyCredential.js';
import { IssueCredentialUseCase } from '../../application/auth/issueCredential.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { CredentialManagement } from '../../application/auth/credentials.js';
import { CreateProjectUseCase } from '../../application/flows/createProject.js';
import { CreateFlowUseCase } from '../../application/flows/createFlow.js';
import { RunFlowUseCase } from '../../application/flows/runFlow.js';
import { DeleteResourcesUseCase } from '../../application/flows/deleteResources.js';
import { ResourceQueries } from '../../application/flows/queries.js';
import { createAuthRoutes } from './routes/auth.js';
import { createIdentityRoutes } from './routes/identity.js';
import { createFlowRoutes } from './routes/flows.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { apiKeyAuth } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

/** Leaves room for long flow descriptions. */
export const JSON_BODY_LIMIT = '1mb';

export interface AppDependencies {
  env: string;
  rateLimitPerMinute: number;
  hasher: SecretHasher;
  repositories: Repositories;
  healthProbe: () => Promise<unknown>;
  clock?: Clock;
  /** Serve Swagger UI at /docs. Default true. */
  docs?: boolean;
}

/**
 * Compose use cases and routers over the given store. No listening happens here.
 */
export function createApp(deps: AppDependencies): express.Application {
  const { hasher, repositories: repos } = deps;
  const clock = deps.clock ?? systemClock;

  const verifyCredential = new VerifyCredentialUseCase(repos.credentials, repos.identities, hasher, clock);
  const issueCredential = new IssueCredentialUseCase(repos.credentials, hasher);

  const app = express();
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use(createApiRateLimiter(deps.rateLimitPerMinute));

  // Health check endpoint (no auth required)
  app.use(createHealthRoutes({ env: deps.env, probe: deps.healthProbe }));

  if (deps.docs ?? true) {
    app.use(createSwaggerRoutes());
  }

  app.use(
    '/api/auth',
    createAuthRoutes({
      register: new RegisterUseCase(repos.identities, hasher),
      login: new LoginUseCase(repos.identities, hasher, issueCredential),
    })
  );

  // Everything else under /api needs an API key; verify it once per request
  const protectedApi = express.Router();
  protectedApi.use(apiKeyAuth(verifyCredential));
  protectedApi.use(
    createIdentityRoutes({
      credentials: new CredentialManagement(repos.credentials, repos.identities),
      issueCredential,
    })
  );
  protectedApi.use(
    createFlowRoutes({
      createProject: new CreateProjectUseCase(repos.projects),
      createFlow: new CreateFlowUseCase(repos.flows),
      runFlow: new RunFlowUseCase(repos.flows, repos.runs, clock),
      deleteResources: new DeleteResourcesUseCase(repos.projects, repos.flows),
      queries: new ResourceQueries(repos.projects, repos.flows, repos.runs),
    })
  );
  app.use('/api', protectedApi);

  app.use((_req, res) => {
    res.status(404).json({ code: 'NOT_FOUND', message: 'Route not found' });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
