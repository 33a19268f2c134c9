import pg from 'pg';
import type { Repositories } from '../../application/ports.js';
import { IdentityRepo } from './identityRepo.js';
import { CredentialRepo } from './credentialRepo.js';
import { ProjectRepo } from './projectRepo.js';
import { FlowRepo } from './flowRepo.js';
import { RunRepo } from './runRepo.js';

export function createPgRepositories(pool: pg.Pool): Repositories {
  return {
    identities: new IdentityRepo(pool),
    credentials: new CredentialRepo(pool),
    projects: new ProjectRepo(pool),
    flows: new FlowRepo(pool),
    runs: new RunRepo(pool),
  };
}
