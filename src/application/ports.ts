import type { Identity, NewIdentity } from '../domain/auth/identity.js';
import type { Credential, NewCredential } from '../domain/auth/credential.js';
import type { Project, Flow } from '../domain/flows/resources.js';
import type { FlowRun, NewFlowRun, RunStatus } from '../domain/flows/flowRun.js';

/**
 * Store-facing interfaces the use cases depend on. The pg repositories in
 * infra/db implement them; unit tests substitute in-memory versions.
 *
 * Every `ownerId` argument scopes the query to resources whose ownership
 * chain ends at that identity. A row outside the chain reads as absent.
 */
export interface IdentityRepository {
  findById(id: number): Promise<Identity | null>;
  findByEmail(email: string): Promise<Identity | null>;
  /**
   * Insert an identity together with its first credential in one transaction.
   * With `onlyIfEmpty`, nothing is written and null is returned when any
   * identity already exists.
   */
  createWithCredential(
    identity: NewIdentity,
    credential: Omit<NewCredential, 'identityId'>,
    options?: { onlyIfEmpty?: boolean }
  ): Promise<{ identity: Identity; credential: Credential } | null>;
  delete(id: number): Promise<boolean>;
}

export interface CredentialRepository {
  /**
   * Credentials whose lookup digest equals `lookupDigest`, plus those stored
   * without one, ordered by id.
   */
  findCandidates(lookupDigest: string): Promise<Credential[]>;
  create(credential: NewCredential): Promise<Credential>;
  touchLastUsed(id: number, usedAt: Date): Promise<void>;
  listByIdentity(identityId: number): Promise<Credential[]>;
  deleteOwned(id: number, identityId: number): Promise<boolean>;
}

export interface ProjectRepository {
  create(ownerId: number, name: string): Promise<Project>;
  listByOwner(ownerId: number): Promise<Project[]>;
  findOwned(id: number, ownerId: number): Promise<Project | null>;
  deleteOwned(id: number, ownerId: number): Promise<boolean>;
}

export interface FlowRepository {
  /** Returns null when the project is not owned by `ownerId`. */
  createInOwnedProject(
    ownerId: number,
    input: { projectId: number; name: string; description: string | null }
  ): Promise<Flow | null>;
  listByProject(projectId: number, ownerId: number): Promise<Flow[]>;
  findOwned(id: number, ownerId: number): Promise<Flow | null>;
  deleteOwned(id: number, ownerId: number): Promise<boolean>;
}

export interface RunRepository {
  create(run: NewFlowRun): Promise<FlowRun>;
  listByFlow(flowId: number, ownerId: number): Promise<FlowRun[]>;
  findOwned(id: number, ownerId: number): Promise<FlowRun | null>;
  /**
   * Persist a transition only if the stored status still equals
   * `expectedStatus`. Returns false when another writer got there first.
   */
  saveTransition(run: FlowRun, expectedStatus: RunStatus): Promise<boolean>;
}

export interface Repositories {
  identities: IdentityRepository;
  credentials: CredentialRepository;
  projects: ProjectRepository;
  flows: FlowRepository;
  runs: RunRepository;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
