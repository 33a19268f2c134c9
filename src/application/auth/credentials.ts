import { Credential } from '../../domain/auth/credential.js';
import { NotFoundOrForbiddenError } from '../errors.js';
import { CredentialRepository, IdentityRepository } from '../ports.js';

/**
 * Key and identity management for an authenticated caller.
 */
export class CredentialManagement {
  constructor(
    private credentialRepo: CredentialRepository,
    private identityRepo: IdentityRepository
  ) {}

  async list(identityId: number): Promise<Credential[]> {
    return this.credentialRepo.listByIdentity(identityId);
  }

  async revoke(credentialId: number, identityId: number): Promise<void> {
    const deleted = await this.credentialRepo.deleteOwned(credentialId, identityId);
    if (!deleted) {
      throw new NotFoundOrForbiddenError('API key');
    }
  }

  /** Deletes the identity; its keys, projects, flows and runs go with it. */
  async deleteIdentity(identityId: number): Promise<void> {
    const deleted = await this.identityRepo.delete(identityId);
    if (!deleted) {
      throw new NotFoundOrForbiddenError('Identity');
    }
  }
}
