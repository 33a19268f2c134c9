import { Identity } from '../../domain/auth/identity.js';
import { findFirstValidCredential } from '../../domain/auth/credentialVerifier.js';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import {
  IdentityMissingError,
  InvalidOrExpiredCredentialError,
  MissingCredentialError,
} from '../errors.js';
import { Clock, CredentialRepository, IdentityRepository, systemClock } from '../ports.js';

export class VerifyCredentialUseCase {
  constructor(
    private credentialRepo: CredentialRepository,
    private identityRepo: IdentityRepository,
    private hasher: SecretHasher,
    private clock: Clock = systemClock
  ) {}

  /**
   * Resolve a bearer secret to its identity, stamping the matched key's
   * last-used time on the way.
   */
  async execute(secret: string | undefined, now: Date = this.clock()): Promise<Identity> {
    if (!secret) {
      throw new MissingCredentialError();
    }

    const candidates = await this.credentialRepo.findCandidates(this.hasher.lookupDigest(secret));
    const match = await findFirstValidCredential(secret, candidates, now, this.hasher);
    if (!match) {
      throw new InvalidOrExpiredCredentialError();
    }

    // Bookkeeping only: a failed stamp must not reject a valid key
    try {
      await this.credentialRepo.touchLastUsed(match.id, now);
    } catch (error) {
      console.warn(`[auth] Could not record last use of API key ${match.id}:`, error);
    }

    const identity = await this.identityRepo.findById(match.identityId);
    if (!identity) {
      throw new IdentityMissingError();
    }

    return identity;
  }
}
