import { Identity } from '../../domain/auth/identity.js';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import { IdentityRepository } from '../ports.js';
import { IssuedCredential, mintCredential } from './issueCredential.js';

export interface BootstrapCommand {
  email: string;
  /** Password for the admin identity; a random one is generated when omitted. */
  password?: string;
}

export interface BootstrapResult {
  identity: Identity;
  apiKey: IssuedCredential;
}

export const BOOTSTRAP_KEY_NAME = 'bootstrap';

/**
 * Provision the administrative identity and its single API key on an empty
 * store. Returns null once any identity exists.
 */
export class BootstrapAdminUseCase {
  constructor(
    private identityRepo: IdentityRepository,
    private hasher: SecretHasher
  ) {}

  async execute(command: BootstrapCommand): Promise<BootstrapResult | null> {
    const password = command.password ?? this.hasher.generateSecret();
    const passwordHash = await this.hasher.hashPassword(password);
    const { secret, fields } = await mintCredential(this.hasher, BOOTSTRAP_KEY_NAME, null);

    const created = await this.identityRepo.createWithCredential(
      { email: command.email.trim().toLowerCase(), passwordHash },
      fields,
      { onlyIfEmpty: true }
    );
    if (!created) {
      return null;
    }

    return {
      identity: created.identity,
      apiKey: { credential: created.credential, secret },
    };
  }
}
