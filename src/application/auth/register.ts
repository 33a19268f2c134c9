import { Identity } from '../../domain/auth/identity.js';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import { ConflictError } from '../errors.js';
import { IdentityRepository } from '../ports.js';
import { IssuedCredential, mintCredential } from './issueCredential.js';

export interface RegisterCommand {
  email: string;
  password: string;
}

export interface RegisterResult {
  identity: Identity;
  apiKey: IssuedCredential;
}

export const DEFAULT_KEY_NAME = 'default';

export class RegisterUseCase {
  constructor(
    private identityRepo: IdentityRepository,
    private hasher: SecretHasher
  ) {}

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    const email = command.email.trim().toLowerCase();

    const existing = await this.identityRepo.findByEmail(email);
    if (existing) {
      throw new ConflictError('User with this email already exists');
    }

    const passwordHash = await this.hasher.hashPassword(command.password);
    const { secret, fields } = await mintCredential(this.hasher, DEFAULT_KEY_NAME, null);

    const created = await this.identityRepo.createWithCredential({ email, passwordHash }, fields);
    if (!created) {
      throw new ConflictError('User with this email already exists');
    }

    return {
      identity: created.identity,
      apiKey: { credential: created.credential, secret },
    };
  }
}
