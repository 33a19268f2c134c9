import { Identity } from '../../domain/auth/identity.js';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import { InvalidCredentialsError } from '../errors.js';
import { IdentityRepository } from '../ports.js';
import { IssueCredentialUseCase, IssuedCredential } from './issueCredential.js';

export interface LoginCommand {
  email: string;
  password: string;
  keyName?: string;
  expiresAt?: Date | null;
}

export interface LoginResult {
  identity: Identity;
  apiKey: IssuedCredential;
}

/**
 * Exchange email and password for a freshly issued API key.
 */
export class LoginUseCase {
  constructor(
    private identityRepo: IdentityRepository,
    private hasher: SecretHasher,
    private issueCredential: IssueCredentialUseCase
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const identity = await this.identityRepo.findByEmail(command.email.trim().toLowerCase());
    if (!identity) {
      throw new InvalidCredentialsError();
    }

    const isValid = await this.hasher.verifyPassword(command.password, identity.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    const apiKey = await this.issueCredential.execute({
      identityId: identity.id,
      name: command.keyName ?? 'login',
      expiresAt: command.expiresAt ?? null,
    });

    return { identity, apiKey };
  }
}
