import { Credential, NewCredential } from '../../domain/auth/credential.js';
import { SecretHasher } from '../../domain/auth/secretHasher.js';
import { CredentialRepository } from '../ports.js';

export interface IssuedCredential {
  credential: Credential;
  /** Plaintext key. Returned once, never stored. */
  secret: string;
}

export interface IssueCredentialCommand {
  identityId: number;
  name: string;
  expiresAt?: Date | null;
}

/**
 * Generate a secret and the fields that get stored for it.
 */
export async function mintCredential(
  hasher: SecretHasher,
  name: string,
  expiresAt: Date | null
): Promise<{ secret: string; fields: Omit<NewCredential, 'identityId'> }> {
  const secret = hasher.generateSecret();
  return {
    secret,
    fields: {
      keyHash: await hasher.hash(secret),
      lookupDigest: hasher.lookupDigest(secret),
      name,
      expiresAt,
    },
  };
}

export class IssueCredentialUseCase {
  constructor(
    private credentialRepo: CredentialRepository,
    private hasher: SecretHasher
  ) {}

  async execute(command: IssueCredentialCommand): Promise<IssuedCredential> {
    const { secret, fields } = await mintCredential(
      this.hasher,
      command.name,
      command.expiresAt ?? null
    );

    const credential = await this.credentialRepo.create({
      ...fields,
      identityId: command.identityId,
    });

    return { credential, secret };
  }
}
