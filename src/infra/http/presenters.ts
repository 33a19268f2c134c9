import { Identity } from '../../domain/auth/identity.js';
import { Credential } from '../../domain/auth/credential.js';
import { IssuedCredential } from '../../application/auth/issueCredential.js';

export interface IdentityView {
  id: number;
  email: string;
  createdAt: Date;
}

export interface CredentialView {
  id: number;
  name: string;
  createdAt: Date;
  lastUsedAt: Date | null;
  expiresAt: Date | null;
}

export function toIdentityView(identity: Identity): IdentityView {
  return { id: identity.id, email: identity.email, createdAt: identity.createdAt };
}

export function toCredentialView(credential: Credential): CredentialView {
  return {
    id: credential.id,
    name: credential.name,
    createdAt: credential.createdAt,
    lastUsedAt: credential.lastUsedAt,
    expiresAt: credential.expiresAt,
  };
}

/** The only response that ever carries a plaintext key. */
export function toIssuedCredentialView(issued: IssuedCredential): CredentialView & { secret: string } {
  return { ...toCredentialView(issued.credential), secret: issued.secret };
}
