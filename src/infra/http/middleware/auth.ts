import { Request, RequestHandler } from 'express';
import { Identity } from '../../../domain/auth/identity.js';
import { VerifyCredentialUseCase } from '../../../application/auth/verifyCredential.js';
import { MissingCredentialError } from '../../../application/errors.js';
import { asyncHandler } from './asyncHandler.js';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by apiKeyAuth once the bearer key resolves. */
      identity?: Identity;
    }
  }
}

/**
 * Secret from an `Authorization: Bearer <secret>` header. Any other scheme,
 * or an empty token, counts as no credential.
 */
export function extractBearerSecret(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  const token = match?.[1].trim();
  return token ? token : undefined;
}

export function apiKeyAuth(verifyCredential: VerifyCredentialUseCase): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const secret = extractBearerSecret(req.headers.authorization);
    if (!secret) {
      throw new MissingCredentialError();
    }

    req.identity = await verifyCredential.execute(secret);
    next();
  });
}

/**
 * The identity apiKeyAuth attached to the request.
 */
export function requireIdentity(req: Request): Identity {
  if (!req.identity) {
    throw new MissingCredentialError();
  }
  return req.identity;
}
