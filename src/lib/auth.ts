/**
 * Bearer token verification for the realtime upgrade.
 * Tokens are HS256 JWTs whose `sub` is the user id.
 */

import { jwtVerify, errors as joseErrors } from 'jose';
import { toUserId, type UserId } from '@domain/tickets';
import { AppError } from '@/lib/app-error';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface TokenVerifier {
  verify(token: string): Promise<UserId>;
}

export class JwtVerifier implements TokenVerifier {
  private readonly secret: Uint8Array;

  constructor(secret: string) {
    this.secret = new TextEncoder().encode(secret);
  }

  async verify(token: string): Promise<UserId> {
    let subject: string | undefined;
    try {
      const { payload } = await jwtVerify(token, this.secret, { algorithms: ['HS256'] });
      subject = payload.sub;
    } catch (error) {
      if (error instanceof joseErrors.JWTExpired) {
        throw AppError.unauthorized('Token expired');
      }
      throw AppError.unauthorized('Invalid token');
    }

    if (!subject || !UUID_PATTERN.test(subject)) {
      throw AppError.unauthorized('Token subject is not a user id');
    }
    return toUserId(subject);
  }
}

/**
 * Pull the bearer token from the Authorization header, falling back to the
 * `token` query parameter (browsers cannot set headers on a WebSocket).
 */
export function extractToken(authorization: string | undefined, url: URL): string | null {
  if (authorization) {
    const [scheme, value] = authorization.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && value) {
      return value.trim();
    }
  }
  const fromQuery = url.searchParams.get('token');
  return fromQuery && fromQuery.length > 0 ? fromQuery : null;
}
