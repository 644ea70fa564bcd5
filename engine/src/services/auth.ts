import { AuthRequiredError } from '../errors';
import type { AuthContext } from '../types';

/**
 * Build a session from an Authorization header value. Tokens are opaque here;
 * the data API decides whether they are valid.
 */
export function authFromHeader(header: string | null | undefined): AuthContext | null {
  if (!header?.startsWith('Bearer ')) {
    return null;
  }
  const token = header.slice(7).trim();
  return token === '' ? null : { token };
}

/**
 * Guard for remote-touching operations. Throws before any work is done.
 */
export function requireAuth(auth: AuthContext | null | undefined, now: Date): AuthContext {
  if (!auth || auth.token.trim() === '') {
    throw new AuthRequiredError();
  }
  if (auth.expiresAt !== undefined && Date.parse(auth.expiresAt) <= now.getTime()) {
    throw new AuthRequiredError('Session expired');
  }
  return auth;
}
