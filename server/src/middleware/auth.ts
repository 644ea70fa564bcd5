import type { Context, Next } from 'hono';
import { authFromHeader, type AuthContext } from '@vocab-drill/engine';

// Extend Hono context to include the caller's session
declare module 'hono' {
  interface ContextVariableMap {
    auth: AuthContext | null;
  }
}

/**
 * Attach the bearer session, if any, to the request. Routes that reach the
 * data API pass it on explicitly; the engine rejects a missing session.
 */
export async function authMiddleware(c: Context, next: Next): Promise<void> {
  const auth = authFromHeader(c.req.header('Authorization'));
  const expiresAt = c.req.header('X-Session-Expires');
  c.set('auth', auth && expiresAt ? { ...auth, expiresAt } : auth);
  await next();
}
