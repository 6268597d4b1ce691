/**
 * Auth Middleware
 * Constructs ActorContext from whatever the PrincipalResolver yields
 *
 * Identity itself is an external concern: in production the resolver verifies
 * a Supabase JWT, in development it can hand out a fixed local owner.
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext, Principal } from '../../types/index.js';

/**
 * Turns an Authorization header into a principal, or null for "not signed in"
 */
export interface PrincipalResolver {
  resolve: (authorization: string | undefined) => Promise<Principal | null>;
}

/**
 * The slice of the Supabase client the resolver needs
 */
export interface SupabaseAuthClient {
  auth: {
    getUser: (jwt: string) => Promise<{
      data: { user: { id: string; email?: string | undefined } | null };
      error: { message: string } | null;
    }>;
  };
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function extractBearerToken(authorization: string | undefined): string | null {
  if (authorization === undefined || !authorization.startsWith('Bearer ')) {
    return null;
  }
  const token = authorization.slice(7).trim();
  return token === '' ? null : token;
}

/**
 * Verify bearer JWTs with Supabase Auth
 */
export function createSupabasePrincipalResolver(
  supabaseClient: SupabaseAuthClient
): PrincipalResolver {
  return {
    async resolve(authorization) {
      const token = extractBearerToken(authorization);
      if (token === null) {
        return null;
      }

      const {
        data: { user },
        error,
      } = await supabaseClient.auth.getUser(token);

      if (error !== null || user === null) {
        return null;
      }

      const principal: Principal = { userId: user.id };
      if (user.email !== undefined) {
        principal.email = user.email;
      }
      return principal;
    },
  };
}

/**
 * Every request is the same local owner (AUTH_DISABLED development mode)
 */
export function createStaticPrincipalResolver(userId: string): PrincipalResolver {
  return {
    async resolve() {
      return { userId };
    },
  };
}

function buildActor(
  c: Context,
  requestId: string,
  principal: Principal | null
): ActorContext {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');

  return {
    type: principal === null ? 'anonymous' : 'user',
    requestId,
    ...(principal !== null && { userId: principal.userId }),
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * Create auth middleware
 * required: reject unauthenticated requests with 401
 * optional: attach an anonymous actor instead
 */
export function createAuthMiddleware(deps: {
  resolver: PrincipalResolver;
  required?: boolean;
}) {
  const { resolver } = deps;
  const required = deps.required ?? true;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    let principal: Principal | null;
    try {
      principal = await resolver.resolve(c.req.header('Authorization'));
    } catch (err) {
      console.error('Auth middleware error:', err);
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }

    if (principal === null && required) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Missing or invalid credentials',
            requestId,
          },
        },
        401
      );
    }

    c.set('actor', buildActor(c, requestId, principal));
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    c.set('actor', buildActor(c, requestId, null));
    c.set('requestId', requestId);

    return next();
  };
}
