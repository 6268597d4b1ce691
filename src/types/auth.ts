/**
 * Principal Types
 *
 * Identity is resolved outside the core. Services only see who the caller is,
 * never how they authenticated.
 */

/**
 * Actor Context - Who is performing the action
 */
export interface ActorContext {
  type: 'user' | 'anonymous';
  userId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

/**
 * An authenticated principal, as yielded by a PrincipalResolver
 */
export interface Principal {
  userId: string;
  email?: string;
}
