/**
 * Authorization Policy
 * Role gates see only the principal's roles, never how it authenticated.
 */

import type { AuthorizationDecision, Principal, Role } from '@hamco/shared';

export const ADMIN_ROLE: Role = 'Admin';
export const USER_ROLE: Role = 'User';

/**
 * Role set for a persisted elevated/regular flag. Credentials and API keys
 * both store the flag; the list is derived at authentication time.
 */
export function rolesFor(isAdmin: boolean): Role[] {
  return [isAdmin ? ADMIN_ROLE : USER_ROLE];
}

export function requires(principal: Principal | undefined, role: Role): AuthorizationDecision {
  if (!principal) {
    return { allowed: false, reason: 'unauthenticated' };
  }
  if (!principal.roles.includes(role)) {
    return { allowed: false, reason: 'forbidden' };
  }
  return { allowed: true };
}
