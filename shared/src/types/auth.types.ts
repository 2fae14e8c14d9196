/**
 * Identity contracts shared by the API and its clients.
 *
 * A principal is built per request by whichever authentication step
 * succeeded. Authorization only ever looks at `roles`; `method` records how
 * the identity was established.
 */

/** The two roles the system knows about. Matching is exact, never hierarchical. */
export type Role = 'Admin' | 'User';

export type AuthMethod = 'token' | 'key';

interface PrincipalBase {
  /** User id for token principals, API key id for key principals */
  readonly subjectId: string;
  /** Email for users, `apikey:<name>` for keys */
  readonly label: string;
  readonly roles: readonly Role[];
}

export interface TokenPrincipal extends PrincipalBase {
  readonly method: 'token';
  readonly tokenId: string;
  readonly expiresAt: Date;
}

export interface KeyPrincipal extends PrincipalBase {
  readonly method: 'key';
  readonly keyId: string;
  readonly keyName: string;
  /** The key record's own expiry, re-checked whenever a cached principal is reused */
  readonly expiresAt: Date | null;
}

export type Principal = TokenPrincipal | KeyPrincipal;

export type DenialReason = 'unauthenticated' | 'forbidden';

export type AuthorizationDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: DenialReason };
