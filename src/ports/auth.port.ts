// =============================================================================
// AuthPort — Token issuing & validation contract
// =============================================================================

export interface Credentials {
  email: string;
  password: string;
}

export interface AuthUser {
  id: string;
  email?: string;
  roles: string[];
}

export interface IssuedToken {
  accessToken: string;
  user: AuthUser;
}

export interface AuthPort {
  /** Exchange credentials for an access token. Throws AuthError when rejected. */
  issueToken(credentials: Credentials): Promise<IssuedToken>;

  /** Resolve the user behind a token. Throws AuthError when invalid or expired. */
  validateToken(token: string): Promise<AuthUser>;
}
