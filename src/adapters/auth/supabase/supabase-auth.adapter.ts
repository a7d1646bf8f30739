// =============================================================================
// SupabaseAuthAdapter — Password sign-in & JWT verification via Supabase Auth
// =============================================================================

import type { AuthPort, AuthUser, Credentials, IssuedToken } from "../../../ports/auth.port.js";
import { AuthError, errorMessage } from "../../../errors.js";
import { resolveSupabaseAuth, toRoles } from "./supabase-client.js";
import type { SupabaseAdapterOptions, SupabaseAuthApi, SupabaseUserLike } from "./supabase-client.js";

export class SupabaseAuthAdapter implements AuthPort {
  private readonly authPromise: Promise<SupabaseAuthApi>;

  constructor(options: SupabaseAdapterOptions) {
    this.authPromise = resolveSupabaseAuth(options, "SupabaseAuthAdapter");
  }

  async issueToken(credentials: Credentials): Promise<IssuedToken> {
    const auth = await this.authPromise;
    const result = await auth.signInWithPassword(credentials).catch((err: unknown) => {
      throw new AuthError(`Sign-in failed: ${errorMessage(err)}`);
    });

    const { user, session } = result.data;
    if (result.error || !user || !session) {
      throw new AuthError(result.error?.message ?? "Invalid email or password");
    }
    return { accessToken: session.access_token, user: toAuthUser(user) };
  }

  async validateToken(token: string): Promise<AuthUser> {
    if (!token) throw new AuthError("Missing access token");

    const auth = await this.authPromise;
    const result = await auth.getUser(token).catch((err: unknown) => {
      throw new AuthError(`Token validation failed: ${errorMessage(err)}`);
    });

    const { user } = result.data;
    if (result.error || !user) {
      throw new AuthError(result.error?.message ?? "Invalid token");
    }
    return toAuthUser(user);
  }
}

function toAuthUser(user: SupabaseUserLike): AuthUser {
  return { id: user.id, email: user.email, roles: toRoles(user) };
}
