// =============================================================================
// SupabaseUserStoreAdapter — User records kept by Supabase Auth
// =============================================================================

import type { Credentials } from "../../ports/auth.port.js";
import type { UserRecord, UserStorePort } from "../../ports/user-store.port.js";
import { UpstreamServiceError, ValidationError, errorMessage } from "../../errors.js";
import { resolveSupabaseAuth } from "../auth/supabase/supabase-client.js";
import type {
  SupabaseAdapterOptions,
  SupabaseAuthApi,
  SupabaseUserLike,
} from "../auth/supabase/supabase-client.js";

export class SupabaseUserStoreAdapter implements UserStorePort {
  private readonly authPromise: Promise<SupabaseAuthApi>;

  constructor(options: SupabaseAdapterOptions) {
    this.authPromise = resolveSupabaseAuth(options, "SupabaseUserStoreAdapter");
  }

  async createUser(credentials: Credentials): Promise<UserRecord> {
    const auth = await this.authPromise;
    const result = await auth.signUp(credentials).catch(unavailable);

    const { user } = result.data;
    if (result.error || !user) {
      throw new ValidationError(result.error?.message ?? "Registration was rejected", "email");
    }
    return toUserRecord(user);
  }

  /** Returns null when no user has that id. */
  async getUser(id: string): Promise<UserRecord | null> {
    const auth = await this.authPromise;
    const result = await auth.admin.getUserById(id).catch(unavailable);

    if (result.error) {
      if (result.error.status === 404) return null;
      throw new UpstreamServiceError("unreachable", result.error.message);
    }
    return result.data.user ? toUserRecord(result.data.user) : null;
  }
}

function unavailable(err: unknown): never {
  throw new UpstreamServiceError("unreachable", `User store unavailable: ${errorMessage(err)}`, {
    cause: err,
  });
}

function toUserRecord(user: SupabaseUserLike): UserRecord {
  return {
    id: user.id,
    email: user.email,
    createdAt: user.created_at,
    confirmed: Boolean(user.email_confirmed_at),
  };
}
