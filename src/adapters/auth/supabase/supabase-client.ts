// =============================================================================
// Supabase auth client — the slice of `SupabaseClient["auth"]` the adapters use
// =============================================================================

export interface SupabaseConnectionConfig {
  url: string;
  key: string;
}

export interface SupabaseUserLike {
  id: string;
  email?: string;
  created_at?: string;
  email_confirmed_at?: string;
  app_metadata?: Record<string, unknown>;
}

export interface SupabaseErrorLike {
  message: string;
  status?: number;
}

export interface SupabaseUserResult {
  data: { user: SupabaseUserLike | null };
  error: SupabaseErrorLike | null;
}

export interface SupabaseSessionResult {
  data: { user: SupabaseUserLike | null; session: { access_token: string } | null };
  error: SupabaseErrorLike | null;
}

export interface SupabaseAuthApi {
  getUser(jwt?: string): Promise<SupabaseUserResult>;
  signInWithPassword(credentials: { email: string; password: string }): Promise<SupabaseSessionResult>;
  signUp(credentials: { email: string; password: string }): Promise<SupabaseSessionResult>;
  admin: {
    getUserById(uid: string): Promise<SupabaseUserResult>;
  };
}

export interface SupabaseAdapterOptions {
  /** A pre-configured auth client (`supabase.auth`) */
  auth?: SupabaseAuthApi;
  config?: SupabaseConnectionConfig;
}

/** Resolves the auth client lazily so the SDK is only loaded when no client is injected. */
export function resolveSupabaseAuth(
  options: SupabaseAdapterOptions,
  adapterName: string,
): Promise<SupabaseAuthApi> {
  if (options.auth) return Promise.resolve(options.auth);

  const cfg = options.config;
  if (!cfg?.url || !cfg.key) {
    throw new Error(`${adapterName} requires either an auth client or config with url and key`);
  }
  return import("@supabase/supabase-js").then(({ createClient }) => {
    const auth: SupabaseAuthApi = createClient(cfg.url, cfg.key, {
      auth: { autoRefreshToken: false, persistSession: false },
    }).auth;
    return auth;
  });
}

export function toRoles(user: SupabaseUserLike): string[] {
  const meta = user.app_metadata;
  const roles = meta?.roles;
  if (Array.isArray(roles)) {
    return roles.filter((r): r is string => typeof r === "string");
  }
  return typeof meta?.role === "string" ? [meta.role] : [];
}
