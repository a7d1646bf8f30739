// =============================================================================
// UserStorePort — Persistent user records
// =============================================================================

import type { Credentials } from "./auth.port.js";

export interface UserRecord {
  id: string;
  email?: string;
  createdAt?: string;
  /** True once the address has been confirmed, when the store tracks it */
  confirmed?: boolean;
}

export interface UserStorePort {
  createUser(credentials: Credentials): Promise<UserRecord>;
  getUser(id: string): Promise<UserRecord | null>;
}
