// =============================================================================
// Auth Adapter Tests — Supabase
// =============================================================================

import { describe, it, expect, vi, beforeEach } from "vitest";
import { SupabaseAuthAdapter } from "../supabase/supabase-auth.adapter.js";
import { AuthError } from "../../../errors.js";

function mockAuth() {
  return {
    getUser: vi.fn(),
    signInWithPassword: vi.fn(),
    signUp: vi.fn(),
    admin: { getUserById: vi.fn() },
  };
}

const user = {
  id: "user-123",
  email: "test@example.com",
  app_metadata: { provider: "email", roles: ["admin"] },
};

describe("SupabaseAuthAdapter", () => {
  let auth: ReturnType<typeof mockAuth>;
  let adapter: SupabaseAuthAdapter;

  beforeEach(() => {
    auth = mockAuth();
    auth.getUser.mockResolvedValue({ data: { user }, error: null });
    auth.signInWithPassword.mockResolvedValue({
      data: { user, session: { access_token: "test-access-token" } },
      error: null,
    });
    adapter = new SupabaseAuthAdapter({ auth });
  });

  it("throws without client or valid config", () => {
    expect(() => new SupabaseAuthAdapter({})).toThrow(
      "SupabaseAuthAdapter requires either an auth client or config with url and key",
    );
  });

  describe("validateToken", () => {
    it("resolves the user behind a valid token", async () => {
      const result = await adapter.validateToken("valid-jwt-token");

      expect(auth.getUser).toHaveBeenCalledWith("valid-jwt-token");
      expect(result).toEqual({ id: "user-123", email: "test@example.com", roles: ["admin"] });
    });

    it("reads a single role from app_metadata.role", async () => {
      auth.getUser.mockResolvedValue({
        data: { user: { id: "u2", app_metadata: { role: "reader" } } },
        error: null,
      });
      await expect(adapter.validateToken("t")).resolves.toEqual({ id: "u2", email: undefined, roles: ["reader"] });
    });

    it("rejects an invalid token with AuthError", async () => {
      auth.getUser.mockResolvedValue({ data: { user: null }, error: { message: "Invalid JWT" } });

      await expect(adapter.validateToken("bad-token")).rejects.toThrow(AuthError);
      await expect(adapter.validateToken("bad-token")).rejects.toThrow("Invalid JWT");
    });

    it("rejects an empty token without calling Supabase", async () => {
      await expect(adapter.validateToken("")).rejects.toThrow("Missing access token");
      expect(auth.getUser).not.toHaveBeenCalled();
    });

    it("turns SDK failures into AuthError", async () => {
      auth.getUser.mockRejectedValue(new Error("Network error"));
      await expect(adapter.validateToken("some-token")).rejects.toThrow(
        "Token validation failed: Network error",
      );
    });
  });

  describe("issueToken", () => {
    it("exchanges credentials for an access token", async () => {
      const token = await adapter.issueToken({ email: "test@example.com", password: "test-secret" });

      expect(auth.signInWithPassword).toHaveBeenCalledWith({
        email: "test@example.com",
        password: "test-secret",
      });
      expect(token).toEqual({
        accessToken: "test-access-token",
        user: { id: "user-123", email: "test@example.com", roles: ["admin"] },
      });
    });

    it("rejects wrong credentials with AuthError", async () => {
      auth.signInWithPassword.mockResolvedValue({
        data: { user: null, session: null },
        error: { message: "Invalid login credentials", status: 400 },
      });

      const error = await adapter
        .issueToken({ email: "test@example.com", password: "wrong-secret" })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ kind: "auth", message: "Invalid login credentials" });
    });
  });
});
