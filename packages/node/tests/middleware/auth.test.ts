/**
 * Tests for authentication and permission middleware.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../../src/app.js";
import { authConfigFromKeys } from "../../src/app.js";
import { parseApiKeys } from "../../src/config.js";
import { hasPermission } from "../../src/types/auth.js";
import { ADMIN, ALICE, BOB, activate, asAccount, createTestApp, jsonRequest } from "../setup.js";

const ADMIN_KEY = "admin-test-key";
const OPERATOR_KEY = "alice-test-key";
const VIEWER_KEY = "viewer-test-key";

function withKey(key: string, path: string, method = "GET", body?: unknown): Request {
  return jsonRequest(path, method, body, { "X-Api-Key": key });
}

describe("hasPermission", () => {
  it("follows the role hierarchy", () => {
    expect(hasPermission("viewer", "read")).toBe(true);
    expect(hasPermission("viewer", "write")).toBe(false);
    expect(hasPermission("operator", "write")).toBe(true);
    expect(hasPermission("operator", "admin")).toBe(false);
    expect(hasPermission("admin", "admin")).toBe(true);
  });
});

describe("secured mode", () => {
  let instance: AppInstance;

  beforeEach(() => {
    instance = createTestApp({
      auth: authConfigFromKeys(
        parseApiKeys(
          `${ADMIN_KEY}:admin:${ADMIN},${OPERATOR_KEY}:operator:${ALICE},${VIEWER_KEY}:viewer:carol`,
        ),
      ),
    });
  });

  it("returns 401 without an API key", async () => {
    const res = await instance.app.request("/api/v1/asset");

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "AUTHENTICATION_REQUIRED", message: "Authentication required" },
    });
  });

  it("returns 401 for an unknown API key", async () => {
    const res = await instance.app.request(withKey("wrong-key", "/api/v1/asset"));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "AUTHENTICATION_REQUIRED", message: "Invalid API key" },
    });
  });

  it("lets a viewer read", async () => {
    const res = await instance.app.request(withKey(VIEWER_KEY, "/api/v1/supply"));

    expect(res.status).toBe(200);
  });

  it("returns 403 when a viewer writes", async () => {
    const res = await instance.app.request(
      withKey(VIEWER_KEY, "/api/v1/transfer", "POST", { to: BOB, amount: "1" }),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "FORBIDDEN", message: "Role 'viewer' lacks 'write' permission" },
    });
  });

  it("returns 403 when an operator administers accounts", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/accounts/bob/reference-balance", "PUT", { amount: "1001" }),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "FORBIDDEN", message: "Role 'operator' lacks 'admin' permission" },
    });
  });

  it("acts as the key's account", async () => {
    activate(instance.service, ALICE, BOB);

    const mint = await instance.app.request(
      withKey(ADMIN_KEY, "/api/v1/mint", "POST", { to: ALICE, amount: "100" }),
    );
    expect(mint.status).toBe(201);
    expect(await mint.json()).toMatchObject({ actor: ADMIN });

    const transfer = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/transfer", "POST", { to: BOB, amount: "10" }),
    );
    expect(transfer.status).toBe(201);
    expect(await transfer.json()).toMatchObject({ actor: ALICE, counterparty: BOB });
  });

  it("leaves minting to the ledger's administrator check", async () => {
    const res = await instance.app.request(
      withKey(OPERATOR_KEY, "/api/v1/mint", "POST", { to: ALICE, amount: "100" }),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "UNAUTHORIZED" } });
  });

  it("ignores X-Account-Id", async () => {
    activate(instance.service, ALICE, BOB);
    await instance.app.request(
      withKey(ADMIN_KEY, "/api/v1/mint", "POST", { to: ALICE, amount: "100" }),
    );

    const res = await instance.app.request(
      jsonRequest(
        "/api/v1/transfer",
        "POST",
        { to: BOB, amount: "10" },
        { "X-Api-Key": ADMIN_KEY, "X-Account-Id": ALICE },
      ),
    );

    // ADMIN holds nothing, so the cap gate rejects it
    expect(res.status).toBe(422);
    expect(instance.service.balanceOf(ALICE)).toBe(100n);
  });
});

describe("unsecured mode", () => {
  it("acts as the administrator without X-Account-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "1" }));

    expect(await res.json()).toMatchObject({ actor: ADMIN });
  });

  it("acts as the account named in X-Account-Id", async () => {
    const { app, service } = createTestApp();
    activate(service, ALICE, BOB);
    await app.request(jsonRequest("/api/v1/mint", "POST", { to: ALICE, amount: "100" }));

    const res = await app.request(
      asAccount(ALICE, "/api/v1/transfer", "POST", { to: BOB, amount: "10" }),
    );

    expect(await res.json()).toMatchObject({ actor: ALICE });
  });
});
