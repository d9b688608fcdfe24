import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDatabase, type TestDatabase } from "@my-app/core/test-utils";
import { createTokenAuthorizer } from "./authorizer.js";

const NOW = new Date("2030-06-01T12:00:00.000Z");

describe("createTokenAuthorizer", () => {
  let t: TestDatabase;
  let clientId: number;

  function issue(scopes: string[], expires: Date | null = null): string {
    return t.managers.apiTokens.create(t.user, { clientId, scopes, expires }).token;
  }

  beforeEach(() => {
    t = createTestDatabase();
    t.managers.apiScopes.seed(["api.ping", "tags.create", "tags.retrieve"]);
    clientId = t.managers.apiClients.create(t.user, {
      appName: "Dashboard",
      appPublisher: "Example",
    }).id;
  });

  afterEach(() => {
    t.close();
  });

  it("grants a valid token with a required scope", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const token = issue(["tags.retrieve"]);

    const result = await authorize({ scheme: "bearer", token }, ["tags.retrieve"]);

    expect(result.authorized).toBe(true);
    expect(result.data?.user.id).toBe(t.user.id);
    expect(result.data?.token.scopes).toEqual(["tags.retrieve"]);
  });

  it("needs only one of the required scopes", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const token = issue(["tags.create"]);

    const result = await authorize({ scheme: "bearer", token }, ["tags.retrieve", "tags.create"]);

    expect(result.authorized).toBe(true);
  });

  it("grants any valid token when no scope is required", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const token = issue(["api.ping"]);

    expect((await authorize({ scheme: "bearer", token }, null)).authorized).toBe(true);
  });

  it("denies a token without the required scope", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const token = issue(["api.ping"]);

    const result = await authorize({ scheme: "bearer", token }, ["tags.retrieve"]);

    expect(result).toEqual({ authorized: false, data: null });
  });

  it("denies missing, basic and unknown credentials", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);

    expect((await authorize(null, null)).authorized).toBe(false);
    expect(
      (await authorize({ scheme: "basic", username: "user", password: "test-secret" }, null))
        .authorized,
    ).toBe(false);
    expect((await authorize({ scheme: "bearer", token: "f".repeat(32) }, null)).authorized).toBe(
      false,
    );
  });

  it("denies an expired token", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const expired = issue(["api.ping"], new Date("2030-06-01T12:00:00.000Z"));
    const current = issue(["api.ping"], new Date("2030-06-01T12:00:01.000Z"));

    expect((await authorize({ scheme: "bearer", token: expired }, null)).authorized).toBe(false);
    expect((await authorize({ scheme: "bearer", token: current }, null)).authorized).toBe(true);
  });

  it("denies a disabled token", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const token = issue(["api.ping"]);
    const id = t.managers.apiTokens.findByToken(token)?.token.id ?? -1;
    t.managers.apiTokens.update(t.user, id, { enabled: false });

    expect((await authorize({ scheme: "bearer", token }, null)).authorized).toBe(false);
  });

  it("denies a token whose client is disabled or expired", async () => {
    const authorize = createTokenAuthorizer(t.managers.apiTokens, () => NOW);
    const token = issue(["api.ping"]);

    t.managers.apiClients.update(t.user, clientId, { enabled: false });
    expect((await authorize({ scheme: "bearer", token }, null)).authorized).toBe(false);

    t.managers.apiClients.update(t.user, clientId, {
      enabled: true,
      expires: new Date("2030-01-01T00:00:00.000Z"),
    });
    expect((await authorize({ scheme: "bearer", token }, null)).authorized).toBe(false);
  });
});
