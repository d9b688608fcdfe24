import { describe, it, expect } from "vitest";
import { deny, grant, parseAuthorizationHeader } from "./authorization.js";

function basic(value: string): string {
  return `Basic ${Buffer.from(value, "utf-8").toString("base64")}`;
}

describe("parseAuthorizationHeader", () => {
  it("returns null for a missing header", () => {
    expect(parseAuthorizationHeader(undefined)).toBeNull();
    expect(parseAuthorizationHeader("")).toBeNull();
  });

  it("parses bearer tokens", () => {
    expect(parseAuthorizationHeader("Bearer test-token")).toEqual({
      scheme: "bearer",
      token: "test-token",
    });
  });

  it("matches the scheme case-insensitively", () => {
    expect(parseAuthorizationHeader("bearer abc")).toEqual({ scheme: "bearer", token: "abc" });
  });

  it("parses basic credentials", () => {
    expect(parseAuthorizationHeader(basic("alice:test-secret"))).toEqual({
      scheme: "basic",
      username: "alice",
      password: "test-secret",
    });
  });

  it("splits basic credentials on the first colon", () => {
    expect(parseAuthorizationHeader(basic("alice:a:b"))).toEqual({
      scheme: "basic",
      username: "alice",
      password: "a:b",
    });
  });

  it("rejects basic credentials without a colon", () => {
    expect(parseAuthorizationHeader(basic("alice"))).toBeNull();
  });

  it("rejects basic credentials that are not base64", () => {
    expect(parseAuthorizationHeader("Basic not*base64")).toBeNull();
  });

  it("rejects other schemes and malformed values", () => {
    expect(parseAuthorizationHeader("Digest abc")).toBeNull();
    expect(parseAuthorizationHeader("Bearer")).toBeNull();
    expect(parseAuthorizationHeader("Bearer a b")).toBeNull();
  });
});

describe("grant / deny", () => {
  it("attaches the principal to a grant", () => {
    expect(grant({ id: 1 })).toEqual({ authorized: true, data: { id: 1 } });
  });

  it("denies without a principal", () => {
    expect(deny()).toEqual({ authorized: false, data: null });
  });
});
