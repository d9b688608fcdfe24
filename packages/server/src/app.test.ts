import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestApi, type TestApi } from "./test-utils.js";

describe("createApp", () => {
  let api: TestApi;

  beforeEach(() => {
    api = createTestApi();
  });

  afterEach(() => {
    api.close();
  });

  it("serves /health", async () => {
    const res = await api.app.request("/health");
    const body: unknown = JSON.parse(await res.text());

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "healthy", version: "0.0.0-test" });
  });

  it("hands API paths to the dispatcher", async () => {
    const token = api.tokenFor(api.user);

    const res = await api.app.request("/api/v1/api/ping", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json");
  });

  it("answers unknown API paths with the API error envelope", async () => {
    const res = await api.app.request("/api/v1/calendar/events");
    const body: unknown = JSON.parse(await res.text());

    expect(res.status).toBe(404);
    expect(body).toMatchObject({
      type: 1,
      success: false,
      error_code: 404,
      error_message: "Endpoint not found",
    });
  });

  it("answers other unknown paths with a JSON 404", async () => {
    const res = await api.app.request("/nope");
    const body: unknown = JSON.parse(await res.text());

    expect(res.status).toBe(404);
    expect(body).toEqual({
      error: { code: 404, errorCode: "NOT_FOUND", message: "Not found" },
    });
  });

  it("pretty-prints when asked", async () => {
    const token = api.tokenFor(api.user);

    const res = await api.app.request("/api/v1/api/ping?pretty", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(await res.text()).toMatch(/^\{\n {2}"type": 3,\n/);
  });

  it("sets CORS headers", async () => {
    const res = await api.app.request("/health", {
      headers: { Origin: "http://example.com" },
    });

    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("answers CORS preflight for API paths", async () => {
    const res = await api.app.request("/api/v1/tags/tag", {
      method: "OPTIONS",
      headers: {
        Origin: "http://example.com",
        "Access-Control-Request-Method": "POST",
      },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-methods")).toBe(
      "GET,POST,PATCH,DELETE,OPTIONS",
    );
  });
});
