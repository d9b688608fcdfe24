import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import pino from "pino";
import { Dispatcher } from "./dispatcher.js";
import type { EndpointHandler } from "./endpoint.js";
import { Group } from "./group.js";
import { relativeApiPath, restApiRoutes } from "./hono.js";
import { ApiResponse, ResponseType } from "./response.js";

describe("relativeApiPath", () => {
  it("strips the base path", () => {
    expect(relativeApiPath("/api/v1/tags/tags", "/api/v1")).toBe("tags/tags");
    expect(relativeApiPath("/api/v1/tags/tags/", "/api/v1/")).toBe("tags/tags/");
  });

  it("returns an empty path for the base itself", () => {
    expect(relativeApiPath("/api/v1", "/api/v1")).toBe("");
  });

  it("only strips whole segments", () => {
    expect(relativeApiPath("/api/v10/x", "/api/v1")).toBe("api/v10/x");
  });
});

describe("restApiRoutes", () => {
  function createApp(handler: EndpointHandler) {
    const group = new Group({ urlPrefix: "notes" }).addEndpoint({
      urlSuffixes: ["note", "notes"],
      httpMethods: ["GET", "POST"],
      handler,
    });
    const dispatcher = new Dispatcher({ logger: pino({ level: "silent" }) }).registerGroup(group);

    const app = new Hono();
    app.route("/api/v1", restApiRoutes({ dispatcher, basePath: "/api/v1" }));
    return app;
  }

  it("dispatches GET requests with their query", async () => {
    const app = createApp(() => new ApiResponse(ResponseType.RESOURCE_SET, [1, 2, 3]));

    const res = await app.request("/api/v1/notes/notes?limit=2&page=2");
    const body = JSON.parse(await res.text());

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(body).toMatchObject({ data: [3], page: 2, limit: 2, last_page: 2 });
  });

  it("forwards the body and headers", async () => {
    const handler = vi.fn<EndpointHandler>(
      () => new ApiResponse(ResponseType.SINGLE_RESOURCE, null),
    );
    const app = createApp(handler);

    const res = await app.request("/api/v1/notes/note", {
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-token" },
      body: '{"title":"x"}',
    });

    expect(res.status).toBe(200);
    const [, , request] = handler.mock.calls[0];
    expect(request.method).toBe("POST");
    expect(request.path).toBe("notes/note");
    expect(request.body).toBe('{"title":"x"}');
    expect(request.headers.authorization).toBe("Bearer test-token");
  });

  it("returns the dispatcher's error status", async () => {
    const app = createApp(() => new ApiResponse());

    const res = await app.request("/api/v1/notes/missing");

    expect(res.status).toBe(404);
    expect(JSON.parse(await res.text()).error_message).toBe("Endpoint not found");
  });
});
