import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import pino from "pino";
import { verifyPassword } from "@my-app/core/database";
import { ServerConfigSchema } from "@my-app/core/schemas/server-config";
import { createServer } from "./bootstrap.js";

function makeDefaultConfig() {
  return ServerConfigSchema.parse({});
}

/** A logger that keeps its JSON lines for inspection. */
function createCapturingLogger() {
  const lines: string[] = [];
  const logger = pino({ level: "info" }, { write: (line: string) => lines.push(line) });
  const records = (): Record<string, unknown>[] =>
    lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { logger, records };
}

describe("createServer", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "bootstrap-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("returns a context with app, logger, config, startedAt", async () => {
    const config = makeDefaultConfig();
    const ctx = await createServer(config, {
      rootPath: tempDir,
      logger: pino({ level: "silent" }),
    });

    expect(ctx.config).toBe(config);
    expect(ctx.rootPath).toBe(tempDir);
    expect(typeof ctx.app.request).toBe("function");
    expect(ctx.startedAt).toBeInstanceOf(Date);
    await ctx.cleanup();
  });

  it("app responds to GET /health", async () => {
    const ctx = await createServer(makeDefaultConfig(), {
      rootPath: tempDir,
      logger: pino({ level: "silent" }),
    });

    const res = await ctx.app.request("/health");
    const body: unknown = JSON.parse(await res.text());

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "healthy" });
    await ctx.cleanup();
  });

  it("seeds the API scopes", async () => {
    const ctx = await createServer(makeDefaultConfig(), {
      rootPath: tempDir,
      logger: pino({ level: "silent" }),
    });

    expect(ctx.managers.apiScopes.list()).toHaveLength(27);
    expect(ctx.managers.apiScopes.findByFullName("notes.update")).toBeDefined();
    await ctx.cleanup();
  });

  it("creates a root user with a working token on first start", async () => {
    const { logger, records } = createCapturingLogger();
    const ctx = await createServer(makeDefaultConfig(), { rootPath: tempDir, logger });

    const created = records().find(
      (record) => record.msg === "Created root user; store these credentials, they are not shown again",
    );
    expect(created).toMatchObject({ username: "root" });

    const token = created?.apiToken;
    expect(typeof token).toBe("string");

    const res = await ctx.app.request("/api/v1/users/users", {
      headers: { Authorization: `Bearer ${String(token)}` },
    });
    const body: unknown = JSON.parse(await res.text());
    expect(body).toMatchObject({ total_items: 1, data: [{ username: "root", role: "root" }] });

    const password = created?.password;
    expect(typeof password).toBe("string");
    const root = ctx.managers.users.findByUsername("root");
    expect(verifyPassword(String(password), root?.password ?? "")).toBe(true);
    await ctx.cleanup();
  });

  it("keeps the database between starts", async () => {
    const first = await createServer(makeDefaultConfig(), {
      rootPath: tempDir,
      logger: pino({ level: "silent" }),
    });
    await first.cleanup();

    const { logger, records } = createCapturingLogger();
    const second = await createServer(makeDefaultConfig(), { rootPath: tempDir, logger });

    expect(second.managers.users.count()).toBe(1);
    expect(records().map((record) => record.msg)).toEqual([]);
    await second.cleanup();
  });

  it("mounts the API under the configured base path", async () => {
    const config = ServerConfigSchema.parse({
      api: { basePath: "/rest" },
      database: { filename: ":memory:" },
    });
    const ctx = await createServer(config, {
      rootPath: tempDir,
      logger: pino({ level: "silent" }),
    });

    const res = await ctx.app.request("/rest/api/ping");

    expect(res.status).toBe(403);
    await ctx.cleanup();
  });
});
