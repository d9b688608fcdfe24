import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { access, mkdtemp, readFile, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { loadConfig } from "./loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("loadConfig", () => {
  it("returns defaults when file is missing", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfig({ configPath: join(dir, "config.json") });

      expect(config.server.port).toBe(8080);
      expect(config.logging.level).toBe("info");
      expect(config.logging.pretty).toBe(false);
      expect(config.database.filename).toBe("my.db");
      expect(config.api.basePath).toBe("/api/v1");
      expect(config.api.defaultLimit).toBe(25);
    });
  });

  it("parses valid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          server: { port: 3000 },
          logging: { level: "debug", pretty: true },
          database: { filename: "/var/lib/my-app/data.db" },
          api: { basePath: "/rest", defaultLimit: 50 },
        }),
      );

      const config = await loadConfig({ configPath });

      expect(config.server.port).toBe(3000);
      expect(config.logging.level).toBe("debug");
      expect(config.logging.pretty).toBe(true);
      expect(config.database.filename).toBe("/var/lib/my-app/data.db");
      expect(config.api).toEqual({ basePath: "/rest", defaultLimit: 50 });
    });
  });

  it("reads config.json from the root path", async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, "config.json"), JSON.stringify({ server: { port: 9191 } }));

      const config = await loadConfig({ rootPath: dir });

      expect(config.server.port).toBe(9191);
    });
  });

  it("merges partial config with defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ api: { defaultLimit: 10 } }));

      const config = await loadConfig({ configPath });

      expect(config.api.defaultLimit).toBe(10);
      // Defaults fill in the rest
      expect(config.api.basePath).toBe("/api/v1");
      expect(config.server.port).toBe(8080);
    });
  });

  it("throws for invalid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ api: { defaultLimit: 0 } }));

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("rejects a base path with a trailing slash", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ api: { basePath: "/api/" } }));

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("throws for malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath })).rejects.toThrow(SyntaxError);
    });
  });

  it("writes defaults to disk when file is missing", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "subdir", "config.json");
      await loadConfig({ configPath });

      await expect(access(configPath)).resolves.toBeUndefined();
      const contents = JSON.parse(await readFile(configPath, "utf-8"));
      expect(contents.server.port).toBe(8080);
      expect(contents.database.filename).toBe("my.db");
    });
  });

  it("does not rewrite file when config already has all defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      await loadConfig({ configPath });
      const firstWrite = await readFile(configPath, "utf-8");

      await loadConfig({ configPath });
      const secondRead = await readFile(configPath, "utf-8");

      expect(secondRead).toBe(firstWrite);
    });
  });
});
