import { z } from "zod";

export const DEFAULTS = {
  server: {
    port: 8080,
    origin: "http://localhost:8080",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  database: {
    filename: "my.db",
  },
  api: {
    basePath: "/api/v1",
    defaultLimit: 25,
  },
  bootstrap: {
    rootUsername: "root",
    rootEmail: "root@localhost",
  },
};

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      origin: z.url().default(DEFAULTS.server.origin),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  database: z
    .object({
      filename: z
        .string()
        .min(1)
        .default(DEFAULTS.database.filename)
        .describe("SQLite file, relative to the root path, or :memory:"),
    })
    .default(DEFAULTS.database),
  api: z
    .object({
      basePath: z
        .string()
        .regex(/^\/\S*[^/\s]$/, "must start with / and not end with /")
        .default(DEFAULTS.api.basePath),
      defaultLimit: z
        .number()
        .int()
        .min(1)
        .default(DEFAULTS.api.defaultLimit),
    })
    .default(DEFAULTS.api),
  bootstrap: z
    .object({
      rootUsername: z.string().min(1).default(DEFAULTS.bootstrap.rootUsername),
      rootEmail: z.string().min(1).default(DEFAULTS.bootstrap.rootEmail),
    })
    .default(DEFAULTS.bootstrap),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type ApiConfig = ServerConfig["api"];
