import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const ConfigSchema = z.object({
  node: z
    .object({
      host: z.string().min(1).default("127.0.0.1"),
      port: z.number().int().min(0).max(65535).default(7000),
      peers: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  flood: z
    .object({
      dedupeMaxEntries: z.number().int().positive().default(16),
      pollIntervalMs: z.number().int().positive().default(50),
    })
    .default({}),
  observability: z
    .object({
      logLevel: LogLevelSchema.default("info"),
      logHuman: z.boolean().default(false),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
