import fs from "fs/promises";
import { Config, ConfigSchema, LogLevelSchema } from "./types";

export async function loadConfig(
  path = process.env.FLOODNET_CONFIG,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let raw: unknown = {};
  if (path) {
    const text = await fs.readFile(path, "utf8");
    raw = JSON.parse(text);
  }
  return resolveConfig(raw, env);
}

/**
 * Validates a raw config object after applying environment overrides.
 */
export function resolveConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): Config {
  const config = ConfigSchema.parse(raw);

  const level = env.FLOODNET_LOG_LEVEL;
  if (level) {
    config.observability.logLevel = LogLevelSchema.parse(level);
  }

  const human = env.FLOODNET_LOG_HUMAN;
  if (human !== undefined && human.length > 0) {
    config.observability.logHuman = human === "1" || human.toLowerCase() === "true";
  }

  return config;
}
