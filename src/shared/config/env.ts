import { parse as parseDotEnv } from "dotenv";
import { existsSync, readFileSync } from "fs";
import { resolveLogLevel, type LogLevel } from "../logging/logger";

export type Env = {
  BASE_URL: string;
  LOG_LEVEL: LogLevel;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const BASE_URL = validateHttpUrl("BASE_URL", env.BASE_URL?.trim() || "http://localhost:3123");
  const LOG_LEVEL = resolveLogLevel(env);

  return { BASE_URL, LOG_LEVEL };
};

/**
 * Layers the variables of a dotenv file under `env`. Variables already set in
 * `env` win; a missing file leaves `env` as it is.
 */
export const withDotEnv = (env: NodeJS.ProcessEnv = process.env, path = ".env"): NodeJS.ProcessEnv =>
  existsSync(path) ? { ...parseDotEnv(readFileSync(path)), ...env } : env;
