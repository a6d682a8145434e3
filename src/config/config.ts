import * as TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig, ServerConfig } from "./schema.ts";

const DEFAULT_CONFIG_PATH = "config.toml";

export type ServerOverrides = Partial<Pick<ServerConfig, "mode" | "port" | "base_url">>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Load config.toml (optional unless a path is given explicitly), then apply
 * credential environment variables and command-line server overrides.
 */
export function loadConfig(configPath?: string, serverOverrides: ServerOverrides = {}): AppConfig {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_PATH);
  const parsed: Record<string, unknown> =
    configPath !== undefined || existsSync(resolvedPath)
      ? TOML.parse(readFileSync(resolvedPath, "utf-8"))
      : {};

  // Environment variable overrides for secrets
  const auth = section(parsed, "auth");
  const envAuth: Record<string, string | undefined> = {
    credentials_file: process.env["GOOGLE_APPLICATION_CREDENTIALS"],
    client_id: process.env["GOOGLE_CLIENT_ID"],
    client_secret: process.env["GOOGLE_CLIENT_SECRET"],
    refresh_token: process.env["GOOGLE_REFRESH_TOKEN"],
  };
  for (const [key, value] of Object.entries(envAuth)) {
    if (value) {
      auth[key] = value;
    }
  }

  const server = section(parsed, "server");
  for (const [key, value] of Object.entries(serverOverrides)) {
    if (value !== undefined) {
      server[key] = value;
    }
  }

  const merged = { ...parsed, auth, server };
  return AppConfigSchema.parse(merged);
}
