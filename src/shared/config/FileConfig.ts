import { readFileSync } from "node:fs";

import { parse } from "dotenv";

import type { GoodreadsConfig } from "@/shared/config/Config";

import { ConfigError } from "@/domain/errors/AppError";

export const DEFAULT_BASE_URI = "https://www.goodreads.com";

const REQUIRED_KEYS = {
  "api-key": "apiKey",
  "api-secret": "apiSecret",
  "oauth-token": "oauthToken",
  "oauth-token-secret": "oauthTokenSecret"
} as const;

type RequiredKey = keyof typeof REQUIRED_KEYS;

/**
 * Reads a dotenv-style key-value file:
 *
 * ```
 * api-key=...
 * api-secret=...
 * oauth-token=...
 * oauth-token-secret=...
 * user-id=124723493      # optional
 * base-uri=https://...   # optional
 * ```
 */
export function loadConfigFile(filePath: string): GoodreadsConfig {
  let source: string;
  try {
    source = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, undefined, error);
  }
  return parseConfig(source);
}

export function parseConfig(source: string): GoodreadsConfig {
  const entries = parse(source);

  const missing = (Object.keys(REQUIRED_KEYS) as RequiredKey[]).filter((key) => !entries[key]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(`Missing required config keys: ${missing.join(", ")}`, missing[0]);
  }

  const value = (key: RequiredKey): string => entries[key].trim();

  const config: GoodreadsConfig = {
    apiKey: value("api-key"),
    apiSecret: value("api-secret"),
    oauthToken: value("oauth-token"),
    oauthTokenSecret: value("oauth-token-secret"),
    baseUri: (entries["base-uri"]?.trim() || DEFAULT_BASE_URI).replace(/\/+$/, "")
  };

  const rawUserId = entries["user-id"]?.trim();
  if (rawUserId) {
    if (!/^\d+$/.test(rawUserId)) {
      throw new ConfigError(`user-id must be a positive integer, got "${rawUserId}"`, "user-id");
    }
    config.userId = Number(rawUserId);
  }

  return Object.freeze(config);
}
