/**
 * Server configuration.
 *
 * Loaded once at startup from a JSON file:
 *   { "store_url", "consumer_key", "consumer_secret", "api_version",
 *     "timeout_ms"?, "query_string_auth"? }
 *
 * The file path comes from the first CLI argument, then WOO_CONFIG_PATH,
 * then ./config.json in the working directory.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { WooCredentials } from "./types/woocommerce.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface AdapterConfig {
  credentials: WooCredentials;
  timeoutMs: number;
  queryStringAuth: boolean;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

const requiredString = (key: string) =>
  z.string({ error: `${key} is required` }).trim().min(1, { error: `${key} must not be empty` });

const configFileSchema = z.object({
  store_url: requiredString("store_url").refine(isHttpUrl, {
    error: "store_url must be an absolute http(s) URL",
  }),
  consumer_key: requiredString("consumer_key"),
  consumer_secret: requiredString("consumer_secret"),
  api_version: requiredString("api_version"),
  timeout_ms: z.number().int().positive().optional(),
  query_string_auth: z.boolean().optional(),
});

export function parseConfig(raw: unknown): AdapterConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigError(`Invalid WooCommerce configuration: ${problems.join("; ")}`);
  }

  const file = parsed.data;
  const apiVersion = file.api_version.replace(/^\/+|\/+$/g, "");
  if (!apiVersion) {
    throw new ConfigError("Invalid WooCommerce configuration: api_version: api_version must not be empty");
  }

  const credentials: WooCredentials = Object.freeze({
    storeUrl: file.store_url.replace(/\/+$/, ""),
    consumerKey: file.consumer_key,
    consumerSecret: file.consumer_secret,
    apiVersion,
  });

  return {
    credentials,
    timeoutMs: file.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    queryStringAuth: file.query_string_auth ?? false,
  };
}

export function resolveConfigPath(argv: readonly string[] = process.argv.slice(2)): string {
  return resolve(argv[0] || process.env.WOO_CONFIG_PATH || "config.json");
}

export function loadConfig(path: string = resolveConfigPath()): AdapterConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error: unknown) {
    throw new ConfigError(
      `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigError(
      `Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return parseConfig(raw);
}
