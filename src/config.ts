import { MissingConfigurationError } from "./errors.js";
import type { Credentials } from "./types.js";

export const DEFAULT_MODEL = "gpt-5-mini";
export const MCP_SERVER_LABEL = "AlphaVantage";
export const MCP_SERVER_DESCRIPTION = "Alpha Vantage MCP Server for financial market data";
export const DEFAULT_OUTPUT_IMAGE_PATH = "stock_image.png";

export const ENV_KEYS = {
  apiKey: "OPENAI_API_KEY",
  authorization: "AUTHORIZATION",
  serverUrl: "SERVER_URL",
} as const;

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): string {
  const value = env[key];
  if (value === undefined || !value.trim()) throw new MissingConfigurationError(key);
  return value;
}

/**
 * Reads the three required settings, checked in the order OPENAI_API_KEY, AUTHORIZATION, SERVER_URL.
 * The first one that is unset or blank is reported.
 */
export function loadCredentials(env: Env = process.env): Credentials {
  const apiKey = requireEnv(env, ENV_KEYS.apiKey);
  const authorization = requireEnv(env, ENV_KEYS.authorization);
  const serverUrl = requireEnv(env, ENV_KEYS.serverUrl);
  return Object.freeze({ apiKey, authorization, serverUrl });
}

export function resolveModel(env: Env = process.env, override?: string): string {
  const fromCli = override?.trim();
  if (fromCli) return fromCli;
  const fromEnv = env.OPENAI_MODEL?.trim();
  return fromEnv || DEFAULT_MODEL;
}

export function maskSecret(value: string, visible = 10): string {
  return `${value.slice(0, visible)}...`;
}
