/**
 * Connection string parser for BIPRWS connections
 * Format: "Url=http://host:6405/biprws;Username=...;Password=...;Auth=secEnterprise"
 */

import { ConfigurationError } from "../services/biprws/errors.js";

export interface ConnectionStringParams {
  url: string;
  username: string;
  password: string;
  authMode?: string;
  timeoutInSeconds?: number;
}

/**
 * Parse a connection string into structured parameters
 * Format: "Key1=Value1;Key2=Value2;..."
 * Keys are case-insensitive
 *
 * Example:
 * Url=http://bi.example.com:6405/biprws;Username=report.auditor;Password=test-secret;Auth=secEnterprise;Timeout=60
 */
export function parseConnectionString(
  connectionString: string
): ConnectionStringParams {
  if (!connectionString || connectionString.trim() === "") {
    throw new ConfigurationError("Connection string cannot be empty");
  }

  const params: Record<string, string> = {};

  for (const part of connectionString.split(";")) {
    const trimmedPart = part.trim();
    if (!trimmedPart) continue;

    const separatorIndex = trimmedPart.indexOf("=");
    if (separatorIndex === -1) {
      throw new ConfigurationError(
        `Invalid connection string format: missing '=' in '${trimmedPart}'`
      );
    }

    const key = trimmedPart.substring(0, separatorIndex).trim().toLowerCase();
    const value = trimmedPart.substring(separatorIndex + 1).trim();

    params[key] = value;
  }

  const url = getParam(params, ["url", "serviceuri", "service uri", "server"]);
  if (!url) {
    throw new ConfigurationError(
      "Connection string must include 'Url', 'ServiceUri', or 'Server'"
    );
  }

  const username = getParam(params, ["username", "user name", "user", "userid"]);
  if (!username) {
    throw new ConfigurationError("Connection string must include 'Username'");
  }

  const password = getParam(params, ["password", "pwd"]);
  if (password === undefined) {
    throw new ConfigurationError("Connection string must include 'Password'");
  }

  const authMode = getParam(params, ["auth", "authtype", "authmode"]);
  const timeout = getParam(params, ["timeout", "timeoutinseconds"]);

  return {
    url,
    username,
    password,
    authMode: authMode || undefined,
    timeoutInSeconds: timeout ? parseTimeout(timeout) : undefined,
  };
}

/**
 * Build connection parameters from BIPRWS_* environment variables.
 * Returns undefined when BIPRWS_URL is not set.
 */
export function connectionParamsFromEnv(
  env: NodeJS.ProcessEnv
): ConnectionStringParams | undefined {
  if (env.BIPRWS_CONNECTION_STRING) {
    return parseConnectionString(env.BIPRWS_CONNECTION_STRING);
  }
  if (!env.BIPRWS_URL) {
    return undefined;
  }
  if (!env.BIPRWS_USERNAME || env.BIPRWS_PASSWORD === undefined) {
    throw new ConfigurationError(
      "BIPRWS_USERNAME and BIPRWS_PASSWORD must be set together with BIPRWS_URL"
    );
  }
  return {
    url: env.BIPRWS_URL,
    username: env.BIPRWS_USERNAME,
    password: env.BIPRWS_PASSWORD,
    authMode: env.BIPRWS_AUTH || undefined,
    timeoutInSeconds: env.BIPRWS_TIMEOUT
      ? parseTimeout(env.BIPRWS_TIMEOUT)
      : undefined,
  };
}

/**
 * Get parameter value by checking multiple possible key names (case-insensitive)
 */
function getParam(
  params: Record<string, string>,
  keys: string[]
): string | undefined {
  for (const key of keys) {
    const normalizedKey = key.toLowerCase();
    if (params[normalizedKey] !== undefined) {
      return params[normalizedKey];
    }
  }
  return undefined;
}

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ConfigurationError(
      `Invalid Timeout value: '${value}'. Expected a positive number of seconds`
    );
  }
  return seconds;
}

/**
 * Validate that the connection points at an http(s) BIPRWS endpoint
 */
export function validateConnectionParams(params: ConnectionStringParams): void {
  let parsed: URL;
  try {
    parsed = new URL(params.url);
  } catch (error) {
    throw new ConfigurationError(`Invalid Url format: '${params.url}'`, {
      cause: error,
    });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(
      `Url must use http or https. Got: '${parsed.protocol}'`
    );
  }
}
