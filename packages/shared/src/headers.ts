/**
 * Handshake header assembly.
 *
 * @module @lmlink/shared/headers
 */

import type { Env } from "./auth.js";

export const API_KEY_HEADER = "X-API-Key";
export const X_API_KEY_ENV = "LMLINK_X_API_KEY";

export type HeaderSet = Record<string, string>;

export interface HeaderSources {
  /** Value of the `LMLINK_X_API_KEY` environment variable */
  envApiKey?: string;
  /** Explicit header mapping */
  httpHeaders?: HeaderSet;
  /** Shortcut for the `X-API-Key` header */
  xApiKey?: string;
}

// HTTP header names are case-insensitive, so a later layer replaces any
// earlier spelling of the same name.
function setHeader(headers: HeaderSet, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === lower) {
      delete headers[existing];
    }
  }
  headers[name] = value;
}

/**
 * Merge header layers, lowest precedence first: environment API key,
 * explicit mapping, then the `xApiKey` shortcut. Empty API key values are
 * treated as absent. Always returns a fresh object.
 */
export function assembleHeaders(sources: HeaderSources): HeaderSet {
  const headers: HeaderSet = {};

  if (sources.envApiKey) {
    setHeader(headers, API_KEY_HEADER, sources.envApiKey);
  }
  for (const [name, value] of Object.entries(sources.httpHeaders ?? {})) {
    setHeader(headers, name, value);
  }
  if (sources.xApiKey) {
    setHeader(headers, API_KEY_HEADER, sources.xApiKey);
  }

  return headers;
}

export function headersFromEnv(
  sources: Omit<HeaderSources, "envApiKey">,
  env: Env = process.env,
): HeaderSet {
  return assembleHeaders({ ...sources, envApiKey: env[X_API_KEY_ENV] });
}
