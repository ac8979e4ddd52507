/**
 * Client configuration
 *
 * Everything a client reads from its options and the environment is
 * resolved here, once, at construction. The resulting `ClientConfig` is a
 * plain object so it can be handed to the blocking client's worker thread.
 *
 * @module @lmlink/client/config
 */

import { z } from "zod";
import {
  AuthHandshakeSchema,
  createAuthFromToken,
  headersFromEnv,
  type Env,
  type HeaderSet,
} from "@lmlink/shared";

/**
 * Options shared by `AsyncClient` and `SyncClient`.
 */
export interface ClientOptions {
  /** `host:port` or an http(s)/ws(s) URL; discovered locally when omitted */
  apiHost?: string;
  /** `sk-lm-<id>:<passkey>`; `""` forces a guest identity */
  apiToken?: string;
  /** Extra headers for the websocket upgrade request */
  httpHeaders?: HeaderSet;
  /** Shortcut for the `X-API-Key` header */
  xApiKey?: string;
  /** How long a connection waits for the server's auth result, in ms */
  authTimeoutMs?: number;
  /** Environment to read (default: `process.env`) */
  env?: Env;
}

export const ClientConfigSchema = z.object({
  apiHost: z.string().min(1).optional(),
  auth: AuthHandshakeSchema,
  headers: z.record(z.string()),
  authTimeoutMs: z.number().positive().optional(),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/**
 * Resolve options and environment into a `ClientConfig`.
 *
 * @throws ValidationError for a malformed API token, before any I/O
 */
export function resolveClientConfig(options: ClientOptions = {}): ClientConfig {
  const env = options.env ?? process.env;
  return {
    apiHost: options.apiHost || undefined,
    auth: createAuthFromToken(options.apiToken, env),
    headers: headersFromEnv({ httpHeaders: options.httpHeaders, xApiKey: options.xApiKey }, env),
    authTimeoutMs: options.authTimeoutMs,
  };
}
