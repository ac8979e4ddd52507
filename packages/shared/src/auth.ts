/**
 * Auth handshake derivation.
 *
 * @module @lmlink/shared/auth
 */

import { randomBytes, randomUUID } from "node:crypto";
import { AUTH_VERSION, type AuthHandshake } from "./protocol.js";
import { ValidationError } from "./errors.js";

export const API_TOKEN_ENV = "LMLINK_API_TOKEN";
export const API_TOKEN_PREFIX = "sk-lm";

const CLIENT_ID_PATTERN = /^[A-Za-z0-9]{8}$/;
const MIN_PASSKEY_LENGTH = 20;

export type Env = Record<string, string | undefined>;

/**
 * Parse `sk-lm-<id>:<passkey>` into handshake credentials.
 *
 * Purely structural; nothing here touches the network.
 */
export function parseApiToken(token: string): AuthHandshake {
  const prefix = `${API_TOKEN_PREFIX}-`;
  if (!token.startsWith(prefix)) {
    throw new ValidationError(`API token must start with "${prefix}"`);
  }

  const body = token.slice(prefix.length);
  const separator = body.indexOf(":");
  if (separator < 0) {
    throw new ValidationError("API token is missing the ':' between client id and passkey");
  }

  const clientIdentifier = body.slice(0, separator);
  const clientPasskey = body.slice(separator + 1);

  if (!CLIENT_ID_PATTERN.test(clientIdentifier)) {
    throw new ValidationError("API token client id must be exactly 8 alphanumeric characters");
  }
  if (clientPasskey.length < MIN_PASSKEY_LENGTH) {
    throw new ValidationError(
      `API token passkey must be at least ${MIN_PASSKEY_LENGTH} characters long`,
    );
  }

  return { authVersion: AUTH_VERSION, clientIdentifier, clientPasskey };
}

export function createGuestAuth(): AuthHandshake {
  return {
    authVersion: AUTH_VERSION,
    clientIdentifier: `guest:${randomUUID()}`,
    clientPasskey: randomBytes(24).toString("hex"),
  };
}

/**
 * Derive the handshake payload.
 *
 * Precedence: explicit token > `LMLINK_API_TOKEN` > guest identity.
 * An explicit empty string means "no token" and goes straight to the guest
 * identity without consulting the environment; an empty environment value
 * is treated as unset.
 */
export function createAuthFromToken(token?: string, env: Env = process.env): AuthHandshake {
  if (token !== undefined) {
    return token === "" ? createGuestAuth() : parseApiToken(token);
  }

  const fromEnv = env[API_TOKEN_ENV];
  if (fromEnv) {
    return parseApiToken(fromEnv);
  }

  return createGuestAuth();
}
