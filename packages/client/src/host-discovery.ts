/**
 * Default host discovery
 *
 * A local server answers `GET /greeting` with `{ "lmlink": true }` on one of
 * a fixed set of ports. Ports are probed one at a time, in order.
 *
 * @module @lmlink/client/host-discovery
 */

import { z } from "zod";
import { Logger } from "@lmlink/kernel";

const log = Logger.for("HostDiscovery");

export const DEFAULT_API_PORTS: readonly number[] = [41343, 52993, 16141, 39414, 22110];

export type FetchFn = typeof fetch;

export interface HostDiscoveryOptions {
  /** Candidate ports (default: `DEFAULT_API_PORTS`) */
  ports?: readonly number[];
  /** Host to probe (default: `127.0.0.1`) */
  host?: string;
  /** Per-port timeout in ms (default: 1000) */
  timeoutMs?: number;
  /** Custom fetch implementation */
  fetch?: FetchFn;
}

const GreetingSchema = z.object({ lmlink: z.literal(true) }).passthrough();

/**
 * Find a local server. Resolves to `"<host>:<port>"` for the first port
 * that answers the greeting, or `undefined` when none does.
 */
export async function findDefaultLocalApiHost(
  options: HostDiscoveryOptions = {},
): Promise<string | undefined> {
  const host = options.host ?? "127.0.0.1";
  const ports = options.ports ?? DEFAULT_API_PORTS;
  const timeoutMs = options.timeoutMs ?? 1000;
  const fetchFn = options.fetch ?? fetch;

  for (const port of ports) {
    const url = `http://${host}:${port}/greeting`;
    try {
      const response = await fetchFn(url, { signal: AbortSignal.timeout(timeoutMs) });
      if (!response.ok) {
        log.debug({ url, status: response.status }, "greeting rejected");
        continue;
      }
      const body: unknown = await response.json();
      if (GreetingSchema.safeParse(body).success) {
        log.debug({ url }, "found local API host");
        return `${host}:${port}`;
      }
      log.debug({ url }, "unexpected greeting");
    } catch (error) {
      log.debug({ url, error }, "no server on port");
    }
  }

  return undefined;
}
