/**
 * Worker side of the blocking bridge.
 *
 * Each reply is posted on the port before the shared flag is raised, so the
 * blocked caller always finds it with `receiveMessageOnPort` once woken.
 *
 * @module @lmlink/client/sync/bridge-worker
 */

import type { MessagePort } from "node:worker_threads";
import { serializeError } from "@lmlink/shared";
import { Logger } from "@lmlink/kernel";
import { RequestEnvelopeSchema, type BridgeReply } from "./protocol.js";
import type { SyncRequestHandler } from "./handler.js";

const log = Logger.for("BridgeWorker");

export interface BlockingBridgeServer {
  /**
   * Answer the request in flight with `error`, if there is one. Used when the
   * worker hits an error outside any handler, so the caller is not left
   * waiting forever.
   */
  failPending(error: unknown): boolean;
}

export function serveBlockingBridge(
  port: MessagePort,
  flag: Int32Array,
  handler: SyncRequestHandler,
): BlockingBridgeServer {
  let inFlight: number | undefined;

  const reply = (id: number, body: BridgeReply) => {
    if (inFlight === id) inFlight = undefined;
    try {
      port.postMessage({ id, reply: body });
    } catch (error) {
      // Values that cannot be cloned are reported as an error reply.
      port.postMessage({ id, reply: { ok: false, error: serializeError(error) } });
    }
    Atomics.store(flag, 0, 1);
    Atomics.notify(flag, 0);
  };

  port.on("message", (message: unknown) => {
    const parsed = RequestEnvelopeSchema.safeParse(message);
    if (!parsed.success) {
      log.error({ issues: parsed.error.issues }, "invalid bridge request");
      return;
    }
    const { id, request } = parsed.data;
    inFlight = id;

    void handler(request)
      .then(
        (value) => reply(id, { ok: true, value }),
        (error: unknown) => reply(id, { ok: false, error: serializeError(error) }),
      )
      .finally(() => {
        if (request.op === "close") port.close();
      })
      .catch((error: unknown) => {
        log.error({ error, op: request.op }, "failed to reply to bridge request");
      });
  });

  return {
    failPending(error) {
      if (inFlight === undefined) return false;
      reply(inFlight, { ok: false, error: serializeError(error) });
      return true;
    },
  };
}
