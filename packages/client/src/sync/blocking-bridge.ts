/**
 * Blocking bridge
 *
 * Runs an async request handler on a worker thread and lets the calling
 * thread wait for each reply synchronously. The caller posts a request on a
 * `MessagePort`, then sleeps in `Atomics.wait` on a shared flag until the
 * worker has posted the reply; the reply is read with
 * `receiveMessageOnPort`, so no event-loop turn is needed on the caller's
 * side. One request is in flight at a time.
 *
 * @module @lmlink/client/sync/blocking-bridge
 */

import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from "node:worker_threads";
import { WebsocketError, deserializeError } from "@lmlink/shared";
import { Logger } from "@lmlink/kernel";
import { ReplyEnvelopeSchema, type BridgeRequest } from "./protocol.js";

const log = Logger.for("BlockingBridge");

export interface BlockingBridgeOptions {
  /** Worker entry module */
  entry: URL;
  /** Extra worker data; `port` and `flag` are added by the bridge */
  workerData?: Record<string, unknown>;
  /** Node options for the worker, e.g. a TypeScript loader */
  execArgv?: string[];
  /** How long to wait for the worker to answer its first ping (default: 30s) */
  startupTimeoutMs?: number;
  /** How long `close()` waits for the worker (default: 10s) */
  closeTimeoutMs?: number;
}

export class BlockingBridge {
  private readonly worker: Worker;
  private readonly port: MessagePort;
  private readonly flag: Int32Array;
  private readonly closeTimeoutMs: number;
  private nextId = 1;
  private _closed = false;

  constructor(options: BlockingBridgeOptions) {
    const { port1, port2 } = new MessageChannel();
    const shared = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
    this.flag = new Int32Array(shared);
    this.port = port1;
    this.port.unref();
    this.closeTimeoutMs = options.closeTimeoutMs ?? 10_000;

    this.worker = new Worker(options.entry, {
      workerData: { ...options.workerData, port: port2, flag: shared },
      transferList: [port2],
      execArgv: options.execArgv,
    });
    this.worker.unref();
    this.worker.on("error", (error) => {
      log.error({ error }, "bridge worker failed");
    });

    try {
      this.request({ op: "ping" }, options.startupTimeoutMs ?? 30_000);
    } catch (error) {
      this.dispose();
      throw error;
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Send one request and block until its reply arrives. Error replies are
   * rebuilt into their original classes and thrown.
   *
   * @param timeoutMs Give up after this long; waits indefinitely by default
   */
  request(request: BridgeRequest, timeoutMs?: number): unknown {
    if (this._closed) {
      throw new WebsocketError("client closed");
    }

    const id = this.nextId++;
    Atomics.store(this.flag, 0, 0);
    this.port.postMessage({ id, request });

    const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;
    for (;;) {
      const received = receiveMessageOnPort(this.port);
      if (received) {
        const envelope = ReplyEnvelopeSchema.parse(received.message);
        if (envelope.id !== id) {
          log.warn({ id: envelope.id, expected: id }, "discarding stale bridge reply");
          continue;
        }
        if (envelope.reply.ok) {
          return envelope.reply.value;
        }
        throw deserializeError(envelope.reply.error);
      }

      const remaining = deadline === undefined ? undefined : deadline - Date.now();
      if (remaining !== undefined && remaining <= 0) {
        throw new WebsocketError(`no reply to ${request.op} within ${timeoutMs}ms`);
      }
      Atomics.wait(this.flag, 0, 0, remaining);
      Atomics.store(this.flag, 0, 0);
    }
  }

  /** Ask the worker to shut down, then release the thread. */
  close(): void {
    if (this._closed) return;
    try {
      this.request({ op: "close" }, this.closeTimeoutMs);
    } finally {
      this.dispose();
    }
  }

  private dispose(): void {
    this._closed = true;
    this.port.close();
    void this.worker.terminate().then(
      (exitCode) => log.debug({ exitCode }, "bridge worker stopped"),
      (error: unknown) => log.warn({ error }, "failed to stop bridge worker"),
    );
  }
}
