/**
 * WebSocket transport delegate
 *
 * Default `TransportDelegate`, built on the `ws` package so that the
 * handshake headers can be set on the HTTP upgrade request. Frames are
 * JSON text messages.
 *
 * @module @lmlink/client/transports/websocket
 */

import WebSocket from "ws";
import {
  WebsocketError,
  type TransportDelegate,
  type TransportHandle,
  type TransportHandleState,
} from "@lmlink/shared";
import { Logger } from "@lmlink/kernel";

const log = Logger.for("WebSocketTransport");

// ============================================================================
// Configuration
// ============================================================================

export interface WebSocketDelegateOptions {
  /** Timeout for the HTTP upgrade handshake in ms (default: 10000) */
  handshakeTimeout?: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Build `ws://<host>/<channel>`. An `http://` or `https://` prefix becomes
 * `ws://` or `wss://`; a bare `host:port` gets `ws://`.
 */
export function toWebSocketUrl(host: string, channel: string): string {
  let base = host.replace(/\/+$/, "");
  if (base.startsWith("http://")) {
    base = `ws://${base.slice("http://".length)}`;
  } else if (base.startsWith("https://")) {
    base = `wss://${base.slice("https://".length)}`;
  } else if (!/^wss?:\/\//.test(base)) {
    base = `ws://${base}`;
  }
  return `${base}/${channel}`;
}

function stateOf(socket: WebSocket): TransportHandleState {
  switch (socket.readyState) {
    case WebSocket.CLOSING:
      return "local-closing";
    case WebSocket.CLOSED:
      return "closed";
    default:
      return "open";
  }
}

function decode(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

// ============================================================================
// Factory
// ============================================================================

export function createWebSocketDelegate(options: WebSocketDelegateOptions = {}): TransportDelegate {
  const handshakeTimeout = options.handshakeTimeout ?? 10_000;

  return {
    open(request, callbacks) {
      return new Promise<TransportHandle>((resolve, reject) => {
        let opened = false;
        let settled = false;

        const socket = new WebSocket(request.url, {
          headers: request.headers,
          handshakeTimeout,
        });

        const handle: TransportHandle = {
          get state() {
            return stateOf(socket);
          },
          send(frame) {
            if (socket.readyState !== WebSocket.OPEN) {
              throw new WebsocketError("socket is not open");
            }
            socket.send(JSON.stringify(frame));
          },
          close() {
            socket.close(1000);
          },
        };

        socket.on("open", () => {
          opened = true;
          settled = true;
          socket.send(JSON.stringify(request.firstFrame));
          resolve(handle);
        });

        socket.on("message", (data) => {
          let parsed: unknown;
          try {
            parsed = JSON.parse(decode(data));
          } catch (error) {
            log.warn({ url: request.url, error }, "failed to parse websocket message");
            return;
          }
          callbacks.onMessage(parsed);
        });

        socket.on("error", (error) => {
          if (!settled) {
            settled = true;
            reject(error);
          } else {
            callbacks.onError(error);
          }
        });

        socket.on("close", (code, reason) => {
          if (opened) {
            callbacks.onClose({ code, reason: reason.toString("utf8") });
          } else if (!settled) {
            settled = true;
            reject(new WebsocketError(`socket closed before opening (code ${code})`));
          }
        });
      });
    },
  };
}
