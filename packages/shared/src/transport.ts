/**
 * Transport Delegate Interface
 *
 * The byte-level I/O behind a connection. A delegate opens one duplex frame
 * channel per call; everything else (handshake validation, correlation,
 * lifecycle) lives in `@lmlink/client`'s `Connection` and the kernel's
 * `TaskManager`.
 *
 * @module @lmlink/shared/transport
 */

import type { OutboundFrame, AuthHandshake } from "./protocol.js";
import type { HeaderSet } from "./headers.js";

/**
 * Readable socket state, after RFC 6455: a client only ever closes locally,
 * so the closing states are `local-closing` then `closed`.
 */
export type TransportHandleState = "open" | "local-closing" | "closed";

/** Handle to an open frame channel. */
export interface TransportHandle {
  readonly state: TransportHandleState;
  /** Write one frame. */
  send(frame: OutboundFrame): void;
  /** Start the closing handshake. */
  close(): void;
}

export interface TransportOpenRequest {
  /** Full websocket URL, including the channel path */
  url: string;
  /** Sent verbatim as HTTP upgrade request headers */
  headers: HeaderSet;
  /** Written as soon as the socket opens, before anything else */
  firstFrame: AuthHandshake;
}

/** Callbacks the delegate invokes once the socket exists. */
export interface TransportCallbacks {
  /** One received frame, already JSON-decoded */
  onMessage(data: unknown): void;
  onClose(info: { code?: number; reason?: string }): void;
  onError(error: Error): void;
}

/**
 * Opens the raw connection. Must reject if the socket cannot be opened and
 * must invoke `onClose` at most once per opened socket.
 */
export interface TransportDelegate {
  open(request: TransportOpenRequest, callbacks: TransportCallbacks): Promise<TransportHandle>;
}
