/**
 * Testing utilities for @lmlink/client.
 *
 * `createMockTransport` is an in-process `TransportDelegate`: every opened
 * socket is recorded, outbound frames are captured in `sent`, and tests push
 * server frames with `deliver` or end the socket with `serverClose`.
 *
 * @example
 * ```ts
 * const transport = createMockTransport({
 *   respond: (frame) =>
 *     frame.type === "rpcCall" ? [{ type: "rpcResult", callId: frame.callId, result: [] }] : [],
 * });
 * const client = new AsyncClient({ apiHost: "localhost:1234", transport });
 * await client.llm.listLoaded(); // []
 * ```
 *
 * @module @lmlink/client/testing
 */

import type {
  AuthResult,
  ClientFrame,
  OutboundFrame,
  TransportCallbacks,
  TransportDelegate,
  TransportHandleState,
  TransportOpenRequest,
} from "@lmlink/shared";

// ============================================================================
// Types
// ============================================================================

export interface MockSocket {
  readonly request: TransportOpenRequest;
  /** Every frame written, starting with the auth handshake */
  readonly sent: OutboundFrame[];
  readonly state: TransportHandleState;
  /** Client frames only (the handshake excluded) */
  readonly frames: ClientFrame[];
  /** Push a server frame to the client */
  deliver(frame: unknown): void;
  /** Close the socket from the server side */
  serverClose(code?: number, reason?: string): void;
  /** Report a socket error */
  fail(error: Error): void;
}

export interface MockTransportOptions {
  /**
   * Auth result sent once the socket opens (default: `{ success: true }`).
   * `null` sends nothing, leaving the handshake pending.
   */
  authResult?: AuthResult | null;
  /** Makes every `open()` reject with this error */
  openError?: Error;
  /** Answer a client frame; returned frames are delivered asynchronously */
  respond?: (frame: ClientFrame, socket: MockSocket) => unknown[] | void;
}

export interface MockTransport extends TransportDelegate {
  readonly sockets: readonly MockSocket[];
  readonly lastSocket: MockSocket | undefined;
}

// ============================================================================
// Implementation
// ============================================================================

function isClientFrame(frame: OutboundFrame): frame is ClientFrame {
  return "type" in frame;
}

class MockSocketImpl implements MockSocket {
  readonly sent: OutboundFrame[] = [];
  private _state: TransportHandleState = "open";

  constructor(
    readonly request: TransportOpenRequest,
    private readonly callbacks: TransportCallbacks,
    private readonly respond: MockTransportOptions["respond"],
  ) {}

  get state(): TransportHandleState {
    return this._state;
  }

  get frames(): ClientFrame[] {
    return this.sent.filter(isClientFrame);
  }

  send(frame: OutboundFrame): void {
    if (this._state !== "open") {
      throw new Error("mock socket is not open");
    }
    this.sent.push(frame);
    if (!isClientFrame(frame) || !this.respond) return;
    const replies = this.respond(frame, this) ?? [];
    queueMicrotask(() => {
      for (const reply of replies) this.deliver(reply);
    });
  }

  close(): void {
    if (this._state !== "open") return;
    this._state = "local-closing";
    queueMicrotask(() => {
      this._state = "closed";
      this.callbacks.onClose({ code: 1000 });
    });
  }

  deliver(frame: unknown): void {
    if (this._state !== "open") return;
    this.callbacks.onMessage(frame);
  }

  serverClose(code = 1001, reason = ""): void {
    if (this._state === "closed") return;
    this._state = "closed";
    this.callbacks.onClose({ code, reason });
  }

  fail(error: Error): void {
    this.callbacks.onError(error);
  }
}

export function createMockTransport(options: MockTransportOptions = {}): MockTransport {
  const sockets: MockSocketImpl[] = [];
  const authResult = options.authResult === undefined ? { success: true } : options.authResult;

  return {
    get sockets() {
      return sockets;
    },
    get lastSocket() {
      return sockets.at(-1);
    },
    async open(request, callbacks) {
      if (options.openError) {
        throw options.openError;
      }
      const socket = new MockSocketImpl(request, callbacks, options.respond);
      sockets.push(socket);
      socket.send(request.firstFrame);
      if (authResult) {
        queueMicrotask(() => socket.deliver(authResult));
      }
      return socket;
    },
  };
}

/**
 * A `respond` function that answers every call with `results[endpoint]`,
 * and with an `rpcError` for endpoints it does not know.
 */
export function respondWith(
  results: Record<string, unknown>,
): (frame: ClientFrame) => unknown[] {
  return (frame) => {
    if (frame.type !== "rpcCall") return [];
    if (frame.endpoint in results) {
      return [{ type: "rpcResult", callId: frame.callId, result: results[frame.endpoint] }];
    }
    return [
      {
        type: "rpcError",
        callId: frame.callId,
        error: { title: `unknown endpoint ${frame.endpoint}` },
      },
    ];
  };
}
