/**
 * Connection
 *
 * One websocket to one channel of the server. A connection owns its
 * transport handle and its lifecycle; correlation of frames to operations is
 * left to the shared `TaskManager`, which the connection feeds with every
 * valid inbound frame.
 *
 * ```
 * disconnected ──connect()──▶ connecting ──auth ok──▶ connected
 *      ▲                          │                      │
 *      └──────── failure ─────────┘     disconnect() ──▶ closing ──▶ disconnected
 *      └───────────────────────── remote close ──────────┘
 * ```
 *
 * @module @lmlink/client/connection
 */

import {
  AlreadyConnectedError,
  AuthResultSchema,
  ConnectionError,
  ServerFrameSchema,
  WebsocketError,
  type AuthHandshake,
  type AuthResult,
  type ClientFrame,
  type HeaderSet,
  type TransportDelegate,
  type TransportHandle,
  type TransportHandleState,
} from "@lmlink/shared";
import { Logger, type FrameChannel, type ScopedResource, type TaskManager } from "@lmlink/kernel";

const log = Logger.for("Connection");

export type ConnectionState = "disconnected" | "connecting" | "connected" | "closing";

export interface ConnectionOptions {
  /** Full websocket URL including the channel path */
  url: string;
  auth: AuthHandshake;
  headers?: HeaderSet;
  transport: TransportDelegate;
  taskManager: TaskManager;
  /** How long to wait for the server's auth result (default: 10s) */
  authTimeoutMs?: number;
}

interface PendingAuth {
  resolve(result: AuthResult): void;
  reject(error: Error): void;
}

const DEFAULT_AUTH_TIMEOUT_MS = 10_000;

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Connection implements FrameChannel, ScopedResource {
  readonly url: string;
  readonly headers: Readonly<HeaderSet>;

  private readonly auth: AuthHandshake;
  private readonly transport: TransportDelegate;
  private readonly taskManager: TaskManager;
  private readonly authTimeoutMs: number;

  private _state: ConnectionState = "disconnected";
  private handle?: TransportHandle;
  private pendingAuth?: PendingAuth;
  // Bumped on every connect/disconnect so callbacks of an abandoned socket
  // are recognised and ignored.
  private attempt = 0;

  constructor(options: ConnectionOptions) {
    this.url = options.url;
    this.auth = options.auth;
    this.headers = { ...options.headers };
    this.transport = options.transport;
    this.taskManager = options.taskManager;
    this.authTimeoutMs = options.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === "connected";
  }

  /** FrameChannel: frames may only be written while connected. */
  get open(): boolean {
    return this._state === "connected";
  }

  /** Underlying socket state, once a socket has been opened. */
  get transportState(): TransportHandleState | undefined {
    return this.handle?.state;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Open the socket, send the auth handshake and wait for the server to
   * accept it.
   *
   * @throws AlreadyConnectedError if connected or a connect is in flight
   * @throws ConnectionError on any transport or auth failure; the state is
   *   back to `disconnected` afterwards
   */
  async connect(): Promise<void> {
    if (this._state === "connected" || this._state === "connecting") {
      throw new AlreadyConnectedError();
    }

    const attempt = ++this.attempt;
    this._state = "connecting";
    this.handle = undefined;
    log.debug({ url: this.url }, "connecting");

    const authResult = new Promise<AuthResult>((resolve, reject) => {
      this.pendingAuth = { resolve, reject };
    });

    let opened: TransportHandle | undefined;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`no auth result within ${this.authTimeoutMs}ms`)),
        this.authTimeoutMs,
      );
    });

    try {
      const handshake = Promise.all([
        this.transport
          .open(
            { url: this.url, headers: { ...this.headers }, firstFrame: this.auth },
            {
              onMessage: (data) => this.handleMessage(attempt, data),
              onClose: (info) => this.handleClose(attempt, info),
              onError: (error) => this.handleError(attempt, error),
            },
          )
          .then((handle) => {
            opened = handle;
            if (attempt !== this.attempt) handle.close();
            return handle;
          }),
        authResult,
      ]);

      const [handle, result] = await Promise.race([handshake, timeout]);

      if (attempt !== this.attempt) {
        throw new ConnectionError(`connection attempt to ${this.url} was aborted`);
      }
      if (!result.success) {
        throw new ConnectionError(
          `authentication failed: ${result.error ?? "rejected by server"}`,
        );
      }
      // The server may close right after accepting, before this resumes.
      if (handle.state !== "open") {
        throw new ConnectionError(`connection to ${this.url} closed before it was established`);
      }

      this.handle = handle;
      this._state = "connected";
      log.debug({ url: this.url }, "connected");
    } catch (error) {
      this.abandonAttempt(attempt, opened);
      log.debug({ url: this.url, error }, "connect failed");
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`failed to connect to ${this.url}: ${messageOf(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Close the socket and fail every operation still pending on it with
   * `WebsocketError("connection closed")`. No-op when already disconnected.
   */
  async disconnect(): Promise<void> {
    if (this._state === "disconnected" || this._state === "closing") return;

    this.attempt++;
    this._state = "closing";
    this.pendingAuth?.reject(new ConnectionError(`connection attempt to ${this.url} was aborted`));
    this.pendingAuth = undefined;

    try {
      this.handle?.close();
    } catch (error) {
      log.warn({ url: this.url, error }, "error while closing socket");
    }

    this._state = "disconnected";
    const failed = this.taskManager.channelClosed(this);
    log.debug({ url: this.url, failed }, "disconnected");
  }

  /** Connect unless already connected; returns this same instance. */
  async enter(): Promise<this> {
    if (this._state !== "connected") {
      await this.connect();
    }
    return this;
  }

  /** Always disconnects, however many times the connection was entered. */
  async exit(): Promise<void> {
    await this.disconnect();
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Frames
  // ──────────────────────────────────────────────────────────────────────────

  send(frame: ClientFrame): void {
    if (this._state !== "connected" || !this.handle) {
      throw new WebsocketError("not connected");
    }
    this.handle.send(frame);
  }

  private handleMessage(attempt: number, data: unknown): void {
    if (attempt !== this.attempt) return;

    const pendingAuth = this.pendingAuth;
    if (pendingAuth) {
      this.pendingAuth = undefined;
      const parsed = AuthResultSchema.safeParse(data);
      if (parsed.success) {
        pendingAuth.resolve(parsed.data);
      } else {
        pendingAuth.reject(new ConnectionError("server sent an invalid auth result"));
      }
      return;
    }

    const parsed = ServerFrameSchema.safeParse(data);
    if (!parsed.success) {
      log.warn({ url: this.url, issues: parsed.error.issues }, "dropping invalid frame");
      return;
    }
    this.taskManager.dispatch(this, parsed.data);
  }

  private handleClose(attempt: number, info: { code?: number; reason?: string }): void {
    if (attempt !== this.attempt) return;

    if (this.pendingAuth) {
      this.pendingAuth.reject(
        new Error(`socket closed during handshake (code ${info.code ?? "unknown"})`),
      );
      this.pendingAuth = undefined;
      return;
    }
    if (this._state !== "connected") return;

    this._state = "disconnected";
    const failed = this.taskManager.channelClosed(this);
    log.info({ url: this.url, code: info.code, reason: info.reason, failed }, "connection closed by server");
  }

  private handleError(attempt: number, error: Error): void {
    if (attempt !== this.attempt) return;
    log.warn({ url: this.url, error }, "socket error");
    if (this.pendingAuth) {
      this.pendingAuth.reject(error);
      this.pendingAuth = undefined;
    }
  }

  private abandonAttempt(attempt: number, handle: TransportHandle | undefined): void {
    if (attempt === this.attempt) {
      this.attempt++;
      this._state = "disconnected";
      this.pendingAuth = undefined;
      this.handle = handle;
    }
    try {
      handle?.close();
    } catch (error) {
      log.warn({ url: this.url, error }, "error while closing failed socket");
    }
  }
}
