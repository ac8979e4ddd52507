/**
 * Session
 *
 * Per-channel facade over a `Connection`. A session creates a fresh
 * connection on every (re)connect, connects implicitly on first use and
 * shares one connect attempt between concurrent callers.
 *
 * Scoped use follows `Connection`: entering an open session is a no-op that
 * returns the same session, and the first exit closes it.
 *
 * @module @lmlink/client/session
 */

import {
  AlreadyConnectedError,
  ConnectionError,
  WebsocketError,
  type AuthHandshake,
  type ChannelName,
  type HeaderSet,
  type TransportDelegate,
} from "@lmlink/shared";
import {
  Logger,
  type OperationOptions,
  type ScopedResource,
  type StreamOptions,
  type Subscription,
  type TaskManager,
} from "@lmlink/kernel";
import { Connection } from "./connection.js";
import { toWebSocketUrl } from "./transports/websocket.js";

const log = Logger.for("Session");

/**
 * What a session needs from its owning client. Everything here is resolved
 * once, when the client is constructed.
 */
export interface SessionHost {
  readonly taskManager: TaskManager;
  readonly auth: AuthHandshake;
  readonly headers: HeaderSet;
  readonly transport: TransportDelegate;
  readonly authTimeoutMs?: number;
  resolveApiHost(): Promise<string>;
}

export class Session implements ScopedResource {
  private connection?: Connection;
  private pending?: Promise<Connection>;
  // Bumped by disconnect() so an attempt still resolving its host gives up.
  private generation = 0;

  constructor(
    readonly channel: ChannelName,
    protected readonly host: SessionHost,
  ) {}

  get connected(): boolean {
    return this.connection?.connected ?? false;
  }

  /** The connection currently owned by this session, if any. */
  get currentConnection(): Connection | undefined {
    return this.connection;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * @throws AlreadyConnectedError when connected or connecting
   * @throws ConnectionError when the connection cannot be established
   */
  async connect(): Promise<void> {
    if (this.pending || this.connected) {
      throw new AlreadyConnectedError();
    }
    await this.track(this.openConnection());
  }

  /** Close and release the current connection. No-op when disconnected. */
  async disconnect(): Promise<void> {
    this.generation++;
    const connection = this.connection;
    this.connection = undefined;
    this.pending = undefined;
    if (connection) {
      log.debug({ channel: this.channel }, "disconnecting session");
      await connection.disconnect();
    }
  }

  /** The next call reconnects with a new connection. */
  async close(): Promise<void> {
    await this.disconnect();
  }

  async enter(): Promise<this> {
    await this.ensureConnected();
    return this;
  }

  async exit(): Promise<void> {
    await this.disconnect();
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Remote operations
  // ──────────────────────────────────────────────────────────────────────────

  /** Call a remote endpoint on this channel, connecting first if needed. */
  async remoteCall(
    method: string,
    params?: unknown,
    options: OperationOptions = {},
  ): Promise<unknown> {
    const connection = await this.ensureConnected();
    return this.host.taskManager.runCall(connection, method, params, options);
  }

  /** Open a server-push stream on this channel, connecting first if needed. */
  async remoteStream(
    method: string,
    params?: unknown,
    options?: OperationOptions,
  ): Promise<Subscription<unknown>>;
  async remoteStream<T>(
    method: string,
    params: unknown,
    options: StreamOptions<T>,
  ): Promise<Subscription<T>>;
  async remoteStream<T>(
    method: string,
    params?: unknown,
    options: Partial<StreamOptions<T>> = {},
  ): Promise<Subscription<T> | Subscription<unknown>> {
    const connection = await this.ensureConnected();
    const { parse, signal } = options;
    if (parse) {
      return this.host.taskManager.runStream(connection, method, params, { parse, signal });
    }
    return this.host.taskManager.runStream(connection, method, params, { signal });
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Connection management
  // ──────────────────────────────────────────────────────────────────────────

  protected ensureConnected(): Promise<Connection> {
    const connection = this.connection;
    if (connection?.connected) {
      return Promise.resolve(connection);
    }
    return this.pending ?? this.track(this.openConnection());
  }

  private track(attempt: Promise<Connection>): Promise<Connection> {
    this.pending = attempt;
    const clear = () => {
      if (this.pending === attempt) this.pending = undefined;
    };
    void attempt.then(clear, clear);
    return attempt;
  }

  private async openConnection(): Promise<Connection> {
    if (this.host.taskManager.closed) {
      throw new WebsocketError("client closed");
    }
    const generation = this.generation;
    const apiHost = await this.host.resolveApiHost();
    if (generation !== this.generation) {
      throw new ConnectionError(`${this.channel} session was closed while connecting`);
    }

    const connection = new Connection({
      url: toWebSocketUrl(apiHost, this.channel),
      auth: this.host.auth,
      headers: this.host.headers,
      transport: this.host.transport,
      taskManager: this.host.taskManager,
      authTimeoutMs: this.host.authTimeoutMs,
    });
    this.connection = connection;

    try {
      await connection.connect();
    } catch (error) {
      if (this.connection === connection) this.connection = undefined;
      throw error;
    }
    log.debug({ channel: this.channel, url: connection.url }, "session connected");
    return connection;
  }
}
