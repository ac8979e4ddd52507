/**
 * AsyncClient
 *
 * Promise-based entry point. One client owns one `TaskManager` and one
 * session per channel; all sessions share the auth handshake and header set
 * resolved at construction.
 *
 * @example
 * ```typescript
 * const client = new AsyncClient({ apiHost: "localhost:41343" });
 * const models = await client.llm.listLoaded();
 * await client.close();
 * ```
 *
 * @module @lmlink/client/client
 */

import {
  ConnectionError,
  createAuthFromToken,
  type AuthHandshake,
  type ChannelName,
  type Env,
  type HeaderSet,
  type TransportDelegate,
} from "@lmlink/shared";
import { Logger, TaskManager, type ScopedResource } from "@lmlink/kernel";
import { resolveClientConfig, type ClientConfig, type ClientOptions } from "./config.js";
import { findDefaultLocalApiHost, type HostDiscoveryOptions } from "./host-discovery.js";
import type { Session, SessionHost } from "./session.js";
import {
  EmbeddingSession,
  FilesSession,
  LlmSession,
  SystemSession,
} from "./channel-sessions.js";
import type { DownloadedModel } from "./schemas.js";
import { createWebSocketDelegate } from "./transports/websocket.js";

const log = Logger.for("AsyncClient");

// ============================================================================
// Options
// ============================================================================

/**
 * Dependencies that cannot be expressed as plain configuration.
 */
export interface ClientRuntime {
  /** Socket I/O (default: `createWebSocketDelegate()`) */
  transport?: TransportDelegate;
  /** Used when no API host is configured (default: `findDefaultLocalApiHost`) */
  discoverApiHost?: () => Promise<string | undefined>;
}

export interface AsyncClientOptions extends ClientOptions, ClientRuntime {}

// ============================================================================
// AsyncClient
// ============================================================================

export class AsyncClient implements SessionHost, ScopedResource {
  readonly taskManager = new TaskManager();
  readonly auth: AuthHandshake;
  readonly headers: HeaderSet;
  readonly transport: TransportDelegate;
  readonly authTimeoutMs?: number;

  readonly system: SystemSession;
  readonly llm: LlmSession;
  readonly embedding: EmbeddingSession;
  readonly files: FilesSession;

  private _apiHost?: string;
  private discovery?: Promise<string>;
  private readonly discoverApiHost: () => Promise<string | undefined>;

  constructor(options: AsyncClientOptions = {}, config: ClientConfig = resolveClientConfig(options)) {
    this._apiHost = config.apiHost;
    this.auth = config.auth;
    this.headers = config.headers;
    this.authTimeoutMs = config.authTimeoutMs;
    this.transport = options.transport ?? createWebSocketDelegate();
    this.discoverApiHost = options.discoverApiHost ?? (() => findDefaultLocalApiHost());

    this.system = new SystemSession(this);
    this.llm = new LlmSession(this, this.system);
    this.embedding = new EmbeddingSession(this, this.system);
    this.files = new FilesSession(this);
  }

  /** Build a client from an already resolved configuration. */
  static fromConfig(config: ClientConfig, runtime: ClientRuntime = {}): AsyncClient {
    return new AsyncClient(runtime, config);
  }

  static createAuthFromToken(token?: string, env?: Env): AuthHandshake {
    return createAuthFromToken(token, env);
  }

  static findDefaultLocalApiHost(options?: HostDiscoveryOptions): Promise<string | undefined> {
    return findDefaultLocalApiHost(options);
  }

  /** Configured or discovered host; undefined until discovery has run. */
  get apiHost(): string | undefined {
    return this._apiHost;
  }

  get closed(): boolean {
    return this.taskManager.closed;
  }

  get sessions(): readonly Session[] {
    return [this.system, this.llm, this.embedding, this.files];
  }

  session(channel: ChannelName): Session {
    switch (channel) {
      case "system":
        return this.system;
      case "llm":
        return this.llm;
      case "embedding":
        return this.embedding;
      case "files":
        return this.files;
    }
  }

  /**
   * The host sessions connect to. Discovery runs at most once at a time and
   * its result is kept.
   *
   * @throws ConnectionError when no host is configured and none is found
   */
  resolveApiHost(): Promise<string> {
    if (this._apiHost) {
      return Promise.resolve(this._apiHost);
    }
    this.discovery ??= this.discover();
    return this.discovery;
  }

  private async discover(): Promise<string> {
    try {
      const host = await this.discoverApiHost();
      if (!host) {
        throw new ConnectionError("no local API host found");
      }
      log.debug({ apiHost: host }, "using discovered API host");
      this._apiHost = host;
      return host;
    } finally {
      this.discovery = undefined;
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Convenience
  // ──────────────────────────────────────────────────────────────────────────

  listDownloadedModels(): Promise<DownloadedModel[]> {
    return this.system.listDownloadedModels();
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────────────────────────────

  async enter(): Promise<this> {
    await this.taskManager.enter();
    return this;
  }

  async exit(): Promise<void> {
    await this.close();
  }

  /** Close every session, then the task manager. */
  async close(): Promise<void> {
    const results = await Promise.allSettled(this.sessions.map((session) => session.close()));
    this.taskManager.close();
    for (const result of results) {
      if (result.status === "rejected") {
        log.warn({ error: result.reason }, "error while closing session");
      }
    }
  }
}
