/**
 * SyncClient
 *
 * Blocking counterpart of `AsyncClient`. The async client runs on a worker
 * thread; every method here posts one request to it and blocks until the
 * reply arrives (see `sync/blocking-bridge.ts`). Results and errors are the
 * same as the async client's, rebuilt on this thread.
 *
 * @example
 * ```typescript
 * const client = new SyncClient({ apiHost: "localhost:41343" });
 * const models = client.llm.listLoaded();
 * for (const event of client.system.remoteStream("events")) { ... }
 * client.close();
 * ```
 *
 * @module @lmlink/client/sync-client
 */

import { z } from "zod";
import { createAuthFromToken, type AuthHandshake, type ChannelName, type Env } from "@lmlink/shared";
import type { SyncScopedResource } from "@lmlink/kernel";
import { resolveClientConfig, type ClientConfig, type ClientOptions } from "./config.js";
import {
  DownloadedModelSchema,
  LoadedModelSchema,
  LocalFilePathSchema,
  ServerVersionSchema,
  parsePayload,
  type DownloadedModel,
  type LoadedModel,
  type ModelType,
  type ServerVersion,
} from "./schemas.js";
import { BlockingBridge } from "./sync/blocking-bridge.js";
import { StreamStepSchema } from "./sync/protocol.js";

// ============================================================================
// Worker entry
// ============================================================================

// From source the worker needs a TypeScript loader; compiled output does not.
function workerEntry(): { entry: URL; execArgv?: string[] } {
  if (import.meta.url.endsWith(".ts")) {
    return {
      entry: new URL("./sync/sync-worker.ts", import.meta.url),
      execArgv: ["--import", "tsx"],
    };
  }
  return { entry: new URL("./sync/sync-worker.js", import.meta.url) };
}

// ============================================================================
// Subscription
// ============================================================================

/**
 * Blocking server-push sequence. Each `next()` blocks until the worker has a
 * message, the stream ends, or it fails.
 */
export class SyncSubscription implements IterableIterator<unknown> {
  private finished = false;

  constructor(
    private readonly bridge: BlockingBridge,
    readonly id: number,
  ) {}

  get done(): boolean {
    return this.finished;
  }

  next(): IteratorResult<unknown> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    try {
      const step = StreamStepSchema.parse(
        this.bridge.request({ op: "stream.next", streamId: this.id }),
      );
      if (step.done) {
        this.finished = true;
        return { done: true, value: undefined };
      }
      return { done: false, value: step.value };
    } catch (error) {
      this.finished = true;
      throw error;
    }
  }

  /** Stop the stream. Safe to call repeatedly. */
  cancel(): void {
    if (this.finished) return;
    this.finished = true;
    if (!this.bridge.closed) {
      this.bridge.request({ op: "stream.cancel", streamId: this.id });
    }
  }

  return(): IteratorResult<unknown> {
    this.cancel();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): IterableIterator<unknown> {
    return this;
  }
}

// ============================================================================
// Sessions
// ============================================================================

export class SyncSession implements SyncScopedResource {
  constructor(
    readonly channel: ChannelName,
    protected readonly bridge: BlockingBridge,
  ) {}

  get connected(): boolean {
    return this.bridge.request({ op: "session.connected", channel: this.channel }) === true;
  }

  /** @throws AlreadyConnectedError when already connected */
  connect(): void {
    this.bridge.request({ op: "session.connect", channel: this.channel });
  }

  disconnect(): void {
    this.bridge.request({ op: "session.disconnect", channel: this.channel });
  }

  close(): void {
    this.disconnect();
  }

  enter(): this {
    this.bridge.request({ op: "session.enter", channel: this.channel });
    return this;
  }

  exit(): void {
    this.disconnect();
  }

  remoteCall(method: string, params?: unknown): unknown {
    return this.bridge.request({
      op: "session.remoteCall",
      channel: this.channel,
      method,
      params,
    });
  }

  /**
   * Open a server-push stream. The worker holds the stream until it ends,
   * `cancel()` is called, or this session disconnects; drop a subscription
   * without one of those and it lingers until then.
   */
  remoteStream(method: string, params?: unknown): SyncSubscription {
    const streamId = z
      .number()
      .int()
      .parse(
        this.bridge.request({
          op: "session.remoteStream",
          channel: this.channel,
          method,
          params,
        }),
      );
    return new SyncSubscription(this.bridge, streamId);
  }
}

export class SyncSystemSession extends SyncSession {
  constructor(bridge: BlockingBridge) {
    super("system", bridge);
  }

  listDownloadedModels(): DownloadedModel[] {
    return parsePayload(
      "listDownloadedModels",
      z.array(DownloadedModelSchema),
      this.remoteCall("listDownloadedModels"),
    );
  }

  getVersion(): ServerVersion {
    return parsePayload("version", ServerVersionSchema, this.remoteCall("version"));
  }
}

export class SyncModelSession extends SyncSession {
  constructor(
    readonly modelType: ModelType,
    bridge: BlockingBridge,
    private readonly system: SyncSystemSession,
  ) {
    super(modelType, bridge);
  }

  listLoaded(): LoadedModel[] {
    return parsePayload("listLoaded", z.array(LoadedModelSchema), this.remoteCall("listLoaded"));
  }

  listDownloaded(): DownloadedModel[] {
    return this.system.listDownloadedModels().filter((model) => model.type === this.modelType);
  }
}

export class SyncFilesSession extends SyncSession {
  constructor(bridge: BlockingBridge) {
    super("files", bridge);
  }

  getLocalFileAbsolutePath(fileName: string): string {
    return parsePayload(
      "getLocalFileAbsolutePath",
      LocalFilePathSchema,
      this.remoteCall("getLocalFileAbsolutePath", { fileName }),
    ).path;
  }
}

// ============================================================================
// SyncClient
// ============================================================================

export interface SyncClientOptions extends ClientOptions {
  /** How long to wait for the worker thread to start (default: 30s) */
  startupTimeoutMs?: number;
}

export class SyncClient implements SyncScopedResource {
  readonly config: ClientConfig;
  readonly system: SyncSystemSession;
  readonly llm: SyncModelSession;
  readonly embedding: SyncModelSession;
  readonly files: SyncFilesSession;

  private readonly bridge: BlockingBridge;

  /**
   * Resolves the configuration on the calling thread, so a malformed token
   * fails here before the worker starts.
   */
  constructor(options: SyncClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.bridge = new BlockingBridge({
      ...workerEntry(),
      workerData: { config: this.config },
      startupTimeoutMs: options.startupTimeoutMs,
    });

    this.system = new SyncSystemSession(this.bridge);
    this.llm = new SyncModelSession("llm", this.bridge, this.system);
    this.embedding = new SyncModelSession("embedding", this.bridge, this.system);
    this.files = new SyncFilesSession(this.bridge);
  }

  static createAuthFromToken(token?: string, env?: Env): AuthHandshake {
    return createAuthFromToken(token, env);
  }

  /**
   * Configured host, or the locally discovered one.
   *
   * @throws ConnectionError when none is configured and none is found
   */
  get apiHost(): string {
    return z.string().parse(this.bridge.request({ op: "apiHost" }));
  }

  get closed(): boolean {
    return this.bridge.closed;
  }

  get sessions(): readonly SyncSession[] {
    return [this.system, this.llm, this.embedding, this.files];
  }

  listDownloadedModels(): DownloadedModel[] {
    return this.system.listDownloadedModels();
  }

  enter(): this {
    return this;
  }

  exit(): void {
    this.close();
  }

  /** Close every session and stop the worker thread. Idempotent. */
  close(): void {
    this.bridge.close();
  }
}
