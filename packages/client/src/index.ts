/**
 * @lmlink/client - Clients for a local inference server
 *
 * Provides persistent, multiplexed websocket sessions with:
 * - One session per channel (`system`, `llm`, `embedding`, `files`)
 * - Implicit connect on first use, explicit `connect()`/`disconnect()`
 * - Remote calls and server-push streams over one socket per session
 * - A promise-based `AsyncClient` and a blocking `SyncClient`
 *
 * @example
 * ```typescript
 * import { AsyncClient } from '@lmlink/client';
 *
 * const client = new AsyncClient({ apiHost: 'localhost:41343' });
 *
 * const loaded = await client.llm.listLoaded();
 * for await (const event of await client.system.remoteStream('events')) {
 *   console.log(event);
 * }
 *
 * await client.close();
 * ```
 *
 * @module @lmlink/client
 */

// Clients
export { AsyncClient, type AsyncClientOptions, type ClientRuntime } from "./client.js";
export {
  SyncClient,
  SyncSession,
  SyncSystemSession,
  SyncModelSession,
  SyncFilesSession,
  SyncSubscription,
  type SyncClientOptions,
} from "./sync-client.js";

// Sessions
export { Session, type SessionHost } from "./session.js";
export {
  SystemSession,
  ModelSession,
  LlmSession,
  EmbeddingSession,
  FilesSession,
} from "./channel-sessions.js";
export {
  Connection,
  type ConnectionOptions,
  type ConnectionState,
} from "./connection.js";

// Configuration
export { resolveClientConfig, type ClientConfig, type ClientOptions } from "./config.js";
export {
  DEFAULT_API_PORTS,
  findDefaultLocalApiHost,
  type FetchFn,
  type HostDiscoveryOptions,
} from "./host-discovery.js";

// Payloads
export type { DownloadedModel, LoadedModel, ModelType, ServerVersion } from "./schemas.js";

// Transport layer
export {
  createWebSocketDelegate,
  toWebSocketUrl,
  type WebSocketDelegateOptions,
} from "./transports/index.js";
