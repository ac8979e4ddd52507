/**
 * AsyncClient Tests
 */

import { describe, it, expect, vi } from "vitest";
import { ConnectionError, ValidationError, WebsocketError } from "@lmlink/shared";
import { AsyncClient } from "../client.js";
import { resolveClientConfig } from "../config.js";
import { createMockTransport, respondWith } from "../testing.js";

const VALID_TOKEN = "sk-lm-abcDEF78:abcDEF7890abcDEF7890";

const downloaded = [
  { type: "llm", modelKey: "tiny-llm", path: "acme/tiny-llm", sizeBytes: 1024 },
  { type: "embedding", modelKey: "tiny-embed", path: "acme/tiny-embed" },
  { type: "llm", modelKey: "small-llm", path: "acme/small-llm", architecture: "test" },
];

function createClient(results: Record<string, unknown>) {
  const transport = createMockTransport({ respond: respondWith(results) });
  const client = new AsyncClient({ apiHost: "localhost:1234", env: {}, transport });
  return { client, transport };
}

// ============================================================================
// Configuration
// ============================================================================

describe("resolveClientConfig", () => {
  it("derives auth from an explicit token", () => {
    const config = resolveClientConfig({ apiToken: VALID_TOKEN, env: {} });

    expect(config.auth).toEqual({
      authVersion: 1,
      clientIdentifier: "abcDEF78",
      clientPasskey: "abcDEF7890abcDEF7890",
    });
  });

  it("uses a guest identity for an empty token even when the environment has one", () => {
    const config = resolveClientConfig({ apiToken: "", env: { LMLINK_API_TOKEN: VALID_TOKEN } });

    expect(config.auth.clientIdentifier.startsWith("guest:")).toBe(true);
  });

  it("rejects a malformed token before any I/O", () => {
    const transport = createMockTransport();

    expect(() => new AsyncClient({ apiToken: "not-a-token", env: {}, transport })).toThrow(
      ValidationError,
    );
    expect(transport.sockets).toHaveLength(0);
  });

  it("stores explicit headers", () => {
    const httpHeaders = { "X-Custom": "value1", Authorization: "Bearer test-token" };
    const config = resolveClientConfig({ httpHeaders, env: {} });

    expect(config.headers).toEqual(httpHeaders);
    expect(config.headers).not.toBe(httpHeaders);
  });

  it("sets X-API-Key from the shortcut", () => {
    expect(resolveClientConfig({ xApiKey: "test-api-key", env: {} }).headers).toEqual({
      "X-API-Key": "test-api-key",
    });
  });

  it("reads X-API-Key from the environment", () => {
    expect(resolveClientConfig({ env: { LMLINK_X_API_KEY: "env-api-key" } }).headers).toEqual({
      "X-API-Key": "env-api-key",
    });
  });

  it("lets the shortcut override the environment", () => {
    const config = resolveClientConfig({
      xApiKey: "param-api-key",
      env: { LMLINK_X_API_KEY: "env-api-key" },
    });

    expect(config.headers).toEqual({ "X-API-Key": "param-api-key" });
  });

  it("combines explicit headers with the shortcut", () => {
    const config = resolveClientConfig({
      httpHeaders: { "X-Custom": "c", "x-api-key": "from-map" },
      xApiKey: "s",
      env: { LMLINK_X_API_KEY: "e" },
    });

    expect(config.headers).toEqual({ "X-Custom": "c", "X-API-Key": "s" });
  });

  it("defaults to no headers", () => {
    expect(resolveClientConfig({ env: {} }).headers).toEqual({});
  });

  it("treats an empty host as absent", () => {
    expect(resolveClientConfig({ apiHost: "", env: {} }).apiHost).toBeUndefined();
  });
});

// ============================================================================
// Client
// ============================================================================

describe("AsyncClient", () => {
  it("sends the shared handshake and headers on every channel", async () => {
    const transport = createMockTransport({ respond: respondWith({ listLoaded: [] }) });
    const client = new AsyncClient({
      apiHost: "http://localhost:1234/",
      apiToken: VALID_TOKEN,
      xApiKey: "test-api-key",
      env: {},
      transport,
    });

    await client.llm.listLoaded();
    await client.embedding.listLoaded();

    expect(transport.sockets.map((socket) => socket.request.url)).toEqual([
      "ws://localhost:1234/llm",
      "ws://localhost:1234/embedding",
    ]);
    for (const socket of transport.sockets) {
      expect(socket.request.headers).toEqual({ "X-API-Key": "test-api-key" });
      expect(socket.sent[0]).toEqual(client.auth);
    }
  });

  it("lists downloaded models through the system channel", async () => {
    const { client, transport } = createClient({ listDownloadedModels: downloaded });

    const models = await client.listDownloadedModels();

    expect(models).toEqual(downloaded);
    expect(transport.lastSocket?.request.url).toBe("ws://localhost:1234/system");
  });

  it("filters downloaded models by type", async () => {
    const { client } = createClient({ listDownloadedModels: downloaded });

    const llms = await client.llm.listDownloaded();
    const embeddings = await client.embedding.listDownloaded();

    expect(llms.map((model) => model.modelKey)).toEqual(["tiny-llm", "small-llm"]);
    expect(embeddings.map((model) => model.modelKey)).toEqual(["tiny-embed"]);
  });

  it("keeps unknown payload fields", async () => {
    const { client } = createClient({
      listLoaded: [{ identifier: "tiny-llm:1", modelKey: "tiny-llm", path: "acme/tiny-llm", ttl: 60 }],
    });

    await expect(client.llm.listLoaded()).resolves.toEqual([
      { identifier: "tiny-llm:1", modelKey: "tiny-llm", path: "acme/tiny-llm", ttl: 60 },
    ]);
  });

  it("reads the server version", async () => {
    const { client } = createClient({ version: { version: "0.3.0", build: 7 } });

    await expect(client.system.getVersion()).resolves.toEqual({ version: "0.3.0", build: 7 });
  });

  it("resolves file paths on the files channel", async () => {
    const { client, transport } = createClient({
      getLocalFileAbsolutePath: { path: "/srv/files/notes.txt" },
    });

    await expect(client.files.getLocalFileAbsolutePath("notes.txt")).resolves.toBe(
      "/srv/files/notes.txt",
    );
    expect(transport.lastSocket?.frames[0]).toEqual({
      type: "rpcCall",
      endpoint: "getLocalFileAbsolutePath",
      callId: 1,
      parameter: { fileName: "notes.txt" },
    });
  });

  it("rejects payloads of the wrong shape", async () => {
    const { client } = createClient({ listLoaded: [{ identifier: 3 }] });

    await expect(client.llm.listLoaded()).rejects.toThrow(ValidationError);
  });

  it("surfaces remote errors", async () => {
    const { client } = createClient({});

    await expect(client.system.getVersion()).rejects.toThrow("unknown endpoint version");
  });

  it("discovers the host once when none is configured", async () => {
    const transport = createMockTransport({ respond: respondWith({ listLoaded: [] }) });
    const discoverApiHost = vi.fn(async () => "127.0.0.1:41343");
    const client = new AsyncClient({ env: {}, transport, discoverApiHost });

    expect(client.apiHost).toBeUndefined();
    await Promise.all([client.llm.listLoaded(), client.system.remoteCall("listLoaded")]);

    expect(discoverApiHost).toHaveBeenCalledTimes(1);
    expect(client.apiHost).toBe("127.0.0.1:41343");
    expect(transport.sockets.map((socket) => socket.request.url).sort()).toEqual([
      "ws://127.0.0.1:41343/llm",
      "ws://127.0.0.1:41343/system",
    ]);
  });

  it("fails when no local host is found", async () => {
    const transport = createMockTransport();
    const client = new AsyncClient({ env: {}, transport, discoverApiHost: async () => undefined });

    const error = await client.system.connect().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty("message", "no local API host found");
    expect(transport.sockets).toHaveLength(0);
  });

  it("maps channel names to sessions", () => {
    const { client } = createClient({});

    expect(client.session("system")).toBe(client.system);
    expect(client.session("llm")).toBe(client.llm);
    expect(client.session("embedding")).toBe(client.embedding);
    expect(client.session("files")).toBe(client.files);
  });

  it("closes every session and refuses work afterwards", async () => {
    const { client } = createClient({ listLoaded: [] });
    await client.llm.listLoaded();
    await client.system.connect();

    await client.close();

    expect(client.closed).toBe(true);
    expect(client.sessions.map((session) => session.connected)).toEqual([false, false, false, false]);
    await expect(client.llm.listLoaded()).rejects.toThrow(WebsocketError);
    await expect(client.llm.listLoaded()).rejects.toThrow("client closed");
  });

  it("closes on scope exit", async () => {
    const { client } = createClient({ listLoaded: [] });

    const entered = await client.enter();
    await entered.llm.listLoaded();
    await client.exit();

    expect(client.closed).toBe(true);
    expect(client.llm.connected).toBe(false);
  });
});
