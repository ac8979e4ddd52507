/**
 * Session Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AlreadyConnectedError, type ClientFrame } from "@lmlink/shared";
import { withScope } from "@lmlink/kernel";
import { AsyncClient } from "../client.js";
import { createMockTransport, type MockTransport } from "../testing.js";

function respond(frame: ClientFrame): unknown[] {
  switch (frame.type) {
    case "rpcCall":
      return [{ type: "rpcResult", callId: frame.callId, result: { echoed: frame.parameter } }];
    case "channelCreate":
      return [
        { type: "channelSend", channelId: frame.channelId, message: 1 },
        { type: "channelSend", channelId: frame.channelId, message: 2 },
        { type: "channelClose", channelId: frame.channelId },
      ];
    default:
      return [];
  }
}

describe("Session", () => {
  let transport: MockTransport;
  let client: AsyncClient;

  beforeEach(() => {
    transport = createMockTransport({ respond });
    client = new AsyncClient({ apiHost: "localhost:1234", apiToken: "", env: {}, transport });
  });

  it("starts disconnected and tolerates disconnect", async () => {
    const session = client.system;

    expect(session.connected).toBe(false);
    await expect(session.disconnect()).resolves.toBeUndefined();
    expect(transport.sockets).toHaveLength(0);
  });

  it("connects implicitly on the first remote call", async () => {
    const session = client.system;

    await expect(session.remoteCall("echo", "hi")).resolves.toEqual({ echoed: "hi" });

    expect(session.connected).toBe(true);
    expect(transport.lastSocket?.request.url).toBe("ws://localhost:1234/system");
  });

  it("shares one connect attempt between concurrent calls", async () => {
    const session = client.llm;

    await Promise.all([session.remoteCall("a"), session.remoteCall("b"), session.remoteCall("c")]);

    expect(transport.sockets).toHaveLength(1);
    expect(transport.lastSocket?.frames.map((frame) => frame.type)).toEqual([
      "rpcCall",
      "rpcCall",
      "rpcCall",
    ]);
  });

  it("refuses an explicit connect while connected", async () => {
    const session = client.system;
    await session.connect();

    await expect(session.connect()).rejects.toThrow(AlreadyConnectedError);
    await expect(session.connect()).rejects.toThrow("already connected");
  });

  it("refuses an explicit connect while connecting", async () => {
    const session = client.system;

    const first = session.connect();
    await expect(session.connect()).rejects.toThrow("already connected");
    await first;

    expect(transport.sockets).toHaveLength(1);
  });

  it("keeps the same connection on re-entry and closes on the first exit", async () => {
    const session = client.system;

    const entered = await session.enter();
    const connection = session.currentConnection;
    expect(entered).toBe(session);

    await withScope(session, async (inner) => {
      expect(inner).toBe(session);
      expect(inner.currentConnection).toBe(connection);
      expect(connection?.connected).toBe(true);
    });

    expect(session.connected).toBe(false);
    expect(connection?.state).toBe("disconnected");
    await expect(session.exit()).resolves.toBeUndefined();
  });

  it("reconnects with a new connection after close", async () => {
    const session = client.system;
    await session.remoteCall("echo");
    const first = session.currentConnection;

    await session.close();
    expect(session.connected).toBe(false);

    await expect(session.remoteCall("echo", 2)).resolves.toEqual({ echoed: 2 });
    expect(session.currentConnection).not.toBe(first);
    expect(first?.state).toBe("disconnected");
    expect(transport.sockets).toHaveLength(2);
  });

  it("reconnects after the server closed the socket", async () => {
    const session = client.system;
    await session.remoteCall("echo");

    transport.lastSocket?.serverClose();
    expect(session.connected).toBe(false);

    await session.remoteCall("echo");
    expect(transport.sockets).toHaveLength(2);
  });

  it("streams pushed messages", async () => {
    const subscription = await client.llm.remoteStream("count", { upTo: 2 });

    const items: unknown[] = [];
    for await (const item of subscription) items.push(item);

    expect(items).toEqual([1, 2]);
    expect(transport.lastSocket?.frames[0]).toEqual({
      type: "channelCreate",
      endpoint: "count",
      channelId: 1,
      creationParameter: { upTo: 2 },
    });
  });

  it("parses pushed messages", async () => {
    const subscription = await client.llm.remoteStream("count", undefined, {
      parse: (message) => String(message),
    });

    const items: string[] = [];
    for await (const item of subscription) items.push(item);

    expect(items).toEqual(["1", "2"]);
  });

  it("gives up a connect attempt when disconnected during host resolution", async () => {
    let release: (host: string | undefined) => void = () => undefined;
    const discovering = new AsyncClient({
      env: {},
      transport,
      discoverApiHost: () =>
        new Promise<string | undefined>((resolve) => {
          release = resolve;
        }),
    });
    const session = discovering.system;

    const connecting = session.connect();
    await session.disconnect();
    release("localhost:1234");

    await expect(connecting).rejects.toThrow("system session was closed while connecting");
    expect(transport.sockets).toHaveLength(0);
  });
});
