/**
 * In-process inference server stand-in for tests: a `ws` server that speaks
 * the client protocol with a handful of canned endpoints.
 */

import type { IncomingHttpHeaders } from "node:http";
import { WebSocketServer, type WebSocket } from "ws";

export interface FakeServerOptions {
  /** Answer the handshake with `{ success: false }` */
  rejectAuth?: boolean;
  /** Refuse the upgrade unless `X-API-Key` has this value */
  requireApiKey?: string;
}

export interface ConnectionRecord {
  path: string;
  headers: IncomingHttpHeaders;
  handshake?: unknown;
  received: unknown[];
}

export interface FakeServer {
  readonly port: number;
  /** `127.0.0.1:<port>` */
  readonly apiHost: string;
  readonly connections: ConnectionRecord[];
  /** Close every client socket from the server side */
  dropClients(): void;
  close(): Promise<void>;
}

export const DOWNLOADED_MODELS = [
  { type: "llm", modelKey: "tiny-llm", path: "acme/tiny-llm" },
  { type: "embedding", modelKey: "tiny-embed", path: "acme/tiny-embed" },
];

type Frame = Record<string, unknown>;

function isFrame(value: unknown): value is Frame {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function send(socket: WebSocket, frame: Frame): void {
  socket.send(JSON.stringify(frame));
}

function handleCall(socket: WebSocket, record: ConnectionRecord, frame: Frame): void {
  const callId = frame.callId;
  const result = (value: unknown) => send(socket, { type: "rpcResult", callId, result: value });
  const error = (title: string, cause?: string) =>
    send(socket, { type: "rpcError", callId, error: { title, cause } });

  switch (frame.endpoint) {
    case "echo":
      return result(frame.parameter);
    case "listDownloadedModels":
      return result(DOWNLOADED_MODELS);
    case "listLoaded":
      return result([]);
    case "version":
      return result({ version: "0.0.1-test" });
    case "headers":
      return result({ apiKey: record.headers["x-api-key"] ?? null });
    case "garbage":
      socket.send("this is not json");
      return result("after garbage");
    case "fail":
      return error("deliberate failure", "requested by test");
    case "hang":
      return;
    default:
      return error(`unknown endpoint ${String(frame.endpoint)}`);
  }
}

function handleChannel(
  socket: WebSocket,
  frame: Frame,
  tickers: Map<unknown, ReturnType<typeof setInterval>>,
): void {
  const channelId = frame.channelId;
  const parameter = isFrame(frame.creationParameter) ? frame.creationParameter : {};

  if (frame.endpoint === "count") {
    const upTo = typeof parameter.upTo === "number" ? parameter.upTo : 3;
    for (let n = 1; n <= upTo; n++) {
      send(socket, { type: "channelSend", channelId, message: n });
    }
    send(socket, { type: "channelClose", channelId });
    return;
  }

  if (frame.endpoint === "ticks") {
    let tick = 0;
    tickers.set(
      channelId,
      setInterval(() => send(socket, { type: "channelSend", channelId, message: tick++ }), 5),
    );
    return;
  }

  send(socket, {
    type: "channelError",
    channelId,
    error: { title: `unknown channel endpoint ${String(frame.endpoint)}` },
  });
}

export function startFakeServer(options: FakeServerOptions = {}): Promise<FakeServer> {
  const connections: ConnectionRecord[] = [];

  const server = new WebSocketServer({
    host: "127.0.0.1",
    port: 0,
    verifyClient: (info: { req: { headers: IncomingHttpHeaders } }) =>
      options.requireApiKey === undefined ||
      info.req.headers["x-api-key"] === options.requireApiKey,
  });

  server.on("connection", (socket, request) => {
    const record: ConnectionRecord = {
      path: request.url ?? "",
      headers: request.headers,
      received: [],
    };
    connections.push(record);
    const tickers = new Map<unknown, ReturnType<typeof setInterval>>();
    let authenticated = false;

    socket.on("message", (data) => {
      const frame: unknown = JSON.parse(data.toString());
      if (!authenticated) {
        record.handshake = frame;
        if (options.rejectAuth) {
          send(socket, { success: false, error: "invalid passkey" });
          socket.close(1008, "unauthorized");
          return;
        }
        authenticated = true;
        send(socket, { success: true });
        return;
      }

      record.received.push(frame);
      if (!isFrame(frame)) return;
      if (frame.type === "rpcCall") {
        handleCall(socket, record, frame);
      } else if (frame.type === "channelCreate") {
        handleChannel(socket, frame, tickers);
      } else if (frame.type === "channelClose") {
        clearInterval(tickers.get(frame.channelId));
        tickers.delete(frame.channelId);
      }
    });

    socket.on("close", () => {
      for (const ticker of tickers.values()) clearInterval(ticker);
      tickers.clear();
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      if (typeof address === "string") {
        reject(new Error(`unexpected server address ${address}`));
        return;
      }
      const { port } = address;
      resolve({
        port,
        apiHost: `127.0.0.1:${port}`,
        connections,
        dropClients() {
          for (const client of server.clients) client.close(1001, "going away");
        },
        close: () =>
          new Promise<void>((done, fail) => {
            for (const client of server.clients) client.terminate();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
