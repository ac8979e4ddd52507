/**
 * Worker entry of the blocking client: builds an `AsyncClient` from the
 * resolved configuration and serves bridge requests against it.
 *
 * @module @lmlink/client/sync/sync-worker
 */

import { MessagePort, workerData } from "node:worker_threads";
import { z } from "zod";
import { Logger } from "@lmlink/kernel";
import { AsyncClient } from "../client.js";
import { ClientConfigSchema } from "../config.js";
import { serveBlockingBridge } from "./bridge-worker.js";
import { createSyncRequestHandler } from "./handler.js";

const WorkerDataSchema = z.object({
  port: z.instanceof(MessagePort),
  flag: z.instanceof(SharedArrayBuffer),
  config: ClientConfigSchema,
});

const { port, flag, config } = WorkerDataSchema.parse(workerData);

const log = Logger.for("SyncWorker");

const client = AsyncClient.fromConfig(config);
const server = serveBlockingBridge(port, new Int32Array(flag), createSyncRequestHandler(client));

// The caller is blocked and cannot observe worker errors; answer it instead.
process.on("uncaughtException", (error) => {
  log.error({ error }, "uncaught exception in sync worker");
  server.failPending(error);
});
process.on("unhandledRejection", (reason) => {
  log.error({ error: reason }, "unhandled rejection in sync worker");
  server.failPending(reason);
});
