/**
 * Worker-side request handler: maps bridge requests onto an `AsyncClient`.
 * Kept free of thread plumbing so it can be exercised in process.
 *
 * @module @lmlink/client/sync/handler
 */

import { ValidationError, type ChannelName } from "@lmlink/shared";
import { Logger, type Subscription } from "@lmlink/kernel";
import type { AsyncClient } from "../client.js";
import type { BridgeRequest, StreamStep } from "./protocol.js";

const log = Logger.for("SyncHandler");

export type SyncRequestHandler = (request: BridgeRequest) => Promise<unknown>;

export function createSyncRequestHandler(client: AsyncClient): SyncRequestHandler {
  const streams = new Map<number, { channel: ChannelName; subscription: Subscription<unknown> }>();
  let nextStreamId = 1;

  const streamFor = (streamId: number): Subscription<unknown> => {
    const stream = streams.get(streamId);
    if (!stream) {
      throw new ValidationError(`unknown stream ${streamId}`);
    }
    return stream.subscription;
  };

  // Streams die with their connection; forget the ones the caller never finished.
  const dropStreams = (channel: ChannelName) => {
    for (const [streamId, stream] of streams) {
      if (stream.channel !== channel) continue;
      stream.subscription.cancel();
      streams.delete(streamId);
    }
  };

  return async (request) => {
    switch (request.op) {
      case "ping":
        return "pong";

      case "apiHost":
        return client.resolveApiHost();

      case "close":
        for (const stream of streams.values()) stream.subscription.cancel();
        streams.clear();
        await client.close();
        return undefined;

      case "session.connect":
        await client.session(request.channel).connect();
        return undefined;

      case "session.enter":
        await client.session(request.channel).enter();
        return undefined;

      case "session.disconnect":
        await client.session(request.channel).disconnect();
        dropStreams(request.channel);
        return undefined;

      case "session.connected":
        return client.session(request.channel).connected;

      case "session.remoteCall":
        return client.session(request.channel).remoteCall(request.method, request.params);

      case "session.remoteStream": {
        const subscription = await client
          .session(request.channel)
          .remoteStream(request.method, request.params);
        const streamId = nextStreamId++;
        streams.set(streamId, { channel: request.channel, subscription });
        log.debug({ streamId, method: request.method }, "stream opened");
        return streamId;
      }

      case "stream.next": {
        const stream = streamFor(request.streamId);
        try {
          const result = await stream.next();
          if (result.done) streams.delete(request.streamId);
          const step: StreamStep = { done: result.done === true, value: result.value };
          return step;
        } catch (error) {
          streams.delete(request.streamId);
          throw error;
        }
      }

      case "stream.cancel":
        streams.get(request.streamId)?.subscription.cancel();
        streams.delete(request.streamId);
        return undefined;
    }
  };
}
