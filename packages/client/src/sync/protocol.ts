/**
 * Blocking bridge protocol
 *
 * Messages exchanged between a blocking caller and the worker thread that
 * runs the async client. Every request gets exactly one reply with the same
 * id; values and errors must survive structured cloning.
 *
 * @module @lmlink/client/sync/protocol
 */

import { z } from "zod";
import { CHANNEL_NAMES } from "@lmlink/shared";

const channel = z.enum(CHANNEL_NAMES);

export const BridgeRequestSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("ping") }),
  z.object({ op: z.literal("apiHost") }),
  z.object({ op: z.literal("close") }),
  z.object({ op: z.literal("session.connect"), channel }),
  z.object({ op: z.literal("session.enter"), channel }),
  z.object({ op: z.literal("session.disconnect"), channel }),
  z.object({ op: z.literal("session.connected"), channel }),
  z.object({
    op: z.literal("session.remoteCall"),
    channel,
    method: z.string(),
    params: z.unknown(),
  }),
  z.object({
    op: z.literal("session.remoteStream"),
    channel,
    method: z.string(),
    params: z.unknown(),
  }),
  z.object({ op: z.literal("stream.next"), streamId: z.number().int() }),
  z.object({ op: z.literal("stream.cancel"), streamId: z.number().int() }),
]);

export type BridgeRequest = z.infer<typeof BridgeRequestSchema>;

export const RequestEnvelopeSchema = z.object({
  id: z.number().int(),
  request: BridgeRequestSchema,
});

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;

export const SerializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  code: z
    .enum(["VALIDATION", "ALREADY_CONNECTED", "CONNECTION", "WEBSOCKET", "REMOTE", "CANCELLED"])
    .optional(),
  details: z.record(z.unknown()).optional(),
});

export const BridgeReplySchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: SerializedErrorSchema }),
]);

export type BridgeReply = z.infer<typeof BridgeReplySchema>;

export const ReplyEnvelopeSchema = z.object({
  id: z.number().int(),
  reply: BridgeReplySchema,
});

export type ReplyEnvelope = z.infer<typeof ReplyEnvelopeSchema>;

/** Value of a `stream.next` reply. */
export const StreamStepSchema = z.object({
  done: z.boolean(),
  value: z.unknown(),
});

export type StreamStep = z.infer<typeof StreamStepSchema>;
