/**
 * Wire Protocol
 *
 * JSON frames exchanged over a channel websocket. The client opens every
 * connection with an auth handshake frame and waits for an auth result
 * before any other traffic. After that, traffic is multiplexed by
 * correlation id:
 *
 * - `rpcCall` / `rpcResult` / `rpcError`: request/response, keyed by `callId`
 * - `channelCreate` / `channelSend` / `channelClose` / `channelError`:
 *   server-push subscriptions, keyed by `channelId`
 *
 * Inbound frames are validated with zod; outbound frames are typed only.
 *
 * @module @lmlink/shared/protocol
 */

import { z } from "zod";

// ============================================================================
// Handshake
// ============================================================================

export const AUTH_VERSION = 1;

export const AuthHandshakeSchema = z.object({
  authVersion: z.literal(AUTH_VERSION),
  clientIdentifier: z.string().min(1),
  clientPasskey: z.string().min(1),
});

export type AuthHandshake = z.infer<typeof AuthHandshakeSchema>;

export const AuthResultSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
});

export type AuthResult = z.infer<typeof AuthResultSchema>;

// ============================================================================
// Client → Server
// ============================================================================

export interface RpcCallFrame {
  type: "rpcCall";
  endpoint: string;
  callId: number;
  parameter?: unknown;
}

export interface ChannelCreateFrame {
  type: "channelCreate";
  endpoint: string;
  channelId: number;
  creationParameter?: unknown;
}

export interface ClientChannelCloseFrame {
  type: "channelClose";
  channelId: number;
}

export type ClientFrame = RpcCallFrame | ChannelCreateFrame | ClientChannelCloseFrame;

/** Anything a transport may be asked to write. */
export type OutboundFrame = ClientFrame | AuthHandshake;

// ============================================================================
// Server → Client
// ============================================================================

export const RemoteErrorSchema = z
  .object({
    title: z.string(),
    cause: z.string().optional(),
  })
  .passthrough();

export type RemoteErrorPayload = z.infer<typeof RemoteErrorSchema>;

const correlationId = z.number().int().nonnegative();

export const ServerFrameSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("rpcResult"),
    callId: correlationId,
    result: z.unknown(),
  }),
  z.object({
    type: z.literal("rpcError"),
    callId: correlationId,
    error: RemoteErrorSchema,
  }),
  z.object({
    type: z.literal("channelSend"),
    channelId: correlationId,
    message: z.unknown(),
  }),
  z.object({
    type: z.literal("channelClose"),
    channelId: correlationId,
  }),
  z.object({
    type: z.literal("channelError"),
    channelId: correlationId,
    error: RemoteErrorSchema,
  }),
  z.object({
    type: z.literal("communicationWarning"),
    warning: z.string(),
  }),
]);

export type ServerFrame = z.infer<typeof ServerFrameSchema>;

/** Server frames that carry a correlation id. */
export type CorrelatedServerFrame = Exclude<ServerFrame, { type: "communicationWarning" }>;

export function correlationIdOf(frame: CorrelatedServerFrame): number {
  return "callId" in frame ? frame.callId : frame.channelId;
}

// ============================================================================
// Channels
// ============================================================================

export const CHANNEL_NAMES = ["system", "llm", "embedding", "files"] as const;

export type ChannelName = (typeof CHANNEL_NAMES)[number];
