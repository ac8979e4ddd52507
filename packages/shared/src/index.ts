/**
 * # lmlink Shared
 *
 * Platform-level definitions shared by every lmlink package:
 *
 * - **Protocol** - Zod schemas for inbound frames, types for outbound frames
 * - **Errors** - The `LmlinkError` taxonomy and its serialization
 * - **Auth** - API token parsing and guest identities
 * - **Headers** - Layered HTTP header assembly for the websocket upgrade
 * - **Transport** - The delegate contract for byte-level socket I/O
 *
 * @module @lmlink/shared
 */

export * from "./protocol.js";
export * from "./errors.js";
export * from "./auth.js";
export * from "./headers.js";
export * from "./transport.js";
