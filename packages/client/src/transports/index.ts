/**
 * Transport delegates for @lmlink/client
 *
 * @module @lmlink/client/transports
 */

export {
  createWebSocketDelegate,
  toWebSocketUrl,
  type WebSocketDelegateOptions,
} from "./websocket.js";
