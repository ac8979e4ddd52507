/**
 * # lmlink Kernel
 *
 * Low-level execution primitives shared by the async and blocking clients.
 *
 * ## Core Primitives
 *
 * - **TaskManager** - The dispatch engine: correlation ids, pending calls,
 *   subscriptions, scheduled tasks and cancellation
 * - **Subscription** - Lazily consumed server-push sequence
 * - **Scopes** - `enter()`/`exit()` resources and `withScope`
 * - **Logger** - Structured logging on pino
 *
 * ## Example
 *
 * ```typescript
 * const tasks = new TaskManager();
 * const handle = tasks.schedule((signal) =>
 *   tasks.runCall(connection, "listLoaded", undefined, { signal }),
 * );
 * handle.cancel();
 * ```
 *
 * @module @lmlink/kernel
 */

export * from "./logger.js";
export * from "./subscription.js";
export * from "./task-manager.js";
export * from "./scope.js";
