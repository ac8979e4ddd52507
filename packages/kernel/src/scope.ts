/**
 * Scoped resources.
 *
 * A scoped resource is acquired with `enter()` and released with `exit()`.
 * Connections and sessions implement it with deliberately asymmetric
 * semantics: entering an already-open resource is a no-op that returns the
 * same instance, while the first `exit()` always releases it. Nested scopes
 * therefore never keep a resource alive past the first exit.
 *
 * @module @lmlink/kernel/scope
 */

import { Logger } from "./logger.js";

const log = Logger.for("Scope");

export interface ScopedResource {
  enter(): Promise<unknown>;
  exit(): Promise<void>;
}

/**
 * Run `body` between `enter()` and `exit()`. The resource is exited even if
 * the body throws; the body's error wins over an error raised by `exit()`.
 */
export async function withScope<R extends ScopedResource, T>(
  resource: R,
  body: (resource: R) => Promise<T> | T,
): Promise<T> {
  await resource.enter();
  let result: T;
  try {
    result = await body(resource);
  } catch (error) {
    await resource.exit().catch((exitError: unknown) => {
      log.warn({ error: exitError }, "exit failed while unwinding a failed scope");
    });
    throw error;
  }
  await resource.exit();
  return result;
}

/** Blocking counterpart of `ScopedResource`. */
export interface SyncScopedResource {
  enter(): unknown;
  exit(): void;
}

/** Blocking counterpart of `withScope`. */
export function withSyncScope<R extends SyncScopedResource, T>(
  resource: R,
  body: (resource: R) => T,
): T {
  resource.enter();
  let result: T;
  try {
    result = body(resource);
  } catch (error) {
    try {
      resource.exit();
    } catch (exitError) {
      log.warn({ error: exitError }, "exit failed while unwinding a failed scope");
    }
    throw error;
  }
  resource.exit();
  return result;
}
