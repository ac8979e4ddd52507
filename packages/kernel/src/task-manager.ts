/**
 * TaskManager: the dispatch engine.
 *
 * One TaskManager multiplexes many logical operations over the connections
 * of a client. It is the only owner of the correlation-id table: callers
 * reach it exclusively through `runCall`, `runStream`, `schedule` and
 * `cancel`, and connections feed it through `dispatch` and `channelClosed`.
 *
 * Every registered operation moves through a small state machine:
 *
 * ```
 * registered ──▶ resolved   (result, error, server close, connection close)
 *      └───────▶ cancelled  (caller cancellation)
 * ```
 *
 * Leaving `registered` removes the correlation id, so each operation is
 * settled exactly once and late frames for it are dropped.
 *
 * @module @lmlink/kernel/task-manager
 */

import {
  CancellationError,
  RemoteCallError,
  ValidationError,
  WebsocketError,
  correlationIdOf,
  type ClientFrame,
  type ServerFrame,
} from "@lmlink/shared";
import { Logger } from "./logger.js";
import { Subscription } from "./subscription.js";

const log = Logger.for("TaskManager");

// ============================================================================
// Types
// ============================================================================

/**
 * The side of a connection the engine writes to. Operations are registered
 * per channel so that closing one connection only fails its own operations.
 */
export interface FrameChannel {
  readonly open: boolean;
  send(frame: ClientFrame): void;
}

export interface OperationOptions {
  /** Aborting the signal cancels the operation */
  signal?: AbortSignal;
}

export interface StreamOptions<T> extends OperationOptions {
  /** Converts each pushed message; a throw fails the stream */
  parse: (message: unknown) => T;
}

export type OperationState = "registered" | "resolved" | "cancelled";

interface OperationBase {
  readonly id: number;
  readonly channel: FrameChannel;
  readonly endpoint: string;
  state: OperationState;
  /** Drops the abort listener */
  detach(): void;
}

interface PendingCall extends OperationBase {
  readonly kind: "call";
  resolve(value: unknown): void;
  reject(error: Error): void;
}

interface PendingStream extends OperationBase {
  readonly kind: "stream";
  deliver(message: unknown): void;
  end(): void;
  fail(error: Error): void;
  cancel(error: CancellationError): void;
}

type Operation = PendingCall | PendingStream;

// ============================================================================
// Task handles
// ============================================================================

export type TaskStatus = "running" | "completed" | "error" | "cancelled";

export interface TaskHandle<T> {
  readonly id: number;
  readonly name?: string;
  readonly status: TaskStatus;
  /** Settles with the unit's result, its error, or a `CancellationError` */
  readonly result: Promise<T>;
  /** No-op once the task has settled */
  cancel(reason?: string): void;
}

export type TaskUnit<T> = (signal: AbortSignal) => Promise<T>;

class TaskHandleImpl<T> implements TaskHandle<T> {
  readonly result: Promise<T>;
  private _status: TaskStatus = "running";
  private readonly controller = new AbortController();
  private readonly rejectResult: (error: Error) => void;

  constructor(
    readonly id: number,
    readonly name: string | undefined,
    unit: TaskUnit<T>,
    private readonly onSettled: () => void,
  ) {
    let rejectResult: (error: Error) => void = () => undefined;
    const run = async (): Promise<T> => unit(this.controller.signal);

    this.result = new Promise<T>((resolve, reject) => {
      rejectResult = reject;
      // Start on a later microtask so schedule() never runs user code inline.
      queueMicrotask(() => {
        if (this._status !== "running") return;
        run().then(
          (value) => {
            if (this.settle("completed")) resolve(value);
          },
          (error: unknown) => {
            if (this.settle("error")) reject(error);
          },
        );
      });
    });
    this.rejectResult = rejectResult;
  }

  get status(): TaskStatus {
    return this._status;
  }

  cancel(reason = "task cancelled"): void {
    if (!this.settle("cancelled")) return;
    const error = new CancellationError(reason);
    this.controller.abort(error);
    this.rejectResult(error);
  }

  private settle(status: TaskStatus): boolean {
    if (this._status !== "running") return false;
    this._status = status;
    this.onSettled();
    return true;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function toCancellationError(reason: unknown): CancellationError {
  if (reason instanceof CancellationError) return reason;
  if (typeof reason === "string") return new CancellationError(reason);
  return new CancellationError();
}

// ============================================================================
// TaskManager
// ============================================================================

export class TaskManager {
  private nextCorrelationId = 1;
  private nextTaskId = 1;
  private readonly operations = new Map<number, Operation>();
  private readonly tasks = new Map<number, TaskHandle<unknown>>();
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  /** Registered calls and streams. */
  get pendingCount(): number {
    return this.operations.size;
  }

  /** Scheduled tasks that have not settled yet. */
  get activeTaskCount(): number {
    return this.tasks.size;
  }

  isPending(correlationId: number): boolean {
    return this.operations.has(correlationId);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Scheduling
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Run a unit of work inside the engine. The unit receives an AbortSignal
   * that fires when the task is cancelled; pass it on to `runCall` /
   * `runStream` so in-flight operations are unregistered too.
   */
  schedule<T>(unit: TaskUnit<T>, options: { name?: string } = {}): TaskHandle<T> {
    this.assertOpen();
    const id = this.nextTaskId++;
    const handle = new TaskHandleImpl<T>(id, options.name, unit, () => this.tasks.delete(id));
    this.tasks.set(id, handle);
    // Callers that never await the handle must not produce unhandled rejections.
    handle.result.catch((error: unknown) => {
      log.debug({ taskId: id, name: options.name, error }, "task settled with error");
    });
    return handle;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Remote operations
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Send an `rpcCall` and wait for its `rpcResult` / `rpcError`.
   *
   * Rejects with `WebsocketError("connection closed")` if the channel closes
   * first, or `CancellationError` if `options.signal` aborts.
   */
  runCall(
    channel: FrameChannel,
    endpoint: string,
    parameter?: unknown,
    options: OperationOptions = {},
  ): Promise<unknown> {
    return new Promise((resolve, reject) => {
      if (this._closed) {
        reject(new WebsocketError("task manager closed"));
        return;
      }
      const { signal } = options;
      if (signal?.aborted) {
        reject(toCancellationError(signal.reason));
        return;
      }

      const id = this.nextCorrelationId++;
      const onAbort = () => {
        this.cancelOperation(id, toCancellationError(signal?.reason));
      };
      const call: PendingCall = {
        kind: "call",
        id,
        channel,
        endpoint,
        state: "registered",
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      this.operations.set(id, call);
      signal?.addEventListener("abort", onAbort, { once: true });

      log.debug({ callId: id, endpoint }, "rpcCall");
      try {
        channel.send({ type: "rpcCall", endpoint, callId: id, parameter });
      } catch (error) {
        this.failOperation(call, toError(error));
      }
    });
  }

  /**
   * Open a server-push stream. The correlation id stays registered until the
   * subscription is cancelled, the server closes it, or the channel closes.
   */
  runStream(
    channel: FrameChannel,
    endpoint: string,
    creationParameter?: unknown,
    options?: OperationOptions,
  ): Subscription<unknown>;
  runStream<T>(
    channel: FrameChannel,
    endpoint: string,
    creationParameter: unknown,
    options: StreamOptions<T>,
  ): Subscription<T>;
  runStream<T>(
    channel: FrameChannel,
    endpoint: string,
    creationParameter?: unknown,
    options: Partial<StreamOptions<T>> = {},
  ): Subscription<T> | Subscription<unknown> {
    if (options.parse) {
      return this.openStream(channel, endpoint, creationParameter, options.signal, options.parse);
    }
    return this.openStream(channel, endpoint, creationParameter, options.signal, (message) => message);
  }

  private openStream<T>(
    channel: FrameChannel,
    endpoint: string,
    creationParameter: unknown,
    signal: AbortSignal | undefined,
    parse: (message: unknown) => T,
  ): Subscription<T> {
    this.assertOpen();
    if (signal?.aborted) {
      throw toCancellationError(signal.reason);
    }

    const id = this.nextCorrelationId++;
    const subscription = new Subscription<T>(id, () => {
      this.cancelOperation(id, new CancellationError("subscription cancelled"));
    });
    const onAbort = () => {
      this.cancelOperation(id, toCancellationError(signal?.reason));
    };

    const stream: PendingStream = {
      kind: "stream",
      id,
      channel,
      endpoint,
      state: "registered",
      deliver: (message) => {
        let item: T;
        try {
          item = parse(message);
        } catch (error) {
          this.sendChannelClose(stream);
          this.failOperation(
            stream,
            new ValidationError(`unexpected ${endpoint} message: ${toError(error).message}`, {
              cause: error,
            }),
          );
          return;
        }
        subscription.push(item);
      },
      end: () => subscription.end(),
      fail: (error) => subscription.fail(error),
      cancel: (error) => subscription.interrupt(error),
      detach: () => signal?.removeEventListener("abort", onAbort),
    };

    this.operations.set(id, stream);
    signal?.addEventListener("abort", onAbort, { once: true });

    log.debug({ channelId: id, endpoint }, "channelCreate");
    try {
      channel.send({ type: "channelCreate", endpoint, channelId: id, creationParameter });
    } catch (error) {
      this.failOperation(stream, toError(error));
    }

    return subscription;
  }

  /**
   * Cancel a registered call or stream by correlation id. Returns false if
   * the id is unknown or the operation already settled.
   */
  cancel(correlationId: number, reason?: string): boolean {
    return this.cancelOperation(correlationId, new CancellationError(reason));
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Inbound
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * Route one inbound frame. Returns false (after logging) when the frame
   * does not belong to a live operation on `channel`.
   */
  dispatch(channel: FrameChannel, frame: ServerFrame): boolean {
    if (frame.type === "communicationWarning") {
      log.warn({ warning: frame.warning }, "communication warning from server");
      return true;
    }

    const id = correlationIdOf(frame);
    const operation = this.operations.get(id);
    if (!operation || operation.channel !== channel) {
      log.warn({ correlationId: id, type: frame.type }, "dropping frame with unknown correlation id");
      return false;
    }

    switch (frame.type) {
      case "rpcResult":
        if (operation.kind !== "call") break;
        if (this.release(operation, "resolved")) operation.resolve(frame.result);
        return true;

      case "rpcError":
        if (operation.kind !== "call") break;
        this.failOperation(
          operation,
          new RemoteCallError(operation.endpoint, frame.error.title, frame.error.cause),
        );
        return true;

      case "channelSend":
        if (operation.kind !== "stream") break;
        operation.deliver(frame.message);
        return true;

      case "channelClose":
        if (operation.kind !== "stream") break;
        if (this.release(operation, "resolved")) operation.end();
        return true;

      case "channelError":
        if (operation.kind !== "stream") break;
        this.failOperation(
          operation,
          new RemoteCallError(operation.endpoint, frame.error.title, frame.error.cause),
        );
        return true;
    }

    log.warn(
      { correlationId: id, type: frame.type, kind: operation.kind },
      "dropping frame that does not match its operation",
    );
    return false;
  }

  /**
   * Fail every operation registered on `channel`. Returns how many were
   * settled by this call.
   */
  channelClosed(channel: FrameChannel, error: Error = new WebsocketError("connection closed")): number {
    let settled = 0;
    for (const operation of [...this.operations.values()]) {
      if (operation.channel === channel && this.failOperation(operation, error)) {
        settled++;
      }
    }
    if (settled > 0) {
      log.debug({ settled, reason: error.message }, "failed pending operations on closed channel");
    }
    return settled;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ──────────────────────────────────────────────────────────────────────────

  async enter(): Promise<this> {
    this.assertOpen();
    return this;
  }

  async exit(): Promise<void> {
    this.close();
  }

  /**
   * Cancel every task and fail every pending operation. The engine accepts no
   * new work afterwards.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;

    for (const task of [...this.tasks.values()]) {
      task.cancel("task manager closed");
    }
    const error = new WebsocketError("task manager closed");
    for (const operation of [...this.operations.values()]) {
      this.failOperation(operation, error);
    }
  }

  // ──────────────────────────────────────────────────────────────────────────
  // State transitions
  // ──────────────────────────────────────────────────────────────────────────

  private assertOpen(): void {
    if (this._closed) {
      throw new WebsocketError("task manager closed");
    }
  }

  private release(operation: Operation, state: "resolved" | "cancelled"): boolean {
    if (operation.state !== "registered") return false;
    operation.state = state;
    this.operations.delete(operation.id);
    operation.detach();
    return true;
  }

  private failOperation(operation: Operation, error: Error): boolean {
    if (!this.release(operation, "resolved")) return false;
    if (operation.kind === "call") {
      operation.reject(error);
    } else {
      operation.fail(error);
    }
    return true;
  }

  private cancelOperation(id: number, error: CancellationError): boolean {
    const operation = this.operations.get(id);
    if (!operation || !this.release(operation, "cancelled")) return false;

    log.debug({ correlationId: id, endpoint: operation.endpoint }, "operation cancelled");
    if (operation.kind === "call") {
      operation.reject(error);
    } else {
      this.sendChannelClose(operation);
      operation.cancel(error);
    }
    return true;
  }

  private sendChannelClose(stream: PendingStream): void {
    if (!stream.channel.open) return;
    try {
      stream.channel.send({ type: "channelClose", channelId: stream.id });
    } catch (error) {
      log.warn({ channelId: stream.id, error }, "failed to send channelClose");
    }
  }
}
