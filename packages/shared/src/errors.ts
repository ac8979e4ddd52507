/**
 * Error taxonomy
 *
 * Every failure raised by lmlink packages is an `LmlinkError` carrying a
 * stable `code`. Errors cross the worker-thread boundary of the blocking
 * client as plain objects (`serializeError`) and are rebuilt on the other
 * side (`deserializeError`) into the same classes.
 *
 * @module @lmlink/shared/errors
 */

// ============================================================================
// Codes
// ============================================================================

export type LmlinkErrorCode =
  | "VALIDATION"
  | "ALREADY_CONNECTED"
  | "CONNECTION"
  | "WEBSOCKET"
  | "REMOTE"
  | "CANCELLED";

/**
 * Plain-object form of an error, safe to structured-clone or JSON encode.
 */
export interface SerializedError {
  name: string;
  message: string;
  code?: LmlinkErrorCode;
  details?: Record<string, unknown>;
}

// ============================================================================
// Base class
// ============================================================================

export class LmlinkError extends Error {
  readonly code: LmlinkErrorCode;

  constructor(code: LmlinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LmlinkError";
    this.code = code;
  }

  /** Extra fields carried across serialization. */
  get details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

export function isLmlinkError(error: unknown): error is LmlinkError {
  return error instanceof LmlinkError;
}

// ============================================================================
// Concrete errors
// ============================================================================

/**
 * Malformed input detected without any I/O (e.g. a bad API token).
 */
export class ValidationError extends LmlinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("VALIDATION", message, options);
    this.name = "ValidationError";
  }
}

/**
 * Transport or remote-side failure on an open (or opening) websocket.
 */
export class WebsocketError extends LmlinkError {
  constructor(
    message: string,
    options?: { cause?: unknown },
    code: LmlinkErrorCode = "WEBSOCKET",
  ) {
    super(code, message, options);
    this.name = "WebsocketError";
  }
}

/**
 * Raised by `connect()` when the connection is already open or opening.
 */
export class AlreadyConnectedError extends WebsocketError {
  constructor(message = "already connected") {
    super(message, undefined, "ALREADY_CONNECTED");
    this.name = "AlreadyConnectedError";
  }
}

/**
 * The connection could not be established: network failure, a rejected
 * HTTP upgrade (including policy blocks in front of the server) or a
 * failed auth handshake.
 */
export class ConnectionError extends WebsocketError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options, "CONNECTION");
    this.name = "ConnectionError";
  }
}

/**
 * The server answered a remote call with an error payload.
 */
export class RemoteCallError extends LmlinkError {
  readonly endpoint: string;
  readonly remoteCause?: string;

  constructor(endpoint: string, title: string, remoteCause?: string) {
    super("REMOTE", title);
    this.name = "RemoteCallError";
    this.endpoint = endpoint;
    this.remoteCause = remoteCause;
  }

  override get details(): Record<string, unknown> {
    return { endpoint: this.endpoint, remoteCause: this.remoteCause };
  }
}

/**
 * The caller cancelled the operation. Not a failure of the system.
 */
export class CancellationError extends LmlinkError {
  constructor(message = "operation cancelled") {
    super("CANCELLED", message);
    this.name = "CancellationError";
  }
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeError(error: unknown): SerializedError {
  if (error instanceof LmlinkError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}

function detailString(details: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = details?.[key];
  return typeof value === "string" ? value : undefined;
}

export function deserializeError(serialized: SerializedError): Error {
  switch (serialized.code) {
    case "VALIDATION":
      return new ValidationError(serialized.message);
    case "ALREADY_CONNECTED":
      return new AlreadyConnectedError(serialized.message);
    case "CONNECTION":
      return new ConnectionError(serialized.message);
    case "WEBSOCKET":
      return new WebsocketError(serialized.message);
    case "REMOTE":
      return new RemoteCallError(
        detailString(serialized.details, "endpoint") ?? "unknown",
        serialized.message,
        detailString(serialized.details, "remoteCause"),
      );
    case "CANCELLED":
      return new CancellationError(serialized.message);
    default: {
      const error = new Error(serialized.message);
      error.name = serialized.name;
      return error;
    }
  }
}
