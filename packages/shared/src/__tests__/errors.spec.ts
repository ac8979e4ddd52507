import { describe, it, expect } from "vitest";
import {
  AlreadyConnectedError,
  CancellationError,
  ConnectionError,
  LmlinkError,
  RemoteCallError,
  ValidationError,
  WebsocketError,
  deserializeError,
  isLmlinkError,
  serializeError,
} from "../errors.js";

describe("errors", () => {
  it("uses 'already connected' as the default message", () => {
    const error = new AlreadyConnectedError();
    expect(error.message).toBe("already connected");
    expect(error.code).toBe("ALREADY_CONNECTED");
    expect(error).toBeInstanceOf(WebsocketError);
  });

  it("keeps the transport failure as cause", () => {
    const cause = new Error("ECONNREFUSED");
    const error = new ConnectionError("failed to connect", { cause });
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("CONNECTION");
    expect(isLmlinkError(error)).toBe(true);
  });

  it("does not treat plain errors as lmlink errors", () => {
    expect(isLmlinkError(new Error("x"))).toBe(false);
  });

  it("rebuilds every error class from its serialized form", () => {
    const errors: LmlinkError[] = [
      new ValidationError("bad token"),
      new AlreadyConnectedError(),
      new ConnectionError("refused"),
      new WebsocketError("connection closed"),
      new RemoteCallError("listLoaded", "Model not found", "no such key"),
      new CancellationError("stopped"),
    ];

    for (const original of errors) {
      const rebuilt = deserializeError(serializeError(original));
      expect(rebuilt.constructor).toBe(original.constructor);
      expect(rebuilt.message).toBe(original.message);
    }
  });

  it("carries remote call details", () => {
    const rebuilt = deserializeError(
      serializeError(new RemoteCallError("listLoaded", "Model not found", "no such key")),
    );
    expect(rebuilt).toBeInstanceOf(RemoteCallError);
    if (rebuilt instanceof RemoteCallError) {
      expect(rebuilt.endpoint).toBe("listLoaded");
      expect(rebuilt.remoteCause).toBe("no such key");
    }
  });

  it("serializes foreign errors by name and message", () => {
    const serialized = serializeError(new TypeError("nope"));
    expect(serialized).toEqual({ name: "TypeError", message: "nope" });
    const rebuilt = deserializeError(serialized);
    expect(rebuilt.name).toBe("TypeError");
    expect(rebuilt.message).toBe("nope");
  });

  it("serializes non-error values", () => {
    expect(serializeError("boom")).toEqual({ name: "Error", message: "boom" });
  });
});
