/**
 * Channel sessions
 *
 * Typed wrappers over `Session.remoteCall` for the endpoints the client
 * exposes directly. Anything else is reachable through `remoteCall` /
 * `remoteStream` on the same session.
 *
 * @module @lmlink/client/channel-sessions
 */

import { z } from "zod";
import type { OperationOptions } from "@lmlink/kernel";
import { Session, type SessionHost } from "./session.js";
import {
  DownloadedModelSchema,
  LoadedModelSchema,
  LocalFilePathSchema,
  ServerVersionSchema,
  parsePayload,
  type DownloadedModel,
  type LoadedModel,
  type ModelType,
  type ServerVersion,
} from "./schemas.js";

// ============================================================================
// System
// ============================================================================

export class SystemSession extends Session {
  constructor(host: SessionHost) {
    super("system", host);
  }

  /** Every model present on the server's disk, of any type. */
  async listDownloadedModels(options?: OperationOptions): Promise<DownloadedModel[]> {
    const result = await this.remoteCall("listDownloadedModels", undefined, options);
    return parsePayload("listDownloadedModels", z.array(DownloadedModelSchema), result);
  }

  async getVersion(options?: OperationOptions): Promise<ServerVersion> {
    const result = await this.remoteCall("version", undefined, options);
    return parsePayload("version", ServerVersionSchema, result);
  }
}

// ============================================================================
// Models
// ============================================================================

/**
 * Session for a model namespace (`llm` or `embedding`). Downloaded models
 * are listed through the system channel and filtered by type.
 */
export class ModelSession extends Session {
  constructor(
    readonly modelType: ModelType,
    host: SessionHost,
    private readonly system: SystemSession,
  ) {
    super(modelType, host);
  }

  /** Models of this type currently loaded in memory. */
  async listLoaded(options?: OperationOptions): Promise<LoadedModel[]> {
    const result = await this.remoteCall("listLoaded", undefined, options);
    return parsePayload("listLoaded", z.array(LoadedModelSchema), result);
  }

  async listDownloaded(options?: OperationOptions): Promise<DownloadedModel[]> {
    const models = await this.system.listDownloadedModels(options);
    return models.filter((model) => model.type === this.modelType);
  }
}

export class LlmSession extends ModelSession {
  constructor(host: SessionHost, system: SystemSession) {
    super("llm", host, system);
  }
}

export class EmbeddingSession extends ModelSession {
  constructor(host: SessionHost, system: SystemSession) {
    super("embedding", host, system);
  }
}

// ============================================================================
// Files
// ============================================================================

export class FilesSession extends Session {
  constructor(host: SessionHost) {
    super("files", host);
  }

  /** Absolute path on the server of a file it manages. */
  async getLocalFileAbsolutePath(fileName: string, options?: OperationOptions): Promise<string> {
    const result = await this.remoteCall("getLocalFileAbsolutePath", { fileName }, options);
    return parsePayload("getLocalFileAbsolutePath", LocalFilePathSchema, result).path;
  }
}
