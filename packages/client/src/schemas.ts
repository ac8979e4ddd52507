/**
 * Payload schemas
 *
 * Domain payloads are owned by the server; the client only checks the
 * fields it relies on and passes everything else through untouched.
 *
 * @module @lmlink/client/schemas
 */

import { z } from "zod";
import { ValidationError } from "@lmlink/shared";

export const ModelTypeSchema = z.enum(["llm", "embedding"]);

export type ModelType = z.infer<typeof ModelTypeSchema>;

export const DownloadedModelSchema = z
  .object({
    type: z.string(),
    modelKey: z.string(),
    path: z.string(),
    displayName: z.string().optional(),
    sizeBytes: z.number().optional(),
  })
  .passthrough();

export type DownloadedModel = z.infer<typeof DownloadedModelSchema>;

export const LoadedModelSchema = z
  .object({
    identifier: z.string(),
    modelKey: z.string(),
    path: z.string(),
  })
  .passthrough();

export type LoadedModel = z.infer<typeof LoadedModelSchema>;

export const ServerVersionSchema = z
  .object({
    version: z.string(),
    build: z.number().optional(),
  })
  .passthrough();

export type ServerVersion = z.infer<typeof ServerVersionSchema>;

export const LocalFilePathSchema = z
  .object({
    path: z.string(),
  })
  .passthrough();

export type LocalFilePath = z.infer<typeof LocalFilePathSchema>;

/** Validate a server payload, raising `ValidationError` on mismatch. */
export function parsePayload<S extends z.ZodTypeAny>(
  endpoint: string,
  schema: S,
  value: unknown,
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`unexpected ${endpoint} payload: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
