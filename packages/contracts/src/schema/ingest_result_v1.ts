import { z } from "zod";

export const IngestFailureKindZ = z.enum([
  "network",
  "timeout",
  "http_status",
  "invalid_json",
  "malformed_payload",
  "incomplete_metadata",
]);

export const IngestFailureV1Schema = z
  .object({
    kind: IngestFailureKindZ,
    message: z.string().min(1),
    status: z.number().int().optional(),
    url: z.string().optional(),
  })
  .strict();

export type IngestFailureKind = z.infer<typeof IngestFailureKindZ>;
export type IngestFailureV1 = z.infer<typeof IngestFailureV1Schema>;

/**
 * Outcome of one upstream fetch for one gauge. A failure is recorded against
 * that gauge only; the run carries on for the others.
 */
export type IngestResultV1<T> =
  | { ok: true; value: T; raw?: unknown }
  | { ok: false; error: IngestFailureV1 };

export function ingestResultV1Schema<T extends z.ZodTypeAny>(value: T) {
  return z.discriminatedUnion("ok", [
    z.object({ ok: z.literal(true), value, raw: z.unknown().optional() }).strict(),
    z.object({ ok: z.literal(false), error: IngestFailureV1Schema }).strict(),
  ]);
}
