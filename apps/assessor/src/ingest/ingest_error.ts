import type { IngestFailureKind, IngestFailureV1, IngestResultV1 } from "@floodrisk/contracts";

/**
 * Upstream failure for one gauge. Thrown inside a source, converted to
 * `{ ok: false, error }` at the source boundary by `captureIngest`.
 */
export class IngestError extends Error {
  public readonly kind: IngestFailureKind;
  public readonly status?: number;
  public readonly url?: string;

  constructor(kind: IngestFailureKind, message: string, meta: { status?: number; url?: string } = {}) {
    super(message);
    this.name = "IngestError";
    this.kind = kind;
    this.status = meta.status;
    this.url = meta.url;
  }

  toFailure(): IngestFailureV1 {
    const out: IngestFailureV1 = { kind: this.kind, message: this.message };
    if (this.status !== undefined) out.status = this.status;
    if (this.url !== undefined) out.url = this.url;
    return out;
  }
}

/**
 * Runs one fetch-and-parse step. IngestError becomes a failure value; anything else
 * is a bug and keeps propagating.
 */
export async function captureIngest<T>(
  work: () => Promise<{ value: T; raw?: unknown }>,
  onFailure: (err: IngestError) => void
): Promise<IngestResultV1<T>> {
  try {
    const { value, raw } = await work();
    return raw === undefined ? { ok: true, value } : { ok: true, value, raw };
  } catch (e) {
    if (!(e instanceof IngestError)) throw e;
    onFailure(e);
    return { ok: false, error: e.toFailure() };
  }
}
