import type { Logger } from "../logger";
import { IngestError } from "../ingest/ingest_error";
import { errorMessage } from "../util";

export type HttpJsonOptions = {
  timeoutMs: number;
  headers?: Record<string, string>;
  logger?: Logger;
};

// AbortSignal.timeout rejects with a DOMException named TimeoutError
function isAbortLike(e: unknown): boolean {
  if (typeof e !== "object" || e === null || !("name" in e)) return false;
  return e.name === "TimeoutError" || e.name === "AbortError";
}

/**
 * GET a JSON document. Every failure mode surfaces as an IngestError so the
 * calling source can record it against one gauge.
 */
export async function httpJson(url: string, opts: HttpJsonOptions): Promise<unknown> {
  const headers: Record<string, string> = { Accept: "application/json", ...(opts.headers ?? {}) };
  const started = Date.now();

  let res: Response;
  let text: string;
  try {
    res = await fetch(url, { method: "GET", headers, signal: AbortSignal.timeout(opts.timeoutMs) });
    text = await res.text();
  } catch (e) {
    if (isAbortLike(e)) {
      throw new IngestError("timeout", `request timed out after ${opts.timeoutMs}ms`, { url });
    }
    throw new IngestError("network", `request failed: ${errorMessage(e)}`, { url });
  }

  opts.logger?.debug({ url, status: res.status, elapsed_ms: Date.now() - started }, "http response");

  if (!res.ok) {
    throw new IngestError("http_status", `http ${res.status} ${res.statusText}`.trim(), { status: res.status, url });
  }

  try {
    return text ? JSON.parse(text) : null;
  } catch (e) {
    throw new IngestError("invalid_json", `response is not JSON: ${errorMessage(e)}`, { status: res.status, url });
  }
}
