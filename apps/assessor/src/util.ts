import { createHash, randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function newRunId(): string {
  // run ids only need to be unique, not reproducible
  return randomUUID();
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

// Object keys sorted at every depth; arrays keep their order.
function canonicalize(x: unknown): unknown {
  if (Array.isArray(x)) return x.map(canonicalize);
  if (!isObj(x)) return x;
  return Object.fromEntries(
    Object.keys(x)
      .sort()
      .map((k) => [k, canonicalize(x[k])])
  );
}

export function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/**
 * Numbers arrive from upstream JSON either as numbers or as numeric strings ("8.5").
 */
export function toFiniteNumber(x: unknown): number | null {
  if (typeof x === "number") return Number.isFinite(x) ? x : null;
  if (typeof x === "string") {
    const s = x.trim();
    if (!s) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isoDate(tsMs: number): string {
  return new Date(tsMs).toISOString().slice(0, 10);
}

/**
 * Nearest directory at or above `startDir` that contains `requiredRelativePath`, or null.
 * Scripts may run from the root or from a workspace package, and config/ sits at the root.
 */
export function findUpward(startDir: string, requiredRelativePath: string, maxHops = 8): string | null {
  let dir = path.resolve(startDir);
  for (let hops = 0; hops <= maxHops; hops++) {
    if (fs.existsSync(path.join(dir, requiredRelativePath))) return dir;
    const up = path.dirname(dir);
    // dirname of "/" is "/"
    if (up === dir) return null;
    dir = up;
  }
  return null;
}

export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  const root = findUpward(startDir, requiredRelativePath, maxHops);
  if (root === null) throw new Error(`no ${requiredRelativePath} found at or above ${startDir}`);
  return root;
}
