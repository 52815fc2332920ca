import { createHash } from "node:crypto";

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => normalize(item));
  }
  if (value && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => a.localeCompare(b));
    return Object.fromEntries(entries.map(([key, item]) => [key, normalize(item)]));
  }
  return value;
}

export function fingerprintPayload(payload: unknown): string {
  const normalized = normalize(payload);
  const json = JSON.stringify(normalized);
  return createHash("sha256").update(json).digest("hex");
}

/** Deterministic identifier derived from a natural key, used where the same logical record must get the same id on every run. */
export function deterministicId(prefix: string, ...parts: string[]): string {
  const digest = createHash("sha256").update(parts.join("\u001f")).digest("hex");
  return `${prefix}_${digest.slice(0, 24)}`;
}
