import { canonicalize } from "json-canonicalize";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Canonicalize before hashing/signing for stable outputs.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function parseJsonObject(json: string): Record<string, unknown> | null {
  const parsed: unknown = JSON.parse(json);
  return isJsonObject(parsed) ? parsed : null;
}
