import crypto from "crypto";

/**
 * JSON with object keys sorted at every level, and null/undefined members
 * dropped, so equal inputs serialize identically regardless of key order
 * or of whether an absent field was omitted or set to null.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value) ?? null);
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item) ?? null);
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== null && member !== undefined) {
        result[key] = canonicalize(member);
      }
    }
    return result;
  }
  return value ?? undefined;
}

export function sha256(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

/**
 * Cache key for one analysis: `<kind>:<owner>:<sha256 of the input>`.
 */
export function fingerprint(kind: string, owner: string, input: unknown): string {
  return `${kind}:${owner}:${sha256(canonicalJson(input))}`;
}
