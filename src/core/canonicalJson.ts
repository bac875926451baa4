import { createHash } from "crypto";

const CROCKFORD_BASE32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}

export function encodeCrockfordBase32_128bits(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) throw new Error(`expected 16 bytes, got ${bytes.byteLength}`);
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);

  let out = "";
  for (let i = 0; i < 26; i++) {
    out = CROCKFORD_BASE32_ALPHABET[Number(value & 31n)] + out;
    value >>= 5n;
  }
  return out;
}

function canonicalize(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? (Object.is(value, -0) ? 0 : value) : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map((v) => canonicalize(v));
  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (v !== undefined) out[key] = canonicalize(v);
    }
    return out;
  }
  throw new Error(`value is not JSON-serializable (${typeof value})`);
}

// Key-sorted JSON; equal inputs hash equally regardless of property order.
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}
