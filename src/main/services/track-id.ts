import { createHash } from "node:crypto";

// RFC 4122 DNS namespace; ids stay stable across runs without a database.
const NAMESPACE_DNS = "6ba7b810-9dad-11d1-80b4-00c04fd430c8";

function namespaceBytes(namespace: string): Buffer {
  return Buffer.from(namespace.replaceAll("-", ""), "hex");
}

/** Name-based (version 5) UUID of an absolute file path. */
export function trackIdFromPath(filePath: string): string {
  const digest = createHash("sha1")
    .update(namespaceBytes(NAMESPACE_DNS))
    .update(filePath, "utf8")
    .digest();

  const bytes = digest.subarray(0, 16);
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x50;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;

  const hex = bytes.toString("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32)
  ].join("-");
}
