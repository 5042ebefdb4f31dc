import { createHash } from "crypto";
import type { NodeLabel } from "./types";

/**
 * Deterministic UUID-shaped id for a graph node, derived from its label and
 * normalized key parts, so repeated loads of the same record hit the same row.
 */
export function createNodeId(label: NodeLabel, keyParts: Array<string | null | undefined>): string {
  const hash = createHash("sha1");
  hash.update(`${label}|${keyParts.map((p) => p ?? "").join("|")}`);
  const sha1Hash = hash.digest("hex");

  // First 16 bytes of the SHA-1 digest, with UUID v4 version/variant bits set
  const bytes = Buffer.from(sha1Hash.substring(0, 32), "hex");
  bytes[6] = (bytes[6] & 0x0f) | 0x40;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  return [
    bytes.subarray(0, 4).toString("hex"),
    bytes.subarray(4, 6).toString("hex"),
    bytes.subarray(6, 8).toString("hex"),
    bytes.subarray(8, 10).toString("hex"),
    bytes.subarray(10, 16).toString("hex"),
  ].join("-");
}
